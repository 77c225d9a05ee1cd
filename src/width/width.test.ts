/**
 * Tests for display width and truncation.
 *
 * Run: node --import tsx src/width/width.test.ts
 */

import { strict as assert } from "node:assert";

import {
  byteLength,
  charLen,
  charSize,
  codePointWidth,
  stringWidth,
  truncate,
  truncateText,
} from "./width.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

// ═══════════════════════════════════════════════════════════════════════════
// CODE POINT WIDTH
// ═══════════════════════════════════════════════════════════════════════════

section("codePointWidth()");

test("ASCII is one column", () => {
  assert.equal(codePointWidth(0x41), 1);
  assert.equal(codePointWidth(0x20), 1);
});

test("control characters are one column", () => {
  assert.equal(codePointWidth(0x09), 1);
  assert.equal(codePointWidth(0x85), 1);
});

test("CJK ideographs are two columns", () => {
  assert.equal(codePointWidth(0x4e2d), 2);
});

test("emoji are two columns", () => {
  assert.equal(codePointWidth(0x1f600), 2);
});

test("combining and format characters take no column", () => {
  assert.equal(codePointWidth(0x0301), 0);
  assert.equal(codePointWidth(0x200b), 0);
});

test("Hangul medial vowels take no column", () => {
  assert.equal(codePointWidth(0x1160), 0);
  assert.equal(codePointWidth(0x11a8), 0);
});

test("ambiguous characters follow the option", () => {
  assert.equal(codePointWidth(0xa1), 1);
  assert.equal(codePointWidth(0xa1, { ambiguousAsWide: true }), 2);
});

// ═══════════════════════════════════════════════════════════════════════════
// CHARACTER SIZE
// ═══════════════════════════════════════════════════════════════════════════

section("charLen() / charSize()");

test("two-byte character", () => {
  assert.deepEqual(charLen("héllo", 1), { bytes: 2, width: 1, units: 1 });
});

test("astral character spans two code units", () => {
  assert.deepEqual(charLen("😀"), { bytes: 4, width: 2, units: 2 });
});

test("end of string is all zeros", () => {
  assert.deepEqual(charLen("", 0), { bytes: 0, width: 0, units: 0 });
  assert.deepEqual(charLen("ab", 2), { bytes: 0, width: 0, units: 0 });
});

test("unpaired surrogate is reported as invalid", () => {
  assert.deepEqual(charLen("\ud800x"), { bytes: -1, width: 1, units: 1 });
});

test("charSize counts an invalid character as one byte", () => {
  assert.deepEqual(charSize("\ud800x"), { bytes: 1, width: 1, units: 1 });
});

section("stringWidth() / byteLength()");

test("mixed-width string", () => {
  assert.equal(stringWidth("中文ab"), 6);
  assert.equal(byteLength("中文ab"), 8);
});

test("combining sequence is one column", () => {
  assert.equal(stringWidth("e\u0301"), 1);
  assert.equal(byteLength("e\u0301"), 3);
});

test("unpaired surrogate counts one byte", () => {
  assert.equal(byteLength("a\ud800"), 2);
});

// ═══════════════════════════════════════════════════════════════════════════
// TRUNCATION
// ═══════════════════════════════════════════════════════════════════════════

section("truncate()");

test("stops before a wide character that would overflow the width", () => {
  assert.deepEqual(truncate("中文ab", 100, 3), { bytes: 3, width: 2, units: 1 });
});

test("stops at the byte budget", () => {
  assert.deepEqual(truncate("abcdef", 4, 100), { bytes: 4, width: 4, units: 4 });
});

test("never splits a multi-byte character", () => {
  assert.equal(truncateText("héllo", 2, 10), "h");
});

test("keeps zero-width marks with their base", () => {
  assert.equal(truncateText("e\u0301x", 10, 1), "e\u0301");
});

test("fits whole string when both budgets allow", () => {
  assert.equal(truncateText("abc", 3, 3), "abc");
});

test("zero budgets give an empty prefix", () => {
  assert.deepEqual(truncate("abc", 0, 10), { bytes: 0, width: 0, units: 0 });
});

// ═══════════════════════════════════════════════════════════════════════════
// Summary
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n${"═".repeat(60)}`);
console.log(`  ${passed} passed, ${failed} failed, ${passed + failed} total`);
console.log(`${"═".repeat(60)}\n`);

if (failed > 0) {
  process.exit(1);
}
