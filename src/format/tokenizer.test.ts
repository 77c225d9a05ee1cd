/**
 * Tests for command-line token extraction.
 *
 * Run: node --import tsx src/format/tokenizer.test.ts
 */

import { strict as assert } from "node:assert";

import { GrowableBuffer } from "../buffer/buffer.js";
import { extractToken, moreArgs, skipWhitespace, tokenize } from "./tokenizer.js";

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

const ENV = { HOME: "/home/test", USER: "tester" };

// ═══════════════════════════════════════════════════════════════════════════
// WORD SPLITTING
// ═══════════════════════════════════════════════════════════════════════════

section("Word Splitting");

test("splits on runs of whitespace", () => {
  assert.deepEqual(tokenize("one two  three", ENV), ["one", "two", "three"]);
});

test("leading and trailing whitespace is ignored", () => {
  assert.deepEqual(tokenize("  a\tb  ", ENV), ["a", "b"]);
});

test("empty line has no words", () => {
  assert.deepEqual(tokenize("", ENV), []);
});

test("unquoted ';' ends the arguments", () => {
  assert.deepEqual(tokenize("a;b", ENV), ["a"]);
});

test("unquoted '#' starts a comment", () => {
  assert.deepEqual(tokenize("a # comment", ENV), ["a"]);
});

test("non-ASCII words pass through", () => {
  assert.deepEqual(tokenize("héllo wörld", ENV), ["héllo", "wörld"]);
});

// ═══════════════════════════════════════════════════════════════════════════
// QUOTING AND ESCAPES
// ═══════════════════════════════════════════════════════════════════════════

section("Quoting");

test("quotes keep whitespace", () => {
  assert.deepEqual(tokenize(`'a b' "c d"`, ENV), ["a b", "c d"]);
});

test("quotes join adjacent text", () => {
  assert.deepEqual(tokenize(`x'y z'w`, ENV), ["xy zw"]);
});

test("empty quotes give an empty word", () => {
  assert.deepEqual(tokenize("''", ENV), [""]);
});

test("quoted ';' does not end the arguments", () => {
  assert.deepEqual(tokenize(`"a;b" c`, ENV), ["a;b", "c"]);
});

section("Escapes");

test("backslash escapes decode control characters", () => {
  assert.deepEqual(tokenize("x\\ty", ENV), ["x\ty"]);
  assert.deepEqual(tokenize("\\e", ENV), ["\x1b"]);
});

test("backslash makes the next character literal", () => {
  assert.deepEqual(tokenize("a\\;b c", ENV), ["a;b", "c"]);
  assert.deepEqual(tokenize("a\\ b", ENV), ["a b"]);
});

test("backslash is literal inside single quotes", () => {
  assert.deepEqual(tokenize("'x\\ty'", ENV), ["x\\ty"]);
});

test("caret notation", () => {
  assert.deepEqual(tokenize("^[x", ENV), ["\x1bx"]);
  assert.deepEqual(tokenize("^^", ENV), ["^"]);
  assert.deepEqual(tokenize("^A", ENV), ["\x01"]);
});

// ═══════════════════════════════════════════════════════════════════════════
// VARIABLES
// ═══════════════════════════════════════════════════════════════════════════

section("Variables");

test("$NAME expands", () => {
  assert.deepEqual(tokenize(`"$HOME/x"`, ENV), ["/home/test/x"]);
});

test("${NAME} expands", () => {
  assert.deepEqual(tokenize("${USER}x", ENV), ["testerx"]);
});

test("no expansion inside single quotes", () => {
  assert.deepEqual(tokenize("'$HOME'", ENV), ["$HOME"]);
});

test("unset variable expands to nothing", () => {
  assert.deepEqual(tokenize("$MISSING", ENV), [""]);
});

test("'$' without a name is literal", () => {
  assert.deepEqual(tokenize("a$", ENV), ["a$"]);
});

// ═══════════════════════════════════════════════════════════════════════════
// CURSOR HANDLING
// ═══════════════════════════════════════════════════════════════════════════

section("extractToken()");

test("leaves the cursor on the next word", () => {
  const tok = GrowableBuffer.from("  ab  cd");
  tok.rewind();
  const dest = new GrowableBuffer();
  extractToken(dest, tok, ENV);
  assert.equal(dest.toString(), "ab");
  assert.equal(tok.remaining(), "cd");
  assert.equal(moreArgs(tok), true);
});

test("resets the destination first", () => {
  const tok = GrowableBuffer.from("new");
  tok.rewind();
  const dest = GrowableBuffer.from("previous");
  extractToken(dest, tok, ENV);
  assert.equal(dest.toString(), "new");
  assert.equal(moreArgs(tok), false);
});

test("skipWhitespace stops at the first word", () => {
  const tok = GrowableBuffer.from(" \t\nx");
  tok.rewind();
  skipWhitespace(tok);
  assert.equal(tok.cursor, 3);
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
