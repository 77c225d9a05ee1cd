/**
 * Tests for the render-format CLI.
 *
 * Run: node --import tsx src/cli/render-format.test.ts
 *
 * The command runs in process: format pipes go to a fake filter bridge and
 * log lines to a memory logger.
 */

import { strict as assert } from "node:assert";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";

import type { FilterBridge } from "../format/index.js";
import { createMemoryLogger } from "../logging/index.js";
import { buildRuler, runRenderCommand, type RenderCommandOptions } from "./render-format.js";

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

const tempDir = mkdtempSync(join(tmpdir(), "render-format-"));
const fieldsFile = join(tempDir, "fields.json");
writeFileSync(fieldsFile, JSON.stringify({ s: "hello" }));

const profileFile = fileURLToPath(new URL("../../config/render-profile.json", import.meta.url));
const sampleFields = fileURLToPath(new URL("../../fields/sample-fields.json", import.meta.url));

function run(argv: string[], options: RenderCommandOptions = {}) {
  return runRenderCommand([...argv, "--no-color"], { logger: createMemoryLogger(), ...options });
}

function echoFilter(output: string): FilterBridge {
  return {
    spawn: () => ({ read: () => output, wait: () => 0 }),
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// RENDERING
// ═══════════════════════════════════════════════════════════════════════════

section("Rendering");

test("renders a format with a fields file", () => {
  const result = run(["--format", "[%s]", "--fields", fieldsFile, "--columns", "80"]);
  assert.equal(result.exitCode, 0);
  assert.equal(result.stdout, "[hello]\n");
  assert.equal(result.stderr, "");
});

test("renders a named format from a profile", () => {
  const result = run(["--profile", profileFile, "--name", "compose"]);
  const left = "-- Compose  [Approx. msg size: 1.5K   Atts: 2]";
  assert.equal(result.exitCode, 0);
  assert.equal(result.stdout, left + "-".repeat(80 - left.length) + "\n");
});

test("fields file overrides profile fields", () => {
  const result = run(["--profile", profileFile, "--fields", sampleFields, "--format", "%s|%c"]);
  assert.equal(result.stdout, "Re: build checklist|117K\n");
});

test("capacity limits the output", () => {
  assert.equal(run(["--format", "abcdef", "--capacity", "4"]).stdout, "abc\n");
});

test("arrow cursor reserves room", () => {
  assert.equal(run(["--format", "abcdef", "--capacity", "6", "--arrow-cursor"]).stdout, "ab\n");
});

test("starting column shortens padding", () => {
  assert.equal(run(["--format", "%|.", "--columns", "10", "--column", "4"]).stdout, "......\n");
});

test("ruler above the line", () => {
  const result = run(["--format", "[%s]", "--fields", fieldsFile, "--columns", "12", "--ruler"]);
  assert.equal(result.stdout, "....+....1..\n[hello]\n");
});

test("JSON output", () => {
  const result = run(["--format", "[%s]", "--fields", fieldsFile, "--columns", "80", "--json"]);
  assert.deepEqual(JSON.parse(result.stdout), {
    rendered: "[hello]",
    bytes: 7,
    width: 7,
    columns: 80,
  });
});

test("buildRuler marks fives and tens", () => {
  assert.equal(buildRuler(25), "....+....1....+....2....+");
  assert.equal(buildRuler(0), "");
});

section("Format Pipes");

test("pipes run through the filter bridge", () => {
  const result = run(["--format", "gen|"], { filter: echoFilter("out\n") });
  assert.equal(result.stdout, "out\n");
});

test("--no-filter renders pipes as text", () => {
  const result = run(["--format", "gen|", "--no-filter"], { filter: echoFilter("out\n") });
  assert.equal(result.stdout, "gen|\n");
});

// ═══════════════════════════════════════════════════════════════════════════
// ERRORS
// ═══════════════════════════════════════════════════════════════════════════

section("Errors");

test("help exits cleanly", () => {
  const result = run(["--help"]);
  assert.equal(result.exitCode, 0);
  assert.ok(result.stdout.includes("Usage: render-format [options]"));
});

test("format or name is required", () => {
  const result = run([]);
  assert.equal(result.exitCode, 1);
  assert.equal(result.stderr, "Error: Either --format or --name is required\n");
});

test("unknown format name lists the available ones", () => {
  const result = run(["--profile", profileFile, "--name", "nope"]);
  assert.equal(result.exitCode, 1);
  assert.equal(
    result.stderr,
    'Error: Unknown format "nope". Available: compose, index, sidebar, status\n'
  );
});

test("non-numeric column count", () => {
  const result = run(["--format", "x", "--columns", "abc"]);
  assert.equal(result.exitCode, 1);
  assert.equal(result.stderr, "Error: --columns must be a non-negative integer, got: abc\n");
});

test("capacity of zero is rejected", () => {
  const result = run(["--format", "x", "--capacity", "0"]);
  assert.equal(result.exitCode, 1);
  assert.equal(result.stderr, "Error: --capacity must be >= 1, got: 0\n");
});

test("unknown option", () => {
  assert.equal(run(["--bogus"]).exitCode, 1);
});

test("invalid fields file", () => {
  const bad = join(tempDir, "bad-fields.json");
  writeFileSync(bad, JSON.stringify({ ab: 1 }));
  const result = run(["--format", "%s", "--fields", bad]);
  assert.equal(result.exitCode, 1);
  assert.ok(result.stderr.startsWith(`Render profile validation failed (${bad}):\n`));
  assert.equal(result.stdout, "");
});

rmSync(tempDir, { recursive: true, force: true });

// ═══════════════════════════════════════════════════════════════════════════
// Summary
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n${"═".repeat(60)}`);
console.log(`  ${passed} passed, ${failed} failed, ${passed + failed} total`);
console.log(`${"═".repeat(60)}\n`);

if (failed > 0) {
  process.exit(1);
}
