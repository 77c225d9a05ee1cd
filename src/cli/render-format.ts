#!/usr/bin/env node
/**
 * CLI tool to preview a rendered format line.
 *
 * Expands one format string against a table of sample field values and
 * prints the result, optionally under a column ruler, so a status or index
 * format can be checked for width and truncation before it is used.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * USAGE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Render a format directly:
 *   npm run render-format -- --format '%-10.10s|%>.%n' --fields fields/sample-fields.json
 *
 * Render a named format from a profile:
 *   npm run render-format -- --profile config/render-profile.json --name status --ruler
 *
 * Options:
 *   --format <template>     Format string to render
 *   --profile <path>        Render profile JSON (formats, fields, geometry)
 *   --name <format>         Name of a format in the profile
 *   --fields <path>         Field values JSON, merged over the profile's fields
 *   --columns <n>           Screen width
 *   --column <n>            Starting column
 *   --capacity <n>          Output size in bytes, terminator included
 *   --arrow-cursor          Reserve three columns for an arrow cursor
 *   --no-filter             Do not run formats ending in '|'
 *   --ambiguous-wide        Count ambiguous-width characters as two columns
 *   --ruler                 Print a column ruler above the line
 *   --no-color              Disable ANSI colors
 *   --json                  Output as JSON
 *   -h, --help              Show help
 *
 * Exit codes:
 *   0 - Success
 *   1 - Error (bad arguments, unreadable or invalid profile/fields file)
 */

import { parseArgs } from "node:util";

import {
  config,
  ConfigError,
  validateConfig,
  loadFieldsFile,
  loadRenderProfile,
  loadRenderProfileFile,
  RenderProfileError,
  type RenderProfile,
} from "../config/index.js";
import { createFieldCallback, renderFormat, type FilterBridge } from "../format/index.js";
import { createLogger, initRunId, isLogLevel, type Logger } from "../logging/index.js";
import { byteLength, stringWidth } from "../width/width.js";

// ============================================================
// Types
// ============================================================

export interface RenderCommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface RenderCommandOptions {
  /** Runs format pipes; defaults to the shell */
  filter?: FilterBridge;
  logger?: Logger;
}

interface RenderSummary {
  rendered: string;
  bytes: number;
  width: number;
  columns: number;
}

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

// ============================================================
// CLI Parsing
// ============================================================

const HELP = `
Usage: render-format [options]

  npm run render-format -- --format <template> [--fields <path>]
  npm run render-format -- --profile <path> --name <format>

Options:
  --format <template>     Format string to render
  --profile <path>        Render profile JSON (formats, fields, geometry)
  --name <format>         Name of a format in the profile
  --fields <path>         Field values JSON, merged over the profile's fields
  --columns <n>           Screen width (default: profile, then EXPANDO_COLUMNS)
  --column <n>            Starting column (default: 0)
  --capacity <n>          Output size in bytes, terminator included (default: 256)
  --arrow-cursor          Reserve three columns for an arrow cursor
  --no-filter             Do not run formats ending in '|'
  --ambiguous-wide        Count ambiguous-width characters as two columns
  --ruler                 Print a column ruler above the line
  --no-color              Disable ANSI colors
  --json                  Output as JSON
  -h, --help              Show this help message

Exit codes:
  0 - Success
  1 - Error (bad arguments, unreadable or invalid profile/fields file)
`;

function parseCliArgs(argv: string[]) {
  try {
    const { values } = parseArgs({
      args: argv,
      options: {
        format: { type: "string" },
        profile: { type: "string" },
        name: { type: "string" },
        fields: { type: "string" },
        columns: { type: "string" },
        column: { type: "string" },
        capacity: { type: "string" },
        "arrow-cursor": { type: "boolean", default: false },
        "no-filter": { type: "boolean", default: false },
        "ambiguous-wide": { type: "boolean", default: false },
        ruler: { type: "boolean", default: false },
        "no-color": { type: "boolean", default: false },
        json: { type: "boolean", default: false },
        help: { type: "boolean", short: "h", default: false },
      },
    });
    return values;
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }
}

function parseIntOption(name: string, value: string | undefined, min: number): number | undefined {
  if (value === undefined) return undefined;
  if (!/^\d+$/.test(value.trim())) {
    throw new UsageError(`--${name} must be a non-negative integer, got: ${value}`);
  }
  const parsed = Number.parseInt(value, 10);
  if (parsed < min) {
    throw new UsageError(`--${name} must be >= ${min}, got: ${parsed}`);
  }
  return parsed;
}

// ============================================================
// Output Formatting
// ============================================================

const COLORS = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  cyan: "\x1b[36m",
};

let useColors = process.stdout.isTTY && !process.env.NO_COLOR;

function c(color: keyof typeof COLORS, text: string): string {
  return useColors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

/**
 * Column ruler: a digit every ten columns, `+` every five, `.` elsewhere.
 */
export function buildRuler(columns: number): string {
  let ruler = "";
  for (let i = 1; i <= columns; i++) {
    if (i % 10 === 0) ruler += String((i / 10) % 10);
    else if (i % 5 === 0) ruler += "+";
    else ruler += ".";
  }
  return ruler;
}

// ============================================================
// Rendering
// ============================================================

/**
 * Profile used when no --profile is given: geometry and switches from the
 * environment, formats from the defaults.
 */
function profileFromEnvironment(): Readonly<RenderProfile> {
  return loadRenderProfile(
    {
      columns: config.columns,
      arrowCursor: config.arrowCursor,
      allowFilter: config.allowFilter,
      ambiguousAsWide: config.ambiguousAsWide,
      maxDepth: config.maxDepth,
    },
    "environment"
  );
}

function resolveTemplate(profile: RenderProfile, format: string | undefined, name: string | undefined): string {
  if (format !== undefined) return format;
  if (name === undefined) {
    throw new UsageError("Either --format or --name is required");
  }
  const template = profile.formats[name];
  if (template === undefined) {
    const known = Object.keys(profile.formats).sort().join(", ");
    throw new UsageError(`Unknown format "${name}". Available: ${known || "(none)"}`);
  }
  return template;
}

/**
 * Run the command with `argv` (without the node and script arguments).
 * Never exits the process.
 */
export function runRenderCommand(argv: string[], options: RenderCommandOptions = {}): RenderCommandResult {
  const out: string[] = [];
  const err: string[] = [];

  try {
    const args = parseCliArgs(argv);
    if (args["no-color"]) {
      useColors = false;
    }
    if (args.help) {
      return { exitCode: 0, stdout: HELP, stderr: "" };
    }

    const logger =
      options.logger ??
      createLogger({ level: isLogLevel(config.logLevel) ? config.logLevel : "info" });

    const profile = args.profile !== undefined ? loadRenderProfileFile(args.profile) : profileFromEnvironment();
    const extraFields = args.fields !== undefined ? loadFieldsFile(args.fields) : {};
    const template = resolveTemplate(profile, args.format, args.name);

    const columns = parseIntOption("columns", args.columns, 0) ?? profile.columns;
    const column = parseIntOption("column", args.column, 0) ?? profile.column;
    const capacity = parseIntOption("capacity", args.capacity, 1) ?? profile.capacity;
    const ambiguousAsWide = args["ambiguous-wide"] || profile.ambiguousAsWide;

    logger.debug("Rendering format", { template, columns, column, capacity });

    const callback = createFieldCallback<undefined>({ ...profile.fields, ...extraFields });
    const rendered = renderFormat(template, capacity, column, columns, callback, undefined, {
      arrowCursor: args["arrow-cursor"] || profile.arrowCursor,
      allowFilter: args["no-filter"] ? false : profile.allowFilter,
      ambiguousAsWide,
      maxDepth: profile.maxDepth,
      filter: options.filter,
      logger,
    });

    const summary: RenderSummary = {
      rendered,
      bytes: byteLength(rendered),
      width: stringWidth(rendered, { ambiguousAsWide }),
      columns,
    };

    if (args.json) {
      out.push(JSON.stringify(summary, null, 2));
    } else {
      if (args.ruler) {
        out.push(c("dim", buildRuler(columns)));
      }
      out.push(rendered);
    }
    return { exitCode: 0, stdout: out.join("\n") + "\n", stderr: err.join("\n") };
  } catch (e) {
    if (e instanceof RenderProfileError) {
      err.push(c("red", e.format()));
    } else if (e instanceof UsageError || e instanceof ConfigError) {
      err.push(c("red", `Error: ${e.message}`));
    } else {
      throw e;
    }
    return { exitCode: 1, stdout: out.join("\n"), stderr: err.join("\n") + "\n" };
  }
}

// ============================================================
// Main
// ============================================================

function main(): void {
  initRunId();
  validateConfig();
  const result = runRenderCommand(process.argv.slice(2));
  if (result.stdout) process.stdout.write(result.stdout);
  if (result.stderr) process.stderr.write(result.stderr);
  process.exit(result.exitCode);
}

// Only run when executed directly (not imported by tests)
const isDirectExecution = process.argv[1] &&
  (process.argv[1].endsWith("render-format.ts") ||
   process.argv[1].endsWith("render-format.js"));

if (isDirectExecution) {
  try {
    main();
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(c("red", `Error: ${message}`));
    process.exit(1);
  }
}
