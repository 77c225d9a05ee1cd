/**
 * Expando renderer.
 *
 * Expands a format string such as `%4C %<F?+& >%-20.20s%>-%d` into a line
 * of at most `capacity - 1` UTF-8 bytes that fits a screen `columns` wide.
 *
 * Processing:
 *
 *   1. A format ending in an unescaped `|` is a format pipe: its words are
 *      expanded one by one, quoted, and run as a shell command whose output
 *      becomes the result. Output ending in a single `%` is expanded again
 *      as a format.
 *   2. Otherwise the format is scanned left to right. Literal text is
 *      copied whole characters at a time while it fits, `\n`-style escapes
 *      are decoded, padding directives (`%>`, `%*`, `%|`) are laid out here,
 *      and every other directive is handed to the caller's FormatCallback.
 *
 * Template problems never throw: a malformed directive ends the scan and
 * keeps what was rendered so far, text that does not fit is cut at a
 * character boundary, and a failing format pipe renders as nothing.
 *
 * All working state lives in the call. Recursive renders (pipe words,
 * the text right of a padding directive, recycled pipe output, and
 * branches a callback renders with the options it was given) count
 * against `maxDepth`.
 */

import { GrowableBuffer } from "../buffer/buffer.js";
import { config } from "../config/index.js";
import { getDefaultLogger, type Logger } from "../logging/index.js";
import {
  byteLength,
  charSize,
  stringWidth,
  truncate,
  truncateText,
  type WidthOptions,
} from "../width/width.js";
import { normalizeLegacyConditional, parseDirective } from "./directive.js";
import {
  createShellFilterBridge,
  FilterReadError,
  FilterSpawnError,
  shellQuote,
  type FilterBridge,
} from "./filter.js";
import { extractToken, moreArgs, type TokenEnvironment } from "./tokenizer.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Columns held back for the arrow cursor when `arrowCursor` is set. */
export const ARROW_CURSOR_WIDTH = 3;

export interface FormatOptions {
  /** Reserve room for a `-> ` cursor marker before the line. */
  arrowCursor?: boolean;
  /** Run formats ending in `|` as shell pipelines (default from config). */
  allowFilter?: boolean;
  /** Set by the renderer when a callback expands a `%<…>` conditional. */
  optional?: boolean;
  /** Runs format pipes (default: `/bin/sh -c`). */
  filter?: FilterBridge;
  logger?: Logger;
  /** Maximum depth of recursive renders (default from config). */
  maxDepth?: number;
  /** Treat ambiguous-width characters as two columns (default from config). */
  ambiguousAsWide?: boolean;
  /** Variables for `$NAME` in format pipe words (default `process.env`). */
  env?: TokenEnvironment;
  /** Current recursion depth. */
  depth?: number;
}

/** Everything a FormatCallback knows about the directive it expands. */
export interface FieldRequest<T> {
  /** Bytes available for the expansion, terminator included. */
  capacity: number;
  /** Screen column the expansion starts at. */
  column: number;
  /** Screen width. */
  columns: number;
  /** Directive character. */
  op: string;
  /** Format text after the directive. */
  rest: string;
  prefix: string;
  ifBranch: string;
  elseBranch: string;
  data: T;
  /** Options to pass on when rendering a branch. */
  options: FormatOptions;
}

export interface FieldResult {
  /** Expansion of the directive. */
  text: string;
  /** Characters (UTF-16 units) of `rest` the callback consumed. */
  consumed?: number;
}

export type FormatCallback<T> = (request: FieldRequest<T>) => FieldResult;

// ---------------------------------------------------------------------------
// Format pipes
// ---------------------------------------------------------------------------

/**
 * True when `template` ends in a `|` preceded by an even number of
 * backslashes.
 */
export function isFormatPipe(template: string): boolean {
  const n = template.length;
  if (n <= 1 || template.charAt(n - 1) !== "|") return false;

  let off = n;
  while (off > 0 && template.charAt(off - 2) === "\\") {
    off--;
  }
  return off > 0 && (n - off) % 2 === 0;
}

interface RenderState<T> {
  capacity: number;
  column: number;
  columns: number;
  callback: FormatCallback<T>;
  data: T;
  options: FormatOptions;
  depth: number;
  logger: Logger;
  width: WidthOptions;
}

function runFormatPipe<T>(template: string, state: RenderState<T>): string {
  const { capacity, column, columns, callback, data, options, depth, logger } = state;
  logger.debug("Format pipe", { template });

  const srcbuf = GrowableBuffer.from(template.slice(0, -1));
  srcbuf.rewind();
  const word = new GrowableBuffer();
  const command = new GrowableBuffer();
  const wordOptions: FormatOptions = { ...options, allowFilter: false, depth: depth + 1 };

  do {
    extractToken(word, srcbuf, options.env ?? process.env);
    const expanded = renderFormat(word.toString(), capacity, 0, columns, callback, data, wordOptions);
    if (command.length > 0) {
      command.addch(" ");
    }
    command.addstr(shellQuote(expanded));
  } while (moreArgs(srcbuf));

  const commandLine = command.toString();
  logger.debug("Running format pipe command", { command: commandLine });

  const filter = options.filter ?? createShellFilterBridge({ shell: config.shell, logger });
  let output: string;
  try {
    const handle = filter.spawn(commandLine);
    output = handle.read();
    const status = handle.wait();
    if (status !== 0) {
      logger.warn("Format pipe command exited with non-zero status", {
        command: commandLine,
        status,
      });
      return "";
    }
  } catch (err) {
    if (err instanceof FilterSpawnError || err instanceof FilterReadError) {
      logger.error(err.message, {
        command: commandLine,
        cause: err.cause instanceof Error ? err.cause.message : String(err.cause),
      });
      return "";
    }
    throw err;
  }

  let result = truncateText(output, capacity - 1, Number.POSITIVE_INFINITY, state.width);
  result = result.replace(/[\r\n]+$/, "");
  if (result === "") {
    logger.debug("Format pipe produced no output", { command: commandLine });
    return "";
  }
  logger.debug("Format pipe output", { output: result });

  // A trailing '%' asks for the output to be expanded as a format; "%%"
  // ends the output with a literal percent sign instead.
  if (result.endsWith("%")) {
    result = result.slice(0, -1);
    if (result !== "" && !result.endsWith("%")) {
      return renderFormat(result, capacity, column, columns, callback, data, {
        ...options,
        depth: depth + 1,
      });
    }
  }
  return result;
}

// ---------------------------------------------------------------------------
// Renderer
// ---------------------------------------------------------------------------

function decodeEscape(ch: string): string | null {
  switch (ch) {
    case "n":
      return "\n";
    case "t":
      return "\t";
    case "r":
      return "\r";
    case "f":
      return "\f";
    case "v":
      return "\v";
    default:
      return null;
  }
}

/**
 * Expand `template`.
 *
 * @param template - Format string
 * @param capacity - Output size in bytes; one byte is kept for a
 *                   terminator, so at most `capacity - 1` bytes come back
 * @param column   - Screen column the output starts at
 * @param columns  - Screen width
 * @param callback - Expands directive characters
 * @param data     - Passed through to `callback`
 * @returns The rendered line
 */
export function renderFormat<T>(
  template: string,
  capacity: number,
  column: number,
  columns: number,
  callback: FormatCallback<T>,
  data: T,
  options: FormatOptions = {}
): string {
  const depth = options.depth ?? 0;
  const maxDepth = options.maxDepth ?? config.maxDepth;
  const logger = options.logger ?? getDefaultLogger();

  if (depth > maxDepth) {
    logger.warn("Format nested too deeply; expansion dropped", { depth, maxDepth, template });
    return "";
  }
  if (capacity <= 0) {
    return "";
  }

  const state: RenderState<T> = {
    capacity,
    column,
    columns,
    callback,
    data,
    options,
    depth,
    logger,
    width: { ambiguousAsWide: options.ambiguousAsWide ?? config.ambiguousAsWide },
  };

  if ((options.allowFilter ?? config.allowFilter) && isFormatPipe(template)) {
    return runFormatPipe(template, state);
  }

  return scanFormat(template, state);
}

function scanFormat<T>(template: string, state: RenderState<T>): string {
  const { capacity, columns, callback, data, options, depth, logger, width } = state;
  const buflen = capacity - 1;
  const reserved = options.arrowCursor ? ARROW_CURSOR_WIDTH : 0;

  let src = template;
  let i = 0;
  let out = "";
  let wlen = reserved;
  let col = state.column + reserved;

  while (i < src.length && wlen < buflen) {
    const ch = src.charAt(i);

    if (ch === "%") {
      i++;
      if (src.charAt(i) === "%") {
        out += "%";
        wlen++;
        col++;
        i++;
        continue;
      }

      if (src.charAt(i) === "?") {
        src = normalizeLegacyConditional(src, i);
      }

      const parsed = parseDirective(src, i);
      if (parsed.kind === "malformed") {
        logger.debug("Malformed format directive", { template, at: parsed.at, reason: parsed.reason });
        break;
      }
      const { directive } = parsed;
      i = parsed.next;

      if (directive.op === ">" || directive.op === "*" || directive.op === "|") {
        if (i >= src.length) {
          break;
        }
        const fill = charSize(src, i, width);
        const fillChar = src.slice(i, i + fill.units);
        const pl = fill.bytes;
        const pw = fill.width > 0 ? fill.width : 1;

        if (directive.op === "|") {
          // pad to the end of the line
          if (col < columns && wlen < buflen) {
            let count = Math.floor((columns - col) / pw);
            if (count > 0 && wlen + count * pl > buflen) {
              count = Math.floor((buflen - wlen) / pl);
            }
            if (count > 0) {
              out += fillChar.repeat(count);
            }
          }
          break;
        }

        // %>X: right justify, left side wins; %*X: right side wins
        const soft = directive.op === "*";
        if (!((col < columns && wlen < buflen) || soft)) {
          break;
        }

        let right = renderFormat(src.slice(i + fill.units), capacity, 0, columns, callback, data, {
          ...options,
          depth: depth + 1,
        });
        let len = byteLength(right);
        let wid = stringWidth(right, width);
        let pad = Math.floor((columns - col - wid) / pw);

        if (pad >= 0) {
          if (wlen + pad * pl + len > buflen) {
            // not enough bytes for every column: use what there is
            pad = buflen > wlen + len ? Math.floor((buflen - wlen - len) / pl) : 0;
          } else {
            // line up multi-column fill characters with the right side
            while (col + pad * pw + wid < columns && wlen + pad * pl + len < buflen) {
              out += " ";
              wlen++;
              col++;
            }
          }
          if (pad > 0) {
            out += fillChar.repeat(pad);
            wlen += pad * pl;
            col += pad * pw;
          }
        } else if (soft) {
          const avail = Math.max(columns - reserved, 0);
          const kept = truncate(right, buflen, avail, width);
          right = right.slice(0, kept.units);
          len = kept.bytes;
          wid = kept.width;

          const left = truncate(out, buflen - reserved - len, avail - wid, width);
          out = out.slice(0, left.units);
          wlen = reserved + left.bytes;
          col = left.width;
          while (col + wid < avail && wlen + len < buflen) {
            out += " ";
            wlen++;
            col++;
          }
        } else {
          // hard justify with no room: nothing more is drawn
          break;
        }

        if (len + wlen > buflen) {
          right = truncateText(right, buflen - wlen, Math.max(columns - col, 0), width);
        }
        out += right;
        break;
      }

      const result = callback({
        capacity: buflen - wlen + 1,
        column: col,
        columns,
        op: directive.op,
        rest: src.slice(i),
        prefix: directive.prefix,
        ifBranch: directive.ifBranch,
        elseBranch: directive.elseBranch,
        data,
        options: {
          ...options,
          ambiguousAsWide: width.ambiguousAsWide,
          optional: directive.optional,
          depth: depth + 1,
        },
      });
      i += Math.min(Math.max(result.consumed ?? 0, 0), src.length - i);

      let text = result.text;
      if (directive.lowercase) {
        text = text.toLowerCase();
      }
      if (directive.stripDots) {
        text = text.replace(/\./g, "_");
      }

      let len = byteLength(text);
      if (len + wlen > buflen) {
        text = truncateText(text, buflen - wlen, Math.max(columns - col, 0), width);
        len = byteLength(text);
      }
      out += text;
      wlen += len;
      col += stringWidth(text, width);
    } else if (ch === "\\") {
      i++;
      if (i >= src.length) {
        break;
      }
      const decoded = decodeEscape(src.charAt(i));
      if (decoded !== null) {
        out += decoded;
        wlen++;
        col++;
        i++;
        continue;
      }
      const size = charSize(src, i, width);
      if (wlen + size.bytes > buflen) {
        break;
      }
      out += src.slice(i, i + size.units);
      wlen += size.bytes;
      col += size.width;
      i += size.units;
    } else {
      const size = charSize(src, i, width);
      if (wlen + size.bytes > buflen) {
        break;
      }
      out += src.slice(i, i + size.units);
      wlen += size.bytes;
      col += size.width;
      i += size.units;
    }
  }

  return out;
}
