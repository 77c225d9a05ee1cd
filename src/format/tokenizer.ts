/**
 * Command-line token extraction.
 *
 * Splits a line into shell-like words the way configuration commands are
 * split: whitespace separates words, `'…'` quotes literally, `"…"` quotes
 * while still honouring backslash escapes and `$VAR` expansion, and an
 * unquoted `;` or `#` ends the argument list.
 *
 * Reads from a GrowableBuffer at its cursor and leaves the cursor on the
 * first byte of the next word.
 */

import { GrowableBuffer } from "../buffer/buffer.js";

export type TokenEnvironment = Readonly<Record<string, string | undefined>>;

const BACKSLASH = 0x5c;
const SINGLE_QUOTE = 0x27;
const DOUBLE_QUOTE = 0x22;
const CARET = 0x5e;
const DOLLAR = 0x24;
const SEMICOLON = 0x3b;
const HASH = 0x23;
const OPEN_BRACE = 0x7b;
const CLOSE_BRACE = 0x7d;

function isSpace(byte: number): boolean {
  return byte === 0x20 || (byte >= 0x09 && byte <= 0x0d);
}

function isNameByte(byte: number): boolean {
  return (
    (byte >= 0x30 && byte <= 0x39) ||
    (byte >= 0x41 && byte <= 0x5a) ||
    (byte >= 0x61 && byte <= 0x7a) ||
    byte === 0x5f
  );
}

/** Skip whitespace at the cursor. */
export function skipWhitespace(tok: GrowableBuffer): void {
  while (isSpace(tok.peek())) {
    tok.advance();
  }
}

/**
 * True while the cursor is on another argument: not at the end and not at
 * a `;` or `#` terminator.
 */
export function moreArgs(tok: GrowableBuffer): boolean {
  const byte = tok.peek();
  return byte !== 0 && byte !== SEMICOLON && byte !== HASH;
}

function escapeByte(byte: number): number {
  switch (byte) {
    case 0x6e: // n
      return 0x0a;
    case 0x74: // t
      return 0x09;
    case 0x72: // r
      return 0x0d;
    case 0x66: // f
      return 0x0c;
    case 0x76: // v
      return 0x0b;
    case 0x65: // e
    case 0x45: // E
      return 0x1b;
    default:
      return byte;
  }
}

function caretByte(byte: number): number {
  if (byte === CARET) return CARET;
  if (byte === 0x3f) return 0x7f; // ^?
  if (byte === 0x5b) return 0x1b; // ^[
  return byte & 0x1f;
}

function readVariable(tok: GrowableBuffer, env: TokenEnvironment): string {
  let name = "";
  if (tok.peek() === OPEN_BRACE) {
    tok.advance();
    while (tok.peek() !== 0 && tok.peek() !== CLOSE_BRACE) {
      name += String.fromCharCode(tok.peek());
      tok.advance();
    }
    if (tok.peek() === CLOSE_BRACE) tok.advance();
  } else {
    while (isNameByte(tok.peek())) {
      name += String.fromCharCode(tok.peek());
      tok.advance();
    }
  }
  return name === "" ? "" : (env[name] ?? "");
}

/**
 * Extract the next word from `tok` into `dest`, which is reset first.
 *
 * @param env - Source of `$VAR` expansions
 */
export function extractToken(
  dest: GrowableBuffer,
  tok: GrowableBuffer,
  env: TokenEnvironment = process.env
): void {
  dest.reset();
  skipWhitespace(tok);

  let quote = 0;
  for (;;) {
    const byte = tok.peek();
    if (byte === 0) break;

    if (quote === 0 && (isSpace(byte) || byte === SEMICOLON || byte === HASH)) {
      break;
    }

    tok.advance();

    if (byte === quote) {
      quote = 0;
    } else if (quote === 0 && (byte === SINGLE_QUOTE || byte === DOUBLE_QUOTE)) {
      quote = byte;
    } else if (byte === BACKSLASH && quote !== SINGLE_QUOTE) {
      const next = tok.peek();
      if (next === 0) break;
      tok.advance();
      dest.add(Uint8Array.of(escapeByte(next)));
    } else if (byte === CARET && quote === 0 && tok.peek() !== 0) {
      const next = tok.peek();
      tok.advance();
      dest.add(Uint8Array.of(caretByte(next)));
    } else if (byte === DOLLAR && quote !== SINGLE_QUOTE && (tok.peek() === OPEN_BRACE || isNameByte(tok.peek()))) {
      dest.addstr(readVariable(tok, env));
    } else {
      dest.add(Uint8Array.of(byte));
    }
  }

  skipWhitespace(tok);
}

/**
 * Split a whole line into words. Stops at the first unquoted `;` or `#`.
 */
export function tokenize(line: string, env: TokenEnvironment = process.env): string[] {
  const tok = GrowableBuffer.from(line);
  tok.rewind();
  const word = new GrowableBuffer();
  const words: string[] = [];
  skipWhitespace(tok);
  while (moreArgs(tok)) {
    extractToken(word, tok, env);
    words.push(word.toString());
  }
  return words;
}
