/**
 * Growable byte buffer with a read/write cursor.
 *
 * The storage always holds a NUL-terminated string once it exists: every
 * write leaves a zero byte at the cursor. The terminator is not part of the
 * logical content and is not counted by `length`.
 *
 * Capacity only grows, in steps of at least 128 bytes, so appending is
 * amortised O(1).
 *
 * | Method        | Description
 * | :------------ | :--------------------------------------------------
 * | `init()`      | Empty the object: no storage, capacity 0, cursor 0
 * | `reinit()`    | Release storage and `init()`
 * | `reset()`     | Zero the content in place and rewind
 * | `add()`       | Append bytes at the cursor, growing as needed
 * | `addstr()`    | Append a string (UTF-8)
 * | `addch()`     | Append a single character
 * | `printf()`    | Append formatted text
 * | `from()`      | Build a buffer holding a copy of a string
 * | `seek()`      | Move the cursor to an offset
 * | `rewind()`    | Move the cursor to the start
 */

import { format } from "node:util";

/** Smallest step by which storage grows. */
export const BUFFER_GROWTH = 128;

/**
 * Raised when the runtime refuses to allocate storage. Nothing catches it:
 * running out of memory is not a condition the renderer degrades around.
 */
export class BufferAllocationError extends Error {
  constructor(
    public readonly requested: number,
    cause?: unknown
  ) {
    super(`Unable to allocate ${requested} bytes for buffer`, { cause });
    this.name = "BufferAllocationError";
  }
}

const EMPTY = Buffer.alloc(0);

export class GrowableBuffer {
  private data: Buffer = EMPTY;
  private dsize = 0;
  private dptr = 0;

  /**
   * Build a buffer holding a copy of `seed`, with the cursor at its end.
   *
   * Capacity is the content length, leaving no headroom for the
   * terminator, so the first `add()` always reallocates.
   */
  static from(seed: string): GrowableBuffer {
    const buf = new GrowableBuffer();
    const bytes = Buffer.from(seed, "utf-8");
    const data = allocate(bytes.length + 1);
    bytes.copy(data);
    buf.data = data;
    buf.dsize = bytes.length;
    buf.seek(bytes.length);
    return buf;
  }

  /** Allocated size in bytes (terminator included). */
  get capacity(): number {
    return this.dsize;
  }

  /** Offset of the read/write position. */
  get cursor(): number {
    return this.dptr;
  }

  /** Length in bytes of the logical content (up to the first NUL). */
  get length(): number {
    const end = this.data.indexOf(0);
    return end === -1 ? this.data.length : end;
  }

  /** Must not be called on a buffer whose storage is still wanted. */
  init(): void {
    this.data = EMPTY;
    this.dsize = 0;
    this.dptr = 0;
  }

  reinit(): void {
    this.init();
  }

  reset(): void {
    this.data.fill(0, 0, this.dsize);
    this.rewind();
  }

  /** No bounds check: the caller passes an offset within the storage. */
  seek(offset: number): void {
    this.dptr = offset;
  }

  rewind(): void {
    this.seek(0);
  }

  /**
   * Copy `len` bytes of `bytes` to the cursor and terminate.
   * A missing source is ignored.
   */
  add(bytes: Uint8Array | null | undefined, len: number = bytes?.length ?? 0): void {
    if (bytes === null || bytes === undefined) return;

    if (this.dptr + len + 1 > this.dsize) {
      this.grow(len < BUFFER_GROWTH ? BUFFER_GROWTH : len + 1);
    }
    this.data.set(bytes.subarray(0, len), this.dptr);
    this.dptr += len;
    this.data[this.dptr] = 0;
  }

  addstr(s: string): void {
    this.add(Buffer.from(s, "utf-8"));
  }

  addch(c: string): void {
    const ch = String.fromCodePoint(c.codePointAt(0) ?? 0);
    this.add(Buffer.from(ch, "utf-8"));
  }

  /**
   * Append text formatted with `util.format` at the cursor.
   *
   * When the text does not fit the space left after the cursor, storage
   * grows to exactly what is needed (at least 128 bytes) before writing.
   *
   * @returns Number of bytes written
   */
  printf(fmt: string, ...args: unknown[]): number {
    const doff = this.dptr;
    let blen = this.dsize - doff;
    if (blen <= 0) {
      blen = BUFFER_GROWTH;
      this.grow(blen);
    }

    const bytes = Buffer.from(format(fmt, ...args), "utf-8");
    const len = bytes.length;
    if (len >= blen) {
      this.grow(Math.max(len + 1 - blen, BUFFER_GROWTH));
    }

    bytes.copy(this.data, doff);
    this.data[doff + len] = 0;
    this.dptr += len;
    return len;
  }

  /** Byte at `cursor + ahead`, or 0 at or beyond the terminator. */
  peek(ahead = 0): number {
    return this.data[this.dptr + ahead] ?? 0;
  }

  advance(count = 1): void {
    this.dptr += count;
  }

  /** Logical content decoded as UTF-8. */
  toString(): string {
    return this.data.subarray(0, this.length).toString("utf-8");
  }

  /** Content from the cursor up to the terminator, decoded as UTF-8. */
  remaining(): string {
    const end = this.length;
    return this.dptr >= end ? "" : this.data.subarray(this.dptr, end).toString("utf-8");
  }

  /** Grow storage by `by` bytes, keeping content and cursor offset. */
  private grow(by: number): void {
    const offset = this.dptr;
    const next = allocate(this.dsize + by);
    this.data.copy(next, 0, 0, Math.min(this.data.length, next.length));
    this.data = next;
    this.dsize += by;
    this.seek(offset);
  }
}

function allocate(size: number): Buffer {
  try {
    return Buffer.alloc(size);
  } catch (err) {
    throw new BufferAllocationError(size, err);
  }
}
