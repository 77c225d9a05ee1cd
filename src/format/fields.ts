/**
 * Field callbacks backed by a table of values.
 *
 * Most hosts map each directive character to one piece of data. This module
 * builds the FormatCallback for that case:
 *
 * ```typescript
 * const callback = createFieldCallback<Message>({
 *   s: (msg) => msg.subject,
 *   c: (msg) => ({ size: msg.bytes }),
 *   F: (msg) => msg.flagged,
 * });
 * renderFormat("%<F?!& > %-30.30s %c", 81, 0, 80, callback, message);
 * ```
 *
 * A conditional `%<X?IF&ELSE>` renders IF when X is present and ELSE
 * otherwise; absent means undefined, null, false, "" or 0.
 */

import { renderFormat, type FormatCallback } from "./renderer.js";
import { formatField } from "./justify.js";
import { prettySize } from "./size.js";

/** A size in bytes, rendered like `4.2K`. */
export interface SizeValue {
  size: number;
}

export type FieldValue = string | number | boolean | null | undefined | SizeValue;

export type FieldSource<T> = FieldValue | ((data: T) => FieldValue);

export type FieldMap<T> = Readonly<Record<string, FieldSource<T>>>;

export function isPresent(value: FieldValue): boolean {
  if (value === undefined || value === null || value === false) return false;
  if (typeof value === "string") return value !== "";
  if (typeof value === "number") return value !== 0;
  if (typeof value === "object") return value.size !== 0;
  return true;
}

/** Text of a value before its directive prefix is applied. */
export function fieldText(value: FieldValue): string {
  if (value === undefined || value === null || typeof value === "boolean") return "";
  if (typeof value === "object") return prettySize(value.size);
  return String(value);
}

export function createFieldCallback<T>(fields: FieldMap<T>): FormatCallback<T> {
  const callback: FormatCallback<T> = (request) => {
    const source = fields[request.op];
    const value = typeof source === "function" ? source(request.data) : source;

    if (request.options.optional) {
      const branch = isPresent(value) ? request.ifBranch : request.elseBranch;
      return {
        text: renderFormat(
          branch,
          request.capacity,
          request.column,
          request.columns,
          callback,
          request.data,
          request.options
        ),
      };
    }

    return {
      text: formatField(request.prefix, fieldText(value), {
        ambiguousAsWide: request.options.ambiguousAsWide,
      }),
    };
  };
  return callback;
}
