/**
 * printf-style justification of an expansion, measured in screen columns.
 *
 * A directive prefix reads `[-|=][0][min][.max]`:
 *
 *   %-20s    left-justify in 20 columns
 *   %=20s    centre in 20 columns
 *   %20s     right-justify in 20 columns
 *   %.8s     cut to 8 columns
 *   %05n     zero-fill a number to 5 columns
 *
 * `.` with no digits after it sets no maximum.
 */

import { stringWidth, truncateText, type WidthOptions } from "../width/width.js";

export type Justify = "left" | "right" | "center";

export interface FieldFormat {
  justify: Justify;
  zeroFill: boolean;
  minWidth: number;
  maxWidth: number;
}

const PREFIX_RE = /^([-=]?)(0?)(\d*)(?:\.(\d*))?/;

export function parseFieldPrefix(prefix: string): FieldFormat {
  const match = PREFIX_RE.exec(prefix);
  const flag = match?.[1] ?? "";
  const zero = match?.[2] ?? "";
  const min = match?.[3] ?? "";
  const max = match?.[4];

  return {
    justify: flag === "-" ? "left" : flag === "=" ? "center" : "right",
    zeroFill: zero === "0",
    minWidth: min === "" ? 0 : Number.parseInt(min, 10),
    maxWidth: max === undefined || max === "" ? Number.POSITIVE_INFINITY : Number.parseInt(max, 10),
  };
}

const INTEGER_RE = /^([-+]?)(\d+)$/;

/**
 * Apply a directive prefix to `text`.
 */
export function formatField(prefix: string, text: string, options: WidthOptions = {}): string {
  if (prefix === "") return text;

  const fmt = parseFieldPrefix(prefix);
  const value = Number.isFinite(fmt.maxWidth)
    ? truncateText(text, Number.POSITIVE_INFINITY, fmt.maxWidth, options)
    : text;

  const gap = fmt.minWidth - stringWidth(value, options);
  if (gap <= 0) return value;

  switch (fmt.justify) {
    case "left":
      return value + " ".repeat(gap);
    case "center": {
      const before = Math.floor(gap / 2);
      return " ".repeat(before) + value + " ".repeat(gap - before);
    }
    case "right": {
      const numeric = fmt.zeroFill ? INTEGER_RE.exec(value) : null;
      if (numeric) {
        return `${numeric[1] ?? ""}${"0".repeat(gap)}${numeric[2] ?? ""}`;
      }
      return " ".repeat(gap) + value;
    }
  }
}
