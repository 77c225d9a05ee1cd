/**
 * Directive parsing.
 *
 * A directive starts at `%`. The forms are:
 *
 *   %%                        literal percent sign
 *   %[prefix][_:]X            expand X, with an optional printf-like prefix
 *                             made of digits, `.`, `-` and `=`
 *   %<[_:]X[prefix]?IF&ELSE>  conditional: IF when X is set, else ELSE
 *   %<X?IF>                   conditional without an else branch
 *   %?X?IF&ELSE?              legacy spelling of the conditional
 *   %>C  %*C  %|C             padding with fill character C
 *
 * `_` lower-cases the expansion, `:` turns its dots into underscores.
 *
 * Branches nest: a `%<` inside a branch must be closed by its own `>` before
 * the outer branch can end. A backslash copies the next character without
 * interpreting it, and `%>` inside a branch is a padding directive, not the
 * end of the branch.
 *
 * Nothing here mutates its input. The legacy spelling is rewritten on a
 * fresh string that the caller scans instead.
 */

/** Maximum length of a directive prefix. */
export const MAX_PREFIX_LENGTH = 128;

const PREFIX_CHAR_RE = /[0-9.\-=]/;

/** A parsed `%` directive. */
export interface Directive {
  /** Directive character selecting the expansion. */
  op: string;
  /** Width/precision/justification prefix, e.g. `-10.5`. */
  prefix: string;
  /** True for `%<…>` conditionals. */
  optional: boolean;
  /** Text rendered when a conditional is true. */
  ifBranch: string;
  /** Text rendered when a conditional is false. */
  elseBranch: string;
  /** `_` modifier. */
  lowercase: boolean;
  /** `:` modifier. */
  stripDots: boolean;
}

export type DirectiveParse =
  | { kind: "directive"; directive: Directive; next: number }
  | { kind: "malformed"; at: number; reason: string };

/**
 * Rewrite a legacy `%?X?IF&ELSE?` conditional starting at `at` (the index
 * of the `?` after `%`) into `%<X?IF&ELSE>`.
 *
 * The `?` at `at` becomes `<`, the separator `?` is kept, and the `?` after
 * it becomes `>`. A conditional with no closing `?` keeps its other
 * characters unchanged.
 */
export function normalizeLegacyConditional(template: string, at: number): string {
  if (template.charAt(at) !== "?") return template;

  const chars = template.split("");
  chars[at] = "<";

  let p = at + 1;
  while (p < chars.length && chars[p] !== "?") p++;
  if (p < chars.length) p++;
  while (p < chars.length && chars[p] !== "?") p++;
  if (p < chars.length) chars[p] = ">";

  return chars.join("");
}

interface BranchScan {
  text: string;
  next: number;
  depth: number;
}

/**
 * Copy a branch starting at `from`, stopping when `depth` drops to zero on
 * `>` or, at depth one, on `&`. The terminator is not consumed.
 */
function scanBranch(template: string, from: number, depth: number): BranchScan {
  let text = "";
  let i = from;

  while (depth > 0 && i < template.length) {
    const ch = template.charAt(i);
    const next = template.charAt(i + 1);

    if (ch === "%" && next === ">") {
      text += "%>";
      i += 2;
      continue;
    }

    if (ch === "\\") {
      if (i + 1 < template.length) {
        text += next;
        i += 2;
      } else {
        i++;
      }
      continue;
    }

    if (ch === "%" && next === "<") {
      depth++;
    } else if (ch === ">") {
      depth--;
    }
    if (depth === 0) break;
    if (depth === 1 && ch === "&") break;

    text += ch;
    i++;
  }

  return { text, next: i, depth };
}

function readModifiers(template: string, from: number): { lowercase: boolean; stripDots: boolean; next: number } {
  let lowercase = false;
  let stripDots = false;
  let i = from;
  for (;;) {
    const ch = template.charAt(i);
    if (ch === "_") lowercase = true;
    else if (ch === ":") stripDots = true;
    else break;
    i++;
  }
  return { lowercase, stripDots, next: i };
}

function readOp(template: string, at: number): string {
  const cp = template.codePointAt(at);
  return cp === undefined ? "" : String.fromCodePoint(cp);
}

/**
 * Parse the directive whose `%` sits just before `at`.
 *
 * `%%` is not handled here, and a legacy `%?` must be normalised first.
 */
export function parseDirective(template: string, at: number): DirectiveParse {
  let i = at;
  let prefix = "";
  let op: string;
  let optional = false;
  let modifiers: ReturnType<typeof readModifiers>;

  if (template.charAt(i) === "<") {
    optional = true;
    modifiers = readModifiers(template, i + 1);
    i = modifiers.next;
    op = readOp(template, i);
    if (op === "") {
      return { kind: "malformed", at: i, reason: "missing directive character" };
    }
    i += op.length;
    while (i < template.length && prefix.length < MAX_PREFIX_LENGTH && template.charAt(i) !== "?") {
      prefix += template.charAt(i);
      i++;
    }
  } else {
    while (i < template.length && prefix.length < MAX_PREFIX_LENGTH && PREFIX_CHAR_RE.test(template.charAt(i))) {
      prefix += template.charAt(i);
      i++;
    }
    modifiers = readModifiers(template, i);
    i = modifiers.next;
    op = readOp(template, i);
    if (op === "") {
      return { kind: "malformed", at: i, reason: "missing directive character" };
    }
    i += op.length;
  }

  const directive: Directive = {
    op,
    prefix,
    optional,
    ifBranch: "",
    elseBranch: "",
    lowercase: modifiers.lowercase,
    stripDots: modifiers.stripDots,
  };

  if (!optional) {
    return { kind: "directive", directive, next: i };
  }

  if (template.charAt(i) !== "?") {
    return { kind: "malformed", at: i, reason: "conditional without '?'" };
  }
  i++;

  const ifScan = scanBranch(template, i, 1);
  directive.ifBranch = ifScan.text;
  i = ifScan.next;
  let depth = ifScan.depth;

  if (template.charAt(i) === "&") {
    i++;
  }
  if (depth > 0) {
    const elseScan = scanBranch(template, i, depth);
    directive.elseBranch = elseScan.text;
    i = elseScan.next;
    depth = elseScan.depth;
  }

  if (i >= template.length) {
    return { kind: "malformed", at: i, reason: "unterminated conditional" };
  }

  // past the closing '>'
  return { kind: "directive", directive, next: i + 1 };
}
