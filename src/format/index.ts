/**
 * Expando format rendering.
 *
 * ```typescript
 * import { renderFormat, createFieldCallback } from "./format/index.js";
 *
 * const callback = createFieldCallback({ s: "subject", n: 3 });
 * renderFormat("%s%<n? (%n new)>", 64, 0, 80, callback, undefined);
 * // → "subject (3 new)"
 * ```
 *
 * See renderer.ts for the processing rules and directive.ts for the
 * directive grammar.
 */

// Rendering
export {
  renderFormat,
  isFormatPipe,
  ARROW_CURSOR_WIDTH,
  type FormatOptions,
  type FormatCallback,
  type FieldRequest,
  type FieldResult,
} from "./renderer.js";

// Directive parsing
export {
  parseDirective,
  normalizeLegacyConditional,
  MAX_PREFIX_LENGTH,
  type Directive,
  type DirectiveParse,
} from "./directive.js";

// Format pipes
export {
  createShellFilterBridge,
  shellQuote,
  FilterSpawnError,
  FilterReadError,
  type FilterBridge,
  type FilterHandle,
  type ShellFilterOptions,
} from "./filter.js";
export {
  extractToken,
  moreArgs,
  skipWhitespace,
  tokenize,
  type TokenEnvironment,
} from "./tokenizer.js";

// Field callbacks
export {
  createFieldCallback,
  fieldText,
  isPresent,
  type FieldMap,
  type FieldSource,
  type FieldValue,
  type SizeValue,
} from "./fields.js";
export { formatField, parseFieldPrefix, type FieldFormat, type Justify } from "./justify.js";
export { prettySize } from "./size.js";
