/**
 * Expando format rendering library.
 *
 * ```typescript
 * import { renderFormat, createFieldCallback } from "expando-format";
 *
 * const callback = createFieldCallback({ s: "subject" });
 * renderFormat("%s", 64, 0, 80, callback, undefined); // "subject"
 * ```
 */

export * from "./buffer/buffer.js";
export * from "./width/width.js";
export * from "./format/index.js";
export * from "./config/index.js";
export * from "./logging/index.js";
