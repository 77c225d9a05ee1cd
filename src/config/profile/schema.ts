/**
 * Render profile schema.
 *
 * A render profile bundles the screen geometry, renderer switches, named
 * formats and sample field values used to preview status lines outside the
 * host application. Every key is optional in the file; missing keys take
 * the values below; DEFAULT_RENDER_PROFILE in defaults.ts is the same
 * profile written out.
 */

import { z } from "zod";
import { DEFAULT_FORMATS } from "./defaults.js";

/**
 * Value of one directive character.
 * `{ "size": n }` renders as a human-readable byte count.
 */
export const FieldValueSchema = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.null(),
  z
    .object({
      size: z.number().int().min(0).describe("Byte count rendered like 4.2K"),
    })
    .strict(),
]);

export type ProfileFieldValue = z.infer<typeof FieldValueSchema>;

/**
 * Directive character → value. Keys must be exactly one character.
 */
export const FieldsSchema = z
  .record(z.string(), FieldValueSchema)
  .superRefine((fields, ctx) => {
    for (const key of Object.keys(fields)) {
      if ([...key].length !== 1) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `Field key must be a single character, got "${key}"`,
        });
      }
    }
  });

export type ProfileFields = z.infer<typeof FieldsSchema>;

export const RenderProfileSchema = z
  .object({
    /** Screen width in columns */
    columns: z
      .number()
      .int()
      .min(0)
      .default(80)
      .describe("Screen width the line is laid out for"),

    /** Output size in bytes, terminator included */
    capacity: z
      .number()
      .int()
      .min(1)
      .max(65536)
      .default(256)
      .describe("Largest rendered line in bytes, plus one for the terminator"),

    /** Starting column */
    column: z.number().int().min(0).default(0),

    arrowCursor: z
      .boolean()
      .default(false)
      .describe("Reserve three columns for a '-> ' cursor"),

    allowFilter: z
      .boolean()
      .default(true)
      .describe("Run formats ending in '|' as shell commands"),

    ambiguousAsWide: z.boolean().default(false),

    maxDepth: z
      .number()
      .int()
      .min(1)
      .max(64)
      .default(16)
      .describe("Deepest nesting of recursive renders"),

    /** Named format strings */
    formats: z
      .record(z.string().min(1), z.string())
      .default(DEFAULT_FORMATS),

    /** Sample values for directive characters */
    fields: FieldsSchema.default({}),
  })
  .strict();

/** Validated profile. */
export type RenderProfile = z.infer<typeof RenderProfileSchema>;

/** Profile as written in a file, before defaults are applied. */
export type RenderProfileInput = z.input<typeof RenderProfileSchema>;
