/**
 * Render profile loader and validator.
 *
 * Responsible for:
 * - Reading profile and field files from disk
 * - Validating against the schema with fail-fast behavior
 * - Producing structured error messages
 * - Freezing the result
 */

import { readFileSync } from "node:fs";
import { ZodIssue } from "zod";
import {
  FieldsSchema,
  RenderProfileSchema,
  type ProfileFields,
  type RenderProfile,
} from "./schema.js";

/**
 * Structured validation error for render profiles and field files.
 */
export class RenderProfileError extends Error {
  public readonly issues: ProfileValidationIssue[];

  constructor(
    message: string,
    issues: ProfileValidationIssue[],
    public readonly source?: string
  ) {
    super(message);
    this.name = "RenderProfileError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const header = this.source
      ? `Render profile validation failed (${this.source}):`
      : "Render profile validation failed:";
    const lines = [header];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

export interface ProfileValidationIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code, or "invalid_json" / "unreadable_file" */
  code: string;
}

function formatZodIssues(zodIssues: ZodIssue[]): ProfileValidationIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const value of Object.values(obj)) {
    if (value && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

/**
 * Validate a render profile, fill in defaults and freeze it.
 *
 * @throws RenderProfileError if validation fails
 */
export function loadRenderProfile(input: unknown, source?: string): Readonly<RenderProfile> {
  const result = RenderProfileSchema.safeParse(input);

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new RenderProfileError(
      `Invalid render profile: ${issues.length} validation error(s)`,
      issues,
      source
    );
  }

  return deepFreeze(result.data);
}

/**
 * Validate a render profile without throwing.
 */
export function validateRenderProfile(input: unknown): {
  success: boolean;
  profile?: RenderProfile;
  errors?: ProfileValidationIssue[];
} {
  const result = RenderProfileSchema.safeParse(input);

  if (result.success) {
    return { success: true, profile: result.data };
  }

  return {
    success: false,
    errors: formatZodIssues(result.error.issues),
  };
}

/**
 * Validate a field table (directive character → value).
 *
 * @throws RenderProfileError if validation fails
 */
export function loadFields(input: unknown, source?: string): Readonly<ProfileFields> {
  const result = FieldsSchema.safeParse(input);

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new RenderProfileError(
      `Invalid field table: ${issues.length} validation error(s)`,
      issues,
      source
    );
  }

  return deepFreeze(result.data);
}

function readJsonFile(path: string): unknown {
  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (err) {
    throw new RenderProfileError(
      `Cannot read ${path}`,
      [{ path: [], message: err instanceof Error ? err.message : String(err), code: "unreadable_file" }],
      path
    );
  }
  try {
    const data: unknown = JSON.parse(text);
    return data;
  } catch (err) {
    throw new RenderProfileError(
      `Invalid JSON in ${path}`,
      [{ path: [], message: err instanceof Error ? err.message : String(err), code: "invalid_json" }],
      path
    );
  }
}

/** Read and validate a render profile JSON file. */
export function loadRenderProfileFile(path: string): Readonly<RenderProfile> {
  return loadRenderProfile(readJsonFile(path), path);
}

/** Read and validate a field table JSON file. */
export function loadFieldsFile(path: string): Readonly<ProfileFields> {
  return loadFields(readJsonFile(path), path);
}
