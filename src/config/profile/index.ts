/**
 * Render profile configuration.
 *
 * Usage:
 *   import { loadRenderProfileFile, DEFAULT_RENDER_PROFILE } from "./config/profile/index.js";
 *
 *   const profile = loadRenderProfileFile("config/render-profile.json");
 *   const template = profile.formats["status"];
 */

export type {
  RenderProfile,
  RenderProfileInput,
  ProfileFields,
  ProfileFieldValue,
} from "./schema.js";

export { RenderProfileSchema, FieldsSchema, FieldValueSchema } from "./schema.js";

export {
  loadRenderProfile,
  loadRenderProfileFile,
  validateRenderProfile,
  loadFields,
  loadFieldsFile,
  RenderProfileError,
  type ProfileValidationIssue,
} from "./loader.js";

export { DEFAULT_RENDER_PROFILE } from "./defaults.js";
