/**
 * Default render profile: an 80-column screen, a 256-byte line, filters
 * on, and a few formats of the kind a mail index or status bar uses.
 */

import type { RenderProfile } from "./schema.js";

export const DEFAULT_FORMATS: Readonly<Record<string, string>> = {
  index: "%4C %<F?!& >%<N?N& > %-15.15L %s%*  %c",
  status: "-%r-%f [Msgs:%m%<n? New:%n>%<d? Del:%d>]---(%s/%S)-%>-(%P)---",
  compose: "-- Compose  [Approx. msg size: %l   Atts: %a]%>-",
};

export const DEFAULT_RENDER_PROFILE: RenderProfile = {
  columns: 80,
  capacity: 256,
  column: 0,
  arrowCursor: false,
  allowFilter: true,
  ambiguousAsWide: false,
  maxDepth: 16,
  formats: { ...DEFAULT_FORMATS },
  fields: {},
};
