import type { AxisLabel } from "../types.js";
import { FEATURE_NAME_BASE } from "../constants.js";

// "Center Body (X+Y)", or the bare base name when nothing was claimed.
export function formatFeatureName(axes: readonly AxisLabel[], base = FEATURE_NAME_BASE): string {
  if (axes.length === 0) return base;
  return `${base} (${axes.join("+")})`;
}
