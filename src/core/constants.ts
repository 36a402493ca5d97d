/**
 * Centralized numerical constants for the centering engine.
 */

import type { AxisLabel } from "./types.js";

/**
 * A translation shorter than this is treated as "already centered".
 */
export const EPS_CENTERED = 1e-4;

/**
 * Components at or below this magnitude count as zero when picking a
 * dominant axis. Guards against coincident positions and zero normals.
 */
export const EPS_AXIS = 1e-12;

/**
 * Number of reference pairs the Center Body dialog offers.
 */
export const MAX_REFERENCE_PAIRS = 3;

export const AXIS_LABELS: readonly AxisLabel[] = ["X", "Y", "Z"];

export const FEATURE_NAME_BASE = "Center Body";
