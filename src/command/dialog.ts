import type { AxisLabel, CenterJob, CenterMethod, CenterTarget, ReferenceEntity } from "../core/types.js";
import { MAX_REFERENCE_PAIRS } from "../core/constants.js";

export interface DialogPair {
  enabled: boolean;
  selections: ReferenceEntity[];
  offset_mm: number;
  axis?: AxisLabel;
}

/**
 * Snapshot of the Center Body dialog's inputs at one event.
 */
export interface DialogState {
  target?: CenterTarget;
  center_method: CenterMethod;
  pairs: DialogPair[];
}

export function createDefaultDialogState(): DialogState {
  const pairs: DialogPair[] = [];
  for (let i = 0; i < MAX_REFERENCE_PAIRS; i++) {
    // Pair 3 starts switched off.
    pairs.push({ enabled: i < 2, selections: [], offset_mm: 0 });
  }
  return { center_method: "bounding_box", pairs };
}

/**
 * Whether OK may be pressed: a target is selected, no enabled pair is half
 * filled, and at least one enabled pair holds two references.
 */
export function validateDialogInputs(state: DialogState): boolean {
  if (!state.target) return false;

  let hasValidPair = false;
  for (const pair of state.pairs) {
    if (!pair.enabled) continue;
    const count = pair.selections.length;
    if (count === 2) {
      hasValidPair = true;
    } else if (count > 0 && count < 2) {
      return false;
    }
  }
  return hasValidPair;
}

/**
 * 1-based indices of the pairs whose reference and offset inputs are shown.
 */
export function visiblePairInputs(state: DialogState): number[] {
  const visible: number[] = [];
  state.pairs.forEach((pair, i) => {
    if (pair.enabled) visible.push(i + 1);
  });
  return visible;
}

/**
 * Convert a dialog snapshot into a pipeline job. Pairs without two
 * selections are switched off, the same way the dialog ignores them.
 */
export function dialogStateToJob(state: DialogState, target: CenterTarget, jobId: string): CenterJob {
  return {
    schema_version: "v0.1",
    job_id: jobId,
    target,
    center_method: state.center_method,
    pairs: state.pairs.map((pair) => ({
      enabled: pair.enabled && pair.selections.length >= 2,
      offset_mm: pair.offset_mm,
      axis: pair.axis,
      refs: pair.selections.slice(0, 2),
    })),
  };
}
