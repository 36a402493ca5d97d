/**
 * Lightweight tracing infrastructure for debugging centering runs.
 *
 * Usage:
 * ```typescript
 * import { createTracer, noopTracer } from "./trace.js";
 *
 * // For debugging:
 * const tracer = createTracer(console.log);
 *
 * // For production (no overhead):
 * const tracer = noopTracer;
 * ```
 */

import type { AxisClaim, AxisLabel, CenteringStatus, CenteringWarning, Vec3 } from "./types.js";

export type AxisSource = "forced" | "normal" | "position";

export interface TraceContext {
  /** Called when an enabled pair starts processing */
  onPairStart?(pairIndex: number): void;

  /** Called once the pair's axis is known */
  onAxisResolved?(pairIndex: number, axis: AxisLabel, source: AxisSource): void;

  /** Called when a pair commits to an axis */
  onAxisClaimed?(claim: AxisClaim): void;

  /** Called when a pair is excluded from the result */
  onPairSkipped?(warning: CenteringWarning): void;

  /** Called when the translation is final */
  onComplete?(status: CenteringStatus, translationMm: Vec3, axes: AxisLabel[]): void;
}

/**
 * Tracer used when none is supplied.
 */
export const noopTracer: TraceContext = {};

/**
 * Create a tracer that logs to a provided log function.
 */
export function createTracer(log: (message: string) => void): TraceContext {
  return {
    onPairStart(pairIndex) {
      log(`[TRACE] Processing reference pair ${pairIndex}`);
    },

    onAxisResolved(pairIndex, axis, source) {
      log(`[TRACE] pair ${pairIndex}: axis ${axis} from ${source}`);
    },

    onAxisClaimed(claim) {
      log(
        `[TRACE] pair ${claim.pair_index}: claimed ${claim.axis} - center=${claim.center_mm.toFixed(3)}mm, delta=${claim.delta_mm.toFixed(3)}mm`
      );
    },

    onPairSkipped(warning) {
      const pair = warning.pair_index === undefined ? "request" : `pair ${warning.pair_index}`;
      log(`[TRACE] ${pair}: ${warning.code} - ${warning.message}`);
    },

    onComplete(status, translationMm, axes) {
      const vec = `[${translationMm.map((x) => x.toFixed(3)).join(", ")}]`;
      log(`[TRACE] Complete: status=${status}, translation=${vec}mm, axes=[${axes.join(", ")}]`);
    }
  };
}

/**
 * Create a tracer that collects events into an array for later inspection.
 */
export interface TraceEvent {
  type: string;
  timestamp: number;
  data: Record<string, unknown>;
}

export function createCollectorTracer(): {
  tracer: TraceContext;
  getEvents: () => TraceEvent[];
  clear: () => void;
} {
  const events: TraceEvent[] = [];

  const addEvent = (type: string, data: Record<string, unknown>) => {
    events.push({ type, timestamp: Date.now(), data });
  };

  const tracer: TraceContext = {
    onPairStart(pairIndex) {
      addEvent("pair_start", { pairIndex });
    },

    onAxisResolved(pairIndex, axis, source) {
      addEvent("axis_resolved", { pairIndex, axis, source });
    },

    onAxisClaimed(claim) {
      addEvent("axis_claimed", { ...claim });
    },

    onPairSkipped(warning) {
      addEvent("pair_skipped", { ...warning });
    },

    onComplete(status, translationMm, axes) {
      addEvent("complete", { status, translationMm, axes });
    }
  };

  return {
    tracer,
    getEvents: () => [...events],
    clear: () => {
      events.length = 0;
    }
  };
}

/**
 * Merge multiple tracers into one. Each event triggers all tracers.
 */
export function mergeTracers(...tracers: TraceContext[]): TraceContext {
  return {
    onPairStart(pairIndex) {
      for (const t of tracers) t.onPairStart?.(pairIndex);
    },
    onAxisResolved(pairIndex, axis, source) {
      for (const t of tracers) t.onAxisResolved?.(pairIndex, axis, source);
    },
    onAxisClaimed(claim) {
      for (const t of tracers) t.onAxisClaimed?.(claim);
    },
    onPairSkipped(warning) {
      for (const t of tracers) t.onPairSkipped?.(warning);
    },
    onComplete(status, translationMm, axes) {
      for (const t of tracers) t.onComplete?.(status, translationMm, axes);
    }
  };
}
