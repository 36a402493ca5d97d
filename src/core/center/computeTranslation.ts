import type {
  AxisClaim,
  AxisIndex,
  AxisLabel,
  CenterRequest,
  CenteringStatus,
  CenteringWarning,
  ReferencePair,
  TranslationResult,
  Vec3
} from "../types.js";
import { WarningCode } from "../types.js";
import { EPS_CENTERED } from "../constants.js";
import { norm } from "../math/vec.js";
import { noopTracer, type AxisSource, type TraceContext } from "../trace.js";
import { axisLabel, resolveAxis } from "./axis.js";

export interface ComputeTranslationOptions {
  tracer?: TraceContext;
}

/**
 * Midpoint of the two positions along one axis.
 */
export function computeCenter(pos1: Vec3, pos2: Vec3, axisIndex: AxisIndex): number {
  return (pos1[axisIndex] + pos2[axisIndex]) / 2;
}

function axisSource(pair: ReferencePair): AxisSource {
  if (pair.axis !== undefined) return "forced";
  const [r1, r2] = pair.refs;
  return r1?.normal || r2?.normal ? "normal" : "position";
}

function pairAxis(pair: ReferencePair): AxisIndex | undefined {
  const [r1, r2] = pair.refs;
  if (!r1 || !r2) return undefined;
  if (pair.axis !== undefined) return pair.axis;
  return resolveAxis(r1.normal, r2.normal, r1.position_mm, r2.position_mm);
}

export function computeTranslation(
  request: CenterRequest,
  options: ComputeTranslationOptions = {}
): TranslationResult {
  const tracer = options.tracer ?? noopTracer;
  const epsilon = request.epsilon_mm ?? EPS_CENTERED;

  const translation_mm: Vec3 = [0, 0, 0];
  const claimed = new Set<AxisIndex>();
  const axes: AxisLabel[] = [];
  const claims: AxisClaim[] = [];
  const warnings: CenteringWarning[] = [];

  const skip = (warning: CenteringWarning) => {
    warnings.push(warning);
    tracer.onPairSkipped?.(warning);
  };

  request.pairs.forEach((pair, i) => {
    if (!pair.enabled) return;
    const pairIndex = i + 1;
    tracer.onPairStart?.(pairIndex);

    const [r1, r2] = pair.refs;
    const axis = pairAxis(pair);
    if (!r1 || !r2 || axis === undefined) {
      skip({
        code: WarningCode.INDETERMINATE_AXIS,
        pair_index: pairIndex,
        message: `Could not compute center from Reference Pair ${pairIndex}.`
      });
      return;
    }

    const label = axisLabel(axis);
    tracer.onAxisResolved?.(pairIndex, label, axisSource(pair));

    if (claimed.has(axis)) {
      skip({
        code: WarningCode.DUPLICATE_AXIS,
        pair_index: pairIndex,
        axis: label,
        message: `Reference Pair ${pairIndex} detected same axis (${label}) as another pair. Skipping.`
      });
      return;
    }

    const center_mm = computeCenter(r1.position_mm, r2.position_mm, axis);
    const delta_mm = (center_mm - request.target_center_mm[axis]) + pair.offset_mm;

    translation_mm[axis] = delta_mm;
    claimed.add(axis);
    axes.push(label);

    const claim: AxisClaim = { pair_index: pairIndex, axis: label, center_mm, delta_mm };
    claims.push(claim);
    tracer.onAxisClaimed?.(claim);
  });

  let status: CenteringStatus;
  if (claims.length === 0) {
    status = "no_valid_pairs";
    skip({
      code: WarningCode.NO_VALID_PAIRS,
      message: "No reference pair produced a usable axis."
    });
  } else if (norm(translation_mm) <= epsilon) {
    // Informational only; the status carries it. Claims keep the raw deltas.
    status = "already_centered";
    translation_mm.fill(0);
  } else {
    status = "moved";
  }

  tracer.onComplete?.(status, translation_mm, axes);

  return { translation_mm, axes, claims, warnings, status };
}
