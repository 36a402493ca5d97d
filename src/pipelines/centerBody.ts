/**
 * End-to-end pipeline: Center Job → Target Center → Reference Pairs → Translation → Move Plan
 *
 * This pipeline:
 * 1. Computes the target's current center (bounding box or center of mass)
 * 2. Resolves each pair's reference entities to positions and normals
 * 3. Runs the axis-centering engine
 * 4. Plans the host move (move feature or occurrence transform)
 */

import type {
  CenterJob,
  CenterMethod,
  CenterRequest,
  MovePlan,
  Notice,
  ReferencePair,
  TranslationResult,
  Vec3
} from "../core/types.js";
import type { TraceContext } from "../core/trace.js";

import { computeTargetCenter } from "../core/resolve/target.js";
import { resolvePair } from "../core/resolve/references.js";
import { axisFromLabel } from "../core/center/axis.js";
import { computeTranslation } from "../core/center/computeTranslation.js";
import { formatFeatureName } from "../core/center/featureName.js";
import { planMove } from "../core/move/planMove.js";
import { roundVec } from "../core/math/vec.js";
import { EPS_CENTERED } from "../core/constants.js";

// ============================================================================
// Types
// ============================================================================

export interface PipelineConfig {
  /** How the target's current center is measured */
  center_method: CenterMethod;
  /** Translations shorter than this count as already centered */
  epsilon_mm: number;
  /** Decimal places kept in the summary translation */
  summary_decimals: number;
}

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  center_method: "bounding_box",
  epsilon_mm: EPS_CENTERED,
  summary_decimals: 6,
};

export interface PipelineOptions {
  tracer?: TraceContext;
}

export interface PipelineResult {
  job_id: string;
  target_center_mm?: Vec3;
  center_method: CenterMethod;
  notices: Notice[];
  result?: TranslationResult;
  feature_name: string;
  move?: MovePlan;
  summary: {
    status: TranslationResult["status"] | "target_center_unavailable";
    translation_mm: Vec3;
    axes: string;
    pairs_enabled: number;
    pairs_claimed: number;
    pairs_skipped: number;
  };
}

// ============================================================================
// Steps
// ============================================================================

export function buildPairs(job: CenterJob): ReferencePair[] {
  return job.pairs.map((pair) =>
    resolvePair(pair.refs, {
      enabled: pair.enabled ?? true,
      offset_mm: pair.offset_mm ?? 0,
      axis: pair.axis === undefined ? undefined : axisFromLabel(pair.axis),
    })
  );
}

export function buildRequest(job: CenterJob, target_center_mm: Vec3, epsilon_mm: number): CenterRequest {
  return {
    target_center_mm,
    pairs: buildPairs(job),
    epsilon_mm,
  };
}

// ============================================================================
// Main Pipeline
// ============================================================================

export function runCenterBodyPipeline(
  job: CenterJob,
  config: PipelineConfig = DEFAULT_PIPELINE_CONFIG,
  options: PipelineOptions = {}
): PipelineResult {
  // Job-level settings win over the config defaults.
  const method = job.center_method ?? config.center_method;
  const epsilon = job.epsilon_mm ?? config.epsilon_mm;
  const pairsEnabled = job.pairs.filter((p) => p.enabled ?? true).length;

  const target = computeTargetCenter(job.target, method);
  if (!target.center_mm) {
    return {
      job_id: job.job_id,
      center_method: target.method,
      notices: target.notices,
      feature_name: formatFeatureName([]),
      summary: {
        status: "target_center_unavailable",
        translation_mm: [0, 0, 0],
        axes: "",
        pairs_enabled: pairsEnabled,
        pairs_claimed: 0,
        pairs_skipped: 0,
      },
    };
  }

  const request = buildRequest(job, target.center_mm, epsilon);
  const result = computeTranslation(request, { tracer: options.tracer });
  const move = planMove(job.target, result);

  return {
    job_id: job.job_id,
    target_center_mm: target.center_mm,
    center_method: target.method,
    notices: target.notices,
    result,
    feature_name: formatFeatureName(result.axes),
    move,
    summary: {
      status: result.status,
      translation_mm: roundVec(result.translation_mm, config.summary_decimals),
      axes: result.axes.join("+"),
      pairs_enabled: pairsEnabled,
      pairs_claimed: result.claims.length,
      pairs_skipped: pairsEnabled - result.claims.length,
    },
  };
}
