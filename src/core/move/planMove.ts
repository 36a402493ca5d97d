import type { CenterTarget, MovePlan, TranslationResult, Vec3 } from "../types.js";
import { composeTransforms, translationTransform } from "../align/apply.js";
import { formatFeatureName } from "../center/featureName.js";

/**
 * Turn a translation into the host operation that applies it. Returns
 * undefined when there is nothing to move.
 */
export function planMove(target: CenterTarget, result: TranslationResult): MovePlan | undefined {
  if (result.status !== "moved") return undefined;

  const feature_name = formatFeatureName(result.axes);
  const translation_mm: Vec3 = [...result.translation_mm];

  if (target.kind === "body") {
    return { kind: "move_feature", feature_name, translation_mm };
  }

  return {
    kind: "occurrence_transform",
    feature_name,
    translation_mm,
    transform: composeTransforms(target.transform, translationTransform(translation_mm))
  };
}
