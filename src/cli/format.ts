import type { CenteringStatus, CenteringWarning, MovePlan, Notice } from "../core/types.js";
import type { PipelineResult } from "../pipelines/centerBody.js";

export function toNumber(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  return undefined;
}

export function formatNumber(value: unknown, digits = 2): string {
  const numeric = toNumber(value);
  if (numeric === undefined) return "—";
  return numeric.toFixed(digits);
}

export function formatVec3(value: unknown, digits = 2): string {
  if (!Array.isArray(value) || value.length !== 3) return "—";
  return value.map((component) => formatNumber(component, digits)).join(", ");
}

export function formatStatusLabel(status: CenteringStatus | "target_center_unavailable"): string {
  switch (status) {
    case "moved":
      return "Moved";
    case "already_centered":
      return "Already centered";
    default:
      return status.replace(/_/g, " ");
  }
}

export function formatMoveSummary(move?: MovePlan): string {
  if (!move) return "No move";
  switch (move.kind) {
    case "move_feature":
      return `${move.feature_name}: move body by [${formatVec3(move.translation_mm, 3)}] mm`;
    case "occurrence_transform":
      return `${move.feature_name}: translate occurrence by [${formatVec3(move.translation_mm, 3)}] mm`;
  }
}

export function formatWarning(warning: CenteringWarning): string {
  const where = warning.pair_index === undefined ? "" : ` (pair ${warning.pair_index})`;
  return `warning ${warning.code}${where}: ${warning.message}`;
}

export function formatNotice(notice: Notice): string {
  return `${notice.level} ${notice.code}: ${notice.message}`;
}

export function formatPipelineReport(result: PipelineResult): string[] {
  const lines = [
    `Job ${result.job_id}: ${formatStatusLabel(result.summary.status)}`,
    `  Target center: [${formatVec3(result.target_center_mm, 3)}] mm (${result.center_method})`,
    `  Axes: ${result.summary.axes || "—"}`,
    `  ${formatMoveSummary(result.move)}`
  ];
  for (const notice of result.notices) lines.push(`  ${formatNotice(notice)}`);
  for (const warning of result.result?.warnings ?? []) lines.push(`  ${formatWarning(warning)}`);
  return lines;
}
