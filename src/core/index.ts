export { computeCenter, computeTranslation, resolveAxis } from "./center/index.js";
export { axisFromLabel, axisLabel, dominantAxis, formatFeatureName } from "./center/index.js";
export { boundingBoxCenter, resolvePair, resolveReference } from "./resolve/references.js";
export { computeTargetCenter } from "./resolve/target.js";
export { planMove } from "./move/planMove.js";
export {
  applyTransformToLine,
  applyTransformToPoint,
  composeTransforms,
  rotateVec3ByQuat,
  translationTransform
} from "./align/apply.js";
export { validateCenterJob } from "./validate.js";
export { CenteringEngineError, CommandSessionError, HostOperationError, ValidationError } from "./errors.js";
export { EPS_CENTERED, MAX_REFERENCE_PAIRS } from "./constants.js";
export { createCollectorTracer, createTracer, mergeTracers, noopTracer } from "./trace.js";
export { NoticeCode, WarningCode } from "./types.js";
export type {
  AxisClaim,
  AxisIndex,
  AxisLabel,
  BodyTarget,
  BoundingBox,
  CenterJob,
  CenterJobPair,
  CenterMethod,
  CenterRequest,
  CenterTarget,
  CenteringStatus,
  CenteringWarning,
  MovePlan,
  Notice,
  NoticeLevel,
  OccurrenceTarget,
  Quat,
  ReferenceEntity,
  ReferenceKind,
  ReferencePair,
  ResolvedReference,
  Transform,
  TranslationResult,
  Vec3,
  WarningCodeType
} from "./types.js";
export type { ComputeTranslationOptions } from "./center/index.js";
export type { ResolvePairOptions } from "./resolve/references.js";
export type { TargetCenterResult } from "./resolve/target.js";
export type { AxisSource, TraceContext, TraceEvent } from "./trace.js";
export type { Line3 } from "./align/apply.js";
