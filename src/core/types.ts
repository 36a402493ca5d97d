export type Vec3 = [number, number, number];
export type Quat = [number, number, number, number]; // [x,y,z,w]

export type AxisIndex = 0 | 1 | 2;
export type AxisLabel = "X" | "Y" | "Z";

export interface Transform {
  translation_mm: Vec3;
  rotation_quat_xyzw: Quat;
}

export interface BoundingBox {
  min_mm: Vec3;
  max_mm: Vec3;
}

/**
 * A reference entity after the caller has resolved it against the host
 * document. `normal` is only present for planar references.
 */
export interface ResolvedReference {
  position_mm: Vec3;
  normal?: Vec3;
}

// ---------------------------------------------------------------------------
// Reference entities as the host hands them over, tagged by capability.
// ---------------------------------------------------------------------------

export interface PlanarFaceEntity {
  kind: "planar_face";
  origin_mm: Vec3;
  normal: Vec3;
}

export interface FaceEntity {
  kind: "face";
  bounding_box?: BoundingBox;
}

export interface ConstructionPlaneEntity {
  kind: "construction_plane";
  origin_mm: Vec3;
  normal: Vec3;
}

export interface EdgeEntity {
  kind: "edge";
  start_mm?: Vec3;
  end_mm?: Vec3;
}

export interface SketchLineEntity {
  kind: "sketch_line";
  start_mm: Vec3;
  end_mm: Vec3;
  sketch_transform: Transform;
}

export interface ConstructionAxisEntity {
  kind: "construction_axis";
  origin_mm: Vec3;
  direction: Vec3;
}

export interface ConstructionPointEntity {
  kind: "construction_point";
  point_mm: Vec3;
}

export interface SketchPointEntity {
  kind: "sketch_point";
  point_mm: Vec3;
  sketch_transform: Transform;
}

export type ReferenceEntity =
  | PlanarFaceEntity
  | FaceEntity
  | ConstructionPlaneEntity
  | EdgeEntity
  | SketchLineEntity
  | ConstructionAxisEntity
  | ConstructionPointEntity
  | SketchPointEntity;

export type ReferenceKind = ReferenceEntity["kind"];

// ---------------------------------------------------------------------------
// Engine request / result
// ---------------------------------------------------------------------------

export interface ReferencePair {
  refs: [ResolvedReference | undefined, ResolvedReference | undefined];
  enabled: boolean;
  offset_mm: number;
  /** Forces the axis instead of detecting it from the references. */
  axis?: AxisIndex;
}

export interface CenterRequest {
  target_center_mm: Vec3;
  pairs: ReferencePair[];
  epsilon_mm?: number;
}

export type CenteringStatus = "moved" | "already_centered" | "no_valid_pairs";

/**
 * Well-known warning codes attached to a TranslationResult.
 */
export const WarningCode = {
  INDETERMINATE_AXIS: "indeterminate_axis",
  DUPLICATE_AXIS: "duplicate_axis",
  NO_VALID_PAIRS: "no_valid_pairs",
} as const;

export type WarningCodeType = typeof WarningCode[keyof typeof WarningCode];

export interface CenteringWarning {
  code: WarningCodeType;
  /** 1-based, in request order */
  pair_index?: number;
  axis?: AxisLabel;
  message: string;
}

export interface AxisClaim {
  pair_index: number;
  axis: AxisLabel;
  center_mm: number;
  delta_mm: number;
}

export interface TranslationResult {
  translation_mm: Vec3;
  axes: AxisLabel[];
  claims: AxisClaim[];
  warnings: CenteringWarning[];
  status: CenteringStatus;
}

// ---------------------------------------------------------------------------
// Targets
// ---------------------------------------------------------------------------

export type CenterMethod = "bounding_box" | "center_of_mass";

export interface BodyTarget {
  kind: "body";
  name?: string;
  bounding_box?: BoundingBox;
  center_of_mass_mm?: Vec3;
}

export interface OccurrenceTarget {
  kind: "occurrence";
  name?: string;
  bounding_box?: BoundingBox;
  transform: Transform;
}

export type CenterTarget = BodyTarget | OccurrenceTarget;

export const NoticeCode = {
  CENTER_OF_MASS_UNAVAILABLE: "center_of_mass_unavailable",
  CENTER_OF_MASS_UNSUPPORTED: "center_of_mass_unsupported",
  TARGET_CENTER_UNAVAILABLE: "target_center_unavailable",
} as const;

export type NoticeCodeType = typeof NoticeCode[keyof typeof NoticeCode];

export type NoticeLevel = "info" | "warning" | "error";

export interface Notice {
  code: NoticeCodeType;
  level: NoticeLevel;
  message: string;
}

// ---------------------------------------------------------------------------
// Move plans
// ---------------------------------------------------------------------------

export interface MoveFeaturePlan {
  kind: "move_feature";
  feature_name: string;
  translation_mm: Vec3;
}

export interface OccurrenceTransformPlan {
  kind: "occurrence_transform";
  feature_name: string;
  translation_mm: Vec3;
  transform: Transform;
}

export type MovePlan = MoveFeaturePlan | OccurrenceTransformPlan;

// ---------------------------------------------------------------------------
// Jobs (JSON input for the pipeline and CLI)
// ---------------------------------------------------------------------------

export interface CenterJobPair {
  enabled?: boolean;
  offset_mm?: number;
  /** Forces the pair onto this axis. */
  axis?: AxisLabel;
  refs: ReferenceEntity[];
}

export interface CenterJob {
  schema_version: "v0.1";
  job_id: string;
  target: CenterTarget;
  center_method?: CenterMethod;
  epsilon_mm?: number;
  pairs: CenterJobPair[];
}
