/**
 * Runtime validation for centering jobs read from JSON.
 * Provides lightweight validation without external dependencies.
 */

import type { CenterJob, Quat, Vec3 } from "./types.js";
import { ValidationError } from "./errors.js";
import { MAX_REFERENCE_PAIRS } from "./constants.js";

export { ValidationError };

const REFERENCE_KINDS = [
  "planar_face",
  "face",
  "construction_plane",
  "edge",
  "sketch_line",
  "construction_axis",
  "construction_point",
  "sketch_point"
];
const CENTER_METHODS = ["bounding_box", "center_of_mass"];
const AXIS_LABELS = ["X", "Y", "Z"];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isVec3(value: unknown): value is Vec3 {
  return (
    Array.isArray(value) &&
    value.length === 3 &&
    value.every((v) => typeof v === "number" && Number.isFinite(v))
  );
}

function isQuat(value: unknown): value is Quat {
  return (
    Array.isArray(value) &&
    value.length === 4 &&
    value.every((v) => typeof v === "number" && Number.isFinite(v))
  );
}

function checkTransform(value: unknown, prefix: string, errors: string[]): void {
  if (!isRecord(value)) {
    errors.push(`${prefix} must be an object`);
    return;
  }
  if (!isVec3(value.translation_mm)) {
    errors.push(`${prefix}.translation_mm must be a Vec3`);
  }
  if (!isQuat(value.rotation_quat_xyzw)) {
    errors.push(`${prefix}.rotation_quat_xyzw must be a Quat`);
  }
}

function checkBoundingBox(value: unknown, prefix: string, errors: string[]): void {
  if (value === undefined) return;
  if (!isRecord(value)) {
    errors.push(`${prefix} must be an object`);
    return;
  }
  if (!isVec3(value.min_mm)) errors.push(`${prefix}.min_mm must be a Vec3`);
  if (!isVec3(value.max_mm)) errors.push(`${prefix}.max_mm must be a Vec3`);
}

function checkOptionalVec3(value: unknown, label: string, errors: string[]): void {
  if (value !== undefined && !isVec3(value)) {
    errors.push(`${label} must be a Vec3`);
  }
}

function checkRequiredVec3(value: unknown, label: string, errors: string[]): void {
  if (!isVec3(value)) {
    errors.push(`${label} must be a Vec3`);
  }
}

function checkReference(value: unknown, prefix: string, errors: string[]): void {
  if (!isRecord(value)) {
    errors.push(`${prefix} must be an object`);
    return;
  }

  switch (value.kind) {
    case "planar_face":
    case "construction_plane":
      checkRequiredVec3(value.origin_mm, `${prefix}.origin_mm`, errors);
      checkRequiredVec3(value.normal, `${prefix}.normal`, errors);
      break;
    case "face":
      checkBoundingBox(value.bounding_box, `${prefix}.bounding_box`, errors);
      break;
    case "edge":
      checkOptionalVec3(value.start_mm, `${prefix}.start_mm`, errors);
      checkOptionalVec3(value.end_mm, `${prefix}.end_mm`, errors);
      break;
    case "sketch_line":
      checkRequiredVec3(value.start_mm, `${prefix}.start_mm`, errors);
      checkRequiredVec3(value.end_mm, `${prefix}.end_mm`, errors);
      checkTransform(value.sketch_transform, `${prefix}.sketch_transform`, errors);
      break;
    case "construction_axis":
      checkRequiredVec3(value.origin_mm, `${prefix}.origin_mm`, errors);
      checkRequiredVec3(value.direction, `${prefix}.direction`, errors);
      break;
    case "construction_point":
      checkRequiredVec3(value.point_mm, `${prefix}.point_mm`, errors);
      break;
    case "sketch_point":
      checkRequiredVec3(value.point_mm, `${prefix}.point_mm`, errors);
      checkTransform(value.sketch_transform, `${prefix}.sketch_transform`, errors);
      break;
    default:
      errors.push(`${prefix}.kind must be one of: ${REFERENCE_KINDS.join(", ")}`);
  }
}

function checkTarget(value: unknown, errors: string[]): void {
  if (!isRecord(value)) {
    errors.push("target must be an object");
    return;
  }

  if (value.name !== undefined && typeof value.name !== "string") {
    errors.push("target.name must be a string");
  }

  checkBoundingBox(value.bounding_box, "target.bounding_box", errors);

  if (value.kind === "body") {
    checkOptionalVec3(value.center_of_mass_mm, "target.center_of_mass_mm", errors);
  } else if (value.kind === "occurrence") {
    checkTransform(value.transform, "target.transform", errors);
  } else {
    errors.push(`target.kind must be one of: body, occurrence`);
  }
}

/**
 * Validate a CenterJob.
 */
export function validateCenterJob(input: unknown): CenterJob {
  const errors: string[] = [];
  const data = input;

  if (!isRecord(data)) {
    throw new ValidationError(["Input must be an object"]);
  }

  // Check schema version
  if (data.schema_version !== "v0.1") {
    errors.push(`Expected schema_version "v0.1", got "${String(data.schema_version)}"`);
  }

  if (typeof data.job_id !== "string" || data.job_id.length === 0) {
    errors.push("job_id must be a non-empty string");
  }

  checkTarget(data.target, errors);

  if (data.center_method !== undefined && !CENTER_METHODS.includes(String(data.center_method))) {
    errors.push(`center_method must be one of: ${CENTER_METHODS.join(", ")}`);
  }

  if (
    data.epsilon_mm !== undefined &&
    (typeof data.epsilon_mm !== "number" || !Number.isFinite(data.epsilon_mm) || data.epsilon_mm < 0)
  ) {
    errors.push("epsilon_mm must be a non-negative number");
  }

  // Check pairs array
  if (!Array.isArray(data.pairs)) {
    errors.push("pairs must be an array");
  } else {
    if (data.pairs.length > MAX_REFERENCE_PAIRS) {
      errors.push(`pairs must have at most ${MAX_REFERENCE_PAIRS} entries`);
    }

    data.pairs.forEach((pair: unknown, i: number) => {
      const prefix = `pairs[${i}]`;
      if (!isRecord(pair)) {
        errors.push(`${prefix} must be an object`);
        return;
      }

      if (pair.enabled !== undefined && typeof pair.enabled !== "boolean") {
        errors.push(`${prefix}.enabled must be a boolean`);
      }
      if (
        pair.offset_mm !== undefined &&
        (typeof pair.offset_mm !== "number" || !Number.isFinite(pair.offset_mm))
      ) {
        errors.push(`${prefix}.offset_mm must be a finite number`);
      }
      if (pair.axis !== undefined && !AXIS_LABELS.includes(String(pair.axis))) {
        errors.push(`${prefix}.axis must be one of: ${AXIS_LABELS.join(", ")}`);
      }

      if (!Array.isArray(pair.refs)) {
        errors.push(`${prefix}.refs must be an array`);
      } else if (pair.refs.length > 2) {
        errors.push(`${prefix}.refs must hold at most 2 references`);
      } else {
        pair.refs.forEach((ref: unknown, j: number) => checkReference(ref, `${prefix}.refs[${j}]`, errors));
      }
    });
  }

  if (errors.length > 0) {
    throw new ValidationError(errors);
  }

  return input as CenterJob;
}
