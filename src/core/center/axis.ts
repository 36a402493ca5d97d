import type { AxisIndex, AxisLabel, Vec3 } from "../types.js";
import { AXIS_LABELS, EPS_AXIS } from "../constants.js";
import { isFiniteVec, sub } from "../math/vec.js";

export function axisLabel(axis: AxisIndex): AxisLabel {
  return AXIS_LABELS[axis];
}

export function axisFromLabel(label: string): AxisIndex | undefined {
  switch (label.toUpperCase()) {
    case "X":
      return 0;
    case "Y":
      return 1;
    case "Z":
      return 2;
    default:
      return undefined;
  }
}

/**
 * Axis of the component with the largest magnitude. Ties go to the earlier
 * axis (X over Y over Z). Undefined for a zero or non-finite vector.
 */
export function dominantAxis(v: Vec3): AxisIndex | undefined {
  if (!isFiniteVec(v)) return undefined;
  const ax = Math.abs(v[0]);
  const ay = Math.abs(v[1]);
  const az = Math.abs(v[2]);
  if (Math.max(ax, ay, az) <= EPS_AXIS) return undefined;

  if (ax >= ay && ax >= az) return 0;
  if (ay >= az) return 1;
  return 2;
}

/**
 * Pick the axis a reference pair centers along.
 *
 * A normal wins over positions; with two normals the first one decides even
 * when they disagree. Without normals the dominant component of the position
 * difference decides.
 */
export function resolveAxis(
  ref1Normal: Vec3 | undefined,
  ref2Normal: Vec3 | undefined,
  pos1: Vec3 | undefined,
  pos2: Vec3 | undefined
): AxisIndex | undefined {
  if (!pos1 || !pos2) return undefined;

  const normal = ref1Normal ?? ref2Normal;
  if (normal) return dominantAxis(normal);

  return dominantAxis(sub(pos2, pos1));
}
