import type {
  AxisIndex,
  BoundingBox,
  ReferenceEntity,
  ReferencePair,
  ResolvedReference,
  Transform,
  Vec3
} from "../types.js";
import { applyTransformToLine, applyTransformToPoint } from "../align/apply.js";
import { isFiniteVec, midpoint } from "../math/vec.js";
import { dominantAxis } from "../center/axis.js";

export function boundingBoxCenter(box: BoundingBox | undefined): Vec3 | undefined {
  if (!box || !isFiniteVec(box.min_mm) || !isFiniteVec(box.max_mm)) return undefined;
  return midpoint(box.min_mm, box.max_mm);
}

// Sketch geometry lives on the sketch plane; z is dropped before the sketch
// transform carries it into world space.
function sketchToWorld(transform: Transform, point: Vec3): Vec3 {
  return applyTransformToPoint(transform, [point[0], point[1], 0]);
}

function finite(ref: ResolvedReference): ResolvedReference | undefined {
  if (!isFiniteVec(ref.position_mm)) return undefined;
  // A normal with no usable direction is dropped; the pair falls back to positions.
  if (ref.normal && dominantAxis(ref.normal) === undefined) return { position_mm: ref.position_mm };
  return ref;
}

/**
 * Reduce a host entity to the position (and, for planar entities, the normal)
 * the centering engine works with. Returns undefined when the entity lacks
 * the geometry needed to place it.
 */
export function resolveReference(entity: ReferenceEntity): ResolvedReference | undefined {
  switch (entity.kind) {
    case "planar_face":
    case "construction_plane":
      return finite({ position_mm: entity.origin_mm, normal: entity.normal });

    case "face": {
      const center = boundingBoxCenter(entity.bounding_box);
      return center ? { position_mm: center } : undefined;
    }

    case "edge":
      if (!entity.start_mm || !entity.end_mm) return undefined;
      return finite({ position_mm: midpoint(entity.start_mm, entity.end_mm) });

    case "sketch_line": {
      const line = applyTransformToLine(entity.sketch_transform, {
        start_mm: [entity.start_mm[0], entity.start_mm[1], 0],
        end_mm: [entity.end_mm[0], entity.end_mm[1], 0]
      });
      return finite({ position_mm: midpoint(line.start_mm, line.end_mm) });
    }

    case "construction_axis":
      return finite({ position_mm: entity.origin_mm });

    case "construction_point":
      return finite({ position_mm: entity.point_mm });

    case "sketch_point":
      return finite({ position_mm: sketchToWorld(entity.sketch_transform, entity.point_mm) });
  }
}

export interface ResolvePairOptions {
  enabled?: boolean;
  offset_mm?: number;
  axis?: AxisIndex;
}

export function resolvePair(
  entities: readonly (ReferenceEntity | undefined)[],
  options: ResolvePairOptions = {}
): ReferencePair {
  const [first, second] = entities;
  const pair: ReferencePair = {
    refs: [
      first ? resolveReference(first) : undefined,
      second ? resolveReference(second) : undefined
    ],
    enabled: options.enabled ?? true,
    offset_mm: options.offset_mm ?? 0
  };
  if (options.axis !== undefined) pair.axis = options.axis;
  return pair;
}
