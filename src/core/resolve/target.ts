import type { CenterMethod, CenterTarget, Notice, Vec3 } from "../types.js";
import { NoticeCode } from "../types.js";
import { isFiniteVec } from "../math/vec.js";
import { boundingBoxCenter } from "./references.js";

export interface TargetCenterResult {
  center_mm?: Vec3;
  method: CenterMethod;
  notices: Notice[];
}

/**
 * Current center of the object being moved.
 *
 * Occurrences only ever use their bounding box; bodies fall back to it when
 * the host could not supply a center of mass.
 */
export function computeTargetCenter(target: CenterTarget, method: CenterMethod): TargetCenterResult {
  const notices: Notice[] = [];
  const boxCenter = boundingBoxCenter(target.bounding_box);
  let center_mm: Vec3 | undefined = boxCenter;
  let used: CenterMethod = "bounding_box";

  if (method === "center_of_mass") {
    if (target.kind === "occurrence") {
      notices.push({
        code: NoticeCode.CENTER_OF_MASS_UNSUPPORTED,
        level: "info",
        message: "Center of mass not supported for occurrences. Using bounding box."
      });
    } else if (target.center_of_mass_mm && isFiniteVec(target.center_of_mass_mm)) {
      center_mm = [...target.center_of_mass_mm];
      used = "center_of_mass";
    } else {
      notices.push({
        code: NoticeCode.CENTER_OF_MASS_UNAVAILABLE,
        level: "warning",
        message: "Center of mass unavailable. Using bounding box center."
      });
    }
  }

  if (!center_mm) {
    notices.push({
      code: NoticeCode.TARGET_CENTER_UNAVAILABLE,
      level: "error",
      message: "Could not determine target center point."
    });
    return { method: used, notices };
  }

  return { center_mm, method: used, notices };
}
