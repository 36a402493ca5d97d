import assert from "node:assert/strict";
import { describe, it } from "vitest";
import { normalize, identity, multiply } from "../core/math/quat.js";
import type { Quat } from "../types.js";

const EPS = 1e-6;

function close(a: number, b: number, eps = EPS) {
  assert.ok(Math.abs(a - b) <= eps, `Expected ${a} ~ ${b}`);
}

function closeQuat(a: Quat, b: Quat, eps = EPS) {
  // Quaternions q and -q represent the same rotation
  const sign = Math.sign(a[3]) === Math.sign(b[3]) ? 1 : -1;
  for (let i = 0; i < 4; i++) {
    close(a[i], sign * b[i], eps);
  }
}

describe("quaternion operations", () => {
  describe("identity", () => {
    it("returns [0, 0, 0, 1]", () => {
      assert.deepEqual(identity(), [0, 0, 0, 1]);
    });
  });

  describe("normalize", () => {
    it("normalizes a quaternion", () => {
      const n = normalize([1, 2, 3, 4]);
      const len = Math.sqrt(n[0] ** 2 + n[1] ** 2 + n[2] ** 2 + n[3] ** 2);
      close(len, 1);
    });

    it("handles zero quaternion", () => {
      assert.deepEqual(normalize([0, 0, 0, 0]), [0, 0, 0, 1]);
    });
  });

  describe("multiply", () => {
    it("leaves a quaternion unchanged when multiplied by identity", () => {
      const q: Quat = [0, Math.SQRT1_2, 0, Math.SQRT1_2];
      closeQuat(multiply(q, identity()), q);
      closeQuat(multiply(identity(), q), q);
    });

    it("stacks two quarter turns into a half turn", () => {
      const quarterZ: Quat = [0, 0, Math.SQRT1_2, Math.SQRT1_2];
      closeQuat(multiply(quarterZ, quarterZ), [0, 0, 1, 0]);
    });
  });
});
