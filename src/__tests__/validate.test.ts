import assert from "node:assert/strict";
import { describe, it } from "vitest";
import { ValidationError, validateCenterJob } from "../core/validate.js";
import type { CenterJob } from "../types.js";

const validJob: CenterJob = {
  schema_version: "v0.1",
  job_id: "test-job",
  target: {
    kind: "body",
    bounding_box: { min_mm: [0, 0, 0], max_mm: [2, 2, 2] }
  },
  pairs: [
    {
      enabled: true,
      offset_mm: 0,
      refs: [
        { kind: "planar_face", origin_mm: [-5, 0, 0], normal: [1, 0, 0] },
        { kind: "planar_face", origin_mm: [5, 0, 0], normal: [1, 0, 0] }
      ]
    }
  ]
};

function rejects(input: unknown, fragment: string) {
  assert.throws(
    () => validateCenterJob(input),
    (err: ValidationError) => err.errors.some((e) => e.includes(fragment))
  );
}

describe("validateCenterJob", () => {
  it("accepts a valid job", () => {
    const result = validateCenterJob(validJob);
    assert.equal(result.job_id, "test-job");
  });

  it("accepts an occurrence target with every reference kind", () => {
    const transform = { translation_mm: [0, 0, 0], rotation_quat_xyzw: [0, 0, 0, 1] };
    const job = {
      ...validJob,
      target: { kind: "occurrence", transform },
      center_method: "center_of_mass",
      epsilon_mm: 0.001,
      pairs: [
        {
          axis: "Z",
          refs: [
            { kind: "face", bounding_box: { min_mm: [0, 0, 0], max_mm: [1, 1, 1] } },
            { kind: "edge", start_mm: [0, 0, 0] }
          ]
        },
        {
          refs: [
            { kind: "sketch_line", start_mm: [0, 0, 0], end_mm: [1, 0, 0], sketch_transform: transform },
            { kind: "construction_axis", origin_mm: [0, 0, 0], direction: [0, 0, 1] }
          ]
        },
        {
          refs: [
            { kind: "construction_point", point_mm: [0, 0, 0] },
            { kind: "sketch_point", point_mm: [0, 0, 0], sketch_transform: transform }
          ]
        }
      ]
    };

    assert.equal(validateCenterJob(job).target.kind, "occurrence");
  });

  it("rejects non-objects", () => {
    rejects(null, "Input must be an object");
    rejects([validJob], "Input must be an object");
  });

  it("rejects wrong schema version", () => {
    rejects({ ...validJob, schema_version: "v0.2" }, "schema_version");
  });

  it("rejects an empty job_id", () => {
    rejects({ ...validJob, job_id: "" }, "job_id");
  });

  it("rejects an unknown target kind", () => {
    rejects({ ...validJob, target: { kind: "sketch" } }, "target.kind");
  });

  it("rejects an occurrence without a transform", () => {
    rejects({ ...validJob, target: { kind: "occurrence" } }, "target.transform must be an object");
  });

  it("rejects an unknown center method", () => {
    rejects({ ...validJob, center_method: "centroid" }, "center_method");
  });

  it("rejects a negative epsilon", () => {
    rejects({ ...validJob, epsilon_mm: -1 }, "epsilon_mm");
  });

  it("rejects more pairs than the dialog offers", () => {
    const pair = validJob.pairs[0];
    rejects({ ...validJob, pairs: [pair, pair, pair, pair] }, "at most 3");
  });

  it("rejects a pair with three references", () => {
    const refs = validJob.pairs[0].refs;
    rejects({ ...validJob, pairs: [{ refs: [...refs, refs[0]] }] }, "at most 2");
  });

  it("rejects an unknown axis label", () => {
    rejects({ ...validJob, pairs: [{ ...validJob.pairs[0], axis: "W" }] }, "pairs[0].axis");
  });

  it("rejects an invalid Vec3 inside a reference", () => {
    const bad = { kind: "planar_face", origin_mm: [0, 0], normal: [1, 0, 0] };
    rejects({ ...validJob, pairs: [{ refs: [bad] }] }, "pairs[0].refs[0].origin_mm must be a Vec3");
  });

  it("rejects an unknown reference kind", () => {
    rejects({ ...validJob, pairs: [{ refs: [{ kind: "spline" }] }] }, "pairs[0].refs[0].kind");
  });

  it("collects every problem into one error", () => {
    try {
      validateCenterJob({ schema_version: "v0.0", job_id: 3, target: {}, pairs: "none" });
      assert.fail("expected a ValidationError");
    } catch (err) {
      assert.ok(err instanceof ValidationError);
      assert.equal(err.errors.length, 4);
      assert.equal(err.name, "ValidationError");
    }
  });
});
