import assert from "node:assert/strict";
import { describe, it } from "vitest";
import { configFromArgs, parseArgs } from "../cli/args.js";
import { formatMoveSummary, formatPipelineReport, formatStatusLabel, formatVec3 } from "../cli/format.js";
import { DEFAULT_PIPELINE_CONFIG, runCenterBodyPipeline } from "../pipelines/centerBody.js";
import type { CenterJob } from "../types.js";

describe("parseArgs", () => {
  it("reads flag values and bare switches", () => {
    assert.deepEqual(parseArgs(["--job", "a.json", "--trace", "--out", "b.json"]), {
      job: "a.json",
      trace: "true",
      out: "b.json"
    });
  });

  it("ignores positional arguments", () => {
    assert.deepEqual(parseArgs(["run", "--epsilon", "0.01"]), { epsilon: "0.01" });
  });
});

describe("configFromArgs", () => {
  it("starts from the defaults", () => {
    assert.deepEqual(configFromArgs({}), DEFAULT_PIPELINE_CONFIG);
  });

  it("overrides method and epsilon", () => {
    const config = configFromArgs({ method: "center_of_mass", epsilon: "0.5" });
    assert.equal(config.center_method, "center_of_mass");
    assert.equal(config.epsilon_mm, 0.5);
  });

  it("rejects an unknown method", () => {
    assert.throws(() => configFromArgs({ method: "centroid" }), /--method/);
  });

  it("rejects a negative epsilon", () => {
    assert.throws(() => configFromArgs({ epsilon: "-1" }), /--epsilon/);
  });
});

describe("runCenterBodyPipeline", () => {
  it("plans no move for a centered body under a zero epsilon", () => {
    const job: CenterJob = {
      schema_version: "v0.1",
      job_id: "zero-eps",
      target: { kind: "body", bounding_box: { min_mm: [-1, -1, -1], max_mm: [1, 1, 1] } },
      epsilon_mm: 0,
      pairs: [
        {
          refs: [
            { kind: "planar_face", origin_mm: [-5, 0, 0], normal: [1, 0, 0] },
            { kind: "planar_face", origin_mm: [5, 0, 0], normal: [-1, 0, 0] }
          ]
        }
      ]
    };

    const result = runCenterBodyPipeline(job);

    assert.equal(result.summary.status, "already_centered");
    assert.deepEqual(result.summary.translation_mm, [0, 0, 0]);
    assert.equal(result.move, undefined);
  });
});

describe("report formatting", () => {
  it("formats vectors and statuses", () => {
    assert.equal(formatVec3([1, -2.5, 0], 1), "1.0, -2.5, 0.0");
    assert.equal(formatVec3(undefined), "—");
    assert.equal(formatStatusLabel("already_centered"), "Already centered");
    assert.equal(formatStatusLabel("no_valid_pairs"), "no valid pairs");
    assert.equal(formatMoveSummary(undefined), "No move");
  });

  it("renders a pipeline report", () => {
    const job: CenterJob = {
      schema_version: "v0.1",
      job_id: "report",
      target: { kind: "body", bounding_box: { min_mm: [0, 0, 0], max_mm: [2, 2, 2] } },
      pairs: [
        {
          refs: [
            { kind: "construction_point", point_mm: [0, -3, 0] },
            { kind: "construction_point", point_mm: [0, 9, 0] }
          ]
        }
      ]
    };

    assert.deepEqual(formatPipelineReport(runCenterBodyPipeline(job)), [
      "Job report: Moved",
      "  Target center: [1.000, 1.000, 1.000] mm (bounding_box)",
      "  Axes: Y",
      "  Center Body (Y): move body by [0.000, 2.000, 0.000] mm"
    ]);
  });
});
