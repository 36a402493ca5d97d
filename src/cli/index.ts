#!/usr/bin/env node
import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import { validateCenterJob } from "../core/validate.js";
import { createTracer, noopTracer } from "../core/trace.js";
import { runCenterBodyPipeline } from "../pipelines/centerBody.js";
import { configFromArgs, parseArgs } from "./args.js";
import { formatPipelineReport } from "./format.js";

const USAGE =
  "Usage: tsx src/cli/index.ts --job <path> [--out <path>] [--method bounding_box|center_of_mass] [--epsilon <n>] [--trace]";

async function readJson(p: string): Promise<unknown> {
  return JSON.parse(await readFile(p, "utf8"));
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const jobPath = args["job"];
  const outPath = args["out"] ?? "out/center-result.json";

  if (!jobPath) {
    console.error(USAGE);
    process.exit(1);
  }

  const job = validateCenterJob(await readJson(jobPath));
  const config = configFromArgs(args);
  const tracer = args["trace"] === "true" ? createTracer(console.error) : noopTracer;

  const result = runCenterBodyPipeline(job, config, { tracer });

  await mkdir(dirname(outPath), { recursive: true });
  await writeFile(outPath, JSON.stringify(result, null, 2) + "\n", "utf8");

  for (const line of formatPipelineReport(result)) console.log(line);
  console.log(`Wrote ${outPath}`);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
