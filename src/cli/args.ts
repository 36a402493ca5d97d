import { DEFAULT_PIPELINE_CONFIG, type PipelineConfig } from "../pipelines/centerBody.js";

export function parseArgs(argv: string[]): Record<string,string> {
  const out: Record<string,string> = {};
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a.startsWith("--")) continue;
    const key = a.slice(2);
    const val = argv[i+1];
    if (!val || val.startsWith("--")) {
      out[key] = "true";
    } else {
      out[key] = val;
      i++;
    }
  }
  return out;
}

export function configFromArgs(args: Record<string,string>): PipelineConfig {
  const config: PipelineConfig = { ...DEFAULT_PIPELINE_CONFIG };

  const method = args["method"];
  if (method !== undefined) {
    if (method !== "bounding_box" && method !== "center_of_mass") {
      throw new Error(`--method must be bounding_box or center_of_mass, got "${method}"`);
    }
    config.center_method = method;
  }

  const epsilon = args["epsilon"];
  if (epsilon !== undefined) {
    const value = Number(epsilon);
    if (!Number.isFinite(value) || value < 0) {
      throw new Error(`--epsilon must be a non-negative number, got "${epsilon}"`);
    }
    config.epsilon_mm = value;
  }

  return config;
}
