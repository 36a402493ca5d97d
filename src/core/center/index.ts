export { axisFromLabel, axisLabel, dominantAxis, resolveAxis } from "./axis.js";
export { computeCenter, computeTranslation } from "./computeTranslation.js";
export type { ComputeTranslationOptions } from "./computeTranslation.js";
export { formatFeatureName } from "./featureName.js";
