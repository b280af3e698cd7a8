export {
  loadPlannerConfig,
  mergePlannerConfig,
  resolveReferencePoint,
  findPlannerConfigPath,
  deepMerge,
  DEFAULT_PLANNER_CONFIG,
  type PlannerConfig,
} from "./planner-config.js";
