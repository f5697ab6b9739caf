export {
  plannerConfigSchema,
  HARDCODED_DEFAULTS,
  findConfigsRoot,
  applyOverrides,
  loadDefaultConfig,
  loadPlannerConfig,
  listProfiles,
  resolveDataPath,
  type PlannerConfig,
  type ProfileConfig,
  type ProfileInfo,
} from "./planner-config.js";
