export type { ConfigData } from "./defaults.js";
export {
  CONFIG_KEYS,
  DEFAULTS,
  ENV_MAP,
  LOG_LEVELS,
  isConfigKey,
  checkConfigValue,
} from "./defaults.js";
export {
  readConfigFile,
  writeConfigFile,
  updateConfigFile,
  getConfigDir,
  getConfigPath,
} from "./configFile.js";
export { resolveConfig, setCliOverride, clearCliOverrides, getSource } from "./resolve.js";
