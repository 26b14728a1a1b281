export {
  DEFAULT_CONFIG_FILE,
  DEFAULT_OPTFLAGS,
  DEFAULT_WORK_DIR,
  loadConfigFile,
  pickInheritedEnv,
  resolveBuildConfig,
  validateConfigFile,
} from "./config-loader.js";
export type { BuildConfig, ConfigFile, ConfigOverrides } from "./types.js";
