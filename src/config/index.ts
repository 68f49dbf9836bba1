export {
  CONFIG_KEYS,
  collectRawConfig,
  loadConfig,
  readEnvFile,
  type EnvSource,
  type LoadConfigOptions,
} from "./config";
