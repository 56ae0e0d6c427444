export { DEFAULT_CONFIG, CONFIG_FILE_NAMES } from './defaults.js';
export {
  loadConfig,
  loadConfigFile,
  findConfigFile,
  configFileToRecorderConfig,
  mergeConfig,
  validateConfig,
  type ConfigFile,
  type ConfigOverrides,
} from './loader.js';
