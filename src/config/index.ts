export {
  loadConfig,
  parseConfig,
  findConfigFile,
  CONFIG_FILENAME,
  type LoadConfigOptions,
  type LoadConfigResult,
} from './loader.js';
export { resolveSettings, type AsserterSettings } from './options.js';
