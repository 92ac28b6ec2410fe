/**
 * @nullmask/shared
 *
 * Logging and configuration used across nullmask packages.
 */

export { logger, setLogLevel, getLogLevel, type LogLevel } from "./logger.js";

export {
  CONFIG_FILE_NAMES,
  DATASET_FORMATS,
  ConfigFileError,
  findConfigFile,
  loadConfig,
  parseConfigContent,
  type ConfigFileIssue,
  type FileConfig,
  type LoadConfigOptions,
  type LoadedConfig,
} from "./config.js";
