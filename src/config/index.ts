/**
 * @fileoverview labelbook configuration
 *
 * YAML config file loading and validation.
 */

export {
  DEFAULT_CONFIG_FILE,
  LabelbookConfigSchema,
  defaultConfig,
  parseConfig,
  loadConfig,
  reportPath,
  csvPath,
  type LabelbookConfig,
  type LoadConfigOptions,
} from './labelbook_config.js';
