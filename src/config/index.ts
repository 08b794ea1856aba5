export {
  CONFIG_FILE_NAME,
  DEFAULT_CONFIG,
  loadConfig,
  parseConfig,
  type LoadConfigOptions,
  type ManuscriptConfig,
} from './config';
