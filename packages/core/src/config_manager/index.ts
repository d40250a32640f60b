export { loadServiceConfig, DEFAULT_SERVICE_CONFIG, DEFAULT_CONFIG_FILE } from './config_manager';
export type {
  ServiceConfig,
  StoreBackend,
  StoreConfig,
  GitHubConfig,
  ReviewConfig,
  LoadServiceConfigOptions,
} from './config_manager.types';
