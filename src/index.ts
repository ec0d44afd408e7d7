/**
 * 客户端配置管理
 * 统一导出
 */

export { createAppConfig } from './AppConfig';
export type { AppConfigFacade, AppConfigOptions } from './AppConfig';

export { ConfigManager } from './core/ConfigManager';
export type { ConfigManagerOptions } from './core/ConfigManager';
export { ConfigPersistence } from './core/ConfigPersistence';
export type { ConfigPersistenceOptions } from './core/ConfigPersistence';
export { ConnectionTester } from './core/ConnectionTester';
export type {
  ConnectionTesterOptions,
  FetchFunction,
} from './core/ConnectionTester';
export { EventBus } from './core/EventBus';
export type { EventHandler, EventBusOptions } from './core/EventBus';
export { ConfigError } from './core/error';

export {
  BrowserStorage,
  MemoryStorage,
  createDefaultStorage,
} from './adapters/storage';

export { detectApiBase } from './utils/ApiBaseDetector';
export { readConfigFromSearch } from './utils/UrlParamsReader';
export { Logger } from './utils/Logger';
export type { LoggerConfig } from './utils/Logger';
export {
  CONFIG_STORAGE_KEY,
  CONFIG_VERSION,
  DEFAULT_CONFIG,
  DEFAULT_DETECTOR_RULES,
} from './utils/constants';

export * from './types';
