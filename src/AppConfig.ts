/**
 * AppConfig - 配置管理入口
 * 在应用顶层创建唯一的配置管理器，并可挂载到 window.AppConfig 供页面脚本使用
 */

import { ConfigManager, ConfigManagerOptions } from './core/ConfigManager';
import { CONFIG_VERSION } from './utils/constants';
import { EnvUtils } from './utils/EnvUtils';
import { Logger } from './utils/Logger';

/**
 * 页面脚本使用的快捷访问接口
 */
export interface AppConfigFacade {
  get: ConfigManager['get'];
  set: ConfigManager['set'];
  reset: ConfigManager['reset'];
  getApiBase: ConfigManager['getApiBase'];
  getApiUrl: ConfigManager['getApiUrl'];
  testConnection: ConfigManager['testConnection'];
  subscribe: ConfigManager['subscribe'];
  export: ConfigManager['export'];
  import: ConfigManager['import'];
  /** 配置管理器实例 */
  manager: ConfigManager;
  /** 配置结构版本 */
  version: string;
}

export interface AppConfigOptions extends ConfigManagerOptions {
  /** 是否挂载到 window.AppConfig */
  install?: boolean;
  /** 是否在控制台输出加载信息，默认与 install 一致 */
  banner?: boolean;
}

declare global {
  interface Window {
    AppConfig?: AppConfigFacade;
  }
}

const logger = new Logger('配置管理');

/**
 * 创建配置管理入口
 */
export function createAppConfig(options: AppConfigOptions = {}): AppConfigFacade {
  const { install = false, banner = install, ...managerOptions } = options;
  const manager = new ConfigManager(managerOptions);

  const facade: AppConfigFacade = {
    get: manager.get.bind(manager),
    set: manager.set.bind(manager),
    reset: manager.reset.bind(manager),
    getApiBase: manager.getApiBase.bind(manager),
    getApiUrl: manager.getApiUrl.bind(manager),
    testConnection: manager.testConnection.bind(manager),
    subscribe: manager.subscribe.bind(manager),
    export: manager.export.bind(manager),
    import: manager.import.bind(manager),
    manager,
    version: CONFIG_VERSION,
  };

  if (install) {
    if (EnvUtils.isBrowser()) {
      window.AppConfig = facade;
    } else {
      logger.warn('非浏览器环境，未挂载 window.AppConfig');
    }
  }

  if (banner) {
    logger.info('已加载');
    logger.info(`当前API地址: ${facade.getApiBase()}`);
    logger.info('提示: 使用 AppConfig.get() 查看完整配置');
    logger.info('URL参数示例: ?api_base=http://localhost:8000/api');
  }

  return facade;
}

export default createAppConfig;
