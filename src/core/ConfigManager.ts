/**
 * ConfigManager - 统一配置管理
 * 多级配置优先级：URL参数 > 本地存储 > 默认配置
 */

import { createDefaultStorage } from '../adapters/storage';
import {
  ApiBaseDetectorRules,
  AppConfiguration,
  ConfigErrorType,
  ConfigObserver,
  ConfigPatch,
  ConnectionTestResult,
  ExportedConfig,
  IConfigStorage,
  ImportResult,
  KnownConfigKey,
  LocationLike,
  LogLevel,
} from '../types';
import { detectApiBase } from '../utils/ApiBaseDetector';
import {
  cloneConfig,
  cloneValue,
  createDefaultConfig,
  getPath,
  isPlainObject,
  mergeConfig,
  mergeInto,
  setPath,
} from '../utils/ConfigMerge';
import {
  CONFIG_VERSION,
  CONNECTION_TEST,
  DEFAULT_CONFIG,
  DEFAULT_DETECTOR_RULES,
} from '../utils/constants';
import { EnvUtils } from '../utils/EnvUtils';
import { Logger } from '../utils/Logger';
import { readConfigFromSearch } from '../utils/UrlParamsReader';

import { ConfigPersistence } from './ConfigPersistence';
import { ConnectionTester, FetchFunction } from './ConnectionTester';
import { ConfigError } from './error';
import { EventBus } from './EventBus';

/**
 * 配置管理器选项
 */
export interface ConfigManagerOptions {
  /** 本地存储，默认 localStorage，不可用时使用内存存储 */
  storage?: IConfigStorage;
  /** 本地存储键名 */
  storageKey?: string;
  /** 页面地址，默认读取 window.location */
  location?: LocationLike;
  /** API地址探测规则 */
  detectorRules?: Partial<ApiBaseDetectorRules>;
  /** 连通性测试超时（毫秒） */
  probeTimeout?: number;
  /** 连通性测试使用的请求函数 */
  fetch?: FetchFunction;
  /** 日志记录器，debugMode 开启时其级别会被调整为 debug */
  logger?: Logger;
}

type ConfigEvents = {
  change: AppConfiguration;
};

export class ConfigManager {
  /** 配置结构版本 */
  static readonly version = CONFIG_VERSION;

  private config: AppConfiguration;
  private readonly events: EventBus<ConfigEvents>;
  private readonly persistence: ConfigPersistence;
  private readonly connectionTester: ConnectionTester;
  private readonly location: LocationLike;
  private readonly detectorRules: ApiBaseDetectorRules;
  private readonly logger: Logger;
  private readonly baseLogLevel: LogLevel;

  constructor(options: ConfigManagerOptions = {}) {
    this.logger = options.logger ?? new Logger('ConfigManager');
    this.baseLogLevel = this.logger.getLevel();
    this.events = new EventBus<ConfigEvents>({ logger: this.logger });
    this.persistence = new ConfigPersistence({
      storage: options.storage ?? createDefaultStorage(),
      storageKey: options.storageKey,
      logger: this.logger,
    });
    this.connectionTester = new ConnectionTester({
      timeout: options.probeTimeout,
      fetch: options.fetch,
      logger: this.logger,
    });
    this.location = options.location ?? EnvUtils.getLocation();
    this.detectorRules = { ...DEFAULT_DETECTOR_RULES, ...options.detectorRules };

    this.config = this.load();
    this.applyDebugMode();
  }

  /**
   * 加载配置（优先级：URL参数 > 本地存储 > 默认配置）
   * 不会修改当前生效的配置
   */
  load(): AppConfiguration {
    const config = mergeConfig(
      DEFAULT_CONFIG,
      this.persistence.read(),
      readConfigFromSearch(this.location.search)
    );

    // apiBase 仍为空时智能检测
    this.ensureApiBase(config);

    return config;
  }

  /**
   * 根据页面地址检测API地址
   */
  detectApiBase(): string {
    return detectApiBase(this.location, this.detectorRules);
  }

  /**
   * 获取配置项
   * 不传键名时返回整份配置的副本；键名支持点路径，如 pagination.pageSize
   */
  get(): AppConfiguration;
  get<K extends KnownConfigKey>(key: K): AppConfiguration[K];
  get(key: string): unknown;
  get(key?: string): unknown {
    if (key) {
      return cloneValue(getPath(this.config, key));
    }
    return cloneConfig(this.config);
  }

  /**
   * 设置配置项
   * 支持单个键值或批量对象，不校验配置结构
   * @param persist 是否保存到本地存储
   */
  set(patch: ConfigPatch, value?: undefined, persist?: boolean): void;
  set(key: string, value: unknown, persist?: boolean): void;
  set(keyOrPatch: string | ConfigPatch, value?: unknown, persist = true): void {
    const next = cloneConfig(this.config);

    if (typeof keyOrPatch === 'string') {
      setPath(next, keyOrPatch, value);
    } else if (isPlainObject(keyOrPatch)) {
      mergeInto(next, keyOrPatch);
    } else {
      this.logger.warn('忽略无效的配置设置:', keyOrPatch);
      return;
    }

    this.ensureApiBase(next);
    this.commit(next, persist);
  }

  /**
   * 重置配置为默认值
   */
  reset(): void {
    const next = createDefaultConfig();
    next.apiBase = this.detectApiBase();
    this.commit(next, true);
  }

  /**
   * 获取API基础地址
   */
  getApiBase(): string {
    return this.config.apiBase;
  }

  /**
   * 构建完整的API URL
   * 基础地址与接口路径之间保证只有一个分隔符
   */
  getApiUrl(endpoint?: string): string {
    const apiBase = this.getApiBase();
    if (!endpoint) {
      return apiBase;
    }
    const base = apiBase.replace(/\/+$/, '');
    const path = endpoint.replace(/^\/+/, '');
    return `${base}/${path}`;
  }

  /**
   * 测试API连接
   */
  testConnection(): Promise<ConnectionTestResult> {
    return this.connectionTester.test(this.getApiUrl(CONNECTION_TEST.ENDPOINT));
  }

  /**
   * 注册配置变更观察者
   * 每个观察者收到独立的配置副本
   * @returns 取消注册的函数
   */
  subscribe(observer: ConfigObserver): () => void {
    if (typeof observer !== 'function') {
      this.logger.warn('配置观察者必须是函数');
      return () => undefined;
    }
    return this.events.on('change', config => observer(cloneConfig(config)));
  }

  /**
   * 导出配置
   */
  export(): string {
    const exported: ExportedConfig = {
      version: CONFIG_VERSION,
      config: this.config,
      exportedAt: new Date().toISOString(),
    };
    return JSON.stringify(exported, null, 2);
  }

  /**
   * 导入配置
   * 导入内容与默认配置合并后整体替换当前配置；失败时当前配置保持不变
   */
  import(configJson: string): ImportResult {
    let imported: unknown;
    try {
      imported = JSON.parse(configJson);
    } catch (error) {
      const parseError = ConfigError.from(error, ConfigErrorType.PARSE_ERROR);
      this.logger.warn('导入配置失败:', parseError.message);
      return { success: false, message: `配置解析失败: ${parseError.message}` };
    }

    if (!isPlainObject(imported) || !isPlainObject(imported.config)) {
      this.logger.warn('导入配置失败: 缺少 config 字段');
      return { success: false, message: '配置格式不正确' };
    }

    const next = mergeConfig(DEFAULT_CONFIG, imported.config);
    this.ensureApiBase(next);
    this.commit(next, true);

    return { success: true };
  }

  /**
   * 释放资源，移除所有观察者
   */
  dispose(): void {
    this.events.clear();
  }

  /**
   * 替换当前配置，按需持久化并通知观察者
   */
  private commit(next: AppConfiguration, persist: boolean): void {
    this.config = next;

    if (persist) {
      this.persistence.write(this.config);
    }

    this.applyDebugMode();
    this.events.emit('change', this.config);
  }

  private ensureApiBase(config: AppConfiguration): void {
    if (!config.apiBase) {
      config.apiBase = this.detectApiBase();
    }
  }

  /**
   * 调试模式下输出调试级别日志
   */
  private applyDebugMode(): void {
    this.logger.setLevel(
      this.config.debugMode === true ? LogLevel.DEBUG : this.baseLogLevel
    );
  }
}

export default ConfigManager;
