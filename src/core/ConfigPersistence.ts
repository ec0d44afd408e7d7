/**
 * ConfigPersistence - 配置持久化
 * 以带版本号的记录保存配置，版本不一致的记录整体丢弃
 * 记录中的配置数据原样返回，不做类型校验
 */

import type {
  AppConfiguration,
  IConfigStorage,
  PersistedConfigRecord,
} from '../types';
import { ConfigErrorType } from '../types';
import { isPlainObject } from '../utils/ConfigMerge';
import { CONFIG_STORAGE_KEY, CONFIG_VERSION } from '../utils/constants';
import { Logger } from '../utils/Logger';

import { ConfigError } from './error';

export interface ConfigPersistenceOptions {
  storage: IConfigStorage;
  storageKey?: string;
  version?: string;
  logger?: Logger;
}

export class ConfigPersistence {
  private storage: IConfigStorage;
  private storageKey: string;
  private version: string;
  private logger: Logger;

  constructor(options: ConfigPersistenceOptions) {
    this.storage = options.storage;
    this.storageKey = options.storageKey ?? CONFIG_STORAGE_KEY;
    this.version = options.version ?? CONFIG_VERSION;
    this.logger = options.logger ?? new Logger('ConfigPersistence');
  }

  /**
   * 读取本地配置
   * 记录不存在、损坏或版本不一致时返回 null
   */
  read(): Record<string, unknown> | null {
    let stored: string | null;
    try {
      stored = this.storage.getItem(this.storageKey);
    } catch (error) {
      this.logger.warn(
        '读取本地配置失败:',
        ConfigError.from(error, ConfigErrorType.STORAGE_ERROR).message
      );
      return null;
    }

    if (!stored) {
      return null;
    }

    let record: unknown;
    try {
      record = JSON.parse(stored);
    } catch (error) {
      const parseError = ConfigError.from(error, ConfigErrorType.PARSE_ERROR);
      this.logger.warn('读取本地配置失败:', parseError.message);
      return null;
    }

    if (!isPlainObject(record) || !isPlainObject(record.data)) {
      const formatError = new ConfigError(
        ConfigErrorType.INVALID_FORMAT_ERROR,
        '记录格式不正确'
      );
      this.logger.warn('读取本地配置失败:', formatError.message);
      return null;
    }

    if (record.version !== this.version) {
      const mismatch = new ConfigError(
        ConfigErrorType.VERSION_MISMATCH_ERROR,
        `${String(record.version)} != ${this.version}`
      );
      this.logger.debug('本地配置版本不一致，已忽略:', mismatch.message);
      return null;
    }

    return record.data;
  }

  /**
   * 保存配置
   * @returns 是否保存成功
   */
  write(config: AppConfiguration): boolean {
    const record: PersistedConfigRecord = {
      version: this.version,
      data: config,
      timestamp: Date.now(),
    };

    try {
      this.storage.setItem(this.storageKey, JSON.stringify(record));
      return true;
    } catch (error) {
      this.logger.error(
        '保存配置失败:',
        ConfigError.from(error, ConfigErrorType.STORAGE_ERROR).message
      );
      return false;
    }
  }
}

export default ConfigPersistence;
