/**
 * BrowserStorage - 浏览器存储适配器
 * 基于 localStorage / sessionStorage 的同步存储
 */

import { ConfigError } from '../../core/error';
import { ConfigErrorType, IConfigStorage, WebStorageType } from '../../types';
import { EnvUtils } from '../../utils/EnvUtils';

/**
 * 浏览器存储适配器配置选项
 */
export interface BrowserStorageOptions {
  storageType?: WebStorageType;
  keyPrefix?: string;
}

/**
 * 浏览器本地存储适配器
 */
export class BrowserStorage implements IConfigStorage {
  private storageType: WebStorageType;
  private keyPrefix: string;

  /**
   * 创建浏览器存储适配器实例
   * @param options 配置选项
   */
  constructor(options: BrowserStorageOptions = {}) {
    this.storageType = options.storageType || 'localStorage';
    this.keyPrefix = options.keyPrefix || '';
  }

  /**
   * 获取格式化的键名
   * @param key 原始键名
   */
  private getKey(key: string): string {
    return `${this.keyPrefix}${key}`;
  }

  /**
   * 获取底层存储，不可用时抛出错误
   */
  private getStorage(): Storage {
    const storage = EnvUtils.getWebStorage(this.storageType);
    if (!storage) {
      throw new ConfigError(
        ConfigErrorType.STORAGE_UNAVAILABLE_ERROR,
        `${this.storageType} 不可用`
      );
    }
    return storage;
  }

  /**
   * 获取数据
   * @returns 存储的值，不存在则返回null
   */
  getItem(key: string): string | null {
    try {
      return this.getStorage().getItem(this.getKey(key));
    } catch (error) {
      throw ConfigError.from(error, ConfigErrorType.STORAGE_ERROR, '获取数据失败');
    }
  }

  /**
   * 存储数据
   */
  setItem(key: string, value: string): void {
    try {
      this.getStorage().setItem(this.getKey(key), value);
    } catch (error) {
      if (error instanceof Error && error.name === 'QuotaExceededError') {
        throw new ConfigError(
          ConfigErrorType.QUOTA_EXCEEDED_ERROR,
          '存储空间已满',
          error
        );
      }
      throw ConfigError.from(error, ConfigErrorType.STORAGE_ERROR, '存储数据失败');
    }
  }

  /**
   * 删除数据
   */
  removeItem(key: string): void {
    try {
      this.getStorage().removeItem(this.getKey(key));
    } catch (error) {
      throw ConfigError.from(error, ConfigErrorType.STORAGE_ERROR, '删除数据失败');
    }
  }

  /**
   * 检查存储是否可用
   */
  isAvailable(): boolean {
    try {
      const storage = this.getStorage();
      const testKey = this.getKey('__test__');
      storage.setItem(testKey, '1');
      storage.removeItem(testKey);
      return true;
    } catch {
      return false;
    }
  }
}

export default BrowserStorage;
