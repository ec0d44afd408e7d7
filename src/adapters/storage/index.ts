/**
 * 存储适配器导出文件
 */

import type { IConfigStorage } from '../../types';

import { BrowserStorage } from './BrowserStorage';
import { MemoryStorage } from './MemoryStorage';

export { BrowserStorage, MemoryStorage };
export type { BrowserStorageOptions } from './BrowserStorage';

/**
 * 创建默认存储
 * localStorage 可用时使用浏览器存储，否则退回内存存储
 */
export function createDefaultStorage(): IConfigStorage {
  const browserStorage = new BrowserStorage({ storageType: 'localStorage' });
  return browserStorage.isAvailable() ? browserStorage : new MemoryStorage();
}
