/**
 * MemoryStorage - 内存存储适配器
 * 用于非浏览器宿主或浏览器存储不可用的情况
 * 注意：数据不会跨会话保留
 */

import { IConfigStorage } from '../../types';

export class MemoryStorage implements IConfigStorage {
  private store = new Map<string, string>();

  getItem(key: string): string | null {
    return this.store.get(key) ?? null;
  }

  setItem(key: string, value: string): void {
    this.store.set(key, value);
  }

  removeItem(key: string): void {
    this.store.delete(key);
  }

  isAvailable(): boolean {
    return true;
  }

  /**
   * 清空所有数据
   */
  clear(): void {
    this.store.clear();
  }
}

export default MemoryStorage;
