/**
 * 存储相关类型定义
 */

/**
 * 配置存储接口
 * 与 Web Storage 的同步语义保持一致，保证 set/reset/import 在返回前完成持久化
 */
export interface IConfigStorage {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
  removeItem(key: string): void;

  /**
   * 检查存储是否可用
   */
  isAvailable(): boolean;
}

/**
 * Web Storage 类型
 */
export type WebStorageType = 'localStorage' | 'sessionStorage';
