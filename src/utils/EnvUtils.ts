/**
 * EnvUtils - 运行环境工具
 * 统一访问浏览器全局对象，非浏览器宿主下返回可用的替代值
 */

import type { LocationLike, WebStorageType } from '../types';

import { FALLBACK_LOCATION } from './constants';

export class EnvUtils {
  /**
   * 是否运行在浏览器环境
   */
  static isBrowser(): boolean {
    return typeof window !== 'undefined' && typeof document !== 'undefined';
  }

  /**
   * 获取当前页面地址
   * 非浏览器宿主下返回 http://localhost
   */
  static getLocation(): LocationLike {
    if (typeof location === 'undefined') {
      return { ...FALLBACK_LOCATION };
    }
    return {
      protocol: location.protocol,
      hostname: location.hostname,
      port: location.port,
      search: location.search,
    };
  }

  /**
   * 获取 Web Storage 实例
   * 隐私模式等情况下访问会抛错，此时返回 null
   */
  static getWebStorage(type: WebStorageType): Storage | null {
    if (typeof window === 'undefined') {
      return null;
    }
    try {
      return window[type] ?? null;
    } catch {
      return null;
    }
  }
}

export default EnvUtils;
