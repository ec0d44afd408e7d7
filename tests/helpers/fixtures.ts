/**
 * 测试数据构造
 */
import { CONFIG_STORAGE_KEY, CONFIG_VERSION } from '../../src/utils/constants';
import type { IConfigStorage, LocationLike } from '../../src/types';

/**
 * 构造页面地址，默认为本地开发服务器
 */
export function createLocation(overrides: Partial<LocationLike> = {}): LocationLike {
  return {
    protocol: 'http:',
    hostname: 'localhost',
    port: '8100',
    search: '',
    ...overrides,
  };
}

/**
 * 写入一条持久化配置记录
 */
export function seedPersistedConfig(
  storage: IConfigStorage,
  data: Record<string, unknown>,
  version: string = CONFIG_VERSION
): void {
  storage.setItem(
    CONFIG_STORAGE_KEY,
    JSON.stringify({ version, data, timestamp: 1 })
  );
}
