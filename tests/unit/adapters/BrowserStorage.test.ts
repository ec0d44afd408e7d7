/**
 * @vitest-environment jsdom
 */
import { describe, it, expect, vi } from 'vitest';

import { BrowserStorage } from '../../../src/adapters/storage';
import { ConfigError, ConfigErrorType } from '../../../src/core/error';

describe('BrowserStorage', () => {
  it('should store values in localStorage with the key prefix', () => {
    const storage = new BrowserStorage({ keyPrefix: 'app_' });

    storage.setItem('theme', 'dark');

    expect(localStorage.getItem('app_theme')).toBe('dark');
    expect(storage.getItem('theme')).toBe('dark');
  });

  it('should return null for missing keys', () => {
    expect(new BrowserStorage().getItem('missing')).toBeNull();
  });

  it('should remove values', () => {
    const storage = new BrowserStorage();
    storage.setItem('theme', 'dark');

    storage.removeItem('theme');

    expect(localStorage.getItem('theme')).toBeNull();
  });

  it('should support sessionStorage', () => {
    const storage = new BrowserStorage({ storageType: 'sessionStorage' });

    storage.setItem('token', 'test-token');

    expect(sessionStorage.getItem('token')).toBe('test-token');
    expect(localStorage.getItem('token')).toBeNull();
    sessionStorage.clear();
  });

  it('should report availability', () => {
    expect(new BrowserStorage().isAvailable()).toBe(true);
  });

  it('should translate quota errors', () => {
    vi.spyOn(Storage.prototype, 'setItem').mockImplementation(() => {
      const quotaError = new Error('quota');
      quotaError.name = 'QuotaExceededError';
      throw quotaError;
    });
    const storage = new BrowserStorage();

    let caught: unknown;
    try {
      storage.setItem('config', 'value');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({
      type: ConfigErrorType.QUOTA_EXCEEDED_ERROR,
      message: '存储空间已满',
    });
  });

  it('should wrap other storage failures', () => {
    vi.spyOn(Storage.prototype, 'getItem').mockImplementation(() => {
      throw new Error('denied');
    });

    expect(() => new BrowserStorage().getItem('config')).toThrow('获取数据失败');
  });
});
