import { describe, it, expect } from 'vitest';

import { ConfigError, ConfigErrorType } from '../../../src/core/error';

describe('ConfigError', () => {
  it('should carry its type and message', () => {
    const error = new ConfigError(ConfigErrorType.TIMEOUT_ERROR, '连接超时');

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ConfigError');
    expect(error.type).toBe(ConfigErrorType.TIMEOUT_ERROR);
    expect(error.message).toBe('连接超时');
  });

  it('should wrap foreign errors', () => {
    const original = new SyntaxError('Unexpected token');

    const wrapped = ConfigError.from(original, ConfigErrorType.PARSE_ERROR);

    expect(wrapped.type).toBe(ConfigErrorType.PARSE_ERROR);
    expect(wrapped.message).toBe('Unexpected token');
    expect(wrapped.originalError).toBe(original);
  });

  it('should prefer an explicit message and stringify non-errors', () => {
    expect(ConfigError.from(new Error('raw'), undefined, '存储数据失败').message).toBe(
      '存储数据失败'
    );
    expect(ConfigError.from('offline').message).toBe('offline');
    expect(ConfigError.from('offline').type).toBe(ConfigErrorType.UNKNOWN_ERROR);
  });

  it('should return ConfigError instances unchanged', () => {
    const error = new ConfigError(ConfigErrorType.STORAGE_ERROR, 'failed');

    expect(ConfigError.from(error, ConfigErrorType.PARSE_ERROR)).toBe(error);
  });
});
