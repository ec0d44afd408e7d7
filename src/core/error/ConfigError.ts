/**
 * 配置错误类
 * 配置模块内部使用的带类型错误，所有外部输入相关的错误都在模块内降级处理
 */
import { ConfigErrorType } from '../../types/errors';

export class ConfigError extends Error {
  /**
   * @param type 错误类型
   * @param message 错误消息
   * @param originalError 原始错误对象
   */
  constructor(
    public readonly type: ConfigErrorType,
    message: string,
    public readonly originalError?: unknown
  ) {
    super(message);

    this.name = 'ConfigError';

    // 捕获错误堆栈
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConfigError);
    }
  }

  /**
   * 将任意错误包装为 ConfigError
   * 已经是 ConfigError 的直接返回
   */
  static from(
    error: unknown,
    type: ConfigErrorType = ConfigErrorType.UNKNOWN_ERROR,
    message?: string
  ): ConfigError {
    if (error instanceof ConfigError) {
      return error;
    }
    const detail = error instanceof Error ? error.message : String(error);
    return new ConfigError(type, message ?? detail, error);
  }
}

export default ConfigError;
