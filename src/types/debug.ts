/**
 * 日志相关类型定义
 */

/**
 * 日志级别枚举
 * 提供数值和字符串双重表示
 */
export enum LogLevel {
  NONE = 0,
  ERROR = 1,
  WARN = 2,
  INFO = 3,
  DEBUG = 4,
  ALL = 5,
}

// 日志级别字符串映射
export const LogLevelString: Record<LogLevel, LogLevelStringType> = {
  [LogLevel.NONE]: 'none',
  [LogLevel.ERROR]: 'error',
  [LogLevel.WARN]: 'warn',
  [LogLevel.INFO]: 'info',
  [LogLevel.DEBUG]: 'debug',
  [LogLevel.ALL]: 'all',
};

// 日志级别字符串反向映射
export const LogLevelFromString: Record<LogLevelStringType, LogLevel> = {
  none: LogLevel.NONE,
  error: LogLevel.ERROR,
  warn: LogLevel.WARN,
  info: LogLevel.INFO,
  debug: LogLevel.DEBUG,
  all: LogLevel.ALL,
};

/**
 * 日志级别字符串类型
 */
export type LogLevelStringType =
  | 'none'
  | 'error'
  | 'warn'
  | 'info'
  | 'debug'
  | 'all';

function isLogLevelString(level: string): level is LogLevelStringType {
  return Object.prototype.hasOwnProperty.call(LogLevelFromString, level);
}

/**
 * 将字符串日志级别转换为枚举值
 * @param level 日志级别字符串
 * @returns 对应的枚举值，无法识别时返回INFO
 */
export function logLevelFromString(level: string): LogLevel {
  const normalized = level.toLowerCase();
  return isLogLevelString(normalized)
    ? LogLevelFromString[normalized]
    : LogLevel.INFO;
}
