/**
 * Logger - 日志工具类
 * 提供按模块分组、分级别的日志记录
 */

import {
  LogLevel,
  LogLevelString,
  LogLevelStringType,
  logLevelFromString,
} from '../types/debug';

// 日志配置接口
export interface LoggerConfig {
  level?: LogLevel | LogLevelStringType;
  includeTimestamp?: boolean; // 是否包含时间戳
  colorize?: boolean; // 是否着色（仅非浏览器环境）
  enableConsole?: boolean; // 是否输出到控制台
}

interface ResolvedGlobalConfig {
  level: LogLevel;
  includeTimestamp: boolean;
  colorize: boolean;
  enableConsole: boolean;
}

// 全局日志配置
const globalConfig: ResolvedGlobalConfig = {
  level: LogLevel.INFO,
  includeTimestamp: true,
  colorize: false,
  enableConsole: true,
};

function toLogLevel(level: LogLevel | LogLevelStringType): LogLevel {
  return typeof level === 'string' ? logLevelFromString(level) : level;
}

/**
 * Logger类 - 提供按模块分组的日志功能
 */
export class Logger {
  private moduleName: string;
  private config: LoggerConfig;
  // 未设置时跟随全局级别
  private logLevel: LogLevel | undefined;

  /**
   * 创建日志记录器
   * @param moduleName 模块名称
   * @param config 日志配置
   */
  constructor(moduleName: string, config: LoggerConfig = {}) {
    this.moduleName = moduleName;
    this.config = { ...config };
    this.logLevel =
      config.level !== undefined ? toLogLevel(config.level) : undefined;
  }

  /**
   * 设置全局日志配置
   */
  public static setGlobalConfig(config: LoggerConfig): void {
    if (config.level !== undefined) {
      globalConfig.level = toLogLevel(config.level);
    }
    if (config.includeTimestamp !== undefined) {
      globalConfig.includeTimestamp = config.includeTimestamp;
    }
    if (config.colorize !== undefined) {
      globalConfig.colorize = config.colorize;
    }
    if (config.enableConsole !== undefined) {
      globalConfig.enableConsole = config.enableConsole;
    }
  }

  public debug(message: string, ...data: unknown[]): void {
    this.log(LogLevel.DEBUG, message, data);
  }

  public info(message: string, ...data: unknown[]): void {
    this.log(LogLevel.INFO, message, data);
  }

  public warn(message: string, ...data: unknown[]): void {
    this.log(LogLevel.WARN, message, data);
  }

  public error(message: string, ...data: unknown[]): void {
    this.log(LogLevel.ERROR, message, data);
  }

  /**
   * 记录日志
   * @param level 日志级别
   * @param message 日志消息
   * @param data 附加数据
   */
  private log(level: LogLevel, message: string, data: unknown[]): void {
    if (level > this.getLevel() || level === LogLevel.NONE) {
      return;
    }

    const enableConsole =
      this.config.enableConsole ?? globalConfig.enableConsole;
    if (!enableConsole || typeof console === 'undefined') {
      return;
    }

    const formattedMessage = `${this.getPrefix(level, new Date())} ${message}`;

    switch (level) {
      case LogLevel.DEBUG:
        console.debug(formattedMessage, ...data);
        break;
      case LogLevel.INFO:
        console.info(formattedMessage, ...data);
        break;
      case LogLevel.WARN:
        console.warn(formattedMessage, ...data);
        break;
      case LogLevel.ERROR:
        console.error(formattedMessage, ...data);
        break;
    }
  }

  /**
   * 获取日志前缀
   * @returns 形如 "[时间] [级别] [模块]" 的前缀
   */
  private getPrefix(level: LogLevel, timestamp: Date): string {
    const parts: string[] = [];

    if (this.config.includeTimestamp ?? globalConfig.includeTimestamp) {
      parts.push(`[${timestamp.toISOString()}]`);
    }

    const levelStr = LogLevelString[level];
    if (this.config.colorize ?? globalConfig.colorize) {
      parts.push(this.colorizeLevel(levelStr, level));
    } else {
      parts.push(`[${levelStr}]`);
    }

    parts.push(`[${this.moduleName}]`);

    return parts.join(' ');
  }

  /**
   * 给日志级别添加颜色
   * 浏览器控制台本身按级别着色，只在非浏览器环境添加
   */
  private colorizeLevel(levelStr: string, level: LogLevel): string {
    if (typeof window !== 'undefined') {
      return `[${levelStr}]`;
    }
    switch (level) {
      case LogLevel.DEBUG:
        return `\x1b[34m[${levelStr}]\x1b[0m`; // 蓝色
      case LogLevel.INFO:
        return `\x1b[32m[${levelStr}]\x1b[0m`; // 绿色
      case LogLevel.WARN:
        return `\x1b[33m[${levelStr}]\x1b[0m`; // 黄色
      case LogLevel.ERROR:
        return `\x1b[31m[${levelStr}]\x1b[0m`; // 红色
      default:
        return `[${levelStr}]`;
    }
  }

  /**
   * 获取当前生效的日志级别
   */
  getLevel(): LogLevel {
    return this.logLevel ?? globalConfig.level;
  }

  /**
   * 设置日志级别
   */
  setLevel(level: LogLevel | LogLevelStringType): void {
    this.logLevel = toLogLevel(level);
  }
}

export default Logger;
