/**
 * ConnectionTester - API连通性测试
 * 单次、限时的 GET 请求，不重试
 */

import { ConfigErrorType, ConnectionTestResult } from '../types';
import { CONNECTION_TEST } from '../utils/constants';
import { Logger } from '../utils/Logger';

import { ConfigError } from './error';

export type FetchFunction = (
  input: string,
  init?: RequestInit
) => Promise<Response>;

export interface ConnectionTesterOptions {
  /** 超时时间（毫秒） */
  timeout?: number;
  /** 自定义请求函数，默认使用全局 fetch */
  fetch?: FetchFunction;
  logger?: Logger;
}

export class ConnectionTester {
  private timeout: number;
  private fetchFn: FetchFunction;
  private logger: Logger;

  constructor(options: ConnectionTesterOptions = {}) {
    this.timeout = options.timeout ?? CONNECTION_TEST.TIMEOUT;
    // 调用时再取全局 fetch
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = options.logger ?? new Logger('ConnectionTester');
  }

  /**
   * 测试地址是否可达
   * 收到任何HTTP响应都视为确定结果；网络失败或超时 status 为 0
   * @param url 测试地址
   */
  async test(url: string): Promise<ConnectionTestResult> {
    const controller = new AbortController();
    let timeoutId: ReturnType<typeof setTimeout> | undefined;

    const timeoutPromise = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => {
        reject(
          new ConfigError(
            ConfigErrorType.TIMEOUT_ERROR,
            `连接超时（${this.timeout}ms）`
          )
        );
        controller.abort();
      }, this.timeout);
    });

    try {
      const response = await Promise.race([
        this.fetchFn(url, { method: 'GET', signal: controller.signal }),
        timeoutPromise,
      ]);

      this.logger.debug(`连接测试完成: ${url} -> ${response.status}`);

      return {
        success: response.ok,
        status: response.status,
        message: response.ok ? '连接成功' : `连接失败（HTTP ${response.status}）`,
      };
    } catch (error) {
      const failure =
        error instanceof ConfigError
          ? error
          : ConfigError.from(
              error,
              ConfigErrorType.NETWORK_ERROR,
              error instanceof Error && error.message
                ? error.message
                : '网络连接失败'
            );

      this.logger.warn(`连接测试失败: ${url}`, failure.message);

      return {
        success: false,
        status: 0,
        message: failure.message,
      };
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

export default ConnectionTester;
