/**
 * 错误模块导出
 */

export { ConfigError } from './ConfigError';
export { ConfigErrorType } from '../../types/errors';
