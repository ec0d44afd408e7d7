/**
 * 错误类型定义
 */

/**
 * 配置错误类型
 */
export enum ConfigErrorType {
  // 存储相关错误
  STORAGE_ERROR = 'storage_error',
  QUOTA_EXCEEDED_ERROR = 'quota_exceeded_error',
  STORAGE_UNAVAILABLE_ERROR = 'storage_unavailable_error',

  // 数据相关错误
  PARSE_ERROR = 'parse_error',
  VERSION_MISMATCH_ERROR = 'version_mismatch_error',
  INVALID_FORMAT_ERROR = 'invalid_format_error',

  // 网络相关错误
  NETWORK_ERROR = 'network_error',
  TIMEOUT_ERROR = 'timeout_error',

  UNKNOWN_ERROR = 'unknown_error',
}
