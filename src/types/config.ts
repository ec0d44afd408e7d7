/**
 * 配置相关类型定义
 */

/**
 * 分页配置
 */
export interface PaginationConfig {
  pageSize: number;
  maxPageSize: number;
  [key: string]: unknown;
}

/**
 * 应用配置
 * 已知选项带类型，未知选项原样透传
 */
export interface AppConfiguration {
  /** API基础地址，解析后不为空 */
  apiBase: string;
  /** API超时（毫秒） */
  apiTimeout: number;
  /** 调试模式 */
  debugMode: boolean;
  /** 预留开关，当前不影响任何行为 */
  enableMock: boolean;
  pagination: PaginationConfig;
  /** 自动刷新间隔（毫秒），0 表示关闭 */
  autoRefreshInterval: number;
  [key: string]: unknown;
}

/**
 * 已知的顶层配置项
 */
export type KnownConfigKey =
  | 'apiBase'
  | 'apiTimeout'
  | 'debugMode'
  | 'enableMock'
  | 'pagination'
  | 'autoRefreshInterval';

/**
 * 配置补丁，用于批量设置与各配置层的合并
 */
export interface ConfigPatch {
  apiBase?: string;
  apiTimeout?: number;
  debugMode?: boolean;
  enableMock?: boolean;
  pagination?: Partial<PaginationConfig>;
  autoRefreshInterval?: number;
  [key: string]: unknown;
}

/**
 * 本地持久化记录
 */
export interface PersistedConfigRecord {
  version: string;
  data: AppConfiguration;
  timestamp: number;
}

/**
 * 导出格式
 */
export interface ExportedConfig {
  version: string;
  config: AppConfiguration;
  exportedAt: string;
}

/**
 * 导入结果
 */
export interface ImportResult {
  success: boolean;
  message?: string;
}

/**
 * 连接测试结果
 * 网络层失败时 status 为 0
 */
export interface ConnectionTestResult {
  success: boolean;
  status: number;
  message: string;
}

/**
 * 配置变更观察者
 */
export type ConfigObserver = (config: AppConfiguration) => void;

/**
 * 页面地址信息，与 window.location 的对应字段一致
 */
export interface LocationLike {
  protocol: string;
  hostname: string;
  port: string;
  search: string;
}

/**
 * API地址探测规则
 */
export interface ApiBaseDetectorRules {
  /** 本地回环主机名，复用页面自身的协议和端口 */
  loopbackHosts: string[];
  /** 固定主机名到API地址的映射 */
  fixedHosts: Record<string, string>;
  /** 默认后端端口 */
  defaultPort: string;
  /** API路径前缀 */
  apiPath: string;
}
