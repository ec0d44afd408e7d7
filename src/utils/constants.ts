/**
 * 配置常量定义
 */

import type {
  AppConfiguration,
  ApiBaseDetectorRules,
  LocationLike,
} from '../types';

/**
 * 本地存储键名
 */
export const CONFIG_STORAGE_KEY = 'AI_PINGCE_CONFIG';

/**
 * 配置结构版本，持久化记录版本不一致时整体丢弃
 */
export const CONFIG_VERSION = '1.0.0';

/**
 * 默认配置
 */
export const DEFAULT_CONFIG: Readonly<AppConfiguration> = {
  apiBase: '',
  apiTimeout: 30000,
  debugMode: false,
  enableMock: false,
  pagination: {
    pageSize: 20,
    maxPageSize: 100,
  },
  autoRefreshInterval: 0,
};

/**
 * URL参数名
 */
export const URL_PARAMS = {
  API_BASE: 'api_base',
  DEBUG: 'debug',
  MOCK: 'mock',
} as const;

/**
 * API地址探测规则
 */
export const DEFAULT_DETECTOR_RULES: Readonly<ApiBaseDetectorRules> = {
  loopbackHosts: ['localhost', '127.0.0.1'],
  fixedHosts: {
    // 内网服务器
    '10.1.2.198': 'http://10.1.2.198:5000/api',
  },
  defaultPort: '5000',
  apiPath: '/api',
};

/**
 * 非浏览器宿主下使用的页面地址
 */
export const FALLBACK_LOCATION: Readonly<LocationLike> = {
  protocol: 'http:',
  hostname: 'localhost',
  port: '',
  search: '',
};

/**
 * 连通性测试
 */
export const CONNECTION_TEST = {
  ENDPOINT: '/projects',
  TIMEOUT: 5000,
} as const;
