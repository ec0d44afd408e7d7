/**
 * UrlParamsReader - URL参数配置读取
 * 只读取已识别的参数，不会回写URL
 */

import type { ConfigPatch } from '../types';

import { URL_PARAMS } from './constants';
import { Logger } from './Logger';

const logger = new Logger('UrlParamsReader');

/**
 * 从查询字符串读取配置
 * @param search 查询字符串，例如 location.search
 * @returns 识别到的配置项，没有任何识别参数时返回 null
 */
export function readConfigFromSearch(search: string): ConfigPatch | null {
  let params: URLSearchParams;
  try {
    params = new URLSearchParams(search);
  } catch (error) {
    logger.warn('读取URL配置失败:', error);
    return null;
  }

  const urlConfig: ConfigPatch = {};

  const apiBase = params.get(URL_PARAMS.API_BASE);
  if (apiBase !== null) {
    urlConfig.apiBase = apiBase;
  }

  // 只有字面量 "true" 视为开启
  const debug = params.get(URL_PARAMS.DEBUG);
  if (debug !== null) {
    urlConfig.debugMode = debug === 'true';
  }

  const mock = params.get(URL_PARAMS.MOCK);
  if (mock !== null) {
    urlConfig.enableMock = mock === 'true';
  }

  return Object.keys(urlConfig).length > 0 ? urlConfig : null;
}
