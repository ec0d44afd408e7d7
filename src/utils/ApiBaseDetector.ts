/**
 * ApiBaseDetector - API地址智能检测
 * 按规则顺序匹配，先命中者生效
 */

import type { ApiBaseDetectorRules, LocationLike } from '../types';

import { DEFAULT_DETECTOR_RULES, FALLBACK_LOCATION } from './constants';

/**
 * 根据页面地址推导API基础地址
 * @param location 页面地址
 * @param rules 探测规则
 * @returns 非空的API基础地址
 */
export function detectApiBase(
  location: LocationLike,
  rules: Readonly<ApiBaseDetectorRules> = DEFAULT_DETECTOR_RULES
): string {
  // 没有主机名时（file:// 页面或非浏览器宿主）按本地开发环境处理
  const page = location.hostname ? location : FALLBACK_LOCATION;
  const { protocol, hostname } = page;

  // 本地开发环境 - 沿用页面自身的协议和端口，避免跨域
  if (rules.loopbackHosts.includes(hostname)) {
    return `${protocol}//${hostname}:${page.port || rules.defaultPort}${rules.apiPath}`;
  }

  const fixed = Object.prototype.hasOwnProperty.call(rules.fixedHosts, hostname)
    ? rules.fixedHosts[hostname]
    : undefined;
  if (fixed) {
    return fixed;
  }

  // 其他环境：同服务器的后端端口
  return `${protocol}//${hostname}:${rules.defaultPort}${rules.apiPath}`;
}
