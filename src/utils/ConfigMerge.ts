/**
 * ConfigMerge - 配置合并工具
 * 提供配置层的按键合并、深拷贝与点路径读写
 */

import type { AppConfiguration } from '../types';

import { DEFAULT_CONFIG } from './constants';

function hasOwn(target: Record<string, unknown>, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(target, key);
}

/**
 * 判断是否为普通对象
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * 深拷贝普通对象与数组，其余值原样返回
 */
export function cloneValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(cloneValue);
  }
  if (isPlainObject(value)) {
    const copy: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      copy[key] = cloneValue(item);
    }
    return copy;
  }
  return value;
}

/**
 * 拷贝整份配置，修改副本不会影响原配置
 */
export function cloneConfig(config: Readonly<AppConfiguration>): AppConfiguration {
  const copy: AppConfiguration = { ...config };
  for (const [key, value] of Object.entries(copy)) {
    copy[key] = cloneValue(value);
  }
  return copy;
}

/**
 * 创建一份新的默认配置
 */
export function createDefaultConfig(): AppConfiguration {
  return cloneConfig(DEFAULT_CONFIG);
}

/**
 * 将补丁按键合并到目标对象
 * 两侧都是普通对象时逐键递归合并，undefined 值跳过
 */
export function mergeInto(
  target: Record<string, unknown>,
  patch: Record<string, unknown>
): void {
  for (const [key, value] of Object.entries(patch)) {
    if (value === undefined) {
      continue;
    }
    const current = target[key];
    if (isPlainObject(current) && isPlainObject(value)) {
      const nested = { ...current };
      mergeInto(nested, value);
      target[key] = nested;
    } else {
      target[key] = cloneValue(value);
    }
  }
}

/**
 * 依次合并多个配置层，后面的层优先
 * @param base 基础配置（不会被修改）
 * @param layers 覆盖层
 */
export function mergeConfig(
  base: Readonly<AppConfiguration>,
  ...layers: Array<Record<string, unknown> | null | undefined>
): AppConfiguration {
  const result = cloneConfig(base);
  for (const layer of layers) {
    if (layer) {
      mergeInto(result, layer);
    }
  }
  return result;
}

/**
 * 按键名或点路径读取值
 * 顶层存在同名键时优先返回顶层值
 */
export function getPath(source: Record<string, unknown>, path: string): unknown {
  if (hasOwn(source, path)) {
    return source[path];
  }

  let current: unknown = source;
  for (const segment of path.split('.')) {
    if (!isPlainObject(current) || !hasOwn(current, segment)) {
      return undefined;
    }
    current = current[segment];
  }
  return current;
}

/**
 * 按键名或点路径写入值，中间层不存在时自动创建
 */
export function setPath(
  target: Record<string, unknown>,
  path: string,
  value: unknown
): void {
  if (!path.includes('.') || hasOwn(target, path)) {
    mergeInto(target, { [path]: value });
    return;
  }

  const segments = path.split('.');
  const last = segments.pop() ?? path;
  let parent = target;
  for (const segment of segments) {
    const next = parent[segment];
    if (isPlainObject(next)) {
      const copy = { ...next };
      parent[segment] = copy;
      parent = copy;
    } else {
      const created: Record<string, unknown> = {};
      parent[segment] = created;
      parent = created;
    }
  }
  mergeInto(parent, { [last]: value });
}
