/**
 * 类型定义导出文件
 */

export * from './config';
export * from './debug';
export * from './errors';
export * from './storage';
