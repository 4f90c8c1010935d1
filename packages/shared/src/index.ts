/**
 * @lexiloop/shared
 *
 * 前后端共享的类型、常量与 Zod Schema
 */

export * from './types';
export * from './constants';
export * from './schemas';
