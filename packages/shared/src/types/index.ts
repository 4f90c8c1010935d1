/**
 * Shared Types - 类型定义导出
 */

// 词汇
export * from './vocabulary';

// 学习进度
export * from './progress';

// 个性化模型
export * from './personalization';

// 会话日志
export * from './session';
