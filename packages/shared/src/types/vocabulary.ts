/**
 * 词汇相关类型定义
 */

/**
 * 单个词汇对（英文 → 西班牙文）
 *
 * english 为规范化后的键（去空白、小写），所有学习进度都以它为键
 */
export interface VocabularyPair {
  english: string;
  spanish: string;
}
