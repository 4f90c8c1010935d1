/**
 * 词库加载服务
 *
 * 读取带表头的 CSV，列名不区分大小写，支持别名（english/eng/en、spanish/esp/es）。
 * 每行去空白并转小写，缺任一字段的行跳过；最终词库为空视为致命错误
 */

import { promises as fs } from 'fs';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import type { VocabularyPair } from '@lexiloop/shared';
import { serviceLogger } from '../logger';
import { Vocabulary } from '../srs';

/** 英文列别名（小写，按优先级） */
export const ENGLISH_COLUMNS = ['english', 'eng', 'en'] as const;

/** 西班牙文列别名（小写，按优先级） */
export const SPANISH_COLUMNS = ['spanish', 'esp', 'es'] as const;

export type VocabularyErrorCode = 'VOCABULARY_NOT_FOUND' | 'VOCABULARY_INVALID' | 'VOCABULARY_EMPTY';

/**
 * 词库加载错误（致命，不启动会话）
 */
export class VocabularyLoadError extends Error {
  constructor(
    message: string,
    public readonly code: VocabularyErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'VocabularyLoadError';
  }
}

const CsvRowsSchema = z.array(z.record(z.unknown()));

function pickColumn(row: Map<string, unknown>, aliases: readonly string[]): string | undefined {
  for (const alias of aliases) {
    const value = row.get(alias);
    if (typeof value === 'string' && value.trim().length > 0) {
      return value;
    }
  }
  return undefined;
}

/** 列名转小写（同名列取第一个） */
function normalizeRow(row: Record<string, unknown>): Map<string, unknown> {
  const normalized = new Map<string, unknown>();
  for (const [key, value] of Object.entries(row)) {
    const column = key.trim().toLowerCase();
    if (!normalized.has(column)) {
      normalized.set(column, value);
    }
  }
  return normalized;
}

/**
 * 解析 CSV 内容为词汇对（保持原始行序，不去重）
 */
export function parseVocabularyCsv(content: string): VocabularyPair[] {
  let rows: z.infer<typeof CsvRowsSchema>;
  try {
    const parsed: unknown = parse(content, {
      columns: true,
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
    });
    rows = CsvRowsSchema.parse(parsed);
  } catch (error) {
    throw new VocabularyLoadError(
      `Vocabulary file is not valid CSV: ${error instanceof Error ? error.message : String(error)}`,
      'VOCABULARY_INVALID',
      { cause: error },
    );
  }

  const pairs: VocabularyPair[] = [];
  for (const raw of rows) {
    const row = normalizeRow(raw);
    const english = pickColumn(row, ENGLISH_COLUMNS)?.trim().toLowerCase();
    const spanish = pickColumn(row, SPANISH_COLUMNS)?.trim().toLowerCase();
    if (english && spanish) {
      pairs.push({ english, spanish });
    }
  }
  return pairs;
}

/**
 * 从文件加载词库
 *
 * @throws VocabularyLoadError 文件不存在、格式错误或没有有效词汇对
 */
export async function loadVocabulary(filePath: string): Promise<Vocabulary> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new VocabularyLoadError(`Vocabulary file '${filePath}' not found.`, 'VOCABULARY_NOT_FOUND', {
      cause: error,
    });
  }

  const pairs = parseVocabularyCsv(content);
  if (pairs.length === 0) {
    throw new VocabularyLoadError('No valid vocabulary pairs found.', 'VOCABULARY_EMPTY');
  }

  const vocabulary = new Vocabulary(pairs);
  serviceLogger.info(
    { file: filePath, rows: pairs.length, words: vocabulary.size },
    `[VocabularyLoader] 已加载 ${vocabulary.size} 个词汇对`,
  );
  return vocabulary;
}
