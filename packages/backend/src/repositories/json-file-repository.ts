/**
 * JSON 文件文档仓库
 *
 * 每个文档保存为数据目录下的一个 JSON 文件；
 * 写入先落到临时文件再 rename，避免半写入的文件
 */

import { promises as fs } from 'fs';
import path from 'path';
import { storageLogger } from '../logger';
import { DocumentReadError, type DocumentName, type DocumentRepository } from './document-repository';

/**
 * 文档 → 文件名
 */
export const DOCUMENT_FILES: Readonly<Record<DocumentName, string>> = {
  progress: 'vocab_progress.json',
  'session-counter': 'session_counter.json',
  'personalization-model': 'personalization_model.json',
  'session-log': 'session_log.json',
};

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class JsonFileDocumentRepository implements DocumentRepository {
  constructor(private readonly dataDir: string) {}

  pathOf(name: DocumentName): string {
    return path.join(this.dataDir, DOCUMENT_FILES[name]);
  }

  async read(name: DocumentName): Promise<unknown> {
    const filePath = this.pathOf(name);
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw new DocumentReadError(name, error);
    }

    try {
      return JSON.parse(content);
    } catch (error) {
      throw new DocumentReadError(name, error);
    }
  }

  async write(name: DocumentName, data: unknown): Promise<void> {
    const filePath = this.pathOf(name);
    const tempPath = `${filePath}.${process.pid}.tmp`;

    await fs.mkdir(this.dataDir, { recursive: true });
    await fs.writeFile(tempPath, `${JSON.stringify(data, null, 2)}\n`, 'utf-8');
    await fs.rename(tempPath, filePath);

    storageLogger.debug({ document: name, path: filePath }, '[JsonFileRepository] 文档已写入');
  }
}
