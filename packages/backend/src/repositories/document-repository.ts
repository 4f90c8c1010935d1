/**
 * 文档仓库接口
 *
 * 每类持久化状态（进度、会话计数、个性化模型、会话日志）对应一个文档，
 * 调度核心只关心文档内容的形状，读写方式由实现决定
 */

export type DocumentName = 'progress' | 'session-counter' | 'personalization-model' | 'session-log';

export interface DocumentRepository {
  /**
   * 读取文档
   * @returns 文档内容；文档不存在时返回 null
   * @throws DocumentReadError 文档存在但无法读取或解析
   */
  read(name: DocumentName): Promise<unknown>;

  /**
   * 写入文档（整体覆盖）
   */
  write(name: DocumentName, data: unknown): Promise<void>;
}

/**
 * 文档读取错误（文件损坏、无权限等）
 */
export class DocumentReadError extends Error {
  code = 'DOCUMENT_UNREADABLE';

  constructor(
    public readonly document: DocumentName,
    cause: unknown,
  ) {
    super(`Failed to read document "${document}": ${cause instanceof Error ? cause.message : String(cause)}`, {
      cause,
    });
    this.name = 'DocumentReadError';
  }
}
