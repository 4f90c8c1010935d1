/**
 * 学习上下文
 *
 * 持有一次运行期间的全部学习状态：词库、进度存储、个性化模型、会话日志和会话计数。
 * 状态只通过 load/save 与文档仓库交换，调度核心不直接接触持久化
 */

import {
  createDefaultPersonalizationDocument,
  PersonalizationModelDocumentSchema,
  ProgressDocumentSchema,
  SessionCounterDocumentSchema,
  SessionLogDocumentSchema,
} from '@lexiloop/shared';
import type { z } from 'zod';
import { storageLogger } from '../logger';
import { DocumentReadError, type DocumentName, type DocumentRepository } from '../repositories';
import { PersonalizationModel, ProgressStore, SessionLog, type Vocabulary } from '../srs';

export interface SaveResult {
  persisted: boolean;
  /** 持久化失败时给用户的提示 */
  warning?: string;
}

/**
 * 读取并校验单个文档
 *
 * 文档不存在时静默使用默认值；无法读取（损坏、无权限）时记录警告后使用默认值
 */
async function readDocument<T>(
  repository: DocumentRepository,
  name: DocumentName,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  fallback: () => T,
): Promise<T> {
  let raw: unknown;
  try {
    raw = await repository.read(name);
  } catch (error) {
    if (error instanceof DocumentReadError) {
      storageLogger.warn({ err: error, document: name }, '[LearningContext] 文档已损坏，使用默认值');
      return fallback();
    }
    throw error;
  }

  if (raw === null) {
    return fallback();
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    storageLogger.warn(
      { document: name, issues: result.error.issues.length },
      '[LearningContext] 文档结构不合法，使用默认值',
    );
    return fallback();
  }
  return result.data;
}

export class LearningContext {
  private constructor(
    private readonly repository: DocumentRepository,
    readonly vocabulary: Vocabulary,
    readonly progressStore: ProgressStore,
    readonly model: PersonalizationModel,
    readonly sessionLog: SessionLog,
    private counter: number,
  ) {}

  static async load(repository: DocumentRepository, vocabulary: Vocabulary): Promise<LearningContext> {
    const progress = await readDocument(repository, 'progress', ProgressDocumentSchema, () => ({}));
    const counter = await readDocument(
      repository,
      'session-counter',
      SessionCounterDocumentSchema,
      () => ({ sessionCounter: 0 }),
    );
    const model = await readDocument(
      repository,
      'personalization-model',
      PersonalizationModelDocumentSchema,
      createDefaultPersonalizationDocument,
    );
    const log = await readDocument(repository, 'session-log', SessionLogDocumentSchema, () => []);

    const context = new LearningContext(
      repository,
      vocabulary,
      ProgressStore.fromDocument(vocabulary, progress),
      new PersonalizationModel(model),
      new SessionLog(log),
      counter.sessionCounter,
    );

    storageLogger.info(
      {
        words: vocabulary.size,
        sessionCounter: context.counter,
        sessionLogSize: context.sessionLog.size,
      },
      '[LearningContext] 学习状态已加载',
    );
    return context;
  }

  /** 已开始过的会话数（下一次会话序号 = 该值 + 1） */
  get sessionCounter(): number {
    return this.counter;
  }

  /**
   * 开始新会话：计数递增并返回新会话序号
   */
  beginSession(): number {
    this.counter += 1;
    return this.counter;
  }

  /**
   * 写回全部文档
   *
   * 写入失败不抛出：内存中的状态保持不变，结果中带上提示
   */
  async save(): Promise<SaveResult> {
    try {
      await this.repository.write('progress', this.progressStore.toDocument());
      await this.repository.write('session-counter', { sessionCounter: this.counter });
      await this.repository.write('personalization-model', this.model.toDocument());
      await this.repository.write('session-log', this.sessionLog.toDocument());
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      storageLogger.warn({ err: error }, '[LearningContext] 学习状态保存失败');
      return {
        persisted: false,
        warning: `Progress could not be saved: ${reason}`,
      };
    }

    storageLogger.debug({ sessionCounter: this.counter }, '[LearningContext] 学习状态已保存');
    return { persisted: true };
  }
}
