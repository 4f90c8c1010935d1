import type http from 'http';
import { createApp } from './app';
import { env } from './config/env';
import { startupLogger } from './logger';
import { JsonFileDocumentRepository } from './repositories';
import { LearningContext } from './services/learning-context';
import { LearningSessionService } from './services/learning-session.service';
import { loadVocabulary, VocabularyLoadError } from './services/vocabulary-loader.service';
import { createRandomSource } from './srs';

// 保存HTTP服务器实例，用于优雅关闭
let httpServer: http.Server | null = null;

// 进行中的会话在退出前需要保存
let sessionService: LearningSessionService | null = null;

// 关闭超时时间（毫秒）
const SHUTDOWN_TIMEOUT = 10000;

async function startServer() {
  try {
    const vocabulary = await loadVocabulary(env.VOCABULARY_FILE);
    const repository = new JsonFileDocumentRepository(env.DATA_DIR);
    const context = await LearningContext.load(repository, vocabulary);

    sessionService = new LearningSessionService(context, {
      random: createRandomSource(env.RANDOM_SEED),
      revisionMinDue: env.REVISION_MIN_DUE,
    });

    const app = createApp(sessionService);
    httpServer = app.listen(env.PORT, env.HOST, () => {
      startupLogger.info(
        { host: env.HOST, port: env.PORT, dataDir: env.DATA_DIR, words: vocabulary.size },
        'Server started',
      );
    });
  } catch (error) {
    if (error instanceof VocabularyLoadError) {
      startupLogger.fatal({ err: error, code: error.code }, `Vocabulary unavailable: ${error.message}`);
    } else {
      startupLogger.error({ err: error }, 'Server startup failed');
    }
    process.exit(1);
  }
}

// 优雅关闭处理函数
async function gracefulShutdown(signal: string, exitCode: number = 0) {
  startupLogger.info({ signal, exitCode }, 'Received signal, shutting down gracefully');

  const shutdownTimeout = setTimeout(() => {
    startupLogger.error({ timeout: SHUTDOWN_TIMEOUT }, 'Graceful shutdown timed out, forcing exit');
    process.exit(exitCode || 1);
  }, SHUTDOWN_TIMEOUT);
  shutdownTimeout.unref();

  try {
    const server = httpServer;
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => {
          if (err) {
            reject(err);
          } else {
            startupLogger.info('HTTP server closed successfully');
            resolve();
          }
        });
        server.closeIdleConnections();
      });
    }

    // 未结束的会话按放弃处理：作答已写入内存状态，需要落盘
    if (sessionService?.hasActiveSession()) {
      const result = await sessionService.abandonSession();
      startupLogger.info(
        { sessionIndex: result.sessionIndex, persisted: result.persisted },
        'Active session saved on shutdown',
      );
    }

    clearTimeout(shutdownTimeout);
    process.exit(exitCode);
  } catch (error) {
    startupLogger.error({ err: error }, 'Error during graceful shutdown');
    process.exit(1);
  }
}

process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

process.on('unhandledRejection', (reason) => {
  startupLogger.error({ err: reason }, 'Unhandled promise rejection');
});

void startServer();
