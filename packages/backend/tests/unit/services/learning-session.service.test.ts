import { describe, it, expect } from 'vitest';
import type { WordProgress } from '@lexiloop/shared';
import { AppError } from '../../../src/middleware/error.middleware';
import { LearningContext } from '../../../src/services/learning-context';
import { LearningSessionService } from '../../../src/services/learning-session.service';
import { seededRandom } from '../../setup';
import { InMemoryDocumentRepository } from '../../helpers/memory-repository';
import { VocabularyFactory, WordProgressFactory } from '../../helpers/factories';

const NOW = 1_700_000_000_000;

async function createService(
  options: {
    words?: number;
    progress?: Record<string, WordProgress>;
    sessionCounter?: number;
    revisionMinDue?: number;
  } = {},
) {
  const repository = new InMemoryDocumentRepository();
  if (options.progress) repository.seed('progress', options.progress);
  if (options.sessionCounter !== undefined) {
    repository.seed('session-counter', { sessionCounter: options.sessionCounter });
  }
  const vocabulary = VocabularyFactory.build(options.words ?? 10);
  const context = await LearningContext.load(repository, vocabulary);
  const service = new LearningSessionService(context, {
    random: seededRandom(),
    now: () => NOW,
    revisionMinDue: options.revisionMinDue,
  });
  return { service, context, repository, vocabulary };
}

async function expectAppError(promise: Promise<unknown>, statusCode: number, code: string) {
  const error = await promise.then(
    () => null,
    (reason: unknown) => reason,
  );
  expect(error).toBeInstanceOf(AppError);
  expect(error).toMatchObject({ statusCode, code });
}

describe('LearningSessionService', () => {
  describe('getOverview', () => {
    it('describes a fresh learner', async () => {
      const { service } = await createService();

      expect(service.getOverview()).toEqual({
        sessionNumber: 1,
        dueCount: 0,
        revisionAvailable: false,
        revisionMinDue: 5,
        totalWords: 10,
        learnedWords: 0,
        masteredWords: 0,
      });
    });

    it('offers revision once five words are due', async () => {
      const progress: Record<string, WordProgress> = {};
      for (let i = 1; i <= 5; i++) {
        progress[`word${i}`] = WordProgressFactory.build({ mastery: 1, attempts: 1, correct: 1, box: 1 });
      }
      progress.word6 = WordProgressFactory.build({ mastery: 9, attempts: 9, correct: 9, box: 5 });
      const { service } = await createService({ progress, sessionCounter: 1 });

      expect(service.getOverview()).toMatchObject({
        sessionNumber: 2,
        dueCount: 5,
        revisionAvailable: true,
        learnedWords: 6,
        masteredWords: 1,
      });
    });
  });

  describe('startSession', () => {
    it('plans a new-word session with flashcards and quiz options', async () => {
      const { service, context, vocabulary } = await createService();

      const session = await service.startSession('new');

      expect(session.sessionIndex).toBe(1);
      expect(session.mode).toBe('new');
      expect(session.words).toHaveLength(10);
      expect(session.remaining).toBe(10);
      expect(context.sessionCounter).toBe(1);
      for (const word of session.words) {
        const translation = vocabulary.translationOf(word.english);
        expect(word.isNew).toBe(true);
        expect(word.flashcard).toBe(translation);
        expect(word.options).toHaveLength(4);
        expect(word.options).toContain(translation);
      }
    });

    it('plans a revision session from due words without flashcards', async () => {
      const progress: Record<string, WordProgress> = {};
      for (let i = 1; i <= 5; i++) {
        progress[`word${i}`] = WordProgressFactory.build({ mastery: 1, attempts: 1, correct: 1, box: 1 });
      }
      const { service } = await createService({ progress, sessionCounter: 1 });

      const session = await service.startSession('revision');

      expect(session.sessionIndex).toBe(2);
      expect(session.words.map((word) => word.english)).toEqual(['word1', 'word2', 'word3', 'word4', 'word5']);
      expect(session.words.every((word) => !word.isNew && word.flashcard === undefined)).toBe(true);
    });

    it('rejects a second session while one is active', async () => {
      const { service } = await createService();
      await service.startSession('new');

      await expectAppError(service.startSession('new'), 409, 'SESSION_ALREADY_ACTIVE');
    });

    it('rejects revision when nothing is due', async () => {
      const { service, context } = await createService();

      await expectAppError(service.startSession('revision'), 409, 'NO_DUE_WORDS');
      expect(context.sessionCounter).toBe(0);
    });

    it('refuses revision while fewer due words than the minimum exist', async () => {
      const progress: Record<string, WordProgress> = {};
      for (let i = 1; i <= 4; i++) {
        progress[`word${i}`] = WordProgressFactory.build({ mastery: 1, attempts: 1, correct: 1, box: 1 });
      }
      const { service, context } = await createService({ progress, sessionCounter: 1 });

      expect(service.getOverview()).toMatchObject({ dueCount: 4, revisionAvailable: false });
      await expectAppError(service.startSession('revision'), 409, 'REVISION_UNAVAILABLE');
      expect(context.sessionCounter).toBe(1);
      expect(service.hasActiveSession()).toBe(false);
    });

    it('offers revision with a single due word when the minimum is lowered', async () => {
      const progress = {
        word1: WordProgressFactory.build({ mastery: 1, attempts: 1, correct: 1, box: 1 }),
      };
      const { service } = await createService({ progress, sessionCounter: 1, revisionMinDue: 1 });

      expect(service.getOverview()).toMatchObject({ dueCount: 1, revisionAvailable: true, revisionMinDue: 1 });
      const session = await service.startSession('revision');

      expect(session.words.map((word) => word.english)).toEqual(['word1']);
    });

    it('rejects a new-word session when only strong words remain', async () => {
      const progress: Record<string, WordProgress> = {};
      for (let i = 1; i <= 3; i++) {
        progress[`word${i}`] = WordProgressFactory.build({ mastery: 9, attempts: 9, correct: 9, box: 5 });
      }
      const { service } = await createService({ words: 3, progress });

      await expectAppError(service.startSession('new'), 409, 'NO_WORDS_AVAILABLE');
    });
  });

  describe('submitAnswer', () => {
    it('grades answers case- and whitespace-insensitively', async () => {
      const { service } = await createService();
      await service.startSession('new');

      const result = await service.submitAnswer('word1', '  PALABRA1 ', 2.5);

      expect(result).toMatchObject({ word: 'word1', correct: true, correctAnswer: 'palabra1', remaining: 9 });
      expect(result.progress).toMatchObject({ mastery: 1, attempts: 1, box: 1, lastReviewedSession: 1 });
    });

    it('marks a wrong answer incorrect', async () => {
      const { service } = await createService();
      await service.startSession('new');

      const result = await service.submitAnswer('word2', 'palabra3', 4);

      expect(result.correct).toBe(false);
      expect(result.correctAnswer).toBe('palabra2');
      expect(result.progress.box).toBe(1);
    });

    it('accepts each word only once per session', async () => {
      const { service } = await createService();
      await service.startSession('new');
      await service.submitAnswer('word1', 'palabra1', 2);

      await expectAppError(service.submitAnswer('word1', 'palabra1', 2), 409, 'WORD_ALREADY_ANSWERED');
      expect(service.getActiveSession().answeredCount).toBe(1);
    });

    it('rejects words outside the session', async () => {
      const { service } = await createService();
      await service.startSession('new');

      await expectAppError(service.submitAnswer('word99', 'x', 2), 400, 'WORD_NOT_IN_SESSION');
    });

    it('requires an active session', async () => {
      const { service } = await createService();

      await expectAppError(service.submitAnswer('word1', 'palabra1', 2), 404, 'NO_ACTIVE_SESSION');
      expect(() => service.getActiveSession()).toThrow(AppError);
    });
  });

  describe('finishSession', () => {
    it('summarizes the session and persists state', async () => {
      const { service, repository, vocabulary } = await createService();
      await service.startSession('new');
      await service.submitAnswer('word1', 'palabra1', 2);
      await service.submitAnswer('word2', 'wrong', 4);

      const summary = await service.finishSession();

      expect(summary).toMatchObject({
        sessionIndex: 1,
        mode: 'new',
        answered: 2,
        stats: { newCorrect: 1, newTotal: 2, reviewCorrect: 0, reviewTotal: 0 },
        newAccuracy: 0.5,
        reviewAccuracy: null,
        persisted: true,
      });
      expect(summary.warning).toBeUndefined();
      // balanced, size 15: new target floor(15 * 0.4) = 6, shortest first
      expect(summary.introduced).toEqual(vocabulary.words().slice(0, 6));
      expect(summary.logEntry).toMatchObject({ sessionIndex: 1, accuracy: 0.5, avgResponseTime: 3, timestamp: NOW });
      expect(repository.get('session-counter')).toEqual({ sessionCounter: 1 });
      expect(repository.get('session-log')).toHaveLength(1);
      expect(service.hasActiveSession()).toBe(false);
      expect(service.getOverview()).toMatchObject({ sessionNumber: 2, learnedWords: 2 });
    });

    it('skips the session log when nothing was answered', async () => {
      const { service, repository } = await createService();
      await service.startSession('new');

      const summary = await service.finishSession();

      expect(summary.logEntry).toBeNull();
      expect(summary.newAccuracy).toBeNull();
      expect(repository.get('session-log')).toEqual([]);
    });

    it('reports a persistence warning', async () => {
      const { service, repository } = await createService();
      await service.startSession('new');
      await service.submitAnswer('word1', 'palabra1', 2);
      repository.failWrites = true;

      const summary = await service.finishSession();

      expect(summary.persisted).toBe(false);
      expect(summary.warning).toBe('Progress could not be saved: EACCES: permission denied');
      expect(summary.logEntry).not.toBeNull();
    });
  });

  describe('abandonSession', () => {
    it('keeps recorded answers but writes no log entry', async () => {
      const { service, repository } = await createService();
      await service.startSession('new');
      await service.submitAnswer('word3', 'palabra3', 3);

      const result = await service.abandonSession();

      expect(result).toEqual({ sessionIndex: 1, answered: 1, persisted: true });
      expect(repository.get('progress')).toMatchObject({ word3: { attempts: 1, correct: 1 } });
      expect(repository.get('session-log')).toEqual([]);
      expect(repository.get('session-counter')).toEqual({ sessionCounter: 1 });
    });
  });

  describe('getProgressSummary', () => {
    it('lists the ten best-learned words with accuracy', async () => {
      const { service } = await createService({
        words: 12,
        progress: {
          word1: WordProgressFactory.build({ mastery: 9, attempts: 10, correct: 9, box: 5 }),
          word2: WordProgressFactory.build({ mastery: 8, attempts: 8, correct: 8, box: 5 }),
          word5: WordProgressFactory.build({ mastery: 2, attempts: 3, correct: 2, box: 2 }),
        },
      });

      const summary = service.getProgressSummary();

      expect(summary.totalWords).toBe(12);
      expect(summary.masteredWords).toBe(2);
      expect(summary.masteredPercent).toBe(16.7);
      expect(summary.topWords).toHaveLength(10);
      expect(summary.topWords.slice(0, 4)).toEqual([
        { english: 'word1', spanish: 'palabra1', mastery: 9, accuracy: '9/10' },
        { english: 'word2', spanish: 'palabra2', mastery: 8, accuracy: '8/8' },
        { english: 'word5', spanish: 'palabra5', mastery: 2, accuracy: '2/3' },
        { english: 'word3', spanish: 'palabra3', mastery: 0, accuracy: '0/0' },
      ]);
    });
  });
});
