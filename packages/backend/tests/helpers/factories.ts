import {
  createDefaultWordProgress,
  type SessionFeatures,
  type SessionLogEntry,
  type VocabularyPair,
  type WordProgress,
} from '@lexiloop/shared';
import { Vocabulary } from '../../src/srs/vocabulary';

// ==================== Vocabulary Factory ====================

export const VocabularyFactory = {
  /**
   * Vocabulary of `count` generated pairs: word1 → palabra1, ...
   */
  build(count: number): Vocabulary {
    return new Vocabulary(VocabularyFactory.pairs(count));
  },

  pairs(count: number): VocabularyPair[] {
    return Array.from({ length: count }, (_, i) => ({
      english: `word${i + 1}`,
      spanish: `palabra${i + 1}`,
    }));
  },

  of(pairs: Array<[string, string]>): Vocabulary {
    return new Vocabulary(pairs.map(([english, spanish]) => ({ english, spanish })));
  },
};

// ==================== Progress Factory ====================

export const WordProgressFactory = {
  build(overrides: Partial<WordProgress> = {}): WordProgress {
    return { ...createDefaultWordProgress(), ...overrides };
  },
};

// ==================== Session Log Factory ====================

export const SessionFeaturesFactory = {
  build(overrides: Partial<SessionFeatures> = {}): SessionFeatures {
    return {
      recentAccuracy: 0.75,
      avgResponseTime: 3.0,
      fatigueScore: 0,
      forgetRate: 0,
      sessionCount: 0,
      timeSinceLastSession: 24,
      ...overrides,
    };
  },
};

export const SessionLogEntryFactory = {
  build(overrides: Partial<SessionLogEntry> = {}): SessionLogEntry {
    return {
      sessionIndex: 1,
      mode: 'new',
      timestamp: 0,
      wordCount: 4,
      correctCount: 3,
      accuracy: 0.75,
      avgResponseTime: 3.0,
      wordAccuracies: [1, 1, 1, 0],
      features: SessionFeaturesFactory.build(),
      prediction: { sessionSize: 15, difficultyBias: 'balanced', confidence: 0.6 },
      predictionAccuracy: 1.0,
      ...overrides,
    };
  },
};
