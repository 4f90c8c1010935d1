import { describe, it, expect } from 'vitest';
import type { VocabularyPair, WordProgress } from '@lexiloop/shared';
import { PersonalizationModel } from '../../../src/srs/modeling/personalization-model';
import { SessionPlanner, bucketTargets } from '../../../src/srs/policies/session-planner';
import { ProgressStore } from '../../../src/srs/progress/progress-store';
import { LeitnerScheduler } from '../../../src/srs/scheduling/leitner-scheduler';
import { Vocabulary } from '../../../src/srs/vocabulary';
import { seededRandom } from '../../setup';
import { SessionFeaturesFactory, VocabularyFactory, WordProgressFactory } from '../../helpers/factories';

function english(pairs: VocabularyPair[]): string[] {
  return pairs.map((pair) => pair.english);
}

function createPlanner(seed = 'test-seed'): SessionPlanner {
  return new SessionPlanner(new LeitnerScheduler(), seededRandom(seed));
}

/**
 * 40 words: word1-10 new, word11-20 struggling, word21-30 progressing, word31-40 strong
 */
function mixedFixture(): { vocabulary: Vocabulary; store: ProgressStore } {
  const vocabulary = VocabularyFactory.build(40);
  const entries: Array<[string, WordProgress]> = [];
  for (let i = 11; i <= 40; i++) {
    const mastery = i <= 20 ? 2 : i <= 30 ? 5 : 8;
    entries.push([`word${i}`, WordProgressFactory.build({ mastery, attempts: 3, correct: 2, box: 2 })]);
  }
  return { vocabulary, store: new ProgressStore(entries) };
}

function bucketOf(store: ProgressStore, word: string): string {
  const { attempts, mastery } = store.get(word);
  if (attempts === 0) return 'new';
  if (mastery <= 3) return 'struggling';
  if (mastery <= 6) return 'progressing';
  return 'strong';
}

function countBuckets(store: ProgressStore, words: string[]): Record<string, number> {
  const counts: Record<string, number> = { new: 0, struggling: 0, progressing: 0, strong: 0 };
  for (const word of words) {
    counts[bucketOf(store, word)] += 1;
  }
  return counts;
}

describe('bucketTargets', () => {
  it('floors each proportion of the session size', () => {
    expect(bucketTargets(15, 'balanced')).toEqual({ new: 6, struggling: 4, progressing: 3, strong: 0 });
    expect(bucketTargets(23, 'challenging')).toEqual({ new: 11, struggling: 4, progressing: 5, strong: 1 });
    expect(bucketTargets(10, 'review_heavy')).toEqual({ new: 2, struggling: 5, progressing: 2, strong: 0 });
  });
});

describe('SessionPlanner', () => {
  describe('partition', () => {
    it('buckets words by mastery and orders new words by length', () => {
      const vocabulary = VocabularyFactory.of([
        ['elephant', 'elefante'],
        ['cat', 'gato'],
        ['dog', 'perro'],
        ['owl', 'búho'],
        ['bee', 'abeja'],
        ['ant', 'hormiga'],
        ['fox', 'zorro'],
      ]);
      const store = new ProgressStore([
        ['dog', WordProgressFactory.build({ mastery: 2, attempts: 3, box: 1 })],
        ['owl', WordProgressFactory.build({ mastery: 1, attempts: 1, box: 1 })],
        ['bee', WordProgressFactory.build({ mastery: 5, attempts: 5, box: 4 })],
        ['ant', WordProgressFactory.build({ mastery: 8, attempts: 8, box: 5 })],
        ['fox', WordProgressFactory.build({ mastery: 0, attempts: 3, box: 1 })],
      ]);

      const buckets = createPlanner().partition(vocabulary, store);

      expect(english(buckets.new)).toEqual(['cat', 'elephant']);
      expect(english(buckets.struggling)).toEqual(['dog']);
      expect(english(buckets.progressing)).toEqual(['bee']);
      expect(english(buckets.strong)).toEqual(['ant']);
    });
  });

  describe('new-word sessions', () => {
    it('plans every word of a fresh 10-word vocabulary as new', () => {
      const vocabulary = VocabularyFactory.build(10);
      const plan = createPlanner().planSession({
        vocabulary,
        progressStore: new ProgressStore(),
        model: new PersonalizationModel(),
        mode: 'new',
        currentSession: 0,
        features: SessionFeaturesFactory.build(),
      });

      expect(plan.mode).toBe('new');
      expect(plan.prediction.sessionSize).toBe(15);
      expect(english(plan.words).sort()).toEqual(vocabulary.words().sort());
      // only the new-bucket quota floor(15 * 0.4) = 6 counts as introduced, not backfill
      expect(english(plan.introduced)).toEqual(vocabulary.words().slice(0, 6));
    });

    it('takes the shortest new words first', () => {
      const vocabulary = VocabularyFactory.of([
        ['encyclopedia', 'enciclopedia'],
        ['a', 'un'],
        ['book', 'libro'],
        ['library', 'biblioteca'],
      ]);
      const plan = createPlanner().planSession({
        vocabulary,
        progressStore: new ProgressStore(),
        model: new PersonalizationModel(),
        mode: 'new',
        currentSession: 0,
        features: SessionFeaturesFactory.build({ recentAccuracy: 0.5, timeSinceLastSession: 100 }),
      });

      // review_heavy, size 10: new target floor(10 * 0.2) = 2
      expect(english(plan.introduced)).toEqual(['a', 'book']);
      expect(plan.words).toHaveLength(4);
    });

    it('fills balanced targets and backfills without strong words', () => {
      const { vocabulary, store } = mixedFixture();
      const plan = createPlanner().planSession({
        vocabulary,
        progressStore: store,
        model: new PersonalizationModel(),
        mode: 'new',
        currentSession: 5,
        features: SessionFeaturesFactory.build(),
      });

      const words = english(plan.words);
      const counts = countBuckets(store, words);

      expect(words).toHaveLength(15);
      expect(new Set(words).size).toBe(15);
      expect(counts.strong).toBe(0);
      expect(counts.new).toBeGreaterThanOrEqual(6);
      expect(counts.struggling).toBeGreaterThanOrEqual(4);
      expect(counts.progressing).toBeGreaterThanOrEqual(3);
      expect(english(plan.introduced)).toEqual(['word1', 'word2', 'word3', 'word4', 'word5', 'word6']);
      expect(english(plan.introduced).every((word) => words.includes(word))).toBe(true);
    });

    it('includes a strong word in challenging sessions', () => {
      const { vocabulary, store } = mixedFixture();
      const plan = createPlanner().planSession({
        vocabulary,
        progressStore: store,
        model: new PersonalizationModel(),
        mode: 'new',
        currentSession: 5,
        features: SessionFeaturesFactory.build({ recentAccuracy: 0.9 }),
      });

      const counts = countBuckets(store, english(plan.words));

      expect(plan.prediction).toMatchObject({ sessionSize: 23, difficultyBias: 'challenging' });
      expect(plan.words).toHaveLength(23);
      expect(counts.new).toBe(10);
      expect(counts.strong).toBe(1);
      expect(counts.struggling).toBeGreaterThanOrEqual(4);
      expect(counts.progressing).toBeGreaterThanOrEqual(5);
      expect(counts.struggling + counts.progressing).toBe(12);
    });

    it('is reproducible for the same seed', () => {
      const { vocabulary, store } = mixedFixture();
      const request = {
        vocabulary,
        progressStore: store,
        model: new PersonalizationModel(),
        mode: 'new' as const,
        currentSession: 5,
        features: SessionFeaturesFactory.build(),
      };

      expect(english(createPlanner('same').planSession(request).words)).toEqual(
        english(createPlanner('same').planSession(request).words),
      );
    });
  });

  describe('revision sessions', () => {
    it('orders due words by mastery then by last review', () => {
      const vocabulary = VocabularyFactory.build(5);
      const store = new ProgressStore([
        ['word1', WordProgressFactory.build({ box: 1, mastery: 3, attempts: 3, lastReviewedSession: 5 })],
        ['word2', WordProgressFactory.build({ box: 1, mastery: 1, attempts: 3, lastReviewedSession: 8 })],
        ['word3', WordProgressFactory.build({ box: 1, mastery: 1, attempts: 3, lastReviewedSession: 2 })],
        ['word4', WordProgressFactory.build({ box: 5, mastery: 6, attempts: 6, lastReviewedSession: 9 })],
      ]);

      const plan = createPlanner().planSession({
        vocabulary,
        progressStore: store,
        model: new PersonalizationModel(),
        mode: 'revision',
        currentSession: 10,
        features: SessionFeaturesFactory.build(),
      });

      expect(plan.mode).toBe('revision');
      expect(english(plan.words)).toEqual(['word3', 'word2', 'word1']);
      expect(plan.introduced).toEqual([]);
    });

    it('caps the revision list at the predicted size', () => {
      const vocabulary = VocabularyFactory.build(20);
      const store = new ProgressStore(
        vocabulary.words().map((word, i) => [
          word,
          WordProgressFactory.build({ box: 1, mastery: 1, attempts: 2, lastReviewedSession: i % 3 }),
        ]),
      );

      const plan = createPlanner().planSession({
        vocabulary,
        progressStore: store,
        model: new PersonalizationModel(),
        mode: 'revision',
        currentSession: 10,
        features: SessionFeaturesFactory.build({ recentAccuracy: 0.5 }),
      });

      // size 10: the seven words last reviewed in session 0 come first
      expect(plan.words.map((pair) => store.get(pair.english).lastReviewedSession)).toEqual([
        0, 0, 0, 0, 0, 0, 0, 1, 1, 1,
      ]);
    });

    it('uses personalized intervals to decide what is due', () => {
      const vocabulary = VocabularyFactory.build(1);
      const store = new ProgressStore([
        ['word1', WordProgressFactory.build({ box: 5, mastery: 5, attempts: 5, lastReviewedSession: 0 })],
      ]);
      const model = new PersonalizationModel();
      for (let i = 0; i < 5; i++) model.recordOutcome('word1', true, 1, i);

      const plan = createPlanner().planSession({
        vocabulary,
        progressStore: store,
        model,
        mode: 'revision',
        currentSession: 20,
        features: SessionFeaturesFactory.build(),
      });

      // base interval 15 would be due; personalized 22 is not
      expect(plan.words).toEqual([]);
    });
  });
});
