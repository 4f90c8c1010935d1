/**
 * 间隔重复调度核心
 */

export { Vocabulary } from './vocabulary';
export { ProgressStore } from './progress/progress-store';
export {
  LeitnerScheduler,
  baseIntervalFor,
  type IntervalResolver,
} from './scheduling/leitner-scheduler';
export { PersonalizationModel, computeFatigue } from './modeling/personalization-model';
export {
  SessionPlanner,
  bucketTargets,
  type PlanSessionRequest,
  type SessionPlan,
  type WordBuckets,
} from './policies/session-planner';
export { SessionLog } from './session/session-log';
export {
  SessionRecorder,
  evaluatePrediction,
  type RecordedAnswer,
  type SessionRecorderOptions,
  type SessionStats,
} from './session/session-recorder';
export { createRandomSource, shuffle, pickOne, type RandomSource } from './common/random';
