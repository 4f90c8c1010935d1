export * from './progress.schema';
export * from './personalization.schema';
export * from './session.schema';
export * from './api.schema';
