import { describe, it, expect } from 'vitest';
import { validateEnv } from '../../../src/config/env';

describe('validateEnv', () => {
  it('applies defaults', () => {
    const env = validateEnv({});

    expect(env).toMatchObject({
      PORT: 3000,
      HOST: '127.0.0.1',
      NODE_ENV: 'development',
      LOG_LEVEL: 'info',
      DATA_DIR: './data',
      VOCABULARY_FILE: './data/english_spanish.csv',
      REVISION_MIN_DUE: 5,
    });
    expect(env.RANDOM_SEED).toBeUndefined();
  });

  it('parses numeric settings', () => {
    const env = validateEnv({ PORT: '8080', REVISION_MIN_DUE: '3', RANDOM_SEED: 'test-seed' });

    expect(env.PORT).toBe(8080);
    expect(env.REVISION_MIN_DUE).toBe(3);
    expect(env.RANDOM_SEED).toBe('test-seed');
  });

  it('rejects invalid values', () => {
    expect(() => validateEnv({ PORT: '70000' })).toThrow('环境变量配置错误');
    expect(() => validateEnv({ LOG_LEVEL: 'loud' })).toThrow('环境变量配置错误');
  });
});
