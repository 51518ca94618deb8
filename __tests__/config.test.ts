import { env, loadEnv } from '../src/config';
import { PickerError } from '../src/utils/PickerError';

describe('loadEnv', () => {
  it('should apply defaults', () => {
    expect(loadEnv({})).toEqual({
      NODE_ENV: 'development',
      LOG_LEVEL: 'warn',
      PICKER_CONSECUTIVE_RULE: 'previous-characters',
      PICKER_CHUNK_SIZE: 2000,
    });
  });

  it('should coerce numeric values', () => {
    expect(loadEnv({ PICKER_CHUNK_SIZE: '250' }).PICKER_CHUNK_SIZE).toBe(250);
  });

  it('should accept the adjacent-run rule', () => {
    expect(loadEnv({ PICKER_CONSECUTIVE_RULE: 'adjacent-run' }).PICKER_CONSECUTIVE_RULE).toBe(
      'adjacent-run'
    );
  });

  it('should throw a configuration error naming the invalid variable', () => {
    expect(() => loadEnv({ PICKER_CHUNK_SIZE: '-4' })).toThrow(PickerError);
    expect(() => loadEnv({ LOG_LEVEL: 'loud' })).toThrow(/^Invalid configuration: LOG_LEVEL: /);
  });

  it('should load the test environment from setup', () => {
    expect(env.NODE_ENV).toBe('test');
    expect(env.LOG_LEVEL).toBe('error');
  });
});
