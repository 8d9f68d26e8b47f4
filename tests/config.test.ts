import { describe, it, expect } from 'vitest';
import { DEFAULT_DATA_FILE, loadConfig } from '../src/config';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({ dataFile: DEFAULT_DATA_FILE, logLevel: 'warn' });
    expect(DEFAULT_DATA_FILE).toBe('grades.json');
  });

  it('reads overrides from the environment', () => {
    expect(loadConfig({ GRADEBOOK_FILE: '/data/class-7b.json', LOG_LEVEL: 'debug' })).toEqual({
      dataFile: '/data/class-7b.json',
      logLevel: 'debug',
    });
  });

  it('ignores empty values', () => {
    expect(loadConfig({ GRADEBOOK_FILE: '', LOG_LEVEL: '' })).toEqual({
      dataFile: 'grades.json',
      logLevel: 'warn',
    });
  });
});
