import { describe, it, expect } from 'vitest';
import { loadEnvironmentConfig } from '../../server/config/environment';

describe('Environment configuration', () => {
  it('should fall back to defaults', () => {
    const config = loadEnvironmentConfig({ NODE_ENV: 'test' });

    expect(config).toMatchObject({
      NODE_ENV: 'test',
      PORT: 5000,
      START_PAGE: 1,
      CHAPTER_MARKER: 'Глава',
      SEARCH_MODE: 'full-text',
      DESCEND_INTO_UNMATCHED: true,
      MAX_UPLOAD_MB: 50,
      RATE_LIMIT_WINDOW: 900,
      RATE_LIMIT_MAX: 100,
    });
    expect(config.PDF_PATH).toBeUndefined();
  });

  it('should coerce values from the environment', () => {
    const config = loadEnvironmentConfig({
      NODE_ENV: 'test',
      START_PAGE: '13',
      SEARCH_MODE: 'from-cursor',
      DESCEND_INTO_UNMATCHED: 'false',
      CHAPTER_MARKER: 'Chapter',
      PDF_PATH: 'manual.pdf',
    });

    expect(config.START_PAGE).toBe(13);
    expect(config.SEARCH_MODE).toBe('from-cursor');
    expect(config.DESCEND_INTO_UNMATCHED).toBe(false);
    expect(config.CHAPTER_MARKER).toBe('Chapter');
    expect(config.PDF_PATH).toBe('manual.pdf');
  });

  it('should treat empty variables as unset', () => {
    expect(loadEnvironmentConfig({ NODE_ENV: 'test', PORT: '' }).PORT).toBe(5000);
  });

  it('should reject invalid values', () => {
    expect(() => loadEnvironmentConfig({ NODE_ENV: 'test', START_PAGE: 'zero' })).toThrow(/START_PAGE/);
    expect(() => loadEnvironmentConfig({ NODE_ENV: 'test', SEARCH_MODE: 'sideways' })).toThrow(/SEARCH_MODE/);
  });
});
