import { describe, expect, it, vi } from 'vitest';
import { ConfigError, envFlag, envNumber, isValidTimeZone, loadConfig } from '../server/chat/config.ts';

const REQUIRED = {
  SUPABASE_URL: 'http://localhost:54321',
  SUPABASE_SERVICE_ROLE_KEY: 'test-service-key',
  GOOGLE_API_KEY: 'test-google-key',
  FILE_BUCKET_NAME: 'media',
  LOG_BUCKET_NAME: 'usage-logs',
};

describe('config', () => {
  it('names every missing variable at once', () => {
    let caught: unknown;
    try {
      loadConfig({});
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.missing).toEqual([
        'SUPABASE_URL',
        'SUPABASE_SERVICE_ROLE_KEY',
        'GOOGLE_API_KEY',
        'FILE_BUCKET_NAME',
        'LOG_BUCKET_NAME',
      ]);
    }
  });

  it('applies defaults', () => {
    const config = loadConfig(REQUIRED);
    expect(config.enableUsageLog).toBe(true);
    expect(config.logBucketName).toBe('usage-logs');
    expect(config.maxPromptSizeMb).toBe(4);
    expect(config.port).toBe(7860);
    expect(config.host).toBe('0.0.0.0');
    expect(config.logTimeZone).toBe('Asia/Tokyo');
    expect(config.userIdentityHeader).toBe('x-goog-authenticated-user-email');
    expect(config.devMode).toBe(false);
  });

  it('does not require a log bucket when usage logging is off', () => {
    const { LOG_BUCKET_NAME: _unused, ...rest } = REQUIRED;
    const config = loadConfig({ ...rest, ENABLE_USAGE_LOG: 'false' });
    expect(config.enableUsageLog).toBe(false);
    expect(config.logBucketName).toBeNull();
  });

  it('reads the size ceiling override', () => {
    expect(loadConfig({ ...REQUIRED, MAX_PROMPT_SIZE_MB: '2.5' }).maxPromptSizeMb).toBe(2.5);
    expect(loadConfig({ ...REQUIRED, MAX_PROMPT_SIZE_MB: 'lots' }).maxPromptSizeMb).toBe(4);
  });

  it('falls back to the default zone for an unknown LOG_TIMEZONE', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    expect(loadConfig({ ...REQUIRED, LOG_TIMEZONE: 'Mars/Olympus' }).logTimeZone).toBe('Asia/Tokyo');
    expect(loadConfig({ ...REQUIRED, LOG_TIMEZONE: 'UTC' }).logTimeZone).toBe('UTC');
    expect(warn).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });

  it('recognizes IANA zone names', () => {
    expect(isValidTimeZone('Europe/Berlin')).toBe(true);
    expect(isValidTimeZone('Mars/Olympus')).toBe(false);
  });

  it('parses boolean flags loosely', () => {
    expect(envFlag({ X: 'YES' }, 'X', false)).toBe(true);
    expect(envFlag({ X: 'off' }, 'X', true)).toBe(false);
    expect(envFlag({ X: 'maybe' }, 'X', true)).toBe(true);
    expect(envFlag({}, 'X', false)).toBe(false);
  });

  it('falls back on numbers that do not parse or are not positive', () => {
    expect(envNumber({ N: '12' }, 'N', 5)).toBe(12);
    expect(envNumber({ N: '-1' }, 'N', 5)).toBe(5);
    expect(envNumber({ N: '' }, 'N', 5)).toBe(5);
  });
});
