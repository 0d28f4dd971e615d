/**
 * Environment Configuration Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { describeConfig, loadEnvironment } from '@/infrastructure/config/environment';

describe('loadEnvironment', () => {
  it('applies defaults', () => {
    const config = loadEnvironment({});

    expect(config.NODE_ENV).toBe('development');
    expect(config.PORT).toBe(3001);
    expect(config.STORAGE_CONTAINER_NAME).toBe('relay-uploads');
    expect(config.STORAGE_PATH_PREFIX).toBe('uploads/');
    expect(config.TRANSFER_BLOCK_SIZE_BYTES).toBe(4 * 1024 * 1024);
    expect(config.TRANSFER_PROGRESS_INTERVAL_MS).toBe(2000);
    expect(config.TRANSFER_HISTORY_LIMIT).toBe(200);
    expect(config.UPLOAD_MAX_BYTES).toBe(2048 * 1024 * 1024);
    expect(config.PERMANENT_ADMIN_HANDLES).toEqual([]);
    expect(config.ENABLE_FILE_LOGGING).toBe(false);
    expect(config.LOG_FILE_PATH).toBe('./logs/app.log');
    expect(config.ERROR_LOG_FILE_PATH).toBe('./logs/error.log');
  });

  it('keeps progress edits at least two seconds apart', () => {
    expect(loadEnvironment({ TRANSFER_PROGRESS_INTERVAL_MS: '5000' }).TRANSFER_PROGRESS_INTERVAL_MS).toBe(5000);
    expect(() => loadEnvironment({ TRANSFER_PROGRESS_INTERVAL_MS: '0' })).toThrow(
      /^Invalid environment variables: TRANSFER_PROGRESS_INTERVAL_MS: /
    );
    expect(() => loadEnvironment({ TRANSFER_PROGRESS_INTERVAL_MS: '1999' })).toThrow(
      /TRANSFER_PROGRESS_INTERVAL_MS/
    );
  });

  it('validates the file logging switches', () => {
    const config = loadEnvironment({ ENABLE_FILE_LOGGING: 'true', LOG_FILE_PATH: '/var/log/relay.log' });

    expect(config.ENABLE_FILE_LOGGING).toBe(true);
    expect(config.LOG_FILE_PATH).toBe('/var/log/relay.log');
    expect(() => loadEnvironment({ ENABLE_FILE_LOGGING: 'yes' })).toThrow(/^Invalid environment variables: ENABLE_FILE_LOGGING: /);
  });

  it('merges and normalizes both admin lists', () => {
    const config = loadEnvironment({
      PERMANENT_ADMINS: 'owner, @ops',
      EXTRA_ADMINS: '12345,@ops',
    });

    expect(config.PERMANENT_ADMIN_HANDLES).toEqual(['@owner', '@ops', '12345']);
  });

  it('converts sizes given in megabytes', () => {
    const config = loadEnvironment({ TRANSFER_BLOCK_SIZE_MB: '8', UPLOAD_MAX_MB: '0.5' });

    expect(config.TRANSFER_BLOCK_SIZE_BYTES).toBe(8 * 1024 * 1024);
    expect(config.UPLOAD_MAX_BYTES).toBe(512 * 1024);
  });

  it('lists every invalid variable', () => {
    expect(() => loadEnvironment({ PORT: '80', LOG_LEVEL: 'loud' })).toThrow(
      /^Invalid environment variables: PORT: .+; LOG_LEVEL: .+$/
    );
  });
});

describe('describeConfig', () => {
  it('reports whether storage is configured without exposing the connection string', () => {
    const summary = describeConfig(
      loadEnvironment({ STORAGE_CONNECTION_STRING: 'UseDevelopmentStorage=true', PERMANENT_ADMINS: '@owner' })
    );

    expect(summary.storageConfigured).toBe(true);
    expect(summary.permanentAdmins).toBe(1);
    expect(Object.values(summary)).not.toContain('UseDevelopmentStorage=true');
  });
});
