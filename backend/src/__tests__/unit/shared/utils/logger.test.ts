/**
 * Logger Utility Unit Tests
 *
 * Only our configuration: service bindings on child loggers and the silent
 * level under test.
 *
 * @module __tests__/unit/shared/utils/logger
 */

import { describe, it, expect } from 'vitest';
import { createChildLogger, logger } from '@/shared/utils/logger';

describe('Logger Utility', () => {
  it('is silent under test', () => {
    expect(logger.level).toBe('silent');
  });

  it('binds the service name on child loggers', () => {
    const log = createChildLogger({ service: 'TransferWorker', jobId: 'JOB-1' });

    expect(log.bindings()).toMatchObject({ service: 'TransferWorker', jobId: 'JOB-1' });
  });
});
