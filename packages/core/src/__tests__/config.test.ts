import { describe, it, expect } from 'vitest';
import { ValidationError } from '../errors/index.js';
import { createLogger } from '../observability/logger.js';
import { resolveExecutorConfig, resolveStoreConfig } from '../config/config.js';

describe('config', () => {
  it('should apply store defaults', () => {
    expect(resolveStoreConfig()).toEqual({
      syncWrites: true,
      snapshotOnClose: true,
      maxWalBytes: 10 * 1024 * 1024,
    });
  });

  it('should keep a supplied logger', () => {
    const logger = createLogger({ module: 'custom' });
    expect(resolveStoreConfig({ syncWrites: false, logger }).logger).toBe(logger);
  });

  it('should reject a negative log size limit', () => {
    expect(() => resolveStoreConfig({ maxWalBytes: -1 })).toThrow(ValidationError);
  });

  it('should apply executor defaults', () => {
    expect(resolveExecutorConfig()).toEqual({ requireAuthentication: false, maxSelectPoints: 0 });
  });

  it('should reject negative limits', () => {
    expect(() => resolveExecutorConfig({ maxSelectPoints: -1 })).toThrow(ValidationError);
  });

  it('should report the offending path', () => {
    try {
      resolveExecutorConfig({ maxSelectPoints: 1.5 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.code).toBe('STRATA_V602');
        expect(error.issues[0]?.path).toBe('maxSelectPoints');
      }
    }
  });
});
