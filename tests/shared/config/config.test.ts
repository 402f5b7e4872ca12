/**
 * Shared Configuration Tests
 */

import { describe, it, expect } from 'vitest';
import { env, validateEnv } from '@/shared/config';
import { cuidConfig } from '@/modules/cuid/config';

describe('Shared Configuration', () => {
  it('should parse numeric settings', () => {
    expect(Number.isInteger(env.PORT)).toBe(true);
    expect(Number.isInteger(env.CUID_MAX_BATCH)).toBe(true);
  });

  it('should feed the batch limit into the CUID module', () => {
    expect(cuidConfig.maxBatchSize).toBe(env.CUID_MAX_BATCH);
    expect(cuidConfig.defaultGeneratorName).toBe('default');
  });

  describe('validateEnv', () => {
    it('should accept sane values', () => {
      expect(() => validateEnv({ PORT: 3001, CUID_MAX_BATCH: 1000 })).not.toThrow();
    });

    it('should reject an out-of-range port', () => {
      expect(() => validateEnv({ PORT: 70000, CUID_MAX_BATCH: 1000 })).toThrow(
        'Invalid environment variables: PORT must be an integer between 0 and 65535'
      );
    });

    it('should reject a non-positive batch limit', () => {
      expect(() => validateEnv({ PORT: 3001, CUID_MAX_BATCH: 0 })).toThrow(
        'Invalid environment variables: CUID_MAX_BATCH must be a positive integer'
      );
    });

    it('should list every problem', () => {
      expect(() => validateEnv({ PORT: Number.NaN, CUID_MAX_BATCH: Number.NaN })).toThrow(
        'PORT must be an integer between 0 and 65535; CUID_MAX_BATCH must be a positive integer'
      );
    });
  });
});
