/**
 * CUID Module Configuration
 */

import { env } from '@/shared/config';

export * from './cuid.constants';

export interface CuidModuleConfig {
  maxBatchSize: number;
  defaultGeneratorName: string;
}

export const cuidConfig: CuidModuleConfig = {
  maxBatchSize: env.CUID_MAX_BATCH,
  defaultGeneratorName: 'default',
};
