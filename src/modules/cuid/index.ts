/**
 * CUID Module Public Exports
 * Only these are accessible to other modules
 */

// Public API Gateway
export { cuidController, CuidController } from './controllers';

// Direct generator API
export { CuidGenerator, createGenerator, generate } from './services';

// HTTP surface
export { createCuidRouter, cuidErrorHandler } from './handlers';

export { parseCuid, isCuid } from './utils';

// Public Types
export type {
  ClockSource,
  CreateGeneratorOptions,
  CuidStats,
  FingerprintSources,
  GeneratorHandle,
  GeneratorOptions,
  GeneratorRef,
  ParsedCuid,
  RandomSource,
} from './types';
export { CuidError, CuidErrorType, isCuidError } from './types';

// Internal exports for testing only
// (Only use these in test files, never in other modules)
export { GeneratorRegistry, deriveFingerprint } from './services';
