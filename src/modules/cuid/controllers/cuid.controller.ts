/**
 * CUID Controller
 * Public API gateway for the CUID module
 */

import { logger } from '@/shared/utils';
import { cuidConfig, type CuidModuleConfig } from '../config';
import { CuidGenerator } from '../services/cuid-generator.service';
import { GeneratorRegistry } from '../services/generator-registry.service';
import { CuidError, CuidErrorType } from '../types/error.types';
import type {
  CreateGeneratorOptions,
  CuidStats,
  GeneratorHandle,
  GeneratorRef,
  ParsedCuid,
} from '../types/generator.types';
import { parseCuid } from '../utils/cuid-parser';

export class CuidController {
  private readonly registry: GeneratorRegistry;
  private readonly config: CuidModuleConfig;

  constructor(config: Partial<CuidModuleConfig> = {}, registry = new GeneratorRegistry()) {
    this.config = { ...cuidConfig, ...config };
    this.registry = registry;
  }

  /**
   * Create a new, independent generator
   *
   * @throws {CuidError} FINGERPRINT if process identity is unreadable,
   * NAME_TAKEN if `name` is already registered
   * @example
   * ```typescript
   * const handle = cuidController.createGenerator({ name: 'orders' });
   * const id = cuidController.generate(handle);
   * ```
   */
  createGenerator(options: CreateGeneratorOptions = {}): GeneratorHandle {
    const { name, ...generatorOptions } = options;
    try {
      return this.registry.register(new CuidGenerator(generatorOptions), name);
    } catch (error) {
      logger.error(`CUID controller: Failed to create generator ${name ?? '(unnamed)'}`, error);
      throw error; // Propagate to caller
    }
  }

  /**
   * Generate one identifier
   *
   * @throws {CuidError} GENERATOR_NOT_FOUND for an unknown handle,
   * RANDOM_SOURCE if randomness is unavailable
   */
  generate(ref: GeneratorRef): string {
    return this.registry.resolve(ref).generate();
  }

  /**
   * @throws {CuidError} INVALID_INPUT when count is outside [1, maxBatchSize]
   */
  generateMany(ref: GeneratorRef, count: number): string[] {
    if (!Number.isInteger(count) || count < 1 || count > this.config.maxBatchSize) {
      throw new CuidError(
        CuidErrorType.INVALID_INPUT,
        `Invalid count: ${count}. Must be an integer between 1 and ${this.config.maxBatchSize}`
      );
    }
    return this.registry.resolve(ref).generateMany(count);
  }

  destroyGenerator(ref: GeneratorRef): boolean {
    return this.registry.remove(ref);
  }

  /**
   * Handle of the shared "default" generator, created on first use
   */
  getDefaultHandle(): GeneratorHandle {
    const existing = this.registry.getHandle(this.config.defaultGeneratorName);
    if (existing) {
      return existing;
    }
    return this.createGenerator({ name: this.config.defaultGeneratorName });
  }

  parse(id: string): ParsedCuid {
    return parseCuid(id);
  }

  getStats(): CuidStats {
    return { activeGenerators: this.registry.size };
  }

  shutdown(): void {
    const count = this.registry.size;
    this.registry.clear();
    logger.info('CUID controller shut down', { removedGenerators: count });
  }
}

// Export singleton instance
export const cuidController = new CuidController();
