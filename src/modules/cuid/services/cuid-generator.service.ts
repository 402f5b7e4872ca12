/**
 * CUID Generator Service
 * Stateful identifier factory: one fingerprint, one counter per instance
 */

import { logger } from '@/shared/utils';
import { DISCRETE_VALUES, PREFIX } from '../config/cuid.constants';
import { CuidError, CuidErrorType } from '../types/error.types';
import type {
  ClockSource,
  GeneratorOptions,
  GeneratorState,
  RandomSource,
} from '../types/generator.types';
import { isBase36Block, padBlock } from '../utils/base36';
import { drawRandomBlock, mathRandom, readTimestamp, systemClock } from '../utils/entropy';
import { deriveFingerprint } from './fingerprint.service';

function resolveInitialCounter(initialCounter: number | undefined): number {
  if (initialCounter === undefined) {
    return 0;
  }
  if (!Number.isInteger(initialCounter) || initialCounter < 0 || initialCounter >= DISCRETE_VALUES) {
    throw new CuidError(
      CuidErrorType.INVALID_INPUT,
      `Invalid initialCounter: ${initialCounter}. Must be an integer in [0, ${DISCRETE_VALUES})`
    );
  }
  return initialCounter;
}

function resolveFingerprint(options: GeneratorOptions): string {
  if (options.fingerprint === undefined) {
    return deriveFingerprint(options.fingerprintSources);
  }
  if (!isBase36Block(options.fingerprint)) {
    throw new CuidError(
      CuidErrorType.INVALID_INPUT,
      `Invalid fingerprint: "${options.fingerprint}". Must be 4 base-36 characters`
    );
  }
  return options.fingerprint.toLowerCase();
}

/**
 * CUID Generator Class
 *
 * `generate()` is synchronous, so on Node's event loop the counter read,
 * the assembly and the increment always run as one unit per instance.
 */
export class CuidGenerator {
  private readonly state: GeneratorState;
  private readonly clock: ClockSource;
  private readonly random: RandomSource;

  /**
   * @throws {CuidError} FINGERPRINT when process identity cannot be read,
   * INVALID_INPUT for a malformed fingerprint or initialCounter option
   */
  constructor(options: GeneratorOptions = {}) {
    const counter = resolveInitialCounter(options.initialCounter);
    this.state = { fingerprint: resolveFingerprint(options), counter };
    this.clock = options.clock ?? systemClock;
    this.random = options.random ?? mathRandom;
  }

  get fingerprint(): string {
    return this.state.fingerprint;
  }

  /** Counter value the next identifier will carry */
  get counter(): number {
    return this.state.counter;
  }

  /**
   * Produce one identifier and advance the counter.
   * All blocks are built before the counter moves, so a failing random
   * source leaves the generator untouched.
   *
   * @throws {CuidError} RANDOM_SOURCE when a random block cannot be drawn
   * @example
   * ```typescript
   * const generator = new CuidGenerator();
   * generator.generate(); // "cm2x8k1qz0000yarc1k9a4f0b"
   * ```
   */
  generate(): string {
    const { counter, fingerprint } = this.state;

    let cuid: string;
    try {
      cuid = [
        PREFIX,
        readTimestamp(this.clock),
        padBlock(counter),
        fingerprint,
        drawRandomBlock(this.random),
        drawRandomBlock(this.random),
      ]
        .join('')
        .toLowerCase();
    } catch (error) {
      logger.error('CUID generation failed', error);
      throw error;
    }

    // Wraps at 36^4 so the counter block stays 4 characters
    this.state.counter = (counter + 1) % DISCRETE_VALUES;
    return cuid;
  }

  generateMany(count: number): string[] {
    const ids: string[] = [];
    for (let i = 0; i < count; i++) {
      ids.push(this.generate());
    }
    return ids;
  }
}

export function createGenerator(options: GeneratorOptions = {}): CuidGenerator {
  return new CuidGenerator(options);
}

export function generate(generator: CuidGenerator): string {
  return generator.generate();
}
