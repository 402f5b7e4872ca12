/**
 * Generator Registry Service
 * Tracks live generators by handle id and optional name
 */

import { generateId, logger } from '@/shared/utils';
import { CuidError, CuidErrorType } from '../types/error.types';
import type { GeneratorHandle, GeneratorRef } from '../types/generator.types';
import type { CuidGenerator } from './cuid-generator.service';

interface RegistryEntry {
  handle: GeneratorHandle;
  generator: CuidGenerator;
}

export class GeneratorRegistry {
  private entries: Map<string, RegistryEntry> = new Map();
  private nameIndex: Map<string, string> = new Map(); // name -> handle id

  /**
   * Register a generator and hand back its handle
   *
   * @throws {CuidError} NAME_TAKEN when `name` already belongs to a live generator
   */
  register(generator: CuidGenerator, name?: string): GeneratorHandle {
    if (name !== undefined && this.nameIndex.has(name)) {
      throw new CuidError(CuidErrorType.NAME_TAKEN, `Generator name already registered: ${name}`);
    }

    const handle: GeneratorHandle = {
      id: generateId(),
      name,
      createdAt: Date.now(),
    };

    this.entries.set(handle.id, { handle, generator });
    if (name !== undefined) {
      this.nameIndex.set(name, handle.id);
    }

    logger.info('Generator registered', {
      handleId: handle.id,
      name,
      fingerprint: generator.fingerprint,
    });

    return handle;
  }

  private lookup(ref: GeneratorRef): RegistryEntry | undefined {
    if (typeof ref !== 'string') {
      return this.entries.get(ref.id);
    }
    const id = this.nameIndex.get(ref) ?? ref;
    return this.entries.get(id);
  }

  /**
   * @throws {CuidError} GENERATOR_NOT_FOUND
   */
  resolve(ref: GeneratorRef): CuidGenerator {
    const entry = this.lookup(ref);
    if (!entry) {
      throw new CuidError(
        CuidErrorType.GENERATOR_NOT_FOUND,
        `Generator not found: ${typeof ref === 'string' ? ref : ref.id}`
      );
    }
    return entry.generator;
  }

  getHandle(ref: GeneratorRef): GeneratorHandle | undefined {
    return this.lookup(ref)?.handle;
  }

  has(ref: GeneratorRef): boolean {
    return this.lookup(ref) !== undefined;
  }

  remove(ref: GeneratorRef): boolean {
    const entry = this.lookup(ref);
    if (!entry) {
      return false;
    }

    this.entries.delete(entry.handle.id);
    if (entry.handle.name !== undefined) {
      this.nameIndex.delete(entry.handle.name);
    }

    logger.info('Generator removed', { handleId: entry.handle.id, name: entry.handle.name });
    return true;
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
    this.nameIndex.clear();
  }
}
