/**
 * CUID Parser
 * Splits an identifier back into its blocks. The timestamp is the only
 * variable-width part, so the fixed blocks are read from the end.
 */

import {
  BLOCK_SIZE,
  FIXED_SUFFIX_LENGTH,
  MAX_TIMESTAMP_LENGTH,
  PREFIX,
} from '../config/cuid.constants';
import { CuidError, CuidErrorType } from '../types/error.types';
import type { ParsedCuid } from '../types/generator.types';
import { fromBase36 } from './base36';

const CUID_PATTERN = /^[0-9a-z]+$/;

export function parseCuid(id: string): ParsedCuid {
  if (!id.startsWith(PREFIX)) {
    throw new CuidError(CuidErrorType.INVALID_INPUT, `CUID must start with "${PREFIX}"`);
  }

  if (!CUID_PATTERN.test(id)) {
    throw new CuidError(CuidErrorType.INVALID_INPUT, 'CUID must contain only [0-9a-z]');
  }

  const timestampLength = id.length - PREFIX.length - FIXED_SUFFIX_LENGTH;
  if (timestampLength < 1 || timestampLength > MAX_TIMESTAMP_LENGTH) {
    throw new CuidError(
      CuidErrorType.INVALID_INPUT,
      `CUID length ${id.length} is outside ${PREFIX.length + FIXED_SUFFIX_LENGTH + 1}..${
        PREFIX.length + FIXED_SUFFIX_LENGTH + MAX_TIMESTAMP_LENGTH
      }`
    );
  }

  const blocksStart = PREFIX.length + timestampLength;
  const block = (index: number): string =>
    id.slice(blocksStart + index * BLOCK_SIZE, blocksStart + (index + 1) * BLOCK_SIZE);

  const timestamp = id.slice(PREFIX.length, blocksStart);
  const counter = block(0);

  return {
    prefix: PREFIX,
    timestamp,
    counter,
    fingerprint: block(1),
    random: [block(2), block(3)],
    timestampValue: fromBase36(timestamp),
    counterValue: fromBase36(counter),
  };
}

export function isCuid(value: unknown): boolean {
  if (typeof value !== 'string') {
    return false;
  }
  try {
    parseCuid(value);
    return true;
  } catch {
    return false;
  }
}
