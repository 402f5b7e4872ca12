/**
 * Base-36 Encoding
 * Fixed-width block encoding shared by counter, fingerprint and random blocks
 */

import { BASE, BLOCK_SIZE, PAD_CHAR } from '../config/cuid.constants';
import { CuidError, CuidErrorType } from '../types/error.types';

const BASE36_PATTERN = /^[0-9a-z]+$/i;

export function toBase36(value: number): string {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new CuidError(
      CuidErrorType.INVALID_INPUT,
      `Cannot base-36 encode ${value}: expected a non-negative safe integer`
    );
  }
  return value.toString(BASE);
}

/**
 * Encode and left-pad with '0' to `width`.
 * Encodings already at or past `width` are returned whole, never truncated.
 */
export function padBlock(value: number, width: number = BLOCK_SIZE): string {
  return toBase36(value).padStart(width, PAD_CHAR);
}

export function fromBase36(text: string): number {
  if (!BASE36_PATTERN.test(text)) {
    throw new CuidError(CuidErrorType.INVALID_INPUT, `Not a base-36 string: "${text}"`);
  }
  return parseInt(text, BASE);
}

export function isBase36Block(text: string, width: number = BLOCK_SIZE): boolean {
  return text.length === width && BASE36_PATTERN.test(text);
}
