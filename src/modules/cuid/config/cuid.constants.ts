/**
 * CUID Constants
 * Numeric layout shared by every identifier block
 */

export const BASE = 36;

// Characters per fixed-width block (counter, fingerprint, random)
export const BLOCK_SIZE = 4;

// 36^4: distinct values a block can hold
export const DISCRETE_VALUES = BASE ** BLOCK_SIZE;

// 36^8: timestamp wraps at this many microseconds (~32.6 days)
export const TIMESTAMP_MODULUS = DISCRETE_VALUES * DISCRETE_VALUES;

export const MAX_TIMESTAMP_LENGTH = BLOCK_SIZE * 2;

// 36^2: fingerprint splits into a process half and a host half
export const FINGERPRINT_OPERATOR = BASE * BASE;

export const PREFIX = 'c';

// counter + fingerprint + two random blocks
export const FIXED_SUFFIX_LENGTH = BLOCK_SIZE * 4;

export const PAD_CHAR = '0';
