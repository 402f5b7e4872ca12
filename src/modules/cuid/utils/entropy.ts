/**
 * Entropy Sources
 * Wall-clock and random sourcing for the timestamp and random blocks
 */

import { performance } from 'perf_hooks';
import { DISCRETE_VALUES, TIMESTAMP_MODULUS } from '../config/cuid.constants';
import { CuidError, CuidErrorType } from '../types/error.types';
import type { ClockSource, RandomSource } from '../types/generator.types';
import { padBlock, toBase36 } from './base36';

/**
 * Microseconds since the epoch. Date.now() only has millisecond resolution,
 * so the high-resolution timer is anchored to its time origin instead.
 */
export const systemClock: ClockSource = () =>
  Math.floor((performance.timeOrigin + performance.now()) * 1000);

/**
 * Uniform integer in [1, 36^4 - 1]. Not cryptographically secure.
 */
export const mathRandom: RandomSource = () =>
  1 + Math.floor(Math.random() * (DISCRETE_VALUES - 1));

export function encodeTimestamp(micros: number): string {
  return toBase36(micros % TIMESTAMP_MODULUS);
}

export function readTimestamp(clock: ClockSource): string {
  return encodeTimestamp(Math.floor(clock()));
}

export function drawRandomBlock(random: RandomSource): string {
  let value: number;
  try {
    value = random();
  } catch (error) {
    throw new CuidError(CuidErrorType.RANDOM_SOURCE, 'Random source failed to produce a value', {
      cause: error,
    });
  }

  if (!Number.isInteger(value) || value < 0 || value >= DISCRETE_VALUES) {
    throw new CuidError(
      CuidErrorType.RANDOM_SOURCE,
      `Random source returned ${value}, expected an integer in [0, ${DISCRETE_VALUES})`
    );
  }

  return padBlock(value);
}
