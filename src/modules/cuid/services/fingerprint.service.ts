/**
 * Fingerprint Service
 * Derives the per-process, per-host block embedded in every CUID
 */

import os from 'os';
import { logger } from '@/shared/utils';
import { BASE, FINGERPRINT_OPERATOR } from '../config/cuid.constants';
import { CuidError, CuidErrorType } from '../types/error.types';
import type { FingerprintSources } from '../types/generator.types';
import { padBlock } from '../utils/base36';

export const defaultFingerprintSources: FingerprintSources = {
  getProcessId: () => process.pid,
  getHostname: () => os.hostname(),
};

function readSource<T>(label: string, read: () => T): T {
  try {
    return read();
  } catch (error) {
    throw new CuidError(CuidErrorType.FINGERPRINT, `Unable to read ${label}`, { cause: error });
  }
}

/**
 * (pid mod 36^2) * 36^2
 */
export function processComponent(pid: number): number {
  return (pid % FINGERPRINT_OPERATOR) * FINGERPRINT_OPERATOR;
}

/**
 * (sum of code points + code point count + 36) mod 36^2
 */
export function hostComponent(hostname: string): number {
  const codePoints = Array.from(hostname, (char) => char.codePointAt(0) ?? 0);
  const sum = codePoints.reduce((total, code) => total + code, 0);
  return (sum + codePoints.length + BASE) % FINGERPRINT_OPERATOR;
}

/**
 * Derive the 4-character fingerprint.
 * The two components occupy the high and low base-36 digit pairs, so the
 * sum never exceeds "zzzz".
 *
 * @throws {CuidError} FINGERPRINT when the process id or hostname cannot be read
 */
export function deriveFingerprint(sources: Partial<FingerprintSources> = {}): string {
  const { getProcessId, getHostname } = { ...defaultFingerprintSources, ...sources };

  try {
    const pid = readSource('process id', getProcessId);
    if (!Number.isInteger(pid) || pid < 0) {
      throw new CuidError(CuidErrorType.FINGERPRINT, `Invalid process id: ${pid}`);
    }

    const hostname = readSource('hostname', getHostname);
    if (typeof hostname !== 'string' || hostname.length === 0) {
      throw new CuidError(CuidErrorType.FINGERPRINT, 'Hostname is empty');
    }

    const fingerprint = padBlock(processComponent(pid) + hostComponent(hostname));
    logger.debug('Fingerprint derived', { fingerprint });
    return fingerprint;
  } catch (error) {
    logger.error('Fingerprint derivation failed', error);
    throw error;
  }
}
