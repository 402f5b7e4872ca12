/**
 * Generator Types
 */

// ============================================================================
// Entropy Sources
// ============================================================================

/** Wall-clock time in microseconds since the Unix epoch */
export type ClockSource = () => number;

/** Integer block value in [0, 36^4) */
export type RandomSource = () => number;

export interface FingerprintSources {
  getProcessId: () => number;
  getHostname: () => string;
}

// ============================================================================
// Generator
// ============================================================================

export interface GeneratorState {
  readonly fingerprint: string; // 4 base-36 chars, fixed for the generator's lifetime
  counter: number; // next counter value, wraps at 36^4
}

export interface GeneratorOptions {
  fingerprint?: string;
  fingerprintSources?: Partial<FingerprintSources>;
  clock?: ClockSource;
  random?: RandomSource;
  initialCounter?: number;
}

// ============================================================================
// Handles
// ============================================================================

export interface GeneratorHandle {
  readonly id: string; // UUIDv7
  readonly name?: string;
  readonly createdAt: number;
}

export interface CreateGeneratorOptions extends GeneratorOptions {
  name?: string;
}

/** A handle, a handle id, or a registered name */
export type GeneratorRef = GeneratorHandle | string;

// ============================================================================
// Parsed Identifier
// ============================================================================

export interface ParsedCuid {
  prefix: string;
  timestamp: string;
  counter: string;
  fingerprint: string;
  random: [string, string];
  timestampValue: number; // microseconds mod 36^8
  counterValue: number;
}

export interface CuidStats {
  activeGenerators: number;
}
