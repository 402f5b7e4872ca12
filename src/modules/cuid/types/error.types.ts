/**
 * CUID Error Types
 */

export enum CuidErrorType {
  FINGERPRINT = 'fingerprint', // process id or hostname unreadable (fatal at construction)
  RANDOM_SOURCE = 'random_source', // random draw failed (fatal for that generate call)
  INVALID_INPUT = 'invalid_input',
  GENERATOR_NOT_FOUND = 'generator_not_found',
  NAME_TAKEN = 'name_taken',
}

export class CuidError extends Error {
  readonly type: CuidErrorType;

  constructor(type: CuidErrorType, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CuidError';
    this.type = type;
  }
}

export function isCuidError(error: unknown, type?: CuidErrorType): error is CuidError {
  return error instanceof CuidError && (type === undefined || error.type === type);
}
