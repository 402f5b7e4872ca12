/**
 * CUID Types - Public Exports
 */

export * from './generator.types';
export * from './error.types';
