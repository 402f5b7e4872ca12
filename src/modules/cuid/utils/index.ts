export * from './base36';
export * from './entropy';
export * from './cuid-parser';
