/**
 * Shared Configuration
 * Centralized exports for all configuration
 */

import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

/**
 * Environment variables
 */
export const env = {
  NODE_ENV: process.env.NODE_ENV || 'development',
  PORT: parseInt(process.env.PORT || '3001', 10),
  FRONTEND_URL: process.env.FRONTEND_URL || 'http://localhost:5173',

  // Largest number of ids a single batch request may ask for
  CUID_MAX_BATCH: parseInt(process.env.CUID_MAX_BATCH || '1000', 10),

  // Logging
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
} as const;

/**
 * Validate environment variables
 */
export function validateEnv(source: Pick<typeof env, 'PORT' | 'CUID_MAX_BATCH'> = env): void {
  const problems: string[] = [];

  if (!Number.isInteger(source.PORT) || source.PORT < 0 || source.PORT > 65535) {
    problems.push(`PORT must be an integer between 0 and 65535`);
  }

  if (!Number.isInteger(source.CUID_MAX_BATCH) || source.CUID_MAX_BATCH < 1) {
    problems.push(`CUID_MAX_BATCH must be a positive integer`);
  }

  if (problems.length > 0) {
    throw new Error(`Invalid environment variables: ${problems.join('; ')}`);
  }
}

/**
 * Check if running in development mode
 */
export const isDevelopment = env.NODE_ENV === 'development';

/**
 * Check if running in production mode
 */
export const isProduction = env.NODE_ENV === 'production';

/**
 * Check if running in test mode
 */
export const isTest = env.NODE_ENV === 'test';
