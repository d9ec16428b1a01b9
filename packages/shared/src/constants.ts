/**
 * Shared constants for Groundwork.
 */

export const CHUNKING_CONFIG = {
  CHUNK_SIZE: 2000, // characters
  CHUNK_OVERLAP: 200,
  BOUNDARY: 'sentence',
} as const;

export const GENERATION_DEFAULTS = {
  TEMPERATURE: 0.7,
  MAX_OUTPUT_TOKENS: 1024,
  TIMEOUT_MS: 60000,
} as const;

export const RETRY_CONFIG = {
  MAX_ATTEMPTS: 4,
  BASE_DELAY_MS: 500,
  MAX_DELAY_MS: 8000,
} as const;

export const PIPELINE_CONFIG = {
  WORKERS: 4,
  MAX_IN_FLIGHT: 4,
  MIN_RECORD_LENGTH: 80, // characters across all turns
  DEFAULT_LENSES: ['dialog'],
} as const;

export const ROLES = ['user', 'assistant'] as const;
