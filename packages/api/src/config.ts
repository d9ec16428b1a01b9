import dotenv from 'dotenv';
import {
  CHUNKING_CONFIG,
  GENERATION_DEFAULTS,
  PIPELINE_CONFIG,
  RETRY_CONFIG,
} from '@groundwork/shared';

dotenv.config();

function optionalNumber(value: string | undefined): number | undefined {
  return value === undefined || value === '' ? undefined : Number(value);
}

export const config = {
  // Server
  env: process.env.NODE_ENV || 'development',
  host: process.env.HOST || '0.0.0.0',
  port: parseInt(process.env.PORT || '3000', 10),
  corsOrigins: (process.env.CORS_ORIGINS || 'http://localhost:3001').split(','),
  logLevel: process.env.LOG_LEVEL || 'info',

  // Database (optional run-report store, enabled when DB_HOST is set)
  database: {
    enabled: Boolean(process.env.DB_HOST),
    host: process.env.DB_HOST || 'localhost',
    port: parseInt(process.env.DB_PORT || '5432', 10),
    database: process.env.DB_NAME || 'groundwork',
    user: process.env.DB_USER || 'postgres',
    password: process.env.DB_PASSWORD || 'postgres',
  },

  // Redis (optional cross-run dedup index)
  redis: {
    url: process.env.REDIS_URL,
    host: process.env.REDIS_HOST || 'localhost',
    port: parseInt(process.env.REDIS_PORT || '6379', 10),
    password: process.env.REDIS_PASSWORD || undefined,
    dedup: process.env.REDIS_DEDUP === 'true',
    dedupPrefix: process.env.REDIS_DEDUP_PREFIX || 'groundwork:dedup:',
    dedupTtlSeconds: parseInt(process.env.REDIS_DEDUP_TTL || '2592000', 10), // 30 days
  },

  // Generation backend
  generation: {
    provider: process.env.GENERATION_PROVIDER === 'openai' ? 'openai' : 'groq',
    // Offline runs: serve responses from a cassette, or capture one from the live backend
    replayFile: process.env.REPLAY_FILE || undefined,
    recordFile: process.env.RECORD_FILE || undefined,
    timeoutMs: parseInt(process.env.GENERATION_TIMEOUT_MS || String(GENERATION_DEFAULTS.TIMEOUT_MS), 10),
    // Run-level overrides of lens defaults; unset means "use the lens value"
    temperature: optionalNumber(process.env.GENERATION_TEMPERATURE),
    maxOutputTokens: optionalNumber(process.env.GENERATION_MAX_OUTPUT_TOKENS),
    groq: {
      apiKey: process.env.GROQ_API_KEY || '',
      model: process.env.GROQ_MODEL || 'llama-3.3-70b-versatile',
    },
    openai: {
      apiKey: process.env.OPENAI_API_KEY || '',
      model: process.env.OPENAI_MODEL || 'gpt-4o-mini',
      baseUrl: process.env.OPENAI_BASE_URL || undefined,
    },
  },

  // Pipeline
  pipeline: {
    chunkSize: parseInt(process.env.CHUNK_SIZE || String(CHUNKING_CONFIG.CHUNK_SIZE), 10),
    chunkOverlap: parseInt(process.env.CHUNK_OVERLAP || String(CHUNKING_CONFIG.CHUNK_OVERLAP), 10),
    boundary: process.env.CHUNK_BOUNDARY || CHUNKING_CONFIG.BOUNDARY,
    lenses: (process.env.LENSES || PIPELINE_CONFIG.DEFAULT_LENSES.join(','))
      .split(',')
      .map((name) => name.trim())
      .filter(Boolean),
    lensFile: process.env.LENS_FILE || undefined,
    workers: parseInt(process.env.PIPELINE_WORKERS || String(PIPELINE_CONFIG.WORKERS), 10),
    maxInFlight: parseInt(process.env.MAX_IN_FLIGHT || String(PIPELINE_CONFIG.MAX_IN_FLIGHT), 10),
    minRecordLength: parseInt(process.env.MIN_RECORD_LENGTH || String(PIPELINE_CONFIG.MIN_RECORD_LENGTH), 10),
    outputDir: process.env.OUTPUT_DIR || 'data/datasets',
    // Collapse space runs and drop Project Gutenberg trailers before chunking
    cleanSource: process.env.CLEAN_SOURCE !== 'false',

    retry: {
      maxAttempts: parseInt(process.env.RETRY_MAX_ATTEMPTS || String(RETRY_CONFIG.MAX_ATTEMPTS), 10),
      baseDelayMs: parseInt(process.env.RETRY_BASE_DELAY_MS || String(RETRY_CONFIG.BASE_DELAY_MS), 10),
      maxDelayMs: parseInt(process.env.RETRY_MAX_DELAY_MS || String(RETRY_CONFIG.MAX_DELAY_MS), 10),
    },
  },
} as const;

export type AppConfig = typeof config;
export type ProviderName = AppConfig['generation']['provider'];
