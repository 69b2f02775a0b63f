// ============================================
// Server Configuration
// Environment variables validated once at startup
// ============================================

import path from 'path';
import Joi from 'joi';
import { ConfigurationError } from '../shared/utils/errors';

export type ArtifactStoreType = 'file' | 'memory';

/** Upload types the summarizers can read */
export const SUPPORTED_EXTENSIONS = ['.csv', '.tsv', '.xlsx'];
export type SessionRegistryType = 'memory' | 'redis';

export interface LlmConfig {
  baseUrl: string;
  apiKey?: string;
  model: string;
  /** Models a chart request may name, default first */
  models: string[];
  timeoutMs: number;
  maxRetries: number;
}

export interface ServerConfig {
  port: number;
  nodeEnv: string;
  apiToken?: string;
  corsOrigins: string[] | '*';
  artifactStore: ArtifactStoreType;
  tempDir: string;
  maxUploadBytes: number;
  allowedExtensions: string[];
  sessionTtlMs: number;
  cleanupIntervalMs: number;
  autoCleanupEnabled: boolean;
  runCleanupOnStart: boolean;
  sessionRegistry: SessionRegistryType;
  redisUrl: string;
  llm: LlmConfig;
}

interface RawEnv {
  PORT: number;
  NODE_ENV: string;
  API_TOKEN?: string;
  CORS_ALLOW_ORIGINS?: string;
  ARTIFACT_STORE: ArtifactStoreType;
  TEMP_DIR: string;
  MAX_UPLOAD_MB: number;
  ALLOWED_EXTENSIONS: string;
  SESSION_TTL_SECONDS: number;
  CLEANUP_INTERVAL_SECONDS?: number;
  AUTO_CLEANUP_ENABLED: boolean;
  CLEANUP_RUN_ON_START: boolean;
  SESSION_REGISTRY: SessionRegistryType;
  REDIS_URL: string;
  LLM_BASE_URL: string;
  LLM_API_KEY?: string;
  LLM_MODEL: string;
  LLM_MODELS?: string;
  LLM_TIMEOUT_MS: number;
  LLM_MAX_RETRIES: number;
}

const DEFAULT_TTL_SECONDS = 300;

const envSchema = Joi.object<RawEnv>({
  PORT: Joi.number().integer().min(0).max(65535).default(5000),
  NODE_ENV: Joi.string().default('development'),
  API_TOKEN: Joi.string().min(1).when('NODE_ENV', {
    is: 'test',
    then: Joi.optional(),
    otherwise: Joi.required()
  }),
  CORS_ALLOW_ORIGINS: Joi.string().optional(),
  ARTIFACT_STORE: Joi.string().valid('file', 'memory').default('file'),
  TEMP_DIR: Joi.string().default('./temp'),
  MAX_UPLOAD_MB: Joi.number().positive().default(5),
  ALLOWED_EXTENSIONS: Joi.string().default('.csv,.xlsx'),
  // <= 0 is legal: every session is expired on the next pass
  SESSION_TTL_SECONDS: Joi.number().default(DEFAULT_TTL_SECONDS),
  CLEANUP_INTERVAL_SECONDS: Joi.number().positive().optional(),
  AUTO_CLEANUP_ENABLED: Joi.boolean().default(true),
  CLEANUP_RUN_ON_START: Joi.boolean().default(true),
  SESSION_REGISTRY: Joi.string().valid('memory', 'redis').default('memory'),
  REDIS_URL: Joi.string().uri({ scheme: ['redis', 'rediss'] }).default('redis://localhost:6379'),
  LLM_BASE_URL: Joi.string().uri({ scheme: ['http', 'https'] }).default('https://api.openai.com/v1'),
  LLM_API_KEY: Joi.string().allow('').optional(),
  LLM_MODEL: Joi.string().default('gpt-4o-mini'),
  LLM_MODELS: Joi.string().optional(),
  LLM_TIMEOUT_MS: Joi.number().integer().positive().default(60000),
  LLM_MAX_RETRIES: Joi.number().integer().min(1).max(10).default(3)
}).unknown(true);

/**
 * Validate and normalize the environment. Throws ConfigurationError
 * listing every offending key.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const result = envSchema.validate(env, {
    abortEarly: false,
    convert: true
  });

  if (result.error) {
    throw new ConfigurationError(result.error.details.map(detail => detail.message));
  }

  const value = result.value;

  const intervalSeconds =
    value.CLEANUP_INTERVAL_SECONDS ??
    (value.SESSION_TTL_SECONDS > 0 ? value.SESSION_TTL_SECONDS : DEFAULT_TTL_SECONDS);

  const allowedExtensions = splitList(value.ALLOWED_EXTENSIONS)
    .map(ext => ext.toLowerCase())
    .map(ext => (ext.startsWith('.') ? ext : `.${ext}`));

  const unsupported = allowedExtensions.filter(ext => !SUPPORTED_EXTENSIONS.includes(ext));
  if (unsupported.length > 0) {
    throw new ConfigurationError(
      unsupported.map(ext => `"ALLOWED_EXTENSIONS" contains unsupported type ${ext} (supported: ${SUPPORTED_EXTENSIONS.join(', ')})`)
    );
  }

  const models = [...new Set([value.LLM_MODEL, ...splitList(value.LLM_MODELS ?? '')])];

  const corsOrigins = value.CORS_ALLOW_ORIGINS
    ? splitList(value.CORS_ALLOW_ORIGINS)
    : '*';

  return {
    port: value.PORT,
    nodeEnv: value.NODE_ENV,
    apiToken: value.API_TOKEN,
    corsOrigins,
    artifactStore: value.ARTIFACT_STORE,
    tempDir: path.resolve(value.TEMP_DIR),
    maxUploadBytes: Math.floor(value.MAX_UPLOAD_MB * 1024 * 1024),
    allowedExtensions,
    sessionTtlMs: value.SESSION_TTL_SECONDS * 1000,
    cleanupIntervalMs: intervalSeconds * 1000,
    autoCleanupEnabled: value.AUTO_CLEANUP_ENABLED,
    runCleanupOnStart: value.CLEANUP_RUN_ON_START,
    sessionRegistry: value.SESSION_REGISTRY,
    redisUrl: value.REDIS_URL,
    llm: {
      baseUrl: value.LLM_BASE_URL.replace(/\/+$/, ''),
      apiKey: value.LLM_API_KEY || undefined,
      model: value.LLM_MODEL,
      models,
      timeoutMs: value.LLM_TIMEOUT_MS,
      maxRetries: value.LLM_MAX_RETRIES
    }
  };
}

function splitList(raw: string): string[] {
  return raw.split(',').map(item => item.trim()).filter(Boolean);
}
