/**
 * Config Module
 *
 * Reads the process environment once, validates it with zod and produces the
 * typed configuration every other module receives. No module reads
 * process.env on its own except the default logger's LOG_LEVEL.
 */

import { z } from 'zod';
import type { ModuleResult } from '../types/index.js';

const DEFAULT_PERPLEXITY_API_URL = 'https://api.perplexity.ai';
const DEFAULT_PERPLEXITY_MODEL = 'sonar-pro';
const DEFAULT_ANTHROPIC_MODEL = 'claude-sonnet-4-20250514';
const DEFAULT_ANTHROPIC_MAX_TOKENS = 400;
const DEFAULT_PROVIDER_TIMEOUT_MS = 120000;
export const DEFAULT_PREVIEW_ROW_COUNT = 5;
export const DEFAULT_CONCURRENCY = 3;
export const MAX_CONCURRENCY = 5;

/** Recommended retry budget: 3 attempts, backoff starting at 1s */
export const DEFAULT_RETRY_DELAYS_MS: readonly number[] = [1000, 2000];

const optionalString = z
  .string()
  .transform((value) => value.trim())
  .optional()
  .transform((value) => (value ? value : undefined));

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .optional()
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const EnvSchema = z
  .object({
    PERPLEXITY_API_KEY: optionalString,
    PERPLEXITY_API_URL: z.string().url().default(DEFAULT_PERPLEXITY_API_URL),
    PERPLEXITY_MODEL: z.string().min(1).default(DEFAULT_PERPLEXITY_MODEL),
    ANTHROPIC_API_KEY: optionalString,
    ANTHROPIC_MODEL: z.string().min(1).default(DEFAULT_ANTHROPIC_MODEL),
    ANTHROPIC_MAX_TOKENS: z.coerce.number().int().positive().default(DEFAULT_ANTHROPIC_MAX_TOKENS),
    STORAGE_BACKEND: z.enum(['memory', 's3']).default('memory'),
    S3_BUCKET: optionalString,
    AWS_REGION: z.string().min(1).default('us-east-1'),
    S3_PREFIX: z.string().min(1).default('runs'),
    S3_ENDPOINT: optionalString,
    S3_FORCE_PATH_STYLE: booleanFlag,
    PREVIEW_ROW_COUNT: z.coerce.number().int().positive().default(DEFAULT_PREVIEW_ROW_COUNT),
    QUALIFICATION_CONCURRENCY: z.coerce
      .number()
      .int()
      .min(1)
      .max(MAX_CONCURRENCY)
      .default(DEFAULT_CONCURRENCY),
    PROVIDER_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_PROVIDER_TIMEOUT_MS),
    SELLER_COMPANY: z.string().min(1).default('Northwind AI'),
    SENDER_NAME: z.string().min(1).default('Sam'),
  })
  .superRefine((env, ctx) => {
    if (env.STORAGE_BACKEND === 's3' && !env.S3_BUCKET) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['S3_BUCKET'],
        message: 'S3_BUCKET is required when STORAGE_BACKEND is s3',
      });
    }
  });

export interface ResearchModelConfig {
  apiKey: string | undefined;
  apiUrl: string;
  model: string;
  timeoutMs: number;
}

export interface DraftingModelConfig {
  apiKey: string | undefined;
  model: string;
  maxTokens: number;
  timeoutMs: number;
}

export type StorageConfig =
  | { type: 'memory' }
  | {
      type: 's3';
      bucket: string;
      region: string;
      prefix: string;
      endpoint?: string;
      forcePathStyle: boolean;
    };

export interface PipelineConfig {
  previewRowCount: number;
  concurrency: number;
  retryDelaysMs: readonly number[];
}

export interface PersonaConfig {
  sellerCompany: string;
  senderName: string;
}

export interface AppConfig {
  research: ResearchModelConfig;
  drafting: DraftingModelConfig;
  storage: StorageConfig;
  pipeline: PipelineConfig;
  persona: PersonaConfig;
}

/**
 * Load and validate configuration from environment variables
 *
 * @param env - Environment map (default: process.env)
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ModuleResult<AppConfig> {
  const startTime = Date.now();
  const timestamp = new Date().toISOString();

  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const errors = parsed.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`);
    return {
      success: false,
      error: {
        code: 'CONFIG_ERROR',
        message: 'Invalid configuration',
        details: errors,
      },
      metadata: {
        runId: '',
        module: 'config',
        timestamp,
        duration: Date.now() - startTime,
      },
    };
  }

  const e = parsed.data;

  let storage: StorageConfig = { type: 'memory' };
  if (e.STORAGE_BACKEND === 's3' && e.S3_BUCKET) {
    storage = {
      type: 's3',
      bucket: e.S3_BUCKET,
      region: e.AWS_REGION,
      prefix: e.S3_PREFIX,
      forcePathStyle: e.S3_FORCE_PATH_STYLE,
      ...(e.S3_ENDPOINT ? { endpoint: e.S3_ENDPOINT } : {}),
    };
  }

  return {
    success: true,
    data: {
      research: {
        apiKey: e.PERPLEXITY_API_KEY,
        apiUrl: e.PERPLEXITY_API_URL.replace(/\/+$/, ''),
        model: e.PERPLEXITY_MODEL,
        timeoutMs: e.PROVIDER_TIMEOUT_MS,
      },
      drafting: {
        apiKey: e.ANTHROPIC_API_KEY,
        model: e.ANTHROPIC_MODEL,
        maxTokens: e.ANTHROPIC_MAX_TOKENS,
        timeoutMs: e.PROVIDER_TIMEOUT_MS,
      },
      storage,
      pipeline: {
        previewRowCount: e.PREVIEW_ROW_COUNT,
        concurrency: e.QUALIFICATION_CONCURRENCY,
        retryDelaysMs: DEFAULT_RETRY_DELAYS_MS,
      },
      persona: {
        sellerCompany: e.SELLER_COMPANY,
        senderName: e.SENDER_NAME,
      },
    },
    metadata: {
      runId: '',
      module: 'config',
      timestamp,
      duration: Date.now() - startTime,
    },
  };
}
