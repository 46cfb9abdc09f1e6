/**
 * Providers Module
 *
 * Completion clients for the two external capabilities:
 * - PerplexityClient: web-research chat completions over axios
 * - ClaudeClient: Anthropic Messages API for drafting
 *
 * Both map every transport or envelope failure to ProviderError and an
 * aborted signal to RunAbortedError. Retrying is not done here; callers wrap
 * calls in withRetry so one policy governs both providers.
 */

import Anthropic from '@anthropic-ai/sdk';
import type { ContentBlock } from '@anthropic-ai/sdk/resources/messages';
import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { ProviderError, RunAbortedError } from '../errors/index.js';
import { createLogger, type Logger } from '../observability/index.js';
import type {
  CompletionClient,
  CompletionRequest,
  CompletionResponse,
} from '../types/index.js';

const DEFAULT_PERPLEXITY_URL = 'https://api.perplexity.ai';
const DEFAULT_PERPLEXITY_MODEL = 'sonar-pro';
const DEFAULT_CLAUDE_MODEL = 'claude-sonnet-4-20250514';
const DEFAULT_MAX_TOKENS = 1024;
const DEFAULT_TEMPERATURE = 0.2;
const DEFAULT_TIMEOUT = 120000;

// ============================================================================
// Retry
// ============================================================================

/**
 * Sleep for specified milliseconds, rejecting early if the signal aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new RunAbortedError());
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new RunAbortedError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export interface RetryOptions {
  /** Delay before each retry; attempts = delaysMs.length + 1 */
  delaysMs: readonly number[];
  signal?: AbortSignal;
  logger?: Logger;
  /** Label for log lines */
  operation?: string;
}

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: unknown; attempts: number };

/**
 * Run an operation under the shared retry policy
 *
 * Only ProviderError is retried. Anything else (ParseError, RunAbortedError,
 * programming errors) ends the loop immediately.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<RetryOutcome<T>> {
  const maxAttempts = options.delaysMs.length + 1;
  let attempts = 0;

  while (attempts < maxAttempts) {
    if (options.signal?.aborted) {
      return { ok: false, error: new RunAbortedError(), attempts };
    }

    attempts++;
    try {
      const value = await operation(attempts);
      return { ok: true, value, attempts };
    } catch (error) {
      const delay = options.delaysMs[attempts - 1];
      if (!(error instanceof ProviderError) || delay === undefined) {
        return { ok: false, error, attempts };
      }

      options.logger?.warn(`Provider call failed, retrying in ${delay}ms`, {
        operation: options.operation,
        attempt: attempts,
        provider: error.provider,
        status: error.status,
        error: error.message,
      });

      try {
        await sleep(delay, options.signal);
      } catch (sleepError) {
        return { ok: false, error: sleepError, attempts };
      }
    }
  }

  return { ok: false, error: new RunAbortedError(), attempts };
}

// ============================================================================
// Perplexity
// ============================================================================

const ChatCompletionSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string(),
        }),
      })
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
    })
    .optional(),
});

export interface PerplexityClientOptions {
  apiKey: string;
  /** Base URL without the /chat/completions suffix */
  apiUrl?: string;
  model?: string;
  timeoutMs?: number;
  /** Preconfigured axios instance; replaces the default one */
  http?: AxiosInstance;
  logger?: Logger;
}

/**
 * Create the Perplexity HTTP client
 */
function createPerplexityHttp(options: PerplexityClientOptions): AxiosInstance {
  return axios.create({
    baseURL: options.apiUrl ?? DEFAULT_PERPLEXITY_URL,
    timeout: options.timeoutMs ?? DEFAULT_TIMEOUT,
    headers: {
      'Content-Type': 'application/json',
      Authorization: `Bearer ${options.apiKey}`,
    },
  });
}

export class PerplexityClient implements CompletionClient {
  readonly provider = 'perplexity';
  private readonly http: AxiosInstance;
  private readonly model: string;
  private readonly logger: Logger;

  constructor(options: PerplexityClientOptions) {
    this.http = options.http ?? createPerplexityHttp(options);
    this.model = options.model ?? DEFAULT_PERPLEXITY_MODEL;
    this.logger = options.logger ?? createLogger('providers');
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    this.logger.debug('Calling Perplexity API', {
      model: this.model,
      promptLength: request.prompt.length,
    });

    let data: unknown;
    let status: number;
    try {
      const response = await this.http.post<unknown>(
        '/chat/completions',
        {
          model: this.model,
          messages: [
            { role: 'system', content: request.system },
            { role: 'user', content: request.prompt },
          ],
          max_tokens: request.maxTokens ?? DEFAULT_MAX_TOKENS,
          temperature: request.temperature ?? DEFAULT_TEMPERATURE,
        },
        { signal: request.signal }
      );
      data = response.data;
      status = response.status;
    } catch (error) {
      if (request.signal?.aborted) {
        throw new RunAbortedError();
      }
      if (axios.isAxiosError(error)) {
        const responseStatus = error.response?.status;
        const reason = responseStatus ? `HTTP ${responseStatus}` : error.message;
        throw new ProviderError(`Perplexity request failed: ${reason}`, this.provider, responseStatus, {
          cause: error,
        });
      }
      throw new ProviderError(
        `Perplexity request failed: ${error instanceof Error ? error.message : String(error)}`,
        this.provider,
        undefined,
        { cause: error }
      );
    }

    const envelope = ChatCompletionSchema.safeParse(data);
    if (!envelope.success) {
      throw new ProviderError('Perplexity returned a malformed response envelope', this.provider, status);
    }

    const [choice] = envelope.data.choices;
    if (!choice) {
      throw new ProviderError('Perplexity response has no choices', this.provider, status);
    }

    return {
      text: choice.message.content,
      model: envelope.data.model ?? this.model,
      inputTokens: envelope.data.usage?.prompt_tokens,
      outputTokens: envelope.data.usage?.completion_tokens,
    };
  }
}

// ============================================================================
// Claude
// ============================================================================

export interface ClaudeClientOptions {
  apiKey: string;
  model?: string;
  maxTokens?: number;
  timeoutMs?: number;
  logger?: Logger;
}

export class ClaudeClient implements CompletionClient {
  readonly provider = 'anthropic';
  private readonly client: Anthropic;
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly logger: Logger;

  constructor(options: ClaudeClientOptions) {
    // SDK retries are disabled so withRetry owns the attempt budget
    this.client = new Anthropic({
      apiKey: options.apiKey,
      timeout: options.timeoutMs ?? DEFAULT_TIMEOUT,
      maxRetries: 0,
    });
    this.model = options.model ?? DEFAULT_CLAUDE_MODEL;
    this.maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.logger = options.logger ?? createLogger('providers');
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    this.logger.debug('Calling Claude API', {
      model: this.model,
      promptLength: request.prompt.length,
    });

    try {
      const response = await this.client.messages.create(
        {
          model: this.model,
          max_tokens: request.maxTokens ?? this.maxTokens,
          temperature: request.temperature ?? DEFAULT_TEMPERATURE,
          system: request.system,
          messages: [{ role: 'user', content: request.prompt }],
        },
        { signal: request.signal }
      );

      const textContent = response.content.find((block: ContentBlock) => block.type === 'text');
      if (!textContent || textContent.type !== 'text') {
        throw new ProviderError('No text content in Claude response', this.provider);
      }

      return {
        text: textContent.text,
        model: response.model,
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      };
    } catch (error) {
      if (error instanceof ProviderError) {
        throw error;
      }
      if (request.signal?.aborted) {
        throw new RunAbortedError();
      }
      if (error instanceof Anthropic.APIError) {
        throw new ProviderError(`Claude request failed: ${error.message}`, this.provider, error.status, {
          cause: error,
        });
      }
      throw new ProviderError(
        `Claude request failed: ${error instanceof Error ? error.message : String(error)}`,
        this.provider,
        undefined,
        { cause: error }
      );
    }
  }
}
