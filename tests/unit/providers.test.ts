/**
 * Unit tests for the Providers Module
 */

import { describe, test, expect } from '@jest/globals';
import axios, { AxiosError, type AxiosAdapter, type InternalAxiosRequestConfig } from 'axios';
import { ParseError, ProviderError, RunAbortedError } from '../../src/errors/index.js';
import { PerplexityClient, sleep, withRetry } from '../../src/providers/index.js';
import { silentLogger } from '../helpers/fakes.js';

interface SentRequest {
  url: string | undefined;
  body: unknown;
  authorization: unknown;
}

/**
 * Axios instance whose adapter answers in process
 */
function scriptedHttp(answer: (config: InternalAxiosRequestConfig) => { status: number; data: unknown }) {
  const sent: SentRequest[] = [];
  const adapter: AxiosAdapter = async (config) => {
    sent.push({
      url: config.url,
      body: typeof config.data === 'string' ? JSON.parse(config.data) : config.data,
      authorization: config.headers.get('Authorization'),
    });
    const { status, data } = answer(config);
    const response = { data, status, statusText: String(status), headers: {}, config };
    if (status >= 400) {
      throw new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', config, null, response);
    }
    return response;
  };

  const http = axios.create({
    baseURL: 'https://research.test',
    headers: { Authorization: 'Bearer test-secret' },
    adapter,
  });
  return { http, sent };
}

const envelope = {
  model: 'sonar-pro',
  choices: [{ message: { content: '{"qualified": true}' } }],
  usage: { prompt_tokens: 120, completion_tokens: 30 },
};

describe('Providers Module', () => {
  describe('PerplexityClient', () => {
    test('should post a chat completion and return the first choice', async () => {
      const { http, sent } = scriptedHttp(() => ({ status: 200, data: envelope }));
      const client = new PerplexityClient({ apiKey: 'test-secret', http, logger: silentLogger });

      const response = await client.complete({ system: 'Be brief', prompt: 'Research Acme' });

      expect(response).toEqual({
        text: '{"qualified": true}',
        model: 'sonar-pro',
        inputTokens: 120,
        outputTokens: 30,
      });
      expect(sent).toHaveLength(1);
      expect(sent[0]?.url).toBe('/chat/completions');
      expect(sent[0]?.authorization).toBe('Bearer test-secret');
      expect(sent[0]?.body).toEqual({
        model: 'sonar-pro',
        messages: [
          { role: 'system', content: 'Be brief' },
          { role: 'user', content: 'Research Acme' },
        ],
        max_tokens: 1024,
        temperature: 0.2,
      });
    });

    test('should pass request limits and configured model', async () => {
      const { http, sent } = scriptedHttp(() => ({
        status: 200,
        data: { choices: [{ message: { content: 'ok' } }] },
      }));
      const client = new PerplexityClient({
        apiKey: 'test-secret',
        model: 'sonar',
        http,
        logger: silentLogger,
      });

      const response = await client.complete({
        system: 's',
        prompt: 'p',
        maxTokens: 200,
        temperature: 0.7,
      });

      expect(response.model).toBe('sonar');
      expect(sent[0]?.body).toMatchObject({ model: 'sonar', max_tokens: 200, temperature: 0.7 });
    });

    test('should map HTTP failures to ProviderError with status', async () => {
      const { http } = scriptedHttp(() => ({ status: 503, data: { error: 'overloaded' } }));
      const client = new PerplexityClient({ apiKey: 'test-secret', http, logger: silentLogger });

      const failure = client.complete({ system: 's', prompt: 'p' });

      await expect(failure).rejects.toBeInstanceOf(ProviderError);
      await expect(failure).rejects.toMatchObject({
        message: 'Perplexity request failed: HTTP 503',
        provider: 'perplexity',
        status: 503,
      });
    });

    test('should reject a malformed envelope', async () => {
      const { http } = scriptedHttp(() => ({ status: 200, data: { choices: [] } }));
      const client = new PerplexityClient({ apiKey: 'test-secret', http, logger: silentLogger });

      await expect(client.complete({ system: 's', prompt: 'p' })).rejects.toThrow(
        'Perplexity returned a malformed response envelope'
      );
    });

    test('should surface an aborted signal as RunAbortedError', async () => {
      const { http, sent } = scriptedHttp(() => ({ status: 200, data: envelope }));
      const client = new PerplexityClient({ apiKey: 'test-secret', http, logger: silentLogger });
      const controller = new AbortController();
      controller.abort();

      await expect(
        client.complete({ system: 's', prompt: 'p', signal: controller.signal })
      ).rejects.toBeInstanceOf(RunAbortedError);
      expect(sent).toHaveLength(0);
    });
  });

  describe('withRetry()', () => {
    test('should return the first success', async () => {
      const outcome = await withRetry(async () => 'done', { delaysMs: [1, 1] });

      expect(outcome).toEqual({ ok: true, value: 'done', attempts: 1 });
    });

    test('should retry provider errors until success', async () => {
      const seen: number[] = [];
      const outcome = await withRetry(
        async (attempt) => {
          seen.push(attempt);
          if (attempt < 3) throw new ProviderError('HTTP 503', 'fake', 503);
          return 'recovered';
        },
        { delaysMs: [1, 1], logger: silentLogger }
      );

      expect(seen).toEqual([1, 2, 3]);
      expect(outcome).toEqual({ ok: true, value: 'recovered', attempts: 3 });
    });

    test('should give up after the last delay', async () => {
      const outcome = await withRetry(
        async () => {
          throw new ProviderError('HTTP 503', 'fake', 503);
        },
        { delaysMs: [1, 1], logger: silentLogger }
      );

      expect(outcome.ok).toBe(false);
      expect(outcome.attempts).toBe(3);
      if (outcome.ok) return;
      expect(outcome.error).toBeInstanceOf(ProviderError);
    });

    test('should not retry parse errors', async () => {
      let calls = 0;
      const outcome = await withRetry(
        async () => {
          calls++;
          throw new ParseError('not JSON', 'oops');
        },
        { delaysMs: [1, 1] }
      );

      expect(calls).toBe(1);
      expect(outcome.attempts).toBe(1);
      if (outcome.ok) return;
      expect(outcome.error).toBeInstanceOf(ParseError);
    });

    test('should not start when the signal is already aborted', async () => {
      const controller = new AbortController();
      controller.abort();
      let calls = 0;

      const outcome = await withRetry(
        async () => {
          calls++;
          return 'never';
        },
        { delaysMs: [1], signal: controller.signal }
      );

      expect(calls).toBe(0);
      expect(outcome.attempts).toBe(0);
      if (outcome.ok) return;
      expect(outcome.error).toBeInstanceOf(RunAbortedError);
    });

    test('should stop waiting when aborted between attempts', async () => {
      const controller = new AbortController();

      const outcome = await withRetry(
        async () => {
          controller.abort();
          throw new ProviderError('HTTP 500', 'fake', 500);
        },
        { delaysMs: [60000], signal: controller.signal, logger: silentLogger }
      );

      expect(outcome.attempts).toBe(1);
      if (outcome.ok) return;
      expect(outcome.error).toBeInstanceOf(RunAbortedError);
    });
  });

  describe('sleep()', () => {
    test('should reject when the signal aborts', async () => {
      const controller = new AbortController();
      const pending = sleep(60000, controller.signal);
      controller.abort();

      await expect(pending).rejects.toBeInstanceOf(RunAbortedError);
    });
  });
});
