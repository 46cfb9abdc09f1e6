/**
 * Unit tests for pipeline wiring
 */

import { describe, test, expect, jest, afterEach } from '@jest/globals';
import { loadConfig, type AppConfig } from '../../src/config/index.js';
import { createPipeline } from '../../src/pipeline/index.js';
import { ClaudeClient, PerplexityClient } from '../../src/providers/index.js';
import { MemoryResultStore } from '../../src/storage/index.js';
import { FakeCompletionClient, silentLogger, verdictJson } from '../helpers/fakes.js';

function config(env: Record<string, string> = {}): AppConfig {
  const loaded = loadConfig(env);
  if (!loaded.success) {
    throw new Error(loaded.error.message);
  }
  return loaded.data;
}

describe('createPipeline()', () => {
  afterEach(() => {
    jest.restoreAllMocks();
    process.env.LOG_LEVEL = 'error';
  });

  test('should require a research key', () => {
    const result = createPipeline(config(), { logger: silentLogger });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.code).toBe('MISSING_API_KEY');
  });

  test('should draft with the research client when no drafting key is set', () => {
    const result = createPipeline(config({ PERPLEXITY_API_KEY: 'test-secret' }), { logger: silentLogger });

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.researchClient).toBeInstanceOf(PerplexityClient);
    expect(result.data.draftingClient).toBe(result.data.researchClient);
    expect(result.data.store).toBeInstanceOf(MemoryResultStore);
  });

  test('should draft with Claude when its key is set', () => {
    const result = createPipeline(
      config({ PERPLEXITY_API_KEY: 'test-secret', ANTHROPIC_API_KEY: 'test-secret' }),
      { logger: silentLogger }
    );

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.draftingClient).toBeInstanceOf(ClaudeClient);
    expect(result.data.draftingClient.provider).toBe('anthropic');
  });

  test('should run a file end to end with injected clients', async () => {
    const store = new MemoryResultStore();
    const research = new FakeCompletionClient(() => verdictJson());
    const drafting = new FakeCompletionClient(() =>
      JSON.stringify({ subject: 'Hello Jane', body: 'Saw you stopped by. Sam' })
    );
    const result = createPipeline(config(), {
      store,
      researchClient: research,
      draftingClient: drafting,
      logger: silentLogger,
    });
    expect(result.success).toBe(true);
    if (!result.success) return;
    const { orchestrator } = result.data;

    const submitted = await orchestrator.submit(
      'FirstName,LastName,Title,CompanyName,Email\nJane,Doe,COO,Acme,jane@acme.test\n',
      'visitors.csv',
      { generate_emails: true }
    );
    expect(submitted.success).toBe(true);
    if (!submitted.success) return;

    const executed = await orchestrator.execute(submitted.data.run.run_id);

    expect(executed.success).toBe(true);
    if (!executed.success) return;
    expect(executed.data.progress).toMatchObject({ processed: 1, qualified: 1, emails_drafted: 1 });
    expect(research.requests[0]?.prompt).toContain('Northwind AI');
    expect(await store.listEmailDrafts(submitted.data.run.run_id)).toEqual([
      expect.objectContaining({ subject: 'Hello Jane', sender_name: 'Sam', provider: 'fake' }),
    ]);
  });

  test('should let each component log under its own module name', async () => {
    process.env.LOG_LEVEL = 'warn';
    const warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const result = createPipeline(config(), {
      store: new MemoryResultStore(),
      researchClient: new FakeCompletionClient(() => verdictJson()),
    });
    expect(result.success).toBe(true);
    if (!result.success) return;

    await result.data.orchestrator.submit(
      'FirstName,LastName,Title,CompanyName,Email\nJane,Doe,COO,Acme,jane@acme.test\n,,Analyst,,\n',
      'visitors.csv'
    );

    expect(warnSpy).toHaveBeenCalledTimes(1);
    const entry: unknown = JSON.parse(String(warnSpy.mock.calls[0]?.[0]));
    expect(entry).toMatchObject({ level: 'warn', module: 'orchestrator', message: 'Row rejected', csvLine: 3 });
  });
});
