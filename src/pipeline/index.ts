/**
 * Pipeline Module
 *
 * Wires store, completion clients, adapters and orchestrator from a loaded
 * AppConfig. Individual pieces can be overridden, which is how tests swap
 * in fakes.
 */

import { EmailDraftingAdapter } from '../drafter/index.js';
import type { AppConfig } from '../config/index.js';
import { createLogger, noopMetrics, type Logger, type Metrics } from '../observability/index.js';
import { RunOrchestrator } from '../orchestrator/index.js';
import { ClaudeClient, PerplexityClient } from '../providers/index.js';
import { DEFAULT_ICP_INDUSTRIES, QualificationAdapter } from '../qualifier/index.js';
import { createResultStore, type ResultStore } from '../storage/index.js';
import type { CompletionClient, ModuleResult } from '../types/index.js';

export interface PipelineOverrides {
  store?: ResultStore;
  researchClient?: CompletionClient;
  draftingClient?: CompletionClient;
  icpIndustries?: readonly string[];
  logger?: Logger;
  metrics?: Metrics;
}

export interface Pipeline {
  store: ResultStore;
  researchClient: CompletionClient;
  draftingClient: CompletionClient;
  qualifier: QualificationAdapter;
  drafter: EmailDraftingAdapter;
  orchestrator: RunOrchestrator;
}

/**
 * Build a ready-to-use pipeline from configuration
 *
 * Drafting uses Claude when ANTHROPIC_API_KEY is set and falls back to the
 * research client otherwise.
 */
export function createPipeline(
  config: AppConfig,
  overrides: PipelineOverrides = {}
): ModuleResult<Pipeline> {
  const timestamp = new Date().toISOString();
  // components fall back to their own module logger
  const componentLogger = overrides.logger;
  const logger = componentLogger ?? createLogger('pipeline');
  const metrics = overrides.metrics ?? noopMetrics;

  let researchClient: CompletionClient;
  if (overrides.researchClient) {
    researchClient = overrides.researchClient;
  } else if (config.research.apiKey) {
    researchClient = new PerplexityClient({
      apiKey: config.research.apiKey,
      apiUrl: config.research.apiUrl,
      model: config.research.model,
      timeoutMs: config.research.timeoutMs,
      logger: componentLogger,
    });
  } else {
    return {
      success: false,
      error: {
        code: 'MISSING_API_KEY',
        message: 'PERPLEXITY_API_KEY is required. Set it in config or environment variable.',
      },
      metadata: {
        runId: '',
        module: 'pipeline',
        timestamp,
      },
    };
  }

  let draftingClient: CompletionClient;
  if (overrides.draftingClient) {
    draftingClient = overrides.draftingClient;
  } else if (config.drafting.apiKey) {
    draftingClient = new ClaudeClient({
      apiKey: config.drafting.apiKey,
      model: config.drafting.model,
      maxTokens: config.drafting.maxTokens,
      timeoutMs: config.drafting.timeoutMs,
      logger: componentLogger,
    });
  } else {
    logger.info('No drafting API key configured, drafting with the research client', {
      provider: researchClient.provider,
    });
    draftingClient = researchClient;
  }

  const store = overrides.store ?? createResultStore(config.storage);

  const qualifier = new QualificationAdapter({
    client: researchClient,
    policy: {
      sellerCompany: config.persona.sellerCompany,
      icpIndustries: overrides.icpIndustries ?? DEFAULT_ICP_INDUSTRIES,
    },
    retryDelaysMs: config.pipeline.retryDelaysMs,
    logger: componentLogger,
    metrics,
  });

  const drafter = new EmailDraftingAdapter({
    client: draftingClient,
    persona: {
      senderName: config.persona.senderName,
      sellerCompany: config.persona.sellerCompany,
    },
    retryDelaysMs: config.pipeline.retryDelaysMs,
    logger: componentLogger,
    metrics,
  });

  const orchestrator = new RunOrchestrator({
    store,
    qualifier,
    drafter,
    concurrency: config.pipeline.concurrency,
    previewRowCount: config.pipeline.previewRowCount,
    logger: componentLogger,
    metrics,
  });

  return {
    success: true,
    data: { store, researchClient, draftingClient, qualifier, drafter, orchestrator },
    metadata: {
      runId: '',
      module: 'pipeline',
      timestamp,
    },
  };
}
