/**
 * Qualifier Module
 *
 * Qualification Client Adapter: turns one Visitor into one QualificationResult
 * by asking the research model for a structured verdict.
 *
 * classify() never throws. Provider failures are retried under the shared
 * policy, unusable responses fail immediately, and every failure is returned
 * as a result with status 'failed'.
 */

import { z } from 'zod';
import { DEFAULT_RETRY_DELAYS_MS } from '../config/index.js';
import { ParseError, errorMessage, toResultError } from '../errors/index.js';
import { displayName } from '../normalizer/index.js';
import { createLogger, noopMetrics, type Logger, type Metrics } from '../observability/index.js';
import {
  extractJsonText,
  fillTemplate,
  loadPromptTemplate,
  previewText,
} from '../prompts/index.js';
import { withRetry } from '../providers/index.js';
import type {
  CompletionClient,
  QualificationResult,
  RunId,
  Visitor,
  VisitorIntent,
} from '../types/index.js';

const TEMPLATE_FILE = 'qualify-visitor.md';
const NO_DETAILS = 'Limited visitor information available';
const NOT_AVAILABLE = 'Not available';
const QUALIFY_MAX_TOKENS = 1500;
const QUALIFY_TEMPERATURE = 0.2;

const SYSTEM_PROMPT =
  'You are a B2B sales research analyst. Research the visitor and company on the open web, then output ONLY one valid JSON object matching the schema in the prompt. No markdown code fences, no citations, no explanatory text.';

/** Intents that can never be qualified regardless of the model's verdict */
const EXCLUDED_INTENTS: ReadonlySet<VisitorIntent> = new Set([
  'investor',
  'job_seeker',
  'competitor',
  'internal',
]);

export const DEFAULT_ICP_INDUSTRIES: readonly string[] = [
  'Healthcare Distribution',
  'Industrial, Construction and Distribution',
  'Automotive (OEM, Fleet, Parts)',
  'Food & Beverage Distribution',
  'Private Equity operating roles',
];

export interface QualificationPolicy {
  sellerCompany: string;
  icpIndustries: readonly string[];
}

export interface QualificationContext {
  runId: RunId;
  signal?: AbortSignal;
}

export interface QualificationAdapterOptions {
  client: CompletionClient;
  policy: QualificationPolicy;
  /** Delay before each retry (default: 1s then 2s, three attempts) */
  retryDelaysMs?: readonly number[];
  /** Template text; loaded from prompts/ when omitted */
  template?: string;
  logger?: Logger;
  metrics?: Metrics;
}

const VisitorIntentSchema = z.enum([
  'potential_customer',
  'investor',
  'job_seeker',
  'competitor',
  'internal',
  'unknown',
]);

const QualificationResponseSchema = z.object({
  qualified: z.boolean(),
  score: z.number().int().min(1).max(10),
  rationale: z.array(z.string()).default([]),
  visitor_summary: z.string().default(''),
  company_summary: z.string().default(''),
  visitor_intent: VisitorIntentSchema.default('unknown'),
});

export type QualificationVerdict = z.infer<typeof QualificationResponseSchema>;

// ============================================================================
// Prompt
// ============================================================================

/**
 * Visitor detail lines for the prompt; empty fields are left out
 */
export function formatVisitorDetails(visitor: Visitor): string {
  const fields: Array<[string, string]> = [
    ['Title', visitor.title],
    ['First Name', visitor.first_name],
    ['Last Name', visitor.last_name],
    ['Email', visitor.email],
    ['Company', visitor.company_name],
    ['Industry', visitor.industry],
    ['Website', visitor.website],
    ['Country', visitor.country],
    ['LinkedIn', visitor.linkedin_url],
  ];

  const lines = fields
    .filter(([, value]) => value !== '')
    .map(([label, value]) => `- ${label}: ${value}`);

  return lines.length > 0 ? lines.join('\n') : NO_DETAILS;
}

function researchTarget(visitor: Visitor): string {
  const subject = visitor.company_name || displayName(visitor);
  return visitor.industry ? `${subject} in ${visitor.industry}` : subject;
}

/**
 * Fill the qualification template for one visitor
 */
export function buildQualificationPrompt(
  visitor: Visitor,
  policy: QualificationPolicy,
  template: string
): string {
  return fillTemplate(template, {
    seller_company: policy.sellerCompany,
    icp_industries: policy.icpIndustries.join(', '),
    research_target: researchTarget(visitor),
    website: visitor.website || NOT_AVAILABLE,
    visitor_details: formatVisitorDetails(visitor),
  });
}

// ============================================================================
// Response
// ============================================================================

/**
 * Parse and validate the model's verdict
 *
 * @throws ParseError when the text is not JSON or does not match the schema
 */
export function parseQualificationResponse(response: string): QualificationVerdict {
  const cleaned = extractJsonText(response);

  let parsed: unknown;
  try {
    parsed = JSON.parse(cleaned);
  } catch (error) {
    throw new ParseError(
      `Failed to parse qualification response as JSON: ${errorMessage(error)}`,
      previewText(response),
      { cause: error }
    );
  }

  const validation = QualificationResponseSchema.safeParse(parsed);
  if (!validation.success) {
    const issues = validation.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ParseError(
      `Qualification response failed validation: ${issues.join('; ')}`,
      previewText(response)
    );
  }

  const verdict = validation.data;
  const rationale = verdict.rationale.map((line) => line.trim()).filter(Boolean);

  if (verdict.qualified && EXCLUDED_INTENTS.has(verdict.visitor_intent)) {
    return {
      ...verdict,
      qualified: false,
      rationale: [...rationale, `Intent ${verdict.visitor_intent} is never qualified`],
    };
  }

  return { ...verdict, rationale };
}

// ============================================================================
// Adapter
// ============================================================================

export class QualificationAdapter {
  private readonly client: CompletionClient;
  private readonly policy: QualificationPolicy;
  private readonly retryDelaysMs: readonly number[];
  private readonly logger: Logger;
  private readonly metrics: Metrics;
  private template: Promise<string> | undefined;

  constructor(options: QualificationAdapterOptions) {
    this.client = options.client;
    this.policy = options.policy;
    this.retryDelaysMs = options.retryDelaysMs ?? DEFAULT_RETRY_DELAYS_MS;
    this.logger = options.logger ?? createLogger('qualifier');
    this.metrics = options.metrics ?? noopMetrics;
    this.template = options.template !== undefined ? Promise.resolve(options.template) : undefined;
  }

  private loadTemplate(): Promise<string> {
    if (!this.template) {
      this.template = loadPromptTemplate(TEMPLATE_FILE);
    }
    return this.template;
  }

  /**
   * Classify one visitor. Always resolves with a terminal result.
   */
  async classify(visitor: Visitor, context: QualificationContext): Promise<QualificationResult> {
    const startTime = Date.now();

    let prompt: string;
    try {
      prompt = buildQualificationPrompt(visitor, this.policy, await this.loadTemplate());
    } catch (error) {
      return this.failedResult(visitor, context, error, 0);
    }

    const outcome = await withRetry(
      async () => {
        this.metrics.increment('qualifier.attempts', { provider: this.client.provider });
        const response = await this.client.complete({
          system: SYSTEM_PROMPT,
          prompt,
          maxTokens: QUALIFY_MAX_TOKENS,
          temperature: QUALIFY_TEMPERATURE,
          signal: context.signal,
        });
        return parseQualificationResponse(response.text);
      },
      {
        delaysMs: this.retryDelaysMs,
        signal: context.signal,
        logger: this.logger,
        operation: 'qualify',
      }
    );

    if (!outcome.ok) {
      return this.failedResult(visitor, context, outcome.error, outcome.attempts);
    }

    const verdict = outcome.value;
    this.logger.info('Visitor classified', {
      runId: context.runId,
      visitorId: visitor.visitor_id,
      qualified: verdict.qualified,
      score: verdict.score,
      attempts: outcome.attempts,
      duration: Date.now() - startTime,
    });

    return {
      run_id: context.runId,
      visitor_id: visitor.visitor_id,
      row_index: visitor.row_index,
      status: 'succeeded',
      qualified: verdict.qualified,
      score: verdict.score,
      rationale: verdict.rationale,
      visitor_summary: verdict.visitor_summary,
      company_summary: verdict.company_summary,
      visitor_intent: verdict.visitor_intent,
      error: null,
      attempts: outcome.attempts,
      completed_at: new Date().toISOString(),
    };
  }

  private failedResult(
    visitor: Visitor,
    context: QualificationContext,
    error: unknown,
    attempts: number
  ): QualificationResult {
    const resultError = toResultError(error);

    this.metrics.increment('qualifier.failed', { code: resultError.code });
    this.logger.warn('Visitor classification failed', {
      runId: context.runId,
      visitorId: visitor.visitor_id,
      code: resultError.code,
      error: resultError.message,
      attempts,
    });

    return {
      run_id: context.runId,
      visitor_id: visitor.visitor_id,
      row_index: visitor.row_index,
      status: 'failed',
      qualified: false,
      score: null,
      rationale: [],
      visitor_summary: '',
      company_summary: '',
      visitor_intent: null,
      error: resultError,
      attempts,
      completed_at: new Date().toISOString(),
    };
  }
}
