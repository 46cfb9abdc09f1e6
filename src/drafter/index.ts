/**
 * Drafter Module
 *
 * Email Drafting Adapter: writes a short outreach email for a qualified
 * visitor. Drafting failures are reported to the caller and never touch the
 * visitor's QualificationResult.
 */

import { z } from 'zod';
import { DEFAULT_RETRY_DELAYS_MS } from '../config/index.js';
import { ParseError, errorMessage, toResultError } from '../errors/index.js';
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
  EmailDraft,
  QualificationResult,
  ResultErrorCode,
  RunId,
  Visitor,
} from '../types/index.js';

const TEMPLATE_FILE = 'draft-email.md';
const DRAFT_MAX_TOKENS = 400;
const DRAFT_TEMPERATURE = 0.7;

const SYSTEM_PROMPT =
  'You write brief, personal outreach emails. Output ONLY one valid JSON object with "subject" and "body". No markdown code fences, no citations, no bold or italic text.';

export interface SenderPersona {
  senderName: string;
  sellerCompany: string;
}

export interface DraftContext {
  runId: RunId;
  signal?: AbortSignal;
}

export interface DraftError {
  code: ResultErrorCode | 'NOT_ELIGIBLE';
  message: string;
}

export type DraftOutcome = { draft: EmailDraft } | { error: DraftError };

export interface EmailDraftingAdapterOptions {
  client: CompletionClient;
  persona: SenderPersona;
  retryDelaysMs?: readonly number[];
  template?: string;
  logger?: Logger;
  metrics?: Metrics;
}

const EmailResponseSchema = z.object({
  subject: z.string().trim().min(1),
  body: z.string().trim().min(1),
});

export type EmailContent = z.infer<typeof EmailResponseSchema>;

/**
 * Remove citation markers like [1] or [2, 3] and markdown emphasis
 */
export function cleanEmailText(text: string): string {
  return text
    .replace(/\s*\[\d+(?:\s*,\s*\d+)*\]/g, '')
    .replace(/\*\*(.+?)\*\*/g, '$1')
    .replace(/__(.+?)__/g, '$1')
    .replace(/\*(.+?)\*/g, '$1')
    .replace(/[ \t]+\n/g, '\n')
    .trim();
}

function formatVisitorInfo(visitor: Visitor): string {
  const name = [visitor.first_name, visitor.last_name].filter(Boolean).join(' ');
  const fields: Array<[string, string]> = [
    ['Name', name],
    ['Title', visitor.title],
    ['Company', visitor.company_name],
    ['Industry', visitor.industry],
    ['Website', visitor.website],
    ['Email', visitor.email],
  ];
  return fields
    .filter(([, value]) => value !== '')
    .map(([label, value]) => `- ${label}: ${value}`)
    .join('\n');
}

/**
 * Fill the email template for one qualified visitor
 */
export function buildEmailPrompt(
  visitor: Visitor,
  result: QualificationResult,
  persona: SenderPersona,
  template: string
): string {
  return fillTemplate(template, {
    sender_name: persona.senderName,
    seller_company: persona.sellerCompany,
    visitor_info: formatVisitorInfo(visitor),
    visitor_summary: result.visitor_summary,
    company_summary: result.company_summary,
  });
}

/**
 * Parse the drafting model's response
 *
 * @throws ParseError when the text is not JSON with a subject and body
 */
export function parseEmailDraftResponse(response: string): EmailContent {
  let parsed: unknown;
  try {
    parsed = JSON.parse(extractJsonText(response));
  } catch (error) {
    throw new ParseError(
      `Failed to parse email response as JSON: ${errorMessage(error)}`,
      previewText(response),
      { cause: error }
    );
  }

  const validation = EmailResponseSchema.safeParse(parsed);
  if (!validation.success) {
    throw new ParseError('Email response must contain a subject and a body', previewText(response));
  }

  const subject = cleanEmailText(validation.data.subject);
  const body = cleanEmailText(validation.data.body);
  if (!subject || !body) {
    throw new ParseError('Email response is empty after cleanup', previewText(response));
  }

  return { subject, body };
}

export class EmailDraftingAdapter {
  private readonly client: CompletionClient;
  private readonly persona: SenderPersona;
  private readonly retryDelaysMs: readonly number[];
  private readonly logger: Logger;
  private readonly metrics: Metrics;
  private template: Promise<string> | undefined;

  constructor(options: EmailDraftingAdapterOptions) {
    this.client = options.client;
    this.persona = options.persona;
    this.retryDelaysMs = options.retryDelaysMs ?? DEFAULT_RETRY_DELAYS_MS;
    this.logger = options.logger ?? createLogger('drafter');
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
   * Draft an email for a succeeded, qualified result. Never throws.
   */
  async draft(
    visitor: Visitor,
    result: QualificationResult,
    context: DraftContext
  ): Promise<DraftOutcome> {
    if (result.status !== 'succeeded' || !result.qualified) {
      return {
        error: {
          code: 'NOT_ELIGIBLE',
          message: `Visitor ${visitor.visitor_id} is not a succeeded, qualified result`,
        },
      };
    }

    let prompt: string;
    try {
      prompt = buildEmailPrompt(visitor, result, this.persona, await this.loadTemplate());
    } catch (error) {
      return this.failed(visitor, context, error);
    }

    const outcome = await withRetry(
      async () => {
        const response = await this.client.complete({
          system: SYSTEM_PROMPT,
          prompt,
          maxTokens: DRAFT_MAX_TOKENS,
          temperature: DRAFT_TEMPERATURE,
          signal: context.signal,
        });
        return parseEmailDraftResponse(response.text);
      },
      {
        delaysMs: this.retryDelaysMs,
        signal: context.signal,
        logger: this.logger,
        operation: 'draft',
      }
    );

    if (!outcome.ok) {
      return this.failed(visitor, context, outcome.error);
    }

    this.metrics.increment('drafter.drafted', { provider: this.client.provider });
    this.logger.info('Email drafted', {
      runId: context.runId,
      visitorId: visitor.visitor_id,
      attempts: outcome.attempts,
    });

    return {
      draft: {
        run_id: context.runId,
        visitor_id: visitor.visitor_id,
        subject: outcome.value.subject,
        body: outcome.value.body,
        sender_name: this.persona.senderName,
        provider: this.client.provider,
        created_at: new Date().toISOString(),
      },
    };
  }

  private failed(visitor: Visitor, context: DraftContext, error: unknown): DraftOutcome {
    const resultError = toResultError(error);
    this.metrics.increment('drafter.failed', { code: resultError.code });
    this.logger.warn('Email drafting failed', {
      runId: context.runId,
      visitorId: visitor.visitor_id,
      code: resultError.code,
      error: resultError.message,
    });
    return { error: resultError };
  }
}
