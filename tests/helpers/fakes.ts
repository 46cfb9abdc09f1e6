/**
 * Shared test doubles: scripted completion client, silent logger, builders
 */

import { RunAbortedError } from '../../src/errors/index.js';
import type { Logger } from '../../src/observability/index.js';
import type {
  AnalysisRun,
  CompletionClient,
  CompletionRequest,
  CompletionResponse,
  QualificationResult,
  Visitor,
} from '../../src/types/index.js';

export type Responder = (request: CompletionRequest, call: number) => string | Promise<string>;

/**
 * CompletionClient whose answers come from a test-supplied function
 */
export class FakeCompletionClient implements CompletionClient {
  readonly requests: CompletionRequest[] = [];

  constructor(
    private readonly responder: Responder,
    readonly provider: string = 'fake'
  ) {}

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    this.requests.push(request);
    const text = await this.responder(request, this.requests.length);
    return { text, model: 'fake-model' };
  }
}

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined,
};

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Resolve after ms, or reject with RunAbortedError when the signal fires
 */
export function abortableDelay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new RunAbortedError());
      return;
    }
    const timer = setTimeout(resolve, ms);
    signal?.addEventListener(
      'abort',
      () => {
        clearTimeout(timer);
        reject(new RunAbortedError());
      },
      { once: true }
    );
  });
}

/**
 * The "- Email: x" line of a prompt built from visitor details
 */
export function emailInPrompt(prompt: string): string {
  const match = /- Email: (\S+)/.exec(prompt);
  return match?.[1] ?? '';
}

export function verdictJson(
  overrides: Partial<{
    qualified: boolean;
    score: number;
    rationale: string[];
    visitor_summary: string;
    company_summary: string;
    visitor_intent: string;
  }> = {}
): string {
  return JSON.stringify({
    qualified: true,
    score: 8,
    rationale: ['Senior operations title', 'ICP-adjacent industry'],
    visitor_summary: 'Leads operations',
    company_summary: 'Regional distributor',
    visitor_intent: 'potential_customer',
    ...overrides,
  });
}

export function makeVisitor(overrides: Partial<Visitor> = {}): Visitor {
  const rowIndex = overrides.row_index ?? 0;
  return {
    visitor_id: `row_${rowIndex + 2}`,
    row_index: rowIndex,
    csv_line: rowIndex + 2,
    first_name: 'Jane',
    last_name: 'Doe',
    title: 'VP of Operations',
    company_name: 'Acme Logistics',
    industry: 'Transportation',
    email: 'jane@acme.test',
    website: 'https://acme.test/',
    country: 'United States',
    linkedin_url: '',
    ...overrides,
  };
}

export function makeResult(overrides: Partial<QualificationResult> = {}): QualificationResult {
  return {
    run_id: 'run_0000000000000000',
    visitor_id: 'row_2',
    row_index: 0,
    status: 'succeeded',
    qualified: true,
    score: 8,
    rationale: ['Senior operations title'],
    visitor_summary: 'Leads operations',
    company_summary: 'Regional distributor',
    visitor_intent: 'potential_customer',
    error: null,
    attempts: 1,
    completed_at: '2024-06-01T10:05:00.000Z',
    ...overrides,
  };
}

export function makeRun(overrides: Partial<AnalysisRun> = {}): AnalysisRun {
  return {
    run_id: 'run_0000000000000000',
    created_at: '2024-06-01T10:00:00.000Z',
    updated_at: '2024-06-01T10:00:00.000Z',
    started_at: null,
    completed_at: null,
    source_name: 'visitors.csv',
    source_checksum: 'checksum',
    source_row_count: 2,
    total_rows: 2,
    truncated: false,
    options: { process_all_rows: true, generate_emails: false, preview_row_count: 5 },
    status: 'pending',
    progress: { processed: 0, qualified: 0, failed: 0, emails_drafted: 0, emails_failed: 0 },
    rejected_rows: [],
    errors: [],
    ...overrides,
  };
}
