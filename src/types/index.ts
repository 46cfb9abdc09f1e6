/**
 * Core type definitions for the visitor qualification pipeline
 *
 * Persisted records use snake_case fields; runtime configuration objects use
 * camelCase.
 */

/**
 * Unique identifier for an analysis run
 * Format: run_<16 hex chars>
 */
export type RunId = string;

/**
 * Stable identifier of a visitor row within a run
 * Format: row_<csv line>
 */
export type VisitorId = string;

// ============================================================================
// Visitor
// ============================================================================

/**
 * One normalized input row. Optional identity fields hold '' when absent.
 */
export interface Visitor {
  visitor_id: VisitorId;
  /** 0-based position among the data rows of the uploaded file */
  row_index: number;
  /** 1-based line in the uploaded file (line 1 is the header) */
  csv_line: number;
  first_name: string;
  last_name: string;
  title: string;
  company_name: string;
  industry: string;
  email: string;
  website: string;
  country: string;
  linkedin_url: string;
}

/**
 * A row that could not be turned into a Visitor
 */
export interface RejectedRow {
  row_index: number;
  csv_line: number;
  error: string;
}

// ============================================================================
// Analysis Run
// ============================================================================

export type RunStatus = 'pending' | 'running' | 'completed' | 'failed';

export interface RunOptions {
  process_all_rows: boolean;
  generate_emails: boolean;
  /** Number of visitors processed when process_all_rows is false */
  preview_row_count: number;
}

export interface RunCounters {
  processed: number;
  qualified: number;
  failed: number;
  emails_drafted: number;
  emails_failed: number;
}

export interface AnalysisRun {
  run_id: RunId;
  created_at: string;
  updated_at: string;
  started_at: string | null;
  completed_at: string | null;
  source_name: string;
  source_checksum: string;
  /** Data rows found in the uploaded file */
  source_row_count: number;
  /** Visitors that belong to this run after preview truncation */
  total_rows: number;
  truncated: boolean;
  options: RunOptions;
  status: RunStatus;
  progress: RunCounters;
  rejected_rows: RejectedRow[];
  errors: string[];
}

// ============================================================================
// Qualification Result & Email Draft
// ============================================================================

export type ResultStatus = 'pending' | 'succeeded' | 'failed';

export type VisitorIntent =
  | 'potential_customer'
  | 'investor'
  | 'job_seeker'
  | 'competitor'
  | 'internal'
  | 'unknown';

export type ResultErrorCode =
  | 'PROVIDER_ERROR'
  | 'PARSE_ERROR'
  | 'RUN_ABORTED'
  | 'UNEXPECTED_ERROR';

export interface ResultError {
  code: ResultErrorCode;
  message: string;
}

export interface QualificationResult {
  run_id: RunId;
  visitor_id: VisitorId;
  row_index: number;
  status: ResultStatus;
  qualified: boolean;
  /** Integer 1-10, null when the classification failed */
  score: number | null;
  rationale: string[];
  visitor_summary: string;
  company_summary: string;
  visitor_intent: VisitorIntent | null;
  error: ResultError | null;
  attempts: number;
  completed_at: string;
}

export interface EmailDraft {
  run_id: RunId;
  visitor_id: VisitorId;
  subject: string;
  body: string;
  sender_name: string;
  provider: string;
  created_at: string;
}

/**
 * Cross-run projection of a qualified visitor
 */
export interface QualifiedLead {
  run_id: RunId;
  source_name: string;
  visitor: Visitor;
  score: number | null;
  rationale: string[];
  visitor_summary: string;
  company_summary: string;
  qualified_at: string;
  email: Pick<EmailDraft, 'subject' | 'body'> | null;
}

/**
 * Full read-back of one run, results in input order
 */
export interface RunReport {
  run: AnalysisRun;
  visitors: Visitor[];
  results: QualificationResult[];
  drafts: EmailDraft[];
}

// ============================================================================
// External completion capability
// ============================================================================

export interface CompletionRequest {
  system: string;
  prompt: string;
  maxTokens?: number;
  temperature?: number;
  signal?: AbortSignal;
}

export interface CompletionResponse {
  text: string;
  model: string;
  inputTokens?: number;
  outputTokens?: number;
}

/**
 * A black-box text completion capability (research model or drafting model)
 */
export interface CompletionClient {
  readonly provider: string;
  complete(request: CompletionRequest): Promise<CompletionResponse>;
}

// ============================================================================
// Progress
// ============================================================================

export interface ProgressSnapshot {
  run_id: RunId;
  status: RunStatus;
  total: number;
  processed: number;
  in_flight: number;
  qualified: number;
  failed: number;
  emails_drafted: number;
  emails_failed: number;
  /** 0-100, two decimals */
  percent: number;
  elapsed_ms: number;
  estimated_remaining_ms: number | null;
  /** Visitor ids currently being classified or drafted */
  current: VisitorId[];
}

// ============================================================================
// Module result wrapper
// ============================================================================

export interface ModuleError {
  code: string;
  message: string;
  details?: unknown;
}

export interface ModuleMetadata {
  runId: RunId;
  module: string;
  timestamp: string;
  duration?: number;
}

/**
 * Result wrapper returned across module boundaries
 */
export type ModuleResult<T = unknown> =
  | { success: true; data: T; metadata: ModuleMetadata }
  | { success: false; error: ModuleError; metadata: ModuleMetadata };
