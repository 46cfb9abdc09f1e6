/**
 * Visitor Qualifier - Main Entry Point
 *
 * Exports the public interfaces and implementations of the website-visitor
 * qualification pipeline.
 *
 * Architecture:
 * - An uploaded CSV becomes one AnalysisRun with its visitor list
 * - The orchestrator drives each visitor through the research model,
 *   persisting exactly one result per visitor
 * - Qualified visitors can get an outreach draft from the drafting model
 * - Runs, results and drafts live in S3 (or memory) under the run id
 */

// Core Types
export type * from './types/index.js';

// Errors
export {
  PipelineError,
  MalformedRowError,
  ProviderError,
  ParseError,
  StoreError,
  RunAbortedError,
  toResultError,
  errorMessage,
  type PipelineErrorCode,
} from './errors/index.js';

// Observability
export {
  createLogger,
  noopMetrics,
  type Logger,
  type Metrics,
  type LogLevel,
} from './observability/index.js';

// Configuration
export {
  loadConfig,
  DEFAULT_RETRY_DELAYS_MS,
  DEFAULT_CONCURRENCY,
  MAX_CONCURRENCY,
  DEFAULT_PREVIEW_ROW_COUNT,
  type AppConfig,
  type ResearchModelConfig,
  type DraftingModelConfig,
  type StorageConfig,
  type PipelineConfig,
  type PersonaConfig,
} from './config/index.js';

// Normalizer Module - CSV parsing and row canonicalization
export {
  parseVisitorCsv,
  normalizeRow,
  normalizeRows,
  cleanCell,
  normalizeEmail,
  normalizeUrl,
  displayName,
  visitorIdForLine,
  EMPTY,
  type RawRow,
  type CsvParseOutput,
  type NormalizeRowsOutput,
} from './normalizer/index.js';

// Providers Module - Completion clients and retry policy
export {
  PerplexityClient,
  ClaudeClient,
  withRetry,
  sleep,
  type PerplexityClientOptions,
  type ClaudeClientOptions,
  type RetryOptions,
  type RetryOutcome,
} from './providers/index.js';

// Prompt templates
export { loadPromptTemplate, fillTemplate, extractJsonText } from './prompts/index.js';

// Qualifier Module - Qualification Client Adapter
export {
  QualificationAdapter,
  buildQualificationPrompt,
  parseQualificationResponse,
  formatVisitorDetails,
  DEFAULT_ICP_INDUSTRIES,
  type QualificationPolicy,
  type QualificationContext,
  type QualificationAdapterOptions,
  type QualificationVerdict,
} from './qualifier/index.js';

// Drafter Module - Email Drafting Adapter
export {
  EmailDraftingAdapter,
  buildEmailPrompt,
  parseEmailDraftResponse,
  cleanEmailText,
  type SenderPersona,
  type DraftContext,
  type DraftError,
  type DraftOutcome,
  type EmailContent,
} from './drafter/index.js';

// Storage Module - Run and result persistence
export {
  ObjectResultStore,
  S3ResultStore,
  MemoryResultStore,
  createResultStore,
  type ResultStore,
  type S3Config,
} from './storage/index.js';

// Run Manager Module - Run identity and lifecycle
export {
  generateRunId,
  roundTimestamp,
  checksumSource,
  createRun,
  transitionRun,
  getRunReport,
  canTransition,
  isTerminal,
  countersFromRecords,
  type CreateRunParams,
  type CreateRunOutput,
} from './run-manager/index.js';

// Progress Module
export {
  RunProgressTracker,
  ProgressRegistry,
  type ProgressListener,
  type VisitorOutcome,
} from './progress/index.js';

// Orchestrator Module
export {
  RunOrchestrator,
  runWithConcurrency,
  type RunOrchestratorOptions,
  type SubmitOptions,
  type SubmitOutput,
  type ExecuteOptions,
} from './orchestrator/index.js';

// Renderers Module
export {
  renderResultsCsv,
  renderQualifiedLeadsCsv,
  renderRunSummary,
  formatDuration,
} from './renderers/index.js';

// Evaluation Module
export {
  parseLineList,
  evaluateAgainstLabels,
  type EvaluationReport,
} from './evaluation/index.js';

// Wiring
export {
  createPipeline,
  type Pipeline,
  type PipelineOverrides,
} from './pipeline/index.js';

/**
 * Module Boundaries:
 *
 * 1. normalizer - CSV parsing and row canonicalization
 *    - Case-insensitive header mapping
 *    - Placeholder cells ("nan", "N/A") become empty
 *    - Rows without identity are rejected, not fatal
 *
 * 2. qualifier / drafter - External model adapters
 *    - Prompt templating from prompts/
 *    - Retry on provider errors, never on parse errors
 *    - Never throw; failures become data
 *
 * 3. run-manager - Run lifecycle management
 *    - Deterministic RunIDs
 *    - Idempotent creation
 *    - pending -> running -> completed | failed
 *
 * 4. orchestrator - Batch execution
 *    - Bounded worker pool
 *    - Cancellation and resumption
 *    - Live progress
 *
 * 5. storage - Persistence layer
 *    - ResultStore interface
 *    - S3 and in-memory implementations
 */
