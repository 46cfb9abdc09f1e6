/**
 * Run Manager Module
 *
 * Responsibilities:
 * - Generate deterministic RunIDs using SHA-256
 * - Create runs idempotently (same upload in the same hour returns the same run)
 * - Enforce the run lifecycle state machine
 * - Read a run back as a report
 *
 * RunID algorithm:
 * 1. Checksum the uploaded CSV text (SHA-256)
 * 2. Round submitted_at down to the hour
 * 3. Construct input: checksum | process_all_rows | generate_emails | rounded
 * 4. Hash using SHA-256, prefix with "run_", keep 16 hex chars
 */

import { createHash } from 'crypto';
import { StoreError, errorMessage } from '../errors/index.js';
import type { ResultStore } from '../storage/index.js';
import type {
  AnalysisRun,
  EmailDraft,
  ModuleResult,
  QualificationResult,
  RejectedRow,
  RunCounters,
  RunId,
  RunOptions,
  RunReport,
  RunStatus,
  Visitor,
} from '../types/index.js';

const ROUNDING_INTERVAL_MS = 60 * 60 * 1000;

/**
 * Allowed lifecycle transitions; failed -> running is a resume
 */
const TRANSITIONS: Record<RunStatus, readonly RunStatus[]> = {
  pending: ['running'],
  running: ['completed', 'failed'],
  completed: [],
  failed: ['running'],
};

export interface CreateRunParams {
  sourceName: string;
  sourceChecksum: string;
  /** Data rows found in the file, before truncation */
  sourceRowCount: number;
  /** Visitors scheduled for this run, after truncation */
  visitors: Visitor[];
  rejectedRows: RejectedRow[];
  truncated: boolean;
  options: RunOptions;
  /** ISO-8601 submission time (default: now) */
  submittedAt?: string;
}

export interface CreateRunOutput {
  run: AnalysisRun;
  /** True when a run with the same id already existed */
  existing: boolean;
}

/**
 * Round timestamp down to the hour
 */
export function roundTimestamp(timestamp: string): string {
  const date = new Date(timestamp);
  const roundedMs = Math.floor(date.getTime() / ROUNDING_INTERVAL_MS) * ROUNDING_INTERVAL_MS;
  return new Date(roundedMs).toISOString();
}

/**
 * SHA-256 of the uploaded file contents
 */
export function checksumSource(text: string): string {
  return createHash('sha256').update(text, 'utf-8').digest('hex');
}

/**
 * Generate deterministic run ID using SHA-256
 */
export function generateRunId(checksum: string, options: RunOptions, submittedAt: string): RunId {
  const hashInput = [
    checksum,
    String(options.process_all_rows),
    String(options.generate_emails),
    roundTimestamp(submittedAt),
  ].join('|');

  const hash = createHash('sha256').update(hashInput).digest('hex');
  return `run_${hash.substring(0, 16)}`;
}

export function emptyCounters(): RunCounters {
  return {
    processed: 0,
    qualified: 0,
    failed: 0,
    emails_drafted: 0,
    emails_failed: 0,
  };
}

/**
 * Derive counters from persisted records
 *
 * emails_failed is not derivable from storage and is carried over.
 */
export function countersFromRecords(
  results: readonly QualificationResult[],
  drafts: readonly EmailDraft[],
  emailsFailed = 0
): RunCounters {
  return {
    processed: results.length,
    qualified: results.filter((r) => r.status === 'succeeded' && r.qualified).length,
    failed: results.filter((r) => r.status === 'failed').length,
    emails_drafted: drafts.length,
    emails_failed: emailsFailed,
  };
}

export function canTransition(from: RunStatus, to: RunStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(status: RunStatus): boolean {
  return status === 'completed' || status === 'failed';
}

function storeFailure(error: unknown): { code: string; message: string; details: unknown } {
  if (error instanceof StoreError) {
    return { code: 'STORE_ERROR', message: error.message, details: { operation: error.operation } };
  }
  return { code: 'UNEXPECTED_ERROR', message: errorMessage(error), details: { error } };
}

/**
 * Create a new run with idempotency enforcement
 *
 * Visitors are persisted before the run record, so a stored run always has
 * its visitor list. An existing run is returned untouched.
 *
 * @param params - Parsed upload and run options
 * @param store - Result store
 */
export async function createRun(
  params: CreateRunParams,
  store: ResultStore
): Promise<ModuleResult<CreateRunOutput>> {
  const startTime = Date.now();
  const timestamp = new Date().toISOString();
  const submittedAt = params.submittedAt ?? timestamp;
  const runId = generateRunId(params.sourceChecksum, params.options, submittedAt);

  try {
    const existing = await store.getRun(runId);
    if (existing) {
      return {
        success: true,
        data: { run: existing, existing: true },
        metadata: {
          runId,
          module: 'run-manager',
          timestamp,
          duration: Date.now() - startTime,
        },
      };
    }

    const run: AnalysisRun = {
      run_id: runId,
      created_at: timestamp,
      updated_at: timestamp,
      started_at: null,
      completed_at: null,
      source_name: params.sourceName,
      source_checksum: params.sourceChecksum,
      source_row_count: params.sourceRowCount,
      total_rows: params.visitors.length,
      truncated: params.truncated,
      options: params.options,
      status: 'pending',
      progress: emptyCounters(),
      rejected_rows: params.rejectedRows,
      errors: [],
    };

    await store.saveVisitors(runId, params.visitors);
    await store.saveRun(run);

    return {
      success: true,
      data: { run, existing: false },
      metadata: {
        runId,
        module: 'run-manager',
        timestamp,
        duration: Date.now() - startTime,
      },
    };
  } catch (error) {
    const failure = storeFailure(error);
    return {
      success: false,
      error: {
        code: failure.code,
        message: `Failed to create run: ${failure.message}`,
        details: failure.details,
      },
      metadata: {
        runId,
        module: 'run-manager',
        timestamp,
        duration: Date.now() - startTime,
      },
    };
  }
}

/**
 * Move a run to a new status and persist it
 *
 * @param run - Current run record (its progress counters are persisted as given)
 * @param status - Target status
 * @param store - Result store
 * @param error - Optional run-level error message to append
 */
export async function transitionRun(
  run: AnalysisRun,
  status: RunStatus,
  store: ResultStore,
  error?: string
): Promise<ModuleResult<AnalysisRun>> {
  const startTime = Date.now();
  const timestamp = new Date().toISOString();

  if (!canTransition(run.status, status)) {
    return {
      success: false,
      error: {
        code: 'INVALID_TRANSITION',
        message: `Cannot move run ${run.run_id} from ${run.status} to ${status}`,
      },
      metadata: {
        runId: run.run_id,
        module: 'run-manager',
        timestamp,
        duration: Date.now() - startTime,
      },
    };
  }

  const updated: AnalysisRun = {
    ...run,
    status,
    updated_at: timestamp,
    started_at: status === 'running' ? (run.started_at ?? timestamp) : run.started_at,
    completed_at: isTerminal(status) ? timestamp : null,
    errors: error ? [...run.errors, error] : run.errors,
  };

  try {
    await store.saveRun(updated);
  } catch (saveError) {
    const failure = storeFailure(saveError);
    return {
      success: false,
      error: {
        code: failure.code,
        message: `Failed to update run status: ${failure.message}`,
        details: failure.details,
      },
      metadata: {
        runId: run.run_id,
        module: 'run-manager',
        timestamp,
        duration: Date.now() - startTime,
      },
    };
  }

  return {
    success: true,
    data: updated,
    metadata: {
      runId: run.run_id,
      module: 'run-manager',
      timestamp,
      duration: Date.now() - startTime,
    },
  };
}

/**
 * Read a run back with its visitors, results (input order) and drafts
 */
export async function getRunReport(
  runId: RunId,
  store: ResultStore
): Promise<ModuleResult<RunReport>> {
  const startTime = Date.now();
  const timestamp = new Date().toISOString();

  try {
    const run = await store.getRun(runId);
    if (!run) {
      return {
        success: false,
        error: {
          code: 'RUN_NOT_FOUND',
          message: `Run not found: ${runId}`,
        },
        metadata: {
          runId,
          module: 'run-manager',
          timestamp,
          duration: Date.now() - startTime,
        },
      };
    }

    const [visitors, results, drafts] = await Promise.all([
      store.loadVisitors(runId),
      store.listResults(runId),
      store.listEmailDrafts(runId),
    ]);

    const order = new Map(visitors.map((v) => [v.visitor_id, v.row_index]));
    drafts.sort(
      (a, b) => (order.get(a.visitor_id) ?? Infinity) - (order.get(b.visitor_id) ?? Infinity)
    );

    return {
      success: true,
      data: { run, visitors, results, drafts },
      metadata: {
        runId,
        module: 'run-manager',
        timestamp,
        duration: Date.now() - startTime,
      },
    };
  } catch (error) {
    const failure = storeFailure(error);
    return {
      success: false,
      error: {
        code: failure.code,
        message: `Failed to read run: ${failure.message}`,
        details: failure.details,
      },
      metadata: {
        runId,
        module: 'run-manager',
        timestamp,
        duration: Date.now() - startTime,
      },
    };
  }
}
