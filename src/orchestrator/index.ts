/**
 * Orchestrator Module
 *
 * Run Orchestrator: the only component with cross-visitor state.
 *
 * Per visitor, in input order and under a bounded worker pool:
 * 1. mark in flight
 * 2. classify and persist the result (the commit point)
 * 3. draft and persist an email when the result is succeeded, qualified
 *    and the run asked for emails
 * 4. advance the counters
 *
 * Row failures are data. A StoreError is fatal for the run. Aborting the
 * signal stops dispatch, records the unfinished visitors as RUN_ABORTED and
 * fails the run; executing it again resumes from what was persisted.
 * RUN_ABORTED placeholders never count as processed.
 */

import { DEFAULT_CONCURRENCY, DEFAULT_PREVIEW_ROW_COUNT, MAX_CONCURRENCY } from '../config/index.js';
import type { EmailDraftingAdapter } from '../drafter/index.js';
import { RunAbortedError, StoreError, errorMessage, toResultError } from '../errors/index.js';
import { normalizeRows, parseVisitorCsv } from '../normalizer/index.js';
import { createLogger, noopMetrics, type Logger, type Metrics } from '../observability/index.js';
import { ProgressRegistry, type ProgressListener, type RunProgressTracker } from '../progress/index.js';
import type { QualificationAdapter } from '../qualifier/index.js';
import {
  checksumSource,
  countersFromRecords,
  createRun,
  transitionRun,
} from '../run-manager/index.js';
import type { ResultStore } from '../storage/index.js';
import type {
  AnalysisRun,
  ModuleResult,
  ProgressSnapshot,
  QualificationResult,
  RunId,
  RunOptions,
  Visitor,
} from '../types/index.js';

export interface RunOrchestratorOptions {
  store: ResultStore;
  qualifier: QualificationAdapter;
  /** Required only for runs with generate_emails */
  drafter?: EmailDraftingAdapter;
  /** Worker pool size, clamped to 1..5 (default: 3) */
  concurrency?: number;
  /** Visitors per run when process_all_rows is false (default: 5) */
  previewRowCount?: number;
  registry?: ProgressRegistry;
  logger?: Logger;
  metrics?: Metrics;
}

export interface SubmitOptions {
  process_all_rows?: boolean;
  generate_emails?: boolean;
  preview_row_count?: number;
  /** ISO-8601 submission time used for the run id (default: now) */
  submittedAt?: string;
}

export interface SubmitOutput {
  run: AnalysisRun;
  /** True when the same upload already created this run */
  existing: boolean;
  /** CSV parse warnings */
  warnings: string[];
}

export interface ExecuteOptions {
  signal?: AbortSignal;
}

interface RunState {
  run: AnalysisRun;
  visitors: Visitor[];
  results: QualificationResult[];
  draftCount: number;
}

function clampConcurrency(value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value)) {
    return DEFAULT_CONCURRENCY;
  }
  return Math.min(Math.max(Math.floor(value), 1), MAX_CONCURRENCY);
}

/**
 * Run async work over items with at most `limit` in flight, dispatching in
 * order. Stops taking new items once shouldStop() is true.
 *
 * @returns number of items dispatched
 */
export async function runWithConcurrency<T>(
  items: readonly T[],
  limit: number,
  processor: (item: T, index: number) => Promise<void>,
  shouldStop: () => boolean = () => false
): Promise<number> {
  let nextIndex = 0;

  async function processNext(): Promise<void> {
    while (nextIndex < items.length && !shouldStop()) {
      const currentIndex = nextIndex++;
      const item = items[currentIndex];
      if (item === undefined) continue;
      await processor(item, currentIndex);
    }
  }

  const workers = Array.from({ length: Math.min(limit, items.length) }, () => processNext());
  await Promise.all(workers);
  return nextIndex;
}

export class RunOrchestrator {
  private readonly store: ResultStore;
  private readonly qualifier: QualificationAdapter;
  private readonly drafter: EmailDraftingAdapter | undefined;
  private readonly concurrency: number;
  private readonly previewRowCount: number;
  private readonly registry: ProgressRegistry;
  private readonly logger: Logger;
  private readonly metrics: Metrics;
  private readonly active = new Set<RunId>();

  constructor(options: RunOrchestratorOptions) {
    this.store = options.store;
    this.qualifier = options.qualifier;
    this.drafter = options.drafter;
    this.concurrency = clampConcurrency(options.concurrency);
    this.previewRowCount = options.previewRowCount ?? DEFAULT_PREVIEW_ROW_COUNT;
    this.logger = options.logger ?? createLogger('orchestrator');
    this.registry = options.registry ?? new ProgressRegistry({ logger: options.logger });
    this.metrics = options.metrics ?? noopMetrics;
  }

  /**
   * Parse an uploaded CSV and create (or find) its run
   */
  async submit(
    csvText: string,
    sourceName: string,
    options: SubmitOptions = {}
  ): Promise<ModuleResult<SubmitOutput>> {
    const startTime = Date.now();
    const timestamp = new Date().toISOString();

    const parsed = parseVisitorCsv(csvText);
    if (!parsed.success) {
      return parsed;
    }

    const { visitors, rejected } = normalizeRows(parsed.data.rows);
    for (const row of rejected) {
      this.logger.warn('Row rejected', { csvLine: row.csv_line, error: row.error });
    }

    if (visitors.length === 0) {
      return {
        success: false,
        error: {
          code: 'NO_VISITORS',
          message: `${sourceName} contains no usable visitor rows`,
          details: { rejected },
        },
        metadata: {
          runId: '',
          module: 'orchestrator',
          timestamp,
          duration: Date.now() - startTime,
        },
      };
    }

    const runOptions: RunOptions = {
      process_all_rows: options.process_all_rows ?? false,
      generate_emails: options.generate_emails ?? false,
      preview_row_count: options.preview_row_count ?? this.previewRowCount,
    };

    const scheduled = runOptions.process_all_rows
      ? visitors
      : visitors.slice(0, runOptions.preview_row_count);

    const created = await createRun(
      {
        sourceName,
        sourceChecksum: checksumSource(csvText),
        sourceRowCount: parsed.data.rows.length,
        visitors: scheduled,
        rejectedRows: rejected,
        truncated: scheduled.length < visitors.length,
        options: runOptions,
        submittedAt: options.submittedAt,
      },
      this.store
    );

    if (!created.success) {
      return created;
    }

    const { run, existing } = created.data;
    this.logger.info(existing ? 'Run already submitted' : 'Run submitted', {
      runId: run.run_id,
      sourceName,
      totalRows: run.total_rows,
      truncated: run.truncated,
      rejected: rejected.length,
    });

    return {
      success: true,
      data: { run, existing, warnings: parsed.data.warnings },
      metadata: {
        runId: run.run_id,
        module: 'orchestrator',
        timestamp,
        duration: Date.now() - startTime,
      },
    };
  }

  /**
   * Process every visitor of a run that has no terminal result yet
   */
  async execute(runId: RunId, options: ExecuteOptions = {}): Promise<ModuleResult<AnalysisRun>> {
    const startTime = Date.now();
    const timestamp = new Date().toISOString();

    const failure = (code: string, message: string, details?: unknown): ModuleResult<AnalysisRun> => ({
      success: false,
      error: { code, message, details },
      metadata: {
        runId,
        module: 'orchestrator',
        timestamp,
        duration: Date.now() - startTime,
      },
    });

    if (this.active.has(runId)) {
      return failure('RUN_IN_PROGRESS', `Run ${runId} is already executing`);
    }

    this.active.add(runId);
    try {
      return await this.executeRun(runId, options, startTime, timestamp, failure);
    } finally {
      this.active.delete(runId);
    }
  }

  private async executeRun(
    runId: RunId,
    options: ExecuteOptions,
    startTime: number,
    timestamp: string,
    failure: (code: string, message: string, details?: unknown) => ModuleResult<AnalysisRun>
  ): Promise<ModuleResult<AnalysisRun>> {
    const success = (run: AnalysisRun): ModuleResult<AnalysisRun> => ({
      success: true,
      data: run,
      metadata: {
        runId,
        module: 'orchestrator',
        timestamp,
        duration: Date.now() - startTime,
      },
    });

    let state: RunState | null;
    try {
      state = await this.loadRunState(runId);
    } catch (error) {
      return failure('STORE_ERROR', errorMessage(error));
    }
    if (!state) {
      return failure('RUN_NOT_FOUND', `Run not found: ${runId}`);
    }

    const { visitors, results, draftCount } = state;
    let run = state.run;
    if (run.status === 'completed') {
      return success(run);
    }

    // RUN_ABORTED results are placeholders and get reprocessed
    const settled = results.filter((r) => r.error?.code !== 'RUN_ABORTED');
    const settledIds = new Set(settled.map((r) => r.visitor_id));
    const pending = visitors.filter((v) => !settledIds.has(v.visitor_id));

    const baseline = countersFromRecords(settled, [], run.progress.emails_failed);
    baseline.emails_drafted = draftCount;

    const tracker = this.registry.ensure(runId, visitors.length, baseline);
    tracker.begin(baseline);

    if (run.status !== 'running') {
      const started = await transitionRun({ ...run, progress: baseline }, 'running', this.store);
      if (!started.success) {
        this.registry.finish(runId, run.status);
        return failure(started.error.code, started.error.message, started.error.details);
      }
      run = started.data;
    } else {
      this.logger.info('Resuming interrupted run', { runId });
    }

    if (run.options.generate_emails && !this.drafter) {
      this.logger.warn('Run requests emails but no drafter is configured', { runId });
    }

    this.logger.info('Run started', {
      runId,
      total: visitors.length,
      pending: pending.length,
      concurrency: this.concurrency,
    });

    // internal controller also fires on fatal store errors
    const controller = new AbortController();
    const onExternalAbort = (): void => controller.abort();
    if (options.signal?.aborted) controller.abort();
    options.signal?.addEventListener('abort', onExternalAbort, { once: true });

    let fatal: unknown = null;
    const currentRun = run;

    const dispatched = await runWithConcurrency(
      pending,
      this.concurrency,
      async (visitor) => {
        try {
          await this.processVisitor(currentRun, visitor, tracker, controller.signal);
        } catch (error) {
          tracker.abandon(visitor.visitor_id);
          if (fatal === null) {
            fatal = error;
            this.logger.error('Fatal error, stopping dispatch', {
              runId,
              visitorId: visitor.visitor_id,
              error: errorMessage(error),
            });
          }
          controller.abort();
        }
      },
      () => controller.signal.aborted
    );

    options.signal?.removeEventListener('abort', onExternalAbort);

    if (fatal !== null) {
      return this.failRun(currentRun, tracker, fatal, failure);
    }

    if (controller.signal.aborted) {
      const undispatched = pending.slice(dispatched);
      try {
        for (const visitor of undispatched) {
          await this.store.saveResult(this.abortedResult(runId, visitor));
        }
      } catch (error) {
        return this.failRun(currentRun, tracker, error, failure);
      }

      const aborted = new RunAbortedError();
      const failed = await transitionRun(
        { ...currentRun, progress: tracker.getCounters() },
        'failed',
        this.store,
        aborted.message
      );
      this.registry.finish(runId, 'failed');
      this.metrics.increment('orchestrator.run.failed', { code: aborted.code });
      this.logger.warn('Run aborted', {
        runId,
        undispatched: undispatched.length,
        duration: Date.now() - startTime,
      });
      return failure(aborted.code, `Run ${runId} was aborted`, {
        run: failed.success ? failed.data : currentRun,
      });
    }

    const completed = await transitionRun(
      { ...currentRun, progress: tracker.getCounters() },
      'completed',
      this.store
    );
    if (!completed.success) {
      this.registry.finish(runId, 'failed');
      this.metrics.increment('orchestrator.run.failed', { code: completed.error.code });
      return failure(completed.error.code, completed.error.message, completed.error.details);
    }

    const snapshot = this.registry.finish(runId, 'completed');
    this.metrics.increment('orchestrator.run.completed', {});
    this.logger.info('Run completed', {
      runId,
      processed: completed.data.progress.processed,
      qualified: completed.data.progress.qualified,
      failed: completed.data.progress.failed,
      emailsDrafted: completed.data.progress.emails_drafted,
      elapsedMs: snapshot?.elapsed_ms,
      duration: Date.now() - startTime,
    });

    return success(completed.data);
  }

  private async loadRunState(runId: RunId): Promise<RunState | null> {
    const run = await this.store.getRun(runId);
    if (!run) {
      return null;
    }
    if (run.status === 'completed') {
      return { run, visitors: [], results: [], draftCount: 0 };
    }
    const [visitors, results, drafts] = await Promise.all([
      this.store.loadVisitors(runId),
      this.store.listResults(runId),
      this.store.listEmailDrafts(runId),
    ]);
    return { run, visitors, results, draftCount: drafts.length };
  }

  private async processVisitor(
    run: AnalysisRun,
    visitor: Visitor,
    tracker: RunProgressTracker,
    signal: AbortSignal
  ): Promise<void> {
    const startTime = Date.now();
    const context = { runId: run.run_id, signal };

    tracker.start(visitor.visitor_id);

    const result = await this.qualifier.classify(visitor, context);
    await this.store.saveResult(result);

    if (result.error?.code === 'RUN_ABORTED') {
      tracker.abandon(visitor.visitor_id);
      return;
    }

    let emailDrafted: boolean | undefined;
    if (
      run.options.generate_emails &&
      this.drafter &&
      result.status === 'succeeded' &&
      result.qualified
    ) {
      const outcome = await this.drafter.draft(visitor, result, context);
      if ('draft' in outcome) {
        await this.store.saveEmailDraft(outcome.draft);
        emailDrafted = true;
      } else {
        emailDrafted = false;
      }
    }

    tracker.complete(visitor.visitor_id, {
      qualified: result.qualified,
      failed: result.status === 'failed',
      emailDrafted,
    });
    this.metrics.timing('orchestrator.visitor.duration', Date.now() - startTime, {
      status: result.status,
    });
  }

  private abortedResult(runId: RunId, visitor: Visitor): QualificationResult {
    return {
      run_id: runId,
      visitor_id: visitor.visitor_id,
      row_index: visitor.row_index,
      status: 'failed',
      qualified: false,
      score: null,
      rationale: [],
      visitor_summary: '',
      company_summary: '',
      visitor_intent: null,
      error: toResultError(new RunAbortedError('Run aborted before this visitor was dispatched')),
      attempts: 0,
      completed_at: new Date().toISOString(),
    };
  }

  /**
   * Best-effort move to failed after a fatal error
   */
  private async failRun(
    run: AnalysisRun,
    tracker: RunProgressTracker,
    error: unknown,
    failure: (code: string, message: string, details?: unknown) => ModuleResult<AnalysisRun>
  ): Promise<ModuleResult<AnalysisRun>> {
    const storeError =
      error instanceof StoreError
        ? error
        : new StoreError(errorMessage(error), 'execute', { cause: error });

    const failed = await transitionRun(
      { ...run, progress: tracker.getCounters() },
      'failed',
      this.store,
      storeError.message
    );
    if (!failed.success) {
      this.logger.error('Could not mark run as failed', {
        runId: run.run_id,
        error: failed.error.message,
      });
    }

    this.registry.finish(run.run_id, 'failed');
    this.metrics.increment('orchestrator.run.failed', { code: storeError.code });

    return failure(storeError.code, storeError.message, { operation: storeError.operation });
  }

  /**
   * Live progress, or a snapshot rebuilt from the stored run when not live
   */
  async getProgress(runId: RunId): Promise<ProgressSnapshot | null> {
    const tracker = this.registry.get(runId);
    if (tracker) {
      return tracker.snapshot();
    }

    const run = await this.store.getRun(runId);
    if (!run) {
      return null;
    }

    const { progress } = run;
    const elapsed =
      run.started_at && run.completed_at
        ? new Date(run.completed_at).getTime() - new Date(run.started_at).getTime()
        : 0;

    return {
      run_id: run.run_id,
      status: run.status,
      total: run.total_rows,
      processed: progress.processed,
      in_flight: 0,
      qualified: progress.qualified,
      failed: progress.failed,
      emails_drafted: progress.emails_drafted,
      emails_failed: progress.emails_failed,
      percent:
        run.total_rows === 0
          ? 100
          : Math.round((progress.processed / run.total_rows) * 10000) / 100,
      elapsed_ms: elapsed,
      estimated_remaining_ms: run.status === 'completed' ? 0 : null,
      current: [],
    };
  }

  /**
   * Subscribe to a live run's progress
   *
   * @returns unsubscribe function, or null when the run is not live in this process
   */
  subscribe(runId: RunId, listener: ProgressListener): (() => void) | null {
    const tracker = this.registry.get(runId);
    return tracker ? tracker.subscribe(listener) : null;
  }
}
