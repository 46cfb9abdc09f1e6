/**
 * Progress Module
 *
 * Live, in-process progress for running analyses. One tracker per run;
 * the registry only holds trackers of runs that are not yet terminal.
 */

import { createLogger, type Logger } from '../observability/index.js';
import type {
  ProgressSnapshot,
  RunCounters,
  RunId,
  RunStatus,
  VisitorId,
} from '../types/index.js';

export type ProgressListener = (snapshot: ProgressSnapshot) => void;

export interface VisitorOutcome {
  qualified: boolean;
  failed: boolean;
  /** true/false when a draft was attempted, undefined otherwise */
  emailDrafted?: boolean;
}

export interface RunProgressTrackerOptions {
  runId: RunId;
  total: number;
  status?: RunStatus;
  /** Counters already reached by earlier executions */
  initial?: RunCounters;
  /** Millisecond clock (default: Date.now) */
  clock?: () => number;
  logger?: Logger;
}

function roundPercent(value: number): number {
  return Math.round(value * 100) / 100;
}

export class RunProgressTracker {
  readonly runId: RunId;
  private readonly total: number;
  private readonly clock: () => number;
  private readonly logger: Logger;
  private readonly listeners = new Set<ProgressListener>();
  private readonly inFlight = new Set<VisitorId>();
  private counters: RunCounters;
  private status: RunStatus;
  private startedAt: number | null = null;
  /** processed count when the current execution started; ETA uses only newer work */
  private baseline = 0;
  private finished = false;

  constructor(options: RunProgressTrackerOptions) {
    this.runId = options.runId;
    this.total = options.total;
    this.status = options.status ?? 'pending';
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? createLogger('progress');
    this.counters = {
      processed: 0,
      qualified: 0,
      failed: 0,
      emails_drafted: 0,
      emails_failed: 0,
      ...options.initial,
    };
  }

  /**
   * Begin an execution; counters below the given values are raised, never lowered
   */
  begin(counters: RunCounters): void {
    this.counters = {
      processed: Math.max(this.counters.processed, counters.processed),
      qualified: Math.max(this.counters.qualified, counters.qualified),
      failed: Math.max(this.counters.failed, counters.failed),
      emails_drafted: Math.max(this.counters.emails_drafted, counters.emails_drafted),
      emails_failed: Math.max(this.counters.emails_failed, counters.emails_failed),
    };
    this.status = 'running';
    this.startedAt = this.clock();
    this.baseline = this.counters.processed;
    this.emit();
  }

  start(visitorId: VisitorId): void {
    this.inFlight.add(visitorId);
    this.emit();
  }

  complete(visitorId: VisitorId, outcome: VisitorOutcome): void {
    this.inFlight.delete(visitorId);
    this.counters.processed++;
    if (outcome.failed) this.counters.failed++;
    else if (outcome.qualified) this.counters.qualified++;
    if (outcome.emailDrafted === true) this.counters.emails_drafted++;
    if (outcome.emailDrafted === false) this.counters.emails_failed++;
    this.emit();
  }

  /**
   * Drop a visitor from the in-flight set without counting it
   */
  abandon(visitorId: VisitorId): void {
    if (this.inFlight.delete(visitorId)) {
      this.emit();
    }
  }

  getCounters(): RunCounters {
    return { ...this.counters };
  }

  snapshot(): ProgressSnapshot {
    const now = this.clock();
    const elapsed = this.startedAt === null ? 0 : now - this.startedAt;
    const processedThisExecution = this.counters.processed - this.baseline;
    const remaining = Math.max(this.total - this.counters.processed, 0);

    let estimatedRemaining: number | null = null;
    if (remaining === 0) {
      estimatedRemaining = 0;
    } else if (processedThisExecution > 0) {
      estimatedRemaining = Math.round((elapsed / processedThisExecution) * remaining);
    }

    return {
      run_id: this.runId,
      status: this.status,
      total: this.total,
      processed: this.counters.processed,
      in_flight: this.inFlight.size,
      qualified: this.counters.qualified,
      failed: this.counters.failed,
      emails_drafted: this.counters.emails_drafted,
      emails_failed: this.counters.emails_failed,
      percent: this.total === 0 ? 100 : roundPercent((this.counters.processed / this.total) * 100),
      elapsed_ms: elapsed,
      estimated_remaining_ms: estimatedRemaining,
      current: Array.from(this.inFlight),
    };
  }

  /**
   * Register a listener; returns the unsubscribe function
   */
  subscribe(listener: ProgressListener): () => void {
    if (this.finished) {
      return () => undefined;
    }
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Emit the final snapshot and drop every listener
   */
  finish(status: RunStatus): ProgressSnapshot {
    this.status = status;
    this.inFlight.clear();
    const snapshot = this.snapshot();
    this.notify(snapshot);
    this.listeners.clear();
    this.finished = true;
    return snapshot;
  }

  get listenerCount(): number {
    return this.listeners.size;
  }

  private emit(): void {
    if (this.listeners.size > 0) {
      this.notify(this.snapshot());
    }
  }

  private notify(snapshot: ProgressSnapshot): void {
    for (const listener of this.listeners) {
      try {
        listener(snapshot);
      } catch (error) {
        this.logger.warn('Progress listener threw', {
          runId: this.runId,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }
}

/**
 * Trackers of live runs, keyed by run id
 */
export class ProgressRegistry {
  private readonly trackers = new Map<RunId, RunProgressTracker>();
  private readonly clock: () => number;
  private readonly logger: Logger | undefined;

  constructor(options: { clock?: () => number; logger?: Logger } = {}) {
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger;
  }

  /**
   * Get the live tracker for a run, creating it when absent
   */
  ensure(runId: RunId, total: number, initial?: RunCounters): RunProgressTracker {
    const existing = this.trackers.get(runId);
    if (existing) {
      return existing;
    }
    const tracker = new RunProgressTracker({
      runId,
      total,
      initial,
      clock: this.clock,
      logger: this.logger,
    });
    this.trackers.set(runId, tracker);
    return tracker;
  }

  get(runId: RunId): RunProgressTracker | undefined {
    return this.trackers.get(runId);
  }

  /**
   * Finish a run's tracker and forget it
   */
  finish(runId: RunId, status: RunStatus): ProgressSnapshot | null {
    const tracker = this.trackers.get(runId);
    if (!tracker) {
      return null;
    }
    this.trackers.delete(runId);
    return tracker.finish(status);
  }

  get size(): number {
    return this.trackers.size;
  }
}
