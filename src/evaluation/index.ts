/**
 * Evaluation Module
 *
 * Scores a run's qualified set against a hand-labelled list of CSV line
 * numbers. Lines are the 1-based lines of the uploaded file (header = 1).
 */

import type { ModuleResult, RunReport } from '../types/index.js';

export interface EvaluationReport {
  precision: number;
  recall: number;
  f1: number;
  /** Lines the run qualified */
  predicted: number[];
  /** Lines expected to qualify */
  expected: number[];
  matched: number[];
  missed: number[];
  overQualified: number[];
}

/**
 * Parse "3, 5,7" into [3, 5, 7]; non-numeric entries are ignored
 */
export function parseLineList(input: string): number[] {
  const lines = input
    .split(',')
    .map((part) => part.trim())
    .filter((part) => /^\d+$/.test(part))
    .map((part) => Number.parseInt(part, 10));
  return Array.from(new Set(lines)).sort((a, b) => a - b);
}

function sorted(values: Iterable<number>): number[] {
  return Array.from(values).sort((a, b) => a - b);
}

function round(value: number): number {
  return Math.round(value * 10000) / 10000;
}

/**
 * Compare qualified lines with the expected ones
 *
 * Both sets empty counts as a perfect score.
 */
export function evaluateAgainstLabels(
  report: RunReport,
  expectedLines: readonly number[]
): ModuleResult<EvaluationReport> {
  const startTime = Date.now();
  const timestamp = new Date().toISOString();

  const lineOf = new Map(report.visitors.map((v) => [v.visitor_id, v.csv_line]));
  const predicted = new Set<number>();
  for (const result of report.results) {
    const line = lineOf.get(result.visitor_id);
    if (line !== undefined && result.status === 'succeeded' && result.qualified) {
      predicted.add(line);
    }
  }

  const inRun = new Set(lineOf.values());
  const unknown = expectedLines.filter((line) => !inRun.has(line));
  if (unknown.length > 0) {
    return {
      success: false,
      error: {
        code: 'UNKNOWN_LINES',
        message: `Lines not part of run ${report.run.run_id}: ${sorted(unknown).join(', ')}`,
        details: { unknown: sorted(unknown) },
      },
      metadata: {
        runId: report.run.run_id,
        module: 'evaluation',
        timestamp,
        duration: Date.now() - startTime,
      },
    };
  }

  const expected = new Set(expectedLines);
  const matched = sorted([...predicted].filter((line) => expected.has(line)));
  const missed = sorted([...expected].filter((line) => !predicted.has(line)));
  const overQualified = sorted([...predicted].filter((line) => !expected.has(line)));

  let precision = 0;
  let recall = 0;
  let f1 = 1;
  if (predicted.size > 0 || expected.size > 0) {
    precision = predicted.size > 0 ? matched.length / predicted.size : 0;
    recall = expected.size > 0 ? matched.length / expected.size : 0;
    f1 = precision + recall > 0 ? (2 * precision * recall) / (precision + recall) : 0;
  }

  return {
    success: true,
    data: {
      precision: round(precision),
      recall: round(recall),
      f1: round(f1),
      predicted: sorted(predicted),
      expected: sorted(expected),
      matched,
      missed,
      overQualified,
    },
    metadata: {
      runId: report.run.run_id,
      module: 'evaluation',
      timestamp,
      duration: Date.now() - startTime,
    },
  };
}
