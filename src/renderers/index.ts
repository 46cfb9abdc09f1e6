/**
 * Renderers Module
 *
 * The stored run (AnalysisRun + results + drafts) is the only canonical
 * artifact. Everything here is a view derived from it.
 *
 * Responsibilities:
 * - Results CSV: one line per visitor in input order
 * - Qualified leads CSV: the cross-run lead list
 * - Run summary: plain text for logs and notifications
 */

import Papa from 'papaparse';
import { displayName } from '../normalizer/index.js';
import type {
  EmailDraft,
  QualificationResult,
  QualifiedLead,
  RunReport,
} from '../types/index.js';

const RATIONALE_SEPARATOR = ' | ';

const RESULT_COLUMNS = [
  'CsvLine',
  'FirstName',
  'LastName',
  'Title',
  'CompanyName',
  'Industry',
  'Email',
  'Website',
  'Country',
  'LinkedInUrl',
  'Status',
  'Qualified',
  'Score',
  'Intent',
  'Rationale',
  'VisitorSummary',
  'CompanySummary',
  'Error',
  'EmailSubject',
  'EmailBody',
];

const LEAD_COLUMNS = [
  'RunId',
  'SourceName',
  'CsvLine',
  'FirstName',
  'LastName',
  'Title',
  'CompanyName',
  'Email',
  'Website',
  'Score',
  'Rationale',
  'VisitorSummary',
  'CompanySummary',
  'QualifiedAt',
  'EmailSubject',
  'EmailBody',
];

function toCsv(fields: string[], data: Array<Array<string | number>>): string {
  return Papa.unparse({ fields, data }, { newline: '\n' });
}

function qualifiedLabel(result: QualificationResult | undefined): string {
  if (!result || result.status !== 'succeeded') return '';
  return result.qualified ? 'Yes' : 'No';
}

/**
 * Format a duration like "42.0s", "3m 12.5s" or "1h 4m"
 */
export function formatDuration(ms: number): string {
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }
  if (seconds < 3600) {
    const minutes = Math.floor(seconds / 60);
    return `${minutes}m ${(seconds % 60).toFixed(1)}s`;
  }
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  return `${hours}h ${minutes}m`;
}

/**
 * CSV of a run: input fields followed by the verdict and draft, in input order
 */
export function renderResultsCsv(report: RunReport): string {
  const results = new Map(report.results.map((r) => [r.visitor_id, r]));
  const drafts = new Map<string, EmailDraft>(report.drafts.map((d) => [d.visitor_id, d]));

  const rows = [...report.visitors]
    .sort((a, b) => a.row_index - b.row_index)
    .map((visitor) => {
      const result = results.get(visitor.visitor_id);
      const draft = drafts.get(visitor.visitor_id);
      return [
        visitor.csv_line,
        visitor.first_name,
        visitor.last_name,
        visitor.title,
        visitor.company_name,
        visitor.industry,
        visitor.email,
        visitor.website,
        visitor.country,
        visitor.linkedin_url,
        result?.status ?? 'pending',
        qualifiedLabel(result),
        result?.score ?? '',
        result?.visitor_intent ?? '',
        result?.rationale.join(RATIONALE_SEPARATOR) ?? '',
        result?.visitor_summary ?? '',
        result?.company_summary ?? '',
        result?.error ? `${result.error.code}: ${result.error.message}` : '',
        draft?.subject ?? '',
        draft?.body ?? '',
      ];
    });

  return toCsv(RESULT_COLUMNS, rows);
}

/**
 * CSV of qualified leads across runs, in the order given
 */
export function renderQualifiedLeadsCsv(leads: readonly QualifiedLead[]): string {
  const rows = leads.map((lead) => [
    lead.run_id,
    lead.source_name,
    lead.visitor.csv_line,
    lead.visitor.first_name,
    lead.visitor.last_name,
    lead.visitor.title,
    lead.visitor.company_name,
    lead.visitor.email,
    lead.visitor.website,
    lead.score ?? '',
    lead.rationale.join(RATIONALE_SEPARATOR),
    lead.visitor_summary,
    lead.company_summary,
    lead.qualified_at,
    lead.email?.subject ?? '',
    lead.email?.body ?? '',
  ]);

  return toCsv(LEAD_COLUMNS, rows);
}

/**
 * Plain-text summary of a run
 */
export function renderRunSummary(report: RunReport): string {
  const { run, results } = report;
  const total = run.total_rows;
  const qualified = results.filter((r) => r.status === 'succeeded' && r.qualified);
  const failed = results.filter((r) => r.status === 'failed');
  const percent = total === 0 ? 0 : (100 * qualified.length) / total;

  const lines: string[] = [];
  lines.push(`Run ${run.run_id} (${run.source_name})`);
  lines.push(`Status: ${run.status}`);
  lines.push(
    run.truncated
      ? `Visitors: ${total} of ${run.source_row_count} rows (preview)`
      : `Visitors: ${total}`
  );
  lines.push(`Processed: ${results.length}`);
  lines.push(`Failed: ${failed.length}`);
  if (run.options.generate_emails) {
    lines.push(
      `Emails drafted: ${run.progress.emails_drafted}, failed: ${run.progress.emails_failed}`
    );
  }

  if (run.started_at && run.completed_at && results.length > 0) {
    const elapsed = new Date(run.completed_at).getTime() - new Date(run.started_at).getTime();
    lines.push(`Total processing time: ${formatDuration(elapsed)}`);
    lines.push(`Average time per visitor: ${formatDuration(elapsed / results.length)}`);
  }

  lines.push(`Percent Qualified: ${percent.toFixed(2)}%`);
  lines.push(`${qualified.length} of ${total} total visitors.`);

  if (qualified.length > 0) {
    const visitors = new Map(report.visitors.map((v) => [v.visitor_id, v]));
    lines.push('');
    lines.push('Qualified visitors:');
    for (const result of qualified) {
      const visitor = visitors.get(result.visitor_id);
      const name = visitor ? displayName(visitor) : result.visitor_id;
      const line = visitor ? ` (line ${visitor.csv_line})` : '';
      lines.push(`- ${name}${line}, Score: ${result.score ?? '-'}`);
    }
  }

  if (run.rejected_rows.length > 0) {
    lines.push('');
    lines.push('Rejected rows:');
    for (const row of run.rejected_rows) {
      lines.push(`- line ${row.csv_line}: ${row.error}`);
    }
  }

  if (run.errors.length > 0) {
    lines.push('');
    lines.push('Errors:');
    for (const error of run.errors) {
      lines.push(`- ${error}`);
    }
  }

  return lines.join('\n');
}
