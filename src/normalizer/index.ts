/**
 * Normalizer Module
 *
 * Responsibilities:
 * - Parse the uploaded visitor CSV (header row required)
 * - Map columns case-insensitively onto the canonical Visitor shape
 * - Coerce cells: trim, treat "nan"/"n/a"/"none"/"null" as empty, lowercase
 *   emails, ensure a scheme on URLs
 * - Reject rows without a usable identity (no name, no company, no email)
 *
 * Optional fields always hold '' when absent so that later prompt
 * interpolation never sees null or undefined.
 */

import Papa from 'papaparse';
import { z } from 'zod';
import { MalformedRowError, errorMessage } from '../errors/index.js';
import type { ModuleResult, RejectedRow, Visitor } from '../types/index.js';

/** Empty-value sentinel for absent optional fields */
export const EMPTY = '';

type VisitorField = Exclude<keyof Visitor, 'visitor_id' | 'row_index' | 'csv_line'>;

/**
 * Accepted header spellings per field, compared after lowercasing and
 * stripping spaces, underscores and hyphens
 */
const COLUMN_ALIASES: Record<VisitorField, readonly string[]> = {
  first_name: ['firstname', 'first'],
  last_name: ['lastname', 'last', 'surname'],
  title: ['title', 'jobtitle'],
  company_name: ['companyname', 'company', 'organization'],
  industry: ['industry'],
  email: ['email', 'workemail', 'businessemail', 'emailaddress'],
  website: ['website', 'companywebsite', 'domain', 'url'],
  country: ['country'],
  linkedin_url: ['linkedinurl', 'linkedin', 'linkedinprofile'],
};

const PLACEHOLDER_VALUES = new Set(['nan', 'n/a', 'na', 'none', 'null', 'undefined']);

/**
 * A raw row: column name to cell value
 */
const RawRowSchema = z.record(z.string(), z.unknown());

export type RawRow = z.infer<typeof RawRowSchema>;

export interface CsvParseOutput {
  rows: RawRow[];
  warnings: string[];
}

export interface NormalizeRowsOutput {
  visitors: Visitor[];
  rejected: RejectedRow[];
}

/**
 * Reduce a header to its comparison key
 */
function headerKey(header: string): string {
  return header.toLowerCase().replace(/[\s_\-]+/g, '');
}

/**
 * Coerce a cell to a trimmed string, or EMPTY for blanks and placeholders
 */
export function cleanCell(value: unknown): string {
  if (value === null || value === undefined) {
    return EMPTY;
  }
  if (typeof value === 'number') {
    return Number.isNaN(value) ? EMPTY : String(value);
  }
  if (typeof value !== 'string' && typeof value !== 'boolean') {
    return EMPTY;
  }
  const trimmed = String(value).trim();
  return PLACEHOLDER_VALUES.has(trimmed.toLowerCase()) ? EMPTY : trimmed;
}

export function normalizeEmail(value: unknown): string {
  return cleanCell(value).toLowerCase();
}

/**
 * Ensure a scheme on a URL and drop a trailing slash from non-root paths
 */
export function normalizeUrl(value: unknown): string {
  const trimmed = cleanCell(value);
  if (!trimmed) {
    return EMPTY;
  }

  const withScheme = /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;

  try {
    const url = new URL(withScheme);
    if (url.pathname !== '/' && url.pathname.endsWith('/')) {
      url.pathname = url.pathname.slice(0, -1);
    }
    return url.toString();
  } catch {
    return withScheme;
  }
}

/**
 * Build the stable visitor id for a CSV line
 */
export function visitorIdForLine(csvLine: number): string {
  return `row_${csvLine}`;
}

/**
 * Index a raw row by header key so lookups are case-insensitive
 */
function indexRow(raw: RawRow): Map<string, unknown> {
  const indexed = new Map<string, unknown>();
  for (const [column, value] of Object.entries(raw)) {
    const key = headerKey(column);
    // first non-empty column wins when two headers collapse to the same key
    if (!indexed.has(key) || cleanCell(indexed.get(key)) === EMPTY) {
      indexed.set(key, value);
    }
  }
  return indexed;
}

function pick(indexed: Map<string, unknown>, field: VisitorField): unknown {
  for (const alias of COLUMN_ALIASES[field]) {
    const value = indexed.get(alias);
    if (cleanCell(value) !== EMPTY) {
      return value;
    }
  }
  return undefined;
}

/**
 * Normalize one raw row into a Visitor
 *
 * @param raw - Column name to cell value
 * @param rowIndex - 0-based position among the data rows
 * @throws MalformedRowError when the row is not a mapping or has no usable identity
 */
export function normalizeRow(raw: unknown, rowIndex: number): Visitor {
  const csvLine = rowIndex + 2;
  const parsed = RawRowSchema.safeParse(raw);
  if (!parsed.success) {
    throw new MalformedRowError(`Row ${csvLine} is not a column mapping`, rowIndex, csvLine);
  }

  const indexed = indexRow(parsed.data);

  const visitor: Visitor = {
    visitor_id: visitorIdForLine(csvLine),
    row_index: rowIndex,
    csv_line: csvLine,
    first_name: cleanCell(pick(indexed, 'first_name')),
    last_name: cleanCell(pick(indexed, 'last_name')),
    title: cleanCell(pick(indexed, 'title')),
    company_name: cleanCell(pick(indexed, 'company_name')),
    industry: cleanCell(pick(indexed, 'industry')),
    email: normalizeEmail(pick(indexed, 'email')),
    website: normalizeUrl(pick(indexed, 'website')),
    country: cleanCell(pick(indexed, 'country')),
    linkedin_url: normalizeUrl(pick(indexed, 'linkedin_url')),
  };

  if (!hasIdentity(visitor)) {
    throw new MalformedRowError(
      `Row ${csvLine} has no name, company or email`,
      rowIndex,
      csvLine
    );
  }

  return visitor;
}

export function hasIdentity(visitor: Visitor): boolean {
  return Boolean(
    visitor.first_name || visitor.last_name || visitor.company_name || visitor.email
  );
}

/**
 * Normalize rows in input order; malformed rows are collected, not thrown
 */
export function normalizeRows(rows: readonly unknown[]): NormalizeRowsOutput {
  const visitors: Visitor[] = [];
  const rejected: RejectedRow[] = [];

  rows.forEach((raw, rowIndex) => {
    try {
      visitors.push(normalizeRow(raw, rowIndex));
    } catch (error) {
      if (!(error instanceof MalformedRowError)) {
        throw error;
      }
      rejected.push({
        row_index: error.rowIndex,
        csv_line: error.csvLine,
        error: error.message,
      });
    }
  });

  return { visitors, rejected };
}

/**
 * Parse CSV text with a header row into raw rows
 *
 * Field-count mismatches are reported as warnings; the row is still returned
 * with the cells papaparse could assign.
 */
export function parseVisitorCsv(text: string): ModuleResult<CsvParseOutput> {
  const startTime = Date.now();
  const timestamp = new Date().toISOString();

  try {
    const result = Papa.parse<RawRow>(text.replace(/^\uFEFF/, ''), {
      header: true,
      skipEmptyLines: 'greedy',
      transformHeader: (header) => header.trim(),
    });

    const fields = result.meta.fields ?? [];
    if (fields.length === 0 || fields.every((field) => field === '')) {
      return {
        success: false,
        error: {
          code: 'MISSING_HEADER',
          message: 'CSV has no header row',
        },
        metadata: {
          runId: '',
          module: 'normalizer',
          timestamp,
          duration: Date.now() - startTime,
        },
      };
    }

    const warnings = result.errors.map((e) =>
      e.row === undefined ? e.message : `Row ${e.row + 2}: ${e.message}`
    );

    return {
      success: true,
      data: { rows: result.data, warnings },
      metadata: {
        runId: '',
        module: 'normalizer',
        timestamp,
        duration: Date.now() - startTime,
      },
    };
  } catch (error) {
    return {
      success: false,
      error: {
        code: 'CSV_PARSE_ERROR',
        message: `Failed to parse CSV: ${errorMessage(error)}`,
        details: error,
      },
      metadata: {
        runId: '',
        module: 'normalizer',
        timestamp,
        duration: Date.now() - startTime,
      },
    };
  }
}

/**
 * Human-readable name for prompts and logs
 */
export function displayName(visitor: Visitor): string {
  const name = [visitor.first_name, visitor.last_name].filter(Boolean).join(' ');
  if (name && visitor.company_name) return `${name} at ${visitor.company_name}`;
  return name || visitor.company_name || visitor.email || visitor.visitor_id;
}
