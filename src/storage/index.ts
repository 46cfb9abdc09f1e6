/**
 * Storage Module
 *
 * Responsibilities:
 * - Define the ResultStore interface
 * - Implement S3ResultStore using AWS SDK v3
 * - Implement MemoryResultStore for testing and local runs
 * - Project qualified results across runs
 *
 * Both stores share one key layout:
 * - {prefix}/{run_id}/run.json
 * - {prefix}/{run_id}/visitors.json
 * - {prefix}/{run_id}/results/{visitor_id}.json
 * - {prefix}/{run_id}/emails/{visitor_id}.json
 *
 * Writes overwrite by key, so saving the same (run, visitor) twice leaves
 * the last value. Every backend failure surfaces as StoreError.
 */

import {
  S3Client,
  PutObjectCommand,
  GetObjectCommand,
  ListObjectsV2Command,
  type S3ClientConfig,
} from '@aws-sdk/client-s3';
import { z } from 'zod';
import { StoreError, errorMessage } from '../errors/index.js';
import type {
  AnalysisRun,
  EmailDraft,
  QualificationResult,
  QualifiedLead,
  RunId,
  Visitor,
  VisitorId,
} from '../types/index.js';

const DEFAULT_PREFIX = 'runs';

export interface ResultStore {
  saveRun(run: AnalysisRun): Promise<void>;
  getRun(runId: RunId): Promise<AnalysisRun | null>;
  listRunIds(): Promise<RunId[]>;

  saveVisitors(runId: RunId, visitors: Visitor[]): Promise<void>;
  loadVisitors(runId: RunId): Promise<Visitor[]>;

  saveResult(result: QualificationResult): Promise<void>;
  getResult(runId: RunId, visitorId: VisitorId): Promise<QualificationResult | null>;
  /** Results of a run ordered by row_index */
  listResults(runId: RunId): Promise<QualificationResult[]>;

  saveEmailDraft(draft: EmailDraft): Promise<void>;
  listEmailDrafts(runId: RunId): Promise<EmailDraft[]>;

  /** Qualified visitors across all runs, newest first */
  listQualifiedLeads(options?: { limit?: number }): Promise<QualifiedLead[]>;
}

// ============================================================================
// Persisted record schemas
// ============================================================================

const VisitorSchema: z.ZodType<Visitor> = z.object({
  visitor_id: z.string(),
  row_index: z.number().int(),
  csv_line: z.number().int(),
  first_name: z.string(),
  last_name: z.string(),
  title: z.string(),
  company_name: z.string(),
  industry: z.string(),
  email: z.string(),
  website: z.string(),
  country: z.string(),
  linkedin_url: z.string(),
});

const AnalysisRunSchema: z.ZodType<AnalysisRun> = z.object({
  run_id: z.string(),
  created_at: z.string(),
  updated_at: z.string(),
  started_at: z.string().nullable(),
  completed_at: z.string().nullable(),
  source_name: z.string(),
  source_checksum: z.string(),
  source_row_count: z.number().int(),
  total_rows: z.number().int(),
  truncated: z.boolean(),
  options: z.object({
    process_all_rows: z.boolean(),
    generate_emails: z.boolean(),
    preview_row_count: z.number().int(),
  }),
  status: z.enum(['pending', 'running', 'completed', 'failed']),
  progress: z.object({
    processed: z.number().int(),
    qualified: z.number().int(),
    failed: z.number().int(),
    emails_drafted: z.number().int(),
    emails_failed: z.number().int(),
  }),
  rejected_rows: z.array(
    z.object({
      row_index: z.number().int(),
      csv_line: z.number().int(),
      error: z.string(),
    })
  ),
  errors: z.array(z.string()),
});

const QualificationResultSchema: z.ZodType<QualificationResult> = z.object({
  run_id: z.string(),
  visitor_id: z.string(),
  row_index: z.number().int(),
  status: z.enum(['pending', 'succeeded', 'failed']),
  qualified: z.boolean(),
  score: z.number().int().nullable(),
  rationale: z.array(z.string()),
  visitor_summary: z.string(),
  company_summary: z.string(),
  visitor_intent: z
    .enum(['potential_customer', 'investor', 'job_seeker', 'competitor', 'internal', 'unknown'])
    .nullable(),
  error: z
    .object({
      code: z.enum(['PROVIDER_ERROR', 'PARSE_ERROR', 'RUN_ABORTED', 'UNEXPECTED_ERROR']),
      message: z.string(),
    })
    .nullable(),
  attempts: z.number().int(),
  completed_at: z.string(),
});

const EmailDraftSchema: z.ZodType<EmailDraft> = z.object({
  run_id: z.string(),
  visitor_id: z.string(),
  subject: z.string(),
  body: z.string(),
  sender_name: z.string(),
  provider: z.string(),
  created_at: z.string(),
});

const VisitorListSchema = z.array(VisitorSchema);

// ============================================================================
// Shared key layout
// ============================================================================

/**
 * Result store over a flat key/value object space
 *
 * Subclasses provide raw object access; key layout, record validation and
 * the cross-run projection live here.
 */
export abstract class ObjectResultStore implements ResultStore {
  protected readonly prefix: string;

  constructor(prefix: string = DEFAULT_PREFIX) {
    this.prefix = prefix.replace(/\/+$/, '');
  }

  protected abstract putObject(key: string, body: string): Promise<void>;

  /** Returns null when the key does not exist */
  protected abstract getObject(key: string): Promise<string | null>;

  protected abstract listKeys(prefix: string): Promise<string[]>;

  protected runKey(runId: RunId): string {
    return `${this.prefix}/${runId}/run.json`;
  }

  protected visitorsKey(runId: RunId): string {
    return `${this.prefix}/${runId}/visitors.json`;
  }

  protected resultKey(runId: RunId, visitorId: VisitorId): string {
    return `${this.prefix}/${runId}/results/${visitorId}.json`;
  }

  protected emailKey(runId: RunId, visitorId: VisitorId): string {
    return `${this.prefix}/${runId}/emails/${visitorId}.json`;
  }

  /**
   * Run a backend call, mapping any failure to StoreError
   */
  protected async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof StoreError) {
        throw error;
      }
      throw new StoreError(`Storage ${operation} failed: ${errorMessage(error)}`, operation, {
        cause: error,
      });
    }
  }

  private async writeJson(operation: string, key: string, value: unknown): Promise<void> {
    await this.guard(operation, () => this.putObject(key, JSON.stringify(value, null, 2)));
  }

  private async readJson<T>(operation: string, key: string, schema: z.ZodType<T>): Promise<T | null> {
    return this.guard(operation, async () => {
      const text = await this.getObject(key);
      if (text === null) {
        return null;
      }
      const parsed = schema.safeParse(JSON.parse(text));
      if (!parsed.success) {
        throw new StoreError(`Stored object ${key} is not a valid record`, operation);
      }
      return parsed.data;
    });
  }

  private async readAll<T>(operation: string, prefix: string, schema: z.ZodType<T>): Promise<T[]> {
    const keys = await this.guard(operation, () => this.listKeys(prefix));
    const records = await Promise.all(
      keys.filter((key) => key.endsWith('.json')).map((key) => this.readJson(operation, key, schema))
    );
    return records.filter((record): record is Awaited<T> => record !== null);
  }

  async saveRun(run: AnalysisRun): Promise<void> {
    await this.writeJson('saveRun', this.runKey(run.run_id), run);
  }

  async getRun(runId: RunId): Promise<AnalysisRun | null> {
    return this.readJson('getRun', this.runKey(runId), AnalysisRunSchema);
  }

  async listRunIds(): Promise<RunId[]> {
    const keys = await this.guard('listRunIds', () => this.listKeys(`${this.prefix}/`));
    const suffix = '/run.json';
    return keys
      .filter((key) => key.endsWith(suffix))
      .map((key) => key.slice(this.prefix.length + 1, -suffix.length))
      .filter((runId) => runId.length > 0 && !runId.includes('/'))
      .sort();
  }

  async saveVisitors(runId: RunId, visitors: Visitor[]): Promise<void> {
    await this.writeJson('saveVisitors', this.visitorsKey(runId), visitors);
  }

  async loadVisitors(runId: RunId): Promise<Visitor[]> {
    const visitors = await this.readJson('loadVisitors', this.visitorsKey(runId), VisitorListSchema);
    return visitors ?? [];
  }

  async saveResult(result: QualificationResult): Promise<void> {
    await this.writeJson('saveResult', this.resultKey(result.run_id, result.visitor_id), result);
  }

  async getResult(runId: RunId, visitorId: VisitorId): Promise<QualificationResult | null> {
    return this.readJson('getResult', this.resultKey(runId, visitorId), QualificationResultSchema);
  }

  async listResults(runId: RunId): Promise<QualificationResult[]> {
    const results = await this.readAll(
      'listResults',
      `${this.prefix}/${runId}/results/`,
      QualificationResultSchema
    );
    return results.sort((a, b) => a.row_index - b.row_index);
  }

  async saveEmailDraft(draft: EmailDraft): Promise<void> {
    await this.writeJson('saveEmailDraft', this.emailKey(draft.run_id, draft.visitor_id), draft);
  }

  async listEmailDrafts(runId: RunId): Promise<EmailDraft[]> {
    return this.readAll('listEmailDrafts', `${this.prefix}/${runId}/emails/`, EmailDraftSchema);
  }

  async listQualifiedLeads(options: { limit?: number } = {}): Promise<QualifiedLead[]> {
    const runIds = await this.listRunIds();
    const leads: Array<QualifiedLead & { created_at: string; row_index: number }> = [];

    for (const runId of runIds) {
      const run = await this.getRun(runId);
      if (!run) continue;

      const results = (await this.listResults(runId)).filter(
        (result) => result.status === 'succeeded' && result.qualified
      );
      if (results.length === 0) continue;

      const visitors = new Map((await this.loadVisitors(runId)).map((v) => [v.visitor_id, v]));
      const drafts = new Map((await this.listEmailDrafts(runId)).map((d) => [d.visitor_id, d]));

      for (const result of results) {
        const visitor = visitors.get(result.visitor_id);
        if (!visitor) continue;
        const draft = drafts.get(result.visitor_id);
        leads.push({
          run_id: runId,
          source_name: run.source_name,
          visitor,
          score: result.score,
          rationale: result.rationale,
          visitor_summary: result.visitor_summary,
          company_summary: result.company_summary,
          qualified_at: result.completed_at,
          email: draft ? { subject: draft.subject, body: draft.body } : null,
          created_at: run.created_at,
          row_index: result.row_index,
        });
      }
    }

    leads.sort(
      (a, b) =>
        b.qualified_at.localeCompare(a.qualified_at) ||
        b.created_at.localeCompare(a.created_at) ||
        a.row_index - b.row_index
    );

    const limited = options.limit !== undefined ? leads.slice(0, options.limit) : leads;
    return limited.map(({ created_at: _createdAt, row_index: _rowIndex, ...lead }) => lead);
  }
}

// ============================================================================
// S3
// ============================================================================

/**
 * S3 configuration for the result store
 */
export interface S3Config {
  /** S3 bucket name */
  bucket: string;
  /** AWS region (defaults to us-east-1) */
  region?: string;
  /** Key prefix for all objects (defaults to 'runs') */
  prefix?: string;
  /** Custom S3 endpoint for local development or alternative S3-compatible services */
  endpoint?: string;
  /** AWS credentials (optional if using IAM roles or environment variables) */
  credentials?: {
    accessKeyId: string;
    secretAccessKey: string;
  };
  /** Force path style for S3-compatible services like MinIO */
  forcePathStyle?: boolean;
}

function isNotFound(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === 'NotFound' ||
      error.name === 'NoSuchKey' ||
      error.message.includes('404') ||
      error.message.includes('Not Found'))
  );
}

/**
 * S3 implementation of ResultStore using AWS SDK v3
 */
export class S3ResultStore extends ObjectResultStore {
  private readonly client: S3Client;
  private readonly bucket: string;

  constructor(config: S3Config) {
    super(config.prefix ?? DEFAULT_PREFIX);
    this.bucket = config.bucket;

    const clientConfig: S3ClientConfig = {
      region: config.region ?? 'us-east-1',
    };

    if (config.endpoint) {
      clientConfig.endpoint = config.endpoint;
    }

    if (config.credentials) {
      clientConfig.credentials = config.credentials;
    }

    if (config.forcePathStyle) {
      clientConfig.forcePathStyle = true;
    }

    this.client = new S3Client(clientConfig);
  }

  protected async putObject(key: string, body: string): Promise<void> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: body,
        ContentType: 'application/json',
      })
    );
  }

  protected async getObject(key: string): Promise<string | null> {
    try {
      const response = await this.client.send(
        new GetObjectCommand({
          Bucket: this.bucket,
          Key: key,
        })
      );
      if (!response.Body) {
        return null;
      }
      return await response.Body.transformToString();
    } catch (error: unknown) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }
  }

  protected async listKeys(prefix: string): Promise<string[]> {
    const keys: string[] = [];
    let continuationToken: string | undefined;

    do {
      const response = await this.client.send(
        new ListObjectsV2Command({
          Bucket: this.bucket,
          Prefix: prefix,
          ContinuationToken: continuationToken,
        })
      );
      for (const object of response.Contents ?? []) {
        if (object.Key) keys.push(object.Key);
      }
      continuationToken = response.IsTruncated ? response.NextContinuationToken : undefined;
    } while (continuationToken);

    return keys;
  }

  /**
   * List run ids from the top-level "directories" instead of every object
   */
  override async listRunIds(): Promise<RunId[]> {
    return this.guard('listRunIds', async () => {
      const runIds: RunId[] = [];
      const rootPrefix = `${this.prefix}/`;
      let continuationToken: string | undefined;

      do {
        const response = await this.client.send(
          new ListObjectsV2Command({
            Bucket: this.bucket,
            Prefix: rootPrefix,
            Delimiter: '/',
            ContinuationToken: continuationToken,
          })
        );
        for (const common of response.CommonPrefixes ?? []) {
          const runId = common.Prefix?.slice(rootPrefix.length).replace(/\/$/, '');
          if (runId) runIds.push(runId);
        }
        continuationToken = response.IsTruncated ? response.NextContinuationToken : undefined;
      } while (continuationToken);

      return runIds.sort();
    });
  }
}

// ============================================================================
// Memory
// ============================================================================

/**
 * In-memory result store for testing and development
 *
 * Stores serialized JSON so reads never share references with the caller.
 */
export class MemoryResultStore extends ObjectResultStore {
  private objects: Map<string, string> = new Map();

  protected async putObject(key: string, body: string): Promise<void> {
    this.objects.set(key, body);
  }

  protected async getObject(key: string): Promise<string | null> {
    return this.objects.get(key) ?? null;
  }

  protected async listKeys(prefix: string): Promise<string[]> {
    return Array.from(this.objects.keys())
      .filter((key) => key.startsWith(prefix))
      .sort();
  }

  /**
   * Clear all stored objects (useful for test cleanup)
   */
  clear(): void {
    this.objects.clear();
  }

  /**
   * Get all stored keys (useful for debugging)
   */
  keys(): string[] {
    return Array.from(this.objects.keys()).sort();
  }
}

/**
 * Factory function to create the configured result store
 */
export function createResultStore(
  config: { type: 'memory' } | (S3Config & { type: 's3' })
): ResultStore {
  if (config.type === 'memory') {
    return new MemoryResultStore();
  }
  return new S3ResultStore(config);
}
