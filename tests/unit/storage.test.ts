/**
 * Unit tests for the Storage Module
 * Tests the shared key layout through MemoryResultStore
 */

import { describe, test, expect, beforeEach } from '@jest/globals';
import { StoreError } from '../../src/errors/index.js';
import {
  MemoryResultStore,
  S3ResultStore,
  createResultStore,
} from '../../src/storage/index.js';
import type { EmailDraft } from '../../src/types/index.js';
import { makeResult, makeRun, makeVisitor } from '../helpers/fakes.js';

function makeDraft(overrides: Partial<EmailDraft> = {}): EmailDraft {
  return {
    run_id: 'run_a',
    visitor_id: 'row_2',
    subject: 'Quick hello',
    body: 'Hi Jane',
    sender_name: 'Sam',
    provider: 'fake',
    created_at: '2024-06-01T10:06:00.000Z',
    ...overrides,
  };
}

class CorruptStore extends MemoryResultStore {
  constructor(private readonly stored: string) {
    super();
  }

  protected override async getObject(): Promise<string | null> {
    return this.stored;
  }
}

class FullDiskStore extends MemoryResultStore {
  protected override async putObject(): Promise<void> {
    throw new Error('disk full');
  }
}

describe('Storage Module', () => {
  let store: MemoryResultStore;

  beforeEach(() => {
    store = new MemoryResultStore();
  });

  describe('MemoryResultStore', () => {
    test('should lay out keys per run', async () => {
      await store.saveRun(makeRun({ run_id: 'run_a' }));
      await store.saveVisitors('run_a', [makeVisitor()]);
      await store.saveResult(makeResult({ run_id: 'run_a' }));
      await store.saveEmailDraft(makeDraft());

      expect(store.keys()).toEqual([
        'runs/run_a/emails/row_2.json',
        'runs/run_a/results/row_2.json',
        'runs/run_a/run.json',
        'runs/run_a/visitors.json',
      ]);
    });

    test('should honour a custom prefix', async () => {
      const archive = new MemoryResultStore('archive/');
      await archive.saveRun(makeRun({ run_id: 'run_a' }));

      expect(archive.keys()).toEqual(['archive/run_a/run.json']);
      expect(await archive.listRunIds()).toEqual(['run_a']);
    });

    test('should read back what was saved', async () => {
      const run = makeRun({ run_id: 'run_a' });
      const visitors = [makeVisitor(), makeVisitor({ row_index: 1, first_name: 'Bob' })];
      await store.saveRun(run);
      await store.saveVisitors('run_a', visitors);

      expect(await store.getRun('run_a')).toEqual(run);
      expect(await store.loadVisitors('run_a')).toEqual(visitors);
    });

    test('should return empty values for unknown runs', async () => {
      expect(await store.getRun('run_missing')).toBeNull();
      expect(await store.loadVisitors('run_missing')).toEqual([]);
      expect(await store.getResult('run_missing', 'row_2')).toBeNull();
      expect(await store.listResults('run_missing')).toEqual([]);
      expect(await store.listRunIds()).toEqual([]);
    });

    test('should keep one result per visitor, last write wins', async () => {
      await store.saveResult(makeResult({ run_id: 'run_a', score: 4 }));
      await store.saveResult(makeResult({ run_id: 'run_a', score: 9 }));

      const results = await store.listResults('run_a');
      expect(results).toHaveLength(1);
      expect(results[0]?.score).toBe(9);
      expect((await store.getResult('run_a', 'row_2'))?.score).toBe(9);
    });

    test('should list results in input order', async () => {
      await store.saveResult(makeResult({ run_id: 'run_a', visitor_id: 'row_11', row_index: 9 }));
      await store.saveResult(makeResult({ run_id: 'run_a', visitor_id: 'row_3', row_index: 1 }));
      await store.saveResult(makeResult({ run_id: 'run_a', visitor_id: 'row_2', row_index: 0 }));

      const results = await store.listResults('run_a');
      expect(results.map((r) => r.visitor_id)).toEqual(['row_2', 'row_3', 'row_11']);
    });

    test('should list run ids sorted', async () => {
      await store.saveRun(makeRun({ run_id: 'run_b' }));
      await store.saveRun(makeRun({ run_id: 'run_a' }));
      await store.saveResult(makeResult({ run_id: 'run_c' }));

      expect(await store.listRunIds()).toEqual(['run_a', 'run_b']);
    });

    test('should clear all objects', async () => {
      await store.saveRun(makeRun({ run_id: 'run_a' }));
      store.clear();

      expect(store.keys()).toEqual([]);
    });
  });

  describe('listQualifiedLeads()', () => {
    beforeEach(async () => {
      await store.saveRun(makeRun({ run_id: 'run_a', source_name: 'june.csv', created_at: '2024-06-01T10:00:00.000Z' }));
      await store.saveVisitors('run_a', [
        makeVisitor(),
        makeVisitor({ row_index: 1, first_name: 'Bob', company_name: 'Beta Co' }),
      ]);
      await store.saveResult(
        makeResult({ run_id: 'run_a', completed_at: '2024-06-01T10:05:00.000Z' })
      );
      await store.saveResult(
        makeResult({ run_id: 'run_a', visitor_id: 'row_3', row_index: 1, qualified: false, score: 2 })
      );
      await store.saveEmailDraft(makeDraft());

      await store.saveRun(makeRun({ run_id: 'run_b', source_name: 'july.csv', created_at: '2024-07-01T09:00:00.000Z' }));
      await store.saveVisitors('run_b', [makeVisitor({ first_name: 'Ana', company_name: 'Gamma' })]);
      await store.saveResult(
        makeResult({ run_id: 'run_b', score: 7, completed_at: '2024-07-01T09:02:00.000Z' })
      );
      await store.saveResult(
        makeResult({
          run_id: 'run_b',
          visitor_id: 'row_3',
          row_index: 1,
          status: 'failed',
          qualified: false,
          score: null,
        })
      );
    });

    test('should project qualified results newest first', async () => {
      const leads = await store.listQualifiedLeads();

      expect(leads.map((l) => [l.run_id, l.visitor.first_name])).toEqual([
        ['run_b', 'Ana'],
        ['run_a', 'Jane'],
      ]);
      expect(leads[0]).toEqual({
        run_id: 'run_b',
        source_name: 'july.csv',
        visitor: makeVisitor({ first_name: 'Ana', company_name: 'Gamma' }),
        score: 7,
        rationale: ['Senior operations title'],
        visitor_summary: 'Leads operations',
        company_summary: 'Regional distributor',
        qualified_at: '2024-07-01T09:02:00.000Z',
        email: null,
      });
      expect(leads[1]?.email).toEqual({ subject: 'Quick hello', body: 'Hi Jane' });
    });

    test('should apply a limit', async () => {
      const leads = await store.listQualifiedLeads({ limit: 1 });

      expect(leads).toHaveLength(1);
      expect(leads[0]?.run_id).toBe('run_b');
    });
  });

  describe('failures', () => {
    test('should reject a stored record with the wrong shape', async () => {
      const corrupt = new CorruptStore('{"run_id": 5}');

      await expect(corrupt.getRun('run_a')).rejects.toThrow(
        'Stored object runs/run_a/run.json is not a valid record'
      );
    });

    test('should wrap unreadable JSON as StoreError', async () => {
      const corrupt = new CorruptStore('not json');

      await expect(corrupt.getResult('run_a', 'row_2')).rejects.toBeInstanceOf(StoreError);
    });

    test('should wrap backend write failures', async () => {
      const full = new FullDiskStore();

      await expect(full.saveRun(makeRun())).rejects.toMatchObject({
        message: 'Storage saveRun failed: disk full',
        operation: 'saveRun',
      });
    });
  });

  describe('createResultStore()', () => {
    test('should create a memory store', () => {
      expect(createResultStore({ type: 'memory' })).toBeInstanceOf(MemoryResultStore);
    });

    test('should create an S3 store', () => {
      const s3 = createResultStore({
        type: 's3',
        bucket: 'visitor-runs',
        region: 'us-east-1',
        prefix: 'runs',
        forcePathStyle: true,
      });
      expect(s3).toBeInstanceOf(S3ResultStore);
    });
  });
});
