/**
 * Unit tests for the Drafter Module
 */

import { describe, test, expect } from '@jest/globals';
import {
  EmailDraftingAdapter,
  buildEmailPrompt,
  cleanEmailText,
  parseEmailDraftResponse,
} from '../../src/drafter/index.js';
import { ParseError, ProviderError } from '../../src/errors/index.js';
import {
  FakeCompletionClient,
  makeResult,
  makeVisitor,
  silentLogger,
} from '../helpers/fakes.js';

const persona = { senderName: 'Sam', sellerCompany: 'Northwind AI' };
const context = { runId: 'run_abc' };

function emailJson(subject: string, body: string): string {
  return JSON.stringify({ subject, body });
}

describe('Drafter Module', () => {
  describe('cleanEmailText()', () => {
    test('should strip citations and emphasis', () => {
      expect(cleanEmailText('Hi Jane [1], we **help** teams [2, 3] move *fast*.  \nSam')).toBe(
        'Hi Jane, we help teams move fast.\nSam'
      );
    });

    test('should strip underscore emphasis', () => {
      expect(cleanEmailText('A __quick__ note')).toBe('A quick note');
    });
  });

  describe('buildEmailPrompt()', () => {
    test('should fill persona, visitor lines and summaries', () => {
      const template = '{{sender_name}}@{{seller_company}}\n{{visitor_info}}\n{{visitor_summary}} / {{company_summary}}';

      const prompt = buildEmailPrompt(makeVisitor({ email: '' }), makeResult(), persona, template);

      expect(prompt).toBe(
        [
          'Sam@Northwind AI',
          '- Name: Jane Doe',
          '- Title: VP of Operations',
          '- Company: Acme Logistics',
          '- Industry: Transportation',
          '- Website: https://acme.test/',
          'Leads operations / Regional distributor',
        ].join('\n')
      );
    });
  });

  describe('parseEmailDraftResponse()', () => {
    test('should parse and clean subject and body', () => {
      expect(parseEmailDraftResponse('```json\n' + emailJson(' **Quick hello** ', 'Hi Jane [1]') + '\n```')).toEqual({
        subject: 'Quick hello',
        body: 'Hi Jane',
      });
    });

    test('should reject a missing body', () => {
      expect(() => parseEmailDraftResponse('{"subject": "Hello"}')).toThrow(
        'Email response must contain a subject and a body'
      );
    });

    test('should reject content that is empty after cleanup', () => {
      expect(() => parseEmailDraftResponse(emailJson('Hello', '[1]'))).toThrow(
        'Email response is empty after cleanup'
      );
    });

    test('should reject text that is not JSON', () => {
      expect(() => parseEmailDraftResponse('Dear Jane, ...')).toThrow(ParseError);
    });
  });

  describe('EmailDraftingAdapter', () => {
    test('should draft for a qualified visitor with the bundled template', async () => {
      const client = new FakeCompletionClient(() => emailJson('Quick hello', 'Hi Jane, curious what brought you by. Sam'), 'anthropic');
      const adapter = new EmailDraftingAdapter({ client, persona, logger: silentLogger });

      const outcome = await adapter.draft(makeVisitor(), makeResult(), context);

      expect('draft' in outcome).toBe(true);
      if (!('draft' in outcome)) return;
      expect(outcome.draft).toMatchObject({
        run_id: 'run_abc',
        visitor_id: 'row_2',
        subject: 'Quick hello',
        body: 'Hi Jane, curious what brought you by. Sam',
        sender_name: 'Sam',
        provider: 'anthropic',
      });
      const prompt = client.requests[0]?.prompt ?? '';
      expect(prompt).toContain('- Name: Jane Doe');
      expect(prompt).toContain('Regional distributor');
      expect(prompt).not.toContain('{{');
    });

    test('should refuse visitors that are not qualified', async () => {
      const client = new FakeCompletionClient(() => emailJson('a', 'b'));
      const adapter = new EmailDraftingAdapter({ client, persona, template: '', logger: silentLogger });

      const outcome = await adapter.draft(makeVisitor(), makeResult({ qualified: false }), context);

      expect(outcome).toEqual({
        error: { code: 'NOT_ELIGIBLE', message: 'Visitor row_2 is not a succeeded, qualified result' },
      });
      expect(client.requests).toHaveLength(0);
    });

    test('should refuse failed results', async () => {
      const client = new FakeCompletionClient(() => emailJson('a', 'b'));
      const adapter = new EmailDraftingAdapter({ client, persona, template: '', logger: silentLogger });

      const outcome = await adapter.draft(
        makeVisitor(),
        makeResult({ status: 'failed', qualified: true }),
        context
      );

      expect('error' in outcome && outcome.error.code).toBe('NOT_ELIGIBLE');
    });

    test('should return the provider error after retries', async () => {
      const client = new FakeCompletionClient(() => {
        throw new ProviderError('Claude request failed: overloaded', 'anthropic', 529);
      });
      const adapter = new EmailDraftingAdapter({
        client,
        persona,
        template: '{{visitor_info}}',
        retryDelaysMs: [0],
        logger: silentLogger,
      });

      const outcome = await adapter.draft(makeVisitor(), makeResult(), context);

      expect(client.requests).toHaveLength(2);
      expect(outcome).toEqual({
        error: { code: 'PROVIDER_ERROR', message: 'Claude request failed: overloaded' },
      });
    });
  });
});
