import type { Server } from 'http';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  HttpError,
  createIngestApp,
  parseIngestBody,
  startIngestServer,
  stopIngestServer,
} from '../../adapters/http/ingestServer';
import type { NotificationIngest } from '../../core/application/NotificationIngest';
import { ExchangeFailedError } from '../../core/domain/errors';
import { makeConfig } from '../helpers';

const config = makeConfig();

const envelope = (overrides: Record<string, unknown> = {}) => ({
  id: 'evt-1',
  'detail-type': 'Support Case Update',
  source: 'aws.support',
  account: '111111111111',
  time: '2026-03-02T10:01:00Z',
  detail: { 'case-id': 'case-1', 'event-name': 'ResolveCase' },
  ...overrides,
});

describe('parseIngestBody', () => {
  it('accepts a single canonical event', () => {
    const events = parseIngestBody(
      { accountKey: 'acct-a', caseId: 'case-1', kind: 'case_reopened', eventTime: '2026-03-02T10:01:00Z' },
      config,
    );

    expect(events).toEqual([
      {
        accountKey: 'acct-a',
        caseId: 'case-1',
        kind: 'case_reopened',
        eventTime: new Date('2026-03-02T10:01:00Z'),
      },
    ]);
  });

  it('accepts a batch mixing both shapes', () => {
    const events = parseIngestBody(
      {
        events: [
          { accountKey: 'acct-b', caseId: 'case-9', kind: 'communication_added', eventTime: '2026-03-02T10:00:00Z' },
          envelope(),
        ],
      },
      config,
    );

    expect(events.map((e) => `${e.accountKey}/${e.caseId}/${e.kind}`)).toEqual([
      'acct-b/case-9/communication_added',
      'acct-a/case-1/case_resolved',
    ]);
  });

  it('maps a support envelope to the account owning its role', () => {
    expect(parseIngestBody(envelope(), config)).toEqual([
      {
        accountKey: 'acct-a',
        caseId: 'case-1',
        kind: 'case_resolved',
        eventTime: new Date('2026-03-02T10:01:00Z'),
        eventId: 'evt-1',
      },
    ]);
  });

  it('drops envelopes for unknown accounts or event names', () => {
    expect(parseIngestBody(envelope({ account: '999999999999' }), config)).toEqual([]);
    expect(
      parseIngestBody(envelope({ detail: { 'case-id': 'case-1', 'event-name': 'DescribeCases' } }), config),
    ).toEqual([]);
  });

  it('rejects bodies that match no known shape', () => {
    const attempt = () => parseIngestBody({ accountKey: 'acct-a', kind: 'case_resolved' }, config);

    expect(attempt).toThrow(HttpError);
    expect(attempt).toThrow('invalid_event');
  });

  it('rejects an empty batch', () => {
    expect(() => parseIngestBody({ events: [] }, config)).toThrow(HttpError);
  });
});

describe('POST /events', () => {
  const handle = vi.fn<NotificationIngest['handle']>();
  let server: Server;
  let baseUrl: string;

  const post = (body: unknown, secret: string | null = 'test-secret') =>
    fetch(`${baseUrl}/events`, {
      method: 'POST',
      headers: {
        'content-type': 'application/json',
        ...(secret === null ? {} : { 'x-casebridge-secret': secret }),
      },
      body: JSON.stringify(body),
    });

  const resolvedEvent = (caseId: string) => ({
    accountKey: 'acct-a',
    caseId,
    kind: 'case_resolved',
    eventTime: '2026-03-02T10:01:00Z',
  });

  beforeEach(async () => {
    handle.mockReset();
    server = await startIngestServer(createIngestApp({ ingest: { handle }, config, secret: 'test-secret' }), 0);
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('server has no port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await stopIngestServer(server);
  });

  it('answers 401 without the shared secret', async () => {
    const res = await post(resolvedEvent('case-1'), null);

    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({ ok: false, error: 'unauthorized' });
    expect(handle).not.toHaveBeenCalled();
  });

  it('answers 401 for a wrong secret', async () => {
    const res = await post(resolvedEvent('case-1'), 'wrong-secret');

    expect(res.status).toBe(401);
    expect(handle).not.toHaveBeenCalled();
  });

  it('answers 400 for a body of unknown shape', async () => {
    const res = await post({ caseId: 'case-1' });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ ok: false, error: 'invalid_event' });
  });

  it('applies a batch and reports one outcome per event', async () => {
    handle.mockImplementation(async (event) =>
      event.caseId === 'case-1'
        ? { outcome: 'duplicate_ignored', dedupKey: 'k-1' }
        : { outcome: 'not_found' },
    );

    const res = await post({ events: [resolvedEvent('case-1'), resolvedEvent('case-2')] });

    expect(res.status).toBe(202);
    expect(await res.json()).toEqual({
      ok: true,
      results: [
        { caseId: 'case-1', outcome: 'duplicate_ignored' },
        { caseId: 'case-2', outcome: 'not_found' },
      ],
    });
    expect(handle.mock.calls.map(([event]) => event.caseId)).toEqual(['case-1', 'case-2']);
  });

  it('answers 503 when credentials cannot be obtained so the sender redelivers', async () => {
    handle.mockRejectedValue(new ExchangeFailedError('acct-a', new Error('AccessDenied')));

    const res = await post({
      accountKey: 'acct-a',
      caseId: 'case-1',
      kind: 'communication_added',
      eventTime: '2026-03-02T10:01:00Z',
    });

    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({ ok: false, error: 'EXCHANGE_FAILED' });
  });

  it('serves a health check without the secret', async () => {
    const res = await fetch(`${baseUrl}/healthz`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ ok: true });
  });
});
