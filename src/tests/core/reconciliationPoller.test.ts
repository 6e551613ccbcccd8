import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { CommunicationForwarder } from '../../core/application/CommunicationForwarder';
import { ReconciliationPoller } from '../../core/application/ReconciliationPoller';
import { BackendError, ExchangeFailedError } from '../../core/domain/errors';
import type { CaseBackend, CaseStatus, CredentialLease } from '../../core/ports';
import type { SqliteCaseRegistry } from '../../infra/db/SqliteCaseRegistry';
import { T0, at, HOUR, MINUTE, makeConfig, mockLogger, openTestRegistry } from '../helpers';

const leaseFor = (accountKey: string): CredentialLease => ({
  accountKey,
  credentials: { accessKeyId: 'test-key-id', secretAccessKey: 'test-secret', sessionToken: 'test-session' },
  issuedAt: T0,
  expiresAt: at(HOUR),
});

const makeCredentials = () => ({
  getCredential: vi.fn(async (accountKey: string) => leaseFor(accountKey)),
  invalidate: vi.fn((_accountKey: string) => {}),
});

const TRACKED: Array<[string, string, string]> = [
  ['acct-a', 'case-a1', 'conv-a1'],
  ['acct-a', 'case-a2', 'conv-a2'],
  ['acct-a', 'case-a3', 'conv-a3'],
  ['acct-b', 'case-b1', 'conv-b1'],
];

describe('ReconciliationPoller', () => {
  let registry: SqliteCaseRegistry;
  let logger: ReturnType<typeof mockLogger>;
  let credentials: ReturnType<typeof makeCredentials>;
  let describeCase: Mock<CaseBackend['describeCase']>;
  let backendStatus: Record<string, CaseStatus>;
  let poller: ReconciliationPoller;

  beforeEach(async () => {
    ({ registry } = openTestRegistry());
    for (const [accountKey, caseId, conversationId] of TRACKED) {
      await registry.createMapping({ accountKey, caseId, conversationId, creatorId: 'user-1' }, T0);
    }

    backendStatus = { 'case-a1': 'RESOLVED', 'case-a2': 'OPEN', 'case-a3': 'PENDING', 'case-b1': 'RESOLVED' };
    describeCase = vi.fn<CaseBackend['describeCase']>(async (_lease, caseId) => ({
      caseId,
      displayId: caseId,
      status: backendStatus[caseId],
      rawStatus: backendStatus[caseId].toLowerCase(),
      communications: [],
    }));

    const config = makeConfig();
    logger = mockLogger();
    credentials = makeCredentials();
    poller = new ReconciliationPoller(
      registry,
      credentials,
      { describeCase },
      new CommunicationForwarder(registry, config, logger),
      config,
      logger,
    );
  });

  it('applies every status change across pages and accounts', async () => {
    const summary = await poller.runCycle(at(10 * MINUTE));

    expect(summary.failedAccounts).toBe(0);
    expect(summary.applied).toBe(3);
    expect(summary.accounts).toEqual([
      expect.objectContaining({ accountKey: 'acct-a', ok: true, checked: 3, applied: 2, failedCases: 0 }),
      expect.objectContaining({ accountKey: 'acct-b', ok: true, checked: 1, applied: 1 }),
    ]);

    const a1 = await registry.lookupByConversation('conv-a1');
    expect(a1?.kase.status).toBe('RESOLVED');
    expect(a1?.conversation.resolvedAt).toEqual(at(10 * MINUTE));
    expect((await registry.listTransitions('acct-a', 'case-a1'))[0].source).toBe('POLL');
  });

  it('leaves unchanged cases alone on the next cycle', async () => {
    await poller.runCycle(at(10 * MINUTE));
    const second = await poller.runCycle(at(20 * MINUTE));

    expect(second.applied).toBe(0);
    expect(await registry.listTransitions('acct-a', 'case-a1')).toHaveLength(1);
  });

  it('keeps polling other accounts when one cannot get credentials', async () => {
    credentials.getCredential.mockImplementation(async (accountKey: string) => {
      if (accountKey === 'acct-a') {
        throw new ExchangeFailedError('acct-a', new Error('denied'));
      }
      return leaseFor(accountKey);
    });

    const summary = await poller.runCycle(at(10 * MINUTE));

    expect(summary.failedAccounts).toBe(1);
    expect(summary.accounts[0]).toMatchObject({
      accountKey: 'acct-a',
      ok: false,
      error: 'Credential exchange failed for account "acct-a": denied',
    });
    expect(summary.accounts[1]).toMatchObject({ accountKey: 'acct-b', ok: true, applied: 1 });
    expect((await registry.lookupByConversation('conv-a1'))?.kase.status).toBe('OPEN');
  });

  it('invalidates a refused lease and abandons only that account', async () => {
    describeCase.mockImplementation(async (lease, caseId) => {
      if (lease.accountKey === 'acct-a') {
        throw new BackendError('token expired', true);
      }
      return { caseId, displayId: caseId, status: 'RESOLVED', rawStatus: 'resolved', communications: [] };
    });

    const summary = await poller.runCycle(at(10 * MINUTE));

    expect(credentials.invalidate).toHaveBeenCalledWith('acct-a');
    expect(credentials.invalidate).toHaveBeenCalledTimes(1);
    expect(summary.accounts[0]).toMatchObject({ ok: false, checked: 0 });
    expect(summary.accounts[1]).toMatchObject({ ok: true, applied: 1 });
  });

  it('counts a failing case and carries on with the rest of the account', async () => {
    describeCase.mockImplementation(async (_lease, caseId) => {
      if (caseId === 'case-a2') {
        throw new Error('throttled');
      }
      return { caseId, displayId: caseId, status: backendStatus[caseId], rawStatus: 'x', communications: [] };
    });

    const summary = await poller.runCycle(at(10 * MINUTE));

    expect(summary.accounts[0]).toMatchObject({ ok: true, failedCases: 1, checked: 2, error: 'throttled' });
    expect(logger.warn).toHaveBeenCalledWith(
      expect.objectContaining({ accountKey: 'acct-a', err: 'throttled' }),
      'Case reconciliation failed, will retry next cycle',
    );
  });

  it('records a backward move as rejected without applying it', async () => {
    backendStatus['case-a3'] = 'PENDING';
    await poller.runCycle(at(10 * MINUTE));
    backendStatus['case-a3'] = 'OPEN';

    const summary = await poller.runCycle(at(20 * MINUTE));

    expect(summary.accounts[0]).toMatchObject({ rejected: 1, applied: 0 });
    expect((await registry.lookupByConversation('conv-a3'))?.kase.status).toBe('PENDING');
  });

  it('skips the credential exchange for accounts without live conversations', async () => {
    ({ registry } = openTestRegistry());
    await registry.createMapping({ accountKey: 'acct-b', caseId: 'case-b1', conversationId: 'conv-b1', creatorId: 'u' }, T0);
    const config = makeConfig();
    const lone = new ReconciliationPoller(
      registry,
      credentials,
      { describeCase },
      new CommunicationForwarder(registry, config, logger),
      config,
      logger,
    );

    await lone.runCycle(at(10 * MINUTE));

    expect(credentials.getCredential).toHaveBeenCalledTimes(1);
    expect(credentials.getCredential).toHaveBeenCalledWith('acct-b');
  });

  it('prunes dedup records past the retention window', async () => {
    await registry.applyTransition(
      { accountKey: 'acct-a', caseId: 'case-a2', observedStatus: 'OPEN', source: 'PUSH', dedupKey: 'old' },
      T0,
    );

    await poller.runCycle(at(3 * HOUR));

    expect(await registry.listTransitions('acct-a', 'case-a2')).toEqual([]);
  });
});
