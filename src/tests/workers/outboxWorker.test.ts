import { describe, it, expect, vi, afterEach } from 'vitest';
import { processOutboxBatch, startOutboxWorker } from '../../adapters/scheduler/OutboxWorker';
import { OutboundNotifier } from '../../core/application/OutboundNotifier';
import type { ChatTransport, OutboxJob, OutboxRepository } from '../../core/ports';
import { renderTemplate } from '../../infra/utils/template';
import { T0, makeConfig } from '../helpers';

const job = (overrides: Partial<OutboxJob> = {}): OutboxJob => ({
  id: 'job-1',
  conversationId: 'conv-1',
  kind: 'transition',
  template: 'transition.RESOLVED',
  data: { display_id: '1001' },
  identity: 'transition:tr-1',
  attempts: 0,
  ...overrides,
});

const makeOutbox = (batches: OutboxJob[][]) => {
  const takeDue = vi.fn<OutboxRepository['takeDue']>(async () => []);
  for (const batch of batches) {
    takeDue.mockResolvedValueOnce(batch);
  }
  return {
    enqueue: vi.fn<OutboxRepository['enqueue']>(async () => true),
    takeDue,
    markSent: vi.fn<OutboxRepository['markSent']>(async () => {}),
    markFailed: vi.fn<OutboxRepository['markFailed']>(async () => {}),
    markPermanentlyFailed: vi.fn<OutboxRepository['markPermanentlyFailed']>(async () => {}),
    retryFailed: vi.fn<OutboxRepository['retryFailed']>(async () => 0),
    purgeFailed: vi.fn<OutboxRepository['purgeFailed']>(async () => 0),
  } satisfies OutboxRepository;
};

const makeTransport = () => ({
  dispatch: vi.fn<ChatTransport['dispatch']>(async () => {}),
  archive: vi.fn<ChatTransport['archive']>(async () => {}),
});

const setup = (batches: OutboxJob[][]) => {
  const config = makeConfig();
  const outbox = makeOutbox(batches);
  const transport = makeTransport();
  const notifier = new OutboundNotifier(transport, config, renderTemplate);
  return { config, outbox, transport, notifier };
};

describe('OutboxWorker', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('delivers jobs and marks them sent', async () => {
    const { config, outbox, transport, notifier } = setup([[job()]]);

    const taken = await processOutboxBatch(outbox, notifier, config, 5);

    expect(taken).toBe(1);
    expect(outbox.takeDue).toHaveBeenCalledWith(5);
    expect(transport.dispatch).toHaveBeenCalledWith(
      { conversationId: 'conv-1', identity: 'transition:tr-1', payload: 'resolved 1001' },
      expect.any(AbortSignal),
    );
    expect(outbox.markSent).toHaveBeenCalledWith('job-1');
    expect(outbox.markFailed).not.toHaveBeenCalled();
  });

  it('records failures and schedules retry with backoff', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(T0);
    const { config, outbox, transport, notifier } = setup([[job({ id: 'job-2', attempts: 1 })]]);
    transport.dispatch.mockRejectedValueOnce(new Error('network down'));

    await processOutboxBatch(outbox, notifier, config, 10);

    expect(outbox.markSent).not.toHaveBeenCalled();
    // Second attempt waits the second backoff step: 15 seconds
    expect(outbox.markFailed).toHaveBeenCalledWith('job-2', 'network down', new Date(T0.getTime() + 15_000));
  });

  it('gives up once the retry budget is spent', async () => {
    const { config, outbox, transport, notifier } = setup([[job({ attempts: 3 })]]);
    transport.dispatch.mockRejectedValueOnce(new Error('unknown channel'));

    await processOutboxBatch(outbox, notifier, config, 10);

    expect(outbox.markPermanentlyFailed).toHaveBeenCalledWith('job-1', 'unknown channel');
    expect(outbox.markFailed).not.toHaveBeenCalled();
  });

  it('keeps going after one job in the batch fails', async () => {
    const { config, outbox, notifier } = setup([
      [job({ id: 'job-a', template: 'transition.UNKNOWN' }), job({ id: 'job-b', identity: 'transition:tr-2' })],
    ]);

    await processOutboxBatch(outbox, notifier, config, 10);

    expect(outbox.markFailed).toHaveBeenCalledWith(
      'job-a',
      'Message template "transition.UNKNOWN" is not configured',
      expect.any(Date),
    );
    expect(outbox.markSent).toHaveBeenCalledWith('job-b');
  });

  it('drains full batches within one tick', async () => {
    const { config, outbox, notifier } = setup([[job({ id: 'job-a' })], [job({ id: 'job-b' })]]);

    const worker = startOutboxWorker({ outbox, notifier, policy: config, batchSize: 1, intervalMs: 60_000 });
    await worker.stop();

    expect(outbox.takeDue).toHaveBeenCalledTimes(3);
    expect(outbox.markSent.mock.calls.map(([id]) => id)).toEqual(['job-a', 'job-b']);
  });
});
