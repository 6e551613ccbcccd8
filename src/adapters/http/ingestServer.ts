import { timingSafeEqual } from 'crypto';
import type { Server } from 'http';
import express, { type Express, type Request } from 'express';
import { z } from 'zod';
import type { Config } from '../../core/ports';
import type { CaseEvent, CaseEventKind, IngestResult, NotificationIngest } from '../../core/application/NotificationIngest';
import { CaseBridgeError } from '../../core/domain/errors';
import { logger as rootLogger } from '../../infra/logger';

const logger = rootLogger.child({ component: 'ingest-http' });

export class HttpError extends Error {
  constructor(
    readonly status: number,
    readonly code: string,
  ) {
    super(code);
  }
}

// Canonical shape delivered by our own relays
const CanonicalEventSchema = z.object({
  accountKey: z.string().min(1),
  caseId: z.string().min(1),
  kind: z.enum(['case_created', 'communication_added', 'case_resolved', 'case_reopened']),
  eventTime: z.coerce.date(),
  eventId: z.string().optional(),
});

// AWS Support events as forwarded from EventBridge
const SupportEnvelopeSchema = z.object({
  id: z.string().optional(),
  'detail-type': z.literal('Support Case Update'),
  source: z.literal('aws.support'),
  account: z.string().regex(/^\d{12}$/),
  time: z.coerce.date(),
  detail: z.object({
    'case-id': z.string().min(1),
    'event-name': z.string(),
    'communication-id': z.string().optional(),
  }),
});

const SUPPORT_EVENT_KINDS: Record<string, CaseEventKind> = {
  CreateCase: 'case_created',
  AddCommunicationToCase: 'communication_added',
  ResolveCase: 'case_resolved',
  ReopenCase: 'case_reopened',
};

const BodySchema = z.union([
  z.object({ events: z.array(z.union([CanonicalEventSchema, SupportEnvelopeSchema])).min(1).max(100) }),
  CanonicalEventSchema,
  SupportEnvelopeSchema,
]);

type SupportEnvelope = z.infer<typeof SupportEnvelopeSchema>;

// The envelope names the AWS account id; find the configured account whose role lives there
const accountKeyFor = (awsAccountId: string, config: Config): string | undefined =>
  config.accounts().find((account) => account.roleArn.split(':')[4] === awsAccountId)?.key;

const fromEnvelope = (envelope: SupportEnvelope, config: Config): CaseEvent | null => {
  const kind = SUPPORT_EVENT_KINDS[envelope.detail['event-name']];
  const accountKey = accountKeyFor(envelope.account, config);
  if (!kind || !accountKey) {
    logger.debug(
      { eventName: envelope.detail['event-name'], awsAccount: envelope.account },
      'Support event ignored: unknown event name or account',
    );
    return null;
  }
  return {
    accountKey,
    caseId: envelope.detail['case-id'],
    kind,
    eventTime: envelope.time,
    eventId: envelope.id ?? envelope.detail['communication-id'],
  };
};

/**
 * Validates a webhook body and normalizes it into case events. Accepts a
 * single event, a `{ events: [...] }` batch, or raw Support envelopes.
 */
export function parseIngestBody(body: unknown, config: Config): CaseEvent[] {
  const parsed = BodySchema.safeParse(body);
  if (!parsed.success) {
    throw new HttpError(400, 'invalid_event');
  }

  const items = 'events' in parsed.data ? parsed.data.events : [parsed.data];
  const events: CaseEvent[] = [];
  for (const item of items) {
    if ('detail' in item) {
      const event = fromEnvelope(item, config);
      if (event) {
        events.push(event);
      }
    } else {
      events.push(item);
    }
  }
  return events;
}

export function requireSecret(req: Request, secret: string): void {
  const provided = Buffer.from(String(req.header('x-casebridge-secret') ?? ''));
  const expected = Buffer.from(secret);
  if (provided.length !== expected.length || !timingSafeEqual(provided, expected)) {
    throw new HttpError(401, 'unauthorized');
  }
}

export interface IngestAppDeps {
  ingest: Pick<NotificationIngest, 'handle'>;
  config: Config;
  secret: string;
}

export function createIngestApp({ ingest, config, secret }: IngestAppDeps): Express {
  const app = express();

  app.get('/healthz', (_req, res) => {
    res.json({ ok: true });
  });

  // POST /events: push-delivered case events, answered once every event is applied
  app.post('/events', express.json({ limit: '256kb' }), async (req, res) => {
    try {
      requireSecret(req, secret);
      const events = parseIngestBody(req.body, config);

      const results: Array<{ caseId: string; outcome: IngestResult['outcome'] }> = [];
      for (const event of events) {
        const result = await ingest.handle(event);
        results.push({ caseId: event.caseId, outcome: result.outcome });
      }

      res.status(202).json({ ok: true, results });
    } catch (err) {
      if (err instanceof HttpError) {
        res.status(err.status).json({ ok: false, error: err.code });
        return;
      }
      // Upstream trouble: a 503 makes the sender redeliver, which dedup absorbs
      const code = err instanceof CaseBridgeError ? err.code : 'ingest_failed';
      logger.error({ err }, 'Event ingestion failed');
      res.status(503).json({ ok: false, error: code });
    }
  });

  return app;
}

export function startIngestServer(app: Express, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => {
      logger.info({ port }, 'Ingest server listening');
      resolve(server);
    });
    server.once('error', reject);
  });
}

export function stopIngestServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}
