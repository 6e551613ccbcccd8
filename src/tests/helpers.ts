import { vi } from 'vitest';
import type { z } from 'zod';
import { PolicySchema } from '../infra/config/policySchema';
import { ConfigImpl } from '../infra/services/Config';
import { openDatabase } from '../infra/db/database';
import { SqliteCaseRegistry } from '../infra/db/SqliteCaseRegistry';
import { SqliteOutboxRepository } from '../infra/db/SqliteOutboxRepository';

type PolicyInput = z.input<typeof PolicySchema>;

export interface PolicyOverrides {
  timings?: Partial<PolicyInput['timings']>;
  limits?: Partial<PolicyInput['limits']>;
}

export const T0 = new Date('2026-03-02T10:00:00.000Z');

export const at = (offsetMs: number): Date => new Date(T0.getTime() + offsetMs);

export const MINUTE = 60 * 1000;
export const HOUR = 60 * MINUTE;

export const makeConfig = (overrides: PolicyOverrides = {}): ConfigImpl =>
  new ConfigImpl(
    PolicySchema.parse({
      accounts: [
        { key: 'acct-a', roleArn: 'arn:aws:iam::111111111111:role/TestSupport' },
        { key: 'acct-b', roleArn: 'arn:aws:iam::222222222222:role/TestSupport', displayName: 'Account B' },
      ],
      timings: {
        gracePeriodSeconds: 3600,
        warningLeadTimeSeconds: 600,
        dedupWindowSeconds: 300,
        renewalSafetyMarginSeconds: 60,
        renewalSafetyFraction: 0.1,
        callTimeoutSeconds: 5,
        ...overrides.timings,
      },
      limits: {
        maxNotificationRetries: 3,
        notificationBackoffSeconds: [5, 15, 30],
        pollFanOut: 2,
        pollPageSize: 2,
        communicationMaxLength: 20,
        ...overrides.limits,
      },
      templates: {
        transition: {
          OPEN: 'open {{display_id}}',
          PENDING: 'pending {{display_id}}',
          RESOLVED: 'resolved {{display_id}}',
          REOPENED: 'reopened {{display_id}}',
        },
        lifecycle: {
          warning: 'archiving {{display_id}} at {{archive_at}}',
          archive: 'archived {{display_id}}',
        },
        communication: '{{author}}: {{body}}',
      },
    }),
  );

export const mockLogger = () => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

// Fresh in-memory registry and outbox sharing one connection
export const openTestRegistry = () => {
  const db = openDatabase(':memory:');
  const outbox = new SqliteOutboxRepository(db);
  const registry = new SqliteCaseRegistry(db, outbox);
  return { db, outbox, registry };
};
