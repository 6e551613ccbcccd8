import { z } from 'zod';

// Schema for one target account: the role assumed to act inside it
export const AccountSchema = z.object({
  key: z.string().min(1),
  roleArn: z.string().regex(/^arn:aws[\w-]*:iam::\d{12}:role\/.+$/, 'roleArn must be an IAM role ARN'),
  displayName: z.string().optional(),
});

// All durations in the policy file are seconds
const seconds = z.number().positive();

export const TimingsSchema = z
  .object({
    gracePeriodSeconds: seconds.default(72 * 3600),
    warningLeadTimeSeconds: seconds.default(3600),
    pollIntervalSeconds: seconds.default(600),
    lifecycleIntervalSeconds: seconds.default(60),
    outboxIntervalSeconds: seconds.default(2),
    dedupWindowSeconds: seconds.default(300),
    // Must outlast the longest duplicate delivery: one poll interval plus push jitter
    dedupRetentionSeconds: seconds.default(2 * 3600),
    renewalSafetyMarginSeconds: z.number().nonnegative().default(300),
    renewalSafetyFraction: z.number().min(0).max(0.9).default(0.1),
    callTimeoutSeconds: seconds.default(15),
  })
  .refine((t) => t.warningLeadTimeSeconds < t.gracePeriodSeconds, {
    message: 'warningLeadTimeSeconds must be shorter than gracePeriodSeconds',
    path: ['warningLeadTimeSeconds'],
  });

// Complete policy configuration schema
// .nonempty() ensures at least one account is configured
// z.number().int() requires integer, .positive() requires > 0
export const PolicySchema = z.object({
  accounts: z
    .array(AccountSchema)
    .nonempty()
    .refine((accounts) => new Set(accounts.map((a) => a.key)).size === accounts.length, {
      message: 'account keys must be unique',
    }),
  timings: TimingsSchema,
  limits: z.object({
    maxNotificationRetries: z.number().int().nonnegative(),
    notificationBackoffSeconds: z.array(z.number().nonnegative()).nonempty(),
    pollFanOut: z.number().int().positive().default(4),
    pollPageSize: z.number().int().positive().default(100),
    outboxBatchSize: z.number().int().positive().default(10),
    communicationMaxLength: z.number().int().positive().default(1800),
  }),
  templates: z.object({
    transition: z.object({
      OPEN: z.string(),
      PENDING: z.string(),
      RESOLVED: z.string(),
      REOPENED: z.string(),
    }),
    lifecycle: z.object({
      warning: z.string(),
      archive: z.string(),
    }),
    communication: z.string(),
  }),
});

// z.infer<typeof Schema> extracts TypeScript type from Zod schema
export type PolicyConfig = z.infer<typeof PolicySchema>;
