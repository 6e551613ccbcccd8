import fs from 'fs';
import path from 'path';
import type { Account, Config, LimitsConfig, MessageTemplates, TimingConfig } from '../../core/ports';
import { describeError } from '../../core/domain/errors';
import { PolicySchema, type PolicyConfig } from '../config/policySchema';

const SECOND = 1000;

// Synchronous configuration service implementing Config port interface
// Config is loaded at startup from policy.json and doesn't change
export class ConfigImpl implements Config {
  private readonly accountList: Account[];
  private readonly byKey: Map<string, Account>;

  constructor(private readonly policy: PolicyConfig) {
    this.accountList = policy.accounts.map((account) => ({
      key: account.key,
      roleArn: account.roleArn,
      displayName: account.displayName ?? account.key,
    }));
    this.byKey = new Map(this.accountList.map((account) => [account.key, account]));
  }

  accounts(): Account[] {
    return this.accountList;
  }

  account(key: string): Account | undefined {
    return this.byKey.get(key);
  }

  // Policy durations are seconds; everything downstream works in milliseconds
  timings(): TimingConfig {
    const t = this.policy.timings;
    return {
      gracePeriodMs: t.gracePeriodSeconds * SECOND,
      warningLeadTimeMs: t.warningLeadTimeSeconds * SECOND,
      pollIntervalMs: t.pollIntervalSeconds * SECOND,
      lifecycleIntervalMs: t.lifecycleIntervalSeconds * SECOND,
      outboxIntervalMs: t.outboxIntervalSeconds * SECOND,
      dedupWindowMs: t.dedupWindowSeconds * SECOND,
      dedupRetentionMs: t.dedupRetentionSeconds * SECOND,
      renewalSafetyMarginMs: t.renewalSafetyMarginSeconds * SECOND,
      renewalSafetyFraction: t.renewalSafetyFraction,
      callTimeoutMs: t.callTimeoutSeconds * SECOND,
    };
  }

  limits(): LimitsConfig {
    return { ...this.policy.limits };
  }

  messaging(): MessageTemplates {
    return {
      transition: { ...this.policy.templates.transition },
      lifecycle: { ...this.policy.templates.lifecycle },
      communication: this.policy.templates.communication,
    };
  }
}

// Load and validate policy config from JSON file
// Throws if file not found or validation fails
export function loadPolicyConfig(policyPath: string): PolicyConfig {
  const resolved = path.resolve(process.cwd(), policyPath);
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(resolved, 'utf-8'));
  } catch (error) {
    throw new Error(`Failed to read configuration file at ${resolved}: ${describeError(error)}`);
  }
  return PolicySchema.parse(raw);
}
