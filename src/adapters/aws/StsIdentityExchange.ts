import { AssumeRoleCommand, STSClient } from '@aws-sdk/client-sts';
import type { Account, Credentials, IdentityExchange } from '../../core/ports';

export interface StsIdentityExchangeOptions {
  region?: string;
  // Requested lease lifetime; STS caps it at the role's max session duration
  durationSeconds?: number;
}

// Exchanges the service's own identity for a session inside the target account
// by assuming the account's configured role
export class StsIdentityExchange implements IdentityExchange {
  private readonly client: STSClient;
  private readonly durationSeconds: number;

  constructor(options: StsIdentityExchangeOptions = {}) {
    this.client = new STSClient({ region: options.region ?? 'us-east-1' });
    this.durationSeconds = options.durationSeconds ?? 3600;
  }

  async exchange(account: Account, signal: AbortSignal): Promise<{ credentials: Credentials; expiresAt: Date }> {
    const output = await this.client.send(
      new AssumeRoleCommand({
        RoleArn: account.roleArn,
        RoleSessionName: `casebridge-${account.key}`.slice(0, 64),
        DurationSeconds: this.durationSeconds,
      }),
      { abortSignal: signal },
    );

    const granted = output.Credentials;
    if (!granted?.AccessKeyId || !granted.SecretAccessKey || !granted.SessionToken || !granted.Expiration) {
      throw new Error(`AssumeRole for ${account.roleArn} returned no credentials`);
    }

    return {
      credentials: {
        accessKeyId: granted.AccessKeyId,
        secretAccessKey: granted.SecretAccessKey,
        sessionToken: granted.SessionToken,
      },
      expiresAt: granted.Expiration,
    };
  }

  destroy(): void {
    this.client.destroy();
  }
}
