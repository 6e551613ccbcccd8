import type { Account, Config, CredentialLease, CredentialProvider, IdentityExchange, Logger } from '../ports';
import { AccountNotFoundError, ExchangeFailedError, describeError } from '../domain/errors';
import { withTimeout } from '../utils/async';

/**
 * Hands out per-account credential leases.
 *
 * Leases are cached until `expiresAt - margin`, where the margin is the larger
 * of the configured fixed margin and a fraction of the lease lifetime. Callers
 * that arrive while a renewal for the same account is in flight share its
 * result. Failures are returned to the caller and never retried here.
 */
export class CredentialBroker implements CredentialProvider {
  private readonly leases = new Map<string, CredentialLease>();
  private readonly inFlight = new Map<string, Promise<CredentialLease>>();

  constructor(
    private readonly config: Config,
    private readonly exchange: IdentityExchange,
    private readonly logger: Logger,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async getCredential(accountKey: string): Promise<CredentialLease> {
    const account = this.config.account(accountKey);
    if (!account) {
      throw new AccountNotFoundError(accountKey);
    }

    const cached = this.leases.get(accountKey);
    if (cached && this.isUsable(cached)) {
      return cached;
    }

    const pending = this.inFlight.get(accountKey);
    if (pending) {
      return pending;
    }

    const renewal = this.renew(account).finally(() => {
      this.inFlight.delete(accountKey);
    });
    this.inFlight.set(accountKey, renewal);
    return renewal;
  }

  // Drop a lease the backend refused so the next caller exchanges again
  invalidate(accountKey: string): void {
    if (this.leases.delete(accountKey)) {
      this.logger.info({ accountKey }, 'Credential lease invalidated');
    }
  }

  private isUsable(lease: CredentialLease): boolean {
    return this.clock().getTime() < lease.expiresAt.getTime() - this.marginFor(lease);
  }

  private marginFor(lease: CredentialLease): number {
    const { renewalSafetyMarginMs, renewalSafetyFraction } = this.config.timings();
    const lifetime = lease.expiresAt.getTime() - lease.issuedAt.getTime();
    return Math.max(renewalSafetyMarginMs, lifetime * renewalSafetyFraction);
  }

  private async renew(account: Account): Promise<CredentialLease> {
    const issuedAt = this.clock();
    const { callTimeoutMs } = this.config.timings();

    let granted: Awaited<ReturnType<IdentityExchange['exchange']>>;
    try {
      granted = await withTimeout(`credential exchange for ${account.key}`, callTimeoutMs, (signal) =>
        this.exchange.exchange(account, signal),
      );
    } catch (err) {
      this.leases.delete(account.key);
      this.logger.warn({ accountKey: account.key, err: describeError(err) }, 'Credential exchange failed');
      throw new ExchangeFailedError(account.key, err);
    }

    const lease: CredentialLease = {
      accountKey: account.key,
      credentials: granted.credentials,
      issuedAt,
      expiresAt: granted.expiresAt,
    };
    this.leases.set(account.key, lease);
    this.logger.debug(
      { accountKey: account.key, expiresAt: lease.expiresAt.toISOString() },
      'Credential lease renewed',
    );
    return lease;
  }
}
