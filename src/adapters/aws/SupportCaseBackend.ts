import { DescribeCasesCommand, SupportClient, type CaseDetails } from '@aws-sdk/client-support';
import type { CaseBackend, CaseCommunication, CaseSnapshot, CredentialLease } from '../../core/ports';
import { fromBackendStatus } from '../../core/domain/caseStatus';
import { BackendError, describeError } from '../../core/domain/errors';

// The Support API is only served from us-east-1, whatever region we run in
const SUPPORT_REGION = 'us-east-1';

const UNAUTHORIZED_ERRORS = new Set([
  'AccessDeniedException',
  'ExpiredTokenException',
  'UnrecognizedClientException',
  'InvalidClientTokenId',
]);

const errorName = (error: unknown): string | undefined =>
  error instanceof Error ? error.name : undefined;

const httpStatus = (error: unknown): number | undefined => {
  if (typeof error === 'object' && error !== null && '$metadata' in error) {
    const metadata = error.$metadata;
    if (typeof metadata === 'object' && metadata !== null && 'httpStatusCode' in metadata) {
      return typeof metadata.httpStatusCode === 'number' ? metadata.httpStatusCode : undefined;
    }
  }
  return undefined;
};

export const toSnapshot = (details: CaseDetails, caseId: string): CaseSnapshot => {
  const rawStatus = details.status ?? 'opened';
  const communications: CaseCommunication[] = (details.recentCommunications?.communications ?? [])
    .filter((comm) => Boolean(comm.timeCreated))
    .map((comm) => ({
      body: comm.body ?? '',
      submittedBy: comm.submittedBy ?? '',
      createdAt: new Date(comm.timeCreated ?? 0),
    }))
    .filter((comm) => !Number.isNaN(comm.createdAt.getTime()));

  return {
    caseId: details.caseId ?? caseId,
    displayId: details.displayId ?? caseId,
    status: fromBackendStatus(rawStatus),
    rawStatus,
    subject: details.subject,
    communications,
  };
};

// Reads case status and recent communications from AWS Support under a
// leased session. One SDK client is kept per lease.
export class SupportCaseBackend implements CaseBackend {
  private readonly clients = new WeakMap<CredentialLease, SupportClient>();

  async describeCase(lease: CredentialLease, caseId: string, signal: AbortSignal): Promise<CaseSnapshot | null> {
    let cases: CaseDetails[];
    try {
      const output = await this.clientFor(lease).send(
        new DescribeCasesCommand({
          caseIdList: [caseId],
          includeResolvedCases: true,
          includeCommunications: true,
        }),
        { abortSignal: signal },
      );
      cases = output.cases ?? [];
    } catch (error) {
      if (errorName(error) === 'CaseIdNotFound') {
        return null;
      }
      const status = httpStatus(error);
      const unauthorized = UNAUTHORIZED_ERRORS.has(errorName(error) ?? '') || status === 401 || status === 403;
      throw new BackendError(`DescribeCases failed for ${caseId}: ${describeError(error)}`, unauthorized, error);
    }

    const details = cases.find((candidate) => candidate.caseId === caseId) ?? cases[0];
    return details ? toSnapshot(details, caseId) : null;
  }

  private clientFor(lease: CredentialLease): SupportClient {
    let client = this.clients.get(lease);
    if (!client) {
      client = new SupportClient({
        region: SUPPORT_REGION,
        credentials: {
          accessKeyId: lease.credentials.accessKeyId,
          secretAccessKey: lease.credentials.secretAccessKey,
          sessionToken: lease.credentials.sessionToken,
          expiration: lease.expiresAt,
        },
      });
      this.clients.set(lease, client);
    }
    return client;
  }
}
