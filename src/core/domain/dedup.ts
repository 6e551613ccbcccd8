import { createHash } from 'crypto';
import type { CaseStatus } from '../ports';

// Backend status changes carry no sequence number, so duplicates are collapsed
// by bucketing the observation time.
export function dedupKeyOf(args: {
  accountKey: string;
  caseId: string;
  status: CaseStatus;
  observedAt: Date;
  windowMs: number;
}): string {
  const bucket = Math.floor(args.observedAt.getTime() / args.windowMs);
  const raw = `${args.accountKey}|${args.caseId}|${args.status}|${bucket}`;
  return createHash('sha256').update(raw).digest('hex');
}
