import type { CaseStatus } from '../ports';

export const CASE_STATUSES: readonly CaseStatus[] = ['OPEN', 'PENDING', 'RESOLVED', 'REOPENED'];

// Forward moves along OPEN -> PENDING -> RESOLVED may skip a step; going back
// is only possible through REOPENED.
const LEGAL_EDGES: Record<CaseStatus, readonly CaseStatus[]> = {
  OPEN: ['PENDING', 'RESOLVED'],
  PENDING: ['RESOLVED'],
  RESOLVED: ['REOPENED'],
  REOPENED: ['OPEN', 'PENDING', 'RESOLVED'],
};

export type EdgeVerdict = 'advance' | 'same' | 'illegal';

export function classifyEdge(from: CaseStatus, to: CaseStatus): EdgeVerdict {
  if (from === to) {
    return 'same';
  }
  return LEGAL_EDGES[from].includes(to) ? 'advance' : 'illegal';
}

export function isCaseStatus(value: string): value is CaseStatus {
  return CASE_STATUSES.some((status) => status === value);
}

// Support reports more statuses than the engine tracks; everything that is
// neither waiting on the customer, resolved, nor reopened counts as OPEN.
const BACKEND_STATUS_MAP: Record<string, CaseStatus> = {
  opened: 'OPEN',
  unassigned: 'OPEN',
  'work-in-progress': 'OPEN',
  'customer-action-completed': 'OPEN',
  'pending-customer-action': 'PENDING',
  resolved: 'RESOLVED',
  reopened: 'REOPENED',
};

export function fromBackendStatus(raw: string): CaseStatus {
  const mapped = BACKEND_STATUS_MAP[raw.trim().toLowerCase()];
  if (!mapped) {
    throw new Error(`Unknown backend case status "${raw}"`);
  }
  return mapped;
}
