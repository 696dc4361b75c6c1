/**
 * Contract status as stored in contracts.status (case-sensitive, CHECK-constrained).
 */
export const CONTRACT_STATUSES = ['Draft', 'Active', 'Closed'] as const;

export type ContractStatus = (typeof CONTRACT_STATUSES)[number];

export const CONTRACT_STATUS = {
  DRAFT: 'Draft',
  ACTIVE: 'Active',
  CLOSED: 'Closed',
} as const satisfies Record<string, ContractStatus>;

/** Status used when a new contract does not name one. */
export const DEFAULT_CONTRACT_STATUS: ContractStatus = CONTRACT_STATUS.ACTIVE;

const STATUS_SET: ReadonlySet<string> = new Set(CONTRACT_STATUSES);

export function isContractStatus(value: unknown): value is ContractStatus {
  return typeof value === 'string' && STATUS_SET.has(value);
}
