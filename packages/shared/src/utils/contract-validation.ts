import {
  DEFAULT_CONTRACT_STATUS,
  isContractStatus,
  type ContractStatus,
} from '../constants/contract-status';
import type { ContractInput } from '../types/contract';

/** contracts.number is VARCHAR(40). */
export const CONTRACT_NUMBER_MAX_LENGTH = 40;

/** contracts.principal is NUMERIC(12,2): 10 integer digits, 2 fractional. */
export const PRINCIPAL_MAX_EXCLUSIVE = 10_000_000_000;

export type ContractField =
  | 'number'
  | 'client_id'
  | 'principal'
  | 'status'
  | 'start_date'
  | 'end_date';

export type ContractIssueCode =
  | 'required'
  | 'too_long'
  | 'not_positive_integer'
  | 'not_positive'
  | 'out_of_range'
  | 'too_many_decimals'
  | 'invalid_status'
  | 'invalid_date'
  | 'end_before_start';

export interface ContractInputIssue {
  field: ContractField;
  code: ContractIssueCode;
  message: string;
}

export type ContractValidationResult =
  | { ok: true; value: ContractInput & { status: ContractStatus } }
  | { ok: false; issues: ContractInputIssue[] };

const ISO_DATE_REG = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * True when value is YYYY-MM-DD and names a real calendar day (2024-02-30 is rejected).
 */
export function isIsoDate(value: unknown): value is string {
  if (typeof value !== 'string') return false;
  const match = ISO_DATE_REG.exec(value);
  if (!match) return false;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);

  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

function hasAtMostTwoDecimals(amount: number): boolean {
  return Number(amount.toFixed(2)) === amount;
}

/**
 * Check a contract against the rules the contracts table enforces, before it reaches the database.
 * Collects every issue rather than stopping at the first one.
 * Stricter than NUMERIC(12,2) in one respect: a principal with more than two decimals is rejected instead of rounded.
 */
export function validateContractInput(input: ContractInput): ContractValidationResult {
  const issues: ContractInputIssue[] = [];

  const number = typeof input.number === 'string' ? input.number.trim() : '';
  if (!number) {
    issues.push({ field: 'number', code: 'required', message: 'Contract number is required' });
  } else if ([...number].length > CONTRACT_NUMBER_MAX_LENGTH) {
    issues.push({
      field: 'number',
      code: 'too_long',
      message: `Contract number must be at most ${CONTRACT_NUMBER_MAX_LENGTH} characters`,
    });
  }

  if (!Number.isSafeInteger(input.client_id) || input.client_id <= 0) {
    issues.push({
      field: 'client_id',
      code: 'not_positive_integer',
      message: 'client_id must be a positive integer',
    });
  }

  const principal = input.principal;
  if (!Number.isFinite(principal) || principal <= 0) {
    issues.push({ field: 'principal', code: 'not_positive', message: 'Principal must be greater than 0' });
  } else if (principal >= PRINCIPAL_MAX_EXCLUSIVE) {
    issues.push({
      field: 'principal',
      code: 'out_of_range',
      message: 'Principal must have at most 10 integer digits',
    });
  } else if (!hasAtMostTwoDecimals(principal)) {
    issues.push({
      field: 'principal',
      code: 'too_many_decimals',
      message: 'Principal must have at most 2 decimal places',
    });
  }

  const status = input.status ?? DEFAULT_CONTRACT_STATUS;
  if (!isContractStatus(status)) {
    issues.push({ field: 'status', code: 'invalid_status', message: `Unknown status: ${String(status)}` });
  }

  const startValid = isIsoDate(input.start_date);
  const endValid = isIsoDate(input.end_date);
  if (!startValid) {
    issues.push({ field: 'start_date', code: 'invalid_date', message: 'start_date must be a YYYY-MM-DD date' });
  }
  if (!endValid) {
    issues.push({ field: 'end_date', code: 'invalid_date', message: 'end_date must be a YYYY-MM-DD date' });
  }
  if (startValid && endValid && input.end_date < input.start_date) {
    issues.push({
      field: 'end_date',
      code: 'end_before_start',
      message: 'end_date must be on or after start_date',
    });
  }

  if (issues.length > 0) {
    return { ok: false, issues };
  }
  return { ok: true, value: { ...input, number, status } };
}
