import {
  CONTRACT_STATUS,
  DEFAULT_CONTRACT_STATUS,
  isContractStatus,
  type Contract,
  type ContractChanges,
  type ContractFilter,
  type ContractInput,
  type ContractPage,
  type ContractSort,
  type ContractSortKey,
} from '../../../shared/src';
import { toConstraintViolation } from '../lib/db-errors';
import { logger } from '../utils/logger';
import type { Queryable } from '../db/queryable';

/**
 * Dates leave the database as text so no driver turns them into local-time Date objects.
 * created_at is a wall-clock TIMESTAMP in the session zone; AT TIME ZONE makes it an instant.
 */
const CONTRACT_COLUMNS = `id, number, client_id, principal, status,
   to_char(start_date, 'YYYY-MM-DD') AS start_date,
   to_char(end_date, 'YYYY-MM-DD') AS end_date,
   created_at AT TIME ZONE current_setting('TimeZone') AS created_at`;

const SORT_COLUMNS: Record<ContractSortKey, string> = {
  id: 'id',
  number: 'number',
  end_date: 'end_date',
};

export interface ListContractsOptions {
  filter?: ContractFilter;
  sort?: ContractSort;
}

function toNumber(value: unknown, column: string): number {
  const n = typeof value === 'number' ? value : Number(value);
  if (typeof value === 'boolean' || value === null || value === '' || !Number.isFinite(n)) {
    throw new Error(`contracts.${column}: expected a number, got ${String(value)}`);
  }
  return n;
}

/** BIGINT keys beyond 2^53 - 1 would be rounded to another id; refuse them. */
function toId(value: unknown, column: string): number {
  const n = toNumber(value, column);
  if (!Number.isSafeInteger(n)) {
    throw new RangeError(`contracts.${column}: ${String(value)} is outside the safe integer range`);
  }
  return n;
}

function assertId(value: number, field: string): void {
  if (!Number.isSafeInteger(value)) {
    throw new RangeError(`${field} must be a safe integer, got ${String(value)}`);
  }
}

function toTimestamp(value: unknown): string {
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

function rowFromDb(row: Record<string, unknown>): Contract {
  const status = row.status;
  if (!isContractStatus(status)) {
    throw new Error(`contracts.status: unexpected value ${String(status)}`);
  }
  return {
    id: toId(row.id, 'id'),
    number: String(row.number),
    client_id: toId(row.client_id, 'client_id'),
    principal: toNumber(row.principal, 'principal'),
    status,
    start_date: String(row.start_date),
    end_date: String(row.end_date),
    created_at: toTimestamp(row.created_at),
  };
}

/** Escape LIKE wildcards so user text matches literally. */
export function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

export function buildContractWhere(filter?: ContractFilter): { sql: string; values: unknown[] } {
  if (!filter) return { sql: '', values: [] };

  const conditions: string[] = [];
  const values: unknown[] = [];
  const add = (condition: (placeholder: string) => string, value: unknown): void => {
    values.push(value);
    conditions.push(condition(`$${values.length}`));
  };

  if (filter.number_contains) add((p) => `number ILIKE ${p}`, `%${escapeLikePattern(filter.number_contains)}%`);
  if (filter.client_id != null) add((p) => `client_id = ${p}`, filter.client_id);
  if (filter.status) add((p) => `status = ${p}`, filter.status);
  if (filter.start_from) add((p) => `start_date >= ${p}`, filter.start_from);
  if (filter.start_to) add((p) => `start_date <= ${p}`, filter.start_to);
  if (filter.end_from) add((p) => `end_date >= ${p}`, filter.end_from);
  if (filter.end_to) add((p) => `end_date <= ${p}`, filter.end_to);

  return conditions.length > 0
    ? { sql: `WHERE ${conditions.join(' AND ')}`, values }
    : { sql: '', values: [] };
}

/** Default id DESC. Unknown keys fall back to id; ties on other keys break by id. */
export function buildContractOrder(sort?: ContractSort): string {
  if (!sort) return 'ORDER BY id DESC';
  const column = Object.hasOwn(SORT_COLUMNS, sort.by) ? SORT_COLUMNS[sort.by] : 'id';
  const direction = sort.direction === 'asc' ? 'ASC' : 'DESC';
  return column === 'id' ? `ORDER BY id ${direction}` : `ORDER BY ${column} ${direction}, id ${direction}`;
}

/** Constraint failures become typed errors (and a warn line); anything else passes through. */
function translateWriteError(action: string, contractNumber: string | null, error: unknown): unknown {
  const violation = toConstraintViolation(error);
  if (!violation) return error;
  logger.warn('contract write rejected', {
    action,
    kind: violation.kind,
    constraint: violation.constraint,
    column: violation.column,
    contract_number: contractNumber,
  });
  return violation;
}

export async function getContractById(db: Queryable, id: number): Promise<Contract | null> {
  const result = await db.query(`SELECT ${CONTRACT_COLUMNS} FROM contracts WHERE id = $1`, [id]);
  if (result.rows.length === 0) return null;
  return rowFromDb(result.rows[0]);
}

export async function countContracts(db: Queryable, filter?: ContractFilter): Promise<number> {
  const where = buildContractWhere(filter);
  const result = await db.query(`SELECT COUNT(*) AS cnt FROM contracts ${where.sql}`, where.values);
  return result.rows.length > 0 ? toNumber(result.rows[0].cnt, 'count') : 0;
}

/**
 * One page of contracts. page is 1-based; both page and pageSize must be positive integers.
 */
export async function listContracts(
  db: Queryable,
  page: number,
  pageSize: number,
  options: ListContractsOptions = {}
): Promise<Contract[]> {
  if (!Number.isInteger(page) || !Number.isInteger(pageSize) || page < 1 || pageSize < 1) {
    throw new RangeError('page and pageSize must be positive integers');
  }
  const where = buildContractWhere(options.filter);
  const order = buildContractOrder(options.sort);
  const limitIdx = where.values.length + 1;

  const result = await db.query(
    `SELECT ${CONTRACT_COLUMNS} FROM contracts ${where.sql} ${order} LIMIT $${limitIdx} OFFSET $${limitIdx + 1}`,
    [...where.values, pageSize, (page - 1) * pageSize]
  );
  return result.rows.map(rowFromDb);
}

/** listContracts plus the filtered total and prev/next flags. */
export async function listContractPage(
  db: Queryable,
  page: number,
  pageSize: number,
  options: ListContractsOptions = {}
): Promise<ContractPage> {
  const items = await listContracts(db, page, pageSize, options);
  const total = await countContracts(db, options.filter);
  return {
    items,
    total,
    page,
    page_size: pageSize,
    has_prev: page > 1,
    has_next: page * pageSize < total,
  };
}

export async function createContract(db: Queryable, input: ContractInput): Promise<Contract> {
  assertId(input.client_id, 'client_id');
  try {
    const result = await db.query(
      `INSERT INTO contracts (number, client_id, principal, status, start_date, end_date)
       VALUES ($1, $2, $3, $4, $5, $6)
       RETURNING ${CONTRACT_COLUMNS}`,
      [
        input.number,
        input.client_id,
        String(input.principal),
        input.status ?? DEFAULT_CONTRACT_STATUS,
        input.start_date,
        input.end_date,
      ]
    );
    if (result.rows.length === 0) {
      throw new Error('INSERT INTO contracts returned no row');
    }
    return rowFromDb(result.rows[0]);
  } catch (error) {
    throw translateWriteError('contract.create', input.number, error);
  }
}

/**
 * Replace every mutable column of a contract. Returns null when no contract has that id.
 * Status may move between any two values; no transition is restricted.
 */
export async function updateContract(
  db: Queryable,
  id: number,
  changes: ContractChanges
): Promise<Contract | null> {
  assertId(id, 'id');
  assertId(changes.client_id, 'client_id');
  try {
    const result = await db.query(
      `UPDATE contracts
       SET number = $1, client_id = $2, principal = $3, status = $4, start_date = $5, end_date = $6
       WHERE id = $7
       RETURNING ${CONTRACT_COLUMNS}`,
      [
        changes.number,
        changes.client_id,
        String(changes.principal),
        changes.status,
        changes.start_date,
        changes.end_date,
        id,
      ]
    );
    return result.rows.length > 0 ? rowFromDb(result.rows[0]) : null;
  } catch (error) {
    throw translateWriteError('contract.update', changes.number, error);
  }
}

/** Set status to Closed, whatever it was. Returns null when no contract has that id. */
export async function closeContract(db: Queryable, id: number): Promise<Contract | null> {
  try {
    const result = await db.query(
      `UPDATE contracts SET status = $1 WHERE id = $2 RETURNING ${CONTRACT_COLUMNS}`,
      [CONTRACT_STATUS.CLOSED, id]
    );
    return result.rows.length > 0 ? rowFromDb(result.rows[0]) : null;
  } catch (error) {
    throw translateWriteError('contract.close', null, error);
  }
}

/** @returns whether a row was removed */
export async function deleteContract(db: Queryable, id: number): Promise<boolean> {
  try {
    const result = await db.query('DELETE FROM contracts WHERE id = $1 RETURNING id', [id]);
    return result.rows.length > 0;
  } catch (error) {
    throw translateWriteError('contract.delete', null, error);
  }
}
