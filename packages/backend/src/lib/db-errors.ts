/**
 * Postgres integrity-constraint failures (SQLSTATE class 23) as typed errors.
 */

export type ConstraintKind = 'unique' | 'check' | 'foreign_key' | 'not_null';

/** Which contracts CHECK failed, keyed by the constraint names Postgres generates for the table. */
export type CheckRule = 'principal_positive' | 'status_allowed' | 'end_after_start' | 'unknown';

export const SQLSTATE = {
  NOT_NULL_VIOLATION: '23502',
  FOREIGN_KEY_VIOLATION: '23503',
  UNIQUE_VIOLATION: '23505',
  CHECK_VIOLATION: '23514',
} as const;

const CHECK_RULES: Record<string, CheckRule> = {
  contracts_principal_check: 'principal_positive',
  contracts_status_check: 'status_allowed',
  contracts_end_date_check: 'end_after_start',
};

export interface ConstraintDetails {
  code: string;
  constraint: string | null;
  column: string | null;
  table: string | null;
  message: string;
  cause?: unknown;
}

export class ConstraintViolationError extends Error {
  public readonly code: string;
  public readonly constraint: string | null;
  public readonly column: string | null;
  public readonly table: string | null;

  constructor(
    public readonly kind: ConstraintKind,
    details: ConstraintDetails
  ) {
    super(details.message, { cause: details.cause });
    this.name = 'ConstraintViolationError';
    this.code = details.code;
    this.constraint = details.constraint;
    this.column = details.column;
    this.table = details.table;
  }
}

export class UniqueViolationError extends ConstraintViolationError {
  constructor(details: ConstraintDetails) {
    super('unique', details);
    this.name = 'UniqueViolationError';
  }
}

export class CheckViolationError extends ConstraintViolationError {
  public readonly rule: CheckRule;

  constructor(details: ConstraintDetails) {
    super('check', details);
    this.name = 'CheckViolationError';
    this.rule =
      details.constraint !== null && Object.hasOwn(CHECK_RULES, details.constraint)
        ? CHECK_RULES[details.constraint]
        : 'unknown';
  }
}

export class ForeignKeyViolationError extends ConstraintViolationError {
  constructor(details: ConstraintDetails) {
    super('foreign_key', details);
    this.name = 'ForeignKeyViolationError';
  }
}

export class NotNullViolationError extends ConstraintViolationError {
  constructor(details: ConstraintDetails) {
    super('not_null', details);
    this.name = 'NotNullViolationError';
  }
}

function optionalString(source: object, key: string): string | null {
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'string' && value !== '' ? value : null;
}

/**
 * Translate a driver error into a ConstraintViolationError.
 * Returns null for anything that is not an integrity-constraint failure.
 */
export function toConstraintViolation(error: unknown): ConstraintViolationError | null {
  if (error instanceof ConstraintViolationError) return error;
  if (typeof error !== 'object' || error === null || !('code' in error)) return null;
  const code = error.code;
  if (typeof code !== 'string') return null;

  const details: ConstraintDetails = {
    code,
    constraint: optionalString(error, 'constraint'),
    column: optionalString(error, 'column'),
    table: optionalString(error, 'table'),
    message: optionalString(error, 'message') ?? `Constraint violation (${code})`,
    cause: error,
  };

  switch (code) {
    case SQLSTATE.UNIQUE_VIOLATION:
      return new UniqueViolationError(details);
    case SQLSTATE.CHECK_VIOLATION:
      return new CheckViolationError(details);
    case SQLSTATE.FOREIGN_KEY_VIOLATION:
      return new ForeignKeyViolationError(details);
    case SQLSTATE.NOT_NULL_VIOLATION:
      return new NotNullViolationError(details);
    default:
      return null;
  }
}
