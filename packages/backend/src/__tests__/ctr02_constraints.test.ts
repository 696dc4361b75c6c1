/**
 * Integrity rules enforced by the contracts table, seen through the typed errors.
 */
import test, { after, before, beforeEach, describe } from 'node:test';
import assert from 'node:assert/strict';
import type { ContractInput } from '../../../shared/src';
import { applySchema } from '../db/apply-schema';
import {
  CheckViolationError,
  ConstraintViolationError,
  ForeignKeyViolationError,
  NotNullViolationError,
  UniqueViolationError,
  toConstraintViolation,
  type CheckRule,
} from '../lib/db-errors';
import { countContracts, createContract, getContractById, updateContract } from '../services/contracts';
import { createTestDatabase, insertClient, type TestDatabase } from './helpers/pglite-db';

function contract(overrides: Partial<ContractInput> = {}): ContractInput {
  return {
    number: 'C-001',
    client_id: 1,
    principal: 1000,
    status: 'Draft',
    start_date: '2024-01-01',
    end_date: '2024-12-31',
    ...overrides,
  };
}

function isCheckViolation(rule: CheckRule) {
  return (error: unknown): boolean => {
    assert.ok(error instanceof CheckViolationError, `expected CheckViolationError, got ${String(error)}`);
    assert.equal(error.kind, 'check');
    assert.equal(error.code, '23514');
    assert.equal(error.rule, rule);
    return true;
  };
}

describe('contracts constraints', () => {
  let testDb: TestDatabase;

  /** Raw statement whose driver error is translated the same way the service does it. */
  async function rawQuery(text: string, params: unknown[]): Promise<void> {
    try {
      await testDb.db.query(text, params);
    } catch (error) {
      throw toConstraintViolation(error) ?? error;
    }
  }

  before(async () => {
    testDb = await createTestDatabase();
    await applySchema(testDb.db);
    await insertClient(testDb.db, 1, 'Ivanova', 'Anna', 'Sergeevna');
    await insertClient(testDb.db, 2, 'Petrov', 'Oleg');
  });

  beforeEach(async () => {
    await testDb.db.query('TRUNCATE contracts RESTART IDENTITY');
  });

  after(async () => {
    await testDb.close();
  });

  test('test_ctr02_01: insert_then_duplicate_number_rejected', async () => {
    const created = await createContract(testDb.db, contract());

    assert.equal(created.id, 1);
    assert.equal(created.number, 'C-001');
    assert.equal(created.client_id, 1);
    assert.equal(created.principal, 1000);
    assert.equal(created.status, 'Draft');
    assert.equal(created.start_date, '2024-01-01');
    assert.equal(created.end_date, '2024-12-31');
    assert.equal(Number.isNaN(Date.parse(created.created_at)), false);

    await assert.rejects(createContract(testDb.db, contract({ client_id: 2, principal: 50 })), (error: unknown) => {
      assert.ok(error instanceof UniqueViolationError);
      assert.ok(error instanceof ConstraintViolationError);
      assert.equal(error.kind, 'unique');
      assert.equal(error.code, '23505');
      assert.equal(error.constraint, 'contracts_number_key');
      return true;
    });
    assert.equal(await countContracts(testDb.db), 1);
  });

  test('test_ctr02_02: principal_zero_or_negative_rejected', async () => {
    await assert.rejects(createContract(testDb.db, contract({ principal: 0 })), isCheckViolation('principal_positive'));
    await assert.rejects(createContract(testDb.db, contract({ principal: -250.5 })), isCheckViolation('principal_positive'));
    assert.equal(await countContracts(testDb.db), 0);
  });

  test('test_ctr02_03: smallest_positive_principal_accepted', async () => {
    const created = await createContract(testDb.db, contract({ principal: 0.01 }));
    assert.equal(created.principal, 0.01);
  });

  test('test_ctr02_04: end_before_start_rejected', async () => {
    await assert.rejects(
      createContract(testDb.db, contract({ start_date: '2024-06-01', end_date: '2024-05-31' })),
      isCheckViolation('end_after_start')
    );
  });

  test('test_ctr02_05: same_day_contract_accepted', async () => {
    const created = await createContract(testDb.db, contract({ start_date: '2024-06-01', end_date: '2024-06-01' }));
    assert.equal(created.start_date, created.end_date);
  });

  test('test_ctr02_06: status_outside_enum_rejected', async () => {
    const insert = `INSERT INTO contracts (number, client_id, principal, status, start_date, end_date)
                    VALUES ($1, $2, $3, $4, $5, $6)`;
    for (const status of ['Pending', 'draft', '']) {
      await assert.rejects(
        rawQuery(insert, ['C-010', 1, '100.00', status, '2024-01-01', '2024-02-01']),
        isCheckViolation('status_allowed')
      );
    }
    assert.equal(await countContracts(testDb.db), 0);
  });

  test('test_ctr02_07: unknown_client_rejected', async () => {
    await assert.rejects(createContract(testDb.db, contract({ client_id: 99 })), (error: unknown) => {
      assert.ok(error instanceof ForeignKeyViolationError);
      assert.equal(error.kind, 'foreign_key');
      assert.equal(error.code, '23503');
      assert.equal(error.constraint, 'contracts_client_id_fkey');
      return true;
    });
  });

  test('test_ctr02_08: deleting_referenced_client_rejected', async () => {
    await createContract(testDb.db, contract());

    await assert.rejects(rawQuery('DELETE FROM clients WHERE id = $1', [1]), ForeignKeyViolationError);
    const clients = await testDb.db.query('SELECT id FROM clients WHERE id = $1', [1]);
    assert.equal(clients.rows.length, 1);
  });

  test('test_ctr02_09: rekeying_referenced_client_rejected', async () => {
    await createContract(testDb.db, contract());

    await assert.rejects(rawQuery('UPDATE clients SET id = $1 WHERE id = $2', [10, 1]), ForeignKeyViolationError);
  });

  test('test_ctr02_10: unreferenced_client_can_be_deleted', async () => {
    await insertClient(testDb.db, 3, 'Sidorov', 'Ivan');
    await rawQuery('DELETE FROM clients WHERE id = $1', [3]);
    const clients = await testDb.db.query('SELECT id FROM clients WHERE id = $1', [3]);
    assert.equal(clients.rows.length, 0);
  });

  test('test_ctr02_11: update_to_unknown_client_rejected', async () => {
    const created = await createContract(testDb.db, contract());

    await assert.rejects(
      updateContract(testDb.db, created.id, { ...contract(), status: 'Active', client_id: 77 }),
      ForeignKeyViolationError
    );
    const stored = await getContractById(testDb.db, created.id);
    assert.equal(stored?.client_id, 1);
    assert.equal(stored?.status, 'Draft');
  });

  test('test_ctr02_12: update_revalidates_checks', async () => {
    const created = await createContract(testDb.db, contract());

    await assert.rejects(
      updateContract(testDb.db, created.id, { ...contract(), status: 'Active', end_date: '2023-12-31' }),
      isCheckViolation('end_after_start')
    );
    await assert.rejects(
      updateContract(testDb.db, created.id, { ...contract(), status: 'Active', principal: 0 }),
      isCheckViolation('principal_positive')
    );
  });

  test('test_ctr02_13: update_to_taken_number_rejected', async () => {
    await createContract(testDb.db, contract());
    const second = await createContract(testDb.db, contract({ number: 'C-002' }));

    await assert.rejects(
      updateContract(testDb.db, second.id, { ...contract(), status: 'Draft', number: 'C-001' }),
      UniqueViolationError
    );
  });

  test('test_ctr02_14: missing_required_column_rejected', async () => {
    await assert.rejects(
      rawQuery(
        `INSERT INTO contracts (client_id, principal, status, start_date, end_date)
         VALUES ($1, $2, $3, $4, $5)`,
        [1, '100.00', 'Draft', '2024-01-01', '2024-02-01']
      ),
      (error: unknown) => {
        assert.ok(error instanceof NotNullViolationError);
        assert.equal(error.kind, 'not_null');
        assert.equal(error.code, '23502');
        assert.equal(error.column, 'number');
        return true;
      }
    );
  });

  test('test_ctr02_15: created_at_defaults_when_omitted', async () => {
    await rawQuery(
      `INSERT INTO contracts (number, client_id, principal, status, start_date, end_date)
       VALUES ($1, $2, $3, $4, $5, $6)`,
      ['C-020', 2, '10.00', 'Active', '2024-01-01', '2024-01-31']
    );
    const result = await testDb.db.query(
      'SELECT created_at IS NOT NULL AS has_created_at FROM contracts WHERE number = $1',
      ['C-020']
    );
    assert.equal(result.rows[0].has_created_at, true);
  });

  test('test_ctr02_16: id_is_server_generated', async () => {
    await assert.rejects(
      rawQuery(
        `INSERT INTO contracts (id, number, client_id, principal, status, start_date, end_date)
         VALUES ($1, $2, $3, $4, $5, $6, $7)`,
        [500, 'C-030', 1, '10.00', 'Active', '2024-01-01', '2024-01-31']
      ),
      (error: unknown) => {
        assert.equal(error instanceof ConstraintViolationError, false);
        assert.ok(error instanceof Error);
        assert.equal(Reflect.get(error, 'code'), '428C9');
        return true;
      }
    );
  });

  test('test_ctr02_17: number_longer_than_40_is_not_a_constraint_violation', async () => {
    await assert.rejects(createContract(testDb.db, contract({ number: 'N'.repeat(41) })), (error: unknown) => {
      assert.equal(error instanceof ConstraintViolationError, false);
      assert.ok(error instanceof Error);
      assert.equal(Reflect.get(error, 'code'), '22001');
      return true;
    });
  });
});
