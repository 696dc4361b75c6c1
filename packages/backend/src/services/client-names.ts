import type { Contract, ContractWithClient } from '../../../shared/src';
import type { Queryable } from '../db/queryable';

/**
 * Display names of clients by id ("last first middle", blanks trimmed).
 * One query for all distinct valid ids; ids with no clients row are absent from the map.
 */
export async function fetchClientNames(
  db: Queryable,
  ids: Iterable<number>
): Promise<Map<number, string>> {
  const unique = [...new Set(ids)]
    .filter((id) => Number.isSafeInteger(id) && id > 0)
    .sort((a, b) => a - b);
  if (unique.length === 0) {
    return new Map();
  }

  const placeholders = unique.map((_, i) => `$${i + 1}`).join(', ');
  const result = await db.query(
    `SELECT
       id,
       TRIM(
         CONCAT(
           COALESCE(last_name, ''), ' ',
           COALESCE(first_name, ''), ' ',
           COALESCE(middle_name, '')
         )
       ) AS full_name
     FROM clients
     WHERE id IN (${placeholders})`,
    unique
  );

  const names = new Map<number, string>();
  for (const row of result.rows) {
    names.set(Number(row.id), typeof row.full_name === 'string' ? row.full_name : '');
  }
  return names;
}

/** Copies of the contracts with client_name filled in; the inputs are left untouched. */
export async function withClientNames(
  db: Queryable,
  contracts: readonly Contract[]
): Promise<ContractWithClient[]> {
  const names = await fetchClientNames(
    db,
    contracts.map((c) => c.client_id)
  );
  return contracts.map((c) => ({ ...c, client_name: names.get(c.client_id) ?? null }));
}

export async function withClientName(db: Queryable, contract: Contract): Promise<ContractWithClient> {
  const [named] = await withClientNames(db, [contract]);
  return named;
}
