/**
 * Patient lookups. Patient records are owned by the host application;
 * the engine only needs to know that an id exists within a tenant.
 *
 * @module repositories/patientRepository
 */

import { query, type QueryOptions } from '../utils/db.js';

export async function patientExists(
  tenantId: string,
  patientId: string,
  options?: QueryOptions,
): Promise<boolean> {
  const result = await query(
    `SELECT 1
     FROM patients
     WHERE tenant_id = $1 AND id = $2 AND is_deleted = FALSE`,
    [tenantId, patientId],
    options,
  );

  return result.rows.length > 0;
}
