/**
 * Consent repository for the patient_consents table.
 *
 * Read-only: consent capture and withdrawal belong to the host
 * application. The access decision engine only asks whether a patient has
 * an in-force denial of a given consent type.
 *
 * @module repositories/consentRepository
 */

import { query, type QueryOptions } from '../utils/db.js';
import { parseConsentType, type ConsentType, type PatientConsent } from '../types/index.js';
import { requireEnum } from './rows.js';

// ─── Row Mapping ─────────────────────────────────────────────────────────────

interface PatientConsentRow {
  id: string;
  patient_id: string;
  tenant_id: string;
  consent_type: string;
  is_granted: boolean;
  effective_from: Date;
  expires_at: Date | null;
  revoked_at: Date | null;
  granted_by: string;
  witness_name: string | null;
  witness_signed_at: Date | null;
}

function mapRowToPatientConsent(row: PatientConsentRow): PatientConsent {
  return {
    id: row.id,
    patientId: row.patient_id,
    tenantId: row.tenant_id,
    consentType: requireEnum(
      parseConsentType(row.consent_type),
      'patient_consents.consent_type',
      row.consent_type,
    ),
    isGranted: row.is_granted,
    effectiveFrom: row.effective_from,
    expiresAt: row.expires_at,
    revokedAt: row.revoked_at,
    grantedBy: row.granted_by,
    witnessName: row.witness_name,
    witnessSignedAt: row.witness_signed_at,
  };
}

// ─── Repository Functions ────────────────────────────────────────────────────

/**
 * Find in-force consent rows that deny any of the given consent types.
 *
 * A row is in force when it has taken effect, has not been revoked and has
 * not expired.
 */
export async function findInForceDenials(
  tenantId: string,
  patientId: string,
  consentTypes: readonly ConsentType[],
  now: Date,
  options?: QueryOptions,
): Promise<PatientConsent[]> {
  if (consentTypes.length === 0) {
    return [];
  }

  const result = await query<PatientConsentRow>(
    `SELECT id, patient_id, tenant_id, consent_type, is_granted, effective_from, expires_at,
            revoked_at, granted_by, witness_name, witness_signed_at
     FROM patient_consents
     WHERE tenant_id = $1
       AND patient_id = $2
       AND consent_type = ANY($3)
       AND is_granted = FALSE
       AND effective_from <= $4
       AND revoked_at IS NULL
       AND (expires_at IS NULL OR expires_at > $4)`,
    [tenantId, patientId, [...consentTypes], now.toISOString()],
    options,
  );

  return result.rows.map(mapRowToPatientConsent);
}
