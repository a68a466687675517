// ============================================================================
// Billing Run — Encounter Grouping & Payload Parts
// Pure helpers: which rows form one encounter, and how a group's rows become
// place of service, hospitalization and service lines.
// ============================================================================

import {
  ColumnKey,
  DEFAULT_PLACE_OF_SERVICE_CODE,
  PLACE_OF_SERVICE_NAMES,
} from '@chargeflow/shared/constants/billing-run.constants.js';
import { parseDate, toApiDateTime } from '@chargeflow/shared/utils/date.utils.js';
import type { ServiceLinePayload } from '../pms/pms.client.js';
import { cell, type ChargeSheet, type InputRow } from './sheet-normalizer.service.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface EncounterGroupKey {
  patientId: string;
  dateOfService: string;
  practiceName: string;
}

export interface EncounterGroup {
  key: EncounterGroupKey;
  /** Rows in sheet order; the first supplies the encounter-level fields. */
  rows: InputRow[];
}

export type ServiceLineResult =
  | { ok: true; line: ServiceLinePayload }
  | { ok: false; reason: string };

type SheetColumns = Pick<ChargeSheet, 'columnMap'>;

const MODIFIER_KEYS = [ColumnKey.MOD_1, ColumnKey.MOD_2, ColumnKey.MOD_3, ColumnKey.MOD_4] as const;
const DIAGNOSIS_KEYS = [ColumnKey.DIAG_1, ColumnKey.DIAG_2, ColumnKey.DIAG_3, ColumnKey.DIAG_4] as const;

// ---------------------------------------------------------------------------
// Grouping
// ---------------------------------------------------------------------------

/** A row joins a group only once Phase 1 has identified the patient. */
export function isEncounterEligible(sheet: SheetColumns, row: InputRow): boolean {
  return (
    cell(sheet, row, ColumnKey.PATIENT_ID) !== '' &&
    cell(sheet, row, ColumnKey.DOS) !== '' &&
    cell(sheet, row, ColumnKey.PRACTICE) !== '' &&
    !!row.outcome.patientName
  );
}

/** Groups rows by (patient id, DOS, practice) in order of first appearance. */
export function groupRowsForEncounters(sheet: SheetColumns, rows: readonly InputRow[]): EncounterGroup[] {
  const groups = new Map<string, EncounterGroup>();
  for (const row of rows) {
    const key: EncounterGroupKey = {
      patientId: cell(sheet, row, ColumnKey.PATIENT_ID),
      dateOfService: cell(sheet, row, ColumnKey.DOS),
      practiceName: cell(sheet, row, ColumnKey.PRACTICE),
    };
    const id = JSON.stringify([key.patientId, key.dateOfService, key.practiceName]);
    const existing = groups.get(id);
    if (existing) {
      existing.rows.push(row);
    } else {
      groups.set(id, { key, rows: [row] });
    }
  }
  return [...groups.values()];
}

// ---------------------------------------------------------------------------
// Place of Service
// ---------------------------------------------------------------------------

function normalizePosCode(raw: string): string {
  const code = raw.trim().replace(/\.0+$/, '');
  return /^\d$/.test(code) ? `0${code}` : code;
}

/**
 * A recognised POS code wins; otherwise the encounter mode decides
 * (telehealth → 10, office → 11), defaulting to 11.
 */
export function resolvePlaceOfService(posRaw: string, encounterMode: string): { code: string; name: string } {
  const pos = normalizePosCode(posRaw);
  const mode = encounterMode.trim().toLowerCase();

  let code = DEFAULT_PLACE_OF_SERVICE_CODE;
  if (Object.hasOwn(PLACE_OF_SERVICE_NAMES, pos)) {
    code = pos;
  } else if (mode.includes('tele')) {
    code = '10';
  } else if (mode.includes('office')) {
    code = '11';
  }
  return { code, name: PLACE_OF_SERVICE_NAMES[code] };
}

// ---------------------------------------------------------------------------
// Hospitalization
// ---------------------------------------------------------------------------

export function buildHospitalization(
  admitRaw: string,
  dischargeRaw: string,
): { hospitalization?: { startDate: string; endDate: string }; warning?: string } {
  if (!admitRaw && !dischargeRaw) return {};
  if (!admitRaw || !dischargeRaw) {
    return { warning: 'Both Admit & Discharge Dates needed; hospitalization not sent.' };
  }
  const admit = parseDate(admitRaw);
  const discharge = parseDate(dischargeRaw);
  if (!admit || !discharge) {
    return { warning: 'Invalid Admit/Discharge Date; hospitalization not sent.' };
  }
  return {
    hospitalization: { startDate: toApiDateTime(admit), endDate: toApiDateTime(discharge) },
  };
}

// ---------------------------------------------------------------------------
// Service Lines
// ---------------------------------------------------------------------------

/** Spreadsheet modifiers arrive as numbers (`25.0`); the API takes two characters. */
export function cleanModifier(raw: string): string | null {
  let value = raw.trim();
  if (value.endsWith('.0')) value = value.slice(0, -2);
  if (value.length > 2) value = value.slice(0, 2);
  return value || null;
}

export function buildServiceLine(sheet: SheetColumns, row: InputRow, serviceDate: string): ServiceLineResult {
  const procedureCode = cell(sheet, row, ColumnKey.PROCEDURES);
  if (!procedureCode) return { ok: false, reason: 'Procedure code missing' };

  const unitsRaw = cell(sheet, row, ColumnKey.UNITS);
  if (!unitsRaw) return { ok: false, reason: `Units missing for ${procedureCode}` };
  const units = Number(unitsRaw);
  if (!Number.isFinite(units) || units <= 0) {
    return { ok: false, reason: `Units '${unitsRaw}' must be a positive number` };
  }

  const diagnosisCodes = DIAGNOSIS_KEYS.map((key) => cell(sheet, row, key) || null);
  if (!diagnosisCodes[0]) return { ok: false, reason: `Diag 1 missing for ${procedureCode}` };

  return {
    ok: true,
    line: {
      procedureCode,
      units,
      serviceStartDate: serviceDate,
      serviceEndDate: serviceDate,
      modifiers: MODIFIER_KEYS.map((key) => cleanModifier(cell(sheet, row, key))),
      diagnosisCodes,
    },
  };
}

/** First procedure code of the group, used once for the charge lookup. */
export function representativeProcedureCode(lines: readonly ServiceLinePayload[]): string | null {
  const unique = [...new Set(lines.map((l) => l.procedureCode))];
  return unique[0] ?? null;
}
