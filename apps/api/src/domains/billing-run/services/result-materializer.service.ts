// ============================================================================
// Billing Run — Result Materializer
// Writes the annotated sheet back out as an .xlsx artifact and summarises
// the run for the status record.
// ============================================================================

import path from 'node:path';
import ExcelJS from 'exceljs';
import {
  ColumnKey,
  OUTPUT_FILE_EXTENSION,
  OUTPUT_FILE_PREFIX,
} from '@chargeflow/shared/constants/billing-run.constants.js';
import { formatDateStamp } from '@chargeflow/shared/utils/date.utils.js';
import type { FileStorage } from '../../../lib/file-storage.js';
import type { Logger } from '../../../lib/logger.js';
import { cell, type ChargeSheet, type InputRow, type ProcessingOutcome } from './sheet-normalizer.service.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RowResult {
  row_number: number;
  practice_name: string;
  patient_id: string;
  results: string;
}

export interface RunSummary {
  total_rows: number;
  encounters_created: number;
  payments_posted: number;
  failed_rows: number;
  results: RowResult[];
}

export interface MaterializedRun {
  outputRef: string;
  summary: RunSummary;
  message: string;
}

export interface ResultMaterializerDeps {
  storage: FileStorage;
  logger: Logger;
}

export const ARTIFACT_DIR = 'outputs';

const OUTCOME_COLUMNS: ReadonlyArray<[ColumnKey, (o: ProcessingOutcome) => string | null]> = [
  [ColumnKey.PATIENT_NAME, (o) => o.patientName],
  [ColumnKey.DOB, (o) => o.dob],
  [ColumnKey.INSURANCE, (o) => o.insurance],
  [ColumnKey.INSURANCE_ID, (o) => o.insuranceId],
  [ColumnKey.INSURANCE_STATUS, (o) => o.insuranceStatus],
  [ColumnKey.CHARGE_AMOUNT, (o) => o.chargeAmount],
  [ColumnKey.CHARGE_STATUS, (o) => o.chargeStatus],
  [ColumnKey.ENCOUNTER_ID, (o) => o.encounterId],
  [ColumnKey.ERROR, (o) => outcomeText(o)],
];

// ---------------------------------------------------------------------------
// Naming
// ---------------------------------------------------------------------------

export function artifactRefFor(taskId: string): string {
  return `${OUTPUT_FILE_PREFIX}${taskId}${OUTPUT_FILE_EXTENSION}`;
}

export function artifactKey(outputRef: string): string {
  return `${ARTIFACT_DIR}/${outputRef}`;
}

/** `Processed_<upload base name>_<YYYYMMDD>.xlsx` */
export function downloadNameFor(originalName: string, date: Date): string {
  const base = path.parse(path.basename(originalName)).name || 'upload';
  return `Processed_${base}_${formatDateStamp(date)}${OUTPUT_FILE_EXTENSION}`;
}

/**
 * `attachment` header value for a download name. Names outside printable
 * ASCII get an underscored `filename` plus an RFC 5987 `filename*`.
 */
export function attachmentDisposition(filename: string): string {
  const fallback = filename.replace(/[^\x20-\x7e]|["\\]/g, '_');
  if (fallback === filename) return `attachment; filename="${filename}"`;
  const encoded = encodeURIComponent(filename).replace(
    /['()*]/g,
    (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`,
  );
  return `attachment; filename="${fallback}"; filename*=UTF-8''${encoded}`;
}

// ---------------------------------------------------------------------------
// Row text & summary
// ---------------------------------------------------------------------------

export function outcomeText(outcome: ProcessingOutcome): string {
  return outcome.messages.filter((m) => m.trim() !== '').join('; ');
}

export function isFailedRow(row: InputRow): boolean {
  const o = row.outcome;
  return o.hasError && !o.paymentId && !o.encounterId;
}

/** Copy every outcome field into its output column. */
export function applyOutcomes(sheet: ChargeSheet): void {
  for (const row of sheet.rows) {
    for (const [key, read] of OUTCOME_COLUMNS) {
      const index = sheet.columnMap[key];
      if (index !== undefined) row.values[index] = read(row.outcome) ?? '';
    }
  }
}

export function buildRunSummary(sheet: ChargeSheet): RunSummary {
  return {
    total_rows: sheet.rows.length,
    encounters_created: sheet.rows.filter((r) => !!r.outcome.encounterId).length,
    payments_posted: sheet.rows.filter((r) => !!r.outcome.paymentId).length,
    failed_rows: sheet.rows.filter(isFailedRow).length,
    results: sheet.rows.map((row) => ({
      row_number: row.rowNumber,
      practice_name: cell(sheet, row, ColumnKey.PRACTICE),
      patient_id: cell(sheet, row, ColumnKey.PATIENT_ID),
      results: outcomeText(row.outcome) || 'No status',
    })),
  };
}

export function completionMessage(summary: RunSummary): string {
  return (
    `Processed ${summary.total_rows} row(s): ${summary.encounters_created} with encounters, ` +
    `${summary.payments_posted} payment(s) posted, ${summary.failed_rows} failed.`
  );
}

// ---------------------------------------------------------------------------
// Workbook
// ---------------------------------------------------------------------------

export async function renderWorkbook(sheet: ChargeSheet): Promise<Buffer> {
  const workbook = new ExcelJS.Workbook();
  const worksheet = workbook.addWorksheet(sheet.sheetName);

  const headerRow = worksheet.addRow(sheet.headers);
  headerRow.font = { bold: true };

  for (const row of sheet.rows) {
    worksheet.addRow(sheet.headers.map((_header, i) => row.values[i] ?? ''));
  }

  sheet.headers.forEach((header, i) => {
    worksheet.getColumn(i + 1).width = Math.min(Math.max(header.length + 2, 12), 60);
  });

  return Buffer.from(await workbook.xlsx.writeBuffer());
}

// ---------------------------------------------------------------------------
// Materializer Factory
// ---------------------------------------------------------------------------

export function createResultMaterializer(deps: ResultMaterializerDeps) {
  const { storage, logger } = deps;

  async function materialize(taskId: string, sheet: ChargeSheet): Promise<MaterializedRun> {
    applyOutcomes(sheet);
    const outputRef = artifactRefFor(taskId);
    const data = await renderWorkbook(sheet);
    await storage.write(artifactKey(outputRef), data);

    const summary = buildRunSummary(sheet);
    logger.info(
      { outputRef, sizeBytes: data.length, failedRows: summary.failed_rows },
      'Artifact written',
    );
    return { outputRef, summary, message: completionMessage(summary) };
  }

  return { materialize };
}

export type ResultMaterializer = ReturnType<typeof createResultMaterializer>;
