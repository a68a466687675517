// ============================================================================
// Billing Run — Column Schema & Sheet Normalizer
// Validates an uploaded charge workbook against the column specs before any
// remote call and turns it into the row table the pipeline annotates.
// ============================================================================

import { Readable } from 'node:stream';
import ExcelJS from 'exceljs';
import type { CellValue, Worksheet } from 'exceljs';
import {
  COLUMN_SPECS,
  ColumnKey,
  ColumnPurpose,
  DEFAULT_TARGET_SHEET_NAME,
  TEMPLATE_DESCRIPTION_MARKER,
  type ColumnSpec,
} from '@chargeflow/shared/constants/billing-run.constants.js';
import { formatIsoDate } from '@chargeflow/shared/utils/date.utils.js';
import { SchemaValidationError } from '../../../lib/errors.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Fields fetched or produced for one row, filled phase by phase. */
export interface ProcessingOutcome {
  /** Appended to, never rewritten. Joined into the Error column. */
  messages: string[];
  patientName: string | null;
  dob: string | null;
  insurance: string | null;
  insuranceId: string | null;
  insuranceStatus: string | null;
  paymentId: string | null;
  encounterId: string | null;
  chargeStatus: string | null;
  chargeAmount: string | null;
  /** Set when any phase recorded an error for this row. */
  hasError: boolean;
}

export interface InputRow {
  /** Worksheet row number of the source record. */
  rowNumber: number;
  /** Cell text aligned with ChargeSheet.headers. */
  values: string[];
  outcome: ProcessingOutcome;
}

/** Logical column → index into ChargeSheet.headers. */
export type ColumnMap = Partial<Record<ColumnKey, number>>;

export interface ChargeSheet {
  sheetName: string;
  /** Original headers in order, followed by any output columns created. */
  headers: string[];
  columnMap: ColumnMap;
  rows: InputRow[];
}

export interface HeaderMapping {
  columnMap: ColumnMap;
  missingCritical: ColumnSpec[];
}

export interface SheetNormalizerOptions {
  specs?: readonly ColumnSpec[];
  sheetName?: string;
}

// ---------------------------------------------------------------------------
// Header Handling
// ---------------------------------------------------------------------------

export function normalizeHeader(header: string): string {
  return header.trim().toLowerCase().replace(/\s+/g, ' ');
}

/** Throws when two specs share a header or a header is not in normalized form. */
export function validateColumnSpecs(specs: readonly ColumnSpec[]): void {
  const seenHeaders = new Set<string>();
  const seenKeys = new Set<ColumnKey>();
  for (const spec of specs) {
    if (normalizeHeader(spec.normalizedHeader) !== spec.normalizedHeader) {
      throw new Error(`Column spec '${spec.logicalName}' header is not normalized`);
    }
    if (seenHeaders.has(spec.normalizedHeader)) {
      throw new Error(`Duplicate column spec header '${spec.normalizedHeader}'`);
    }
    if (seenKeys.has(spec.key)) {
      throw new Error(`Duplicate column spec key '${spec.key}'`);
    }
    seenHeaders.add(spec.normalizedHeader);
    seenKeys.add(spec.key);
  }
}

/** Map each spec to the first raw header that normalizes to its header. */
export function mapHeaders(rawHeaders: readonly string[], specs: readonly ColumnSpec[]): HeaderMapping {
  const byNormalized = new Map<string, number>();
  rawHeaders.forEach((raw, index) => {
    const normalized = normalizeHeader(raw);
    if (normalized && !byNormalized.has(normalized)) {
      byNormalized.set(normalized, index);
    }
  });

  const columnMap: ColumnMap = {};
  const missingCritical: ColumnSpec[] = [];
  for (const spec of specs) {
    const index = byNormalized.get(spec.normalizedHeader);
    if (index !== undefined) {
      columnMap[spec.key] = index;
    } else if (spec.isCritical) {
      missingCritical.push(spec);
    }
  }
  return { columnMap, missingCritical };
}

// ---------------------------------------------------------------------------
// Cell Handling
// ---------------------------------------------------------------------------

export function cellToText(value: CellValue): string {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) return formatIsoDate(value);
  if (typeof value === 'object') {
    if ('richText' in value) return value.richText.map((part) => part.text).join('').trim();
    if ('hyperlink' in value) return String(value.text).trim();
    if ('formula' in value || 'sharedFormula' in value) return cellToText(value.result ?? null);
    return '';
  }
  return String(value).trim();
}

/** Read a logical field from a row; columns absent from the sheet read as empty. */
export function cell(sheet: Pick<ChargeSheet, 'columnMap'>, row: InputRow, key: ColumnKey): string {
  const index = sheet.columnMap[key];
  if (index === undefined) return '';
  return row.values[index] ?? '';
}

export function emptyOutcome(): ProcessingOutcome {
  return {
    messages: [],
    patientName: null,
    dob: null,
    insurance: null,
    insuranceId: null,
    insuranceStatus: null,
    paymentId: null,
    encounterId: null,
    chargeStatus: null,
    chargeAmount: null,
    hasError: false,
  };
}

/** Headers up to the last column holding text in any row; blank ones become `Column N`. */
function readHeaders(worksheet: Worksheet): string[] {
  let width = 0;
  worksheet.eachRow({ includeEmpty: false }, (row) => {
    row.eachCell({ includeEmpty: false }, (c, col) => {
      if (col > width && cellToText(c.value) !== '') width = col;
    });
  });

  const headerRow = worksheet.getRow(1);
  const headers: string[] = [];
  for (let col = 1; col <= width; col++) {
    headers.push(cellToText(headerRow.getCell(col).value) || `Column ${col}`);
  }
  return headers;
}

// ---------------------------------------------------------------------------
// Normalizer Factory
// ---------------------------------------------------------------------------

export function createSheetNormalizer(opts: SheetNormalizerOptions = {}) {
  const specs = opts.specs ?? COLUMN_SPECS;
  const sheetName = opts.sheetName ?? DEFAULT_TARGET_SHEET_NAME;
  validateColumnSpecs(specs);

  /**
   * Build the row table from raw headers and records. Fails with
   * SchemaValidationError when a critical column is missing.
   */
  function normalizeTable(
    rawHeaders: string[],
    records: Array<{ rowNumber: number; cells: string[] }>,
  ): ChargeSheet {
    const { columnMap, missingCritical } = mapHeaders(rawHeaders, specs);
    if (missingCritical.length > 0) {
      const names = missingCritical.map((s) => s.logicalName);
      throw new SchemaValidationError(`Missing critical columns: ${names.join(', ')}`, {
        missingColumns: names,
        sheet: sheetName,
      });
    }

    const headers = [...rawHeaders];
    for (const spec of specs) {
      if (spec.purpose === ColumnPurpose.OUTPUT && columnMap[spec.key] === undefined) {
        columnMap[spec.key] = headers.length;
        headers.push(spec.logicalName);
      }
    }
    const errorIndex = columnMap[ColumnKey.ERROR];

    const rows: InputRow[] = [];
    for (const record of records) {
      if (record.cells.every((c) => c === '')) continue;
      if (
        rows.length === 0 &&
        (record.cells[0] ?? '').toLowerCase().includes(TEMPLATE_DESCRIPTION_MARKER)
      ) {
        continue;
      }

      const values = headers.map((_header, i) =>
        i < rawHeaders.length ? record.cells[i] ?? '' : '',
      );
      if (errorIndex !== undefined) values[errorIndex] = '';

      rows.push({ rowNumber: record.rowNumber, values, outcome: emptyOutcome() });
    }

    return { sheetName, headers, columnMap, rows };
  }

  /** Load the target sheet of an .xlsx upload. */
  async function parseWorkbook(data: Buffer, filename: string): Promise<ChargeSheet> {
    if (!filename.toLowerCase().endsWith('.xlsx')) {
      throw new SchemaValidationError('Unsupported file type. Upload an .xlsx workbook.');
    }
    if (data.length === 0) {
      throw new SchemaValidationError('Uploaded file is empty');
    }

    const workbook = new ExcelJS.Workbook();
    try {
      await workbook.xlsx.read(Readable.from(data));
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new SchemaValidationError(`Could not read the uploaded workbook: ${reason}`);
    }

    const worksheet = workbook.getWorksheet(sheetName);
    if (!worksheet) {
      throw new SchemaValidationError(`Sheet '${sheetName}' not found in the workbook`, {
        sheet: sheetName,
      });
    }

    const rawHeaders = readHeaders(worksheet);
    const records: Array<{ rowNumber: number; cells: string[] }> = [];
    worksheet.eachRow({ includeEmpty: false }, (row, rowNumber) => {
      if (rowNumber === 1) return;
      records.push({
        rowNumber,
        cells: rawHeaders.map((_h, i) => cellToText(row.getCell(i + 1).value)),
      });
    });

    return normalizeTable(rawHeaders, records);
  }

  return { specs, sheetName, normalizeTable, parseWorkbook };
}

export type SheetNormalizer = ReturnType<typeof createSheetNormalizer>;
