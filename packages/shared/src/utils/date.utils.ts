// ============================================================================
// Billing Run — Date Utilities
// ============================================================================

const ISO_DATE = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T ][\d:.]+(?:Z|[+-]\d{2}:?\d{2})?)?$/;
const SLASH_DATE = /^(\d{1,2})[/-](\d{1,2})[/-](\d{4})(?:\s+[\d:]+(?:\s*[AaPp][Mm])?)?$/;
const YEAR_FIRST_SLASH_DATE = /^(\d{4})\/(\d{1,2})\/(\d{1,2})$/;

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

function toIsoDate(year: number, month: number, day: number): string | null {
  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return `${year}-${pad2(month)}-${pad2(day)}`;
}

/**
 * Parses a spreadsheet or remote date into `YYYY-MM-DD`.
 *
 * Accepts ISO dates (optionally with a time part, as the remote API returns
 * them), `MM/DD/YYYY`, `MM-DD-YYYY` and `YYYY/MM/DD`. Returns null for
 * anything else, including impossible calendar dates.
 */
export function parseDate(value: string | null | undefined): string | null {
  if (!value) return null;
  const trimmed = value.trim();
  if (!trimmed) return null;

  const iso = ISO_DATE.exec(trimmed);
  if (iso) {
    return toIsoDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));
  }

  const slash = SLASH_DATE.exec(trimmed);
  if (slash) {
    return toIsoDate(Number(slash[3]), Number(slash[1]), Number(slash[2]));
  }

  const yearFirst = YEAR_FIRST_SLASH_DATE.exec(trimmed);
  if (yearFirst) {
    return toIsoDate(Number(yearFirst[1]), Number(yearFirst[2]), Number(yearFirst[3]));
  }

  return null;
}

/** Formats a Date using its UTC calendar parts as `YYYY-MM-DD`. */
export function formatIsoDate(date: Date): string {
  return `${date.getUTCFullYear()}-${pad2(date.getUTCMonth() + 1)}-${pad2(date.getUTCDate())}`;
}

/** Remote API date-time form of an ISO date: `YYYY-MM-DDT00:00:00`. */
export function toApiDateTime(isoDate: string): string {
  return `${isoDate}T00:00:00`;
}

/** `YYYYMMDD` stamp used in download file names. */
export function formatDateStamp(date: Date): string {
  return formatIsoDate(date).replace(/-/g, '');
}
