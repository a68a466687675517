// ============================================================================
// Billing Run — Fault Messages
// Turns remote faults into the short text written into a row's Error column.
// ============================================================================

import { PmsFault, PmsFaultKind } from '../pms/pms.client.js';

const MAX_FREE_TEXT = 250;

export function truncate(text: string, max: number): string {
  const trimmed = text.trim();
  return trimmed.length > max ? `${trimmed.slice(0, max).trim()}...` : trimmed;
}

/**
 * One-line description of a failed call, e.g.
 * `API Err(GetPatient): Patient is inactive`.
 */
export function describeFault(err: unknown, operation?: string): string {
  if (err instanceof PmsFault) {
    const op = operation ?? err.operation;
    const message = truncate(err.message, 100);
    switch (err.kind) {
      case PmsFaultKind.API:
        return `API Err(${op}): ${message}`;
      case PmsFaultKind.AUTH:
        return `API Auth Err(${op}): ${message}`;
      case PmsFaultKind.SOAP:
        return `SOAP Fault(${op}): ${message}`;
      case PmsFaultKind.TIMEOUT:
        return `Timeout(${op}): ${message}`;
      case PmsFaultKind.TRANSPORT:
        return `Transport Err(${op}): ${message}`;
    }
  }
  const message = err instanceof Error ? err.message : String(err);
  return `System Err${operation ? `(${operation})` : ''}: ${truncate(message, 100)}`;
}

// ---------------------------------------------------------------------------
// Encounter error simplification
// The CreateEncounter error message echoes the submitted encounter as XML
// with <err id="..."> markers next to each rejected value.
// ---------------------------------------------------------------------------

const ERR_MARKER = /<err id="(\d+)">([\s\S]*?)<\/err>/;
const DIAG_ERROR = /<DiagnosisCode(\d)>([^<]+?)<err id="\d+">([^<]+)<\/err>/g;
const MOD_ERROR = /<ProcedureModifier(\d)>([^<]+?)<err id="\d+">([^<]+)<\/err>/g;

function firstClause(text: string): string {
  return text.split(',')[0].trim();
}

function sectionError(xml: string, section: string): string | null {
  const block = new RegExp(`<${section}>([\\s\\S]*?)</${section}>`).exec(xml);
  if (!block) return null;
  const err = ERR_MARKER.exec(block[1]);
  return err ? `${section} Err(ID:${err[1]}): ${err[2].trim()}` : null;
}

function serviceLineErrors(xml: string): string[] {
  const errors: string[] = [];
  const lines = xml.match(/<ServiceLine>[\s\S]*?<\/ServiceLine>/g) ?? [];
  lines.forEach((line, index) => {
    const label = `L${index + 1}(Proc ${/<ProcedureCode>([^<]+)<\/ProcedureCode>/.exec(line)?.[1] ?? 'N/A'})`;
    let specific = 0;
    for (const m of line.matchAll(DIAG_ERROR)) {
      specific += 1;
      errors.push(`${label}: Diag${m[1]} ('${m[2]}') - ${firstClause(m[3])}.`);
    }
    for (const m of line.matchAll(MOD_ERROR)) {
      specific += 1;
      const hint = m[2].includes('.0') ? ' (No .0)' : '';
      errors.push(`${label}: Mod${m[1]} ('${m[2]}') - ${firstClause(m[3])}${hint}.`);
    }
    if (specific === 0) {
      for (const m of line.matchAll(new RegExp(ERR_MARKER.source, 'g'))) {
        errors.push(`${label}: ${m[2].trim()}.`);
      }
    }
  });
  return errors;
}

/**
 * Shortens a CreateEncounter error. Structured XML errors become a list of
 * field-level messages; free text passes through, cut at 250 characters.
 */
export function simplifyEncounterError(raw: string | null | undefined): string {
  if (!raw || !raw.trim()) return 'Unknown error.';
  const xml = raw.trim();
  if (!xml.includes('<Encounter') && !xml.includes('<err ') && !xml.includes('<Error>')) {
    return truncate(xml, MAX_FREE_TEXT);
  }

  const errors = [
    sectionError(xml, 'ReferringProvider'),
    sectionError(xml, 'RenderingProvider'),
    sectionError(xml, 'ServiceLocation'),
  ].filter((e): e is string => e !== null);
  errors.push(...serviceLineErrors(xml));

  if (errors.length === 0) {
    const top = /<Encounter[^>]*>[\s\S]*?<err id="(\d+)">([\s\S]*?)<\/err>/.exec(xml);
    if (top) {
      errors.push(`Encounter Level Err(ID:${top[1]}): ${top[2].trim()}.`);
    } else if (xml.includes('<Encounter')) {
      errors.push('Enc creation failed (unparsed XML error).');
    }
  }

  if (errors.length === 0) return truncate(xml, MAX_FREE_TEXT);
  return [...new Set(errors)].join('; ');
}

/** Message for a CreateEncounter failure. */
export function describeEncounterFault(err: unknown): string {
  if (err instanceof PmsFault) {
    switch (err.kind) {
      case PmsFaultKind.API:
        return `Enc API Err: ${simplifyEncounterError(err.message)}`;
      case PmsFaultKind.AUTH:
        return `Enc API Auth Err: ${truncate(err.message, 100)}`;
      case PmsFaultKind.SOAP:
        return `Enc SOAP Fault: ${truncate(err.message, 100)}`;
      default:
        return `Enc Transport Err: ${truncate(err.message, 100)}`;
    }
  }
  const message = err instanceof Error ? err.message : String(err);
  return `Enc System Error: ${truncate(message, 100)}`;
}
