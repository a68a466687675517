// ============================================================================
// Billing Run — Phase Pipeline
// Phase 1: patient + insurance fetch (per row)
// Phase 2: payment posting (per row)
// Phase 3: encounter creation + status/charge lookup (per group)
// Row and group failures are recorded in the row outcome; nothing here
// aborts the run.
// ============================================================================

import {
  ColumnKey,
  ENCOUNTER_STATUS_NAMES,
  InsuranceStatus,
  NEW_ENCOUNTER_STATUS,
  PAYMENT_PAYER_TYPE,
  PAYMENT_SOURCE_CODES,
} from '@chargeflow/shared/constants/billing-run.constants.js';
import { parseDate, toApiDateTime } from '@chargeflow/shared/utils/date.utils.js';
import type { Logger } from '../../../lib/logger.js';
import type {
  EncounterPayload,
  InsurancePolicyRecord,
  PatientRecord,
  PmsClient,
  ReferringProviderPayload,
  ServiceLinePayload,
} from '../pms/pms.client.js';
import { EntityResolutionCache } from './entity-cache.js';
import { createEntityResolver, type EntityResolver } from './entity-resolver.service.js';
import {
  buildHospitalization,
  buildServiceLine,
  groupRowsForEncounters,
  isEncounterEligible,
  representativeProcedureCode,
  resolvePlaceOfService,
  type EncounterGroup,
} from './encounter-builder.js';
import { describeEncounterFault, describeFault } from './fault-message.js';
import {
  cell,
  type ChargeSheet,
  type InputRow,
  type ProcessingOutcome,
} from './sheet-normalizer.service.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Picks one policy among those active on the date of service. */
export type PolicySelector = (
  activePolicies: readonly InsurancePolicyRecord[],
) => InsurancePolicyRecord | undefined;

/** Remote order decides; the service has no documented precedence field. */
export const firstActivePolicy: PolicySelector = (policies) => policies[0];

export interface PhasePipelineDeps {
  client: PmsClient;
  logger: Logger;
  /** Defaults to a fresh cache; never share one between runs. */
  cache?: EntityResolutionCache;
  selectPolicy?: PolicySelector;
  /** Work not started once this many ms have passed is skipped. */
  runTimeoutMs?: number;
  now?: () => number;
}

export interface PipelineStats {
  rows: number;
  groups: number;
  deadlineReached: boolean;
}

export interface InsuranceSelection {
  name: string | null;
  id: string | null;
  status: string;
}

interface GroupResult {
  failed: boolean;
  message: string;
  encounterId?: string;
  chargeStatus?: string;
  chargeAmount?: string;
}

export const RUN_DEADLINE_MESSAGE = 'Skipped: run time limit reached.';

// ---------------------------------------------------------------------------
// Outcome helpers
// ---------------------------------------------------------------------------

function note(outcome: ProcessingOutcome, message: string): void {
  outcome.messages.push(message);
}

function fail(outcome: ProcessingOutcome, message: string): void {
  outcome.messages.push(message);
  outcome.hasError = true;
}

// ---------------------------------------------------------------------------
// Value parsing
// ---------------------------------------------------------------------------

/** Integer patient ids; spreadsheets often hold them as `123.0`. */
export function parsePatientId(raw: string): number | null {
  const match = /^(\d+)(?:\.0+)?$/.exec(raw.trim());
  if (!match) return null;
  const id = Number(match[1]);
  return Number.isSafeInteger(id) && id > 0 ? id : null;
}

/** Amount text such as `$1,250.5` → 1250.5; null unless a positive number. */
export function parsePaymentAmount(raw: string): number | null {
  const cleaned = raw.replace(/[$,]/g, '').trim();
  if (!/^\d*\.?\d+$/.test(cleaned)) return null;
  const amount = Number(cleaned);
  return amount > 0 ? amount : null;
}

export function paymentSourceCode(source: string): string | null {
  const key = source.trim().toUpperCase();
  return Object.hasOwn(PAYMENT_SOURCE_CODES, key) ? PAYMENT_SOURCE_CODES[key] : null;
}

export function encounterStatusName(code: string): string {
  const key = code.trim();
  return Object.hasOwn(ENCOUNTER_STATUS_NAMES, key)
    ? ENCOUNTER_STATUS_NAMES[key]
    : `Unknown Status (${key})`;
}

// ---------------------------------------------------------------------------
// Insurance selection
// ---------------------------------------------------------------------------

/**
 * A policy covers the date of service when it started on or before it and
 * has not ended before it. A policy with no dates at all counts as active.
 */
export function isPolicyActiveOn(policy: InsurancePolicyRecord, dateOfService: string): boolean {
  if (!policy.effectiveStartDate) return !policy.effectiveEndDate;
  const start = parseDate(policy.effectiveStartDate);
  if (!start || start > dateOfService) return false;
  if (!policy.effectiveEndDate) return true;
  const end = parseDate(policy.effectiveEndDate);
  return end !== null && end >= dateOfService;
}

export function selectInsurance(
  patient: PatientRecord,
  dateOfService: string,
  selectPolicy: PolicySelector = firstActivePolicy,
): InsuranceSelection {
  if (patient.cases.length === 0) {
    return { name: null, id: null, status: InsuranceStatus.NO_CASES };
  }
  const primaryCase = patient.cases.find((c) => c.isPrimary) ?? patient.cases[0];
  if (primaryCase.policies.length === 0) {
    return { name: null, id: null, status: InsuranceStatus.NO_POLICIES };
  }

  const selected = selectPolicy(primaryCase.policies.filter((p) => isPolicyActiveOn(p, dateOfService)));
  if (!selected) {
    return { name: null, id: null, status: InsuranceStatus.NO_ACTIVE_PRIMARY };
  }
  return {
    name: selected.planName ?? selected.companyName ?? 'N/A',
    id: selected.number ?? 'N/A',
    status: InsuranceStatus.ACTIVE,
  };
}

// ---------------------------------------------------------------------------
// Pipeline Factory
// ---------------------------------------------------------------------------

export function createPhasePipeline(deps: PhasePipelineDeps) {
  const { client, logger } = deps;
  const cache = deps.cache ?? new EntityResolutionCache();
  const selectPolicy = deps.selectPolicy ?? firstActivePolicy;
  const now = deps.now ?? Date.now;
  const resolver: EntityResolver = createEntityResolver({ client, cache, logger });

  let deadline = Number.POSITIVE_INFINITY;
  const skippedByDeadline = new Set<InputRow>();

  function deadlineReached(): boolean {
    return now() >= deadline;
  }

  // =========================================================================
  // Phase 1: patient + insurance
  // =========================================================================

  async function fetchPatientAndInsurance(sheet: ChargeSheet, row: InputRow): Promise<void> {
    const outcome = row.outcome;
    const rawPatientId = cell(sheet, row, ColumnKey.PATIENT_ID);
    const rawDos = cell(sheet, row, ColumnKey.DOS);

    const patientId = parsePatientId(rawPatientId);
    if (patientId === null) {
      outcome.insuranceStatus = InsuranceStatus.INVALID_PATIENT_ID;
      fail(outcome, `P1 Error: Invalid Patient ID format: '${rawPatientId}'.`);
      return;
    }

    const errors: string[] = [];
    const dos = parseDate(rawDos);
    if (!rawDos) {
      outcome.insuranceStatus = InsuranceStatus.DOS_MISSING;
    } else if (!dos) {
      outcome.insuranceStatus = InsuranceStatus.INVALID_DOS;
      errors.push(`Invalid DOS '${rawDos}'.`);
    }

    let patient: PatientRecord | null;
    try {
      patient = await client.getPatient(patientId);
    } catch (err) {
      outcome.insuranceStatus = InsuranceStatus.LOOKUP_FAILED;
      errors.push(describeFault(err, 'GetPatient'));
      fail(outcome, `P1 Error: ${errors.join(' ')}`);
      return;
    }

    if (!patient) {
      outcome.insuranceStatus = InsuranceStatus.PATIENT_NOT_FOUND;
      errors.push('Patient not found.');
      fail(outcome, `P1 Error: ${errors.join(' ')}`);
      return;
    }

    await resolver.primeCaseId(patientId, patient);
    outcome.patientName =
      [patient.firstName, patient.lastName].filter((part) => !!part).join(' ') || null;
    outcome.dob = patient.dob ? parseDate(patient.dob) ?? patient.dob : null;

    if (dos) {
      const insurance = selectInsurance(patient, dos, selectPolicy);
      outcome.insurance = insurance.name;
      outcome.insuranceId = insurance.id;
      outcome.insuranceStatus = insurance.status;
    } else {
      outcome.insuranceStatus = InsuranceStatus.SKIPPED_NO_DOS;
    }

    if (errors.length > 0) {
      fail(outcome, `P1 Error: ${errors.join(' ')}`);
    } else if (
      outcome.insuranceStatus !== InsuranceStatus.ACTIVE &&
      outcome.insuranceStatus !== InsuranceStatus.SKIPPED_NO_DOS
    ) {
      note(outcome, `P1 Status: ${outcome.insuranceStatus}`);
    }
  }

  // =========================================================================
  // Phase 2: payment posting
  // =========================================================================

  async function postPayment(sheet: ChargeSheet, row: InputRow): Promise<void> {
    const outcome = row.outcome;
    const batch = cell(sheet, row, ColumnKey.PP_BATCH);
    const amountRaw = cell(sheet, row, ColumnKey.PATIENT_PAYMENT);
    const source = cell(sheet, row, ColumnKey.PATIENT_PAYMENT_SOURCE);
    if (!batch || !amountRaw || !source) return;

    const amount = parsePaymentAmount(amountRaw);
    if (amount === null) {
      fail(outcome, `P2 Invalid: Payment amount '${amountRaw}' is not a positive number.`);
      return;
    }
    const method = paymentSourceCode(source);
    if (method === null) {
      fail(outcome, `P2 Invalid: Unmapped payment source '${source}'.`);
      return;
    }

    const practiceName = cell(sheet, row, ColumnKey.PRACTICE);
    let practiceId: string | null;
    try {
      practiceId = await resolver.resolvePracticeId(practiceName);
    } catch (err) {
      fail(outcome, `P2 Error: Practice lookup for '${practiceName}' failed. ${describeFault(err, 'GetPractices')}`);
      return;
    }
    if (!practiceId) {
      fail(outcome, `P2 Error: Practice ID for '${practiceName}' (payment) not found.`);
      return;
    }

    try {
      const { paymentId } = await client.createPayment({
        batchNumber: batch,
        patientId: cell(sheet, row, ColumnKey.PATIENT_ID).replace(/\.0+$/, ''),
        payerType: PAYMENT_PAYER_TYPE,
        amountPaid: amount.toFixed(2),
        paymentMethod: method,
        referenceNumber: cell(sheet, row, ColumnKey.REFERENCE_NUMBER),
        practiceId,
        practiceName,
      });
      if (paymentId && Number(paymentId) > 0) {
        outcome.paymentId = paymentId;
        note(outcome, `Payment #${paymentId} Posted.`);
      } else {
        fail(outcome, 'P2 Status Unknown (response unclear).');
      }
    } catch (err) {
      fail(outcome, `P2 ${describeFault(err, 'CreatePayment')}`);
    }
  }

  // =========================================================================
  // Phase 3: encounter per group
  // =========================================================================

  async function fetchChargeTotal(
    practiceName: string,
    serviceDate: string,
    procedureCode: string,
    patientId: number,
    encounterId: string,
  ): Promise<string> {
    const lines = await client.getCharges({
      practiceName,
      serviceDate,
      procedureCode,
      includeUnapproved: true,
    });
    // One query per encounter; summing per procedure would count shared charge lines twice.
    const total = lines
      .filter((l) => l.patientId === String(patientId) && l.encounterId === encounterId)
      .reduce((sum, l) => {
        const value = Number(l.totalCharges);
        return Number.isFinite(value) ? sum + value : sum;
      }, 0);
    return total.toFixed(2);
  }

  async function createEncounterForGroup(sheet: ChargeSheet, group: EncounterGroup): Promise<GroupResult> {
    const { practiceName, dateOfService } = group.key;
    const first = group.rows[0];
    const warnings: string[] = [];

    // --- Practice ---
    let practiceId: string | null;
    try {
      practiceId = await resolver.resolvePracticeId(practiceName);
    } catch (err) {
      return { failed: true, message: `P3 Error: ${describeFault(err, 'GetPractices')}` };
    }
    if (!practiceId) {
      return { failed: true, message: `P3 Error: Practice ID for '${practiceName}' (enc) not found.` };
    }

    // --- Service location (named after the practice) ---
    let serviceLocationId: string | null;
    try {
      serviceLocationId = await resolver.resolveServiceLocationId(practiceName, practiceId);
    } catch (err) {
      return { failed: true, message: `Enc Error: ${describeFault(err, 'GetServiceLocations')}` };
    }
    if (!serviceLocationId) {
      return {
        failed: true,
        message: `Enc Error: SL '${practiceName}' not found for PracticeID ${practiceId}.`,
      };
    }

    // --- Patient case ---
    const patientId = parsePatientId(group.key.patientId);
    if (patientId === null) {
      return { failed: true, message: `Enc Error: Invalid Patient ID '${group.key.patientId}'.` };
    }
    let caseId: string | null;
    try {
      caseId = await resolver.resolveCaseId(patientId);
    } catch (err) {
      return { failed: true, message: `Enc Error: ${describeFault(err, 'GetPatient')}` };
    }
    if (!caseId) {
      return { failed: true, message: `Enc Error: Case ID not found for Pt ${patientId}.` };
    }

    // --- Rendering provider (required) ---
    const renderingName = cell(sheet, first, ColumnKey.RENDERING_PROVIDER);
    if (!renderingName) {
      return { failed: true, message: 'Enc Error: Rendering Provider name missing.' };
    }
    let renderingProviderId: string | null;
    try {
      renderingProviderId = await resolver.resolveProviderId(renderingName, practiceId);
    } catch (err) {
      return { failed: true, message: `Enc Error: ${describeFault(err, 'GetProviders')}` };
    }
    if (!renderingProviderId) {
      return {
        failed: true,
        message: `Enc Error: Rendering Provider ID for '${renderingName}' not found.`,
      };
    }

    // --- Date of service ---
    const dos = parseDate(dateOfService);
    if (!dos) {
      return { failed: true, message: `Enc Error: Invalid DOS '${dateOfService}'.` };
    }
    const serviceDate = toApiDateTime(dos);

    // --- Referring provider (optional) ---
    let referringProvider: ReferringProviderPayload | undefined;
    const referringName = cell(sheet, first, ColumnKey.REFERRING_PROVIDER);
    if (referringName) {
      try {
        const found = await resolver.resolveReferringProvider(referringName, practiceId);
        if (found && (found.npi || found.providerId)) {
          referringProvider = found;
        } else {
          warnings.push(`Warn: Referring Provider '${referringName}' not found.`);
        }
      } catch (err) {
        warnings.push(`Warn: Referring Provider lookup failed. ${describeFault(err, 'GetProviders')}`);
      }
    }

    // --- Hospitalization (optional) ---
    const { hospitalization, warning: hospitalizationWarning } = buildHospitalization(
      cell(sheet, first, ColumnKey.ADMIT_DATE),
      cell(sheet, first, ColumnKey.DISCHARGE_DATE),
    );
    if (hospitalizationWarning) warnings.push(`Warn: ${hospitalizationWarning}`);

    // --- Service lines: one per row ---
    const serviceLines: ServiceLinePayload[] = [];
    for (const row of group.rows) {
      const result = buildServiceLine(sheet, row, serviceDate);
      if (!result.ok) {
        return {
          failed: true,
          message: `Enc Error: Failed service line from row ${row.rowNumber} (${result.reason}).`,
        };
      }
      serviceLines.push(result.line);
    }

    // --- Scheduling provider (optional) ---
    let schedulingProviderId: string | undefined;
    const schedulingName = cell(sheet, first, ColumnKey.SCHEDULING_PROVIDER);
    if (schedulingName) {
      try {
        schedulingProviderId = (await resolver.resolveProviderId(schedulingName, practiceId)) ?? undefined;
        if (!schedulingProviderId) {
          warnings.push(`Warn: Scheduling Provider '${schedulingName}' not found.`);
        }
      } catch (err) {
        warnings.push(`Warn: Scheduling Provider lookup failed. ${describeFault(err, 'GetProviders')}`);
      }
    }

    const batchNumber = cell(sheet, first, ColumnKey.CE_BATCH);
    const payload: EncounterPayload = {
      patientId,
      practiceId,
      serviceLocationId,
      caseId,
      renderingProviderId,
      schedulingProviderId,
      referringProvider,
      serviceStartDate: serviceDate,
      serviceEndDate: serviceDate,
      postDate: serviceDate,
      placeOfService: resolvePlaceOfService(
        cell(sheet, first, ColumnKey.POS),
        cell(sheet, first, ColumnKey.ENCOUNTER_MODE),
      ),
      hospitalization,
      serviceLines,
      encounterStatus: NEW_ENCOUNTER_STATUS,
      batchNumber: batchNumber || undefined,
    };

    // --- Create ---
    let encounterId: string | null;
    try {
      encounterId = (await client.createEncounter(payload)).encounterId;
    } catch (err) {
      return { failed: true, message: describeEncounterFault(err) };
    }
    if (!encounterId || !(Number(encounterId) > 0)) {
      return { failed: true, message: 'Enc creation unclear (EncID -1 or missing).' };
    }

    let message = `Encounter #${encounterId} Created.`;

    // --- Status ---
    let chargeStatus: string;
    try {
      const code = await client.getEncounterStatus(encounterId, practiceId);
      if (code === null) {
        chargeStatus = 'Status Fetch Error';
        message += ' (Status Warn: No encounter details returned.)';
      } else {
        chargeStatus = encounterStatusName(code);
      }
    } catch (err) {
      chargeStatus = 'Status Fetch Error';
      message += ` (Status Warn: ${describeFault(err, 'GetEncounterDetails')})`;
    }

    // --- Charges ---
    let chargeAmount: string;
    const procedureCode = representativeProcedureCode(serviceLines);
    if (procedureCode === null) {
      chargeAmount = '0.00';
    } else {
      try {
        chargeAmount = await fetchChargeTotal(practiceName, serviceDate, procedureCode, patientId, encounterId);
      } catch (err) {
        chargeAmount = 'Charge Fetch Error';
        message += ` (Charge Warn: ${describeFault(err, 'GetCharges')})`;
      }
    }

    if (warnings.length > 0) message += ` ${warnings.join(' ')}`;
    return { failed: false, message, encounterId, chargeStatus, chargeAmount };
  }

  function applyGroupResult(group: EncounterGroup, result: GroupResult): void {
    for (const row of group.rows) {
      if (result.failed) {
        row.outcome.chargeAmount = 'Error';
        row.outcome.chargeStatus = 'Error';
        fail(row.outcome, result.message);
      } else {
        row.outcome.encounterId = result.encounterId ?? null;
        row.outcome.chargeStatus = result.chargeStatus ?? null;
        row.outcome.chargeAmount = result.chargeAmount ?? null;
        note(row.outcome, result.message);
      }
    }
  }

  // =========================================================================
  // Run
  // =========================================================================

  async function runRowPhases(sheet: ChargeSheet, row: InputRow): Promise<void> {
    if (deadlineReached()) {
      skippedByDeadline.add(row);
      fail(row.outcome, RUN_DEADLINE_MESSAGE);
      return;
    }
    if (!cell(sheet, row, ColumnKey.PATIENT_ID) || !cell(sheet, row, ColumnKey.PRACTICE)) {
      row.outcome.insuranceStatus = InsuranceStatus.PATIENT_ID_MISSING;
      fail(row.outcome, 'Skipped (Ph1/2): Patient ID or Practice Name missing.');
      return;
    }

    // An unexpected error in one phase stays with this row.
    try {
      await fetchPatientAndInsurance(sheet, row);
    } catch (err) {
      fail(row.outcome, `P1 ${describeFault(err)}`);
    }
    try {
      await postPayment(sheet, row);
    } catch (err) {
      fail(row.outcome, `P2 ${describeFault(err)}`);
    }
  }

  /** Run every phase over the sheet, annotating each row's outcome in place. */
  async function run(sheet: ChargeSheet): Promise<PipelineStats> {
    deadline = deps.runTimeoutMs !== undefined ? now() + deps.runTimeoutMs : Number.POSITIVE_INFINITY;
    skippedByDeadline.clear();

    logger.info({ rows: sheet.rows.length }, 'Phase 1/2: patient fetch and payment posting');
    for (const row of sheet.rows) {
      await runRowPhases(sheet, row);
    }

    const eligible: InputRow[] = [];
    for (const row of sheet.rows) {
      if (isEncounterEligible(sheet, row)) {
        eligible.push(row);
      } else if (!skippedByDeadline.has(row)) {
        fail(row.outcome, 'P3 Skipped: Patient ID, DOS, Practice or Patient Name missing.');
      }
    }

    const groups = groupRowsForEncounters(sheet, eligible);
    logger.info({ groups: groups.length, eligibleRows: eligible.length }, 'Phase 3: encounter creation');

    for (const group of groups) {
      if (deadlineReached()) {
        for (const row of group.rows) fail(row.outcome, RUN_DEADLINE_MESSAGE);
        continue;
      }
      let result: GroupResult;
      try {
        result = await createEncounterForGroup(sheet, group);
      } catch (err) {
        result = { failed: true, message: `Enc ${describeFault(err)}` };
      }
      if (result.failed) {
        logger.warn(
          { patientId: group.key.patientId, dos: group.key.dateOfService, message: result.message },
          'Encounter group failed',
        );
      }
      applyGroupResult(group, result);
    }

    const reached = deadline !== Number.POSITIVE_INFINITY && deadlineReached();
    logger.info({ cache: cache.stats(), deadlineReached: reached }, 'Pipeline finished');
    return { rows: sheet.rows.length, groups: groups.length, deadlineReached: reached };
  }

  return {
    cache,
    fetchPatientAndInsurance,
    postPayment,
    createEncounterForGroup,
    run,
  };
}

export type PhasePipeline = ReturnType<typeof createPhasePipeline>;
