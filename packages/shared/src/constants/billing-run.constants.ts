// ============================================================================
// Billing Run — Constants
// ============================================================================

// --- Column Keys (logical fields of the charge spreadsheet) ---

export const ColumnKey = {
  PATIENT_ID: 'patientId',
  PRACTICE: 'practice',
  DOS: 'dos',
  PATIENT_NAME: 'patientName',
  DOB: 'dob',
  INSURANCE: 'insurance',
  INSURANCE_ID: 'insuranceId',
  INSURANCE_STATUS: 'insuranceStatus',
  PP_BATCH: 'ppBatch',
  PATIENT_PAYMENT: 'patientPayment',
  PATIENT_PAYMENT_SOURCE: 'patientPaymentSource',
  REFERENCE_NUMBER: 'referenceNumber',
  CE_BATCH: 'ceBatch',
  RENDERING_PROVIDER: 'renderingProvider',
  SCHEDULING_PROVIDER: 'schedulingProvider',
  REFERRING_PROVIDER: 'referringProvider',
  ENCOUNTER_MODE: 'encounterMode',
  POS: 'pos',
  ADMIT_DATE: 'admitDate',
  DISCHARGE_DATE: 'dischargeDate',
  PROCEDURES: 'procedures',
  MOD_1: 'mod1',
  MOD_2: 'mod2',
  MOD_3: 'mod3',
  MOD_4: 'mod4',
  UNITS: 'units',
  DIAG_1: 'diag1',
  DIAG_2: 'diag2',
  DIAG_3: 'diag3',
  DIAG_4: 'diag4',
  CHARGE_AMOUNT: 'chargeAmount',
  CHARGE_STATUS: 'chargeStatus',
  ENCOUNTER_ID: 'encounterId',
  ERROR: 'error',
} as const;

export type ColumnKey = (typeof ColumnKey)[keyof typeof ColumnKey];

// --- Column Purpose ---

export const ColumnPurpose = {
  IDENTITY: 'IDENTITY',
  PAYMENT: 'PAYMENT',
  ENCOUNTER: 'ENCOUNTER',
  SERVICE_LINE: 'SERVICE_LINE',
  OUTPUT: 'OUTPUT',
} as const;

export type ColumnPurpose = (typeof ColumnPurpose)[keyof typeof ColumnPurpose];

// --- Column Specs ---
// Order matters: output columns missing from an upload are appended in this
// order. normalizedHeader is lowercase with single spaces.

export interface ColumnSpec {
  readonly key: ColumnKey;
  readonly logicalName: string;
  readonly normalizedHeader: string;
  readonly isCritical: boolean;
  readonly purpose: ColumnPurpose;
}

export const COLUMN_SPECS: readonly ColumnSpec[] = Object.freeze([
  { key: ColumnKey.PATIENT_ID, logicalName: 'Patient ID', normalizedHeader: 'patient id', isCritical: true, purpose: ColumnPurpose.IDENTITY },
  { key: ColumnKey.PRACTICE, logicalName: 'Practice', normalizedHeader: 'practice', isCritical: true, purpose: ColumnPurpose.IDENTITY },
  { key: ColumnKey.DOS, logicalName: 'DOS', normalizedHeader: 'dos', isCritical: true, purpose: ColumnPurpose.IDENTITY },
  { key: ColumnKey.PATIENT_NAME, logicalName: 'Patient Name', normalizedHeader: 'patient name', isCritical: false, purpose: ColumnPurpose.OUTPUT },
  { key: ColumnKey.DOB, logicalName: 'DOB', normalizedHeader: 'dob', isCritical: false, purpose: ColumnPurpose.OUTPUT },
  { key: ColumnKey.INSURANCE, logicalName: 'Insurance', normalizedHeader: 'insurance', isCritical: false, purpose: ColumnPurpose.OUTPUT },
  { key: ColumnKey.INSURANCE_ID, logicalName: 'Insurance ID', normalizedHeader: 'insurance id', isCritical: false, purpose: ColumnPurpose.OUTPUT },
  { key: ColumnKey.INSURANCE_STATUS, logicalName: 'Insurance Status', normalizedHeader: 'insurance status', isCritical: false, purpose: ColumnPurpose.OUTPUT },
  { key: ColumnKey.PP_BATCH, logicalName: 'PP Batch #', normalizedHeader: 'pp batch #', isCritical: false, purpose: ColumnPurpose.PAYMENT },
  { key: ColumnKey.PATIENT_PAYMENT, logicalName: 'Patient Payment', normalizedHeader: 'patient payment', isCritical: false, purpose: ColumnPurpose.PAYMENT },
  { key: ColumnKey.PATIENT_PAYMENT_SOURCE, logicalName: 'Patient Payment Source', normalizedHeader: 'patient payment source', isCritical: false, purpose: ColumnPurpose.PAYMENT },
  { key: ColumnKey.REFERENCE_NUMBER, logicalName: 'Reference Number', normalizedHeader: 'reference number', isCritical: false, purpose: ColumnPurpose.PAYMENT },
  { key: ColumnKey.CE_BATCH, logicalName: 'CE Batch #', normalizedHeader: 'ce batch #', isCritical: false, purpose: ColumnPurpose.ENCOUNTER },
  { key: ColumnKey.RENDERING_PROVIDER, logicalName: 'Rendering Provider', normalizedHeader: 'rendering provider', isCritical: true, purpose: ColumnPurpose.ENCOUNTER },
  { key: ColumnKey.SCHEDULING_PROVIDER, logicalName: 'Scheduling Provider', normalizedHeader: 'scheduling provider', isCritical: false, purpose: ColumnPurpose.ENCOUNTER },
  { key: ColumnKey.REFERRING_PROVIDER, logicalName: 'Referring Provider', normalizedHeader: 'referring provider', isCritical: false, purpose: ColumnPurpose.ENCOUNTER },
  { key: ColumnKey.ENCOUNTER_MODE, logicalName: 'Encounter Mode', normalizedHeader: 'encounter mode', isCritical: true, purpose: ColumnPurpose.ENCOUNTER },
  { key: ColumnKey.POS, logicalName: 'POS', normalizedHeader: 'pos', isCritical: true, purpose: ColumnPurpose.ENCOUNTER },
  { key: ColumnKey.ADMIT_DATE, logicalName: 'Admit Date', normalizedHeader: 'admit date', isCritical: false, purpose: ColumnPurpose.ENCOUNTER },
  { key: ColumnKey.DISCHARGE_DATE, logicalName: 'Discharge Date', normalizedHeader: 'discharge date', isCritical: false, purpose: ColumnPurpose.ENCOUNTER },
  { key: ColumnKey.PROCEDURES, logicalName: 'Procedures', normalizedHeader: 'procedures', isCritical: true, purpose: ColumnPurpose.SERVICE_LINE },
  { key: ColumnKey.MOD_1, logicalName: 'Mod 1', normalizedHeader: 'mod 1', isCritical: false, purpose: ColumnPurpose.SERVICE_LINE },
  { key: ColumnKey.MOD_2, logicalName: 'Mod 2', normalizedHeader: 'mod 2', isCritical: false, purpose: ColumnPurpose.SERVICE_LINE },
  { key: ColumnKey.MOD_3, logicalName: 'Mod 3', normalizedHeader: 'mod 3', isCritical: false, purpose: ColumnPurpose.SERVICE_LINE },
  { key: ColumnKey.MOD_4, logicalName: 'Mod 4', normalizedHeader: 'mod 4', isCritical: false, purpose: ColumnPurpose.SERVICE_LINE },
  { key: ColumnKey.UNITS, logicalName: 'Units', normalizedHeader: 'units', isCritical: true, purpose: ColumnPurpose.SERVICE_LINE },
  { key: ColumnKey.DIAG_1, logicalName: 'Diag 1', normalizedHeader: 'diag 1', isCritical: true, purpose: ColumnPurpose.SERVICE_LINE },
  { key: ColumnKey.DIAG_2, logicalName: 'Diag 2', normalizedHeader: 'diag 2', isCritical: false, purpose: ColumnPurpose.SERVICE_LINE },
  { key: ColumnKey.DIAG_3, logicalName: 'Diag 3', normalizedHeader: 'diag 3', isCritical: false, purpose: ColumnPurpose.SERVICE_LINE },
  { key: ColumnKey.DIAG_4, logicalName: 'Diag 4', normalizedHeader: 'diag 4', isCritical: false, purpose: ColumnPurpose.SERVICE_LINE },
  { key: ColumnKey.CHARGE_AMOUNT, logicalName: 'Charge Amount', normalizedHeader: 'charge amount', isCritical: false, purpose: ColumnPurpose.OUTPUT },
  { key: ColumnKey.CHARGE_STATUS, logicalName: 'Charge Status', normalizedHeader: 'charge status', isCritical: false, purpose: ColumnPurpose.OUTPUT },
  { key: ColumnKey.ENCOUNTER_ID, logicalName: 'Encounter ID', normalizedHeader: 'encounter id', isCritical: false, purpose: ColumnPurpose.OUTPUT },
  { key: ColumnKey.ERROR, logicalName: 'Error', normalizedHeader: 'error', isCritical: false, purpose: ColumnPurpose.OUTPUT },
] satisfies ColumnSpec[]);

export const DEFAULT_TARGET_SHEET_NAME = 'Charges';

// First data row of the distributed template describes each column.
export const TEMPLATE_DESCRIPTION_MARKER = 'script will read this from excel';

// --- Task Status ---

export const TaskStatus = {
  PENDING: 'pending',
  COMPLETED: 'completed',
  ERROR: 'error',
} as const;

export type TaskStatus = (typeof TaskStatus)[keyof typeof TaskStatus];

export const TERMINAL_TASK_STATUSES: ReadonlySet<TaskStatus> = new Set([
  TaskStatus.COMPLETED,
  TaskStatus.ERROR,
]);

// --- Payment Source Codes (remote PaymentMethod enum) ---

export const PAYMENT_SOURCE_CODES: Readonly<Record<string, string>> = Object.freeze({
  CHECK: '1',
  'CREDIT CARD': '3',
  CC: '3',
  'ELECTRONIC FUNDS TRANSFER': '4',
  EFT: '4',
  CASH: '5',
});

export const PAYMENT_PAYER_TYPE = 'Patient';

// --- Place of Service ---

export const PLACE_OF_SERVICE_NAMES: Readonly<Record<string, string>> = Object.freeze({
  '02': 'Telehealth Provided Other than in Patient’s Home',
  '10': 'Telehealth Provided in Patient’s Home',
  '11': 'Office',
  '12': 'Home',
  '21': 'Inpatient Hospital',
  '22': 'Outpatient Hospital',
  '23': 'Emergency Room - Hospital',
  '24': 'Ambulatory Surgical Center',
});

export const DEFAULT_PLACE_OF_SERVICE_CODE = '11';

// --- Encounter Status (remote numeric status codes) ---

export const ENCOUNTER_STATUS_NAMES: Readonly<Record<string, string>> = Object.freeze({
  '0': 'Undefined',
  '1': 'Draft',
  '2': 'Review',
  '3': 'Approved',
  '4': 'Rejected',
  '5': 'Billed',
  '6': 'Unpayable',
  '7': 'Pending',
});

export const NEW_ENCOUNTER_STATUS = 'Draft';

// --- Provider Matching ---

export const RENDERING_PROVIDER_TYPES: ReadonlySet<string> = new Set([
  'normal provider',
  'physician',
  'group practice',
]);

export const REFERRING_PROVIDER_TYPE = 'referring provider';

// Credential and business suffixes ignored by the token match.
export const PROVIDER_NAME_NOISE_WORDS: ReadonlySet<string> = new Set([
  'md',
  'do',
  'pa',
  'np',
  'lcsw',
  'msw',
  'inc',
  'llc',
  'pc',
  'group',
  'associates',
  'services',
  'medical',
]);

// --- Insurance Status Labels ---

export const InsuranceStatus = {
  ACTIVE: 'Active',
  NO_ACTIVE_PRIMARY: 'No Primary Active Ins. Found',
  NO_POLICIES: 'No Ins. Policies on Primary Case',
  NO_CASES: 'No Case Data for Ins. Check',
  SKIPPED_NO_DOS: 'Ins. Check Skipped (No Valid DOS)',
  DOS_MISSING: 'DOS Missing for Ins Check',
  INVALID_DOS: 'Invalid DOS for Check',
  PATIENT_NOT_FOUND: 'Patient Not Found',
  PATIENT_ID_MISSING: 'Patient ID Missing',
  INVALID_PATIENT_ID: 'Invalid Patient ID',
  LOOKUP_FAILED: 'Patient Lookup Failed',
} as const;

export type InsuranceStatus = (typeof InsuranceStatus)[keyof typeof InsuranceStatus];

// --- Output Artifacts ---

export const OUTPUT_FILE_PREFIX = 'Processed_Data_';
export const OUTPUT_FILE_EXTENSION = '.xlsx';
export const XLSX_MIME_TYPE =
  'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';
