// ============================================================================
// Billing Run — Remote PMS Client
// SOAP-over-HTTPS client for the practice-management service. One instance
// per run, bound to the submitter's credentials.
// ============================================================================

import type { Logger } from '../../../lib/logger.js';
import { UnrecoverableSetupError } from '../../../lib/errors.js';
import {
  buildSoapEnvelope,
  extractXmlBoolean,
  extractXmlElements,
  extractXmlText,
  stripXmlElements,
  type XmlNode,
} from './pms.xml.js';

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface PmsClientConfig {
  endpointUrl: string;
  namespace: string;
  soapActionPrefix: string;
  timeoutMs: number;
}

export interface PmsCredentials {
  customerKey: string;
  user: string;
  password: string;
}

// ---------------------------------------------------------------------------
// Faults
// ---------------------------------------------------------------------------

export const PmsFaultKind = {
  API: 'api',
  AUTH: 'auth',
  SOAP: 'soap',
  TRANSPORT: 'transport',
  TIMEOUT: 'timeout',
} as const;

export type PmsFaultKind = (typeof PmsFaultKind)[keyof typeof PmsFaultKind];

/** A failed remote call. Caught at the call site and turned into row text. */
export class PmsFault extends Error {
  constructor(
    public readonly kind: PmsFaultKind,
    public readonly operation: string,
    message: string,
  ) {
    super(message);
    this.name = 'PmsFault';
  }
}

// ---------------------------------------------------------------------------
// Records
// ---------------------------------------------------------------------------

export interface PracticeRecord {
  id: string;
  name: string;
  active: boolean;
}

export interface ServiceLocationRecord {
  id: string;
  name: string;
  practiceId: string | null;
}

export interface ProviderRecord {
  id: string;
  fullName: string;
  firstName: string | null;
  lastName: string | null;
  type: string;
  active: boolean;
  npi: string | null;
}

export interface InsurancePolicyRecord {
  planName: string | null;
  companyName: string | null;
  number: string | null;
  effectiveStartDate: string | null;
  effectiveEndDate: string | null;
}

export interface PatientCaseRecord {
  caseId: string | null;
  isPrimary: boolean;
  policies: InsurancePolicyRecord[];
}

export interface PatientRecord {
  patientId: string;
  firstName: string | null;
  lastName: string | null;
  dob: string | null;
  cases: PatientCaseRecord[];
}

export interface PaymentCreateInput {
  batchNumber: string;
  patientId: string;
  payerType: string;
  amountPaid: string;
  paymentMethod: string;
  referenceNumber: string;
  practiceId: string;
  practiceName: string;
}

export interface ServiceLinePayload {
  procedureCode: string;
  units: number;
  serviceStartDate: string;
  serviceEndDate: string;
  /** Positions 1-4; null where the sheet has no modifier. */
  modifiers: Array<string | null>;
  /** Positions 1-4; position 1 is always set. */
  diagnosisCodes: Array<string | null>;
}

export interface ReferringProviderPayload {
  npi: string | null;
  providerId: string | null;
  firstName: string | null;
  lastName: string | null;
}

export interface EncounterPayload {
  patientId: number;
  practiceId: string;
  serviceLocationId: string;
  caseId: string;
  renderingProviderId: string;
  schedulingProviderId?: string;
  referringProvider?: ReferringProviderPayload;
  serviceStartDate: string;
  serviceEndDate: string;
  postDate: string;
  placeOfService: { code: string; name: string };
  hospitalization?: { startDate: string; endDate: string };
  serviceLines: ServiceLinePayload[];
  encounterStatus: string;
  batchNumber?: string;
}

export interface ChargeFilter {
  practiceName: string;
  serviceDate: string;
  procedureCode: string;
  includeUnapproved: boolean;
}

export interface ChargeLine {
  id: string | null;
  encounterId: string | null;
  patientId: string | null;
  procedureCode: string | null;
  totalCharges: string | null;
}

// ---------------------------------------------------------------------------
// Client Contract
// ---------------------------------------------------------------------------

export interface PmsClient {
  getPractices(practiceName: string): Promise<PracticeRecord[]>;
  getServiceLocations(practiceId: string): Promise<ServiceLocationRecord[]>;
  getProviders(practiceId: string): Promise<ProviderRecord[]>;
  /** Null when the service returns no patient for the id. */
  getPatient(patientId: number): Promise<PatientRecord | null>;
  createPayment(input: PaymentCreateInput): Promise<{ paymentId: string | null }>;
  createEncounter(payload: EncounterPayload): Promise<{ encounterId: string | null }>;
  /** Raw numeric status code, or null when the encounter has no details. */
  getEncounterStatus(encounterId: string, practiceId: string): Promise<string | null>;
  getCharges(filter: ChargeFilter): Promise<ChargeLine[]>;
}

export type PmsClientFactory = (credentials: PmsCredentials) => PmsClient;

export interface PmsClientDeps {
  config: PmsClientConfig;
  fetchImpl?: typeof fetch;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Response Parsing
// ---------------------------------------------------------------------------

function checkResponse(operation: string, xml: string): void {
  const fault = extractXmlElements(xml, 'Fault')[0];
  if (fault) {
    const reason = extractXmlText(fault, 'faultstring') ?? extractXmlText(fault, 'Text');
    throw new PmsFault(PmsFaultKind.SOAP, operation, reason ?? 'SOAP fault');
  }

  const security = extractXmlElements(xml, 'SecurityResponse')[0];
  if (security && extractXmlText(security, 'Authorized')?.toLowerCase() === 'false') {
    throw new PmsFault(
      PmsFaultKind.AUTH,
      operation,
      extractXmlText(security, 'SecurityResult') ?? 'Not authorized',
    );
  }

  const error = extractXmlElements(xml, 'ErrorResponse')[0];
  if (error && extractXmlBoolean(error, 'IsError')) {
    throw new PmsFault(
      PmsFaultKind.API,
      operation,
      extractXmlText(error, 'ErrorMessage') ?? 'Unspecified API error',
    );
  }
}

function parsePolicy(xml: string): InsurancePolicyRecord {
  return {
    planName: extractXmlText(xml, 'PlanName'),
    companyName: extractXmlText(xml, 'CompanyName'),
    number: extractXmlText(xml, 'Number'),
    effectiveStartDate: extractXmlText(xml, 'EffectiveStartDate'),
    effectiveEndDate: extractXmlText(xml, 'EffectiveEndDate'),
  };
}

function parseCase(xml: string): PatientCaseRecord {
  const own = stripXmlElements(xml, 'InsurancePolicies');
  return {
    caseId: extractXmlText(own, 'PatientCaseID'),
    isPrimary: extractXmlBoolean(own, 'IsPrimaryCase'),
    policies: extractXmlElements(xml, 'PatientInsurancePolicyData').map(parsePolicy),
  };
}

export function parsePatient(xml: string): PatientRecord | null {
  const block = extractXmlElements(xml, 'Patient')[0];
  if (!block) return null;
  const own = stripXmlElements(block, 'Cases');
  const patientId = extractXmlText(own, 'PatientID');
  if (!patientId) return null;
  return {
    patientId,
    firstName: extractXmlText(own, 'FirstName'),
    lastName: extractXmlText(own, 'LastName'),
    dob: extractXmlText(own, 'DOB'),
    cases: extractXmlElements(block, 'PatientCaseData').map(parseCase),
  };
}

function parseProvider(xml: string): ProviderRecord | null {
  const id = extractXmlText(xml, 'ID');
  const fullName = extractXmlText(xml, 'FullName');
  if (!id || !fullName) return null;
  return {
    id,
    fullName,
    firstName: extractXmlText(xml, 'FirstName'),
    lastName: extractXmlText(xml, 'LastName'),
    type: extractXmlText(xml, 'Type') ?? '',
    active: extractXmlBoolean(xml, 'Active'),
    npi: extractXmlText(xml, 'NationalProviderIdentifier'),
  };
}

function isPresent<T>(value: T | null): value is T {
  return value !== null;
}

// ---------------------------------------------------------------------------
// Request Bodies
// ---------------------------------------------------------------------------

function encounterToXml(payload: EncounterPayload): XmlNode {
  const referring = payload.referringProvider;
  return {
    BatchNumber: payload.batchNumber,
    Case: { CaseID: payload.caseId },
    EncounterStatus: payload.encounterStatus,
    Hospitalization: payload.hospitalization
      ? {
          StartDate: payload.hospitalization.startDate,
          EndDate: payload.hospitalization.endDate,
        }
      : undefined,
    Patient: { PatientID: payload.patientId },
    PlaceOfService: {
      PlaceOfServiceCode: payload.placeOfService.code,
      PlaceOfServiceName: payload.placeOfService.name,
    },
    PostDate: payload.postDate,
    Practice: { PracticeID: payload.practiceId },
    ReferringProvider: referring
      ? {
          NPI: referring.npi,
          ProviderID: referring.npi ? null : referring.providerId,
          FirstName: referring.firstName,
          LastName: referring.lastName,
        }
      : undefined,
    RenderingProvider: { ProviderID: payload.renderingProviderId },
    SchedulingProvider: payload.schedulingProviderId
      ? { ProviderID: payload.schedulingProviderId }
      : undefined,
    ServiceEndDate: payload.serviceEndDate,
    ServiceLocation: { LocationID: payload.serviceLocationId },
    ServiceStartDate: payload.serviceStartDate,
    ServiceLines: {
      ServiceLineReq: payload.serviceLines.map((line) => {
        const node: XmlNode = {
          ProcedureCode: line.procedureCode,
          Units: line.units,
          ServiceStartDate: line.serviceStartDate,
          ServiceEndDate: line.serviceEndDate,
        };
        line.modifiers.forEach((mod, i) => {
          node[`ProcedureModifier${i + 1}`] = mod;
        });
        line.diagnosisCodes.forEach((code, i) => {
          node[`DiagnosisCode${i + 1}`] = code;
        });
        return node;
      }),
    },
  };
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Build a client bound to one credential set. Throws UnrecoverableSetupError
 * when the endpoint or credentials cannot produce a usable client.
 */
export function createPmsClient(credentials: PmsCredentials, deps: PmsClientDeps): PmsClient {
  const { config, logger } = deps;
  const fetchImpl = deps.fetchImpl ?? fetch;

  let endpoint: URL;
  try {
    endpoint = new URL(config.endpointUrl);
  } catch {
    throw new UnrecoverableSetupError(`Invalid PMS endpoint URL: ${config.endpointUrl}`);
  }
  if (!credentials.customerKey || !credentials.user || !credentials.password) {
    throw new UnrecoverableSetupError('PMS credentials are incomplete');
  }

  const requestHeader: XmlNode = {
    CustomerKey: credentials.customerKey,
    Password: credentials.password,
    User: credentials.user,
  };

  async function call(operation: string, body: XmlNode): Promise<string> {
    const envelope = buildSoapEnvelope({
      namespace: config.namespace,
      operation,
      requestHeader,
      body,
    });

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), config.timeoutMs);
    const startedAt = Date.now();

    let response: Response;
    let text: string;
    try {
      response = await fetchImpl(endpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'text/xml; charset=utf-8',
          SOAPAction: `"${config.soapActionPrefix}${operation}"`,
        },
        body: envelope,
        signal: controller.signal,
      });
      text = await response.text();
    } catch (err) {
      if (controller.signal.aborted) {
        throw new PmsFault(
          PmsFaultKind.TIMEOUT,
          operation,
          `${operation} timed out after ${config.timeoutMs}ms`,
        );
      }
      const reason = err instanceof Error ? err.message : String(err);
      throw new PmsFault(PmsFaultKind.TRANSPORT, operation, `${operation} request failed: ${reason}`);
    } finally {
      clearTimeout(timer);
    }

    logger?.debug(
      { operation, status: response.status, durationMs: Date.now() - startedAt },
      'PMS call completed',
    );

    checkResponse(operation, text);
    if (!response.ok) {
      throw new PmsFault(PmsFaultKind.TRANSPORT, operation, `PMS HTTP error: ${response.status}`);
    }
    return text;
  }

  return {
    async getPractices(practiceName) {
      const xml = await call('GetPractices', {
        Fields: { ID: true, PracticeName: true, Active: true },
        Filter: { PracticeName: practiceName },
      });
      return extractXmlElements(xml, 'PracticeData')
        .map((block) => {
          const id = extractXmlText(block, 'ID');
          const name = extractXmlText(block, 'PracticeName');
          if (!id || !name) return null;
          return { id, name, active: extractXmlBoolean(block, 'Active') };
        })
        .filter(isPresent);
    },

    async getServiceLocations(practiceId) {
      const xml = await call('GetServiceLocations', {
        Fields: { ID: true, Name: true, PracticeID: true },
        Filter: { PracticeID: practiceId },
      });
      return extractXmlElements(xml, 'ServiceLocationData')
        .map((block) => {
          const id = extractXmlText(block, 'ID');
          const name = extractXmlText(block, 'Name');
          if (!id || !name) return null;
          return { id, name, practiceId: extractXmlText(block, 'PracticeID') };
        })
        .filter(isPresent);
    },

    async getProviders(practiceId) {
      const xml = await call('GetProviders', {
        Fields: {
          ID: true,
          FullName: true,
          FirstName: true,
          LastName: true,
          Type: true,
          Active: true,
          NationalProviderIdentifier: true,
        },
        Filter: { PracticeID: practiceId },
      });
      return extractXmlElements(xml, 'ProviderData').map(parseProvider).filter(isPresent);
    },

    async getPatient(patientId) {
      const xml = await call('GetPatient', { Filter: { PatientID: patientId } });
      return parsePatient(xml);
    },

    async createPayment(input) {
      const xml = await call('CreatePayment', {
        Payment: {
          BatchNumber: input.batchNumber,
          Patient: { PatientID: input.patientId },
          PayerType: input.payerType,
          Payment: {
            AmountPaid: input.amountPaid,
            PaymentMethod: input.paymentMethod,
            ReferenceNumber: input.referenceNumber,
          },
          Practice: { PracticeID: input.practiceId, PracticeName: input.practiceName },
        },
      });
      return { paymentId: extractXmlText(xml, 'PaymentID') };
    },

    async createEncounter(payload) {
      const xml = await call('CreateEncounter', { Encounter: encounterToXml(payload) });
      return { encounterId: extractXmlText(xml, 'EncounterID') };
    },

    async getEncounterStatus(encounterId, practiceId) {
      const xml = await call('GetEncounterDetails', {
        Fields: { EncounterID: true, EncounterStatus: true, PracticeID: true },
        Filter: { EncounterID: encounterId, Practice: { PracticeID: practiceId } },
      });
      const details = extractXmlElements(xml, 'EncounterDetailsData')[0];
      return details ? extractXmlText(details, 'EncounterStatus') : null;
    },

    async getCharges(filter) {
      const xml = await call('GetCharges', {
        Fields: {
          ID: true,
          EncounterID: true,
          PatientID: true,
          ProcedureCode: true,
          TotalCharges: true,
        },
        Filter: {
          PracticeName: filter.practiceName,
          FromServiceDate: filter.serviceDate,
          ToServiceDate: filter.serviceDate,
          ProcedureCode: filter.procedureCode,
          IncludeUnapprovedCharges: filter.includeUnapproved,
        },
      });
      return extractXmlElements(xml, 'ChargeData').map((block) => ({
        id: extractXmlText(block, 'ID'),
        encounterId: extractXmlText(block, 'EncounterID'),
        patientId: extractXmlText(block, 'PatientID'),
        procedureCode: extractXmlText(block, 'ProcedureCode'),
        totalCharges: extractXmlText(block, 'TotalCharges'),
      }));
    },
  };
}
