// ============================================================================
// Billing Run — Entity Resolution
// Name → remote id lookups for practices, service locations, providers and
// patient cases, each memoized through the run's EntityResolutionCache.
// ============================================================================

import {
  PROVIDER_NAME_NOISE_WORDS,
  REFERRING_PROVIDER_TYPE,
  RENDERING_PROVIDER_TYPES,
} from '@chargeflow/shared/constants/billing-run.constants.js';
import type { Logger } from '../../../lib/logger.js';
import type {
  PatientRecord,
  PmsClient,
  ProviderRecord,
  ReferringProviderPayload,
} from '../pms/pms.client.js';
import { EntityKind, type EntityResolutionCache } from './entity-cache.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface EntityResolverDeps {
  client: PmsClient;
  cache: EntityResolutionCache;
  logger: Logger;
}

// ---------------------------------------------------------------------------
// Provider name matching
// ---------------------------------------------------------------------------

export function providerNameTokens(name: string): string[] {
  return name
    .toLowerCase()
    .split(/[\s,.]+/)
    .filter((token) => token && !PROVIDER_NAME_NOISE_WORDS.has(token));
}

/** Percentage of search tokens present in the candidate's tokens. */
export function providerMatchScore(searchTokens: readonly string[], candidateName: string): number {
  if (searchTokens.length === 0) return 0;
  const candidate = new Set(providerNameTokens(candidateName));
  const present = searchTokens.filter((token) => candidate.has(token)).length;
  return Math.round((present / searchTokens.length) * 100);
}

/**
 * Pick the active rendering-capable provider for a sheet name. An exact
 * full-name match wins; otherwise the first candidate whose name holds every
 * search token.
 */
export function matchRenderingProvider(
  providers: readonly ProviderRecord[],
  searchName: string,
): ProviderRecord | null {
  const wanted = searchName.trim().toLowerCase().replace(/\s+/g, ' ');
  const candidates = providers.filter(
    (p) => p.active && RENDERING_PROVIDER_TYPES.has(p.type.trim().toLowerCase()),
  );

  const exact = candidates.find((p) => p.fullName.trim().toLowerCase() === wanted);
  if (exact) return exact;

  const searchTokens = providerNameTokens(searchName);
  const tokens = searchTokens.length > 0 ? searchTokens : [wanted];
  return candidates.find((p) => providerMatchScore(tokens, p.fullName) === 100) ?? null;
}

function splitFullName(fullName: string): { firstName: string | null; lastName: string | null } {
  const parts = fullName.trim().split(/\s+/);
  if (parts.length === 0 || !parts[0]) return { firstName: null, lastName: null };
  if (parts.length === 1) return { firstName: parts[0], lastName: null };
  return { firstName: parts[0], lastName: parts.slice(1).join(' ') };
}

export function matchReferringProvider(
  providers: readonly ProviderRecord[],
  searchName: string,
): ReferringProviderPayload | null {
  const wanted = searchName.trim().toLowerCase().replace(/\s+/g, ' ');
  const match = providers.find(
    (p) =>
      p.active &&
      p.type.trim().toLowerCase() === REFERRING_PROVIDER_TYPE &&
      p.fullName.trim().toLowerCase() === wanted,
  );
  if (!match) return null;

  const derived = splitFullName(match.fullName);
  return {
    providerId: match.id,
    npi: match.npi,
    firstName: match.firstName ?? derived.firstName,
    lastName: match.lastName ?? derived.lastName,
  };
}

/** Primary case id, else the first case that has one. */
export function primaryCaseId(patient: PatientRecord): string | null {
  const primary = patient.cases.find((c) => c.isPrimary && c.caseId);
  return primary?.caseId ?? patient.cases.find((c) => c.caseId)?.caseId ?? null;
}

// ---------------------------------------------------------------------------
// Resolver Factory
// ---------------------------------------------------------------------------

export function createEntityResolver(deps: EntityResolverDeps) {
  const { client, cache, logger } = deps;

  /** Practice id by case-insensitive exact name; active practices preferred. */
  function resolvePracticeId(practiceName: string): Promise<string | null> {
    return cache.resolve(EntityKind.PRACTICE, practiceName, '', async () => {
      const wanted = practiceName.trim().toLowerCase();
      const practices = await client.getPractices(practiceName.trim());
      const named = practices.filter((p) => p.name.trim().toLowerCase() === wanted);
      const active = named.find((p) => p.active);
      if (active) return active.id;
      const inactive = named[0];
      if (inactive) {
        logger.warn({ practiceName, practiceId: inactive.id }, 'Using inactive practice');
        return inactive.id;
      }
      return null;
    });
  }

  function resolveServiceLocationId(locationName: string, practiceId: string): Promise<string | null> {
    return cache.resolve(EntityKind.SERVICE_LOCATION, locationName, practiceId, async () => {
      const wanted = locationName.trim().toLowerCase();
      const locations = await client.getServiceLocations(practiceId);
      const match = locations.find(
        (l) =>
          l.name.trim().toLowerCase() === wanted &&
          (l.practiceId === null || l.practiceId === practiceId),
      );
      return match?.id ?? null;
    });
  }

  /** Rendering or scheduling provider id. */
  function resolveProviderId(providerName: string, practiceId: string): Promise<string | null> {
    return cache.resolve(EntityKind.PROVIDER, providerName, practiceId, async () => {
      const providers = await client.getProviders(practiceId);
      const match = matchRenderingProvider(providers, providerName);
      if (match && match.fullName.trim().toLowerCase() !== providerName.trim().toLowerCase()) {
        logger.info(
          { searchName: providerName, matchedName: match.fullName, providerId: match.id },
          'Provider matched by name tokens',
        );
      }
      return match?.id ?? null;
    });
  }

  function resolveReferringProvider(
    providerName: string,
    practiceId: string,
  ): Promise<ReferringProviderPayload | null> {
    return cache.resolve(EntityKind.REFERRING_PROVIDER, providerName, practiceId, async () => {
      const providers = await client.getProviders(practiceId);
      return matchReferringProvider(providers, providerName);
    });
  }

  function resolveCaseId(patientId: number): Promise<string | null> {
    return cache.resolve(EntityKind.PATIENT_CASE, String(patientId), '', async () => {
      const patient = await client.getPatient(patientId);
      return patient ? primaryCaseId(patient) : null;
    });
  }

  /** Records the case id of a patient already fetched, so no second GetPatient is made. */
  function primeCaseId(patientId: number, patient: PatientRecord): Promise<string | null> {
    return cache.resolve(EntityKind.PATIENT_CASE, String(patientId), '', async () =>
      primaryCaseId(patient),
    );
  }

  return {
    resolvePracticeId,
    resolveServiceLocationId,
    resolveProviderId,
    resolveReferringProvider,
    resolveCaseId,
    primeCaseId,
  };
}

export type EntityResolver = ReturnType<typeof createEntityResolver>;
