import { describe, it, expect } from 'vitest';
import {
  DR_CARTER,
  SUNRISE_LOCATION,
  createFakePmsClient,
  makePatient,
  silentLogger,
} from '../../../../test/fixtures/billing-run.fixtures.js';
import type { ProviderRecord } from '../pms/pms.client.js';
import { EntityResolutionCache } from './entity-cache.js';
import {
  createEntityResolver,
  matchReferringProvider,
  matchRenderingProvider,
  primaryCaseId,
  providerMatchScore,
  providerNameTokens,
} from './entity-resolver.service.js';

function provider(overrides: Partial<ProviderRecord>): ProviderRecord {
  return { ...DR_CARTER, ...overrides };
}

// ============================================================================
// Provider matching
// ============================================================================

describe('providerNameTokens', () => {
  it('drops credentials and punctuation', () => {
    expect(providerNameTokens('Carter, Jane MD')).toEqual(['carter', 'jane']);
  });
});

describe('providerMatchScore', () => {
  it('is the share of search tokens found in the candidate', () => {
    expect(providerMatchScore(['jane', 'carter'], 'Jane A Carter')).toBe(100);
    expect(providerMatchScore(['jane', 'carter'], 'Jane Smith')).toBe(50);
    expect(providerMatchScore([], 'Jane Smith')).toBe(0);
  });
});

describe('matchRenderingProvider', () => {
  it('prefers an exact full-name match', () => {
    const tokenMatch = provider({ id: '1', fullName: 'Carter Jane' });
    const exact = provider({ id: '2', fullName: 'Jane Carter' });
    expect(matchRenderingProvider([tokenMatch, exact], ' jane  carter ')?.id).toBe('2');
  });

  it('falls back to the token match', () => {
    const match = provider({ id: '3', fullName: 'Jane Q. Carter MD' });
    expect(matchRenderingProvider([match], 'Carter, Jane')?.id).toBe('3');
  });

  it('ignores inactive and non-rendering providers', () => {
    expect(
      matchRenderingProvider(
        [
          provider({ active: false }),
          provider({ id: '9', type: 'Referring Provider' }),
        ],
        'Jane Carter',
      ),
    ).toBeNull();
  });

  it('rejects weak token matches', () => {
    expect(matchRenderingProvider([provider({ fullName: 'Jane Smith' })], 'Jane Carter')).toBeNull();
  });

  it('requires every search token in the candidate name', () => {
    const nearMiss = provider({ id: '77', fullName: 'Anna Maria Lopez Garcia Diaz' });
    expect(matchRenderingProvider([nearMiss], 'Anna Maria Lopez Garcia Ruiz')).toBeNull();
  });

  it('takes the first full token match in remote order', () => {
    const first = provider({ id: '11', fullName: 'Carter Jane Ann' });
    const second = provider({ id: '12', fullName: 'Jane Carter Smith' });
    expect(matchRenderingProvider([first, second], 'Carter, Jane')?.id).toBe('11');
  });
});

describe('matchReferringProvider', () => {
  it('returns the payload of an exact referring provider', () => {
    const referring = provider({
      id: '900',
      fullName: 'Lee Park',
      firstName: null,
      lastName: null,
      type: 'Referring Provider',
      npi: '555',
    });
    expect(matchReferringProvider([DR_CARTER, referring], 'lee park')).toEqual({
      providerId: '900',
      npi: '555',
      firstName: 'Lee',
      lastName: 'Park',
    });
  });

  it('derives the last name from every part after the first', () => {
    const referring = provider({
      id: '901',
      fullName: 'Mary Ann Lee',
      firstName: null,
      lastName: null,
      type: 'Referring Provider',
      npi: '556',
    });
    expect(matchReferringProvider([referring], 'Mary Ann Lee')).toEqual({
      providerId: '901',
      npi: '556',
      firstName: 'Mary',
      lastName: 'Ann Lee',
    });
  });

  it('does not use rendering providers', () => {
    expect(matchReferringProvider([DR_CARTER], 'Jane Carter')).toBeNull();
  });
});

describe('primaryCaseId', () => {
  it('prefers the primary case', () => {
    const patient = makePatient({
      cases: [
        { caseId: '1', isPrimary: false, policies: [] },
        { caseId: '2', isPrimary: true, policies: [] },
      ],
    });
    expect(primaryCaseId(patient)).toBe('2');
  });

  it('falls back to the first case', () => {
    const patient = makePatient({ cases: [{ caseId: '4', isPrimary: false, policies: [] }] });
    expect(primaryCaseId(patient)).toBe('4');
    expect(primaryCaseId(makePatient({ cases: [] }))).toBeNull();
  });
});

// ============================================================================
// Resolver
// ============================================================================

describe('createEntityResolver', () => {
  function setup(data: Parameters<typeof createFakePmsClient>[0] = {}) {
    const client = createFakePmsClient(data);
    const resolver = createEntityResolver({
      client,
      cache: new EntityResolutionCache(),
      logger: silentLogger,
    });
    return { client, resolver };
  }

  it('resolves a practice once per name', async () => {
    const { client, resolver } = setup();
    expect(await resolver.resolvePracticeId('Sunrise Clinic')).toBe('7');
    expect(await resolver.resolvePracticeId('SUNRISE CLINIC')).toBe('7');
    expect(client.getPractices).toHaveBeenCalledTimes(1);
  });

  it('prefers an active practice over an inactive one', async () => {
    const { resolver } = setup({
      practices: [
        { id: '6', name: 'Sunrise Clinic', active: false },
        { id: '7', name: 'Sunrise Clinic', active: true },
      ],
    });
    expect(await resolver.resolvePracticeId('Sunrise Clinic')).toBe('7');
  });

  it('uses an inactive practice when it is the only one', async () => {
    const { resolver } = setup({ practices: [{ id: '6', name: 'Sunrise Clinic', active: false }] });
    expect(await resolver.resolvePracticeId('Sunrise Clinic')).toBe('6');
  });

  it('returns null for an unknown practice', async () => {
    const { resolver } = setup();
    expect(await resolver.resolvePracticeId('Nowhere')).toBeNull();
  });

  it('resolves a service location within the practice', async () => {
    const { resolver } = setup({
      locations: [SUNRISE_LOCATION, { id: '32', name: 'Annex', practiceId: null }],
    });
    expect(await resolver.resolveServiceLocationId('Sunrise Clinic', '7')).toBe('31');
    expect(await resolver.resolveServiceLocationId('annex', '7')).toBe('32');
    expect(await resolver.resolveServiceLocationId('Sunrise Clinic', '8')).toBeNull();
  });

  it('resolves rendering and referring providers per practice', async () => {
    const referring = provider({
      id: '900',
      fullName: 'Lee Park',
      firstName: 'Lee',
      lastName: 'Park',
      type: 'Referring Provider',
      npi: '555',
    });
    const { client, resolver } = setup({ providers: [DR_CARTER, referring] });

    expect(await resolver.resolveProviderId('Jane Carter', '7')).toBe('501');
    expect(await resolver.resolveProviderId('Jane Carter', '7')).toBe('501');
    expect(await resolver.resolveReferringProvider('Lee Park', '7')).toEqual({
      providerId: '900',
      npi: '555',
      firstName: 'Lee',
      lastName: 'Park',
    });
    expect(client.getProviders).toHaveBeenCalledTimes(2);
  });

  it('reuses a primed case id without fetching the patient', async () => {
    const { client, resolver } = setup();
    await resolver.primeCaseId(1001, makePatient());
    expect(await resolver.resolveCaseId(1001)).toBe('9001');
    expect(client.getPatient).not.toHaveBeenCalled();
  });

  it('fetches the patient for an unprimed case id', async () => {
    const { client, resolver } = setup();
    expect(await resolver.resolveCaseId(1001)).toBe('9001');
    expect(await resolver.resolveCaseId(2002)).toBeNull();
    expect(client.getPatient).toHaveBeenCalledTimes(2);
  });
});
