// ============================================================================
// Billing Run — Entity Resolution Cache
// Write-once memo of remote lookups, constructed per run and passed into every
// phase. Never shared between runs.
// ============================================================================

import type { ReferringProviderPayload } from '../pms/pms.client.js';

export const EntityKind = {
  PRACTICE: 'practice',
  SERVICE_LOCATION: 'service_location',
  PROVIDER: 'provider',
  REFERRING_PROVIDER: 'referring_provider',
  PATIENT_CASE: 'patient_case',
} as const;

export type EntityKind = (typeof EntityKind)[keyof typeof EntityKind];

/** Kinds that resolve to a bare remote id. */
export type IdEntityKind = Exclude<EntityKind, typeof EntityKind.REFERRING_PROVIDER>;

type CachedValue = string | ReferringProviderPayload;

export interface EntityCacheStats {
  entries: number;
  hits: number;
  misses: number;
}

/**
 * `resolve` returns the value the first fetch produced for a key, or null
 * when that fetch confirmed the entity does not exist. A fetch that rejects
 * is cached too: later callers get the same rejection without a new remote
 * call.
 */
export class EntityResolutionCache {
  private readonly entries = new Map<string, Promise<CachedValue | null>>();
  private hits = 0;
  private misses = 0;

  static compositeKey(kind: EntityKind, lookupKey: string, contextKey = ''): string {
    const lookup = lookupKey.trim().toLowerCase().replace(/\s+/g, ' ');
    return `${kind}|${contextKey.trim()}|${lookup}`;
  }

  has(kind: EntityKind, lookupKey: string, contextKey = ''): boolean {
    return this.entries.has(EntityResolutionCache.compositeKey(kind, lookupKey, contextKey));
  }

  resolve(
    kind: IdEntityKind,
    lookupKey: string,
    contextKey: string,
    fetchFn: () => Promise<string | null>,
  ): Promise<string | null>;
  resolve(
    kind: typeof EntityKind.REFERRING_PROVIDER,
    lookupKey: string,
    contextKey: string,
    fetchFn: () => Promise<ReferringProviderPayload | null>,
  ): Promise<ReferringProviderPayload | null>;
  resolve(
    kind: EntityKind,
    lookupKey: string,
    contextKey: string,
    fetchFn: () => Promise<CachedValue | null>,
  ): Promise<CachedValue | null> {
    const key = EntityResolutionCache.compositeKey(kind, lookupKey, contextKey);
    const cached = this.entries.get(key);
    if (cached) {
      this.hits += 1;
      return cached;
    }

    this.misses += 1;
    const pending = fetchFn();
    this.entries.set(key, pending);
    return pending;
  }

  stats(): EntityCacheStats {
    return { entries: this.entries.size, hits: this.hits, misses: this.misses };
  }
}
