import { describe, it, expect, vi } from 'vitest';
import { EntityKind, EntityResolutionCache } from './entity-cache.js';

describe('EntityResolutionCache', () => {
  it('normalizes lookup keys into the composite key', () => {
    expect(EntityResolutionCache.compositeKey(EntityKind.PRACTICE, '  Sunrise   CLINIC ')).toBe(
      'practice||sunrise clinic',
    );
    expect(EntityResolutionCache.compositeKey(EntityKind.PROVIDER, 'Jane Carter', '7')).toBe(
      'provider|7|jane carter',
    );
  });

  it('calls the fetch once per key', async () => {
    const cache = new EntityResolutionCache();
    const fetchFn = vi.fn(async () => '7');

    expect(await cache.resolve(EntityKind.PRACTICE, 'Sunrise Clinic', '', fetchFn)).toBe('7');
    expect(await cache.resolve(EntityKind.PRACTICE, 'sunrise clinic', '', fetchFn)).toBe('7');
    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(cache.stats()).toEqual({ entries: 1, hits: 1, misses: 1 });
  });

  it('shares one in-flight fetch between concurrent callers', async () => {
    const cache = new EntityResolutionCache();
    const fetchFn = vi.fn(async () => '31');

    const [a, b] = await Promise.all([
      cache.resolve(EntityKind.SERVICE_LOCATION, 'Sunrise Clinic', '7', fetchFn),
      cache.resolve(EntityKind.SERVICE_LOCATION, 'Sunrise Clinic', '7', fetchFn),
    ]);

    expect([a, b]).toEqual(['31', '31']);
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it('keeps a confirmed miss', async () => {
    const cache = new EntityResolutionCache();
    const fetchFn = vi.fn(async () => null);

    expect(await cache.resolve(EntityKind.PATIENT_CASE, '1001', '', fetchFn)).toBeNull();
    expect(await cache.resolve(EntityKind.PATIENT_CASE, '1001', '', fetchFn)).toBeNull();
    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(cache.has(EntityKind.PATIENT_CASE, '1001')).toBe(true);
  });

  it('keeps a failed fetch without retrying', async () => {
    const cache = new EntityResolutionCache();
    const fetchFn = vi.fn(async (): Promise<string | null> => {
      throw new Error('offline');
    });

    await expect(cache.resolve(EntityKind.PRACTICE, 'A', '', fetchFn)).rejects.toThrow('offline');
    await expect(cache.resolve(EntityKind.PRACTICE, 'A', '', fetchFn)).rejects.toThrow('offline');
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it('separates kinds and contexts', async () => {
    const cache = new EntityResolutionCache();
    await cache.resolve(EntityKind.PROVIDER, 'Jane Carter', '7', async () => '501');
    await cache.resolve(EntityKind.PROVIDER, 'Jane Carter', '8', async () => '601');
    const referring = await cache.resolve(
      EntityKind.REFERRING_PROVIDER,
      'Jane Carter',
      '7',
      async () => ({ npi: '1', providerId: '501', firstName: 'Jane', lastName: 'Carter' }),
    );

    expect(referring).toEqual({ npi: '1', providerId: '501', firstName: 'Jane', lastName: 'Carter' });
    expect(cache.stats().entries).toBe(3);
  });
});
