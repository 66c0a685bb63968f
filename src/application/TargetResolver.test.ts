import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import {
  TargetResolver,
  degreesToDms,
  formatCoordinates,
  hoursToHms,
  suggestAlternatives,
} from './TargetResolver.js';
import type { CatalogLookup, ICatalogClient } from '../domain/ports/ICatalogClient.js';
import { found, notFound } from '../domain/ports/ICatalogClient.js';
import type { ILogger } from '../domain/ports/ILogger.js';
import { createTarget, type Target } from '../domain/entities/Target.js';
import {
  CatalogUnavailableError,
  InvalidInputError,
  TargetNotFoundError,
} from '../domain/errors/TelescopeErrors.js';
import { createMockLogger } from '../test-support/FakeTelescope.js';

type ResolveFn = (query: string, signal: AbortSignal) => Promise<CatalogLookup>;

function makeTarget(name: string, sourceCatalog: string, overrides: Partial<Target> = {}): Target {
  return createTarget({
    name,
    query: name.toLowerCase(),
    rightAscensionHours: 0.712306,
    declinationDegrees: 41.269167,
    epoch: 'J2000',
    objectType: 'Galaxy',
    magnitude: 3.4,
    sourceCatalog,
    ...overrides,
  });
}

function makeClient(name: string, resolve: ResolveFn): ICatalogClient & { resolve: Mock<ResolveFn> } {
  return { name, resolve: vi.fn<ResolveFn>(resolve) };
}

describe('TargetResolver', () => {
  let logger: ILogger;
  let ephemeris: ReturnType<typeof makeClient>;

  beforeEach(() => {
    logger = createMockLogger();
    ephemeris = makeClient('ephemeris', async (query) =>
      query.toLowerCase() === 'sun'
        ? found(makeTarget('Sun', 'ephemeris', { epoch: 'JNow', objectType: 'Star', magnitude: -26.7 }))
        : query.toLowerCase() === 'mars'
          ? found(makeTarget('Mars', 'ephemeris', { epoch: 'JNow', objectType: 'Planet' }))
          : notFound()
    );
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('solar system', () => {
    it('should always annotate the Sun with the solar safety flag', async () => {
      const remote = makeClient('simbad', async () => notFound());
      const resolver = new TargetResolver(ephemeris, [remote], logger);

      const first = await resolver.resolve('sun');
      const second = await resolver.resolve('  SUN ');

      for (const result of [first, second]) {
        expect(result.found).toBe(true);
        if (!result.found) return;
        expect(result.target.solarSafety?.requiresAcknowledgement).toBe(true);
        expect(result.cached).toBe(false);
      }
      expect(remote.resolve).not.toHaveBeenCalled();
      expect(ephemeris.resolve).toHaveBeenCalledTimes(2);
    });

    it('should not flag planets and never cache them', async () => {
      const resolver = new TargetResolver(ephemeris, [], logger);

      const result = await resolver.resolve('Mars');

      expect(result.found).toBe(true);
      if (!result.found) return;
      expect(result.target.solarSafety).toBeUndefined();
      expect(resolver.getCachedTargets()).toEqual([]);
    });

    it('should report not found with alternatives when the ephemeris fails', async () => {
      const broken = makeClient('ephemeris', async () => {
        throw new Error('no ephemeris data');
      });
      const resolver = new TargetResolver(broken, [], logger);

      await expect(resolver.resolve('venus')).resolves.toEqual({
        found: false,
        query: 'venus',
        alternatives: [],
      });
    });
  });

  describe('catalog fallback', () => {
    it('should fall through to the next catalog when the primary is unreachable', async () => {
      const primary = makeClient('deep-sky', async () => {
        throw new CatalogUnavailableError('deep-sky', 'ECONNREFUSED');
      });
      const secondary = makeClient('simbad', async () => found(makeTarget('M 31', 'simbad')));
      const resolver = new TargetResolver(ephemeris, [primary, secondary], logger);

      const result = await resolver.resolve('M31');

      expect(result.found).toBe(true);
      if (!result.found) return;
      expect(result.target.sourceCatalog).toBe('simbad');
      expect(primary.resolve).toHaveBeenCalledTimes(1);
      expect(logger.warn).toHaveBeenCalledWith('Catalog lookup failed, trying next source', {
        catalog: 'deep-sky',
        error: 'Catalog deep-sky unavailable: ECONNREFUSED',
      });
    });

    it('should prefer the higher-priority catalog even when it is slower', async () => {
      vi.useFakeTimers();
      const slow = makeClient(
        'deep-sky',
        () => new Promise((resolve) => setTimeout(() => resolve(found(makeTarget('M31', 'deep-sky'))), 2000))
      );
      const fast = makeClient('simbad', async () => found(makeTarget('M 31', 'simbad')));
      const resolver = new TargetResolver(ephemeris, [slow, fast], logger);

      const pending = resolver.resolve('M31');
      await vi.advanceTimersByTimeAsync(2000);
      const result = await pending;

      expect(result.found && result.target.sourceCatalog).toBe('deep-sky');
      expect(fast.resolve).not.toHaveBeenCalled();
    });

    it('should abort a catalog that exceeds its deadline and move on', async () => {
      vi.useFakeTimers();
      let seenSignal: AbortSignal | undefined;
      const hanging = makeClient('ned', (_query, signal) => {
        seenSignal = signal;
        return new Promise<CatalogLookup>(() => undefined);
      });
      const fallback = makeClient('sesame', async () => found(makeTarget('M 31', 'sesame')));
      const resolver = new TargetResolver(ephemeris, [hanging, fallback], logger, {
        catalogTimeoutMs: 5000,
      });

      const pending = resolver.resolve('M31');
      await vi.advanceTimersByTimeAsync(5000);
      const result = await pending;

      expect(result.found && result.target.sourceCatalog).toBe('sesame');
      expect(seenSignal?.aborted).toBe(true);
    });

    it('should pass the trimmed original spelling to the catalogs', async () => {
      const simbad = makeClient('simbad', async () => notFound());
      const resolver = new TargetResolver(ephemeris, [simbad], logger);

      await resolver.resolve('  Barnard   33 ');

      expect(simbad.resolve).toHaveBeenCalledWith('Barnard 33', expect.any(AbortSignal));
    });
  });

  describe('not found', () => {
    it('should combine cross references with catalog suggestions', async () => {
      const deepSky = makeClient('deep-sky', async () => notFound(['Andromeda Galaxy']));
      const simbad = makeClient('simbad', async () => notFound(['NGC 224', 'M 31']));
      const resolver = new TargetResolver(ephemeris, [deepSky, simbad], logger);

      const result = await resolver.resolve('M31');

      expect(result).toEqual({
        found: false,
        query: 'm31',
        alternatives: ['Messier 31', 'NGC 224', 'Andromeda Galaxy', 'M 31'],
      });
    });

    it('should raise TargetNotFound with the alternatives from resolveOrThrow', async () => {
      const resolver = new TargetResolver(ephemeris, [makeClient('simbad', async () => notFound())], logger);

      const error = await resolver.resolveOrThrow('mar').catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(TargetNotFoundError);
      expect(error).toMatchObject({ targetName: 'mar', alternatives: ['Mars'] });
    });

    it('should reject an empty name', async () => {
      const resolver = new TargetResolver(ephemeris, [], logger);

      await expect(resolver.resolve('   ')).rejects.toBeInstanceOf(InvalidInputError);
    });
  });

  describe('cache', () => {
    it('should serve repeat lookups from the cache under the normalized name', async () => {
      const simbad = makeClient('simbad', async () => found(makeTarget('M 31', 'simbad')));
      const resolver = new TargetResolver(ephemeris, [simbad], logger);

      await resolver.resolve('M31');
      const again = await resolver.resolve('  m31 ');

      expect(again.found && again.cached).toBe(true);
      expect(simbad.resolve).toHaveBeenCalledTimes(1);
      expect(resolver.getCachedTargets()).toEqual(['m31']);
    });

    it('should re-resolve once the TTL has expired', async () => {
      let clock = 0;
      const simbad = makeClient('simbad', async () => found(makeTarget('M 31', 'simbad')));
      const resolver = new TargetResolver(ephemeris, [simbad], logger, {
        cacheTtlMs: 1000,
        now: () => clock,
      });

      await resolver.resolve('M31');
      clock = 999;
      await resolver.resolve('M31');
      expect(simbad.resolve).toHaveBeenCalledTimes(1);

      clock = 1000;
      const refreshed = await resolver.resolve('M31');
      expect(refreshed.found && refreshed.cached).toBe(false);
      expect(simbad.resolve).toHaveBeenCalledTimes(2);
    });

    it('should evict the least recently used entry at capacity', async () => {
      const simbad = makeClient('simbad', async (query) => found(makeTarget(query, 'simbad')));
      const resolver = new TargetResolver(ephemeris, [simbad], logger, { cacheCapacity: 2 });

      await resolver.resolve('M1');
      await resolver.resolve('M2');
      await resolver.resolve('M1');
      await resolver.resolve('M3');

      expect(resolver.getCachedTargets()).toEqual(['m1', 'm3']);
    });

    it('should empty the cache on clearCache', async () => {
      const simbad = makeClient('simbad', async () => found(makeTarget('M 31', 'simbad')));
      const resolver = new TargetResolver(ephemeris, [simbad], logger);
      await resolver.resolve('M31');

      resolver.clearCache();

      expect(resolver.getCachedTargets()).toEqual([]);
    });
  });
});

describe('suggestAlternatives', () => {
  it('should cross-reference Messier and NGC numbers', () => {
    expect(suggestAlternatives('M31')).toEqual(['Messier 31', 'NGC 224']);
    expect(suggestAlternatives('NGC 224')).toEqual(['M31']);
    expect(suggestAlternatives('Messier 57')).toEqual(['NGC 6720']);
  });

  it('should never return the query itself and never more than five', () => {
    expect(suggestAlternatives('s')).toEqual(['Sun', 'Venus', 'Mars', 'Saturn', 'Uranus']);
    expect(suggestAlternatives('Mars', ['mars', 'Phobos'])).toEqual(['Phobos']);
  });
});

describe('coordinate formatting', () => {
  it('should format M31 in sexagesimal notation', () => {
    expect(
      formatCoordinates({ rightAscensionHours: 0.712306, declinationDegrees: 41.269167, epoch: 'J2000' })
    ).toBe('RA: 00h 42m 44.30s, DEC: +41° 16\' 09.00"');
  });

  it('should keep the sign of small negative declinations', () => {
    expect(degreesToDms(-0.5)).toEqual({ sign: -1, degrees: 0, minutes: 30, seconds: 0 });
    expect(
      formatCoordinates({ rightAscensionHours: 5.5, declinationDegrees: -5.5, epoch: 'J2000' })
    ).toBe('RA: 05h 30m 00.00s, DEC: -05° 30\' 00.00"');
  });

  it('should carry rounded seconds into minutes', () => {
    expect(hoursToHms(1.9999999999)).toEqual({ hours: 2, minutes: 0, seconds: 0 });
  });
});
