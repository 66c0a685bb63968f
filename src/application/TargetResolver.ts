import type { CatalogLookup, ICatalogClient } from '../domain/ports/ICatalogClient.js';
import type { ILogger } from '../domain/ports/ILogger.js';
import {
  SOLAR_SAFETY_WARNING,
  createTarget,
  type EquatorialCoordinates,
  type Target,
  type TargetSearchResult,
} from '../domain/entities/Target.js';
import {
  SOLAR_SYSTEM_BODIES,
  displayBodyName,
  isSolarSystemKeyword,
  normalizeTargetName,
} from '../domain/entities/SolarSystem.js';
import {
  CatalogUnavailableError,
  InvalidInputError,
  TargetNotFoundError,
  errorMessage,
} from '../domain/errors/TelescopeErrors.js';
import { LruTtlCache } from '../infrastructure/catalogs/LruTtlCache.js';

export interface TargetResolverOptions {
  /** Default 24 h */
  cacheTtlMs?: number;
  cacheCapacity?: number;
  /** Per-client deadline unless the client sets its own */
  catalogTimeoutMs?: number;
  now?: () => number;
}

const MAX_ALTERNATIVES = 5;

const MESSIER_TO_NGC = new Map<number, number>([
  [1, 1952],
  [31, 224],
  [42, 1976],
  [45, 1432],
  [51, 5194],
  [57, 6720],
  [81, 3031],
  [82, 3034],
  [101, 5457],
  [104, 4594],
]);

const NGC_TO_MESSIER = new Map<number, number>(
  [...MESSIER_TO_NGC].map(([messier, ngc]) => [ngc, messier])
);

/**
 * Names worth trying when a lookup came back empty: partial solar system
 * matches, Messier/NGC cross references and whatever the catalogs offered.
 * Never the query itself, no duplicates, at most five.
 */
export function suggestAlternatives(name: string, fromCatalogs: readonly string[] = []): string[] {
  const query = normalizeTargetName(name);
  const candidates: string[] = [];

  if (query.length > 0) {
    for (const body of SOLAR_SYSTEM_BODIES) {
      if (body.includes(query) || query.includes(body)) {
        candidates.push(displayBodyName(body));
      }
    }
  }

  const messier = /^(?:m|messier)\s*(\d{1,3})$/.exec(query);
  if (messier) {
    const number = Number(messier[1]);
    candidates.push(`Messier ${number}`);
    const ngc = MESSIER_TO_NGC.get(number);
    if (ngc !== undefined) candidates.push(`NGC ${ngc}`);
  }

  const ngc = /^ngc\s*(\d{1,4})$/.exec(query);
  if (ngc) {
    const messierNumber = NGC_TO_MESSIER.get(Number(ngc[1]));
    if (messierNumber !== undefined) candidates.push(`M${messierNumber}`);
  }

  candidates.push(...fromCatalogs);

  const seen = new Set<string>([query]);
  const alternatives: string[] = [];
  for (const candidate of candidates) {
    const key = normalizeTargetName(candidate);
    if (key.length === 0 || seen.has(key)) continue;
    seen.add(key);
    alternatives.push(candidate);
    if (alternatives.length >= MAX_ALTERNATIVES) break;
  }
  return alternatives;
}

export interface Sexagesimal {
  sign: 1 | -1;
  whole: number;
  minutes: number;
  seconds: number;
}

/**
 * Split a value into whole units, minutes and seconds rounded to 0.01 s,
 * carrying so that seconds never print as 60.00.
 */
function toSexagesimal(value: number): Sexagesimal {
  const sign = value < 0 ? -1 : 1;
  const centiseconds = Math.round(Math.abs(value) * 360000);
  const whole = Math.floor(centiseconds / 360000);
  const minutes = Math.floor((centiseconds % 360000) / 6000);
  const seconds = (centiseconds % 6000) / 100;
  return { sign, whole, minutes, seconds };
}

export function hoursToHms(hours: number): { hours: number; minutes: number; seconds: number } {
  const { whole, minutes, seconds } = toSexagesimal(hours);
  return { hours: whole % 24, minutes, seconds };
}

export function degreesToDms(degrees: number): {
  sign: 1 | -1;
  degrees: number;
  minutes: number;
  seconds: number;
} {
  const { sign, whole, minutes, seconds } = toSexagesimal(degrees);
  return { sign, degrees: whole, minutes, seconds };
}

const pad2 = (value: number): string => String(value).padStart(2, '0');
const padSeconds = (value: number): string => value.toFixed(2).padStart(5, '0');

/**
 * e.g. `RA: 00h 42m 44.30s, DEC: +41° 16' 09.00"`
 */
export function formatCoordinates(coordinates: EquatorialCoordinates): string {
  const ra = hoursToHms(coordinates.rightAscensionHours);
  const dec = degreesToDms(coordinates.declinationDegrees);
  return (
    `RA: ${pad2(ra.hours)}h ${pad2(ra.minutes)}m ${padSeconds(ra.seconds)}s, ` +
    `DEC: ${dec.sign < 0 ? '-' : '+'}${pad2(dec.degrees)}° ${pad2(dec.minutes)}' ${padSeconds(dec.seconds)}"`
  );
}

/**
 * Maps a human-given name to coordinates.
 *
 * Solar system keywords go to the local ephemeris only and are never cached.
 * Everything else walks the catalog list in order; the first match wins and
 * a failing catalog just hands over to the next one.
 */
export class TargetResolver {
  private readonly cache: LruTtlCache<string, Target>;
  private readonly catalogTimeoutMs: number;

  constructor(
    private readonly ephemeris: ICatalogClient,
    private readonly catalogs: readonly ICatalogClient[],
    private readonly logger: ILogger,
    options: TargetResolverOptions = {}
  ) {
    this.cache = new LruTtlCache<string, Target>({
      ttlMs: options.cacheTtlMs ?? 24 * 60 * 60 * 1000,
      capacity: options.cacheCapacity ?? 256,
      now: options.now,
    });
    this.catalogTimeoutMs = options.catalogTimeoutMs ?? 10000;
  }

  get catalogNames(): string[] {
    return [this.ephemeris.name, ...this.catalogs.map((client) => client.name)];
  }

  async resolve(name: string): Promise<TargetSearchResult> {
    const displayName = name.trim().replace(/\s+/g, ' ');
    const query = normalizeTargetName(name);
    if (query.length === 0) {
      throw new InvalidInputError('Target name must not be empty');
    }

    this.logger.info('Resolving target', { query });

    const cached = this.cache.get(query);
    if (cached) {
      this.logger.debug('Target cache hit', { query, sourceCatalog: cached.sourceCatalog });
      return { found: true, query, target: cached, cached: true };
    }

    if (isSolarSystemKeyword(query)) {
      const lookup = await this.lookup(this.ephemeris, displayName);
      if (lookup?.status === 'found') {
        return { found: true, query, target: this.applySolarPolicy(lookup.target), cached: false };
      }
      return { found: false, query, alternatives: suggestAlternatives(displayName) };
    }

    const catalogSuggestions: string[] = [];
    for (const client of this.catalogs) {
      const lookup = await this.lookup(client, displayName);
      if (!lookup) continue;

      if (lookup.status === 'found') {
        const target = this.applySolarPolicy(lookup.target);
        this.cache.set(query, target);
        this.logger.info('Target resolved', {
          query,
          name: target.name,
          sourceCatalog: target.sourceCatalog,
        });
        return { found: true, query, target, cached: false };
      }
      catalogSuggestions.push(...lookup.suggestions);
    }

    const alternatives = suggestAlternatives(displayName, catalogSuggestions);
    this.logger.info('Target not found in any catalog', { query, alternatives });
    return { found: false, query, alternatives };
  }

  async resolveOrThrow(name: string): Promise<Target> {
    const result = await this.resolve(name);
    if (!result.found) {
      throw new TargetNotFoundError(name.trim(), result.alternatives);
    }
    return result.target;
  }

  getCachedTargets(): string[] {
    return this.cache.keys();
  }

  clearCache(): void {
    this.cache.clear();
    this.logger.info('Target cache cleared');
  }

  private applySolarPolicy(target: Target): Target {
    if (normalizeTargetName(target.name) !== 'sun' && normalizeTargetName(target.query) !== 'sun') {
      return target;
    }
    return createTarget({
      ...target,
      solarSafety: { requiresAcknowledgement: true, warning: SOLAR_SAFETY_WARNING },
    });
  }

  /**
   * One client, bounded by its deadline. Returns null when the client is
   * unavailable so the caller moves on.
   */
  private async lookup(client: ICatalogClient, name: string): Promise<CatalogLookup | null> {
    const timeoutMs = client.timeoutMs ?? this.catalogTimeoutMs;
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new CatalogUnavailableError(client.name, `no answer within ${timeoutMs}ms`));
      }, timeoutMs);
    });

    try {
      return await Promise.race([client.resolve(name, controller.signal), deadline]);
    } catch (error) {
      this.logger.warn('Catalog lookup failed, trying next source', {
        catalog: client.name,
        error: errorMessage(error),
      });
      return null;
    } finally {
      clearTimeout(timer);
    }
  }
}
