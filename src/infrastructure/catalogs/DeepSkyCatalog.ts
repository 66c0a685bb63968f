import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import type { CatalogLookup, ICatalogClient } from '../../domain/ports/ICatalogClient.js';
import { found, notFound } from '../../domain/ports/ICatalogClient.js';
import { createTarget } from '../../domain/entities/Target.js';
import { isJsonObject } from '../../domain/entities/TelescopeMessage.js';
import { normalizeTargetName } from '../../domain/entities/SolarSystem.js';

export interface DeepSkyEntry {
  id: string;
  messier: number;
  ngc: number | null;
  names: string[];
  type: string;
  /** J2000, hours */
  ra: number;
  /** J2000, degrees */
  dec: number;
  magnitude: number | null;
}

export const DEFAULT_DEEP_SKY_CATALOG_PATH = fileURLToPath(
  new URL('../../../data/messier-catalog.json', import.meta.url)
);

const MESSIER_PATTERN = /^(?:m|messier)\s*(\d{1,3})$/;
const NGC_PATTERN = /^ngc\s*(\d{1,4})$/;
const MAX_SUGGESTIONS = 5;

function isDeepSkyEntry(entry: unknown): entry is DeepSkyEntry {
  if (!isJsonObject(entry)) return false;
  return (
    typeof entry.id === 'string' &&
    typeof entry.messier === 'number' &&
    (entry.ngc === null || typeof entry.ngc === 'number') &&
    Array.isArray(entry.names) &&
    entry.names.every((name) => typeof name === 'string') &&
    typeof entry.type === 'string' &&
    typeof entry.ra === 'number' &&
    entry.ra >= 0 &&
    entry.ra < 24 &&
    typeof entry.dec === 'number' &&
    entry.dec >= -90 &&
    entry.dec <= 90 &&
    (entry.magnitude === null || typeof entry.magnitude === 'number')
  );
}

/**
 * Bundled Messier catalogue, matched by Messier number, NGC number or
 * common name. Answers without network access.
 */
export class DeepSkyCatalog implements ICatalogClient {
  readonly name = 'deep-sky';
  private readonly byMessier = new Map<number, DeepSkyEntry>();
  private readonly byNgc = new Map<number, DeepSkyEntry>();
  private readonly byName = new Map<string, DeepSkyEntry>();

  constructor(private readonly entries: readonly DeepSkyEntry[]) {
    for (const entry of entries) {
      this.byMessier.set(entry.messier, entry);
      if (entry.ngc !== null) this.byNgc.set(entry.ngc, entry);
      for (const name of entry.names) this.byName.set(normalizeTargetName(name), entry);
    }
  }

  static fromFile(path: string = DEFAULT_DEEP_SKY_CATALOG_PATH): DeepSkyCatalog {
    const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
    if (!Array.isArray(parsed)) {
      throw new Error(`Deep-sky catalog ${path} must contain a JSON array`);
    }
    const invalid = parsed.findIndex((entry) => !isDeepSkyEntry(entry));
    if (invalid >= 0) {
      throw new Error(`Deep-sky catalog ${path} has an invalid entry at index ${invalid}`);
    }
    return new DeepSkyCatalog(parsed.filter(isDeepSkyEntry));
  }

  get size(): number {
    return this.entries.length;
  }

  lookup(query: string): DeepSkyEntry | undefined {
    const normalized = normalizeTargetName(query);

    const messier = MESSIER_PATTERN.exec(normalized);
    if (messier?.[1]) return this.byMessier.get(Number(messier[1]));

    const ngc = NGC_PATTERN.exec(normalized);
    if (ngc?.[1]) return this.byNgc.get(Number(ngc[1]));

    return this.byName.get(normalized);
  }

  /**
   * Common names containing the query, e.g. "whirlpool" → "Whirlpool Galaxy".
   */
  suggest(query: string): string[] {
    const normalized = normalizeTargetName(query);
    if (normalized.length < 3) return [];

    const suggestions: string[] = [];
    for (const entry of this.entries) {
      const name = entry.names.find((candidate) =>
        normalizeTargetName(candidate).includes(normalized)
      );
      if (name) suggestions.push(name);
      if (suggestions.length >= MAX_SUGGESTIONS) break;
    }
    return suggestions;
  }

  resolve(query: string): Promise<CatalogLookup> {
    const entry = this.lookup(query);
    if (!entry) return Promise.resolve(notFound(this.suggest(query)));

    return Promise.resolve(
      found(
        createTarget({
          name: entry.names[0] ? `${entry.id} (${entry.names[0]})` : entry.id,
          query: normalizeTargetName(query),
          rightAscensionHours: entry.ra,
          declinationDegrees: entry.dec,
          epoch: 'J2000',
          objectType: entry.type,
          magnitude: entry.magnitude,
          sourceCatalog: this.name,
        })
      )
    );
  }
}
