import type { CatalogLookup, ICatalogClient } from '../../domain/ports/ICatalogClient.js';
import { found, notFound } from '../../domain/ports/ICatalogClient.js';
import { createTarget } from '../../domain/entities/Target.js';
import { normalizeTargetName } from '../../domain/entities/SolarSystem.js';
import { degreesToHours, fetchCatalogText, type FetchFn } from './httpCatalog.js';

export const SESAME_URL = 'https://cds.unistra.fr/cgi-bin/nph-sesame/-oI/SNV';

export interface SesameRecord {
  name: string | null;
  raDegrees: number;
  decDegrees: number;
  objectType: string | null;
  magnitude: number | null;
}

/**
 * Parse Sesame's percent-tagged text output. Only the first resolver block
 * with a `%J` position line is used.
 *
 *   %J 10.68470833 +41.26875000 = 00:42:44.33 +41:16:07.5
 *   %I.0 M  31
 *   %C.0 G
 *   %M.V 3.44 [~] D ~
 */
export function parseSesameResponse(text: string): SesameRecord | null {
  let position: { ra: number; dec: number } | null = null;
  let name: string | null = null;
  let objectType: string | null = null;
  let magnitude: number | null = null;

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line.startsWith('%J ') && position === null) {
      const [ra, dec] = line.slice(3).trim().split(/\s+/).map(Number);
      if (ra !== undefined && dec !== undefined && Number.isFinite(ra) && Number.isFinite(dec)) {
        position = { ra, dec };
      }
    } else if (line.startsWith('%I.0 ') && name === null) {
      name = line.slice(5).replace(/\s+/g, ' ').trim();
    } else if (line.startsWith('%C.0 ') && objectType === null) {
      objectType = line.slice(5).trim();
    } else if (line.startsWith('%M.V ') && magnitude === null) {
      const value = Number(line.slice(5).trim().split(/\s+/)[0]);
      magnitude = Number.isFinite(value) ? value : null;
    }
  }

  if (!position) return null;
  return { name, raDegrees: position.ra, decDegrees: position.dec, objectType, magnitude };
}

/**
 * CDS Sesame, which fans out to SIMBAD, NED and VizieR itself. Last resort.
 */
export class SesameCatalog implements ICatalogClient {
  readonly name = 'sesame';

  constructor(
    private readonly fetchFn: FetchFn = fetch,
    private readonly baseUrl: string = SESAME_URL
  ) {}

  async resolve(query: string, signal: AbortSignal): Promise<CatalogLookup> {
    const url = `${this.baseUrl}?${encodeURIComponent(query.trim())}`;
    const body = await fetchCatalogText(this.fetchFn, this.name, url, signal);

    const record = parseSesameResponse(body);
    if (!record) return notFound();

    return found(
      createTarget({
        name: record.name ?? query.trim(),
        query: normalizeTargetName(query),
        rightAscensionHours: degreesToHours(record.raDegrees),
        declinationDegrees: record.decDegrees,
        epoch: 'J2000',
        objectType: record.objectType,
        magnitude: record.magnitude,
        sourceCatalog: this.name,
      })
    );
  }
}
