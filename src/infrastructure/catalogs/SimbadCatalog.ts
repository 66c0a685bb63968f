import type { CatalogLookup, ICatalogClient } from '../../domain/ports/ICatalogClient.js';
import { found, notFound } from '../../domain/ports/ICatalogClient.js';
import { createTarget } from '../../domain/entities/Target.js';
import { isJsonObject } from '../../domain/entities/TelescopeMessage.js';
import { normalizeTargetName } from '../../domain/entities/SolarSystem.js';
import { CatalogUnavailableError } from '../../domain/errors/TelescopeErrors.js';
import { degreesToHours, fetchCatalogText, parseCatalogJson, type FetchFn } from './httpCatalog.js';

export const SIMBAD_TAP_URL = 'https://simbad.cds.unistra.fr/simbad/sim-tap/sync';

/**
 * ADQL looking the name up among all identifiers and returning the main
 * record plus its V magnitude.
 */
export function buildSimbadQuery(name: string): string {
  const escaped = name.trim().replace(/'/g, "''");
  return [
    'SELECT TOP 1 basic.main_id, basic.ra, basic.dec, basic.otype_txt, allfluxes.V',
    'FROM basic',
    'JOIN ident ON ident.oidref = basic.oid',
    'LEFT JOIN allfluxes ON allfluxes.oidref = basic.oid',
    `WHERE ident.id = '${escaped}'`,
  ].join(' ');
}

/**
 * SIMBAD table access service; JSON result rows are
 * [main_id, ra (deg), dec (deg), otype_txt, V].
 */
export class SimbadCatalog implements ICatalogClient {
  readonly name = 'simbad';

  constructor(
    private readonly fetchFn: FetchFn = fetch,
    private readonly baseUrl: string = SIMBAD_TAP_URL
  ) {}

  async resolve(query: string, signal: AbortSignal): Promise<CatalogLookup> {
    const params = new URLSearchParams({
      request: 'doQuery',
      lang: 'adql',
      format: 'json',
      query: buildSimbadQuery(query),
    });

    const body = await fetchCatalogText(this.fetchFn, this.name, `${this.baseUrl}?${params}`, signal);
    const payload = parseCatalogJson(this.name, body);
    if (!isJsonObject(payload) || !Array.isArray(payload.data)) {
      throw new CatalogUnavailableError(this.name, 'response has no data table');
    }

    const row: unknown = payload.data[0];
    if (!Array.isArray(row)) return notFound();

    const [mainId, ra, dec, objectType, magnitude] = row;
    if (typeof ra !== 'number' || typeof dec !== 'number') return notFound();

    return found(
      createTarget({
        name: typeof mainId === 'string' ? mainId.replace(/\s+/g, ' ').trim() : query.trim(),
        query: normalizeTargetName(query),
        rightAscensionHours: degreesToHours(ra),
        declinationDegrees: dec,
        epoch: 'J2000',
        objectType: typeof objectType === 'string' ? objectType : null,
        magnitude: typeof magnitude === 'number' ? magnitude : null,
        sourceCatalog: this.name,
      })
    );
  }
}
