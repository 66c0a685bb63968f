import type { CatalogLookup, ICatalogClient } from '../../domain/ports/ICatalogClient.js';
import { found, notFound } from '../../domain/ports/ICatalogClient.js';
import { createTarget } from '../../domain/entities/Target.js';
import { isJsonObject } from '../../domain/entities/TelescopeMessage.js';
import { normalizeTargetName } from '../../domain/entities/SolarSystem.js';
import { CatalogUnavailableError } from '../../domain/errors/TelescopeErrors.js';
import { degreesToHours, fetchCatalogText, parseCatalogJson, type FetchFn } from './httpCatalog.js';

export const NED_LOOKUP_URL = 'https://ned.ipac.caltech.edu/srs/ObjectLookup';

/** ObjectLookup ResultCode for "known object with a position" */
const NED_OBJECT_FOUND = 3;

/**
 * NASA/IPAC Extragalactic Database name lookup. Strong on galaxies, weak on
 * galactic objects, so it sits after SIMBAD.
 */
export class NedCatalog implements ICatalogClient {
  readonly name = 'ned';

  constructor(
    private readonly fetchFn: FetchFn = fetch,
    private readonly baseUrl: string = NED_LOOKUP_URL
  ) {}

  async resolve(query: string, signal: AbortSignal): Promise<CatalogLookup> {
    const form = new URLSearchParams({ json: JSON.stringify({ name: { v: query.trim() } }) });

    const body = await fetchCatalogText(this.fetchFn, this.name, this.baseUrl, signal, {
      method: 'POST',
      body: form.toString(),
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
    });
    const payload = parseCatalogJson(this.name, body);
    if (!isJsonObject(payload) || typeof payload.ResultCode !== 'number') {
      throw new CatalogUnavailableError(this.name, 'response has no ResultCode');
    }
    if (payload.ResultCode !== NED_OBJECT_FOUND || !isJsonObject(payload.Preferred)) {
      return notFound();
    }

    const preferred = payload.Preferred;
    const position = preferred.Position;
    if (!isJsonObject(position) || typeof position.RA !== 'number' || typeof position.Dec !== 'number') {
      return notFound();
    }

    const objectType = isJsonObject(preferred.ObjType) ? preferred.ObjType.Value : undefined;

    return found(
      createTarget({
        name: typeof preferred.Name === 'string' ? preferred.Name : query.trim(),
        query: normalizeTargetName(query),
        rightAscensionHours: degreesToHours(position.RA),
        declinationDegrees: position.Dec,
        epoch: 'J2000',
        objectType: typeof objectType === 'string' ? objectType : null,
        magnitude: null,
        sourceCatalog: this.name,
      })
    );
  }
}
