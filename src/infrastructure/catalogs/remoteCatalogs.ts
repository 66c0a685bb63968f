import type { ICatalogClient } from '../../domain/ports/ICatalogClient.js';
import type { FetchFn } from './httpCatalog.js';
import { SimbadCatalog } from './SimbadCatalog.js';
import { NedCatalog } from './NedCatalog.js';
import { SesameCatalog } from './SesameCatalog.js';

/**
 * Online catalogs in lookup order: SIMBAD, then NED, then Sesame as the
 * generic name-resolution fallback.
 */
export function createRemoteCatalogs(fetchFn: FetchFn = fetch): ICatalogClient[] {
  return [new SimbadCatalog(fetchFn), new NedCatalog(fetchFn), new SesameCatalog(fetchFn)];
}
