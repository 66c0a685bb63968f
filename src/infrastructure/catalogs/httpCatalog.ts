import { CatalogUnavailableError, errorMessage } from '../../domain/errors/TelescopeErrors.js';

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface CatalogRequest {
  method?: 'GET' | 'POST';
  body?: string;
  headers?: Record<string, string>;
}

const USER_AGENT = 'telescope-bridge/1.0';

/**
 * Fetch a catalog endpoint and return the body text. Network failures,
 * aborts and non-2xx statuses all surface as CatalogUnavailableError.
 */
export async function fetchCatalogText(
  fetchFn: FetchFn,
  catalog: string,
  url: string,
  signal: AbortSignal,
  request: CatalogRequest = {}
): Promise<string> {
  let response: Response;
  try {
    response = await fetchFn(url, {
      method: request.method ?? 'GET',
      body: request.body,
      signal,
      headers: { 'User-Agent': USER_AGENT, ...request.headers },
    });
  } catch (error) {
    throw new CatalogUnavailableError(catalog, signal.aborted ? 'request aborted' : errorMessage(error));
  }

  if (!response.ok) {
    throw new CatalogUnavailableError(catalog, `HTTP ${response.status}`);
  }

  try {
    return await response.text();
  } catch (error) {
    throw new CatalogUnavailableError(catalog, `unreadable body: ${errorMessage(error)}`);
  }
}

export function parseCatalogJson(catalog: string, body: string): unknown {
  try {
    return JSON.parse(body);
  } catch (error) {
    throw new CatalogUnavailableError(catalog, `invalid JSON: ${errorMessage(error)}`);
  }
}

/** Degrees to hours, normalized to [0, 24) */
export function degreesToHours(degrees: number): number {
  const hours = degrees / 15;
  return ((hours % 24) + 24) % 24;
}
