import type { Target } from '../entities/Target.js';

export type CatalogLookup =
  | { status: 'found'; target: Target }
  | { status: 'not-found'; suggestions: string[] };

/**
 * One source able to map a name to coordinates. Clients throw
 * CatalogUnavailableError when the source cannot be reached; the resolver
 * treats that as "try the next one".
 */
export interface ICatalogClient {
  readonly name: string;
  /** Overrides the resolver's default per-client timeout */
  readonly timeoutMs?: number;
  resolve(query: string, signal: AbortSignal): Promise<CatalogLookup>;
}

export const notFound = (suggestions: string[] = []): CatalogLookup => ({
  status: 'not-found',
  suggestions,
});

export const found = (target: Target): CatalogLookup => ({ status: 'found', target });
