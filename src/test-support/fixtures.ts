import type { ICatalogClient } from '../domain/ports/ICatalogClient.js';
import { found, notFound } from '../domain/ports/ICatalogClient.js';
import type { ILogger } from '../domain/ports/ILogger.js';
import type { ObserverLocation } from '../domain/entities/ObserverLocation.js';
import { createTarget, type Target } from '../domain/entities/Target.js';
import { normalizeTargetName } from '../domain/entities/SolarSystem.js';
import { TargetResolver } from '../application/TargetResolver.js';

export const LOS_ANGELES: ObserverLocation = {
  latitude: 34.0522,
  longitude: -118.2437,
  elevationMeters: 0,
  timezoneId: 'America/Los_Angeles',
};

/** M31 is at about 54° altitude from Los Angeles at this instant */
export const OCTOBER_EVENING = new Date('2024-10-15T04:00:00Z');
/** ...and about -13° here */
export const OCTOBER_MORNING = new Date('2024-10-15T18:00:00Z');

export const M31 = createTarget({
  name: 'M31 (Andromeda Galaxy)',
  query: 'm31',
  rightAscensionHours: 0.712306,
  declinationDegrees: 41.269167,
  epoch: 'J2000',
  objectType: 'Spiral galaxy',
  magnitude: 3.4,
  sourceCatalog: 'deep-sky',
  resolvedAt: '2024-10-15T04:00:00.000Z',
});

export const SUN = createTarget({
  name: 'Sun',
  query: 'sun',
  rightAscensionHours: 13.35,
  declinationDegrees: -8.6,
  epoch: 'JNow',
  objectType: 'Star',
  magnitude: -26.7,
  sourceCatalog: 'ephemeris',
  resolvedAt: '2024-10-15T04:00:00.000Z',
});

/** Answers from a fixed table keyed by normalized name */
export function tableCatalog(name: string, targets: readonly Target[]): ICatalogClient {
  const byName = new Map(targets.map((target) => [target.query, target]));
  return {
    name,
    resolve: (query) => {
      const target = byName.get(normalizeTargetName(query));
      return Promise.resolve(target ? found(target) : notFound());
    },
  };
}

export function createTestResolver(logger: ILogger, targets: readonly Target[] = [M31]): TargetResolver {
  return new TargetResolver(tableCatalog('ephemeris', [SUN]), [tableCatalog('deep-sky', targets)], logger);
}
