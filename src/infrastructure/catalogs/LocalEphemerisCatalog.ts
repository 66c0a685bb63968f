import * as Astronomy from 'astronomy-engine';
import type { CatalogLookup, ICatalogClient } from '../../domain/ports/ICatalogClient.js';
import { found, notFound } from '../../domain/ports/ICatalogClient.js';
import type { ObserverLocation } from '../../domain/entities/ObserverLocation.js';
import { createTarget } from '../../domain/entities/Target.js';
import {
  displayBodyName,
  normalizeTargetName,
  toSolarSystemBody,
  type SolarSystemBody,
} from '../../domain/entities/SolarSystem.js';

const BODIES: Record<SolarSystemBody, Astronomy.Body> = {
  sun: Astronomy.Body.Sun,
  moon: Astronomy.Body.Moon,
  mercury: Astronomy.Body.Mercury,
  venus: Astronomy.Body.Venus,
  mars: Astronomy.Body.Mars,
  jupiter: Astronomy.Body.Jupiter,
  saturn: Astronomy.Body.Saturn,
  uranus: Astronomy.Body.Uranus,
  neptune: Astronomy.Body.Neptune,
  pluto: Astronomy.Body.Pluto,
};

function objectTypeOf(body: SolarSystemBody): string {
  switch (body) {
    case 'sun':
      return 'Star';
    case 'moon':
      return 'Satellite';
    case 'pluto':
      return 'Dwarf planet';
    default:
      return 'Planet';
  }
}

/**
 * Sun, Moon and planets computed locally. Positions are apparent of date,
 * topocentric when the observer location is known and geocentric otherwise.
 */
export class LocalEphemerisCatalog implements ICatalogClient {
  readonly name = 'ephemeris';

  constructor(
    private readonly observerLocation: () => ObserverLocation | null = () => null,
    private readonly now: () => Date = () => new Date()
  ) {}

  resolve(query: string): Promise<CatalogLookup> {
    const body = toSolarSystemBody(query);
    if (!body) return Promise.resolve(notFound());

    const date = this.now();
    const location = this.observerLocation();
    const observer = new Astronomy.Observer(
      location?.latitude ?? 0,
      location?.longitude ?? 0,
      location?.elevationMeters ?? 0
    );

    const equatorial = Astronomy.Equator(BODIES[body], date, observer, true, true);
    const illumination = Astronomy.Illumination(BODIES[body], date);

    return Promise.resolve(
      found(
        createTarget({
          name: displayBodyName(body),
          query: normalizeTargetName(query),
          rightAscensionHours: equatorial.ra,
          declinationDegrees: equatorial.dec,
          epoch: 'JNow',
          objectType: objectTypeOf(body),
          magnitude: Math.round(illumination.mag * 100) / 100,
          sourceCatalog: this.name,
          resolvedAt: date.toISOString(),
        })
      )
    );
  }
}
