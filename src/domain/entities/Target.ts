/**
 * Coordinate epoch. Catalog positions are J2000; ephemeris positions are
 * apparent positions of date ("JNow").
 */
export type CoordinateEpoch = 'J2000' | 'JNow';

export interface EquatorialCoordinates {
  /** Right ascension in hours [0, 24) */
  readonly rightAscensionHours: number;
  /** Declination in degrees [-90, 90] */
  readonly declinationDegrees: number;
  readonly epoch: CoordinateEpoch;
}

/**
 * Attached to targets that must not be pointed at without operator
 * acknowledgement (the Sun).
 */
export interface SolarSafetyNotice {
  readonly requiresAcknowledgement: true;
  readonly warning: string;
}

export interface Target extends EquatorialCoordinates {
  /** Display name (canonical form returned by the catalog) */
  readonly name: string;
  /** Query that produced this target, normalized */
  readonly query: string;
  readonly objectType: string | null;
  readonly magnitude: number | null;
  /** Name of the catalog client that answered */
  readonly sourceCatalog: string;
  readonly resolvedAt: string;
  readonly solarSafety?: SolarSafetyNotice;
}

export type TargetSearchResult =
  | {
      found: true;
      query: string;
      target: Target;
      cached: boolean;
    }
  | {
      found: false;
      query: string;
      alternatives: string[];
    };

export const SOLAR_SAFETY_WARNING =
  'SOLAR OBSERVATION: ensure a proper solar filter is installed before pointing at the Sun';

export function createTarget(fields: Omit<Target, 'resolvedAt'> & { resolvedAt?: string }): Target {
  return Object.freeze({
    ...fields,
    resolvedAt: fields.resolvedAt ?? new Date().toISOString(),
  });
}

export function requiresSolarAcknowledgement(target: Target): boolean {
  return target.solarSafety?.requiresAcknowledgement === true;
}
