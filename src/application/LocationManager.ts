import * as Astronomy from 'astronomy-engine';
import type { ILogger } from '../domain/ports/ILogger.js';
import type {
  HorizontalCoordinates,
  LocalTimeInfo,
  ObserverLocation,
  VisibilityResult,
} from '../domain/entities/ObserverLocation.js';
import type { EquatorialCoordinates } from '../domain/entities/Target.js';
import { InvalidInputError, LocationNotConfiguredError } from '../domain/errors/TelescopeErrors.js';

export const MINIMUM_ALTITUDE_DEGREES = 10;

export function isValidTimezone(timezoneId: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: timezoneId });
    return true;
  } catch {
    return false;
  }
}

/**
 * Topocentric altitude/azimuth of a fixed equatorial position. J2000
 * positions are first rotated onto the true equator of date; JNow positions
 * are used as they are. No refraction.
 */
export function toHorizontal(
  location: ObserverLocation,
  coordinates: EquatorialCoordinates,
  at: Date
): HorizontalCoordinates {
  const observer = new Astronomy.Observer(
    location.latitude,
    location.longitude,
    location.elevationMeters
  );

  let ra = coordinates.rightAscensionHours;
  let dec = coordinates.declinationDegrees;
  if (coordinates.epoch === 'J2000') {
    const j2000 = Astronomy.VectorFromSphere(new Astronomy.Spherical(dec, ra * 15, 1), at);
    const ofDate = Astronomy.EquatorFromVector(
      Astronomy.RotateVector(Astronomy.Rotation_EQJ_EQD(at), j2000)
    );
    ra = ofDate.ra;
    dec = ofDate.dec;
  }

  const horizontal = Astronomy.Horizon(at, observer, ra, dec);
  return { altitudeDegrees: horizontal.altitude, azimuthDegrees: horizontal.azimuth };
}

export function classifyAltitude(
  altitudeDegrees: number,
  minimumAltitudeDegrees = MINIMUM_ALTITUDE_DEGREES
): Pick<VisibilityResult, 'isVisible' | 'reason'> {
  return altitudeDegrees >= minimumAltitudeDegrees
    ? { isVisible: true }
    : { isVisible: false, reason: 'below horizon' };
}

/**
 * Pure visibility check for one instant.
 */
export function computeVisibility(
  location: ObserverLocation,
  coordinates: EquatorialCoordinates,
  at: Date,
  minimumAltitudeDegrees = MINIMUM_ALTITUDE_DEGREES
): VisibilityResult {
  const horizontal = toHorizontal(location, coordinates, at);
  return {
    ...horizontal,
    ...classifyAltitude(horizontal.altitudeDegrees, minimumAltitudeDegrees),
    minimumAltitudeDegrees,
    checkedAt: at.toISOString(),
  };
}

interface ZonedParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

function zonedParts(at: Date, timezoneId: string): ZonedParts {
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone: timezoneId,
    year: 'numeric',
    month: 'numeric',
    day: 'numeric',
    hour: 'numeric',
    minute: 'numeric',
    second: 'numeric',
    hourCycle: 'h23',
  });
  const values = new Map(formatter.formatToParts(at).map((part) => [part.type, Number(part.value)]));
  return {
    year: values.get('year') ?? 1970,
    month: values.get('month') ?? 1,
    day: values.get('day') ?? 1,
    hour: values.get('hour') ?? 0,
    minute: values.get('minute') ?? 0,
    second: values.get('second') ?? 0,
  };
}

const pad = (value: number, width = 2): string => String(Math.abs(value)).padStart(width, '0');

function formatOffset(offsetMinutes: number): string {
  const sign = offsetMinutes < 0 ? '-' : '+';
  const absolute = Math.abs(offsetMinutes);
  return `${sign}${pad(Math.floor(absolute / 60))}:${pad(absolute % 60)}`;
}

/**
 * Wall-clock time of `at` in the given zone, as an ISO-8601 string with the
 * zone's offset at that instant (DST aware).
 */
export function localTimeIn(at: Date, timezoneId: string): LocalTimeInfo {
  const parts = zonedParts(at, timezoneId);
  const wallClockAsUtc = Date.UTC(
    parts.year,
    parts.month - 1,
    parts.day,
    parts.hour,
    parts.minute,
    parts.second
  );
  const wholeSeconds = Math.floor(at.getTime() / 1000) * 1000;
  const utcOffsetMinutes = Math.round((wallClockAsUtc - wholeSeconds) / 60000);

  const local =
    `${pad(parts.year, 4)}-${pad(parts.month)}-${pad(parts.day)}` +
    `T${pad(parts.hour)}:${pad(parts.minute)}:${pad(parts.second)}${formatOffset(utcOffsetMinutes)}`;

  return { utc: at.toISOString(), local, timezoneId, utcOffsetMinutes };
}

export interface LocationInfo extends ObserverLocation {
  localTime: LocalTimeInfo;
}

/**
 * Holds the observer position for the lifetime of the process and answers
 * visibility questions against it.
 */
export class LocationManager {
  private location: ObserverLocation | null = null;

  constructor(
    private readonly logger: ILogger,
    private readonly now: () => Date = () => new Date(),
    readonly minimumAltitudeDegrees: number = MINIMUM_ALTITUDE_DEGREES
  ) {}

  get isConfigured(): boolean {
    return this.location !== null;
  }

  getLocation(): ObserverLocation | null {
    return this.location;
  }

  configure(location: ObserverLocation): ObserverLocation {
    const { latitude, longitude, elevationMeters } = location;
    if (!Number.isFinite(latitude) || latitude < -90 || latitude > 90) {
      throw new InvalidInputError('Latitude must be between -90 and 90 degrees', { latitude });
    }
    if (!Number.isFinite(longitude) || longitude < -180 || longitude > 180) {
      throw new InvalidInputError('Longitude must be between -180 and 180 degrees', { longitude });
    }
    if (!Number.isFinite(elevationMeters)) {
      throw new InvalidInputError('Elevation must be a number of metres', { elevationMeters });
    }

    let timezoneId = location.timezoneId.trim() || 'UTC';
    if (!isValidTimezone(timezoneId)) {
      this.logger.warn('Unknown timezone, falling back to UTC', { timezoneId });
      timezoneId = 'UTC';
    }

    this.location = Object.freeze({ latitude, longitude, elevationMeters, timezoneId });
    this.logger.info('Observer location configured', { ...this.location });
    return this.location;
  }

  checkVisible(target: EquatorialCoordinates, at: Date = this.now()): VisibilityResult {
    return computeVisibility(this.requireLocation(), target, at, this.minimumAltitudeDegrees);
  }

  getLocalTime(at: Date = this.now()): LocalTimeInfo {
    return localTimeIn(at, this.location?.timezoneId ?? 'UTC');
  }

  getLocationInfo(at: Date = this.now()): LocationInfo {
    const location = this.requireLocation();
    return { ...location, localTime: localTimeIn(at, location.timezoneId) };
  }

  private requireLocation(): ObserverLocation {
    if (!this.location) {
      throw new LocationNotConfiguredError();
    }
    return this.location;
  }
}
