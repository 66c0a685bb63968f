/**
 * Geodetic position of the telescope. Longitude is positive east.
 */
export interface ObserverLocation {
  latitude: number;
  longitude: number;
  elevationMeters: number;
  /** IANA zone id, e.g. "America/Los_Angeles" */
  timezoneId: string;
}

export interface HorizontalCoordinates {
  altitudeDegrees: number;
  /** Measured from north through east */
  azimuthDegrees: number;
}

export interface VisibilityResult extends HorizontalCoordinates {
  isVisible: boolean;
  reason?: 'below horizon';
  /** Minimum altitude that was applied */
  minimumAltitudeDegrees: number;
  checkedAt: string;
}

export interface LocalTimeInfo {
  utc: string;
  local: string;
  timezoneId: string;
  /** Current offset from UTC in minutes (DST aware) */
  utcOffsetMinutes: number;
}
