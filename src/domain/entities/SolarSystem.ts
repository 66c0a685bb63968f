export const SOLAR_SYSTEM_BODIES = [
  'sun',
  'moon',
  'mercury',
  'venus',
  'mars',
  'jupiter',
  'saturn',
  'uranus',
  'neptune',
  'pluto',
] as const;

export type SolarSystemBody = (typeof SOLAR_SYSTEM_BODIES)[number];

/**
 * Lowercase, trimmed and with inner whitespace collapsed. Cache keys and
 * keyword matching both go through this.
 */
export function normalizeTargetName(name: string): string {
  return name.trim().replace(/\s+/g, ' ').toLowerCase();
}

export function toSolarSystemBody(name: string): SolarSystemBody | null {
  const normalized = normalizeTargetName(name);
  return SOLAR_SYSTEM_BODIES.find((body) => body === normalized) ?? null;
}

export function isSolarSystemKeyword(name: string): boolean {
  return toSolarSystemBody(name) !== null;
}

export function displayBodyName(body: SolarSystemBody): string {
  return body.charAt(0).toUpperCase() + body.slice(1);
}
