/**
 * Reference ellipsoid (WGS84 / GRS80 geometry)
 *
 * Fixed for the whole process: every conversion uses these values.
 */

const a = 6378137.0;
const f = 1.0 / 298.257223563;

export const ELLIPSOID = {
  // Semi-major axis (equatorial radius) in meters
  a,

  // Flattening
  f,

  // Semi-minor axis (polar radius) in meters
  b: a * (1 - f),

  // First eccentricity
  e: Math.sqrt(f * (2 - f)),

  // First eccentricity squared
  e2: f * (2 - f),
} as const;

/**
 * Convert degrees to radians
 */
export function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180.0;
}

/**
 * Convert radians to degrees
 */
export function toDegrees(radians: number): number {
  return radians * (180.0 / Math.PI);
}
