/**
 * ECEF (Earth-Centered Earth-Fixed) Coordinate Calculations
 *
 * Geodetic <-> ECEF on the reference ellipsoid, and ECEF <-> local
 * East-North-Up relative to a base point given in ECEF.
 */

import type { GeodeticPosition } from '../types.js';
import { ELLIPSOID, toDegrees, toRadians } from './ellipsoid.js';
import {
  add,
  createEcefToEnuRotation,
  createEnuToEcefRotation,
  rotateVector,
  subtract,
  type Vector3,
} from './matrix.js';

/**
 * Radius of curvature in the prime vertical at a latitude (radians)
 */
export function primeVerticalRadius(lat: number): number {
  const esin = ELLIPSOID.e * Math.sin(lat);
  return ELLIPSOID.a / Math.sqrt(1 - esin * esin);
}

/**
 * Convert geodetic coordinates (lon, lat in degrees, height in meters) to
 * ECEF Cartesian coordinates. Closed form.
 */
export function geodeticToEcef(position: GeodeticPosition): Vector3 {
  const lon = toRadians(position.longitude);
  const lat = toRadians(position.latitude);
  const h = position.height;
  const e = ELLIPSOID.e;

  const n = primeVerticalRadius(lat);

  const x = (n + h) * Math.cos(lat) * Math.cos(lon);
  const y = (n + h) * Math.cos(lat) * Math.sin(lon);
  const z = ((1 - e * e) * n + h) * Math.sin(lat);

  return [x, y, z];
}

/**
 * Convert ECEF Cartesian coordinates to geodetic coordinates
 *
 * Bowring's closed form: latitude from the parametric angle of the point,
 * no iteration. Error stays under a millimeter for terrestrial heights.
 */
export function ecefToGeodetic(ecef: Vector3): GeodeticPosition {
  const [x, y, z] = ecef;
  const { a, b } = ELLIPSOID;

  const h = a * a - b * b;
  const p = Math.sqrt(x * x + y * y);
  const t = Math.atan2(z * a, p * b);

  const lon = Math.atan2(y, x);
  const lat = Math.atan2(
    z + (h / b) * Math.pow(Math.sin(t), 3),
    p - (h / a) * Math.pow(Math.cos(t), 3)
  );

  const height = p / Math.cos(lat) - primeVerticalRadius(lat);

  return {
    longitude: toDegrees(lon),
    latitude: toDegrees(lat),
    height,
  };
}

/**
 * Express an ECEF point in the East-North-Up frame of an ECEF base point
 */
export function ecefToEnu(point: Vector3, base: Vector3): Vector3 {
  const origin = ecefToGeodetic(base);
  const rotation = createEcefToEnuRotation(
    toRadians(origin.longitude),
    toRadians(origin.latitude)
  );
  return rotateVector(rotation, subtract(point, base));
}

/**
 * Bring an East-North-Up offset around an ECEF base point back to ECEF
 */
export function enuToEcef(enu: Vector3, base: Vector3): Vector3 {
  const origin = ecefToGeodetic(base);
  const rotation = createEnuToEcefRotation(
    toRadians(origin.longitude),
    toRadians(origin.latitude)
  );
  return add(rotateVector(rotation, enu), base);
}

/**
 * Calculate the distance between two ECEF points
 */
export function ecefDistance(a: Vector3, b: Vector3): number {
  const dx = b[0] - a[0];
  const dy = b[1] - a[1];
  const dz = b[2] - a[2];
  return Math.sqrt(dx * dx + dy * dy + dz * dz);
}
