/**
 * Local Tangent-Plane Rotations
 *
 * 3x3 matrices stored as 9-element arrays in COLUMN-MAJOR order (gl-matrix
 * layout). gl-matrix is switched to plain Array storage: its Float32Array
 * default would lose centimeters on ECEF magnitudes.
 */

import { glMatrix, mat3, vec3 } from 'gl-matrix';

glMatrix.setMatrixArrayType(Array);

export type Matrix3 = mat3;
export type Vector3 = [number, number, number];

/**
 * Rotation from geocentric (ECEF) axes to local East-North-Up axes at the
 * given geodetic longitude/latitude (radians).
 *
 * Rows of the rotation are the local axes expressed in ECEF:
 * - east  = [-sinλ,       cosλ,       0   ]
 * - north = [-cosλ·sinφ, -sinλ·sinφ,  cosφ]
 * - up    = [ cosλ·cosφ,  sinλ·cosφ,  sinφ]
 */
export function createEcefToEnuRotation(lon: number, lat: number): Matrix3 {
  const sinLon = Math.sin(lon);
  const cosLon = Math.cos(lon);
  const sinLat = Math.sin(lat);
  const cosLat = Math.cos(lat);

  // Column-major: column j holds the j-th ECEF component of east, north, up
  return mat3.fromValues(
    -sinLon, -cosLon * sinLat, cosLon * cosLat,
    cosLon, -sinLon * sinLat, sinLon * cosLat,
    0, cosLat, sinLat
  );
}

/**
 * Rotation from local East-North-Up axes back to ECEF axes (the transpose
 * of createEcefToEnuRotation)
 */
export function createEnuToEcefRotation(lon: number, lat: number): Matrix3 {
  const m = createEcefToEnuRotation(lon, lat);
  return mat3.transpose(mat3.create(), m);
}

/**
 * Rotate a vector by a 3x3 matrix
 */
export function rotateVector(matrix: Matrix3, v: Vector3): Vector3 {
  const result = vec3.transformMat3(vec3.create(), vec3.fromValues(v[0], v[1], v[2]), matrix);
  return [result[0], result[1], result[2]];
}

/**
 * Rotate a vector about the vertical (third) axis by theta radians,
 * counter-clockwise seen from above
 */
export function rotateAboutUp(v: Vector3, theta: number): Vector3 {
  const result = vec3.rotateZ(vec3.create(), vec3.fromValues(v[0], v[1], v[2]), [0, 0, 0], theta);
  return [result[0], result[1], result[2]];
}

export function add(a: Vector3, b: Vector3): Vector3 {
  return [a[0] + b[0], a[1] + b[1], a[2] + b[2]];
}

export function subtract(a: Vector3, b: Vector3): Vector3 {
  return [a[0] - b[0], a[1] - b[1], a[2] - b[2]];
}
