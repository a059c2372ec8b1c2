/**
 * Lambert-93 (SRID 2154)
 *
 * Conic conformal projection of metropolitan France on the GRS80 ellipsoid,
 * with the IGN projection constants.
 */

import type { GeodeticPosition, ProjectedPosition } from '../types.js';
import { toDegrees, toRadians } from './ellipsoid.js';

// First eccentricity of GRS80
const E = 0.08181919106;

// Projection pole, in projected coordinates
const XP = 700000.0;
const YP = 12655612.05;

// Cone constant
const N = 0.725607765053267;

// Projection scale
const C = 11754255.426096;

// Central meridian (3°E) in radians
const LAMBDA0 = 0.0523598775598299;

// Refinements of the inverse latitude; no convergence test
export const LAMBERT93_INVERSE_ITERATIONS = 10;

/**
 * Isometric latitude of a geodetic latitude (radians)
 */
export function isometricLatitude(phi: number): number {
  const esin = E * Math.sin(phi);
  const correction = Math.pow((1 - esin) / (1 + esin), E / 2);
  return Math.log(Math.tan(Math.PI / 4 + phi / 2) * correction);
}

/**
 * Geodetic latitude (radians) of an isometric latitude, by fixed-point
 * refinement from its spherical (Mercator) inverse
 */
export function latitudeFromIsometric(latiso: number): number {
  let phi = 2 * Math.atan(Math.exp(latiso)) - Math.PI / 2;
  for (let i = 0; i < LAMBERT93_INVERSE_ITERATIONS; i++) {
    const esin = E * Math.sin(phi);
    phi = 2 * Math.atan(Math.pow((1 + esin) / (1 - esin), E / 2) * Math.exp(latiso)) - Math.PI / 2;
  }
  return phi;
}

/**
 * Project geodetic coordinates to Lambert-93
 */
export function toLambert93(position: GeodeticPosition): ProjectedPosition {
  const lon = toRadians(position.longitude);
  const latiso = isometricLatitude(toRadians(position.latitude));

  const radius = C * Math.exp(-N * latiso);
  const gamma = N * (lon - LAMBDA0);

  return {
    easting: XP + radius * Math.sin(gamma),
    northing: YP - radius * Math.cos(gamma),
    height: position.height,
  };
}

/**
 * Recover geodetic coordinates from Lambert-93
 */
export function fromLambert93(projected: ProjectedPosition): GeodeticPosition {
  const dx = projected.easting - XP;
  const dy = projected.northing - YP;

  const lon = Math.atan(-dx / dy) / N + LAMBDA0;
  const latiso = -Math.log(Math.sqrt(dx * dx + dy * dy) / C) / N;

  return {
    longitude: toDegrees(lon),
    latitude: toDegrees(latitudeFromIsometric(latiso)),
    height: projected.height,
  };
}
