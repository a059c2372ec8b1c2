/**
 * Universal Transverse Mercator
 *
 * Inverse projection by the footpoint-latitude series (Snyder's
 * formulation); forward projection through proj4.
 */

import proj4 from 'proj4';
import { ProjectionError } from '../utils/errors.js';
import type { GeodeticPosition, ProjectedPosition } from '../types.js';
import { toDegrees, toRadians } from './ellipsoid.js';

const WGS84 = 'EPSG:4326';

const K0 = 0.9996;
const FALSE_EASTING = 500000;
const SOUTH_FALSE_NORTHING = 10000000;
const R = 6378137;

// Eccentricity squared, as used by the series
const E = 0.00669438;
const E2 = E * E;
const E3 = E2 * E;
const E_P2 = E / (1 - E);

const SQRT_E = Math.sqrt(1 - E);
const _E = (1 - SQRT_E) / (1 + SQRT_E);
const _E2 = _E * _E;
const _E3 = _E2 * _E;
const _E4 = _E3 * _E;
const _E5 = _E4 * _E;

// Meridian arc
const M1 = 1 - E / 4 - (3 * E2) / 64 - (5 * E3) / 256;

// Footpoint latitude series
const P2 = (3 / 2) * _E - (27 / 32) * _E3 + (269 / 512) * _E5;
const P3 = (21 / 16) * _E2 - (55 / 32) * _E4;
const P4 = (151 / 96) * _E3 - (417 / 128) * _E5;
const P5 = (1097 / 512) * _E4;

/**
 * Longitude (degrees) of a zone's central meridian
 */
export function centralMeridian(zone: number): number {
  return (zone - 1) * 6 - 180 + 3;
}

/**
 * Zone number (1-60) containing a longitude in degrees
 */
export function zoneForLongitude(longitude: number): number {
  const normalized = (((longitude + 180) % 360) + 360) % 360;
  return Math.min(Math.floor(normalized / 6) + 1, 60);
}

/**
 * Recover geodetic coordinates from UTM easting/northing in a zone
 */
export function fromUtm(
  projected: ProjectedPosition,
  zone: number,
  northern: boolean
): GeodeticPosition {
  const x = projected.easting - FALSE_EASTING;
  let y = projected.northing;
  if (!northern) {
    y -= SOUTH_FALSE_NORTHING;
  }

  const m = y / K0;
  const mu = m / (R * M1);

  // Footpoint latitude
  const pRad =
    mu +
    P2 * Math.sin(2 * mu) +
    P3 * Math.sin(4 * mu) +
    P4 * Math.sin(6 * mu) +
    P5 * Math.sin(8 * mu);

  const pSin = Math.sin(pRad);
  const pSin2 = pSin * pSin;
  const pCos = Math.cos(pRad);

  const pTan = pSin / pCos;
  const pTan2 = pTan * pTan;
  const pTan4 = pTan2 * pTan2;

  const epSin = 1 - E * pSin2;
  const epSinSqrt = Math.sqrt(1 - E * pSin2);

  const n = R / epSinSqrt;
  const r = (1 - E) / epSin;
  const c = E_P2 * pCos * pCos;
  const c2 = c * c;

  const d = x / (n * K0);
  const d2 = d * d;
  const d3 = d2 * d;
  const d4 = d3 * d;
  const d5 = d4 * d;
  const d6 = d5 * d;

  const latitude =
    pRad -
    (pTan / r) * (d2 / 2 - (d4 / 24) * (5 + 3 * pTan2 + 10 * c - 4 * c2 - 9 * E_P2)) +
    (d6 / 720) * (61 + 90 * pTan2 + 298 * c + 45 * pTan4 - 252 * E_P2 - 3 * c2);

  const longitude =
    (d -
      (d3 / 6) * (1 + 2 * pTan2 + c) +
      (d5 / 120) * (5 - 2 * c + 28 * pTan2 - 3 * c2 + 8 * E_P2 + 24 * pTan4)) /
    pCos;

  return {
    longitude: toDegrees(longitude + toRadians(centralMeridian(zone))),
    latitude: toDegrees(latitude),
    height: projected.height,
  };
}

/**
 * proj4 definition of a WGS84 UTM zone
 */
export function utmDefinition(zone: number, northern: boolean): string {
  const south = northern ? '' : ' +south';
  return `+proj=utm +zone=${zone}${south} +datum=WGS84 +units=m +no_defs`;
}

/**
 * Project geodetic coordinates to UTM easting/northing in a zone
 */
export function toUtm(
  position: GeodeticPosition,
  zone: number,
  northern: boolean
): ProjectedPosition {
  const definition = utmDefinition(zone, northern);

  try {
    const [easting, northing] = proj4(WGS84, definition, [position.longitude, position.latitude]);
    return { easting, northing, height: position.height };
  } catch (error) {
    throw new ProjectionError(
      `Failed to project coordinates from WGS84 to UTM zone ${zone}${northern ? 'N' : 'S'}`,
      { position, zone, northern, error }
    );
  }
}
