/**
 * Construction of points from raw (x, y, z) triples
 */

import { InputError } from '../utils/errors.js';
import type { CoordsKind } from '../types.js';
import { EcefCoords, EnuCoords, GeoCoords, type Coords } from './coords.js';

const KIND_TOKENS: Record<string, CoordsKind> = {
  ENUCOORDS: 'enu',
  ENU: 'enu',
  GEOCOORDS: 'geo',
  GEO: 'geo',
  ECEFCOORDS: 'ecef',
  ECEF: 'ecef',
};

/**
 * Parse a coordinate kind token (case-insensitive): ENU / ENUCOORDS,
 * GEO / GEOCOORDS, ECEF / ECEFCOORDS
 */
export function parseCoordsKind(token: string): CoordsKind {
  const kind = KIND_TOKENS[token.trim().toUpperCase()];
  if (!kind) {
    throw new InputError(
      `Unknown coordinate kind "${token}". Valid options: ${Object.keys(KIND_TOKENS).join(', ')}`,
      { token }
    );
  }
  return kind;
}

/**
 * Build a point of the given kind from (x, y, z):
 * (E, N, U), (lon, lat, hgt) or (X, Y, Z)
 */
export function makeCoords(x: number, y: number, z: number, kind: string): Coords {
  switch (parseCoordsKind(kind)) {
    case 'enu':
      return new EnuCoords(x, y, z);
    case 'geo':
      return new GeoCoords(x, y, z);
    case 'ecef':
      return new EcefCoords(x, y, z);
  }
}
