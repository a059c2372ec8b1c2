/**
 * Projection Dispatch by SRID
 *
 * Supported codes:
 * - 2154: Lambert-93
 * - 32601-32660: UTM north, zone = code - 32600
 * - 32701-32760: UTM south, zone = code - 32700
 *
 * Every other code raises UnsupportedProjectionError.
 */

import { UnsupportedProjectionError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { GeodeticPosition, ProjectedPosition, ProjectionDefinition } from '../types.js';
import { fromLambert93, toLambert93 } from './lambert93.js';
import { fromUtm, toUtm, zoneForLongitude } from './utm.js';

const logger = createLogger('projection');

export const LAMBERT93_SRID = 2154;

const UTM_SRID_MIN = 32600;
const UTM_SRID_MAX = 32799;
const UTM_SOUTH_BASE = 32700;

/**
 * Resolve an SRID code to its projection
 */
export function parseSrid(srid: number): ProjectionDefinition {
  if (srid === LAMBERT93_SRID) {
    return { type: 'lambert93', srid: LAMBERT93_SRID };
  }

  if (Number.isInteger(srid) && srid >= UTM_SRID_MIN && srid <= UTM_SRID_MAX) {
    const zone = (srid - UTM_SRID_MIN) % 100;
    if (zone >= 1 && zone <= 60) {
      return { type: 'utm', srid, zone, northern: srid < UTM_SOUTH_BASE };
    }
  }

  throw new UnsupportedProjectionError(srid);
}

/**
 * parseSrid for the projecting entry points, which report rejected codes
 */
function resolveSrid(srid: number): ProjectionDefinition {
  try {
    return parseSrid(srid);
  } catch (error) {
    if (error instanceof UnsupportedProjectionError) {
      logger.warn({ srid }, 'Unsupported SRID code');
    }
    throw error;
  }
}

/**
 * Check whether an SRID code is supported, without throwing
 */
export function isSupportedSrid(srid: number): boolean {
  try {
    parseSrid(srid);
    return true;
  } catch (error) {
    if (error instanceof UnsupportedProjectionError) {
      return false;
    }
    throw error;
  }
}

/**
 * Human-readable name of an SRID code
 */
export function describeSrid(srid: number): string {
  const definition = parseSrid(srid);
  switch (definition.type) {
    case 'lambert93':
      return 'RGF93 / Lambert-93';
    case 'utm':
      return `WGS 84 / UTM zone ${definition.zone}${definition.northern ? 'N' : 'S'}`;
  }
}

/**
 * SRID of the UTM zone containing a geodetic position
 */
export function utmSridFor(longitude: number, latitude: number): number {
  const zone = zoneForLongitude(longitude);
  return (latitude < 0 ? UTM_SOUTH_BASE : UTM_SRID_MIN) + zone;
}

function forward(position: GeodeticPosition, definition: ProjectionDefinition): ProjectedPosition {
  switch (definition.type) {
    case 'lambert93':
      return toLambert93(position);
    case 'utm':
      return toUtm(position, definition.zone, definition.northern);
  }
}

function inverse(projected: ProjectedPosition, definition: ProjectionDefinition): GeodeticPosition {
  switch (definition.type) {
    case 'lambert93':
      return fromLambert93(projected);
    case 'utm':
      return fromUtm(projected, definition.zone, definition.northern);
  }
}

/**
 * Project geodetic coordinates into the system named by an SRID
 */
export function projectFromGeodetic(position: GeodeticPosition, srid: number): ProjectedPosition {
  const projected = forward(position, resolveSrid(srid));
  logger.debug({ position, srid, projected }, 'Projected from geodetic');
  return projected;
}

/**
 * Recover geodetic coordinates from the system named by an SRID
 */
export function projectToGeodetic(projected: ProjectedPosition, srid: number): GeodeticPosition {
  const position = inverse(projected, resolveSrid(srid));
  logger.debug({ projected, srid, position }, 'Projected to geodetic');
  return position;
}
