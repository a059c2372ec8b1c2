/**
 * geoframes
 *
 * Point conversions between geodetic, ECEF and local East-North-Up frames,
 * with Lambert-93 (SRID 2154) and UTM (SRID 326xx/327xx) projections as
 * alternate local frames.
 */

// Point types
export {
  GeoCoords,
  EcefCoords,
  EnuCoords,
  srid,
  toEcef,
  makeCoords,
  parseCoordsKind,
  relate,
  elevationOf,
  azimuthOf,
  type AbsoluteCoords,
  type FrameBase,
  type Coords,
  type Relation,
} from './coords/index.js';

// Types
export type {
  GeodeticPosition,
  ProjectedPosition,
  CoordsKind,
  SridCode,
  ProjectionDefinition,
  Lambert93Definition,
  UtmDefinition,
} from './types.js';

// Transform utilities
export {
  ELLIPSOID,
  toRadians,
  toDegrees,
  geodeticToEcef,
  ecefToGeodetic,
  ecefToEnu,
  enuToEcef,
  ecefDistance,
  primeVerticalRadius,
  LAMBERT93_SRID,
  parseSrid,
  isSupportedSrid,
  describeSrid,
  utmSridFor,
  projectFromGeodetic,
  projectToGeodetic,
  toLambert93,
  fromLambert93,
  toUtm,
  fromUtm,
  centralMeridian,
  zoneForLongitude,
  type Vector3,
  type Matrix3,
} from './transform/index.js';

// Error types
export {
  GeoFramesError,
  InputError,
  UnsupportedProjectionError,
  ProjectionError,
} from './utils/errors.js';

// Formatting
export { formatFixed, isNaNValue } from './utils/format.js';

// Logger
export { createLogger } from './utils/logger.js';
