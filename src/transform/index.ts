/**
 * Transform Module
 *
 * Frame conversions (geodetic, ECEF, ENU) and SRID projections on plain
 * positions.
 */

export { ELLIPSOID, toRadians, toDegrees } from './ellipsoid.js';

export {
  geodeticToEcef,
  ecefToGeodetic,
  ecefToEnu,
  enuToEcef,
  ecefDistance,
  primeVerticalRadius,
} from './ecef.js';

export {
  LAMBERT93_SRID,
  parseSrid,
  isSupportedSrid,
  describeSrid,
  utmSridFor,
  projectFromGeodetic,
  projectToGeodetic,
} from './projection.js';

export {
  toLambert93,
  fromLambert93,
  isometricLatitude,
  latitudeFromIsometric,
  LAMBERT93_INVERSE_ITERATIONS,
} from './lambert93.js';

export {
  toUtm,
  fromUtm,
  centralMeridian,
  zoneForLongitude,
  utmDefinition,
} from './utm.js';

export {
  createEcefToEnuRotation,
  createEnuToEcefRotation,
  rotateVector,
  rotateAboutUp,
  add,
  subtract,
  type Matrix3,
  type Vector3,
} from './matrix.js';
