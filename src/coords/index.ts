/**
 * Coordinates Module
 *
 * Point value types and the relational queries defined on them.
 */

export {
  GeoCoords,
  EcefCoords,
  EnuCoords,
  srid,
  toEcef,
  type AbsoluteCoords,
  type FrameBase,
  type Coords,
} from './coords.js';

export { makeCoords, parseCoordsKind } from './make.js';

export { elevationOf, azimuthOf, relate, type Relation } from './relations.js';
