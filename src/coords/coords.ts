/**
 * Point Coordinates
 *
 * - GeoCoords: geodetic longitude/latitude (degrees) and height (meters)
 * - EcefCoords: Earth-Centered Earth-Fixed X/Y/Z (meters)
 * - EnuCoords: East/North/Up offsets (meters) around a base point that the
 *   caller keeps; the same base must be passed to convert back
 *
 * All three are immutable values. ECEF is the pivot of every cross-frame
 * conversion.
 */

import type { GeodeticPosition, SridCode } from '../types.js';
import { ecefDistance, ecefToEnu, ecefToGeodetic, enuToEcef, geodeticToEcef } from '../transform/ecef.js';
import { rotateAboutUp, type Vector3 } from '../transform/matrix.js';
import { projectFromGeodetic, projectToGeodetic } from '../transform/projection.js';
import { formatFixed } from '../utils/format.js';
import { azimuthOf, elevationOf } from './relations.js';

/** A point with an absolute position (usable as a local frame base) */
export type AbsoluteCoords = GeoCoords | EcefCoords;

/** Anything a point can be made local to: a base point or a projection */
export type FrameBase = AbsoluteCoords | SridCode;

export type Coords = GeoCoords | EcefCoords | EnuCoords;

/**
 * Name a projected coordinate system as a frame base
 */
export function srid(code: number): SridCode {
  return { kind: 'srid', code };
}

function unreachable(value: never): never {
  throw new Error(`Unexpected coordinates: ${JSON.stringify(value)}`);
}

/**
 * Normalize an absolute point to ECEF
 */
export function toEcef(point: AbsoluteCoords): EcefCoords {
  switch (point.kind) {
    case 'geo':
      return point.toEcef();
    case 'ecef':
      return point.clone();
    default:
      return unreachable(point);
  }
}

// ============================================================================
// Geodetic
// ============================================================================

export class GeoCoords {
  readonly kind = 'geo' as const;

  /**
   * @param lon - longitude in decimal degrees
   * @param lat - latitude in decimal degrees
   * @param hgt - height in meters above the ellipsoid
   */
  constructor(
    readonly lon: number,
    readonly lat: number,
    readonly hgt: number = 0
  ) {}

  static fromPosition(position: GeodeticPosition): GeoCoords {
    return new GeoCoords(position.longitude, position.latitude, position.height);
  }

  get x(): number {
    return this.lon;
  }

  get y(): number {
    return this.lat;
  }

  get z(): number {
    return this.hgt;
  }

  toPosition(): GeodeticPosition {
    return { longitude: this.lon, latitude: this.lat, height: this.hgt };
  }

  clone(): GeoCoords {
    return new GeoCoords(this.lon, this.lat, this.hgt);
  }

  hasNaN(): boolean {
    return Number.isNaN(this.lon) || Number.isNaN(this.lat) || Number.isNaN(this.hgt);
  }

  toString(): string {
    return (
      `[lon=${formatFixed(this.lon, 12, 9)}, ` +
      `lat=${formatFixed(this.lat, 11, 9)}, ` +
      `hgt=${formatFixed(this.hgt, 7, 3)}]`
    );
  }

  toEcef(): EcefCoords {
    return EcefCoords.fromVector(geodeticToEcef(this.toPosition()));
  }

  toGeo(): GeoCoords {
    return this.clone();
  }

  /**
   * Express this point in the ENU frame of a base point, or in the
   * projected system named by an SRID (E/N = easting/northing, U = height)
   */
  toEnu(base: FrameBase): EnuCoords {
    if (base.kind === 'srid') {
      return this.toProjected(base.code);
    }
    return this.toEcef().toEnu(base);
  }

  /**
   * Project into the system named by an SRID
   */
  toProjected(code: number): EnuCoords {
    const { easting, northing, height } = projectFromGeodetic(this.toPosition(), code);
    return new EnuCoords(easting, northing, height);
  }

  distanceTo(point: GeoCoords): number {
    return this.toEcef().distanceTo(point.toEcef());
  }

  /**
   * Planimetric distance, measured in the local horizontal plane of this point
   */
  distance2DTo(point: GeoCoords): number {
    return point.toEnu(this).norm2D();
  }

  elevationTo(point: GeoCoords): number {
    return elevationOf(point.toEnu(this));
  }

  azimuthTo(point: GeoCoords): number {
    return azimuthOf(point.toEnu(this));
  }
}

// ============================================================================
// ECEF
// ============================================================================

export class EcefCoords {
  readonly kind = 'ecef' as const;

  constructor(
    readonly X: number,
    readonly Y: number,
    readonly Z: number
  ) {}

  static fromVector(v: Vector3): EcefCoords {
    return new EcefCoords(v[0], v[1], v[2]);
  }

  get x(): number {
    return this.X;
  }

  get y(): number {
    return this.Y;
  }

  get z(): number {
    return this.Z;
  }

  toVector(): Vector3 {
    return [this.X, this.Y, this.Z];
  }

  clone(): EcefCoords {
    return new EcefCoords(this.X, this.Y, this.Z);
  }

  hasNaN(): boolean {
    return Number.isNaN(this.X) || Number.isNaN(this.Y) || Number.isNaN(this.Z);
  }

  toString(): string {
    return (
      `[X=${formatFixed(this.X, 12, 3)}, ` +
      `Y=${formatFixed(this.Y, 12, 3)}, ` +
      `Z=${formatFixed(this.Z, 12, 3)}]`
    );
  }

  toGeo(): GeoCoords {
    return GeoCoords.fromPosition(ecefToGeodetic(this.toVector()));
  }

  toEcef(): EcefCoords {
    return this.clone();
  }

  toEnu(base: AbsoluteCoords): EnuCoords {
    return EnuCoords.fromVector(ecefToEnu(this.toVector(), toEcef(base).toVector()));
  }

  dot(point: EcefCoords): number {
    return this.X * point.X + this.Y * point.Y + this.Z * point.Z;
  }

  norm(): number {
    return Math.sqrt(this.dot(this));
  }

  scale(factor: number): EcefCoords {
    return new EcefCoords(this.X * factor, this.Y * factor, this.Z * factor);
  }

  add(point: EcefCoords): EcefCoords {
    return new EcefCoords(this.X + point.X, this.Y + point.Y, this.Z + point.Z);
  }

  /**
   * Vector difference this - point
   */
  subtract(point: EcefCoords): EcefCoords {
    return new EcefCoords(this.X - point.X, this.Y - point.Y, this.Z - point.Z);
  }

  distanceTo(point: EcefCoords): number {
    return ecefDistance(this.toVector(), point.toVector());
  }

  distance2DTo(point: EcefCoords): number {
    return point.toEnu(this).norm2D();
  }

  elevationTo(point: EcefCoords): number {
    return elevationOf(point.toEnu(this));
  }

  azimuthTo(point: EcefCoords): number {
    return azimuthOf(point.toEnu(this));
  }
}

// ============================================================================
// ENU
// ============================================================================

export class EnuCoords {
  readonly kind = 'enu' as const;

  constructor(
    readonly E: number,
    readonly N: number,
    readonly U: number = 0
  ) {}

  static fromVector(v: Vector3): EnuCoords {
    return new EnuCoords(v[0], v[1], v[2]);
  }

  get x(): number {
    return this.E;
  }

  get y(): number {
    return this.N;
  }

  get z(): number {
    return this.U;
  }

  toVector(): Vector3 {
    return [this.E, this.N, this.U];
  }

  clone(): EnuCoords {
    return new EnuCoords(this.E, this.N, this.U);
  }

  hasNaN(): boolean {
    return Number.isNaN(this.E) || Number.isNaN(this.N) || Number.isNaN(this.U);
  }

  toString(): string {
    return (
      `[E=${formatFixed(this.E, 12, 3)}, ` +
      `N=${formatFixed(this.N, 12, 3)}, ` +
      `U=${formatFixed(this.U, 12, 3)}]`
    );
  }

  /**
   * Back to ECEF, given the base this point was made local to
   */
  toEcef(base: AbsoluteCoords): EcefCoords {
    return EcefCoords.fromVector(enuToEcef(this.toVector(), toEcef(base).toVector()));
  }

  /**
   * Back to geodetic, given the base point this point was made local to, or
   * the SRID of the projected system its E/N come from
   */
  toGeo(base: FrameBase): GeoCoords {
    if (base.kind === 'srid') {
      const position = projectToGeodetic(
        { easting: this.E, northing: this.N, height: this.U },
        base.code
      );
      return GeoCoords.fromPosition(position);
    }
    return this.toEcef(base).toGeo();
  }

  /**
   * Re-base: from the ENU frame of `from` to the ENU frame of `to`, through ECEF
   */
  toEnu(from: AbsoluteCoords, to: AbsoluteCoords): EnuCoords {
    return this.toEcef(from).toEnu(to);
  }

  norm(): number {
    return Math.sqrt(this.E * this.E + this.N * this.N + this.U * this.U);
  }

  /**
   * Planimetric (East/North) norm
   */
  norm2D(): number {
    return Math.sqrt(this.E * this.E + this.N * this.N);
  }

  dot(point: EnuCoords): number {
    return this.E * point.E + this.N * point.N + this.U * point.U;
  }

  add(point: EnuCoords): EnuCoords {
    return new EnuCoords(this.E + point.E, this.N + point.N, this.U + point.U);
  }

  /**
   * Vector difference this - point
   */
  subtract(point: EnuCoords): EnuCoords {
    return new EnuCoords(this.E - point.E, this.N - point.N, this.U - point.U);
  }

  /**
   * Rotate in the horizontal plane by theta radians (counter-clockwise)
   */
  rotate(theta: number): EnuCoords {
    return EnuCoords.fromVector(rotateAboutUp(this.toVector(), theta));
  }

  /**
   * Horizontal homothety; U is kept
   */
  scale(h: number): EnuCoords {
    return new EnuCoords(this.E * h, this.N * h, this.U);
  }

  translate(tx: number, ty: number, tz = 0): EnuCoords {
    return new EnuCoords(this.E + tx, this.N + ty, this.U + tz);
  }

  distanceTo(point: EnuCoords): number {
    return point.subtract(this).norm();
  }

  distance2DTo(point: EnuCoords): number {
    return point.subtract(this).norm2D();
  }

  elevationTo(point: EnuCoords): number {
    return elevationOf(point.subtract(this));
  }

  azimuthTo(point: EnuCoords): number {
    return azimuthOf(point.subtract(this));
  }
}
