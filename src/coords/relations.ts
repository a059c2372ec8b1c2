/**
 * Relational queries between two points of the same kind
 *
 * Every query reduces to the sight vector from the first point to the
 * second, expressed in the ENU frame of the first.
 */

import { InputError } from '../utils/errors.js';
import type { Coords, EnuCoords } from './coords.js';

export interface Relation {
  /** 3D distance in meters */
  distance: number;

  /** Planimetric distance in meters, in the horizontal plane of the first point */
  distance2D: number;

  /** Elevation angle of the second point seen from the first, radians */
  elevation: number;

  /** Azimuth of the second point seen from the first, radians from north */
  azimuth: number;
}

/**
 * Elevation angle (radians) of a sight vector above the local horizontal
 * plane; 0 for a zero vector
 */
export function elevationOf(sight: EnuCoords): number {
  return Math.atan2(sight.U, sight.norm2D());
}

/**
 * Azimuth (radians, clockwise from local north, in (-π, π]) of a sight
 * vector; 0 for a zero vector
 */
export function azimuthOf(sight: EnuCoords): number {
  return Math.atan2(sight.E, sight.N);
}

function kindMismatch(from: Coords, to: Coords): InputError {
  return new InputError(
    `Cannot relate ${from.kind} coordinates to ${to.kind} coordinates`,
    { from: from.kind, to: to.kind }
  );
}

/**
 * Run every relational query from one point to another of the same kind
 */
export function relate(from: Coords, to: Coords): Relation {
  switch (from.kind) {
    case 'geo':
      if (to.kind !== 'geo') throw kindMismatch(from, to);
      return {
        distance: from.distanceTo(to),
        distance2D: from.distance2DTo(to),
        elevation: from.elevationTo(to),
        azimuth: from.azimuthTo(to),
      };
    case 'ecef':
      if (to.kind !== 'ecef') throw kindMismatch(from, to);
      return {
        distance: from.distanceTo(to),
        distance2D: from.distance2DTo(to),
        elevation: from.elevationTo(to),
        azimuth: from.azimuthTo(to),
      };
    case 'enu':
      if (to.kind !== 'enu') throw kindMismatch(from, to);
      return {
        distance: from.distanceTo(to),
        distance2D: from.distance2DTo(to),
        elevation: from.elevationTo(to),
        azimuth: from.azimuthTo(to),
      };
  }
}
