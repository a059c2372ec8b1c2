/**
 * geoframes Type Definitions
 */

// ============================================================================
// Positions
// ============================================================================

export interface GeodeticPosition {
  longitude: number;  // degrees
  latitude: number;   // degrees
  height: number;     // meters above the reference ellipsoid
}

export interface ProjectedPosition {
  easting: number;    // meters
  northing: number;   // meters
  height: number;     // meters, passed through unchanged
}

// ============================================================================
// Frames
// ============================================================================

/** The three point representations */
export type CoordsKind = 'geo' | 'ecef' | 'enu';

/**
 * A projected coordinate system named by its SRID, usable wherever a local
 * frame base is accepted
 */
export interface SridCode {
  kind: 'srid';
  code: number;
}

// ============================================================================
// Projections
// ============================================================================

export interface Lambert93Definition {
  type: 'lambert93';
  srid: 2154;
}

export interface UtmDefinition {
  type: 'utm';
  srid: number;

  /** Zone number, 1-60 */
  zone: number;

  /** Northern hemisphere (326xx) or southern (327xx) */
  northern: boolean;
}

export type ProjectionDefinition = Lambert93Definition | UtmDefinition;
