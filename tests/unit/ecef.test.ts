import { describe, expect, it } from 'vitest';
import {
  ecefDistance,
  ecefToEnu,
  ecefToGeodetic,
  enuToEcef,
  geodeticToEcef,
} from '../../src/transform/ecef.js';
import { ELLIPSOID } from '../../src/transform/ellipsoid.js';
import type { Vector3 } from '../../src/transform/matrix.js';

const samples: Array<[number, number, number]> = [
  [0, 0, 0],
  [2.3522, 48.8566, 35],
  [-122.4194, 37.7749, 100],
  [151.2093, -33.8688, -20],
  [179.9, 89.8, 8848],
  [-179.5, -89.8, 0],
  [45, 10, 400000],
];

describe('geodeticToEcef', () => {
  it('places the equator/prime meridian point on the X axis', () => {
    const [x, y, z] = geodeticToEcef({ longitude: 0, latitude: 0, height: 0 });
    expect(x).toBeCloseTo(ELLIPSOID.a, 6);
    expect(y).toBe(0);
    expect(z).toBe(0);
  });

  it('places the north pole at the semi-minor axis', () => {
    const [x, y, z] = geodeticToEcef({ longitude: 0, latitude: 90, height: 0 });
    expect(Math.abs(x)).toBeLessThan(1e-6);
    expect(y).toBe(0);
    expect(z).toBeCloseTo(6356752.314245179, 6);
  });

  it('adds height along the surface normal', () => {
    const ground = geodeticToEcef({ longitude: 2.3522, latitude: 48.8566, height: 0 });
    const raised = geodeticToEcef({ longitude: 2.3522, latitude: 48.8566, height: 100 });
    expect(ecefDistance(ground, raised)).toBeCloseTo(100, 9);
  });

  it('converts Paris', () => {
    const [x, y, z] = geodeticToEcef({ longitude: 2.3522, latitude: 48.8566, height: 35 });
    expect(x).toBeCloseTo(4200937.804351, 5);
    expect(y).toBeCloseTo(172560.721433, 5);
    expect(z).toBeCloseTo(4780107.699250, 5);
  });
});

describe('ecefToGeodetic', () => {
  it('round-trips geodetic -> ECEF -> geodetic', () => {
    for (const [longitude, latitude, height] of samples) {
      const back = ecefToGeodetic(geodeticToEcef({ longitude, latitude, height }));
      expect(Math.abs(back.longitude - longitude)).toBeLessThan(1e-7);
      expect(Math.abs(back.latitude - latitude)).toBeLessThan(1e-7);
      expect(Math.abs(back.height - height)).toBeLessThan(1e-3);
    }
  });

  it('propagates NaN without throwing', () => {
    const back = ecefToGeodetic([NaN, 0, 0]);
    expect(Number.isNaN(back.longitude)).toBe(true);
    expect(Number.isNaN(back.height)).toBe(true);
  });
});

describe('ecefToEnu / enuToEcef', () => {
  const base = geodeticToEcef({ longitude: 2.3499, latitude: 48.853, height: 35 });

  it('maps the base itself to the origin', () => {
    const enu = ecefToEnu(base, base);
    expect(enu.map(Math.abs)).toEqual([0, 0, 0]);
  });

  it('maps a point straight above the base to pure Up', () => {
    const above = geodeticToEcef({ longitude: 2.3499, latitude: 48.853, height: 135 });
    const [e, n, u] = ecefToEnu(above, base);
    expect(Math.abs(e)).toBeLessThan(1e-6);
    expect(Math.abs(n)).toBeLessThan(1e-6);
    expect(u).toBeCloseTo(100, 6);
  });

  it('expresses a nearby point in the local frame of the base', () => {
    const target = geodeticToEcef({ longitude: 2.2945, latitude: 48.8584, height: 330 });
    const [e, n, u] = ecefToEnu(target, base);
    expect(e).toBeCloseTo(-4065.405555, 4);
    expect(n).toBeCloseTo(602.028612, 4);
    expect(u).toBeCloseTo(293.67845, 4);
  });

  it('points North along the meridian and East along the parallel', () => {
    const equator = geodeticToEcef({ longitude: 0, latitude: 0, height: 0 });
    const north = ecefToEnu(geodeticToEcef({ longitude: 0, latitude: 0.01, height: 0 }), equator);
    const east = ecefToEnu(geodeticToEcef({ longitude: 0.01, latitude: 0, height: 0 }), equator);
    expect(north[1]).toBeGreaterThan(1000);
    expect(Math.abs(north[0])).toBeLessThan(1e-6);
    expect(east[0]).toBeGreaterThan(1000);
    expect(Math.abs(east[1])).toBeLessThan(1e-6);
  });

  it('round-trips ECEF -> ENU -> ECEF for any base', () => {
    const points = samples.map(([longitude, latitude, height]) =>
      geodeticToEcef({ longitude, latitude, height })
    );
    const bases: Vector3[] = [base, points[3], points[4], [1000, -2000, 6300000]];

    for (const b of bases) {
      for (const p of points) {
        const back = enuToEcef(ecefToEnu(p, b), b);
        expect(Math.abs(back[0] - p[0])).toBeLessThan(1e-6);
        expect(Math.abs(back[1] - p[1])).toBeLessThan(1e-6);
        expect(Math.abs(back[2] - p[2])).toBeLessThan(1e-6);
      }
    }
  });

  it('preserves lengths', () => {
    const target = geodeticToEcef({ longitude: 2.2945, latitude: 48.8584, height: 330 });
    const [e, n, u] = ecefToEnu(target, base);
    expect(Math.sqrt(e * e + n * n + u * u)).toBeCloseTo(ecefDistance(target, base), 6);
  });
});
