import { describe, expect, it } from 'vitest';
import {
  LAMBERT93_INVERSE_ITERATIONS,
  fromLambert93,
  isometricLatitude,
  latitudeFromIsometric,
  toLambert93,
} from '../../src/transform/lambert93.js';

describe('Lambert-93', () => {
  it('maps the projection origin (3°E, 46.5°N) to (700000, 6600000)', () => {
    const { easting, northing } = toLambert93({ longitude: 3, latitude: 46.5, height: 0 });
    expect(easting).toBeCloseTo(700000, 3);
    expect(northing).toBeCloseTo(6600000, 3);
  });

  it('projects Paris', () => {
    const projected = toLambert93({ longitude: 2.3522, latitude: 48.8566, height: 35 });
    expect(projected.easting).toBeCloseTo(652469.023, 3);
    expect(projected.northing).toBeCloseTo(6862035.26, 3);
    expect(projected.height).toBe(35);
  });

  it('round-trips points across metropolitan France', () => {
    const points: Array<[number, number]> = [
      [2.3522, 48.8566],
      [-4.4861, 48.3904],
      [7.2619, 43.7102],
      [-1.5536, 43.4832],
      [8.7386, 41.9192],
      [3.0573, 50.6292],
    ];

    for (const [longitude, latitude] of points) {
      const back = fromLambert93(toLambert93({ longitude, latitude, height: 12 }));
      expect(Math.abs(back.longitude - longitude)).toBeLessThan(1e-6);
      expect(Math.abs(back.latitude - latitude)).toBeLessThan(1e-6);
      expect(back.height).toBe(12);
    }
  });

  it('refines the inverse latitude exactly 10 times', () => {
    expect(LAMBERT93_INVERSE_ITERATIONS).toBe(10);

    // Three refinements would leave the latitude about 9e-9 degrees short
    const position = fromLambert93({ easting: 1000000, northing: 6200000, height: 0 });
    expect(position.longitude).toBeCloseTo(6.6668420583769015, 10);
    expect(position.latitude).toBeCloseTo(42.836774864565015, 10);
  });

  it('inverts the isometric latitude', () => {
    const phi = (45 * Math.PI) / 180;
    expect(latitudeFromIsometric(isometricLatitude(phi))).toBeCloseTo(phi, 12);
  });

  it('gives an isometric latitude of 0 at the equator', () => {
    expect(isometricLatitude(0)).toBeCloseTo(0, 15);
  });
});
