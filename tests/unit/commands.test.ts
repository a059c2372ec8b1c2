import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { parseArgs, parseTriple } from '../../src/commands/options.js';
import { convertPoint, parsePointLines, resolveFrames, runCommand } from '../../src/commands/run.js';
import { EnuCoords, GeoCoords } from '../../src/coords/index.js';
import { InputError, UnsupportedProjectionError } from '../../src/utils/errors.js';

describe('parseArgs', () => {
  it('reads the command, options and coordinates', () => {
    const options = parseArgs(['convert', '--from', 'GEO', '--to', 'ecef', '-122.5', '37.75', '10']);
    expect(options.command).toBe('convert');
    expect(options.from).toBe('geo');
    expect(options.to).toBe('ecef');
    expect(options.values).toEqual([-122.5, 37.75, 10]);
  });

  it('reads frame options', () => {
    const options = parseArgs([
      'convert', '--base', '2.35,48.85,35', '--base-kind', 'ecef',
      '--target-base', '1,2', '--srid', '2154', '-i', 'points.csv', '-v',
    ]);
    expect(options.base).toEqual([2.35, 48.85, 35]);
    expect(options.baseKind).toBe('ecef');
    expect(options.targetBase).toEqual([1, 2, 0]);
    expect(options.srid).toBe(2154);
    expect(options.input).toBe('points.csv');
    expect(options.verbose).toBe(true);
  });

  it('defaults to geodetic on both sides', () => {
    const options = parseArgs(['--help']);
    expect(options.help).toBe(true);
    expect(options.command).toBeUndefined();
    expect(options.from).toBe('geo');
    expect(options.to).toBe('geo');
    expect(options.baseKind).toBe('geo');
  });

  it('rejects unknown options, commands and kinds', () => {
    expect(() => parseArgs(['--frobnicate'])).toThrow(InputError);
    expect(() => parseArgs(['project'])).toThrow(InputError);
    expect(() => parseArgs(['convert', 'extra'])).toThrow(InputError);
    expect(() => parseArgs(['--from', 'lambert'])).toThrow(InputError);
    expect(() => parseArgs(['--base-kind', 'enu'])).toThrow(InputError);
    expect(() => parseArgs(['--srid', 'abc'])).toThrow(InputError);
  });
});

describe('parseTriple', () => {
  it('accepts comma, semicolon and space separators', () => {
    expect(parseTriple('1,2,3', 'x')).toEqual([1, 2, 3]);
    expect(parseTriple('1; 2; 3', 'x')).toEqual([1, 2, 3]);
    expect(parseTriple('1 2', 'x')).toEqual([1, 2, 0]);
  });

  it('rejects malformed triples', () => {
    expect(() => parseTriple('1', 'x')).toThrow(InputError);
    expect(() => parseTriple('1,2,3,4', 'x')).toThrow(InputError);
    expect(() => parseTriple('1,two,3', 'x')).toThrow(InputError);
    expect(() => parseTriple(undefined, 'x')).toThrow(InputError);
  });
});

describe('parsePointLines', () => {
  it('skips blank lines and comments', () => {
    const points = parsePointLines('# lon,lat,hgt\n2.35,48.85,35\n\n  -1.5 , 43.5 \r\n');
    expect(points).toEqual([
      [2.35, 48.85, 35],
      [-1.5, 43.5, 0],
    ]);
  });

  it('names the offending line', () => {
    expect(() => parsePointLines('1,2,3\nfoo,bar')).toThrow('Invalid number for line 2: "foo"');
  });
});

describe('resolveFrames', () => {
  it('uses the SRID before the base for the ENU side', () => {
    const options = parseArgs(['--from', 'geo', '--to', 'enu', '--srid', '2154', '--base', '2,48,0']);
    expect(resolveFrames(options)).toEqual({ source: undefined, target: { kind: 'srid', code: 2154 } });
  });

  it('uses --base and --target-base when re-basing ENU', () => {
    const options = parseArgs(['--from', 'enu', '--to', 'enu', '--base', '2,48,0', '--target-base', '3,49,0']);
    const frames = resolveFrames(options);
    expect(frames.source).toEqual(new GeoCoords(2, 48, 0));
    expect(frames.target).toEqual(new GeoCoords(3, 49, 0));
  });
});

describe('convertPoint', () => {
  it('requires a frame for ENU', () => {
    expect(() => convertPoint(new GeoCoords(2, 48), 'enu', {})).toThrow(
      'ENU output needs a frame: use --base or --srid'
    );
    expect(() => convertPoint(new EnuCoords(1, 2, 3), 'geo', {})).toThrow(
      'ENU input needs a frame: use --base or --srid'
    );
  });

  it('converts ECEF into a projected frame through geodetic', () => {
    const ecef = new GeoCoords(3, 46.5, 10).toEcef();
    const projected = convertPoint(ecef, 'enu', { target: { kind: 'srid', code: 2154 } });
    expect(projected.x).toBeCloseTo(700000, 3);
    expect(projected.y).toBeCloseTo(6600000, 3);
    expect(projected.z).toBeCloseTo(10, 6);
  });
});

describe('runCommand', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'geoframes-'));
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('converts geodetic to ECEF', async () => {
    const lines = await runCommand(parseArgs(['convert', '--from', 'geo', '--to', 'ecef', '2.3522', '48.8566', '35']));
    expect(lines).toEqual(['[X= 4200937.804, Y=  172560.721, Z= 4780107.699]']);
  });

  it('projects to Lambert-93', async () => {
    const lines = await runCommand(
      parseArgs(['convert', '--from', 'geo', '--to', 'enu', '--srid', '2154', '2.3522', '48.8566', '35'])
    );
    expect(lines).toEqual([
      '# RGF93 / Lambert-93',
      '[E=  652469.023, N= 6862035.260, U=      35.000]',
    ]);
  });

  it('unprojects from UTM', async () => {
    const lines = await runCommand(
      parseArgs(['convert', '--from', 'enu', '--to', 'geo', '--srid', '32631', '500000', '0', '0'])
    );
    expect(lines).toEqual([
      '# WGS 84 / UTM zone 31N',
      '[lon= 3.000000000, lat=0.000000000, hgt=  0.000]',
    ]);
  });

  it('converts every line of an input file', async () => {
    const input = path.join(dir, 'points.csv');
    await fs.writeFile(input, '# lon,lat,hgt\n2.3522,48.8566,35\n0,0,0\n', 'utf-8');

    const lines = await runCommand(parseArgs(['convert', '--from', 'geo', '--to', 'ecef', '--input', input]));
    expect(lines).toEqual([
      '[X= 4200937.804, Y=  172560.721, Z= 4780107.699]',
      '[X= 6378137.000, Y=       0.000, Z=       0.000]',
    ]);
  });

  it('measures between two points', async () => {
    const lines = await runCommand(
      parseArgs(['measure', '--from', 'geo', '2.3499', '48.853', '35', '2.2945', '48.8584', '330'])
    );
    expect(lines).toEqual([
      'distance:   4120.219 m',
      'distance2D: 4109.740 m',
      'elevation:  0.071337874 rad (4.087359 deg)',
      'azimuth:    -1.423779035 rad (-81.576530 deg)',
    ]);
  });

  it('fails on unsupported SRID codes and missing input', async () => {
    await expect(
      runCommand(parseArgs(['convert', '--from', 'geo', '--to', 'enu', '--srid', '9999', '2', '48', '0']))
    ).rejects.toThrow(UnsupportedProjectionError);
    await expect(runCommand(parseArgs(['convert', '--from', 'geo', '--to', 'ecef', '1', '2']))).rejects.toThrow(
      'Expected 3 coordinates, got 2'
    );
    await expect(runCommand(parseArgs([]))).rejects.toThrow('A command is required: convert or measure');
  });
});
