/**
 * Command execution
 *
 * Turns parsed options into output lines; printing and exit codes are left
 * to the CLI entry point.
 */

import * as fs from 'fs/promises';
import { createLogger } from '../utils/logger.js';
import { InputError } from '../utils/errors.js';
import type { CoordsKind } from '../types.js';
import {
  EcefCoords,
  GeoCoords,
  makeCoords,
  relate,
  srid,
  toEcef,
  type AbsoluteCoords,
  type Coords,
  type FrameBase,
} from '../coords/index.js';
import { toDegrees } from '../transform/ellipsoid.js';
import { describeSrid } from '../transform/projection.js';
import type { CliOptions } from './options.js';
import { parseTriple } from './options.js';

const logger = createLogger('commands');

/**
 * Frames an ENU point can be local to, on either side of a conversion
 */
export interface ConversionFrames {
  source?: FrameBase;
  target?: FrameBase;
}

function makeBase(triple: [number, number, number], kind: 'geo' | 'ecef'): AbsoluteCoords {
  const [x, y, z] = triple;
  return kind === 'geo' ? new GeoCoords(x, y, z) : new EcefCoords(x, y, z);
}

/**
 * Work out the frames of a conversion from the options
 *
 * --srid, else --base, is the ENU frame of whichever side is ENU. When both
 * sides are ENU, --base is the source and --target-base the target.
 */
export function resolveFrames(options: CliOptions): ConversionFrames {
  const base = options.base ? makeBase(options.base, options.baseKind) : undefined;
  const targetBase = options.targetBase ? makeBase(options.targetBase, options.baseKind) : undefined;
  const frame: FrameBase | undefined = options.srid !== undefined ? srid(options.srid) : base;

  if (options.from === 'enu' && options.to === 'enu') {
    return { source: frame, target: targetBase };
  }
  return {
    source: options.from === 'enu' ? frame : undefined,
    target: options.to === 'enu' ? frame : undefined,
  };
}

function requireFrame(frame: FrameBase | undefined, side: string): FrameBase {
  if (!frame) {
    throw new InputError(`ENU ${side} needs a frame: use --base or --srid`, { side });
  }
  return frame;
}

/**
 * Absolute (geodetic or ECEF) position of a point
 */
function toAbsolute(point: Coords, frame: FrameBase | undefined): AbsoluteCoords {
  switch (point.kind) {
    case 'geo':
    case 'ecef':
      return point;
    case 'enu': {
      const base = requireFrame(frame, 'input');
      return base.kind === 'srid' ? point.toGeo(base) : point.toEcef(base);
    }
  }
}

/**
 * Convert a point to another kind
 */
export function convertPoint(point: Coords, to: CoordsKind, frames: ConversionFrames): Coords {
  const absolute = toAbsolute(point, frames.source);

  switch (to) {
    case 'geo':
      return absolute.toGeo();
    case 'ecef':
      return toEcef(absolute);
    case 'enu': {
      const base = requireFrame(frames.target, 'output');
      if (base.kind === 'srid') {
        return absolute.toGeo().toEnu(base);
      }
      return toEcef(absolute).toEnu(base);
    }
  }
}

/**
 * Parse the x,y,z lines of a point file; blank lines and # comments are skipped
 */
export function parsePointLines(content: string): Array<[number, number, number]> {
  const points: Array<[number, number, number]> = [];
  const lines = content.split(/\r?\n/);

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (line.length === 0 || line.startsWith('#')) continue;
    points.push(parseTriple(line, `line ${i + 1}`));
  }

  return points;
}

function takeTriples(values: number[], count: number): Array<[number, number, number]> {
  if (values.length !== count * 3) {
    throw new InputError(`Expected ${count * 3} coordinates, got ${values.length}`, { values });
  }
  const triples: Array<[number, number, number]> = [];
  for (let i = 0; i < count; i++) {
    triples.push([values[i * 3], values[i * 3 + 1], values[i * 3 + 2]]);
  }
  return triples;
}

async function runConvert(options: CliOptions): Promise<string[]> {
  const frames = resolveFrames(options);

  let triples: Array<[number, number, number]>;
  if (options.input) {
    const content = await fs.readFile(options.input, 'utf-8');
    triples = parsePointLines(content);
  } else {
    triples = takeTriples(options.values, 1);
  }

  logger.debug(
    { from: options.from, to: options.to, srid: options.srid, count: triples.length },
    'Converting points'
  );

  const lines: string[] = [];
  if (options.srid !== undefined) {
    lines.push(`# ${describeSrid(options.srid)}`);
  }
  for (const [x, y, z] of triples) {
    const point = makeCoords(x, y, z, options.from);
    lines.push(convertPoint(point, options.to, frames).toString());
  }
  return lines;
}

function runMeasure(options: CliOptions): string[] {
  const [first, second] = takeTriples(options.values, 2);
  const from = makeCoords(...first, options.from);
  const to = makeCoords(...second, options.from);

  const relation = relate(from, to);
  logger.debug({ from: from.toString(), to: to.toString(), relation }, 'Measured');

  return [
    `distance:   ${relation.distance.toFixed(3)} m`,
    `distance2D: ${relation.distance2D.toFixed(3)} m`,
    `elevation:  ${relation.elevation.toFixed(9)} rad (${toDegrees(relation.elevation).toFixed(6)} deg)`,
    `azimuth:    ${relation.azimuth.toFixed(9)} rad (${toDegrees(relation.azimuth).toFixed(6)} deg)`,
  ];
}

/**
 * Run the command named in the options and return its output lines
 */
export async function runCommand(options: CliOptions): Promise<string[]> {
  switch (options.command) {
    case 'convert':
      return runConvert(options);
    case 'measure':
      return runMeasure(options);
    case undefined:
      throw new InputError('A command is required: convert or measure');
  }
}
