/**
 * Command-line options
 *
 * Hand-rolled parsing: options may appear anywhere, numbers (including
 * negative ones) are positional coordinates, and the first other bare word
 * is the command.
 */

import { InputError } from '../utils/errors.js';
import type { CoordsKind } from '../types.js';
import { parseCoordsKind } from '../coords/make.js';

export type CommandName = 'convert' | 'measure';

export interface CliOptions {
  command?: CommandName;

  /** Kind of the input point(s) */
  from: CoordsKind;

  /** Kind to convert to */
  to: CoordsKind;

  /** Base point of the ENU frame (source or target side) */
  base?: [number, number, number];

  /** Kind of --base and --target-base */
  baseKind: 'geo' | 'ecef';

  /** Base of the target ENU frame when re-basing ENU to ENU */
  targetBase?: [number, number, number];

  /** Projected system used as the ENU frame */
  srid?: number;

  /** File of x,y,z lines to convert */
  input?: string;

  /** Positional coordinates */
  values: number[];

  verbose?: boolean;
  help?: boolean;
}

export const HELP_TEXT = `
geoframes - Convert points between geodetic, ECEF and local ENU frames

Usage:
  geoframes convert --from <kind> --to <kind> [options] [x y z]
  geoframes measure --from <kind> <x1 y1 z1> <x2 y2 z2>

Kinds:
  geo                     lon lat hgt (degrees, degrees, meters)
  ecef                    X Y Z (meters)
  enu                     E N U (meters, relative to a base or an SRID)

Frames:
  --base <x,y,z>          Base point of the ENU frame
  --base-kind <kind>      Kind of the base points: geo (default) or ecef
  --target-base <x,y,z>   Base of the target frame (enu to enu only)
  --srid <code>           Projected system used as ENU frame:
                          2154 (Lambert-93), 32601-32660 / 32701-32760 (UTM)

Input:
  -i, --input <path>      Convert every "x,y,z" line of a file

Other:
  -v, --verbose           Enable verbose logging
  -h, --help              Show this help message

Examples:
  # Paris to ECEF
  geoframes convert --from geo --to ecef 2.3522 48.8566 35

  # Paris to Lambert-93
  geoframes convert --from geo --to enu --srid 2154 2.3522 48.8566 35

  # UTM zone 31N to geodetic
  geoframes convert --from enu --to geo --srid 32631 448251.9 5411932.9 0

  # Distance, elevation and azimuth between two points
  geoframes measure --from geo 2.35 48.85 35 2.29 48.86 330
`;

const NUMBER_PATTERN = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

/**
 * Create options with every default filled in
 */
export function createDefaultOptions(): CliOptions {
  return {
    from: 'geo',
    to: 'geo',
    baseKind: 'geo',
    values: [],
  };
}

/**
 * Parse a number, rejecting anything that is not one
 */
export function parseNumber(text: string | undefined, option: string): number {
  if (text === undefined || !NUMBER_PATTERN.test(text.trim())) {
    throw new InputError(`Invalid number for ${option}: "${text ?? ''}"`, { option, text });
  }
  return parseFloat(text);
}

/**
 * Parse an "x,y,z" triple (z defaults to 0)
 */
export function parseTriple(text: string | undefined, option: string): [number, number, number] {
  const parts = (text ?? '').split(/[,\s;]+/).filter((part) => part.length > 0);
  if (parts.length < 2 || parts.length > 3) {
    throw new InputError(`Expected x,y[,z] for ${option}, got "${text ?? ''}"`, { option, text });
  }
  const [x, y, z = '0'] = parts;
  return [parseNumber(x, option), parseNumber(y, option), parseNumber(z, option)];
}

function parseCommand(word: string): CommandName {
  switch (word) {
    case 'convert':
      return 'convert';
    case 'measure':
      return 'measure';
    default:
      throw new InputError(`Unknown command "${word}". Use --help for usage information`, {
        command: word,
      });
  }
}

function parseBaseKind(text: string | undefined): 'geo' | 'ecef' {
  const kind = parseCoordsKind(text ?? '');
  if (kind === 'enu') {
    throw new InputError('A frame base must be absolute: geo or ecef', { kind });
  }
  return kind;
}

/**
 * Parse command line arguments
 */
export function parseArgs(args: string[]): CliOptions {
  const options = createDefaultOptions();

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next: string | undefined = args[i + 1];

    switch (arg) {
      case '--from':
        options.from = parseCoordsKind(next ?? '');
        i++;
        break;
      case '--to':
        options.to = parseCoordsKind(next ?? '');
        i++;
        break;
      case '--base':
        options.base = parseTriple(next, arg);
        i++;
        break;
      case '--base-kind':
        options.baseKind = parseBaseKind(next);
        i++;
        break;
      case '--target-base':
        options.targetBase = parseTriple(next, arg);
        i++;
        break;
      case '--srid':
        options.srid = parseNumber(next, arg);
        i++;
        break;
      case '-i':
      case '--input':
        if (next === undefined) {
          throw new InputError(`Missing path for ${arg}`);
        }
        options.input = next;
        i++;
        break;
      case '-v':
      case '--verbose':
        options.verbose = true;
        break;
      case '-h':
      case '--help':
        options.help = true;
        break;
      default:
        if (NUMBER_PATTERN.test(arg)) {
          options.values.push(parseFloat(arg));
        } else if (arg.startsWith('-')) {
          throw new InputError(`Unknown option "${arg}"`, { option: arg });
        } else if (options.command === undefined) {
          options.command = parseCommand(arg);
        } else {
          throw new InputError(`Unexpected argument "${arg}"`, { argument: arg });
        }
    }
  }

  return options;
}
