import { resolve } from 'path';
import type { StlFormat } from '../types';
import { parseStlFormat } from '../stlexporter';
import { readDistances } from '../wheel/distances';
import { generateWheelSTL } from '../wheel/generate';
import { isInputError } from '../wheel/errors';

export const USAGE =
  'Usage: wheel <distances> [--output <file>] [--format binary|ascii] [--scale <factor>]\n' +
  '  distances: comma-separated millimeters, e.g. "2,3,4,5,8,12,18,25"';

export interface CliOptions {
  distances: string;
  output?: string;
  format: StlFormat;
  scale: number;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export function parseArgs(args: readonly string[]): CliOptions {
  const positional: string[] = [];
  let output: string | undefined;
  let format: StlFormat = 'binary';
  let scale = 1;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const takeValue = () => {
      const value = args[++i];
      if (value === undefined) throw new UsageError(`Missing value for ${arg}`);
      return value;
    };

    switch (arg) {
      case '-o':
      case '--output':
        output = takeValue();
        break;
      case '-f':
      case '--format':
        format = parseStlFormat(takeValue());
        break;
      case '--scale': {
        const value = takeValue();
        scale = Number(value);
        if (!Number.isFinite(scale) || scale <= 0) {
          throw new UsageError(`Invalid scale "${value}"`);
        }
        break;
      }
      default:
        if (arg.startsWith('-') && arg.length > 1 && !/^-[\d.]/.test(arg)) {
          throw new UsageError(`Unknown option ${arg}`);
        }
        positional.push(arg);
    }
  }

  if (positional.length === 0) {
    throw new UsageError('No distances given');
  }

  // Quoting is optional: "2, 3" and 2, 3 read the same
  return { distances: positional.join(','), output, format, scale };
}

/** e.g. wheel_3-5-7_2025-11-09T14-30-00Z.stl */
export function defaultOutputName(distances: readonly number[], date: Date = new Date()): string {
  const stamp = date
    .toISOString()
    .replace(/\.\d{3}Z$/, 'Z')
    .replace(/:/g, '-');
  return `wheel_${distances.map((d) => Math.round(d)).join('-')}_${stamp}.stl`;
}

/** @returns process exit code */
export async function runCli(args: readonly string[], cwd: string = process.cwd()): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(args);
  } catch (e) {
    if (e instanceof UsageError || isInputError(e)) {
      console.error(e.message);
      console.error(USAGE);
      return 2;
    }
    throw e;
  }

  try {
    const distances = readDistances(options.distances);
    const outputPath = resolve(cwd, options.output ?? defaultOutputName(distances));
    const bytes = await generateWheelSTL(distances, outputPath, {
      format: options.format,
      scale: options.scale,
    });
    console.log(`Wrote ${outputPath} (${bytes} bytes, distances ${distances.join(', ')} mm)`);
    return 0;
  } catch (e) {
    if (e instanceof Error) {
      console.error(e.message);
      return 1;
    }
    throw e;
  }
}
