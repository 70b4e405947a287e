import { parseVec2, parseVec3 } from '../../math/vector.js';
import {
  parseCanvasSize,
  type CanvasSize,
  type ProjectionParametersInput,
} from '../../projection/parameters.js';

/** Bad command line; the CLI prints the message and exits with status 1. */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export type ProjectionFlags = {
  presets?: string;
  preset?: string;
  canvas?: CanvasSize;
  overrides: ProjectionParametersInput;
};

export type RenderCliOptions = ProjectionFlags & {
  input: string;
  output?: string;
  workers: number;
  ffmpeg: string;
  ffprobe: string;
  json: boolean;
};

export type ProjectCliOptions = ProjectionFlags & {
  x: number;
  y: number;
  image: CanvasSize;
  json: boolean;
};

export type ServeCliOptions = {
  port: number;
  host: string;
  workers: number;
  canvas?: CanvasSize;
  ffmpeg: string;
  ffprobe: string;
};

export type ParsedCommand<T> = { kind: 'help' } | { kind: 'run'; options: T };

const isHelpFlag = (arg: string) => arg === '--help' || arg === '-h';

const takeValue = (args: readonly string[], index: number, flag: string): string => {
  const value = args[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new CliUsageError(`${flag} requires a value.`);
  }
  return value;
};

const readCanvas = (text: string, flag: string): CanvasSize => {
  const size = parseCanvasSize(text);
  if (!size) {
    throw new CliUsageError(`${flag} expects WIDTHxHEIGHT (received "${text}").`);
  }
  return size;
};

const readInteger = (text: string, flag: string, min: number): number => {
  const value = Number(text);
  if (!Number.isInteger(value) || value < min) {
    throw new CliUsageError(`${flag} expects an integer >= ${min} (received "${text}").`);
  }
  return value;
};

const readFinite = (text: string, flag: string): number => {
  const value = Number(text);
  if (text.trim() === '' || !Number.isFinite(value)) {
    throw new CliUsageError(`${flag} expects a number (received "${text}").`);
  }
  return value;
};

/**
 * Consumes a projection flag at `args[index]`. Returns how many extra arguments were used, or
 * -1 when the flag is not a projection flag.
 */
const readProjectionFlag = (
  args: readonly string[],
  index: number,
  target: ProjectionFlags,
): number => {
  const flag = args[index];
  switch (flag) {
    case '--presets':
      target.presets = takeValue(args, index, flag);
      return 1;
    case '--preset':
      target.preset = takeValue(args, index, flag);
      return 1;
    case '--canvas':
      target.canvas = readCanvas(takeValue(args, index, flag), flag);
      return 1;
    case '--offset': {
      const text = takeValue(args, index, flag);
      const offset = parseVec2(text);
      if (!offset) {
        throw new CliUsageError(`--offset expects "x,y" (received "${text}").`);
      }
      target.overrides.offset = offset;
      return 1;
    }
    case '--rotation': {
      const text = takeValue(args, index, flag);
      const rotation = parseVec3(text);
      if (!rotation) {
        throw new CliUsageError(`--rotation expects "roll,pitch,yaw" (received "${text}").`);
      }
      target.overrides.rotation = rotation;
      return 1;
    }
    case '--scale':
      target.overrides.scale = readFinite(takeValue(args, index, flag), flag);
      return 1;
    default:
      return -1;
  }
};

export const parseRenderArgs = (args: readonly string[]): ParsedCommand<RenderCliOptions> => {
  const options: Omit<RenderCliOptions, 'input'> & { input?: string } = {
    overrides: {},
    workers: 1,
    ffmpeg: 'ffmpeg',
    ffprobe: 'ffprobe',
    json: false,
  };
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (isHelpFlag(arg)) {
      return { kind: 'help' };
    }
    if (!arg.startsWith('--')) {
      if (!options.input) {
        options.input = arg;
      } else if (!options.output) {
        options.output = arg;
      } else {
        throw new CliUsageError(`Unexpected argument "${arg}".`);
      }
      continue;
    }
    const consumed = readProjectionFlag(args, i, options);
    if (consumed >= 0) {
      i += consumed;
      continue;
    }
    switch (arg) {
      case '--input':
        options.input = takeValue(args, i++, arg);
        break;
      case '--output':
        options.output = takeValue(args, i++, arg);
        break;
      case '--workers':
        options.workers = readInteger(takeValue(args, i++, arg), arg, 1);
        break;
      case '--ffmpeg':
        options.ffmpeg = takeValue(args, i++, arg);
        break;
      case '--ffprobe':
        options.ffprobe = takeValue(args, i++, arg);
        break;
      case '--json':
        options.json = true;
        break;
      default:
        throw new CliUsageError(`Unknown flag "${arg}"`);
    }
  }
  const { input } = options;
  if (!input) {
    throw new CliUsageError('render requires --input.');
  }
  return { kind: 'run', options: { ...options, input } };
};

export const parseProjectArgs = (args: readonly string[]): ParsedCommand<ProjectCliOptions> => {
  const flags: ProjectionFlags = { overrides: {} };
  let x: number | undefined;
  let y: number | undefined;
  let image: CanvasSize | undefined;
  let json = false;
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (isHelpFlag(arg)) {
      return { kind: 'help' };
    }
    const consumed = readProjectionFlag(args, i, flags);
    if (consumed >= 0) {
      i += consumed;
      continue;
    }
    switch (arg) {
      case '--x':
        x = readFinite(takeValue(args, i++, arg), arg);
        break;
      case '--y':
        y = readFinite(takeValue(args, i++, arg), arg);
        break;
      case '--image':
        image = readCanvas(takeValue(args, i++, arg), arg);
        break;
      case '--json':
        json = true;
        break;
      default:
        throw new CliUsageError(`Unknown flag "${arg}"`);
    }
  }
  if (x === undefined || y === undefined || !image) {
    throw new CliUsageError('project requires --x, --y and --image.');
  }
  return { kind: 'run', options: { ...flags, x, y, image, json } };
};

export const parseServeArgs = (args: readonly string[]): ParsedCommand<ServeCliOptions> => {
  const options: ServeCliOptions = {
    port: 8787,
    host: '127.0.0.1',
    workers: 1,
    ffmpeg: 'ffmpeg',
    ffprobe: 'ffprobe',
  };
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (isHelpFlag(arg)) {
      return { kind: 'help' };
    }
    switch (arg) {
      case '--port':
        options.port = readInteger(takeValue(args, i++, arg), arg, 1);
        break;
      case '--host':
        options.host = takeValue(args, i++, arg);
        break;
      case '--workers':
        options.workers = readInteger(takeValue(args, i++, arg), arg, 1);
        break;
      case '--canvas':
        options.canvas = readCanvas(takeValue(args, i++, arg), arg);
        break;
      case '--ffmpeg':
        options.ffmpeg = takeValue(args, i++, arg);
        break;
      case '--ffprobe':
        options.ffprobe = takeValue(args, i++, arg);
        break;
      default:
        throw new CliUsageError(`Unknown flag "${arg}"`);
    }
  }
  return { kind: 'run', options };
};
