import { basename, extname } from 'node:path';

import { wrapRgbImage, type RgbImage } from '../../raster/rgbImage.js';
import { runCommand, type CommandRunner } from './exec.js';

export type ImageProbe = {
  readonly width: number;
  readonly height: number;
  readonly codec?: string;
};

export type ImageToolOptions = {
  ffmpeg?: string;
  ffprobe?: string;
  run?: CommandRunner;
};

/** Extensions offered by the image picker of the interactive tool. */
export const SUPPORTED_INPUT_EXTENSIONS = [
  '.jpg',
  '.jpeg',
  '.png',
  '.bmp',
  '.gif',
  '.webp',
] as const;

export const DEFAULT_OUTPUT_NAME = 'output.png';

export const isSupportedInput = (path: string): boolean => {
  const extension = extname(path).toLowerCase();
  return SUPPORTED_INPUT_EXTENSIONS.some((entry) => entry === extension);
};

/** Raised before any tool runs when an input's extension is not a supported image format. */
export class UnsupportedInputError extends Error {
  readonly path: string;

  constructor(path: string) {
    const expected = SUPPORTED_INPUT_EXTENSIONS.join(', ');
    super(`Unsupported input "${basename(path)}": expected one of ${expected}`);
    this.name = 'UnsupportedInputError';
    this.path = path;
  }
}

const utf8 = new TextDecoder();

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const probeImage = async (
  input: string,
  options: ImageToolOptions = {},
): Promise<ImageProbe> => {
  const run = options.run ?? runCommand;
  const args = [
    '-v',
    'error',
    '-select_streams',
    'v:0',
    '-show_entries',
    'stream=width,height,codec_name',
    '-of',
    'json',
    input,
  ];
  const { stdout } = await run(options.ffprobe ?? 'ffprobe', args);
  const payload: unknown = JSON.parse(utf8.decode(stdout));
  const streams = isRecord(payload) && Array.isArray(payload.streams) ? payload.streams : [];
  const stream: unknown = streams[0];
  if (!isRecord(stream) || typeof stream.width !== 'number' || typeof stream.height !== 'number') {
    throw new Error(`ffprobe failed to derive dimensions for ${basename(input)}`);
  }
  return {
    width: stream.width,
    height: stream.height,
    codec: typeof stream.codec_name === 'string' ? stream.codec_name : undefined,
  };
};

/** Decodes the first frame of `input` to packed 8-bit RGB. */
export const decodeImage = async (
  input: string,
  options: ImageToolOptions = {},
): Promise<RgbImage> => {
  if (!isSupportedInput(input)) {
    throw new UnsupportedInputError(input);
  }
  const run = options.run ?? runCommand;
  const probe = await probeImage(input, options);
  const args = [
    '-v',
    'error',
    '-i',
    input,
    '-frames:v',
    '1',
    '-f',
    'rawvideo',
    '-pix_fmt',
    'rgb24',
    '-',
  ];
  const { stdout } = await run(options.ffmpeg ?? 'ffmpeg', args);
  const expected = probe.width * probe.height * 3;
  if (stdout.byteLength !== expected) {
    throw new Error(
      `Expected ${expected} bytes for decoded ${basename(input)}, received ${stdout.byteLength}`,
    );
  }
  return wrapRgbImage(probe.width, probe.height, new Uint8Array(stdout));
};

export const encodeImage = async (
  image: RgbImage,
  outputPath: string,
  options: ImageToolOptions = {},
): Promise<void> => {
  const run = options.run ?? runCommand;
  const args = [
    '-v',
    'error',
    '-y',
    '-f',
    'rawvideo',
    '-pix_fmt',
    'rgb24',
    '-s',
    `${image.width}x${image.height}`,
    '-i',
    '-',
    '-frames:v',
    '1',
    outputPath,
  ];
  await run(options.ffmpeg ?? 'ffmpeg', args, { input: image.data });
};
