import assert from 'node:assert/strict';
import test from 'node:test';

import {
  CommandError,
  runCommand,
  type CommandRunner,
  type RunCommandOptions,
} from '../src/cli/utils/exec.js';
import {
  decodeImage,
  encodeImage,
  isSupportedInput,
  probeImage,
  UnsupportedInputError,
} from '../src/cli/utils/ffmpeg.js';
import { wrapRgbImage } from '../src/raster/rgbImage.js';

type RecordedCall = {
  command: string;
  args: readonly string[];
  options: RunCommandOptions | undefined;
};

/** In-process stand-in for ffmpeg/ffprobe that replays canned stdout per command. */
const fakeRunner = (outputs: Record<string, Buffer>) => {
  const calls: RecordedCall[] = [];
  const run: CommandRunner = async (command, args, options) => {
    calls.push({ command, args, options });
    const stdout = outputs[command];
    if (!stdout) {
      throw new CommandError(command, args, 1, Buffer.from('not found\n'));
    }
    return { stdout, stderr: Buffer.alloc(0), code: 0 };
  };
  return { calls, run };
};

const probeJson = (width: number, height: number) =>
  Buffer.from(JSON.stringify({ streams: [{ width, height, codec_name: 'png' }] }));

test('supported inputs match the picker extensions', () => {
  assert.equal(isSupportedInput('pano.JPG'), true);
  assert.equal(isSupportedInput('/tmp/pano.webp'), true);
  assert.equal(isSupportedInput('pano.tiff'), false);
});

test('probeImage reads dimensions from ffprobe JSON', async () => {
  const { calls, run } = fakeRunner({ 'my-ffprobe': probeJson(4, 2) });
  const probe = await probeImage('pano.png', { ffprobe: 'my-ffprobe', run });
  assert.deepEqual(probe, { width: 4, height: 2, codec: 'png' });
  assert.deepEqual(calls[0].args, [
    '-v',
    'error',
    '-select_streams',
    'v:0',
    '-show_entries',
    'stream=width,height,codec_name',
    '-of',
    'json',
    'pano.png',
  ]);
});

test('probeImage rejects output without a video stream', async () => {
  const { run } = fakeRunner({ ffprobe: Buffer.from('{"streams":[]}') });
  await assert.rejects(probeImage('dir/pano.png', { run }), {
    message: 'ffprobe failed to derive dimensions for pano.png',
  });
});

test('decodeImage returns packed RGB sized from the probe', async () => {
  const pixels = Buffer.from([1, 2, 3, 4, 5, 6]);
  const { calls, run } = fakeRunner({ ffprobe: probeJson(2, 1), ffmpeg: pixels });
  const image = await decodeImage('pano.png', { run });
  assert.equal(image.width, 2);
  assert.equal(image.height, 1);
  assert.deepEqual(Array.from(image.data), [1, 2, 3, 4, 5, 6]);
  assert.deepEqual(
    calls.map((call) => call.command),
    ['ffprobe', 'ffmpeg'],
  );
  assert.deepEqual(calls[1].args, [
    '-v',
    'error',
    '-i',
    'pano.png',
    '-frames:v',
    '1',
    '-f',
    'rawvideo',
    '-pix_fmt',
    'rgb24',
    '-',
  ]);
});

test('decodeImage refuses unsupported extensions before running any tool', async () => {
  const { calls, run } = fakeRunner({ ffprobe: probeJson(2, 1), ffmpeg: Buffer.alloc(6) });
  await assert.rejects(decodeImage('scans/pano.tiff', { run }), (error: unknown) => {
    assert.ok(error instanceof UnsupportedInputError);
    assert.equal(
      error.message,
      'Unsupported input "pano.tiff": expected one of .jpg, .jpeg, .png, .bmp, .gif, .webp',
    );
    return true;
  });
  assert.equal(calls.length, 0);
});

test('decodeImage rejects truncated frames', async () => {
  const { run } = fakeRunner({ ffprobe: probeJson(2, 1), ffmpeg: Buffer.from([1, 2, 3]) });
  await assert.rejects(decodeImage('pano.png', { run }), {
    message: 'Expected 6 bytes for decoded pano.png, received 3',
  });
});

test('encodeImage pipes raw RGB into ffmpeg', async () => {
  const { calls, run } = fakeRunner({ ffmpeg: Buffer.alloc(0) });
  const image = wrapRgbImage(2, 1, new Uint8Array([9, 8, 7, 6, 5, 4]));
  await encodeImage(image, 'out.png', { run });
  assert.equal(calls.length, 1);
  assert.deepEqual(calls[0].args, [
    '-v',
    'error',
    '-y',
    '-f',
    'rawvideo',
    '-pix_fmt',
    'rgb24',
    '-s',
    '2x1',
    '-i',
    '-',
    '-frames:v',
    '1',
    'out.png',
  ]);
  assert.equal(calls[0].options?.input, image.data);
});

test('CommandError keeps the last stderr line', () => {
  const error = new CommandError('ffmpeg', ['-i', 'x'], 1, Buffer.from('warning\nNo such file\n'));
  assert.equal(error.message, 'ffmpeg exited with code 1: No such file');
  assert.equal(error.exitCode, 1);
  assert.deepEqual(error.args, ['-i', 'x']);
});

test('runCommand reports the exit code when the child ignores its piped input', async () => {
  // 8 MiB overruns the pipe buffer, so the write fails once the child has exited
  const input = new Uint8Array(8 * 1024 * 1024);
  await assert.rejects(
    runCommand(process.execPath, ['-e', 'process.exit(3)'], { input }),
    (error: unknown) => {
      assert.ok(error instanceof CommandError);
      assert.equal(error.exitCode, 3);
      return true;
    },
  );
});
