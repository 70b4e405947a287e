#!/usr/bin/env node
import process from 'node:process';

import { loadPresetFile } from '../config/presetLoader.js';
import { projectPoint, renderFile } from '../runtime/services.js';
import { startServer } from '../server/index.js';
import {
  CliUsageError,
  parseProjectArgs,
  parseRenderArgs,
  parseServeArgs,
  type ParsedCommand,
} from './utils/args.js';

const exitWithError = (message: string): never => {
  console.error(message);
  process.exit(1);
};

const printMainUsage = () => {
  console.log(`planet-cli – little-planet projection of equirectangular panoramas

Commands:
  render --input <image> [--output <image>] [--presets <path>] [--preset <id>] [--workers 4]
  project --x <px> --y <px> --image <WxH> [--presets <path>] [--preset <id>]
  presets validate <presets.json> [--json] [--verbose]
  serve [--port 8787] [--host 127.0.0.1] [--workers 4]

Run "planet-cli <command> --help" to learn more about a command.`);
};

const PROJECTION_FLAGS = `  --presets <path>       Preset JSON supplying canvas size and named parameter sets
  --preset <id>          Preset identifier inside the presets file
  --canvas <WxH>         Output canvas size (default 600x600)
  --offset <x,y>         Canvas offset; 0.5 leaves the plane origin at the corner
  --rotation <r,p,y>     Roll, pitch and yaw in radians
  --scale <value>        Projection radius multiplier (must be > 0)`;

const printRenderUsage = () => {
  console.log(`planet-cli render

Project an equirectangular image onto the little-planet canvas and write the result.

Required:
  --input <image>        Source panorama (decoded with ffmpeg)

Optional:
  --output <image>       Output image path (default "output.png")
${PROJECTION_FLAGS}
  --workers <count>      Worker threads for the raster pass (default 1, inline)
  --ffmpeg <path>        ffmpeg executable (default "ffmpeg")
  --ffprobe <path>       ffprobe executable (default "ffprobe")
  --json                 Emit the render summary as JSON
`);
};

const printProjectUsage = () => {
  console.log(`planet-cli project

Map one canvas pixel to its source coordinate without touching any image data.

Required:
  --x <px> --y <px>      Canvas pixel
  --image <WxH>          Source image dimensions

Optional:
${PROJECTION_FLAGS}
  --json                 Emit JSON
`);
};

const printPresetsUsage = () => {
  console.log(`planet-cli presets – preset file utilities

Usage:
  planet-cli presets validate <presets.json> [--json] [--verbose]
`);
};

const printServeUsage = () => {
  console.log(`planet-cli serve

Starts the HTTP API (/health, /render, /project, /presets/validate) and the /live WebSocket
preview channel.

Flags:
  --port <number>     Port to listen on (default 8787)
  --host <address>    Interface to bind (default 127.0.0.1)
  --workers <count>   Worker threads shared by live sessions (default 1, inline)
  --canvas <WxH>      Canvas size for live sessions (default 600x600)
  --ffmpeg <path>     ffmpeg executable (default "ffmpeg")
  --ffprobe <path>    ffprobe executable (default "ffprobe")
`);
};

const unwrap = <T>(parsed: ParsedCommand<T>, printUsage: () => void): T => {
  if (parsed.kind === 'help') {
    printUsage();
    return process.exit(0);
  }
  return parsed.options;
};

const handleRenderCommand = async (args: string[]) => {
  const options = unwrap(parseRenderArgs(args), printRenderUsage);
  const summary = await renderFile({
    input: options.input,
    output: options.output,
    presets: options.presets,
    preset: options.preset,
    canvas: options.canvas,
    overrides: options.overrides,
    workers: options.workers,
    io: { ffmpeg: options.ffmpeg, ffprobe: options.ffprobe },
  });
  if (options.json) {
    console.log(JSON.stringify({ status: 'ok', ...summary }, null, 2));
    return;
  }
  console.log(
    `[render] wrote ${summary.output} (${summary.canvas.width}×${summary.canvas.height} from ${summary.source.width}×${summary.source.height}, radius ${summary.radius.toFixed(1)})`,
  );
  console.log(
    `         ${summary.performance.passMs.toFixed(1)}ms via ${summary.executor}, ${summary.performance.megapixelsPerSecond.toFixed(2)} MP/s | output ${summary.outputDigest.slice(0, 16)}`,
  );
};

const handleProjectCommand = async (args: string[]) => {
  const options = unwrap(parseProjectArgs(args), printProjectUsage);
  const result = await projectPoint(options);
  if (options.json) {
    console.log(JSON.stringify({ status: 'ok', ...result }, null, 2));
    return;
  }
  const [col, row] = result.source;
  console.log(`[project] (${options.x}, ${options.y}) → (${col.toFixed(3)}, ${row.toFixed(3)})`);
};

const handlePresetsCommand = async (args: string[]) => {
  if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
    printPresetsUsage();
    process.exit(0);
  }
  const [subcommand, ...rest] = args;
  if (subcommand !== 'validate') {
    exitWithError(`Unknown presets subcommand "${subcommand}".`);
  }
  const flags = new Set(rest.filter((arg) => arg.startsWith('--')));
  const presetsPath = rest.find((arg) => !arg.startsWith('--'));
  if (!presetsPath) {
    return exitWithError('presets validate requires a presets path.');
  }
  const result = await loadPresetFile(presetsPath);
  if (result.kind === 'success') {
    const warnings = result.issues.filter((issue) => issue.severity === 'warning');
    if (flags.has('--json')) {
      console.log(
        JSON.stringify(
          {
            status: 'ok',
            presets: {
              name: result.config.metadata.name,
              schemaVersion: result.config.schemaVersion,
              canvas: result.config.canvas,
              ids: result.config.presets.map((preset) => preset.id),
            },
            warnings,
          },
          null,
          2,
        ),
      );
      return;
    }
    console.log(`✔ Presets valid: ${presetsPath}`);
    console.log(`  schema:  ${result.config.schemaVersion}`);
    console.log(`  canvas:  ${result.config.canvas.width}×${result.config.canvas.height}`);
    const ids = result.config.presets.map((preset) => preset.id);
    console.log(`  presets: ${ids.join(', ') || 'none'}`);
    if (warnings.length > 0 && flags.has('--verbose')) {
      console.warn('Warnings:');
      warnings.forEach((issue) => {
        console.warn(`  • ${issue.message} (${issue.code} @ ${issue.path.join('.')})`);
      });
    }
    return;
  }
  if (flags.has('--json')) {
    console.log(
      JSON.stringify({ status: 'error', message: result.message, issues: result.issues }, null, 2),
    );
  } else {
    console.error(`✖ Presets invalid: ${presetsPath}`);
    console.error(`  ${result.message}`);
    result.issues?.forEach((issue) => {
      console.error(`   • ${issue.message} (${issue.code} @ ${issue.path.join('.')})`);
    });
  }
  process.exit(1);
};

const handleServeCommand = (args: string[]) => {
  const options = unwrap(parseServeArgs(args), printServeUsage);
  const { close } = startServer({
    port: options.port,
    host: options.host,
    workers: options.workers,
    canvas: options.canvas,
    io: { ffmpeg: options.ffmpeg, ffprobe: options.ffprobe },
  });
  process.once('SIGINT', () => {
    console.log('[server] shutting down');
    close().catch((error: unknown) => {
      console.error('[server] shutdown failed', error);
      process.exitCode = 1;
    });
  });
};

const main = async () => {
  const [command, ...rest] = process.argv.slice(2);
  if (!command || command === '--help' || command === '-h') {
    printMainUsage();
    return;
  }
  switch (command) {
    case 'render':
      await handleRenderCommand(rest);
      return;
    case 'project':
      await handleProjectCommand(rest);
      return;
    case 'presets':
      await handlePresetsCommand(rest);
      return;
    case 'serve':
      handleServeCommand(rest);
      return;
    default:
      exitWithError(`Unknown command "${command}".`);
  }
};

main().catch((error: unknown) => {
  if (error instanceof CliUsageError) {
    exitWithError(error.message);
  }
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
