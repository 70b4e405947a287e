import { readFile } from 'node:fs/promises';
import { basename, resolve } from 'node:path';

import type { CanvasSize, ProjectionParameters } from '../projection/parameters.js';
import {
  PresetValidationError,
  validatePresetFile,
  type PresetFile,
  type PresetValidationIssue,
} from './presetSchema.js';

export type PresetLoadResult =
  | {
      readonly kind: 'success';
      readonly config: PresetFile;
      readonly issues: PresetValidationIssue[];
      readonly sourceName?: string;
    }
  | {
      readonly kind: 'error';
      readonly message: string;
      readonly issues: PresetValidationIssue[] | undefined;
      readonly sourceName?: string;
    };

export type ResolvedPreset = {
  readonly presetId: string | null;
  readonly canvas: CanvasSize;
  readonly parameters: ProjectionParameters;
};

export async function loadPresetFromJson(
  json: string,
  sourceName?: string,
): Promise<PresetLoadResult> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    return {
      kind: 'error',
      message: error instanceof Error ? error.message : 'Failed to parse preset JSON',
      issues: undefined,
      sourceName,
    };
  }
  try {
    const { config, issues } = validatePresetFile(parsed);
    return { kind: 'success', config, issues, sourceName };
  } catch (error) {
    if (error instanceof PresetValidationError) {
      return { kind: 'error', message: error.message, issues: error.issues, sourceName };
    }
    return {
      kind: 'error',
      message: error instanceof Error ? error.message : 'Unknown preset validation error',
      issues: undefined,
      sourceName,
    };
  }
}

export async function loadPresetFile(path: string): Promise<PresetLoadResult> {
  const json = await readFile(resolve(process.cwd(), path), 'utf8');
  return loadPresetFromJson(json, basename(path));
}

/** Like `loadPresetFile` but throws `PresetValidationError` on failure. */
export async function requirePresetFile(path: string): Promise<PresetFile> {
  const result = await loadPresetFile(path);
  if (result.kind === 'error') {
    throw new PresetValidationError(`${path}: ${result.message}`, result.issues ?? []);
  }
  return result.config;
}

export const resolvePreset = (config: PresetFile, presetId?: string): ResolvedPreset => {
  if (!presetId) {
    return { presetId: null, canvas: config.canvas, parameters: config.defaults };
  }
  const preset = config.presets.find((entry) => entry.id === presetId);
  if (!preset) {
    const known = config.presets.map((entry) => entry.id).join(', ') || 'none';
    throw new PresetValidationError(`Unknown preset "${presetId}" (available: ${known})`, [
      {
        code: 'preset/unknown',
        message: `Unknown preset "${presetId}"`,
        path: ['presets'],
        severity: 'error',
      },
    ]);
  }
  return { presetId: preset.id, canvas: config.canvas, parameters: preset.parameters };
};
