import {
  DEFAULT_CANVAS_SIZE,
  DEFAULT_PARAMETERS,
  PARAMETER_RANGES,
  createProjectionParameters,
  type CanvasSize,
  type ParameterRange,
  type ProjectionParameters,
} from '../projection/parameters.js';

export type PresetIssueSeverity = 'error' | 'warning';

export type PresetValidationIssue = {
  readonly code: string;
  readonly message: string;
  readonly path: readonly (string | number)[];
  readonly severity: PresetIssueSeverity;
};

export type ProjectionPreset = {
  readonly id: string;
  readonly label: string;
  readonly parameters: ProjectionParameters;
};

export type PresetFile = {
  readonly schemaVersion: string;
  readonly metadata: { readonly name: string; readonly description?: string };
  readonly canvas: CanvasSize;
  readonly defaults: ProjectionParameters;
  readonly presets: readonly ProjectionPreset[];
};

export type PresetValidationResult = {
  readonly config: PresetFile;
  readonly issues: PresetValidationIssue[];
};

export const PRESET_SCHEMA_VERSION = '1.0.0';

export class PresetValidationError extends Error {
  constructor(
    message: string,
    readonly issues: PresetValidationIssue[],
  ) {
    super(message);
    this.name = 'PresetValidationError';
  }
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const asString = (value: unknown): string | null => (typeof value === 'string' ? value : null);

const asFiniteNumber = (value: unknown): number | null =>
  typeof value === 'number' && Number.isFinite(value) ? value : null;

const pushIssue = (
  issues: PresetValidationIssue[],
  code: string,
  message: string,
  path: readonly (string | number)[],
  severity: PresetIssueSeverity = 'error',
) => {
  issues.push({ code, message, path, severity });
};

const readNumbers = (
  value: unknown,
  size: number,
  issues: PresetValidationIssue[],
  path: readonly (string | number)[],
  code: string,
): number[] | null => {
  if (!Array.isArray(value) || value.length !== size) {
    pushIssue(issues, code, `Expected an array of ${size} numbers`, path);
    return null;
  }
  const numbers = value.map(asFiniteNumber);
  const result: number[] = [];
  numbers.forEach((entry, index) => {
    if (entry === null) {
      pushIssue(issues, code, 'Entries must be finite numbers', [...path, index]);
    } else {
      result.push(entry);
    }
  });
  return result.length === size ? result : null;
};

const warnOutsideRange = (
  values: readonly number[],
  range: ParameterRange,
  issues: PresetValidationIssue[],
  path: readonly (string | number)[],
  code: string,
) => {
  values.forEach((value, index) => {
    if (value < range.min || value > range.max) {
      pushIssue(
        issues,
        code,
        `Value ${value} lies outside the control range [${range.min}, ${range.max}]`,
        values.length > 1 ? [...path, index] : path,
        'warning',
      );
    }
  });
};

const normaliseParameters = (
  value: unknown,
  base: ProjectionParameters,
  issues: PresetValidationIssue[],
  path: readonly (string | number)[],
): ProjectionParameters => {
  if (!isRecord(value)) {
    pushIssue(issues, 'parameters/type', 'Parameters must be an object', path);
    return base;
  }
  let offset = base.offset;
  if (value.offset !== undefined) {
    const parsed = readNumbers(value.offset, 2, issues, [...path, 'offset'], 'parameters/offset');
    if (parsed) {
      offset = [parsed[0], parsed[1]];
      warnOutsideRange(
        parsed,
        PARAMETER_RANGES.offset,
        issues,
        [...path, 'offset'],
        'parameters/offset-range',
      );
    }
  }
  let rotation = base.rotation;
  if (value.rotation !== undefined) {
    const parsed = readNumbers(
      value.rotation,
      3,
      issues,
      [...path, 'rotation'],
      'parameters/rotation',
    );
    if (parsed) {
      rotation = [parsed[0], parsed[1], parsed[2]];
      warnOutsideRange(
        parsed,
        PARAMETER_RANGES.rotation,
        issues,
        [...path, 'rotation'],
        'parameters/rotation-range',
      );
    }
  }
  let scale = base.scale;
  if (value.scale !== undefined) {
    const parsed = asFiniteNumber(value.scale);
    if (parsed === null || parsed <= 0) {
      pushIssue(issues, 'parameters/scale', 'Scale must be a positive number', [...path, 'scale']);
    } else {
      scale = parsed;
      warnOutsideRange(
        [parsed],
        PARAMETER_RANGES.scale,
        issues,
        [...path, 'scale'],
        'parameters/scale-range',
      );
    }
  }
  return createProjectionParameters({ offset, rotation, scale });
};

const normaliseCanvas = (
  value: unknown,
  issues: PresetValidationIssue[],
  path: readonly (string | number)[],
): CanvasSize => {
  if (value === undefined) {
    return DEFAULT_CANVAS_SIZE;
  }
  if (!isRecord(value)) {
    pushIssue(issues, 'canvas/type', 'Canvas must be an object with width and height', path);
    return DEFAULT_CANVAS_SIZE;
  }
  const width = value.width;
  const height = value.height;
  const valid = (entry: unknown): entry is number =>
    typeof entry === 'number' && Number.isInteger(entry) && entry >= 1;
  if (!valid(width) || !valid(height)) {
    pushIssue(
      issues,
      'canvas/dimensions',
      'Canvas width and height must be positive integers',
      path,
    );
    return DEFAULT_CANVAS_SIZE;
  }
  if (width !== height) {
    pushIssue(
      issues,
      'canvas/non-square',
      'Canvas is not square; the projection radius follows the shorter side',
      path,
      'warning',
    );
  }
  return { width, height };
};

const normalisePresets = (
  value: unknown,
  defaults: ProjectionParameters,
  issues: PresetValidationIssue[],
  path: readonly (string | number)[],
): ProjectionPreset[] => {
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value)) {
    pushIssue(issues, 'presets/type', 'Presets must be an array', path);
    return [];
  }
  const seen = new Set<string>();
  const presets: ProjectionPreset[] = [];
  value.forEach((entry: unknown, index) => {
    const entryPath = [...path, index];
    if (!isRecord(entry)) {
      pushIssue(issues, 'preset/type', 'Preset must be an object', entryPath);
      return;
    }
    const id = asString(entry.id);
    if (!id) {
      pushIssue(issues, 'preset/id', 'Preset must define a string id', [...entryPath, 'id']);
      return;
    }
    if (seen.has(id)) {
      pushIssue(issues, 'preset/duplicate', `Duplicate preset id "${id}"`, [...entryPath, 'id']);
      return;
    }
    seen.add(id);
    presets.push({
      id,
      label: asString(entry.label) ?? id,
      parameters: normaliseParameters(entry, defaults, issues, entryPath),
    });
  });
  return presets;
};

export function validatePresetFile(payload: unknown): PresetValidationResult {
  const issues: PresetValidationIssue[] = [];
  if (!isRecord(payload)) {
    pushIssue(issues, 'preset-file/type', 'Preset file root must be an object', []);
    throw new PresetValidationError('Preset file root must be an object', issues);
  }

  const schemaVersion = asString(payload.schemaVersion);
  if (!schemaVersion) {
    pushIssue(
      issues,
      'preset-file/schemaVersion',
      'Preset file must supply a schemaVersion string',
      ['schemaVersion'],
    );
  } else if (schemaVersion.split('.')[0] !== PRESET_SCHEMA_VERSION.split('.')[0]) {
    pushIssue(
      issues,
      'preset-file/schemaVersion',
      `Unsupported schema major version ${schemaVersion}`,
      ['schemaVersion'],
    );
  }

  const metadata: Record<string, unknown> = isRecord(payload.metadata) ? payload.metadata : {};
  const name = asString(metadata.name);
  if (!name) {
    pushIssue(
      issues,
      'metadata/name',
      'Preset file metadata should have a name',
      ['metadata', 'name'],
      'warning',
    );
  }

  const canvas = normaliseCanvas(payload.canvas, issues, ['canvas']);
  const defaults =
    payload.defaults === undefined
      ? DEFAULT_PARAMETERS
      : normaliseParameters(payload.defaults, DEFAULT_PARAMETERS, issues, ['defaults']);
  const presets = normalisePresets(payload.presets, defaults, issues, ['presets']);

  const errors = issues.filter((issue) => issue.severity === 'error');
  if (errors.length > 0) {
    throw new PresetValidationError(
      `Preset file has ${errors.length} error(s): ${errors[0].message}`,
      issues,
    );
  }

  return {
    config: {
      schemaVersion: schemaVersion ?? PRESET_SCHEMA_VERSION,
      metadata: {
        name: name ?? 'Untitled presets',
        description: asString(metadata.description) ?? undefined,
      },
      canvas,
      defaults,
      presets,
    },
    issues,
  };
}
