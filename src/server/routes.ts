import { UnsupportedInputError } from '../cli/utils/ffmpeg.js';
import {
  loadPresetFile,
  loadPresetFromJson,
  type PresetLoadResult,
} from '../config/presetLoader.js';
import { PresetValidationError } from '../config/presetSchema.js';
import { ProjectionConfigError } from '../projection/errors.js';
import {
  projectPoint,
  renderFile,
  type ProjectPointOptions,
  type ProjectPointResult,
  type RenderFileOptions,
  type RenderFileResult,
} from '../runtime/services.js';
import {
  RequestError,
  isRecord,
  optionalString,
  readParameterPatch,
  readSize,
  requireNumber,
  type JsonValue,
} from './requestFields.js';

export type RouteResponse = {
  status: number;
  body: JsonValue;
};

export type RouteServices = {
  renderFile: (options: RenderFileOptions) => Promise<RenderFileResult>;
  projectPoint: (options: ProjectPointOptions) => Promise<ProjectPointResult>;
  loadPresetFile: (path: string) => Promise<PresetLoadResult>;
};

export const DEFAULT_ROUTE_SERVICES: RouteServices = { renderFile, projectPoint, loadPresetFile };

export type RouteContext = {
  services?: RouteServices;
  workers?: number;
};

const summarizePresetResult = (result: PresetLoadResult): RouteResponse => {
  if (result.kind === 'success') {
    return {
      status: 200,
      body: {
        status: 'ok',
        presets: {
          name: result.config.metadata.name,
          schemaVersion: result.config.schemaVersion,
          canvas: result.config.canvas,
          ids: result.config.presets.map((preset) => preset.id),
        },
        warnings: result.issues.filter((issue) => issue.severity === 'warning'),
      },
    };
  }
  return {
    status: 400,
    body: { status: 'error', message: result.message, issues: result.issues ?? [] },
  };
};

const readConfigRequest = (body: JsonValue) => ({
  presets: optionalString(body, 'presets'),
  preset: optionalString(body, 'preset'),
  canvas: body.canvas === undefined ? undefined : readSize(body.canvas, 'canvas'),
  overrides: readParameterPatch(body),
});

const errorStatus = (error: unknown): number =>
  error instanceof RequestError ||
  error instanceof ProjectionConfigError ||
  error instanceof PresetValidationError ||
  error instanceof UnsupportedInputError
    ? 400
    : 500;

export const routeRequest = async (
  method: string,
  pathname: string,
  body: JsonValue,
  context: RouteContext = {},
): Promise<RouteResponse> => {
  const services = context.services ?? DEFAULT_ROUTE_SERVICES;
  try {
    if (method === 'GET' && pathname === '/health') {
      return { status: 200, body: { status: 'ok' } };
    }

    if (method === 'POST' && pathname === '/render') {
      const input = optionalString(body, 'input');
      if (!input) {
        throw new RequestError('render requires an "input" path.');
      }
      const workers = body.workers === undefined ? context.workers : requireNumber(body, 'workers');
      const summary = await services.renderFile({
        ...readConfigRequest(body),
        input,
        output: optionalString(body, 'output'),
        workers,
      });
      return { status: 200, body: { status: 'ok', ...summary } };
    }

    if (method === 'POST' && pathname === '/project') {
      const result = await services.projectPoint({
        ...readConfigRequest(body),
        x: requireNumber(body, 'x'),
        y: requireNumber(body, 'y'),
        image: readSize(body.image, 'image'),
      });
      return { status: 200, body: { status: 'ok', ...result } };
    }

    if (method === 'POST' && pathname === '/presets/validate') {
      const presetsPath = optionalString(body, 'presetsPath');
      if (presetsPath) {
        return summarizePresetResult(await services.loadPresetFile(presetsPath));
      }
      if (isRecord(body.presets)) {
        return summarizePresetResult(
          await loadPresetFromJson(JSON.stringify(body.presets), '<inline>'),
        );
      }
      throw new RequestError('presets/validate requires "presets" (inline JSON) or "presetsPath".');
    }

    return { status: 404, body: { status: 'error', message: 'Not found' } };
  } catch (error) {
    const status = errorStatus(error);
    if (status === 500) {
      console.error(`[server] ${method} ${pathname} failed`, error);
    }
    return {
      status,
      body: {
        status: 'error',
        message: error instanceof Error ? error.message : String(error),
        ...(error instanceof PresetValidationError ? { issues: error.issues } : {}),
        ...(error instanceof ProjectionConfigError ? { code: error.code } : {}),
      },
    };
  }
};
