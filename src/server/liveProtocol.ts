import type {
  CanvasSize,
  ProjectionParameters,
  ProjectionParametersInput,
} from '../projection/parameters.js';
import type { RenderSessionEvent } from '../session/renderSession.js';
import { digestRgbImage } from '../serialization/canonicalJson.js';
import { RequestError, isRecord, readParameterPatch } from './requestFields.js';

export type LiveClientMessage =
  | { readonly kind: 'source'; readonly path: string }
  | { readonly kind: 'params'; readonly patch: ProjectionParametersInput }
  | { readonly kind: 'refresh' };

export type LiveServerMessage =
  | {
      readonly kind: 'ready';
      readonly canvas: CanvasSize;
      readonly parameters: ProjectionParameters;
    }
  | {
      readonly kind: 'frame';
      readonly sequence: number;
      readonly width: number;
      readonly height: number;
      readonly digest: string;
      readonly parameters: ProjectionParameters;
      readonly passMs: number | null;
    }
  | { readonly kind: 'dropped'; readonly parameters: ProjectionParameters }
  | { readonly kind: 'error'; readonly message: string };

export type LiveParseResult =
  | { readonly ok: true; readonly message: LiveClientMessage }
  | { readonly ok: false; readonly error: string };

export const parseLiveMessage = (raw: string): LiveParseResult => {
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch {
    return { ok: false, error: 'Live messages must be JSON' };
  }
  if (!isRecord(payload) || typeof payload.kind !== 'string') {
    return { ok: false, error: 'Live messages must be objects with a "kind"' };
  }
  switch (payload.kind) {
    case 'source':
      if (typeof payload.path !== 'string' || payload.path.length === 0) {
        return { ok: false, error: 'source messages require a "path"' };
      }
      return { ok: true, message: { kind: 'source', path: payload.path } };
    case 'params':
      try {
        return { ok: true, message: { kind: 'params', patch: readParameterPatch(payload) } };
      } catch (error) {
        if (error instanceof RequestError) {
          return { ok: false, error: error.message };
        }
        throw error;
      }
    case 'refresh':
      return { ok: true, message: { kind: 'refresh' } };
    default:
      return { ok: false, error: `Unknown live message kind "${payload.kind}"` };
  }
};

/** Converts a session event to the JSON header sent ahead of any binary frame. */
export const describeSessionEvent = (event: RenderSessionEvent): LiveServerMessage => {
  switch (event.kind) {
    case 'frame':
      return {
        kind: 'frame',
        sequence: event.frame.sequence,
        width: event.frame.image.width,
        height: event.frame.image.height,
        digest: digestRgbImage(event.frame.image),
        parameters: event.frame.parameters,
        passMs: event.frame.performance?.passMs ?? null,
      };
    case 'dropped':
      return { kind: 'dropped', parameters: event.parameters };
    case 'error':
      return {
        kind: 'error',
        message: event.error instanceof Error ? event.error.message : String(event.error),
      };
  }
};
