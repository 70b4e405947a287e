import { blake3 } from '@noble/hashes/blake3';
import { bytesToHex } from '@noble/hashes/utils';

import type { RgbImage } from '../raster/rgbImage.js';

const textEncoder = new TextEncoder();

type CanonicalValue =
  | null
  | boolean
  | number
  | string
  | CanonicalValue[]
  | { [key: string]: CanonicalValue };

const normalizeNumber = (value: number): number => {
  if (!Number.isFinite(value)) {
    throw new TypeError(`Canonical JSON cannot encode non-finite numbers (received ${value})`);
  }
  return Object.is(value, -0) ? 0 : value;
};

const isPlainRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const normalizeValue = (value: unknown, inArray: boolean): CanonicalValue | undefined => {
  if (value === null) {
    return null;
  }
  if (value === undefined || typeof value === 'function' || typeof value === 'symbol') {
    return inArray ? null : undefined;
  }
  if (typeof value === 'number') {
    return normalizeNumber(value);
  }
  if (typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'bigint') {
    throw new TypeError('Canonical JSON does not support bigint values');
  }
  if (Array.isArray(value)) {
    return value.map((entry: unknown) => normalizeValue(entry, true) ?? null);
  }
  if (ArrayBuffer.isView(value) && !(value instanceof DataView)) {
    return Array.from(new Uint8Array(value.buffer, value.byteOffset, value.byteLength), (n) => n);
  }
  if (value instanceof Map) {
    return normalizeValue(Object.fromEntries(value), false);
  }
  if (isPlainRecord(value)) {
    const result: { [key: string]: CanonicalValue } = {};
    for (const key of Object.keys(value).sort()) {
      const normalized = normalizeValue(value[key], false);
      if (normalized !== undefined) {
        result[key] = normalized;
      }
    }
    return result;
  }
  throw new TypeError('Unsupported canonical JSON value encountered during serialization');
};

const stringify = (
  value: CanonicalValue,
  indentUnit: string | undefined,
  depth: number,
): string => {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value);
  }
  const entries: Array<[string | null, CanonicalValue]> = Array.isArray(value)
    ? value.map((entry): [string | null, CanonicalValue] => [null, entry])
    : Object.keys(value).map((key): [string | null, CanonicalValue] => [key, value[key]]);
  const [open, close] = Array.isArray(value) ? ['[', ']'] : ['{', '}'];
  if (entries.length === 0) {
    return `${open}${close}`;
  }
  const separator = indentUnit ? ': ' : ':';
  const parts = entries.map(([key, entry]) => {
    const body = stringify(entry, indentUnit, depth + 1);
    return key === null ? body : `${JSON.stringify(key)}${separator}${body}`;
  });
  if (!indentUnit) {
    return `${open}${parts.join(',')}${close}`;
  }
  const inner = indentUnit.repeat(depth + 1);
  const outer = indentUnit.repeat(depth);
  return `${open}\n${parts.map((part) => `${inner}${part}`).join(',\n')}\n${outer}${close}`;
};

export type CanonicalJsonWriteOptions = {
  indent?: number;
};

/** Serialises with sorted keys, `-0` folded to `0` and undefined fields dropped. */
export const writeCanonicalJson = (
  value: unknown,
  options: CanonicalJsonWriteOptions = {},
): string => {
  const normalized = normalizeValue(value, false) ?? null;
  const indent =
    typeof options.indent === 'number' && options.indent > 0 ? Math.min(options.indent, 10) : 0;
  return stringify(normalized, indent > 0 ? ' '.repeat(indent) : undefined, 0);
};

export const hashBytes = (bytes: Uint8Array): string =>
  bytesToHex(blake3.create({}).update(bytes).digest());

export const hashCanonicalJson = (
  value: unknown,
  options: CanonicalJsonWriteOptions = {},
): { json: string; hash: string } => {
  const json = writeCanonicalJson(value, options);
  return { json, hash: hashBytes(textEncoder.encode(json)) };
};

/** BLAKE3 over the dimensions header followed by the raw RGB bytes. */
export const digestRgbImage = (image: RgbImage): string => {
  const header = textEncoder.encode(`rgb24:${image.width}x${image.height}:`);
  return bytesToHex(blake3.create({}).update(header).update(image.data).digest());
};
