import { blake3 } from '@noble/hashes/blake3';
import { bytesToHex, utf8ToBytes } from '@noble/hashes/utils';

type CanonicalScalar = null | boolean | number | string;

export type CanonicalValue =
  | CanonicalScalar
  | CanonicalValue[]
  | { [key: string]: CanonicalValue };

const formatCanonicalNumber = (value: number): string => {
  if (!Number.isFinite(value)) {
    throw new TypeError(`Canonical JSON cannot encode non-finite numbers (received ${value})`);
  }
  if (value === 0) {
    return '0';
  }
  const text = String(value);
  const exponentIndex = text.indexOf('e');
  if (exponentIndex < 0) {
    return text;
  }
  const mantissa = text.slice(0, exponentIndex);
  const exponent = text.slice(exponentIndex + 1);
  return `${mantissa}e${exponent.startsWith('+') ? exponent.slice(1) : exponent}`;
};

const isPlainObject = (value: unknown): value is Record<string, unknown> => {
  if (!value || typeof value !== 'object') {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
};

type NormalizeContext = {
  inArray: boolean;
};

const normalizeArray = (source: readonly unknown[]): CanonicalValue[] =>
  source.map((entry) => normalizeValue(entry, { inArray: true }) ?? null);

const normalizeObject = (value: Record<string, unknown>): CanonicalValue => {
  const result: Record<string, CanonicalValue> = {};
  for (const key of Object.keys(value).sort()) {
    const normalized = normalizeValue(value[key], { inArray: false });
    if (normalized !== undefined) {
      result[key] = normalized;
    }
  }
  return result;
};

const normalizeValue = (value: unknown, context: NormalizeContext): CanonicalValue | undefined => {
  if (value === null) {
    return null;
  }
  if (value === undefined || typeof value === 'function' || typeof value === 'symbol') {
    return context.inArray ? null : undefined;
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new TypeError(`Canonical JSON cannot encode non-finite numbers (received ${value})`);
    }
    return Object.is(value, -0) ? 0 : value;
  }
  if (typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'bigint') {
    throw new TypeError('Canonical JSON does not support bigint values');
  }
  if (Array.isArray(value)) {
    return normalizeArray(value);
  }
  if (value instanceof Float64Array || value instanceof Float32Array) {
    return normalizeArray(Array.from(value));
  }
  if (value instanceof Map) {
    const record: Record<string, unknown> = {};
    for (const [key, entry] of value.entries()) {
      record[String(key)] = entry;
    }
    return normalizeObject(record);
  }
  if (isPlainObject(value)) {
    return normalizeObject(value);
  }
  throw new TypeError('Unsupported canonical JSON value encountered during serialization');
};

const stringifyCanonicalValue = (
  value: CanonicalValue,
  indentUnit: string | undefined,
  depth: number,
): string => {
  if (value === null) {
    return 'null';
  }
  if (typeof value === 'number') {
    return formatCanonicalNumber(value);
  }
  if (typeof value === 'string') {
    return JSON.stringify(value);
  }
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false';
  }

  let entries: [string | null, CanonicalValue][];
  let open: string;
  let close: string;
  if (Array.isArray(value)) {
    entries = value.map((entry): [string | null, CanonicalValue] => [null, entry]);
    [open, close] = ['[', ']'];
  } else {
    const record = value;
    entries = Object.keys(record).map((key): [string | null, CanonicalValue] => [key, record[key]]);
    [open, close] = ['{', '}'];
  }
  if (entries.length === 0) {
    return `${open}${close}`;
  }

  const separator = indentUnit === undefined ? ':' : ': ';
  const parts = entries.map(([key, entry]) => {
    const body = stringifyCanonicalValue(entry, indentUnit, depth + 1);
    return key === null ? body : `${JSON.stringify(key)}${separator}${body}`;
  });
  if (indentUnit === undefined) {
    return `${open}${parts.join(',')}${close}`;
  }
  const nextIndent = indentUnit.repeat(depth + 1);
  const baseIndent = indentUnit.repeat(depth);
  return `${open}\n${parts.map((part) => `${nextIndent}${part}`).join(',\n')}\n${baseIndent}${close}`;
};

export type CanonicalJsonWriteOptions = {
  indent?: number;
};

/**
 * Deterministic JSON: object keys sorted, -0 written as 0, undefined members
 * dropped (null inside arrays) and non-finite numbers rejected.
 */
export const writeCanonicalJson = (
  value: unknown,
  options: CanonicalJsonWriteOptions = {},
): string => {
  const normalized = normalizeValue(value, { inArray: false }) ?? null;
  const indentUnit =
    typeof options.indent === 'number' && options.indent > 0
      ? ' '.repeat(Math.min(options.indent, 10))
      : undefined;
  return stringifyCanonicalValue(normalized, indentUnit, 0);
};

export const readCanonicalJson = (text: string): CanonicalValue => {
  const parsed: unknown = JSON.parse(text);
  const normalized = normalizeValue(parsed, { inArray: false });
  return normalized ?? null;
};

export const hashCanonicalJsonString = (json: string): string =>
  bytesToHex(blake3(utf8ToBytes(json)));

export const hashCanonicalJson = (
  value: unknown,
  options: CanonicalJsonWriteOptions = {},
): { json: string; hash: string } => {
  const json = writeCanonicalJson(value, options);
  return { json, hash: hashCanonicalJsonString(json) };
};
