type Primitive = string | number | boolean | null;

const isObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isPrimitive = (value: unknown): value is Primitive =>
  value === null ||
  typeof value === 'string' ||
  typeof value === 'number' ||
  typeof value === 'boolean';

export type DiffEntry =
  | { kind: 'added'; path: string; value: unknown }
  | { kind: 'removed'; path: string; value: unknown }
  | { kind: 'changed'; path: string; left: unknown; right: unknown };

export type DiffOptions = {
  /** Absolute tolerance applied to numeric leaves. */
  tolerance?: number;
};

const toPath = (parts: Array<string | number>): string =>
  parts
    .map((part, index) => {
      if (typeof part === 'number') {
        return `[${part}]`;
      }
      return index === 0 ? part : `.${part}`;
    })
    .join('');

const primitivesMatch = (left: Primitive, right: Primitive, tolerance: number): boolean => {
  if (typeof left === 'number' && typeof right === 'number') {
    return left === right || Math.abs(left - right) <= tolerance;
  }
  return left === right;
};

const walk = (
  left: unknown,
  right: unknown,
  tolerance: number,
  path: Array<string | number>,
  acc: DiffEntry[],
) => {
  if (left === right) {
    return;
  }
  if (Array.isArray(left) && Array.isArray(right)) {
    const max = Math.max(left.length, right.length);
    for (let i = 0; i < max; i++) {
      if (i >= left.length) {
        acc.push({ kind: 'added', path: toPath([...path, i]), value: right[i] });
      } else if (i >= right.length) {
        acc.push({ kind: 'removed', path: toPath([...path, i]), value: left[i] });
      } else {
        walk(left[i], right[i], tolerance, [...path, i], acc);
      }
    }
    return;
  }
  if (isObject(left) && isObject(right)) {
    const keys = new Set([...Object.keys(left), ...Object.keys(right)]);
    for (const key of keys) {
      if (!(key in right)) {
        acc.push({ kind: 'removed', path: toPath([...path, key]), value: left[key] });
      } else if (!(key in left)) {
        acc.push({ kind: 'added', path: toPath([...path, key]), value: right[key] });
      } else {
        walk(left[key], right[key], tolerance, [...path, key], acc);
      }
    }
    return;
  }
  if (isPrimitive(left) && isPrimitive(right) && primitivesMatch(left, right, tolerance)) {
    return;
  }
  acc.push({ kind: 'changed', path: toPath(path), left, right });
};

/** Structural diff of two reports; numbers within `tolerance` compare equal. */
export const diffReports = (
  left: unknown,
  right: unknown,
  options: DiffOptions = {},
): DiffEntry[] => {
  const tolerance = Math.max(0, options.tolerance ?? 0);
  const acc: DiffEntry[] = [];
  walk(left, right, tolerance, [], acc);
  return acc;
};
