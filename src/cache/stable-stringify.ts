import { isPlainObject } from '../utils.js';

const sortObject = (value: Record<string, unknown>): Record<string, unknown> => (
  Object.keys(value)
    .sort()
    .reduce<Record<string, unknown>>((acc, key) => {
      acc[key] = value[key];
      return acc;
    }, {})
);

const replacer = (_key: string, val: unknown): unknown => (isPlainObject(val) ? sortObject(val) : val);

/** Key-sorted JSON, or undefined when the value has cycles or values JSON cannot carry. */
export const canonicalJson = (value: unknown): string | undefined => {
  try {
    const out = JSON.stringify(value, replacer);
    return typeof out === 'string' ? out : undefined;
  } catch {
    return undefined;
  }
};

