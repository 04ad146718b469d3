export type DurationInput = number | string | null | undefined;

const UNIT_TO_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
  w: 7 * 24 * 60 * 60 * 1000,
};

/** Accepts plain milliseconds (number or numeric string) or `<n><unit>` with unit ms/s/m/h/d/w. */
export const parseDurationMs = (value: DurationInput): number | undefined => {
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'number') {
    if (!Number.isFinite(value) || value < 0) return undefined;
    return Math.trunc(value);
  }
  const raw = value.trim().toLowerCase();
  if (raw.length === 0) return undefined;
  if (/^\d+(\.\d+)?$/.test(raw)) return Math.trunc(Number.parseFloat(raw));
  const match = /^(\d+(?:\.\d+)?)(ms|s|m|h|d|w)$/.exec(raw);
  if (match === null) return undefined;
  const ms = Number.parseFloat(match[1]) * UNIT_TO_MS[match[2]];
  return Number.isFinite(ms) ? Math.trunc(ms) : undefined;
};
