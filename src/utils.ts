export const isPlainObject = (value: unknown): value is Record<string, unknown> => (
  value !== null && typeof value === 'object' && !Array.isArray(value) && !(value instanceof Uint8Array)
);

export const errorMessage = (error: unknown): string => (
  error instanceof Error ? error.message : String(error)
);

export const truncate = (value: string, max: number): string => (
  value.length > max ? value.slice(0, max) : value
);

// Compact JSON or undefined when the value cannot be serialized (cycles, bigint)
export const tryJsonStringify = (value: unknown, indent?: number): string | undefined => {
  try {
    const out = JSON.stringify(value, null, indent);
    return typeof out === 'string' ? out : undefined;
  } catch {
    return undefined;
  }
};

export const utf8ByteLength = (value: string): number => Buffer.byteLength(value, 'utf8');

export const sleep = (ms: number): Promise<void> => new Promise((resolve) => {
  setTimeout(resolve, ms);
});

// UTC stamp used in persisted file names: YYYYMMDD_HHMMSS
export function formatFileStamp(ms: number, withTime = true): string {
  const d = new Date(ms);
  const pad = (n: number): string => String(n).padStart(2, '0');
  const date = `${String(d.getUTCFullYear())}${pad(d.getUTCMonth() + 1)}${pad(d.getUTCDate())}`;
  if (!withTime) return date;
  return `${date}_${pad(d.getUTCHours())}${pad(d.getUTCMinutes())}${pad(d.getUTCSeconds())}`;
}

// Identifiers end up inside file names; keep them to a portable alphabet
export const sanitizeFileComponent = (value: string): string => {
  const cleaned = value.replace(/[^A-Za-z0-9_.-]/g, '_').replace(/\.{2,}/g, '_');
  return cleaned.length > 0 ? cleaned : 'unknown';
};

let warningSink: ((message: string) => void) | undefined;

export function setWarningSink(handler?: (message: string) => void): void {
  warningSink = handler;
}

// Silent until a host installs a sink
export function warn(message: string): void {
  const sink = warningSink;
  if (sink === undefined) {
    return;
  }
  try {
    sink(message);
  } catch {
    /* sink failures are dropped */
  }
}
