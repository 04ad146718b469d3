import crypto from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';

export const isMissingFileError = (error: unknown): boolean => (
  error instanceof Error && 'code' in error && error.code === 'ENOENT'
);

// Write to a sibling temp file, then rename over the target so readers never see a partial file
export async function writeFileAtomic(filePath: string, contents: string): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  const tmp = `${filePath}.tmp-${String(process.pid)}-${crypto.randomUUID()}`;
  await fs.promises.writeFile(tmp, contents, 'utf8');
  await fs.promises.rename(tmp, filePath);
}

export async function appendJsonLine(filePath: string, value: unknown): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  await fs.promises.appendFile(filePath, `${JSON.stringify(value)}\n`, 'utf8');
}

export async function unlinkIfPresent(filePath: string): Promise<void> {
  try {
    await fs.promises.unlink(filePath);
  } catch (error: unknown) {
    if (!isMissingFileError(error)) throw error;
  }
}

/** Files in `dir` matching `pattern` whose mtime is older than `cutoffMs`; empty when the dir is missing. */
export async function listStaleFiles(dir: string, pattern: RegExp, cutoffMs: number): Promise<string[]> {
  let names: string[];
  try {
    names = await fs.promises.readdir(dir);
  } catch (error: unknown) {
    if (isMissingFileError(error)) return [];
    throw error;
  }
  const stale = await Promise.all(names
    .filter((name) => pattern.test(name))
    .map(async (name) => {
      const full = path.join(dir, name);
      try {
        const stat = await fs.promises.stat(full);
        return stat.isFile() && stat.mtimeMs < cutoffMs ? full : undefined;
      } catch (error: unknown) {
        if (isMissingFileError(error)) return undefined;
        throw error;
      }
    }));
  return stale.filter((entry): entry is string => entry !== undefined);
}
