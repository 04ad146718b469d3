import fs from 'node:fs';
import path from 'node:path';

import { Mutex } from 'async-mutex';
import { z } from 'zod';

import type { ArtifactMetadata, ArtifactSink, ArtifactStats, StoredArtifact } from './types.js';

import { md5Hex } from '../cache/hash.js';
import { isMissingFileError, listStaleFiles, unlinkIfPresent, writeFileAtomic } from '../persistence.js';
import { SecurityError, ValidationError } from '../pipeline/errors.js';
import { fail, ok, systemClock, type Clock, type LogCallback, type Outcome } from '../types.js';
import { errorMessage, isPlainObject, utf8ByteLength, warn } from '../utils.js';

import { artifactIdFor, validateArtifactId } from './artifact-id.js';

const METADATA_FILE = 'metadata.json';
const ARTIFACTS_SUBDIR = 'artifacts';

const ArtifactMetadataSchema = z.object({
  artifactId: z.string(),
  filename: z.string(),
  createdAt: z.number(),
  sizeBytes: z.number().int().nonnegative(),
  hash: z.string(),
  toolName: z.string(),
  summary: z.string(),
});

const MetadataFileSchema = z.object({
  version: z.literal(1),
  artifacts: z.record(z.string(), ArtifactMetadataSchema),
});

export interface ArtifactStoreOptions {
  dir: string;
  clock?: Clock;
  onLog?: LogCallback;
}

export function summarizeArtifactData(data: unknown): string {
  if (Array.isArray(data)) return `List with ${String(data.length)} items`;
  if (isPlainObject(data)) return `Dict with ${String(Object.keys(data).length)} keys`;
  if (typeof data === 'string') return `String (${String(data.length)} chars)`;
  if (typeof data === 'number' || typeof data === 'boolean') return `${typeof data}: ${String(data)}`;
  if (data === null) return 'null';
  return typeof data;
}

export function formatArtifactObservation(artifactId: string, summary: string, sizeBytes: number): string {
  return [
    `Data stored as artifact: ${artifactId}`,
    '',
    'Large dataset available for subsequent tool access.',
    '',
    'To access this data, reference the artifact_id in your next tool call.',
    'The system will securely retrieve the data for you.',
    '',
    `Data summary: ${summary}`,
    `Size: ${sizeBytes.toLocaleString('en-US')} bytes`,
  ].join('\n');
}

/**
 * Content-addressed payload store. Callers only ever see opaque `artifact_<hex>` ids;
 * the id → path mapping stays inside this class. Metadata lives in its own file so
 * listing and cleanup never read payloads.
 */
export class ArtifactStore implements ArtifactSink {
  /** Absolute storage directory; holds `artifacts/` and the metadata file. */
  readonly root: string;
  private readonly artifactsDir: string;
  private readonly metadataPath: string;
  private readonly clock: Clock;
  private readonly onLog?: LogCallback;
  private readonly mutex = new Mutex();
  private metadata?: Map<string, ArtifactMetadata>;

  constructor(opts: ArtifactStoreOptions) {
    this.root = path.resolve(opts.dir);
    this.artifactsDir = path.join(this.root, ARTIFACTS_SUBDIR);
    this.metadataPath = path.join(this.root, METADATA_FILE);
    this.clock = opts.clock ?? systemClock;
    this.onLog = opts.onLog;
  }

  async store(data: unknown, toolName: string, summary?: string): Promise<StoredArtifact> {
    const artifactId = artifactIdFor(data);
    const payload = artifactId !== undefined ? JSON.stringify(data, null, 2) : undefined;
    if (artifactId === undefined || payload === undefined) {
      throw new ValidationError('Artifact payload must be JSON-serializable');
    }
    const hash = md5Hex(payload);
    const resolvedSummary = summary ?? summarizeArtifactData(data);

    return await this.mutex.runExclusive(async () => {
      const table = await this.loadMetadata();
      const existing = table.get(artifactId);
      const filePath = this.payloadPath(artifactId);
      if (existing?.hash === hash && fs.existsSync(filePath)) {
        return {
          artifactId,
          observation: formatArtifactObservation(artifactId, existing.summary, existing.sizeBytes),
          metadata: { ...existing },
        };
      }

      await writeFileAtomic(filePath, payload);
      const metadata: ArtifactMetadata = {
        artifactId,
        filename: path.basename(filePath),
        createdAt: this.clock(),
        sizeBytes: utf8ByteLength(payload),
        hash,
        toolName,
        summary: resolvedSummary,
      };
      table.set(artifactId, metadata);
      await this.persistMetadata(table);
      this.log('VRB', `stored artifact ${artifactId} (${String(metadata.sizeBytes)} bytes)`, toolName);
      return {
        artifactId,
        observation: formatArtifactObservation(artifactId, metadata.summary, metadata.sizeBytes),
        metadata: { ...metadata },
      };
    });
  }

  /** `ok(undefined)` when the id is well-formed but unknown. */
  async retrieve(artifactId: string): Promise<Outcome<unknown, SecurityError>> {
    const invalid = validateArtifactId(artifactId);
    if (invalid !== undefined) return fail(invalid);

    return await this.mutex.runExclusive(async () => {
      const table = await this.loadMetadata();
      const entry = table.get(artifactId);
      if (entry === undefined) return ok(undefined);
      const contained = await this.verifyContainment(artifactId);
      if (contained === 'missing') {
        table.delete(artifactId);
        await this.persistMetadata(table);
        warn(`artifact ${artifactId} payload missing; metadata removed`);
        return ok(undefined);
      }
      if (contained === 'outside') {
        return fail(new SecurityError('Artifact path resolves outside the artifact directory'));
      }
      const raw = await fs.promises.readFile(this.payloadPath(artifactId), 'utf8');
      const parsed: unknown = JSON.parse(raw);
      return ok(parsed);
    });
  }

  async has(artifactId: string): Promise<boolean> {
    if (validateArtifactId(artifactId) !== undefined) return false;
    const table = await this.mutex.runExclusive(async () => await this.loadMetadata());
    return table.has(artifactId);
  }

  async delete(artifactId: string): Promise<boolean> {
    if (validateArtifactId(artifactId) !== undefined) return false;
    return await this.mutex.runExclusive(async () => {
      const table = await this.loadMetadata();
      if (!table.has(artifactId)) return false;
      if (await this.verifyContainment(artifactId) === 'outside') return false;
      await unlinkIfPresent(this.payloadPath(artifactId));
      table.delete(artifactId);
      await this.persistMetadata(table);
      return true;
    });
  }

  async cleanup(maxAgeHours = 24): Promise<number> {
    const cutoff = this.clock() - maxAgeHours * 3600 * 1000;
    return await this.mutex.runExclusive(async () => {
      const table = await this.loadMetadata();
      const expired = [...table.values()].filter((entry) => entry.createdAt < cutoff);
      await Promise.all(expired.map(async (entry) => {
        await unlinkIfPresent(this.payloadPath(entry.artifactId));
        table.delete(entry.artifactId);
      }));
      await this.sweepOrphans(table, cutoff);
      if (expired.length > 0) {
        await this.persistMetadata(table);
        this.log('FIN', `removed ${String(expired.length)} expired artifacts`);
      }
      return expired.length;
    });
  }

  async listArtifacts(toolName?: string, limit = 100): Promise<ArtifactMetadata[]> {
    const table = await this.mutex.runExclusive(async () => await this.loadMetadata());
    return [...table.values()]
      .filter((entry) => toolName === undefined || entry.toolName === toolName)
      .sort((a, b) => b.createdAt - a.createdAt)
      .slice(0, Math.max(0, limit))
      .map((entry) => ({ ...entry }));
  }

  async stats(): Promise<ArtifactStats> {
    const table = await this.mutex.runExclusive(async () => await this.loadMetadata());
    const entries = [...table.values()];
    const byTool: Record<string, number> = {};
    entries.forEach((entry) => {
      byTool[entry.toolName] = (byTool[entry.toolName] ?? 0) + 1;
    });
    const created = entries.map((entry) => entry.createdAt);
    return {
      totalArtifacts: entries.length,
      totalSizeBytes: entries.reduce((sum, entry) => sum + entry.sizeBytes, 0),
      byTool,
      oldestCreatedAt: created.length > 0 ? Math.min(...created) : undefined,
      newestCreatedAt: created.length > 0 ? Math.max(...created) : undefined,
    };
  }

  private payloadPath(artifactId: string): string {
    return path.join(this.artifactsDir, `${artifactId}.json`);
  }

  // Resolves symlinks on both sides before comparing ancestry
  private async verifyContainment(artifactId: string): Promise<'inside' | 'outside' | 'missing'> {
    const lexical = path.resolve(this.artifactsDir, `${artifactId}.json`);
    if (path.dirname(lexical) !== this.artifactsDir) return 'outside';
    try {
      const [realDir, realFile] = await Promise.all([
        fs.promises.realpath(this.artifactsDir),
        fs.promises.realpath(lexical),
      ]);
      const relative = path.relative(realDir, realFile);
      if (relative.length === 0 || relative.startsWith('..') || path.isAbsolute(relative)) return 'outside';
      return 'inside';
    } catch (error: unknown) {
      if (isMissingFileError(error)) return 'missing';
      throw error;
    }
  }

  private async sweepOrphans(table: Map<string, ArtifactMetadata>, cutoff: number): Promise<void> {
    const known = new Set([...table.values()].map((entry) => path.join(this.artifactsDir, entry.filename)));
    const stale = await listStaleFiles(this.artifactsDir, /^artifact_[0-9a-f]{16}\.json$/, cutoff);
    await Promise.all(stale.filter((file) => !known.has(file)).map(async (file) => {
      try {
        await unlinkIfPresent(file);
      } catch (error: unknown) {
        warn(`artifact orphan sweep failed for ${path.basename(file)}: ${errorMessage(error)}`);
      }
    }));
  }

  private async loadMetadata(): Promise<Map<string, ArtifactMetadata>> {
    if (this.metadata !== undefined) return this.metadata;
    const table = new Map<string, ArtifactMetadata>();
    try {
      const raw = await fs.promises.readFile(this.metadataPath, 'utf8');
      const parsed = MetadataFileSchema.safeParse(JSON.parse(raw));
      if (parsed.success) {
        Object.values(parsed.data.artifacts).forEach((entry) => {
          if (validateArtifactId(entry.artifactId) === undefined) table.set(entry.artifactId, entry);
        });
      } else {
        warn(`artifact metadata file is malformed; starting with an empty table`);
      }
    } catch (error: unknown) {
      if (!isMissingFileError(error)) warn(`artifact metadata could not be read: ${errorMessage(error)}`);
    }
    this.metadata = table;
    return table;
  }

  private async persistMetadata(table: Map<string, ArtifactMetadata>): Promise<void> {
    const body = { version: 1, artifacts: Object.fromEntries(table.entries()) };
    await writeFileAtomic(this.metadataPath, JSON.stringify(body, null, 2));
  }

  private log(severity: 'VRB' | 'FIN', message: string, toolName?: string): void {
    this.onLog?.({
      timestamp: this.clock(),
      severity,
      type: 'artifact',
      remoteIdentifier: toolName !== undefined ? `tool:${toolName}` : 'store:artifacts',
      message,
    });
  }
}
