import type { ArtifactSink } from '../artifacts/types.js';
import type { Clock } from '../types.js';

import { md5Hex } from '../cache/hash.js';
import { errorMessage, isPlainObject, truncate, tryJsonStringify, utf8ByteLength, warn } from '../utils.js';

import { outputLevelFromSize, shouldUseArtifact, ARTIFACT_THRESHOLD_BYTES, type OutputLevel } from './output-level.js';
import { createSuccessResult, type ResultMetadata, type ToolExecutionResult } from './result.js';

import type { CachePolicy } from './cache-policy.js';

export type ShapeableValue =
  | { kind: 'map'; entries: [string, unknown][] }
  | { kind: 'sequence'; items: unknown[] }
  | { kind: 'text'; text: string }
  | { kind: 'scalar'; value: unknown; text: string }
  | { kind: 'empty' }
  | { kind: 'blob'; bytes: Uint8Array };

const BRIEF_MAX_CHARS = 100;
const STANDARD_VALUE_MAX_CHARS = 100;
const STANDARD_TEXT_MAX_CHARS = 1000;
const STANDARD_MAX_FIELDS = 10;

export function classifyValue(raw: unknown): ShapeableValue {
  if (raw === null || raw === undefined) return { kind: 'empty' };
  if (typeof raw === 'string') return { kind: 'text', text: raw };
  if (raw instanceof Uint8Array) return { kind: 'blob', bytes: raw };
  if (raw instanceof Date) return { kind: 'text', text: raw.toISOString() };
  if (Array.isArray(raw)) return { kind: 'sequence', items: raw };
  if (raw instanceof Set) return { kind: 'sequence', items: [...raw] };
  if (raw instanceof Map) {
    return { kind: 'map', entries: [...raw.entries()].map(([key, value]): [string, unknown] => [String(key), value]) };
  }
  if (isPlainObject(raw)) return { kind: 'map', entries: Object.entries(raw) };
  return { kind: 'scalar', value: raw, text: String(raw) };
}

/** Plain JSON-compatible form of a shapeable value (blobs become base64 envelopes). */
export function toPlainValue(value: ShapeableValue): unknown {
  switch (value.kind) {
    case 'map': return Object.fromEntries(value.entries);
    case 'sequence': return value.items;
    case 'text': return value.text;
    case 'scalar': return typeof value.value === 'number' || typeof value.value === 'boolean' ? value.value : value.text;
    case 'empty': return null;
    case 'blob': return { encoding: 'base64', data: Buffer.from(value.bytes).toString('base64') };
  }
}

function renderInline(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value === null || value === undefined) return String(value);
  if (typeof value === 'object') return tryJsonStringify(value) ?? String(value);
  return String(value);
}

function formatBrief(value: ShapeableValue): string {
  switch (value.kind) {
    case 'map': {
      const fields = new Map(value.entries);
      if (fields.has('success')) {
        if (Boolean(fields.get('success'))) return 'Success';
        const error = fields.get('error');
        return truncate(`Error: ${error === undefined || error === null ? 'Unknown' : renderInline(error)}`, BRIEF_MAX_CHARS);
      }
      if (fields.has('count')) return truncate(`Found ${renderInline(fields.get('count'))} items`, BRIEF_MAX_CHARS);
      if (value.entries.length <= 3) {
        const pairs = value.entries.map(([key, item]) => `${key}=${renderInline(item)}`).join(', ');
        return truncate(`Result: ${pairs}`, BRIEF_MAX_CHARS);
      }
      return `Result with ${String(value.entries.length)} fields`;
    }
    case 'sequence': return `List of ${String(value.items.length)} items`;
    case 'text': return truncate(value.text, BRIEF_MAX_CHARS);
    case 'scalar': return truncate(value.text, BRIEF_MAX_CHARS);
    case 'empty': return 'No data';
    case 'blob': return `Binary data (${String(value.bytes.byteLength)} bytes)`;
  }
}

function formatStandard(value: ShapeableValue): string {
  switch (value.kind) {
    case 'map': {
      const lines = [`Result (${String(value.entries.length)} fields):`];
      value.entries.slice(0, STANDARD_MAX_FIELDS).forEach(([key, item]) => {
        lines.push(`  ${key}: ${truncate(renderInline(item), STANDARD_VALUE_MAX_CHARS)}`);
      });
      if (value.entries.length > STANDARD_MAX_FIELDS) {
        lines.push(`  ... and ${String(value.entries.length - STANDARD_MAX_FIELDS)} more fields`);
      }
      return lines.join('\n');
    }
    case 'sequence': {
      if (value.items.length === 0) return 'Empty list';
      const first = truncate(renderInline(value.items[0]), STANDARD_VALUE_MAX_CHARS);
      return `List of ${String(value.items.length)} items\nFirst item: ${first}`;
    }
    case 'text': return truncate(value.text, STANDARD_TEXT_MAX_CHARS);
    case 'scalar': return truncate(value.text, STANDARD_TEXT_MAX_CHARS);
    case 'empty': return 'No data';
    case 'blob': return `Binary data (${String(value.bytes.byteLength)} bytes)`;
  }
}

function formatFull(value: ShapeableValue): string {
  switch (value.kind) {
    case 'text': return value.text;
    case 'scalar': return value.text;
    case 'empty': return 'No data';
    case 'blob': return Buffer.from(value.bytes).toString('base64');
    case 'map':
    case 'sequence': {
      const plain = toPlainValue(value);
      return tryJsonStringify(plain, 2) ?? String(plain);
    }
  }
}

export function formatObservation(value: ShapeableValue, level: OutputLevel): string {
  if (level === 'brief') return formatBrief(value);
  if (level === 'standard') return formatStandard(value);
  return formatFull(value);
}

export interface SerializedPayload {
  sizeBytes: number;
  hash: string;
}

/** Compact serialized size and md5 of a payload, independent of the output level. */
export function measurePayload(value: ShapeableValue): SerializedPayload {
  if (value.kind === 'blob') {
    return { sizeBytes: value.bytes.byteLength, hash: md5Hex(value.bytes) };
  }
  const plain = toPlainValue(value);
  const serialized = tryJsonStringify(plain) ?? String(plain);
  return { sizeBytes: utf8ByteLength(serialized), hash: md5Hex(serialized) };
}

export interface ShapeResultInput {
  toolCallId: string;
  toolName: string;
  raw: unknown;
  outputLevel?: OutputLevel;
  durationMs?: number;
  retryCount?: number;
  cachePolicy?: CachePolicy;
  artifactStore?: ArtifactSink;
  artifactThresholdBytes?: number;
  metadata?: ResultMetadata;
  clock?: Clock;
}

/**
 * Turns raw tool output into a result. Large FULL payloads are offloaded when an
 * artifact store is available; offload failures fall back to a STANDARD summary.
 */
export async function buildResultFromRawData(input: ShapeResultInput): Promise<ToolExecutionResult> {
  const value = classifyValue(input.raw);
  const measured = measurePayload(value);
  const level = input.outputLevel ?? outputLevelFromSize(measured.sizeBytes);
  const threshold = input.artifactThresholdBytes ?? ARTIFACT_THRESHOLD_BYTES;
  const base = {
    toolCallId: input.toolCallId,
    toolName: input.toolName,
    durationMs: input.durationMs,
    retryCount: input.retryCount,
    cachePolicy: input.cachePolicy,
    dataSizeBytes: measured.sizeBytes,
    dataHash: measured.hash,
    metadata: input.metadata,
    clock: input.clock,
  };

  if (shouldUseArtifact(level, measured.sizeBytes, threshold)) {
    if (input.artifactStore !== undefined) {
      try {
        const stored = await input.artifactStore.store(toPlainValue(value), input.toolName);
        return createSuccessResult({ ...base, observation: stored.observation, outputLevel: 'full', artifactId: stored.artifactId });
      } catch (error: unknown) {
        warn(`artifact offload failed for ${input.toolName}: ${errorMessage(error)}; returning a standard summary`);
        return createSuccessResult({ ...base, observation: formatObservation(value, 'standard'), outputLevel: 'standard' });
      }
    }
  }

  return createSuccessResult({ ...base, observation: formatObservation(value, level), outputLevel: level });
}
