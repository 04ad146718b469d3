import { md5Hex } from '../cache/hash.js';
import { canonicalJson } from '../cache/stable-stringify.js';
import { SecurityError } from '../pipeline/errors.js';

export const ARTIFACT_ID_PREFIX = 'artifact_';
export const ARTIFACT_ID_HEX_LENGTH = 16;
export const ARTIFACT_ID_LENGTH = ARTIFACT_ID_PREFIX.length + ARTIFACT_ID_HEX_LENGTH;

const ARTIFACT_ID_PATTERN = /^artifact_[0-9a-f]{16}$/;

/** Content-derived id: identical payloads map to the same artifact. Undefined for unserializable data. */
export function artifactIdFor(data: unknown): string | undefined {
  const canonical = canonicalJson(data);
  if (canonical === undefined) return undefined;
  return `${ARTIFACT_ID_PREFIX}${md5Hex(canonical).slice(0, ARTIFACT_ID_HEX_LENGTH)}`;
}

/** Pure string checks; runs before any filesystem access. */
export function validateArtifactId(artifactId: unknown): SecurityError | undefined {
  if (typeof artifactId !== 'string' || artifactId.length === 0) {
    return new SecurityError('Artifact id must be a non-empty string');
  }
  if (!artifactId.startsWith(ARTIFACT_ID_PREFIX)) {
    return new SecurityError(`Invalid artifact id format: ${artifactId.slice(0, 64)}`);
  }
  if (artifactId.includes('/') || artifactId.includes('\\')) {
    return new SecurityError('Artifact id must not contain path separators');
  }
  if (artifactId.includes('..')) {
    return new SecurityError('Artifact id must not contain path traversal sequences');
  }
  if (artifactId.length !== ARTIFACT_ID_LENGTH) {
    return new SecurityError(`Artifact id must be exactly ${String(ARTIFACT_ID_LENGTH)} characters`);
  }
  if (!ARTIFACT_ID_PATTERN.test(artifactId)) {
    return new SecurityError('Artifact id must end in lowercase hex characters');
  }
  return undefined;
}

export const isValidArtifactId = (artifactId: unknown): artifactId is string =>
  validateArtifactId(artifactId) === undefined;
