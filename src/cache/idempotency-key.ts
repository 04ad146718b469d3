import { md5Hex } from './hash.js';
import { canonicalJson } from './stable-stringify.js';

export interface IdempotencyKeyParts {
  toolName: string;
  toolVersion: string;
  parameters: Record<string, unknown>;
  callerId: string;
  permissionLevel: string;
}

/**
 * md5 of `toolName:toolVersion:canonicalParams:callerId:permissionLevel`.
 * The tool call id is not part of the key.
 * Returns undefined when the parameters cannot be canonicalized.
 */
export function deriveIdempotencyKey(parts: IdempotencyKeyParts): string | undefined {
  const canonicalParams = canonicalJson(parts.parameters);
  if (canonicalParams === undefined) return undefined;
  return md5Hex(`${parts.toolName}:${parts.toolVersion}:${canonicalParams}:${parts.callerId}:${parts.permissionLevel}`);
}
