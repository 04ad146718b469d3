export const OUTPUT_LEVELS = ['brief', 'standard', 'full'] as const;

export type OutputLevel = typeof OUTPUT_LEVELS[number];

export const ARTIFACT_THRESHOLD_BYTES = 1_000_000;

const FULL_INLINE_LIMIT_BYTES = 10 * 1024;

const MAX_TOKENS: Record<OutputLevel, number> = {
  brief: 50,
  standard: 500,
  full: 200_000,
};

export const outputLevelMaxTokens = (level: OutputLevel): number => MAX_TOKENS[level];

// Small payloads go inline in full; mid-size get summarized; very large ones go full so they offload
export function outputLevelFromSize(sizeBytes: number): OutputLevel {
  if (sizeBytes < FULL_INLINE_LIMIT_BYTES) return 'full';
  if (sizeBytes < ARTIFACT_THRESHOLD_BYTES) return 'standard';
  return 'full';
}

export function shouldUseArtifact(level: OutputLevel, sizeBytes: number, thresholdBytes = ARTIFACT_THRESHOLD_BYTES): boolean {
  return level === 'full' && sizeBytes >= thresholdBytes;
}
