export interface ArtifactMetadata {
  artifactId: string;
  filename: string;
  createdAt: number;
  sizeBytes: number;
  hash: string;
  toolName: string;
  summary: string;
}

export interface StoredArtifact {
  artifactId: string;
  observation: string;
  metadata: ArtifactMetadata;
}

export interface ArtifactStats {
  totalArtifacts: number;
  totalSizeBytes: number;
  byTool: Record<string, number>;
  oldestCreatedAt?: number;
  newestCreatedAt?: number;
}

/** The slice of the artifact store that result shaping needs. */
export interface ArtifactSink {
  store(data: unknown, toolName: string, summary?: string): Promise<StoredArtifact>;
}
