/**
 * Group/artifact pair as reported by the artifact search.
 */
export interface Artifact {
  groupId: string;
  artifactId: string;
  /** Absent when the index record carries none */
  latestVersion?: string;
  /** Extension tags published for the latest version */
  extensions: string[];
}

/**
 * One concrete, immutable release.
 */
export interface Gav {
  groupId: string;
  artifactId: string;
  version: string;
}

export interface SearchQuery {
  q: string;
  core?: string;
}

export function formatArtifact(artifact: Pick<Artifact, "groupId" | "artifactId">): string {
  return `${artifact.groupId}:${artifact.artifactId}`;
}

export function formatGav(gav: Gav): string {
  return `${gav.groupId}:${gav.artifactId}:${gav.version}`;
}
