import type { Artifact } from "@consul-scaleset/shared";

/**
 * Writes rendered artifacts to disk, all or nothing.
 */
export interface ArtifactWriter {
	/** @returns the paths written */
	write(artifacts: readonly Artifact[]): string[];
}
