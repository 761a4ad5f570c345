import type { Artifact } from "@consul-scaleset/shared";
import * as fs from "node:fs";
import * as path from "node:path";
import { randomUUID } from "node:crypto";
import type { ArtifactWriter, Logger } from "./types/index.js";
import { ArtifactWriteError } from "./errors/index.js";
import { LoggerImpl } from "./logger/index.js";
import { formatError } from "./utils/index.js";

interface StagedArtifact {
	path: string;
	tempPath: string;
}

/**
 * Writes every artifact to a temp file beside its target, then renames them all into place.
 * A failure while staging leaves every target untouched.
 */
export class ArtifactWriterImpl implements ArtifactWriter {
	private readonly logger: Logger;

	constructor(logger?: Logger) {
		this.logger = logger ?? new LoggerImpl("writer");
	}

	write(artifacts: readonly Artifact[]): string[] {
		const staged: StagedArtifact[] = [];

		for (const artifact of artifacts) {
			const tempPath = `${artifact.path}.${randomUUID()}.tmp`;
			try {
				fs.mkdirSync(path.dirname(artifact.path), { recursive: true });
				fs.writeFileSync(tempPath, artifact.content, "utf-8");
			} catch (err) {
				this.discard([...staged, { path: artifact.path, tempPath }]);
				throw new ArtifactWriteError(artifact.path, { cause: err });
			}
			staged.push({ path: artifact.path, tempPath });
		}

		for (const [index, entry] of staged.entries()) {
			try {
				fs.renameSync(entry.tempPath, entry.path);
			} catch (err) {
				this.discard(staged.slice(index));
				throw new ArtifactWriteError(entry.path, { cause: err });
			}
			this.logger.info(`Wrote ${entry.path}`);
		}

		return staged.map(entry => entry.path);
	}

	private discard(entries: readonly StagedArtifact[]): void {
		for (const entry of entries) {
			try {
				fs.rmSync(entry.tempPath, { force: true });
			} catch (err) {
				// the temp file was never created
				this.logger.debug(`Could not remove ${entry.tempPath}: ${formatError(err)}`);
			}
		}
	}
}
