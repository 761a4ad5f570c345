import { BootstrapError } from "./bootstrap-error.js";

/**
 * Thrown when a rendered artifact could not be written
 */
export class ArtifactWriteError extends BootstrapError {
	constructor(path: string, options?: ErrorOptions) {
		super(`Failed to write ${path}`, 6, options);
	}
}
