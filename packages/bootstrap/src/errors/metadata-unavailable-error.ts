import { BootstrapError } from "./bootstrap-error.js";

/**
 * Thrown when the instance metadata service is unreachable or returns malformed data
 */
export class MetadataUnavailableError extends BootstrapError {
	constructor(message: string, options?: ErrorOptions) {
		super(`Instance metadata unavailable: ${message}`, 3, options);
	}
}
