import { BootstrapError } from "./bootstrap-error.js";

/**
 * Thrown when a CLI argument has an unusable value or conflicts with another
 */
export class InvalidArgumentError extends BootstrapError {
	constructor(message: string) {
		super(`Invalid argument: ${message}`, 2);
	}
}
