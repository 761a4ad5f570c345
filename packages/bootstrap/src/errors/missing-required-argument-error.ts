import { BootstrapError } from "./bootstrap-error.js";

/**
 * Thrown when a required CLI argument is absent
 */
export class MissingRequiredArgumentError extends BootstrapError {
	constructor(argument: string, reason?: string) {
		super(`Missing required argument: ${argument}${reason ? ` (${reason})` : ""}`, 2);
	}
}
