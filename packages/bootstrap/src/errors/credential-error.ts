import { BootstrapError } from "./bootstrap-error.js";

/**
 * Thrown when no access token could be obtained for the service principal
 */
export class CredentialError extends BootstrapError {
	constructor(message: string, options?: ErrorOptions) {
		super(`Azure sign-in failed: ${message}`, 4, options);
	}
}
