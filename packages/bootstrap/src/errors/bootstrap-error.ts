/**
 * Base class for errors that abort a bootstrap run
 *
 * Includes the process exit code the CLI terminates with.
 */
export class BootstrapError extends Error {
	readonly exitCode: number;

	constructor(message: string, exitCode: number = 1, options?: ErrorOptions) {
		super(message, options);
		this.name = this.constructor.name;
		this.exitCode = exitCode;
	}
}
