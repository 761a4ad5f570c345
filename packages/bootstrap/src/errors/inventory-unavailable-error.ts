import { BootstrapError } from "./bootstrap-error.js";

/**
 * Thrown when a control-plane listing fails
 */
export class InventoryUnavailableError extends BootstrapError {
	constructor(message: string, options?: ErrorOptions) {
		super(`Inventory unavailable: ${message}`, 5, options);
	}
}
