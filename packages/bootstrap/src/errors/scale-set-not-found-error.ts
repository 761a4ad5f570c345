import { InventoryUnavailableError } from "./inventory-unavailable-error.js";

/**
 * Thrown when a named scale set does not exist (or no longer exists)
 */
export class ScaleSetNotFoundError extends InventoryUnavailableError {
	readonly scaleSetName: string;

	constructor(scaleSetName: string) {
		super(`scale set not found: ${scaleSetName}`);
		this.scaleSetName = scaleSetName;
	}
}
