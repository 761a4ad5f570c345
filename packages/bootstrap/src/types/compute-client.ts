import type { ResourceScope } from "@consul-scaleset/shared";

/**
 * Thin client over the Azure Resource Manager compute listings.
 * Every method follows pagination and returns the complete listing.
 */
export interface ComputeClient {
	listScaleSets(scope: ResourceScope): Promise<string[]>;
	/** @throws ScaleSetNotFoundError if the set does not exist */
	listScaleSetInstances(scope: ResourceScope, scaleSetName: string): Promise<string[]>;
	/** @throws ScaleSetNotFoundError if the set does not exist */
	listScaleSetPrivateIps(scope: ResourceScope, scaleSetName: string): Promise<string[]>;
}
