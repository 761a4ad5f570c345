import type { MembershipSnapshot, ResourceScope, ScaleSetRef } from "@consul-scaleset/shared";

/**
 * Scale set membership as seen by the cloud control plane.
 */
export interface FleetInventory {
	/** Find the set containing instanceId, or an unknown ref when none does. */
	resolveOwningSet(scope: ResourceScope, instanceId: string): Promise<ScaleSetRef>;
	/** @throws InventoryUnavailableError on any control-plane failure */
	membership(scope: ResourceScope, scaleSetName: string): Promise<MembershipSnapshot>;
	/** Member count; 1 for an unknown set, without querying. */
	size(set: ScaleSetRef): Promise<number>;
}
