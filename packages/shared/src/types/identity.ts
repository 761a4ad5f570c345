/**
 * Identity of the running instance as reported by the metadata service.
 * Rebuilt on every run and never persisted.
 */
export interface InstanceIdentity {
	/** VM name inside its scale set, e.g. "vmss1_0". Used as the Consul node name. */
	id: string;
	/** Primary private IPv4 address */
	privateIp: string;
	/** Azure region, used as the Consul datacenter */
	location: string;
	resourceGroup: string;
	subscriptionId: string;
}
