import {
	type MembershipSnapshot,
	type ResourceScope,
	type ScaleSetRef,
	createMembershipSnapshot,
} from "@consul-scaleset/shared";
import type { ComputeClient, FleetInventory, Logger } from "./types/index.js";
import { ScaleSetNotFoundError } from "./errors/index.js";
import { LoggerImpl } from "./logger/index.js";
import { findOwningSet } from "./owning-set.js";

/**
 * Scale set inventory backed by the compute control plane.
 */
export class FleetInventoryImpl implements FleetInventory {
	private readonly logger: Logger;

	constructor(
		private readonly compute: ComputeClient,
		logger?: Logger,
	) {
		this.logger = logger ?? new LoggerImpl("inventory");
	}

	async resolveOwningSet(scope: ResourceScope, instanceId: string): Promise<ScaleSetRef> {
		const scaleSetNames = await this.compute.listScaleSets(scope);
		this.logger.debug(`Scanning ${scaleSetNames.length} scale set(s) in ${scope.resourceGroup} for ${instanceId}`);

		const owner = await findOwningSet(instanceId, scaleSetNames, async name => {
			try {
				return await this.compute.listScaleSetInstances(scope, name);
			} catch (err) {
				if (err instanceof ScaleSetNotFoundError) {
					this.logger.warn(`Scale set ${name} disappeared during the scan, skipping it`);
					return null;
				}
				throw err;
			}
		});

		if (owner === null) {
			this.logger.warn(`Instance ${instanceId} is not part of any scale set in ${scope.resourceGroup}`);
			return { kind: "unknown", scope };
		}

		this.logger.info(`Instance ${instanceId} belongs to scale set ${owner}`);
		return { kind: "known", scope, name: owner };
	}

	async membership(scope: ResourceScope, scaleSetName: string): Promise<MembershipSnapshot> {
		const ips = await this.compute.listScaleSetPrivateIps(scope, scaleSetName);
		const snapshot = createMembershipSnapshot(ips);
		this.logger.info(`Scale set ${scaleSetName} has ${snapshot.count} member(s)`);
		return snapshot;
	}

	async size(set: ScaleSetRef): Promise<number> {
		if (set.kind === "unknown") {
			return 1;
		}
		const snapshot = await this.membership(set.scope, set.name);
		return snapshot.count;
	}
}
