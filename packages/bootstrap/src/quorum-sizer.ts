import { AGENT_ROLE, type AgentRole, type ScaleSetRef, scaleSetName } from "@consul-scaleset/shared";
import type { FleetInventory, Logger, QuorumSizer } from "./types/index.js";
import { LoggerImpl } from "./logger/index.js";

/**
 * bootstrap_expect from the member count observed right now.
 * Nodes sizing concurrently during a scale-out may disagree.
 */
export class QuorumSizerImpl implements QuorumSizer {
	private readonly logger: Logger;

	constructor(
		private readonly inventory: FleetInventory,
		logger?: Logger,
	) {
		this.logger = logger ?? new LoggerImpl("quorum");
	}

	async plan(role: AgentRole, set: ScaleSetRef): Promise<number | null> {
		if (role === AGENT_ROLE.CLIENT) {
			return null;
		}

		const size = await this.inventory.size(set);
		if (size === 0) {
			this.logger.warn(`Scale set ${scaleSetName(set)} lists no members; bootstrap_expect is 0`);
		} else {
			this.logger.info(`bootstrap_expect=${size} (scale set ${scaleSetName(set)})`);
		}
		return size;
	}
}
