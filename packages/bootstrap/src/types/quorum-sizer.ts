import type { AgentRole, ScaleSetRef } from "@consul-scaleset/shared";

/**
 * Derives bootstrap_expect for an agent.
 */
export interface QuorumSizer {
	/** Returns null for clients. */
	plan(role: AgentRole, set: ScaleSetRef): Promise<number | null>;
}
