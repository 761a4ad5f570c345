/**
 * Role of the Consul agent on this instance.
 */
export const AGENT_ROLE = {
	SERVER: "server",
	CLIENT: "client",
} as const;

export type AgentRole = (typeof AGENT_ROLE)[keyof typeof AGENT_ROLE];

/**
 * Join and quorum parameters derived for one run.
 *
 * bootstrapExpect is non-null iff role is "server"; retryJoinIp is non-null
 * iff a peer other than this instance was found.
 */
export interface BootstrapPlan {
	role: AgentRole;
	retryJoinIp: string | null;
	bootstrapExpect: number | null;
	raftProtocol: number;
}

/**
 * The two text artifacts of a run.
 */
export interface RenderedConfig {
	/** Consul agent configuration (JSON) */
	agentConfig: string;
	/** supervisord program descriptor (INI) */
	supervisorConfig: string;
}

/**
 * A rendered document and the path it belongs at.
 */
export interface Artifact {
	path: string;
	content: string;
}
