export * from "./constants.js";
export type { InstanceIdentity } from "./types/identity.js";
export {
	EMPTY_MEMBERSHIP,
	UNKNOWN_SCALE_SET,
	createMembershipSnapshot,
	scaleSetName,
} from "./types/fleet.js";
export type { MembershipSnapshot, ResourceScope, ScaleSetRef } from "./types/fleet.js";
export { AGENT_ROLE } from "./types/plan.js";
export type { AgentRole, Artifact, BootstrapPlan, RenderedConfig } from "./types/plan.js";
export type { ConsulAgentConfig } from "./types/consul-config.js";
