import type { BootstrapPlan, InstanceIdentity, RenderedConfig } from "@consul-scaleset/shared";
import type { ConsulPaths } from "./bootstrap-config.js";

/**
 * Options the composer renders with, resolved at the composition root.
 */
export interface ComposerOptions extends ConsulPaths {
	user: string;
}

/**
 * Renders the Consul agent configuration and the supervisord descriptor.
 * Implementations are pure: identical inputs give identical text.
 */
export interface ConfigComposer {
	render(identity: InstanceIdentity, plan: BootstrapPlan): RenderedConfig;
	renderAgentConfig(identity: InstanceIdentity, plan: BootstrapPlan): string;
	renderSupervisorConfig(): string;
}
