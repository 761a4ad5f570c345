import type { BootstrapPlan } from "@consul-scaleset/shared";

/**
 * Outcome of one bootstrap pass.
 */
export interface BootstrapResult {
	/** null when agent config generation was skipped */
	plan: BootstrapPlan | null;
	/** Paths written */
	artifacts: string[];
}

/**
 * Runs one discovery-and-render pass.
 */
export interface Bootstrapper {
	run(): Promise<BootstrapResult>;
}
