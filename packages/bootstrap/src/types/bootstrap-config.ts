import type { AgentRole } from "@consul-scaleset/shared";
import type { LogLevel } from "../logger/log-level.js";

/**
 * Service principal used to sign in to Azure Resource Manager.
 */
export interface AzureCredentials {
	tenantId: string;
	clientId: string;
	clientSecret: string;
}

/**
 * Directories of the Consul install.
 */
export interface ConsulPaths {
	binDir: string;
	configDir: string;
	dataDir: string;
	logDir: string;
}

/**
 * Bootstrap configuration, resolved once from CLI arguments,
 * environment variables and defaults.
 */
export interface BootstrapConfig {
	role: AgentRole;
	credentials: AzureCredentials;
	/** Explicit scale set; null means resolve the owning set from inventory */
	scaleSetName: string | null;
	raftProtocol: number;
	skipConsulConfig: boolean;
	paths: ConsulPaths;
	user: string;
	supervisorConfigPath: string;
	metadataUrl: string;
	metadataTimeoutMs: number;
	managementUrl: string;
	authorityUrl: string;
	logLevel: LogLevel;
}
