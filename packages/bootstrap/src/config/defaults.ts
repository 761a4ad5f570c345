/**
 * Default configuration values.
 */

import {
	AZURE_ENDPOINTS,
	CONSUL_DEFAULTS,
	CONSUL_LAYOUT,
	DEFAULT_METADATA_TIMEOUT_MS,
} from "@consul-scaleset/shared";
import type { LogLevel } from "../logger/index.js";

export interface ConfigDefaults {
	raftProtocol: number;
	consulDir: string;
	user: string;
	supervisorConfigPath: string;
	metadataUrl: string;
	metadataTimeoutMs: number;
	managementUrl: string;
	authorityUrl: string;
	logLevel: LogLevel;
}

export function getDefaultConfig(): ConfigDefaults {
	return {
		raftProtocol: CONSUL_DEFAULTS.RAFT_PROTOCOL,
		consulDir: CONSUL_LAYOUT.DEFAULT_CONSUL_DIR,
		user: CONSUL_LAYOUT.DEFAULT_USER,
		supervisorConfigPath: CONSUL_LAYOUT.SUPERVISOR_CONFIG_PATH,
		metadataUrl: AZURE_ENDPOINTS.METADATA_URL,
		metadataTimeoutMs: DEFAULT_METADATA_TIMEOUT_MS,
		managementUrl: AZURE_ENDPOINTS.MANAGEMENT_URL,
		authorityUrl: AZURE_ENDPOINTS.AUTHORITY_URL,
		logLevel: "info",
	};
}
