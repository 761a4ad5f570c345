/**
 * Environment variable parsing for bootstrap configuration.
 * Numbers stay raw here and are validated when the config is merged.
 */

export interface ParsedEnv {
	tenantId?: string;
	clientId?: string;
	clientSecret?: string;
	scaleSetName?: string;
	raftProtocol?: string;
	consulDir?: string;
	user?: string;
	logLevel?: string;
	metadataUrl?: string;
	metadataTimeoutMs?: string;
	managementUrl?: string;
	authorityUrl?: string;
}

function read(env: NodeJS.ProcessEnv, key: string): string | undefined {
	const value = env[key];
	return value === undefined || value === "" ? undefined : value;
}

export function parseEnvVars(env: NodeJS.ProcessEnv): ParsedEnv {
	return {
		tenantId: read(env, "AZURE_TENANT_ID"),
		clientId: read(env, "AZURE_CLIENT_ID"),
		clientSecret: read(env, "AZURE_CLIENT_SECRET"),
		scaleSetName: read(env, "CONSUL_SCALE_SET_NAME"),
		raftProtocol: read(env, "CONSUL_RAFT_PROTOCOL"),
		consulDir: read(env, "CONSUL_DIR"),
		user: read(env, "CONSUL_USER"),
		logLevel: read(env, "LOG_LEVEL"),
		metadataUrl: read(env, "AZURE_METADATA_URL"),
		metadataTimeoutMs: read(env, "AZURE_METADATA_TIMEOUT_MS"),
		managementUrl: read(env, "AZURE_MANAGEMENT_URL"),
		authorityUrl: read(env, "AZURE_AUTHORITY_URL"),
	};
}
