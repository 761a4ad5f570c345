/**
 * Shared constants for the bootstrap tooling.
 *
 * Constants are organized into domain-specific groups.
 */

// =============================================================================
// Azure Endpoints
// =============================================================================

/**
 * Azure endpoints and API versions used for discovery.
 */
export const AZURE_ENDPOINTS = {
	/** Instance Metadata Service, reachable only from inside the VM */
	METADATA_URL: "http://169.254.169.254/metadata/instance?api-version=2021-02-01",
	/** Azure Resource Manager base URL */
	MANAGEMENT_URL: "https://management.azure.com",
	/** Entra ID authority base URL for the client-credentials flow */
	AUTHORITY_URL: "https://login.microsoftonline.com",
	/** OAuth scope granting ARM access */
	MANAGEMENT_SCOPE: "https://management.azure.com/.default",
	/** api-version for scale set and scale set VM listings */
	COMPUTE_API_VERSION: "2024-07-01",
	/** api-version for scale set network interface listings */
	NETWORK_API_VERSION: "2018-10-01",
} as const;

/** Timeout for the metadata request in milliseconds */
export const DEFAULT_METADATA_TIMEOUT_MS = 5_000;

/** Tokens are refreshed this long before their reported expiry */
export const TOKEN_EXPIRY_SKEW_MS = 60_000;

// =============================================================================
// Consul Layout
// =============================================================================

/**
 * Default on-disk layout of a Consul install.
 */
export const CONSUL_LAYOUT = {
	/** Root of the Consul install; bin, config, data and log live beneath it */
	DEFAULT_CONSUL_DIR: "/opt/consul",
	/** File name of the generated agent configuration inside the config dir */
	CONFIG_FILE_NAME: "default.json",
	/** Where the supervisord program descriptor is written */
	SUPERVISOR_CONFIG_PATH: "/etc/supervisor/conf.d/run-consul.conf",
	/** Account the agent runs as */
	DEFAULT_USER: "consul",
} as const;

// =============================================================================
// Consul Defaults
// =============================================================================

/**
 * Fixed values of the generated Consul configuration.
 */
export const CONSUL_DEFAULTS = {
	/** Raft protocol version when none is configured */
	RAFT_PROTOCOL: 3,
	/** Address the HTTP, DNS and gRPC interfaces listen on */
	CLIENT_ADDR: "0.0.0.0",
	/** supervisord program name and binary name */
	PROGRAM_NAME: "consul",
} as const;
