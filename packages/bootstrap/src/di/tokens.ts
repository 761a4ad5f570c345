/**
 * Injection tokens for every dependency of the bootstrap package.
 */

import type {
	ArtifactWriter,
	BootstrapConfig,
	Bootstrapper,
	ComputeClient,
	ConfigComposer,
	FleetInventory,
	Logger,
	MetadataClient,
	PeerSelector,
	QuorumSizer,
	TokenProvider,
} from "../types/index.js";

/**
 * Token type for identifying dependencies in the container.
 */
export type Token<T> = symbol & { __type?: T };

/**
 * Creates a typed injection token using Symbol.for for consistency.
 */
export function createToken<T>(description: string): Token<T> {
	return Symbol.for(description) as Token<T>;
}

// ============================================================================
// Configuration and logging
// ============================================================================

export const CONFIG = createToken<BootstrapConfig>("BootstrapConfig");

export type LoggerFactory = (prefix: string) => Logger;
export const LOGGER_FACTORY = createToken<LoggerFactory>("LoggerFactory");

// ============================================================================
// Azure clients
// ============================================================================

export const METADATA_CLIENT = createToken<MetadataClient>("MetadataClient");
export const TOKEN_PROVIDER = createToken<TokenProvider>("TokenProvider");
export const COMPUTE_CLIENT = createToken<ComputeClient>("ComputeClient");

// ============================================================================
// Planning and rendering
// ============================================================================

export const FLEET_INVENTORY = createToken<FleetInventory>("FleetInventory");
export const PEER_SELECTOR = createToken<PeerSelector>("PeerSelector");
export const QUORUM_SIZER = createToken<QuorumSizer>("QuorumSizer");
export const CONFIG_COMPOSER = createToken<ConfigComposer>("ConfigComposer");
export const ARTIFACT_WRITER = createToken<ArtifactWriter>("ArtifactWriter");

export const BOOTSTRAPPER = createToken<Bootstrapper>("Bootstrapper");

export const TOKENS = {
	CONFIG,
	LOGGER_FACTORY,
	METADATA_CLIENT,
	TOKEN_PROVIDER,
	COMPUTE_CLIENT,
	FLEET_INVENTORY,
	PEER_SELECTOR,
	QUORUM_SIZER,
	CONFIG_COMPOSER,
	ARTIFACT_WRITER,
	BOOTSTRAPPER,
} as const;
