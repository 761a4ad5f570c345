/**
 * Type definitions for the bootstrap package.
 */
export type { ArtifactWriter } from "./artifact-writer.js";
export type { AzureCredentials, BootstrapConfig, ConsulPaths } from "./bootstrap-config.js";
export type { BootstrapResult, Bootstrapper } from "./bootstrapper.js";
export type { ComputeClient } from "./compute-client.js";
export type { ComposerOptions, ConfigComposer } from "./config-composer.js";
export type { FleetInventory } from "./fleet-inventory.js";
export type { Logger } from "./logger.js";
export type { MetadataClient } from "./metadata-client.js";
export type { PeerSelector } from "./peer-selector.js";
export type { QuorumSizer } from "./quorum-sizer.js";
export type { TokenProvider } from "./token-provider.js";
