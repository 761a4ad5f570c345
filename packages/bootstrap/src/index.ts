/**
 * Bootstrap package public API
 */

// Entry points
export { main } from "./cli.js";
export { loadConfig, USAGE } from "./config/index.js";

// Class implementations
export { ArtifactWriterImpl } from "./artifact-writer.js";
export { AzureComputeClient } from "./compute-client.js";
export { BootstrapperImpl } from "./bootstrapper.js";
export { ConfigComposerImpl } from "./config-composer.js";
export { FleetInventoryImpl } from "./fleet-inventory.js";
export { LoggerImpl, setLogLevel } from "./logger/index.js";
export { MetadataClientImpl } from "./metadata-client.js";
export { PeerSelectorImpl } from "./peer-selector.js";
export { QuorumSizerImpl } from "./quorum-sizer.js";
export { ServicePrincipalTokenProvider } from "./token-provider.js";
export { findOwningSet, type InstanceLister } from "./owning-set.js";

// Errors
export * from "./errors/index.js";

// Interface types
export type * from "./types/index.js";

// Dependency Injection
export {
	ContainerImpl,
	createBootstrapContainer,
	createBootstrapper,
	configureContainer,
	createContainer,
	createToken,
	TOKENS,
} from "./di/index.js";
export type { Container, Factory, LoggerFactory, Token } from "./di/index.js";
