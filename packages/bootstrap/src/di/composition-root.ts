/**
 * Composition root for the bootstrap package.
 * Wires all dependencies together using the inversify-based DI container.
 */

import "reflect-metadata";
import type { BootstrapConfig, Bootstrapper } from "../types/index.js";
import { ArtifactWriterImpl } from "../artifact-writer.js";
import { BootstrapperImpl } from "../bootstrapper.js";
import { AzureComputeClient } from "../compute-client.js";
import { ConfigComposerImpl } from "../config-composer.js";
import { FleetInventoryImpl } from "../fleet-inventory.js";
import { LoggerImpl } from "../logger/index.js";
import { MetadataClientImpl } from "../metadata-client.js";
import { PeerSelectorImpl } from "../peer-selector.js";
import { QuorumSizerImpl } from "../quorum-sizer.js";
import { ServicePrincipalTokenProvider } from "../token-provider.js";
import { type Container, createContainer } from "./container.js";
import {
	ARTIFACT_WRITER,
	BOOTSTRAPPER,
	COMPUTE_CLIENT,
	CONFIG,
	CONFIG_COMPOSER,
	FLEET_INVENTORY,
	LOGGER_FACTORY,
	type LoggerFactory,
	METADATA_CLIENT,
	PEER_SELECTOR,
	QUORUM_SIZER,
	TOKEN_PROVIDER,
} from "./tokens.js";

/**
 * Configure all dependencies in the container.
 * Configuration-derived options are resolved here and nowhere else.
 */
export function configureContainer(container: Container, config: BootstrapConfig): void {
	container.instance(CONFIG, config);

	container.singleton<LoggerFactory>(LOGGER_FACTORY, () => {
		return (prefix: string) => new LoggerImpl(prefix);
	});

	container.singleton(METADATA_CLIENT, (c: Container) => {
		const cfg = c.resolve(CONFIG);
		return new MetadataClientImpl(cfg.metadataUrl, cfg.metadataTimeoutMs, c.resolve(LOGGER_FACTORY)("metadata"));
	});

	container.singleton(TOKEN_PROVIDER, (c: Container) => {
		const cfg = c.resolve(CONFIG);
		return new ServicePrincipalTokenProvider(cfg.credentials, cfg.authorityUrl, c.resolve(LOGGER_FACTORY)("auth"));
	});

	container.singleton(COMPUTE_CLIENT, (c: Container) => {
		const cfg = c.resolve(CONFIG);
		return new AzureComputeClient(cfg.managementUrl, c.resolve(TOKEN_PROVIDER), c.resolve(LOGGER_FACTORY)("compute"));
	});

	container.singleton(FLEET_INVENTORY, (c: Container) => {
		return new FleetInventoryImpl(c.resolve(COMPUTE_CLIENT), c.resolve(LOGGER_FACTORY)("inventory"));
	});

	container.singleton(PEER_SELECTOR, (c: Container) => {
		return new PeerSelectorImpl(c.resolve(LOGGER_FACTORY)("peer-selector"));
	});

	container.singleton(QUORUM_SIZER, (c: Container) => {
		return new QuorumSizerImpl(c.resolve(FLEET_INVENTORY), c.resolve(LOGGER_FACTORY)("quorum"));
	});

	container.singleton(CONFIG_COMPOSER, (c: Container) => {
		const cfg = c.resolve(CONFIG);
		return new ConfigComposerImpl({ ...cfg.paths, user: cfg.user });
	});

	container.singleton(ARTIFACT_WRITER, (c: Container) => {
		return new ArtifactWriterImpl(c.resolve(LOGGER_FACTORY)("writer"));
	});

	container.singleton(BOOTSTRAPPER, (c: Container) => {
		return new BootstrapperImpl(
			c.resolve(CONFIG),
			c.resolve(LOGGER_FACTORY)("bootstrap"),
			c.resolve(METADATA_CLIENT),
			c.resolve(FLEET_INVENTORY),
			c.resolve(PEER_SELECTOR),
			c.resolve(QUORUM_SIZER),
			c.resolve(CONFIG_COMPOSER),
			c.resolve(ARTIFACT_WRITER),
		);
	});
}

/**
 * Create and configure a container with all dependencies for the given config.
 */
export function createBootstrapContainer(config: BootstrapConfig): Container {
	const container = createContainer();
	configureContainer(container, config);
	return container;
}

export function createBootstrapper(config: BootstrapConfig): Bootstrapper {
	return createBootstrapContainer(config).resolve(BOOTSTRAPPER);
}
