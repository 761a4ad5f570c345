/**
 * Dependency Injection module exports.
 */

import "reflect-metadata";

export { ContainerImpl, createContainer, type Container, type Factory } from "./container.js";
export {
	ARTIFACT_WRITER,
	BOOTSTRAPPER,
	COMPUTE_CLIENT,
	CONFIG,
	CONFIG_COMPOSER,
	FLEET_INVENTORY,
	LOGGER_FACTORY,
	METADATA_CLIENT,
	PEER_SELECTOR,
	QUORUM_SIZER,
	TOKENS,
	TOKEN_PROVIDER,
	createToken,
	type LoggerFactory,
	type Token,
} from "./tokens.js";
export { configureContainer, createBootstrapContainer, createBootstrapper } from "./composition-root.js";
