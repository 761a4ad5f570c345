export { BootstrapError } from "./bootstrap-error.js";
export { ArtifactWriteError } from "./artifact-write-error.js";
export { CredentialError } from "./credential-error.js";
export { InvalidArgumentError } from "./invalid-argument-error.js";
export { InventoryUnavailableError } from "./inventory-unavailable-error.js";
export { MetadataUnavailableError } from "./metadata-unavailable-error.js";
export { MissingRequiredArgumentError } from "./missing-required-argument-error.js";
export { ScaleSetNotFoundError } from "./scale-set-not-found-error.js";
