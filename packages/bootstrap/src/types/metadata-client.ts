import type { InstanceIdentity } from "@consul-scaleset/shared";

/**
 * Client for the local instance metadata service.
 */
export interface MetadataClient {
	/**
	 * Fetch this instance's identity.
	 * @throws MetadataUnavailableError if the endpoint is unreachable or the payload is malformed.
	 */
	identity(): Promise<InstanceIdentity>;
}
