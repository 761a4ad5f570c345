import type { InstanceIdentity } from "@consul-scaleset/shared";
import { z } from "zod";
import type { Logger, MetadataClient } from "./types/index.js";
import { MetadataUnavailableError } from "./errors/index.js";
import { LoggerImpl } from "./logger/index.js";
import { fetchWithTimeout, formatError } from "./utils/index.js";

const instanceMetadataSchema = z.object({
	compute: z.object({
		name: z.string().min(1),
		location: z.string().min(1),
		resourceGroupName: z.string().min(1),
		subscriptionId: z.string().min(1),
	}),
	network: z.object({
		interface: z.array(z.object({
			ipv4: z.object({
				ipAddress: z.array(z.object({
					privateIpAddress: z.string().ip({ version: "v4" }),
				})).min(1),
			}),
		})).min(1),
	}),
});

/**
 * Reads this instance's identity from the Azure Instance Metadata Service.
 * A single attempt; failures are fatal to the run.
 */
export class MetadataClientImpl implements MetadataClient {
	private readonly logger: Logger;

	constructor(
		private readonly metadataUrl: string,
		private readonly timeoutMs: number,
		logger?: Logger,
	) {
		this.logger = logger ?? new LoggerImpl("metadata");
	}

	async identity(): Promise<InstanceIdentity> {
		let body: unknown;
		try {
			body = await fetchWithTimeout(this.metadataUrl, {
				method: "GET",
				headers: { Metadata: "true" },
			}, this.timeoutMs, async (response): Promise<unknown> => {
				if (!response.ok) {
					throw new MetadataUnavailableError(`status ${response.status}`);
				}
				return response.json();
			});
		} catch (err) {
			if (err instanceof MetadataUnavailableError) {
				throw err;
			}
			throw new MetadataUnavailableError(formatError(err), { cause: err });
		}

		const parsed = instanceMetadataSchema.safeParse(body);
		if (!parsed.success) {
			const issue = parsed.error.issues[0];
			throw new MetadataUnavailableError(`malformed payload at ${issue.path.join(".") || "<root>"}: ${issue.message}`);
		}

		const { compute, network } = parsed.data;
		const identity: InstanceIdentity = {
			id: compute.name,
			privateIp: network.interface[0].ipv4.ipAddress[0].privateIpAddress,
			location: compute.location,
			resourceGroup: compute.resourceGroupName,
			subscriptionId: compute.subscriptionId,
		};
		this.logger.info(`Instance ${identity.id} (${identity.privateIp}) in ${identity.location}/${identity.resourceGroup}`);
		return identity;
	}
}
