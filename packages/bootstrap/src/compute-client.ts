import { AZURE_ENDPOINTS, type ResourceScope } from "@consul-scaleset/shared";
import { z } from "zod";
import type { ComputeClient, Logger, TokenProvider } from "./types/index.js";
import { InventoryUnavailableError, ScaleSetNotFoundError } from "./errors/index.js";
import { LoggerImpl } from "./logger/index.js";
import { formatError } from "./utils/index.js";

const nextLinkSchema = z.string().nullish();

const scaleSetPageSchema = z.object({
	value: z.array(z.object({ name: z.string() })),
	nextLink: nextLinkSchema,
});

const scaleSetVmPageSchema = z.object({
	value: z.array(z.object({ name: z.string() })),
	nextLink: nextLinkSchema,
});

const networkInterfacePageSchema = z.object({
	value: z.array(z.object({
		properties: z.object({
			primary: z.boolean().optional(),
			virtualMachine: z.object({ id: z.string() }).optional(),
			ipConfigurations: z.array(z.object({
				properties: z.object({
					primary: z.boolean().optional(),
					privateIPAddress: z.string().optional(),
				}),
			})).default([]),
		}),
	})),
	nextLink: nextLinkSchema,
});

interface Page<T> {
	value: T[];
	nextLink?: string | null;
}

type PageSchema<T> = z.ZodType<Page<T>, z.ZodTypeDef, unknown>;

type NamedResource = z.infer<typeof scaleSetPageSchema>["value"][number];
type NetworkInterface = z.infer<typeof networkInterfacePageSchema>["value"][number];

function pickPrimary<T extends { properties: { primary?: boolean } }>(items: readonly T[]): T | undefined {
	return items.find(item => item.properties.primary === true) ?? items[0];
}

function privateIpOf(nic: NetworkInterface): string | null {
	const withAddress = nic.properties.ipConfigurations
		.filter(ipConfig => ipConfig.properties.privateIPAddress !== undefined && ipConfig.properties.privateIPAddress !== "");
	return pickPrimary(withAddress)?.properties.privateIPAddress ?? null;
}

/**
 * One address per VM: the primary IP configuration of its primary NIC.
 * NICs not yet attached to a VM count on their own.
 */
function memberPrivateIps(nics: readonly NetworkInterface[]): string[] {
	const byVm = new Map<string, NetworkInterface[]>();
	for (const [index, nic] of nics.entries()) {
		const key = nic.properties.virtualMachine?.id.toLowerCase() ?? `#${index}`;
		const group = byVm.get(key);
		if (group) {
			group.push(nic);
		} else {
			byVm.set(key, [nic]);
		}
	}

	const ips: string[] = [];
	for (const group of byVm.values()) {
		const withAddress = group.filter(nic => privateIpOf(nic) !== null);
		const nic = pickPrimary(withAddress);
		const ip = nic === undefined ? null : privateIpOf(nic);
		if (ip !== null) {
			ips.push(ip);
		}
	}
	return ips;
}

/**
 * Azure Resource Manager client for the scale set listings discovery needs.
 */
export class AzureComputeClient implements ComputeClient {
	private readonly logger: Logger;

	constructor(
		private readonly managementUrl: string,
		private readonly tokenProvider: TokenProvider,
		logger?: Logger,
	) {
		this.logger = logger ?? new LoggerImpl("compute");
	}

	async listScaleSets(scope: ResourceScope): Promise<string[]> {
		const url = `${this.scaleSetsUrl(scope)}?api-version=${AZURE_ENDPOINTS.COMPUTE_API_VERSION}`;
		const sets = await this.listAll<NamedResource>(url, scaleSetPageSchema, null);
		return sets.map(set => set.name);
	}

	async listScaleSetInstances(scope: ResourceScope, scaleSetName: string): Promise<string[]> {
		const url = `${this.scaleSetUrl(scope, scaleSetName)}/virtualMachines?api-version=${AZURE_ENDPOINTS.COMPUTE_API_VERSION}`;
		const vms = await this.listAll<NamedResource>(url, scaleSetVmPageSchema, scaleSetName);
		return vms.map(vm => vm.name);
	}

	async listScaleSetPrivateIps(scope: ResourceScope, scaleSetName: string): Promise<string[]> {
		const url = `${this.scaleSetUrl(scope, scaleSetName)}/networkInterfaces?api-version=${AZURE_ENDPOINTS.NETWORK_API_VERSION}`;
		const nics = await this.listAll<NetworkInterface>(url, networkInterfacePageSchema, scaleSetName);
		return memberPrivateIps(nics);
	}

	private scaleSetsUrl(scope: ResourceScope): string {
		return `${this.managementUrl}/subscriptions/${encodeURIComponent(scope.subscriptionId)}`
			+ `/resourceGroups/${encodeURIComponent(scope.resourceGroup)}`
			+ "/providers/Microsoft.Compute/virtualMachineScaleSets";
	}

	private scaleSetUrl(scope: ResourceScope, scaleSetName: string): string {
		return `${this.scaleSetsUrl(scope)}/${encodeURIComponent(scaleSetName)}`;
	}

	/**
	 * Fetch every page of a listing.
	 * A 404 maps to ScaleSetNotFoundError when the listing belongs to a named set.
	 */
	private async listAll<T>(
		firstUrl: string,
		schema: PageSchema<T>,
		scaleSetName: string | null,
	): Promise<T[]> {
		const items: T[] = [];
		let url: string | null = firstUrl;

		while (url !== null) {
			const token = await this.tokenProvider.getToken();
			this.logger.debug(`GET ${url}`);

			let body: unknown;
			try {
				const response = await fetch(url, {
					method: "GET",
					headers: { Authorization: `Bearer ${token}` },
				});
				if (response.status === 404 && scaleSetName !== null) {
					throw new ScaleSetNotFoundError(scaleSetName);
				}
				if (!response.ok) {
					throw new InventoryUnavailableError(`ARM returned status ${response.status} for ${url}`);
				}
				body = await response.json();
			} catch (err) {
				if (err instanceof InventoryUnavailableError) {
					throw err;
				}
				throw new InventoryUnavailableError(formatError(err), { cause: err });
			}

			const page = schema.safeParse(body);
			if (!page.success) {
				throw new InventoryUnavailableError(`malformed listing from ${url}`);
			}
			items.push(...page.data.value);
			url = page.data.nextLink ?? null;
		}

		return items;
	}
}
