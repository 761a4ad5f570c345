import * as path from "node:path";
import {
	type Artifact,
	type BootstrapPlan,
	CONSUL_LAYOUT,
	EMPTY_MEMBERSHIP,
	type InstanceIdentity,
	type ScaleSetRef,
} from "@consul-scaleset/shared";
import type {
	ArtifactWriter,
	BootstrapConfig,
	BootstrapResult,
	Bootstrapper,
	ConfigComposer,
	FleetInventory,
	Logger,
	MetadataClient,
	PeerSelector,
	QuorumSizer,
} from "./types/index.js";

/**
 * One discovery-and-render pass.
 *
 * Every query runs in sequence; any error aborts the pass before
 * anything is written.
 */
export class BootstrapperImpl implements Bootstrapper {
	constructor(
		private readonly config: BootstrapConfig,
		private readonly logger: Logger,
		private readonly metadata: MetadataClient,
		private readonly inventory: FleetInventory,
		private readonly peerSelector: PeerSelector,
		private readonly quorumSizer: QuorumSizer,
		private readonly composer: ConfigComposer,
		private readonly writer: ArtifactWriter,
	) {}

	async run(): Promise<BootstrapResult> {
		this.logger.info(`Bootstrapping Consul ${this.config.role}`);

		if (this.config.skipConsulConfig) {
			this.logger.info("--skip-consul-config is set; not generating the agent configuration");
			const artifacts = this.writer.write([this.supervisorArtifact(this.composer.renderSupervisorConfig())]);
			return { plan: null, artifacts };
		}

		const identity = await this.metadata.identity();
		const plan = await this.buildPlan(identity);
		const rendered = this.composer.render(identity, plan);

		const artifacts = this.writer.write([
			{
				path: path.posix.join(this.config.paths.configDir, CONSUL_LAYOUT.CONFIG_FILE_NAME),
				content: rendered.agentConfig,
			},
			this.supervisorArtifact(rendered.supervisorConfig),
		]);
		return { plan, artifacts };
	}

	/**
	 * Resolve the scale set, size the quorum and pick a join peer.
	 */
	async buildPlan(identity: InstanceIdentity): Promise<BootstrapPlan> {
		const set = await this.resolveScaleSet(identity);
		const bootstrapExpect = await this.quorumSizer.plan(this.config.role, set);

		// an unknown set has no listing to take
		const members = set.kind === "known"
			? await this.inventory.membership(set.scope, set.name)
			: EMPTY_MEMBERSHIP;
		const retryJoinIp = this.peerSelector.selectPeer(identity.privateIp, members);

		return {
			role: this.config.role,
			retryJoinIp,
			bootstrapExpect,
			raftProtocol: this.config.raftProtocol,
		};
	}

	private async resolveScaleSet(identity: InstanceIdentity): Promise<ScaleSetRef> {
		const scope = { subscriptionId: identity.subscriptionId, resourceGroup: identity.resourceGroup };
		if (this.config.scaleSetName !== null) {
			this.logger.info(`Using scale set ${this.config.scaleSetName} from configuration`);
			return { kind: "known", scope, name: this.config.scaleSetName };
		}
		return this.inventory.resolveOwningSet(scope, identity.id);
	}

	private supervisorArtifact(content: string): Artifact {
		return { path: this.config.supervisorConfigPath, content };
	}
}
