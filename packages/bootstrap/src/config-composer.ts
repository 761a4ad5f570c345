import * as path from "node:path";
import {
	AGENT_ROLE,
	type BootstrapPlan,
	CONSUL_DEFAULTS,
	type ConsulAgentConfig,
	type InstanceIdentity,
	type RenderedConfig,
} from "@consul-scaleset/shared";
import type { ComposerOptions, ConfigComposer } from "./types/index.js";

/**
 * Renders the Consul agent configuration and its supervisord program entry.
 * Output depends only on the inputs.
 */
export class ConfigComposerImpl implements ConfigComposer {
	constructor(private readonly options: ComposerOptions) {}

	render(identity: InstanceIdentity, plan: BootstrapPlan): RenderedConfig {
		return {
			agentConfig: this.renderAgentConfig(identity, plan),
			supervisorConfig: this.renderSupervisorConfig(),
		};
	}

	renderAgentConfig(identity: InstanceIdentity, plan: BootstrapPlan): string {
		const isServer = plan.role === AGENT_ROLE.SERVER;

		// key order is part of the output format
		const document: ConsulAgentConfig = {
			advertise_addr: identity.privateIp,
			bind_addr: identity.privateIp,
			...(isServer && plan.bootstrapExpect !== null ? { bootstrap_expect: plan.bootstrapExpect } : {}),
			client_addr: CONSUL_DEFAULTS.CLIENT_ADDR,
			datacenter: identity.location,
			node_name: identity.id,
			...(plan.retryJoinIp !== null ? { retry_join: [plan.retryJoinIp] } : {}),
			server: isServer,
			ui: true,
			raft_protocol: plan.raftProtocol,
		};

		return `${JSON.stringify(document, null, 2)}\n`;
	}

	renderSupervisorConfig(): string {
		const { binDir, configDir, dataDir, logDir, user } = this.options;
		const program = CONSUL_DEFAULTS.PROGRAM_NAME;

		return [
			`[program:${program}]`,
			`command=${path.posix.join(binDir, program)} agent -config-dir ${configDir} -data-dir ${dataDir}`,
			`stdout_logfile=${path.posix.join(logDir, `${program}-stdout.log`)}`,
			`stderr_logfile=${path.posix.join(logDir, `${program}-error.log`)}`,
			"numprocs=1",
			"autostart=true",
			"autorestart=true",
			"stopsignal=INT",
			`user=${user}`,
			"",
		].join("\n");
	}
}
