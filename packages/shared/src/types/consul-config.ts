/**
 * Shape of the generated Consul agent configuration document.
 * Key names follow Consul's own configuration format.
 */
export interface ConsulAgentConfig {
	advertise_addr: string;
	bind_addr: string;
	bootstrap_expect?: number;
	client_addr: string;
	datacenter: string;
	node_name: string;
	retry_join?: string[];
	server: boolean;
	ui: boolean;
	raft_protocol: number;
}
