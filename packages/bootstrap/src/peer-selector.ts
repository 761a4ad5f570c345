import type { MembershipSnapshot } from "@consul-scaleset/shared";
import type { Logger, PeerSelector } from "./types/index.js";
import { LoggerImpl } from "./logger/index.js";

/**
 * Picks the last listed member other than this instance.
 * Any other member would do; Consul's join de-duplicates.
 */
export class PeerSelectorImpl implements PeerSelector {
	private readonly logger: Logger;

	constructor(logger?: Logger) {
		this.logger = logger ?? new LoggerImpl("peer-selector");
	}

	selectPeer(selfIp: string, members: MembershipSnapshot): string | null {
		let peer: string | null = null;
		for (const ip of members.members) {
			if (ip !== selfIp) {
				peer = ip;
			}
		}

		if (peer === null) {
			this.logger.info(`No peer other than ${selfIp} found; starting without retry_join`);
		} else {
			this.logger.info(`Selected ${peer} as retry_join peer`);
		}
		return peer;
	}
}
