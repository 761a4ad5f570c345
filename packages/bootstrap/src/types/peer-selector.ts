import type { MembershipSnapshot } from "@consul-scaleset/shared";

/**
 * Picks one peer to seed cluster join.
 */
export interface PeerSelector {
	selectPeer(selfIp: string, members: MembershipSnapshot): string | null;
}
