// =============================================================================
// Scope
// =============================================================================

/**
 * The ARM scope every inventory listing runs against.
 */
export interface ResourceScope {
	subscriptionId: string;
	resourceGroup: string;
}

// =============================================================================
// Scale Sets
// =============================================================================

/**
 * Scale set that owns (or is joined by) an instance.
 * - known: a named set in the given scope
 * - unknown: no discoverable set; sized as a single node
 */
export type ScaleSetRef =
	| { kind: "known"; scope: ResourceScope; name: string }
	| { kind: "unknown"; scope: ResourceScope };

/** Label used for an unknown scale set in logs. */
export const UNKNOWN_SCALE_SET = "unknown";

/**
 * Display name of a scale set reference.
 */
export function scaleSetName(set: ScaleSetRef): string {
	return set.kind === "known" ? set.name : UNKNOWN_SCALE_SET;
}

// =============================================================================
// Membership
// =============================================================================

/**
 * Private IPs of a scale set's members, captured from one listing.
 * A later listing may disagree.
 */
export interface MembershipSnapshot {
	members: readonly string[];
	count: number;
}

/**
 * Build a snapshot from a listing.
 */
export function createMembershipSnapshot(members: readonly string[]): MembershipSnapshot {
	return { members: [...members], count: members.length };
}

/** Snapshot used when no listing is made. */
export const EMPTY_MEMBERSHIP: MembershipSnapshot = Object.freeze({ members: [], count: 0 });
