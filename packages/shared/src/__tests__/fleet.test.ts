import { describe, expect, it } from "vitest";
import {
	EMPTY_MEMBERSHIP,
	UNKNOWN_SCALE_SET,
	createMembershipSnapshot,
	scaleSetName,
} from "../types/fleet.js";

const scope = { subscriptionId: "sub-1", resourceGroup: "rg1" };

describe("fleet types", () => {
	describe("scaleSetName", () => {
		it("returns the name of a known set", () => {
			expect(scaleSetName({ kind: "known", scope, name: "vmss1" })).toBe("vmss1");
		});

		it("returns the unknown label for an unknown set", () => {
			expect(scaleSetName({ kind: "unknown", scope })).toBe(UNKNOWN_SCALE_SET);
		});
	});

	describe("createMembershipSnapshot", () => {
		it("counts the members", () => {
			const snapshot = createMembershipSnapshot(["10.0.0.4", "10.0.0.5"]);
			expect(snapshot).toEqual({ members: ["10.0.0.4", "10.0.0.5"], count: 2 });
		});

		it("copies the listing", () => {
			const listing = ["10.0.0.4"];
			const snapshot = createMembershipSnapshot(listing);
			listing.push("10.0.0.9");
			expect(snapshot.members).toEqual(["10.0.0.4"]);
		});
	});

	it("EMPTY_MEMBERSHIP has no members", () => {
		expect(EMPTY_MEMBERSHIP).toEqual({ members: [], count: 0 });
	});
});
