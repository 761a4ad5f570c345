/**
 * Tests for MetadataClientImpl
 *
 * Covers:
 * - Identity extraction from the metadata document
 * - Request shape (Metadata header)
 * - Malformed payloads, error statuses and network failures
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
	type FetchMockContext,
	TEST_METADATA_URL,
	captureFetchContext,
	createMetadataPayload,
	createMockLogger,
	jsonResponse,
} from "./test-utils.js";
import { MetadataClientImpl } from "../metadata-client.js";
import { MetadataUnavailableError } from "../errors/index.js";

describe("MetadataClientImpl", () => {
	let fetchContext: FetchMockContext;

	beforeEach(() => {
		fetchContext = captureFetchContext();
	});

	afterEach(() => {
		fetchContext.restore();
		vi.restoreAllMocks();
	});

	function createClient(): MetadataClientImpl {
		return new MetadataClientImpl(TEST_METADATA_URL, 1000, createMockLogger());
	}

	it("maps the metadata document to an identity", async () => {
		global.fetch = vi.fn().mockResolvedValue(jsonResponse(createMetadataPayload({
			name: "vmss1_3",
			location: "westeurope",
			resourceGroupName: "rg-consul",
			subscriptionId: "sub-9",
			privateIp: "10.1.0.7",
		})));

		const identity = await createClient().identity();

		expect(identity).toEqual({
			id: "vmss1_3",
			privateIp: "10.1.0.7",
			location: "westeurope",
			resourceGroup: "rg-consul",
			subscriptionId: "sub-9",
		});
	});

	it("sends the Metadata header to the configured URL", async () => {
		const fetchMock = vi.fn().mockResolvedValue(jsonResponse(createMetadataPayload()));
		global.fetch = fetchMock;

		await createClient().identity();

		expect(fetchMock).toHaveBeenCalledTimes(1);
		expect(fetchMock.mock.calls[0][0]).toBe(TEST_METADATA_URL);
		expect(fetchMock.mock.calls[0][1]).toMatchObject({ method: "GET", headers: { Metadata: "true" } });
	});

	it("uses the first address of the first interface", async () => {
		const payload = createMetadataPayload();
		payload.network = {
			interface: [
				{ ipv4: { ipAddress: [{ privateIpAddress: "10.0.0.4" }, { privateIpAddress: "10.0.0.99" }] } },
				{ ipv4: { ipAddress: [{ privateIpAddress: "192.168.1.4" }] } },
			],
		};
		global.fetch = vi.fn().mockResolvedValue(jsonResponse(payload));

		const identity = await createClient().identity();

		expect(identity.privateIp).toBe("10.0.0.4");
	});

	it("fails when a compute field is missing", async () => {
		const payload = createMetadataPayload();
		payload.compute = { name: "vm-1", location: "eastus", subscriptionId: "sub-1" };
		global.fetch = vi.fn().mockResolvedValue(jsonResponse(payload));

		await expect(createClient().identity()).rejects.toThrow(
			"Instance metadata unavailable: malformed payload at compute.resourceGroupName: Required",
		);
	});

	it("fails when there is no network interface", async () => {
		const payload = createMetadataPayload();
		payload.network = { interface: [] };
		global.fetch = vi.fn().mockResolvedValue(jsonResponse(payload));

		await expect(createClient().identity()).rejects.toThrow(MetadataUnavailableError);
	});

	it("fails when the private address is not IPv4", async () => {
		global.fetch = vi.fn().mockResolvedValue(jsonResponse(createMetadataPayload({ privateIp: "not-an-ip" })));

		await expect(createClient().identity()).rejects.toThrow(MetadataUnavailableError);
	});

	it("fails when the payload is not an object", async () => {
		global.fetch = vi.fn().mockResolvedValue(jsonResponse("<html>gateway</html>"));

		await expect(createClient().identity()).rejects.toThrow(MetadataUnavailableError);
	});

	it("fails when the body is not JSON", async () => {
		global.fetch = vi.fn().mockResolvedValue({
			status: 200,
			ok: true,
			json: () => Promise.reject(new SyntaxError("Unexpected token < in JSON")),
		});

		await expect(createClient().identity()).rejects.toThrow(
			"Instance metadata unavailable: Unexpected token < in JSON",
		);
	});

	it("fails on a non-2xx status", async () => {
		global.fetch = vi.fn().mockResolvedValue(jsonResponse({ error: "bad request" }, 400));

		await expect(createClient().identity()).rejects.toThrow("Instance metadata unavailable: status 400");
	});

	it("fails when the endpoint is unreachable", async () => {
		global.fetch = vi.fn().mockRejectedValue(new TypeError("fetch failed"));

		const error = await createClient().identity().catch((err: unknown) => err);

		expect(error).toBeInstanceOf(MetadataUnavailableError);
		expect(error).toMatchObject({ message: "Instance metadata unavailable: fetch failed", exitCode: 3 });
	});

	it("fails when the endpoint does not answer in time", async () => {
		global.fetch = vi.fn().mockImplementation((_url: string, init?: RequestInit) => new Promise((_resolve, reject) => {
			init?.signal?.addEventListener("abort", () => {
				reject(new DOMException("This operation was aborted", "AbortError"));
			});
		}));
		const client = new MetadataClientImpl(TEST_METADATA_URL, 10, createMockLogger());

		await expect(client.identity()).rejects.toThrow("Instance metadata unavailable: This operation was aborted");
	});

	it("fails when the body does not arrive in time", async () => {
		global.fetch = vi.fn().mockImplementation((_url: string, init?: RequestInit) => Promise.resolve({
			status: 200,
			ok: true,
			json: () => new Promise((_resolve, reject) => {
				init?.signal?.addEventListener("abort", () => {
					reject(new DOMException("This operation was aborted", "AbortError"));
				});
			}),
		}));
		const client = new MetadataClientImpl(TEST_METADATA_URL, 10, createMockLogger());

		await expect(client.identity()).rejects.toThrow("Instance metadata unavailable: This operation was aborted");
	});

	it("does not retry", async () => {
		const fetchMock = vi.fn().mockRejectedValue(new TypeError("fetch failed"));
		global.fetch = fetchMock;

		await expect(createClient().identity()).rejects.toThrow(MetadataUnavailableError);
		expect(fetchMock).toHaveBeenCalledTimes(1);
	});
});
