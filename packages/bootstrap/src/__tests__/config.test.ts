/**
 * Tests for bootstrap configuration
 *
 * Covers:
 * - CLI argument parsing in both flag forms
 * - Environment variable fallbacks
 * - Default values and derived directories
 * - Required and conflicting arguments
 */

import { describe, expect, it } from "vitest";
import { loadConfig, wantsHelp } from "../config/index.js";
import { parseCliArgs } from "../config/cli-parser.js";
import { InvalidArgumentError, MissingRequiredArgumentError } from "../errors/index.js";

const CREDENTIALS = ["--tenant-id=test-tenant", "--client-id=test-client", "--secret=test-secret"];

describe("Bootstrap Config", () => {
	describe("parseCliArgs", () => {
		it("reads values given with '='", () => {
			expect(parseCliArgs(["--tenant-id=t1", "--raft-protocol=2"])).toEqual({ tenantId: "t1", raftProtocol: "2" });
		});

		it("reads values given as the next argument", () => {
			expect(parseCliArgs(["--scale-set-name", "vmss1", "--client"])).toEqual({ scaleSetName: "vmss1", client: true });
		});

		it("keeps '=' inside a value", () => {
			expect(parseCliArgs(["--secret=a=b"])).toEqual({ clientSecret: "a=b" });
		});

		it("rejects a value flag without a value", () => {
			expect(() => parseCliArgs(["--tenant-id"])).toThrow(InvalidArgumentError);
			expect(() => parseCliArgs(["--tenant-id", "--server"])).toThrow("Invalid argument: --tenant-id requires a value");
		});

		it("rejects a value on a switch", () => {
			expect(() => parseCliArgs(["--server=foo"])).toThrow("Invalid argument: --server does not take a value");
			expect(() => parseCliArgs(["--client=x"])).toThrow(InvalidArgumentError);
			expect(() => parseCliArgs(["--skip-consul-config=false"])).toThrow(
				"Invalid argument: --skip-consul-config does not take a value",
			);
		});

		it("rejects unknown arguments", () => {
			expect(() => parseCliArgs(["--bogus"])).toThrow("Invalid argument: unrecognized argument --bogus");
		});
	});

	describe("wantsHelp", () => {
		it("detects --help and -h", () => {
			expect(wantsHelp(["--server", "--help"])).toBe(true);
			expect(wantsHelp(["-h"])).toBe(true);
			expect(wantsHelp(["--server"])).toBe(false);
		});
	});

	describe("loadConfig", () => {
		describe("defaults", () => {
			it("applies defaults for a server", () => {
				const config = loadConfig(["--server", ...CREDENTIALS], {});

				expect(config).toEqual({
					role: "server",
					credentials: { tenantId: "test-tenant", clientId: "test-client", clientSecret: "test-secret" },
					scaleSetName: null,
					raftProtocol: 3,
					skipConsulConfig: false,
					paths: {
						binDir: "/opt/consul/bin",
						configDir: "/opt/consul/config",
						dataDir: "/opt/consul/data",
						logDir: "/opt/consul/log",
					},
					user: "consul",
					supervisorConfigPath: "/etc/supervisor/conf.d/run-consul.conf",
					metadataUrl: "http://169.254.169.254/metadata/instance?api-version=2021-02-01",
					metadataTimeoutMs: 5000,
					managementUrl: "https://management.azure.com",
					authorityUrl: "https://login.microsoftonline.com",
					logLevel: "info",
				});
			});

			it("derives directories from --consul-dir", () => {
				const config = loadConfig(["--server", ...CREDENTIALS, "--consul-dir=/srv/consul"], {});
				expect(config.paths).toEqual({
					binDir: "/srv/consul/bin",
					configDir: "/srv/consul/config",
					dataDir: "/srv/consul/data",
					logDir: "/srv/consul/log",
				});
			});

			it("lets each directory be overridden", () => {
				const config = loadConfig([
					"--server", ...CREDENTIALS,
					"--config-dir", "/etc/consul.d",
					"--data-dir=/var/lib/consul",
				], {});
				expect(config.paths.configDir).toBe("/etc/consul.d");
				expect(config.paths.dataDir).toBe("/var/lib/consul");
				expect(config.paths.binDir).toBe("/opt/consul/bin");
			});
		});

		describe("with CLI arguments", () => {
			it("parses a client with a scale set", () => {
				const config = loadConfig(["--client", ...CREDENTIALS, "--scale-set-name=servers"], {});
				expect(config.role).toBe("client");
				expect(config.scaleSetName).toBe("servers");
			});

			it("parses --raft-protocol", () => {
				const config = loadConfig(["--server", ...CREDENTIALS, "--raft-protocol", "2"], {});
				expect(config.raftProtocol).toBe(2);
			});

			it("parses --skip-consul-config", () => {
				const config = loadConfig(["--server", ...CREDENTIALS, "--skip-consul-config"], {});
				expect(config.skipConsulConfig).toBe(true);
			});

			it("parses --user, --supervisor-config-path and --log-level", () => {
				const config = loadConfig([
					"--server", ...CREDENTIALS,
					"--user=svc-consul",
					"--supervisor-config-path=/tmp/consul.conf",
					"--log-level=debug",
				], {});
				expect(config.user).toBe("svc-consul");
				expect(config.supervisorConfigPath).toBe("/tmp/consul.conf");
				expect(config.logLevel).toBe("debug");
			});
		});

		describe("with environment variables", () => {
			const env = {
				AZURE_TENANT_ID: "env-tenant",
				AZURE_CLIENT_ID: "env-client",
				AZURE_CLIENT_SECRET: "env-secret",
				CONSUL_RAFT_PROTOCOL: "2",
				CONSUL_USER: "env-user",
				AZURE_METADATA_TIMEOUT_MS: "250",
				AZURE_MANAGEMENT_URL: "https://management.test",
			};

			it("reads credentials and options from the environment", () => {
				const config = loadConfig(["--server"], env);
				expect(config.credentials).toEqual({ tenantId: "env-tenant", clientId: "env-client", clientSecret: "env-secret" });
				expect(config.raftProtocol).toBe(2);
				expect(config.user).toBe("env-user");
				expect(config.metadataTimeoutMs).toBe(250);
				expect(config.managementUrl).toBe("https://management.test");
			});

			it("CLI arguments take priority over environment", () => {
				const config = loadConfig(["--server", "--tenant-id=cli-tenant", "--raft-protocol=3"], env);
				expect(config.credentials.tenantId).toBe("cli-tenant");
				expect(config.raftProtocol).toBe(3);
			});

			it("treats empty variables as unset", () => {
				const config = loadConfig(["--server", ...CREDENTIALS], { CONSUL_USER: "" });
				expect(config.user).toBe("consul");
			});
		});

		describe("validation", () => {
			it("requires --server or --client", () => {
				expect(() => loadConfig([...CREDENTIALS], {})).toThrow(MissingRequiredArgumentError);
			});

			it("rejects --server together with --client", () => {
				expect(() => loadConfig(["--server", "--client", ...CREDENTIALS, "--scale-set-name=s"], {}))
					.toThrow("Invalid argument: --server and --client are mutually exclusive");
			});

			it("requires every credential", () => {
				expect(() => loadConfig(["--server", "--tenant-id=t", "--client-id=c"], {}))
					.toThrow("Missing required argument: --secret");
			});

			it("requires --scale-set-name with --client", () => {
				expect(() => loadConfig(["--client", ...CREDENTIALS], {}))
					.toThrow("Missing required argument: --scale-set-name (required with --client)");
			});

			it("rejects a non-numeric raft protocol", () => {
				expect(() => loadConfig(["--server", ...CREDENTIALS, "--raft-protocol=three"], {}))
					.toThrow("Invalid argument: --raft-protocol must be a positive integer, got \"three\"");
			});

			it("rejects a zero raft protocol", () => {
				expect(() => loadConfig(["--server", ...CREDENTIALS, "--raft-protocol=0"], {})).toThrow(InvalidArgumentError);
			});

			it("rejects an unknown log level", () => {
				expect(() => loadConfig(["--server", ...CREDENTIALS], { LOG_LEVEL: "verbose" }))
					.toThrow("Invalid argument: unknown log level \"verbose\"");
			});

			it("uses exit code 2 for argument errors", () => {
				let thrown: unknown;
				try {
					loadConfig([], {});
				} catch (err) {
					thrown = err;
				}
				expect(thrown).toBeInstanceOf(MissingRequiredArgumentError);
				expect(thrown).toMatchObject({ exitCode: 2 });
			});
		});
	});
});
