/**
 * Bootstrap configuration module.
 *
 * Priority: CLI > Environment > Defaults
 */

import * as path from "node:path";
import { AGENT_ROLE, type AgentRole } from "@consul-scaleset/shared";
import type { BootstrapConfig } from "../types/index.js";
import { InvalidArgumentError, MissingRequiredArgumentError } from "../errors/index.js";
import { isLogLevel } from "../logger/index.js";
import { type ParsedArgs, parseCliArgs } from "./cli-parser.js";
import { getDefaultConfig } from "./defaults.js";
import { parseEnvVars } from "./env-parser.js";

export { wantsHelp } from "./cli-parser.js";
export { USAGE } from "./usage.js";

function resolveRole(cli: ParsedArgs): AgentRole {
	if (cli.server && cli.client) {
		throw new InvalidArgumentError("--server and --client are mutually exclusive");
	}
	if (cli.server) {
		return AGENT_ROLE.SERVER;
	}
	if (cli.client) {
		return AGENT_ROLE.CLIENT;
	}
	throw new MissingRequiredArgumentError("--server or --client");
}

function required(value: string | undefined, flag: string): string {
	if (value === undefined || value === "") {
		throw new MissingRequiredArgumentError(flag);
	}
	return value;
}

function positiveInt(raw: string | undefined, fallback: number, name: string): number {
	if (raw === undefined) {
		return fallback;
	}
	if (!/^\d+$/.test(raw) || Number(raw) < 1) {
		throw new InvalidArgumentError(`${name} must be a positive integer, got "${raw}"`);
	}
	return Number(raw);
}

/**
 * Load bootstrap configuration from CLI arguments, environment variables, and defaults.
 * @throws MissingRequiredArgumentError or InvalidArgumentError before any discovery runs
 */
export function loadConfig(args: string[], env: NodeJS.ProcessEnv = process.env): BootstrapConfig {
	const cli = parseCliArgs(args);
	const fromEnv = parseEnvVars(env);
	const defaults = getDefaultConfig();

	const role = resolveRole(cli);
	const credentials = {
		tenantId: required(cli.tenantId ?? fromEnv.tenantId, "--tenant-id"),
		clientId: required(cli.clientId ?? fromEnv.clientId, "--client-id"),
		clientSecret: required(cli.clientSecret ?? fromEnv.clientSecret, "--secret"),
	};

	const scaleSetName = cli.scaleSetName ?? fromEnv.scaleSetName ?? null;
	if (role === AGENT_ROLE.CLIENT && scaleSetName === null) {
		throw new MissingRequiredArgumentError("--scale-set-name", "required with --client");
	}

	const logLevel = cli.logLevel ?? fromEnv.logLevel ?? defaults.logLevel;
	if (!isLogLevel(logLevel)) {
		throw new InvalidArgumentError(`unknown log level "${logLevel}"`);
	}

	const consulDir = cli.consulDir ?? fromEnv.consulDir ?? defaults.consulDir;

	return {
		role,
		credentials,
		scaleSetName,
		raftProtocol: positiveInt(cli.raftProtocol ?? fromEnv.raftProtocol, defaults.raftProtocol, "--raft-protocol"),
		skipConsulConfig: cli.skipConsulConfig ?? false,
		paths: {
			binDir: cli.binDir ?? path.posix.join(consulDir, "bin"),
			configDir: cli.configDir ?? path.posix.join(consulDir, "config"),
			dataDir: cli.dataDir ?? path.posix.join(consulDir, "data"),
			logDir: cli.logDir ?? path.posix.join(consulDir, "log"),
		},
		user: cli.user ?? fromEnv.user ?? defaults.user,
		supervisorConfigPath: cli.supervisorConfigPath ?? defaults.supervisorConfigPath,
		metadataUrl: fromEnv.metadataUrl ?? defaults.metadataUrl,
		metadataTimeoutMs: positiveInt(fromEnv.metadataTimeoutMs, defaults.metadataTimeoutMs, "AZURE_METADATA_TIMEOUT_MS"),
		managementUrl: fromEnv.managementUrl ?? defaults.managementUrl,
		authorityUrl: fromEnv.authorityUrl ?? defaults.authorityUrl,
		logLevel,
	};
}
