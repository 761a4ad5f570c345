/**
 * CLI argument parsing for bootstrap configuration.
 * Accepts both "--flag=value" and "--flag value".
 */

import { InvalidArgumentError } from "../errors/index.js";

export interface ParsedArgs {
	server?: boolean;
	client?: boolean;
	skipConsulConfig?: boolean;
	tenantId?: string;
	clientId?: string;
	clientSecret?: string;
	scaleSetName?: string;
	raftProtocol?: string;
	consulDir?: string;
	binDir?: string;
	configDir?: string;
	dataDir?: string;
	logDir?: string;
	user?: string;
	supervisorConfigPath?: string;
	logLevel?: string;
}

type ValueKey = {
	[K in keyof ParsedArgs]-?: NonNullable<ParsedArgs[K]> extends string ? K : never;
}[keyof ParsedArgs];

const VALUE_FLAGS: Readonly<Record<string, ValueKey>> = {
	"--tenant-id": "tenantId",
	"--client-id": "clientId",
	"--secret": "clientSecret",
	"--scale-set-name": "scaleSetName",
	"--raft-protocol": "raftProtocol",
	"--consul-dir": "consulDir",
	"--bin-dir": "binDir",
	"--config-dir": "configDir",
	"--data-dir": "dataDir",
	"--log-dir": "logDir",
	"--user": "user",
	"--supervisor-config-path": "supervisorConfigPath",
	"--log-level": "logLevel",
};

const BOOLEAN_FLAGS: ReadonlySet<string> = new Set(["--server", "--client", "--skip-consul-config", "--help", "-h"]);

export function wantsHelp(args: string[]): boolean {
	return args.includes("--help") || args.includes("-h");
}

export function parseCliArgs(args: string[]): ParsedArgs {
	const parsed: ParsedArgs = {};

	for (let i = 0; i < args.length; i++) {
		const arg = args[i];
		const eq = arg.indexOf("=");
		const flag = eq === -1 ? arg : arg.slice(0, eq);

		if (BOOLEAN_FLAGS.has(flag) && eq !== -1) {
			throw new InvalidArgumentError(`${flag} does not take a value`);
		}

		if (flag === "--server") {
			parsed.server = true;
		} else if (flag === "--client") {
			parsed.client = true;
		} else if (flag === "--skip-consul-config") {
			parsed.skipConsulConfig = true;
		} else if (flag === "--help" || flag === "-h") {
			continue;
		} else if (Object.hasOwn(VALUE_FLAGS, flag)) {
			let value: string | undefined;
			if (eq !== -1) {
				value = arg.slice(eq + 1);
			} else {
				value = args[i + 1];
				if (value === undefined || value.startsWith("--")) {
					throw new InvalidArgumentError(`${flag} requires a value`);
				}
				i++;
			}
			parsed[VALUE_FLAGS[flag]] = value;
		} else {
			throw new InvalidArgumentError(`unrecognized argument ${arg}`);
		}
	}

	return parsed;
}
