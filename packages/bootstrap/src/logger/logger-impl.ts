import type { Logger } from "../types/index.js";
import { LOG_LEVELS, type LogLevel, getCurrentLevel } from "./log-level.js";

function formatTimestamp(): string {
	return new Date().toISOString();
}

export class LoggerImpl implements Logger {
	constructor(private readonly prefix: string) {}

	private log(level: Exclude<LogLevel, "silent">, message: string): void {
		if (LOG_LEVELS[level] < LOG_LEVELS[getCurrentLevel()]) {
			return;
		}
		const line = `[${formatTimestamp()}] [${level.toUpperCase().padEnd(5)}] [${this.prefix}] ${message}`;
		// stdout stays free for anything a caller pipes
		if (level === "error" || level === "warn") {
			console.error(line);
		} else {
			console.log(line);
		}
	}

	debug(message: string): void {
		this.log("debug", message);
	}

	info(message: string): void {
		this.log("info", message);
	}

	warn(message: string): void {
		this.log("warn", message);
	}

	error(message: string): void {
		this.log("error", message);
	}
}
