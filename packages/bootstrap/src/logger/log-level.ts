export const LOG_LEVELS = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
	silent: 4,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

export function isLogLevel(value: string): value is LogLevel {
	return Object.hasOwn(LOG_LEVELS, value);
}

let currentLevel: LogLevel = "info";

/**
 * Set the process-wide level. Called once by the CLI after configuration is loaded.
 */
export function setLogLevel(level: LogLevel): void {
	currentLevel = level;
}

export function getCurrentLevel(): LogLevel {
	return currentLevel;
}
