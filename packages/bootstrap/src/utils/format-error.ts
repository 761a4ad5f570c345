/**
 * Format an unknown error value into a string message.
 * Appends the cause chain when present.
 */
export function formatError(err: unknown): string {
	if (!(err instanceof Error)) {
		return String(err);
	}
	return err.cause === undefined ? err.message : `${err.message}: ${formatError(err.cause)}`;
}
