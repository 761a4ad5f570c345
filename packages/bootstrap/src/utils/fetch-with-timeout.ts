/**
 * fetch() plus a body read, both aborted after timeoutMs.
 * The AbortError surfaces to the caller like any other network failure.
 */
export async function fetchWithTimeout<T>(
	url: string,
	init: RequestInit,
	timeoutMs: number,
	read: (response: Response) => Promise<T>,
): Promise<T> {
	const controller = new AbortController();
	const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
	try {
		const response = await fetch(url, { ...init, signal: controller.signal });
		return await read(response);
	} finally {
		clearTimeout(timeoutId);
	}
}
