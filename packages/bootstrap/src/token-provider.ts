import { AZURE_ENDPOINTS, TOKEN_EXPIRY_SKEW_MS } from "@consul-scaleset/shared";
import { z } from "zod";
import type { AzureCredentials, Logger, TokenProvider } from "./types/index.js";
import { CredentialError } from "./errors/index.js";
import { LoggerImpl } from "./logger/index.js";
import { formatError } from "./utils/index.js";

const tokenResponseSchema = z.object({
	access_token: z.string().min(1),
	expires_in: z.coerce.number().positive(),
});

interface CachedToken {
	value: string;
	expiresAt: number;
}

/**
 * Client-credentials sign-in for a service principal.
 * The token is cached until shortly before it expires.
 */
export class ServicePrincipalTokenProvider implements TokenProvider {
	private readonly logger: Logger;
	private cached: CachedToken | null = null;

	constructor(
		private readonly credentials: AzureCredentials,
		private readonly authorityUrl: string,
		logger?: Logger,
		private readonly now: () => number = Date.now,
	) {
		this.logger = logger ?? new LoggerImpl("auth");
	}

	async getToken(): Promise<string> {
		if (this.cached && this.now() < this.cached.expiresAt - TOKEN_EXPIRY_SKEW_MS) {
			return this.cached.value;
		}

		const url = `${this.authorityUrl}/${encodeURIComponent(this.credentials.tenantId)}/oauth2/v2.0/token`;
		const form = new URLSearchParams({
			grant_type: "client_credentials",
			client_id: this.credentials.clientId,
			client_secret: this.credentials.clientSecret,
			scope: AZURE_ENDPOINTS.MANAGEMENT_SCOPE,
		});

		let body: unknown;
		try {
			const response = await fetch(url, {
				method: "POST",
				headers: { "Content-Type": "application/x-www-form-urlencoded" },
				body: form.toString(),
			});
			if (!response.ok) {
				throw new CredentialError(`token endpoint returned status ${response.status}`);
			}
			body = await response.json();
		} catch (err) {
			if (err instanceof CredentialError) {
				throw err;
			}
			throw new CredentialError(formatError(err), { cause: err });
		}

		const parsed = tokenResponseSchema.safeParse(body);
		if (!parsed.success) {
			throw new CredentialError("token endpoint returned a malformed response");
		}

		this.cached = {
			value: parsed.data.access_token,
			expiresAt: this.now() + parsed.data.expires_in * 1000,
		};
		this.logger.debug(`Signed in as ${this.credentials.clientId}`);
		return this.cached.value;
	}
}
