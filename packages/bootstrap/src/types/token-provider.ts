/**
 * Source of bearer tokens for Azure Resource Manager.
 */
export interface TokenProvider {
	getToken(): Promise<string>;
}
