/**
 * The single persisted credential of a deployment.
 * Timestamps are epoch milliseconds.
 */
export interface TokenRecord {
	accessToken: string;
	refreshToken: string;
	expiresAt: number;
	lastRefreshedAt: number;
	userId?: string;
	scope?: string;
}

/**
 * Application credentials supplied at deployment time; never persisted or rotated.
 */
export interface ClientCredentials {
	clientId: string;
	clientSecret: string;
}

/** Longest token string the store and cipher accept. */
export const MAX_TOKEN_LENGTH = 8192;
