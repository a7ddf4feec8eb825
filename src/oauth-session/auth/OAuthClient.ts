/**
 * Boundary between the HTTP layer and the vendor OAuth SDK.
 *
 * Handlers only ever talk to an OAuthClient; the vendor-specific work
 * (authorization URL, code exchange, user info, revocation) lives behind it.
 */

export interface AuthUrlRequest {
    state: string;
    scopes?: string[];
}

export interface AuthUrlResult {
    url: string;
    codeVerifier: string;
}

export interface TokenResponse {
    access_token: string;
    token_type: string;
    expires_in?: number;
    refresh_token?: string;
    id_token?: string;
    scope?: string;
}

export type UserInfo = Record<string, unknown>;

export interface OAuthClient {
    readonly name: string;

    /**
     * Builds the authorization URL with PKCE enabled and returns the verifier
     * that has to be presented at code exchange.
     */
    getAuthUrl(request: AuthUrlRequest): Promise<AuthUrlResult>;

    /**
     * Redeems an authorization code. `scopes` are the ones the login asked for.
     */
    exchangeCodeForToken(code: string, codeVerifier: string, scopes?: string[]): Promise<TokenResponse>;

    getUserInfo(accessToken: string): Promise<UserInfo>;

    revokeToken(accessToken: string): Promise<void>;
}

/**
 * An error reported by the authorization server (invalid_grant, access_denied, ...).
 * Anything else thrown by a client is an unexpected failure.
 */
export class OAuthError extends Error {
    readonly code: string;

    constructor(code: string, message: string) {
        super(message);
        this.name = "OAuthError";
        this.code = code;
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
