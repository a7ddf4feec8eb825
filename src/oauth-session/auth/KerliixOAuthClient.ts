import { z } from 'zod';
import { KerliixSettings } from '../Config.js';
import { logger } from '../Logger.js';
import {
    AuthUrlRequest,
    AuthUrlResult,
    OAuthClient,
    OAuthError,
    TokenResponse,
    UserInfo
} from './OAuthClient.js';
import { generatePkce } from './Pkce.js';

const DEFAULT_SCOPES = ['openid', 'profile', 'email'];

const TokenResponseSchema = z.object({
    access_token: z.string().min(1),
    token_type: z.string().default('Bearer'),
    expires_in: z.number().optional(),
    refresh_token: z.string().optional(),
    id_token: z.string().optional(),
    scope: z.string().optional(),
});

const ErrorBodySchema = z.object({
    error: z.string(),
    error_description: z.string().optional(),
});

const UserInfoSchema = z.record(z.unknown());

function parseJson(text: string): unknown {
    try {
        return JSON.parse(text);
    } catch {
        return undefined;
    }
}

/**
 * Kerliix OAuth client talking to the authorization server over HTTP.
 */
export class KerliixOAuthClient implements OAuthClient {
    readonly name = 'kerliix';
    private readonly _baseUrl: string;

    constructor(private readonly _settings: KerliixSettings) {
        this._baseUrl = _settings.baseUrl.endsWith('/') ? _settings.baseUrl.slice(0, -1) : _settings.baseUrl;
    }

    async getAuthUrl(request: AuthUrlRequest): Promise<AuthUrlResult> {
        const pkce = generatePkce();
        const scopes = request.scopes && request.scopes.length > 0 ? request.scopes : DEFAULT_SCOPES;

        const authUrl = new URL(`${this._baseUrl}/oauth/authorize`);
        authUrl.searchParams.append('response_type', 'code');
        authUrl.searchParams.append('client_id', this._settings.clientId);
        authUrl.searchParams.append('redirect_uri', this._settings.redirectUri);
        authUrl.searchParams.append('scope', scopes.join(' '));
        authUrl.searchParams.append('state', request.state);
        authUrl.searchParams.append('code_challenge', pkce.challenge);
        authUrl.searchParams.append('code_challenge_method', 'S256');

        return { url: authUrl.toString(), codeVerifier: pkce.verifier };
    }

    async exchangeCodeForToken(code: string, codeVerifier: string): Promise<TokenResponse> {
        const response = await fetch(`${this._baseUrl}/oauth/token`, {
            method: 'POST',
            headers: {
                'Content-Type': 'application/x-www-form-urlencoded',
                'Accept': 'application/json'
            },
            body: this._form({
                grant_type: 'authorization_code',
                code: code,
                redirect_uri: this._settings.redirectUri,
                code_verifier: codeVerifier,
            })
        });

        if (!response.ok) {
            throw await this._toOAuthError(response, 'Token exchange');
        }

        const parsed = TokenResponseSchema.safeParse(parseJson(await response.text()));
        if (!parsed.success) {
            throw new OAuthError('invalid_token_response', 'Token endpoint returned no usable access token');
        }

        logger.info('Kerliix token exchange succeeded', {
            hasRefreshToken: !!parsed.data.refresh_token,
            expiresIn: parsed.data.expires_in,
        });

        return parsed.data;
    }

    async getUserInfo(accessToken: string): Promise<UserInfo> {
        const response = await fetch(`${this._baseUrl}/oauth/userinfo`, {
            headers: {
                'Authorization': `Bearer ${accessToken}`,
                'Accept': 'application/json'
            }
        });

        if (!response.ok) {
            throw await this._toOAuthError(response, 'User info request');
        }

        const parsed = UserInfoSchema.safeParse(parseJson(await response.text()));
        if (!parsed.success) {
            throw new OAuthError('invalid_userinfo_response', 'User info endpoint returned an invalid body');
        }

        return parsed.data;
    }

    async revokeToken(accessToken: string): Promise<void> {
        const response = await fetch(`${this._baseUrl}/oauth/revoke`, {
            method: 'POST',
            headers: {
                'Content-Type': 'application/x-www-form-urlencoded',
                'Accept': 'application/json'
            },
            body: this._form({
                token: accessToken,
                token_type_hint: 'access_token',
            })
        });

        if (!response.ok) {
            throw await this._toOAuthError(response, 'Token revocation');
        }
    }

    /**
     * Form body with client authentication appended. The secret is optional:
     * public clients rely on PKCE alone.
     */
    private _form(fields: Record<string, string>): URLSearchParams {
        const body = new URLSearchParams(fields);
        body.append('client_id', this._settings.clientId);
        if (this._settings.clientSecret) {
            body.append('client_secret', this._settings.clientSecret);
        }
        return body;
    }

    private async _toOAuthError(response: Response, operation: string): Promise<OAuthError> {
        const body = ErrorBodySchema.safeParse(parseJson(await response.text()));
        const fallback = `${operation} failed with status ${response.status}`;

        if (!body.success) {
            return new OAuthError(`http_${response.status}`, fallback);
        }
        return new OAuthError(body.data.error, body.data.error_description ?? fallback);
    }
}
