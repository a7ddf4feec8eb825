import {
    AuthenticationResult,
    AuthError,
    AuthorizationCodeRequest,
    AuthorizationUrlRequest,
    ConfidentialClientApplication
} from "@azure/msal-node";
import { Client, GraphError } from "@microsoft/microsoft-graph-client";
import 'isomorphic-fetch';
import { EntraSettings } from "../Config.js";
import { logger } from "../Logger.js";
import {
    AuthUrlRequest,
    AuthUrlResult,
    OAuthClient,
    OAuthError,
    TokenResponse,
    UserInfo
} from "./OAuthClient.js";
import { generatePkce } from "./Pkce.js";

const DEFAULT_SCOPES = ['User.Read'];

export type MsalTokenResult = Pick<AuthenticationResult, 'accessToken' | 'idToken' | 'expiresOn' | 'scopes' | 'tokenType'>;

/** The part of ConfidentialClientApplication this client uses. */
export interface MsalCodeClient {
    getAuthCodeUrl(request: AuthorizationUrlRequest): Promise<string>;
    acquireTokenByCode(request: AuthorizationCodeRequest): Promise<MsalTokenResult | null>;
}

export interface GraphRequestLike {
    select(properties: string): GraphRequestLike;
    get(): Promise<unknown>;
    post(content: unknown): Promise<unknown>;
}

export interface GraphClientLike {
    api(path: string): GraphRequestLike;
}

export type GraphClientFactory = (accessToken: string) => GraphClientLike;

export interface EntraIdClientDependencies {
    msalClient?: MsalCodeClient;
    graphClientFactory?: GraphClientFactory;
}

const defaultGraphClientFactory: GraphClientFactory = (accessToken: string) => Client.init({
    authProvider: (done) => {
        done(null, accessToken);
    }
});

function isUserInfo(value: unknown): value is UserInfo {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Microsoft Entra ID client on MSAL (authorization code + PKCE) and Microsoft Graph.
 */
export class EntraIdOAuthClient implements OAuthClient {
    readonly name = 'entra';
    private readonly _msalClient: MsalCodeClient;
    private readonly _graphClientFactory: GraphClientFactory;

    constructor(private readonly _settings: EntraSettings, dependencies: EntraIdClientDependencies = {}) {
        this._msalClient = dependencies.msalClient ?? new ConfidentialClientApplication({
            auth: {
                clientId: _settings.clientId,
                clientSecret: _settings.clientSecret,
                authority: `https://login.microsoftonline.com/${_settings.tenantId}`
            }
        });
        this._graphClientFactory = dependencies.graphClientFactory ?? defaultGraphClientFactory;
    }

    async getAuthUrl(request: AuthUrlRequest): Promise<AuthUrlResult> {
        const pkce = generatePkce();

        const url = await this._msalClient.getAuthCodeUrl({
            scopes: this._scopes(request.scopes),
            redirectUri: this._settings.redirectUri,
            codeChallenge: pkce.challenge,
            codeChallengeMethod: 'S256',
            state: request.state,
            prompt: 'select_account'
        });

        return { url, codeVerifier: pkce.verifier };
    }

    async exchangeCodeForToken(code: string, codeVerifier: string, scopes?: string[]): Promise<TokenResponse> {
        let result: MsalTokenResult | null;
        try {
            result = await this._msalClient.acquireTokenByCode({
                code: code,
                codeVerifier: codeVerifier,
                redirectUri: this._settings.redirectUri,
                scopes: this._scopes(scopes)
            });
        } catch (error) {
            if (error instanceof AuthError) {
                throw new OAuthError(error.errorCode, error.errorMessage || error.message);
            }
            throw error;
        }

        if (!result || !result.accessToken) {
            throw new OAuthError('invalid_token_response', 'Entra ID returned no access token');
        }

        const token: TokenResponse = {
            access_token: result.accessToken,
            token_type: result.tokenType || 'Bearer',
            scope: result.scopes.join(' '),
        };
        if (result.expiresOn) {
            token.expires_in = Math.max(0, Math.floor((result.expiresOn.getTime() - Date.now()) / 1000));
        }
        if (result.idToken) {
            token.id_token = result.idToken;
        }

        logger.info('Entra ID token exchange succeeded', { scopes: result.scopes });
        return token;
    }

    async getUserInfo(accessToken: string): Promise<UserInfo> {
        const user = await this._graph(() => this._graphClientFactory(accessToken)
            .api('/me')
            .select('displayName,mail,userPrincipalName')
            .get());

        if (!isUserInfo(user)) {
            throw new OAuthError('invalid_userinfo_response', 'Microsoft Graph returned an invalid user');
        }
        return user;
    }

    async revokeToken(accessToken: string): Promise<void> {
        // Graph has no single-token revocation; this invalidates the user's refresh tokens and sessions
        await this._graph(() => this._graphClientFactory(accessToken)
            .api('/me/revokeSignInSessions')
            .post({}));
    }

    private _scopes(requested?: string[]): string[] {
        return requested && requested.length > 0 ? requested : DEFAULT_SCOPES;
    }

    private async _graph<T>(call: () => Promise<T>): Promise<T> {
        try {
            return await call();
        } catch (error) {
            if (error instanceof GraphError && [400, 401, 403].includes(error.statusCode)) {
                throw new OAuthError(error.code || `http_${error.statusCode}`, error.message);
            }
            throw error;
        }
    }
}
