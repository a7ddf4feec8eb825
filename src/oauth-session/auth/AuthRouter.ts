import express, { NextFunction, Request, RequestHandler, Response, Router } from "express";
import * as crypto from 'crypto';
import { HttpError } from "../HttpError.js";
import { logger, redact } from "../Logger.js";
import { errorMessage, OAuthClient, OAuthError, TokenResponse, UserInfo } from "./OAuthClient.js";
import { PkceStore } from "./PkceStore.js";
import "./SessionData.js";

export const SESSION_COOKIE = 'session_id';

export type AuthRouterOptions = {
    oauthClient: OAuthClient;
    pkceStore: PkceStore;
    /** Where the browser lands after a successful login. */
    frontendUrl: string;
};

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

function route(handler: AsyncHandler): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
        handler(req, res).catch(next);
    };
}

function queryParam(req: Request, name: string): string | undefined {
    const value = req.query[name];
    return typeof value === 'string' && value !== '' ? value : undefined;
}

function parseScopes(raw: string | undefined): string[] | undefined {
    const scopes = raw?.split(/\s+/).filter(scope => scope !== '') ?? [];
    return scopes.length > 0 ? scopes : undefined;
}

function regenerateSession(req: Request): Promise<void> {
    return new Promise((resolve, reject) => {
        req.session.regenerate(err => err ? reject(err) : resolve());
    });
}

function saveSession(req: Request): Promise<void> {
    return new Promise((resolve, reject) => {
        req.session.save(err => err ? reject(err) : resolve());
    });
}

function destroySession(req: Request): Promise<void> {
    return new Promise((resolve, reject) => {
        req.session.destroy(err => err ? reject(err) : resolve());
    });
}

function hasSessionCookie(req: Request): boolean {
    return (req.headers.cookie ?? '')
        .split(';')
        .some(pair => pair.trim().startsWith(`${SESSION_COOKIE}=`));
}

/**
 * Tokens of the current session. Without a session cookie the caller gets
 * 401 "No session"; a cookie whose session holds no tokens (expired, revoked,
 * forged) gets `noToken`.
 */
function requireToken(req: Request, noToken: HttpError): TokenResponse {
    if (!hasSessionCookie(req)) {
        throw new HttpError(401, "No session");
    }
    const { token } = req.session;
    if (!token) {
        throw noToken;
    }
    return token;
}

export function loggedInRedirect(frontendUrl: string): string {
    return `${frontendUrl.replace(/\/+$/, '')}/?logged_in=1`;
}

export function authRouter(options: AuthRouterOptions): Router {
    const { oauthClient, pkceStore } = options;
    const router = express.Router();

    router.get("/login", route(async (req, res) => {
        // 16 random bytes for CSRF protection
        const state = crypto.randomBytes(16).toString('base64url');
        const scopes = parseScopes(queryParam(req, 'scopes'));

        const auth = await oauthClient.getAuthUrl({ state, scopes });
        if (!auth.codeVerifier) {
            throw new HttpError(500, "PKCE code verifier not generated");
        }

        pkceStore.save(state, auth.codeVerifier, scopes);
        logger.info(`Login started with ${oauthClient.name}`, { state: redact(state), scopes });

        res.redirect(auth.url);
    }));

    router.get("/callback", route(async (req, res) => {
        const error = queryParam(req, 'error');
        if (error) {
            logger.warn(`Authorization server returned an error: ${error}`);
            throw new HttpError(400, {
                error,
                error_description: queryParam(req, 'error_description') ?? null
            });
        }

        const code = queryParam(req, 'code');
        const state = queryParam(req, 'state');
        if (!code || !state) {
            throw new HttpError(400, "Missing code or state in callback");
        }

        const pending = pkceStore.take(state);
        if (!pending) {
            throw new HttpError(400, "Unknown or expired state (PKCE code verifier missing)");
        }

        let token: TokenResponse;
        try {
            token = await oauthClient.exchangeCodeForToken(code, pending.codeVerifier, pending.scopes);
        } catch (err) {
            if (err instanceof OAuthError) {
                throw new HttpError(400, { oauth_error: err.code, message: err.message });
            }
            logger.error("Token exchange failed", { error: errorMessage(err) });
            throw new HttpError(500, `Token exchange failed: ${errorMessage(err)}`);
        }

        // New session id on login so a pre-existing cookie cannot be fixated
        await regenerateSession(req);
        req.session.token = token;
        req.session.provider = oauthClient.name;
        req.session.createdAt = Date.now();
        await saveSession(req);

        logger.info(`Session created: ${redact(req.sessionID)}`);

        res.redirect(loggedInRedirect(options.frontendUrl));
    }));

    router.get("/me", route(async (req, res) => {
        const token = requireToken(req, new HttpError(401, "No tokens found for session"));

        let userInfo: UserInfo;
        try {
            userInfo = await oauthClient.getUserInfo(token.access_token);
        } catch (err) {
            if (err instanceof OAuthError) {
                throw new HttpError(401, { oauth_error: err.code, message: err.message });
            }
            logger.error("Failed to fetch user info", { error: errorMessage(err) });
            throw new HttpError(500, `Failed to fetch user info: ${errorMessage(err)}`);
        }

        res.json(userInfo);
    }));

    // Debug only: exposes the raw tokens of the current session
    router.get("/tokens", route(async (req, res) => {
        const token = requireToken(req, new HttpError(404, "No token for session"));
        res.json(token);
    }));

    router.post("/revoke", route(async (req, res) => {
        const token = requireToken(req, new HttpError(400, "No token to revoke"));
        const sessionId = req.sessionID;

        let body: Record<string, unknown>;
        try {
            await oauthClient.revokeToken(token.access_token);
            body = { revoked: true };
        } catch (err) {
            logger.warn(`Token revocation failed for session ${redact(sessionId)}`, { error: errorMessage(err) });
            body = err instanceof OAuthError
                ? { revoked: false, error: err.code, message: err.message }
                : { revoked: false, message: errorMessage(err) };
        }

        // The local session goes away whatever the authorization server said
        await destroySession(req);
        res.clearCookie(SESSION_COOKIE, { path: '/' });
        logger.info(`Session revoked: ${redact(sessionId)}`);

        res.json(body);
    }));

    return router;
}
