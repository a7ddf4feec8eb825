import 'express-session';
import { TokenResponse } from "./OAuthClient.js";

/**
 * A login that has been sent to the authorization server and not yet come back.
 */
export interface PendingLogin {
    state: string;
    codeVerifier: string;
    scopes?: string[];
    expiresAt: number;
}

declare module 'express-session' {
    interface SessionData {
        token?: TokenResponse;
        provider?: string;
        createdAt?: number;
    }
}
