import { logger, redact } from '../Logger.js';
import { PendingLogin } from './SessionData.js';

/**
 * Ephemeral state -> code_verifier mapping for logins in flight.
 * Entries are read once: the callback takes them out of the store.
 */
export class PkceStore {
    private _pending: Map<string, PendingLogin> = new Map();

    constructor(private readonly _ttlMs: number = 10 * 60 * 1000) {}

    /**
     * Registers a pending login. A state can only be outstanding once.
     */
    save(state: string, codeVerifier: string, scopes?: string[]): PendingLogin {
        if (!state) {
            throw new Error("Cannot store PKCE verifier: state parameter is missing");
        }
        if (this._pending.has(state)) {
            throw new Error("Cannot store PKCE verifier: state is already in use");
        }

        const entry: PendingLogin = {
            state,
            codeVerifier,
            scopes,
            expiresAt: Date.now() + this._ttlMs,
        };
        this._pending.set(state, entry);
        logger.debug(`PKCE verifier stored for state: ${redact(state)}`);

        return entry;
    }

    /**
     * Removes and returns the pending login for a state, or undefined when the
     * state is unknown, already used or expired.
     */
    take(state: string): PendingLogin | undefined {
        const entry = this._pending.get(state);
        if (!entry) {
            return undefined;
        }

        this._pending.delete(state);

        if (entry.expiresAt <= Date.now()) {
            logger.warn(`PKCE verifier expired for state: ${redact(state)}`);
            return undefined;
        }

        return entry;
    }

    cleanExpired(): number {
        const now = Date.now();
        let removed = 0;
        for (const [state, entry] of this._pending.entries()) {
            if (entry.expiresAt <= now) {
                this._pending.delete(state);
                removed++;
            }
        }
        return removed;
    }

    get size(): number {
        return this._pending.size;
    }
}
