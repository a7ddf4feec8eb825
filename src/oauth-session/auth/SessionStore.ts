import { SessionData, Store } from 'express-session';
import { logger, redact } from '../Logger.js';
import { StoredSession } from './StoredSession.js';
import './SessionData.js';

function expiryOf(session: SessionData): number | undefined {
    const expires = session.cookie?.expires;
    return expires ? new Date(expires).getTime() : undefined;
}

/**
 * Process-wide in-memory session store plugged into express-session.
 * Nothing is persisted: sessions are gone on restart.
 */
export class SessionStore extends Store {
    private _sessions: Map<string, StoredSession> = new Map();

    get(sid: string, callback: (err: unknown, session?: SessionData | null) => void): void {
        const stored = this._sessions.get(sid);

        if (!stored) {
            callback(null, null);
            return;
        }

        if (stored.expiresAt !== undefined && stored.expiresAt <= Date.now()) {
            this._sessions.delete(sid);
            callback(null, null);
            return;
        }

        const session: SessionData = JSON.parse(stored.data);
        callback(null, session);
    }

    set(sid: string, session: SessionData, callback?: (err?: unknown) => void): void {
        this._sessions.set(sid, {
            data: JSON.stringify(session),
            expiresAt: expiryOf(session),
        });
        logger.debug(`Session stored: ${redact(sid)}`);
        callback?.();
    }

    destroy(sid: string, callback?: (err?: unknown) => void): void {
        if (this._sessions.delete(sid)) {
            logger.debug(`Session destroyed: ${redact(sid)}`);
        }
        callback?.();
    }

    touch(sid: string, session: SessionData, callback?: () => void): void {
        const stored = this._sessions.get(sid);
        if (stored) {
            stored.expiresAt = expiryOf(session);
        }
        callback?.();
    }

    clear(callback?: (err?: unknown) => void): void {
        this._sessions.clear();
        callback?.();
    }

    cleanExpired(): number {
        const now = Date.now();
        let removed = 0;
        for (const [sid, stored] of this._sessions.entries()) {
            if (stored.expiresAt !== undefined && stored.expiresAt <= now) {
                this._sessions.delete(sid);
                removed++;
            }
        }
        return removed;
    }

    get size(): number {
        return this._sessions.size;
    }
}
