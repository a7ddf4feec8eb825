import { v4 as uuidv4 } from 'uuid';
import * as crypto from 'crypto';

export interface PkcePair {
    verifier: string;
    challenge: string;
}

export function challengeFromVerifier(verifier: string): string {
    return crypto.createHash('sha256')
        .update(verifier)
        .digest('base64')
        .replace(/\+/g, '-')
        .replace(/\//g, '_')
        .replace(/=/g, '');
}

export function generatePkce(): PkcePair {
    // 108 chars, inside the 43-128 range allowed for a code verifier
    const verifier = uuidv4() + uuidv4() + uuidv4();
    return { verifier, challenge: challengeFromVerifier(verifier) };
}
