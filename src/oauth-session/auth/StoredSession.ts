export interface StoredSession {
  /** Serialized express-session data, tokens included. */
  data: string;
  expiresAt?: number;
}
