/**
 * Bluesky Client Types
 *
 * Shared shapes for sessions, credentials, posts and the typed
 * results every operation returns.
 */

/** Maximum post length, in Unicode code points. */
export const MAX_POST_LENGTH = 300;

export const POST_COLLECTION = 'app.bsky.feed.post';

export const DEFAULT_SERVICE_URL = 'https://bsky.social';

/**
 * An authenticated identity. Both tokens are always non-empty:
 * an unauthenticated user has no Session at all.
 */
export interface Session {
  accessToken: string;
  refreshToken: string;
  handle: string;
  /** Account DID, used as the repo that owns created records. */
  subjectId: string;
}

export interface Credentials {
  identifier: string;
  secret: string;
}

export type CredentialsProvider = () => Promise<Credentials | null>;

export type SessionState = 'unauthenticated' | 'authenticated' | 'expired';

export interface PostRecord {
  $type: typeof POST_COLLECTION;
  text: string;
  createdAt: string;
}

export interface PostResult {
  uri: string;
  cid: string;
  createdAt: string;
}

export type Result<T, E> =
  | { success: true; data: T }
  | { success: false; error: E };

export function ok<T>(data: T): { success: true; data: T } {
  return { success: true, data };
}

export function fail<E>(error: E): { success: false; error: E } {
  return { success: false, error };
}

// === WIRE PAYLOADS ===

export interface CreateSessionResponse {
  accessJwt: string;
  refreshJwt: string;
  did: string;
  handle?: string;
}

export interface RefreshSessionResponse {
  accessJwt: string;
  refreshJwt: string;
  did?: string;
  handle?: string;
}

export interface CreateRecordResponse {
  uri: string;
  cid: string;
}

/**
 * A request that did not produce a usable payload.
 * `network` failures carry status 0 and the thrown message as body.
 */
export interface ClientFailure {
  reason: 'http' | 'network' | 'malformed';
  status: number;
  body: string;
}

// === ERRORS ===

export type AuthError =
  | { kind: 'MissingCredentials'; message: string }
  | { kind: 'RemoteRejected'; status: number; body: string }
  | { kind: 'RefreshFailed'; reason: string; status?: number; body?: string }
  | { kind: 'StoreFailed'; message: string };

export type PostError =
  | { kind: 'TooLong'; length: number; limit: number; excess: number }
  | { kind: 'AuthExpired'; cause: AuthError }
  | { kind: 'RemoteRejected'; status: number; body: string };
