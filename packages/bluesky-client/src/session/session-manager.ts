/**
 * Session Manager
 *
 * Owns the in-memory Session and decides whether to reuse it, create a
 * new one from credentials, or refresh it. Expiry is only ever learned
 * from the service rejecting a request; nothing here inspects token
 * lifetimes.
 *
 * State: unauthenticated -> authenticated -> expired -> authenticated
 * (refresh) or unauthenticated (refresh failed).
 */

import type { SessionClient } from '../api/client.js';
import type { CredentialStore } from './credential-store.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { formatHandle, normalizeIdentifier } from '../utils/index.js';
import {
  fail,
  ok,
  type AuthError,
  type Credentials,
  type CredentialsProvider,
  type Result,
  type Session,
  type SessionState,
} from '../types.js';

export type SessionExchange = Pick<SessionClient, 'createSession' | 'refreshSession'>;

export interface SessionManagerOptions {
  client: SessionExchange;
  store: CredentialStore;
  /** Asked for credentials when there is no usable session. */
  credentials?: CredentialsProvider;
  logger?: Logger;
}

export type AuthResult = Result<Session, AuthError>;

function describeCause(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class SessionManager {
  private client: SessionExchange;
  private store: CredentialStore;
  private credentials?: CredentialsProvider;
  private logger: Logger;

  private session: Session | null = null;
  private state: SessionState = 'unauthenticated';
  private refreshing: Promise<AuthResult> | null = null;
  /** Set once a refresh fails: the stored session is known to be dead. */
  private storeInvalidated = false;

  constructor(options: SessionManagerOptions) {
    this.client = options.client;
    this.store = options.store;
    this.credentials = options.credentials;
    this.logger = options.logger ?? createLogger('session');
  }

  getSession(): Session | null {
    return this.session ? { ...this.session } : null;
  }

  getState(): SessionState {
    return this.state;
  }

  /**
   * Record that the service rejected the current access token.
   */
  markExpired(): void {
    if (this.state === 'authenticated') {
      this.state = 'expired';
    }
  }

  /**
   * Return a usable session: the one in memory, else the stored one,
   * else a fresh one from the credentials provider.
   */
  async ensureSession(): Promise<AuthResult> {
    if (this.session) {
      return ok({ ...this.session });
    }

    if (!this.storeInvalidated) {
      const stored = await this.loadStored();
      if (!stored.success) return stored;
      if (stored.data) {
        return ok({ ...stored.data });
      }
    }

    if (!this.credentials) {
      return fail<AuthError>({ kind: 'MissingCredentials', message: 'No stored session and no way to ask for credentials' });
    }

    let provided: Credentials | null;
    try {
      provided = await this.credentials();
    } catch (error) {
      return fail<AuthError>({ kind: 'MissingCredentials', message: `Could not read credentials: ${describeCause(error)}` });
    }

    if (!provided || !normalizeIdentifier(provided.identifier) || !provided.secret) {
      return fail<AuthError>({ kind: 'MissingCredentials', message: 'A handle and password are required to log in' });
    }

    return this.authenticate(provided.identifier, provided.secret);
  }

  /**
   * Exchange a handle and password for a new session and persist it.
   * A rejected exchange leaves the store untouched.
   */
  async authenticate(identifier: string, secret: string): Promise<AuthResult> {
    const normalized = normalizeIdentifier(identifier);
    this.logger.info(`Logging in as ${formatHandle(normalized)}...`);

    const response = await this.client.createSession({ identifier: normalized, secret });
    if (!response.success) {
      const { status, body } = response.error;
      this.logger.debug(`createSession failed with status ${status}`);
      return fail<AuthError>({ kind: 'RemoteRejected', status, body });
    }

    const session: Session = {
      accessToken: response.data.accessJwt,
      refreshToken: response.data.refreshJwt,
      handle: response.data.handle || normalized,
      subjectId: response.data.did,
    };

    await this.adopt(session);
    this.logger.info(`Logged in as ${formatHandle(session.handle)}`);
    return ok({ ...session });
  }

  /**
   * Mint a new token pair from the refresh token. Only one refresh runs
   * at a time; concurrent callers share its result. Passing the session
   * that was rejected lets a caller skip the exchange when another caller
   * has already rotated the tokens.
   */
  async refresh(stale?: Session): Promise<AuthResult> {
    if (this.refreshing) {
      return this.refreshing;
    }

    this.refreshing = this.runRefresh(stale);
    try {
      return await this.refreshing;
    } finally {
      this.refreshing = null;
    }
  }

  private async runRefresh(stale?: Session): Promise<AuthResult> {
    let current = this.session;
    if (!current && !this.storeInvalidated) {
      const stored = await this.loadStored();
      if (!stored.success) return stored;
      current = stored.data;
    }

    if (!current) {
      return fail<AuthError>({ kind: 'RefreshFailed', reason: 'No session to refresh' });
    }

    if (stale && current.accessToken !== stale.accessToken) {
      this.logger.debug('Session was already refreshed, reusing it');
      return ok({ ...current });
    }

    if (!current.refreshToken) {
      return this.invalidate({ kind: 'RefreshFailed', reason: 'Session has no refresh token' });
    }

    this.logger.info('Access token expired. Refreshing session...');
    const response = await this.client.refreshSession(current.refreshToken);
    if (!response.success) {
      const { status, body, reason } = response.error;
      return this.invalidate({
        kind: 'RefreshFailed',
        reason: reason === 'network' ? 'Refresh request failed' : 'Refresh was rejected',
        status,
        body,
      });
    }

    const refreshed: Session = {
      ...current,
      accessToken: response.data.accessJwt,
      refreshToken: response.data.refreshJwt,
    };

    await this.adopt(refreshed);
    this.logger.info('Session refreshed');
    return ok({ ...refreshed });
  }

  private async loadStored(): Promise<Result<Session | null, AuthError>> {
    let stored: Session | null;
    try {
      stored = await this.store.load();
    } catch (error) {
      return fail<AuthError>({ kind: 'StoreFailed', message: describeCause(error) });
    }

    if (stored) {
      this.session = stored;
      this.state = 'authenticated';
      this.logger.debug(`Loaded stored session for ${formatHandle(stored.handle)}`);
    }
    return ok(stored);
  }

  private async adopt(session: Session): Promise<void> {
    this.session = session;
    this.state = 'authenticated';
    this.storeInvalidated = false;
    try {
      await this.store.save(session);
    } catch (error) {
      // The session stays usable for this run; the next run will log in again.
      this.logger.warn(`Could not save session: ${describeCause(error)}`);
    }
  }

  private invalidate(error: AuthError): AuthResult {
    this.session = null;
    this.state = 'unauthenticated';
    this.storeInvalidated = true;
    this.logger.warn('Session could not be refreshed; log in again');
    return fail(error);
  }
}
