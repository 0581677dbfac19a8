/**
 * Bluesky Client
 *
 * Session lifecycle and post publishing for skypost:
 * - SessionClient: stateless XRPC exchanges
 * - CredentialStore: persisted session record
 * - SessionManager: reuse / log in / refresh decisions
 * - Publisher: validated posts with one refresh-and-retry on 401
 *
 * @example
 * ```typescript
 * import { SessionClient, SessionManager, Publisher, FileCredentialStore } from '@skypost/bluesky-client';
 *
 * const client = new SessionClient();
 * const sessions = new SessionManager({ client, store: new FileCredentialStore(path) });
 * const session = await sessions.ensureSession();
 * if (session.success) {
 *   await new Publisher({ client, sessions }).post('hello', session.data);
 * }
 * ```
 */

export { SessionClient, createSessionClient, type SessionClientConfig, type RequestOptions, type ClientResult } from './api/client.js';
export {
  FileCredentialStore,
  MemoryCredentialStore,
  CredentialStoreError,
  type CredentialStore,
} from './session/credential-store.js';
export {
  SessionManager,
  type SessionManagerOptions,
  type SessionExchange,
  type AuthResult,
} from './session/session-manager.js';
export {
  Publisher,
  validateMessage,
  type PublisherOptions,
  type PublishResult,
  type RecordWriter,
  type SessionRefresher,
} from './publisher/publisher.js';
export { describeAuthError, describePostError } from './errors.js';
export {
  loadConfigFromEnv,
  validateConfig,
  DEFAULT_CONFIG,
  SESSION_FILE_NAME,
  type SkypostConfig,
} from './utils/config.js';
export { createLogger, isLogLevel, LOG_LEVELS, type Logger, type LogLevel } from './utils/logger.js';
export { countCharacters, normalizeIdentifier, formatHandle, truncate } from './utils/index.js';
export * from './types.js';
