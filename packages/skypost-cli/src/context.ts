/**
 * Wires config, store, client, session manager and publisher for one run.
 */

import {
  FileCredentialStore,
  Publisher,
  SessionClient,
  SessionManager,
  createLogger,
  type CredentialStore,
  type CredentialsProvider,
  type SkypostConfig,
} from '@skypost/bluesky-client';

export interface CliContext {
  config: SkypostConfig;
  store: CredentialStore;
  sessions: SessionManager;
  publisher: Publisher;
}

export interface ContextOverrides {
  store?: CredentialStore;
  client?: SessionClient;
  credentials?: CredentialsProvider;
}

export function createContext(config: SkypostConfig, overrides: ContextOverrides = {}): CliContext {
  const client = overrides.client ?? new SessionClient({ serviceUrl: config.serviceUrl, timeout: config.timeoutMs });
  const store = overrides.store ?? new FileCredentialStore(config.sessionFile);
  const sessions = new SessionManager({
    client,
    store,
    credentials: overrides.credentials,
    logger: createLogger('session', config.logLevel),
  });
  const publisher = new Publisher({
    client,
    sessions,
    logger: createLogger('publisher', config.logLevel),
  });

  return { config, store, sessions, publisher };
}
