/**
 * Publisher
 *
 * Validates and submits a post. A 401 triggers one refresh through the
 * SessionManager and one retry of the submission; anything else is
 * returned to the caller as-is.
 */

import type { SessionClient } from '../api/client.js';
import type { AuthResult } from '../session/session-manager.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { countCharacters } from '../utils/index.js';
import {
  MAX_POST_LENGTH,
  POST_COLLECTION,
  fail,
  ok,
  type PostError,
  type PostRecord,
  type PostResult,
  type Result,
  type Session,
} from '../types.js';

/** Retries allowed after a successful refresh. */
const MAX_AUTH_RETRIES = 1;

export type RecordWriter = Pick<SessionClient, 'createRecord'>;

export interface SessionRefresher {
  refresh(stale?: Session): Promise<AuthResult>;
  markExpired(): void;
}

export interface PublisherOptions {
  client: RecordWriter;
  sessions: SessionRefresher;
  maxLength?: number;
  now?: () => Date;
  logger?: Logger;
}

export type PublishResult = Result<PostResult, PostError>;

/**
 * Check a message against the length limit without any I/O.
 */
export function validateMessage(message: string, limit: number = MAX_POST_LENGTH): PostError | null {
  const length = countCharacters(message);
  if (length > limit) {
    return { kind: 'TooLong', length, limit, excess: length - limit };
  }
  return null;
}

export class Publisher {
  private client: RecordWriter;
  private sessions: SessionRefresher;
  private maxLength: number;
  private now: () => Date;
  private logger: Logger;

  constructor(options: PublisherOptions) {
    this.client = options.client;
    this.sessions = options.sessions;
    this.maxLength = options.maxLength ?? MAX_POST_LENGTH;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? createLogger('publisher');
  }

  async post(message: string, session: Session): Promise<PublishResult> {
    const invalid = validateMessage(message, this.maxLength);
    if (invalid) {
      return fail(invalid);
    }

    const record: PostRecord = {
      $type: POST_COLLECTION,
      text: message,
      createdAt: this.now().toISOString(),
    };

    let current = session;
    for (let attempt = 0; ; attempt++) {
      this.logger.debug(`Submitting post (attempt ${attempt + 1})`);
      const response = await this.client.createRecord(current.subjectId, current.accessToken, record);

      if (response.success) {
        return ok({ uri: response.data.uri, cid: response.data.cid, createdAt: record.createdAt });
      }

      const { status, body } = response.error;
      if (status !== 401 || attempt >= MAX_AUTH_RETRIES) {
        return fail<PostError>({ kind: 'RemoteRejected', status, body });
      }

      this.sessions.markExpired();
      const refreshed = await this.sessions.refresh(current);
      if (!refreshed.success) {
        return fail<PostError>({ kind: 'AuthExpired', cause: refreshed.error });
      }
      current = refreshed.data;
    }
  }
}
