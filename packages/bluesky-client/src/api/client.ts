/**
 * Bluesky XRPC Client
 *
 * Stateless request layer for the three exchanges skypost needs:
 * create a session, refresh it, and create a post record.
 * Every call is a single HTTPS request; nothing is retried or cached.
 */

import type { ZodType } from 'zod';
import {
  createRecordResponseSchema,
  createSessionResponseSchema,
  refreshSessionResponseSchema,
} from './schemas.js';
import {
  DEFAULT_SERVICE_URL,
  POST_COLLECTION,
  fail,
  ok,
  type ClientFailure,
  type CreateRecordResponse,
  type CreateSessionResponse,
  type Credentials,
  type PostRecord,
  type RefreshSessionResponse,
  type Result,
} from '../types.js';

export interface SessionClientConfig {
  serviceUrl?: string;
  timeout?: number;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

export type ClientResult<T> = Result<T, ClientFailure>;

export class SessionClient {
  private baseUrl: string;
  private timeout: number;

  constructor(config: SessionClientConfig = {}) {
    this.baseUrl = (config.serviceUrl || DEFAULT_SERVICE_URL).replace(/\/+$/, '');
    this.timeout = config.timeout || 30000;
  }

  private async request<T>(
    nsid: string,
    schema: ZodType<T>,
    init: { body?: Record<string, unknown>; bearer?: string },
    options: RequestOptions = {}
  ): Promise<ClientResult<T>> {
    const headers: Record<string, string> = {};
    if (init.body) {
      headers['Content-Type'] = 'application/json';
    }
    if (init.bearer) {
      headers['Authorization'] = `Bearer ${init.bearer}`;
    }

    const deadline = AbortSignal.timeout(this.timeout);
    const signal = options.signal ? AbortSignal.any([deadline, options.signal]) : deadline;

    let status: number;
    let text: string;
    try {
      const response = await fetch(`${this.baseUrl}/xrpc/${nsid}`, {
        method: 'POST',
        headers,
        body: init.body ? JSON.stringify(init.body) : undefined,
        signal,
      });
      status = response.status;
      text = await response.text();
    } catch (error) {
      return fail<ClientFailure>({
        reason: 'network',
        status: 0,
        body: error instanceof Error ? error.message : String(error),
      });
    }

    if (status < 200 || status >= 300) {
      return fail<ClientFailure>({ reason: 'http', status, body: text });
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      return fail<ClientFailure>({ reason: 'malformed', status, body: text });
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      return fail<ClientFailure>({ reason: 'malformed', status, body: text });
    }
    return ok(parsed.data);
  }

  // === SESSIONS ===

  async createSession(
    credentials: Credentials,
    options?: RequestOptions
  ): Promise<ClientResult<CreateSessionResponse>> {
    return this.request(
      'com.atproto.server.createSession',
      createSessionResponseSchema,
      { body: { identifier: credentials.identifier, password: credentials.secret } },
      options
    );
  }

  async refreshSession(
    refreshToken: string,
    options?: RequestOptions
  ): Promise<ClientResult<RefreshSessionResponse>> {
    return this.request(
      'com.atproto.server.refreshSession',
      refreshSessionResponseSchema,
      { bearer: refreshToken },
      options
    );
  }

  // === RECORDS ===

  async createRecord(
    subjectId: string,
    accessToken: string,
    record: PostRecord,
    options?: RequestOptions
  ): Promise<ClientResult<CreateRecordResponse>> {
    return this.request(
      'com.atproto.repo.createRecord',
      createRecordResponseSchema,
      {
        body: { repo: subjectId, collection: POST_COLLECTION, record: { ...record } },
        bearer: accessToken,
      },
      options
    );
  }
}

export function createSessionClient(serviceUrl?: string, timeout?: number): SessionClient {
  return new SessionClient({ serviceUrl, timeout });
}
