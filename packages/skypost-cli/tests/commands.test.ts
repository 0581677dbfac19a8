/**
 * CLI command tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { MemoryCredentialStore, loadConfigFromEnv, type Session } from '@skypost/bluesky-client';
import { createContext, type CliContext } from '../src/context.js';
import { login, logout, postMessage, showStatus } from '../src/commands/index.js';

function createMockSession(overrides: Partial<Session> = {}): Session {
  return {
    accessToken: 'access-1',
    refreshToken: 'refresh-1',
    handle: 'alice.test',
    subjectId: 'did:plc:alice',
    ...overrides,
  };
}

function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), { status });
}

const config = loadConfigFromEnv({
  SKYPOST_CONFIG_DIR: path.join(os.tmpdir(), 'skypost-cli-test'),
  LOG_LEVEL: 'silent',
});

function spyConsole() {
  return {
    log: vi.spyOn(console, 'log').mockImplementation(() => {}),
    error: vi.spyOn(console, 'error').mockImplementation(() => {}),
  };
}

const postCreated = () => jsonResponse(200, { uri: 'at://did:plc:alice/app.bsky.feed.post/3kabc', cid: 'bafyrei-test' });
const tokenExpired = () => jsonResponse(401, { error: 'ExpiredToken' });

describe('CLI commands', () => {
  let store: MemoryCredentialStore;
  let ctx: CliContext;
  let mockFetch: ReturnType<typeof vi.fn>;
  let consoleSpy: ReturnType<typeof spyConsole>;

  beforeEach(() => {
    store = new MemoryCredentialStore(createMockSession());
    ctx = createContext(config, { store });
    mockFetch = vi.fn();
    vi.stubGlobal('fetch', mockFetch);
    consoleSpy = spyConsole();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  describe('post', () => {
    it('joins the words and prints the record URI', async () => {
      mockFetch.mockResolvedValueOnce(postCreated());

      const code = await postMessage(ctx, ['hello', 'world'], {});

      expect(code).toBe(0);
      expect(mockFetch).toHaveBeenCalledTimes(1);
      const body = JSON.parse(mockFetch.mock.calls[0][1].body);
      expect(body.repo).toBe('did:plc:alice');
      expect(body.record.text).toBe('hello world');
      expect(consoleSpy.log).toHaveBeenCalledWith('   URI: at://did:plc:alice/app.bsky.feed.post/3kabc');
    });

    it('reads the message from a file', async () => {
      const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'skypost-post-'));
      const file = path.join(dir, 'note.txt');
      await fs.writeFile(file, '  from a file \n');
      mockFetch.mockResolvedValueOnce(postCreated());

      const code = await postMessage(ctx, [], { file });

      expect(code).toBe(0);
      expect(JSON.parse(mockFetch.mock.calls[0][1].body).record.text).toBe('from a file');
      await fs.rm(dir, { recursive: true, force: true });
    });

    it('fails without a message', async () => {
      const code = await postMessage(ctx, [], {});

      expect(code).toBe(1);
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it('fails on a whitespace-only message', async () => {
      const code = await postMessage(ctx, ['  ', ''], {});

      expect(code).toBe(1);
      expect(mockFetch).not.toHaveBeenCalled();
      expect(consoleSpy.error).toHaveBeenCalledWith('❌ Please provide a message, e.g. skypost post "hello"');
    });

    it('rejects a long message before any request', async () => {
      const code = await postMessage(ctx, ['a'.repeat(301)], {});

      expect(code).toBe(1);
      expect(mockFetch).not.toHaveBeenCalled();
      expect(consoleSpy.error).toHaveBeenCalledWith('❌ Message is 301 characters, 1 over the 300 limit');
    });

    it('asks for a login when there is no session', async () => {
      const empty = createContext(config, { store: new MemoryCredentialStore() });

      const code = await postMessage(empty, ['hello'], {});

      expect(code).toBe(1);
      expect(consoleSpy.error).toHaveBeenCalledWith('❌ Missing credentials: No stored session and no way to ask for credentials');
      expect(consoleSpy.error).toHaveBeenCalledWith("   Run 'skypost login' first.");
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it('logs in through the credentials provider on first use', async () => {
      const fresh = new MemoryCredentialStore();
      const firstRun = createContext(config, {
        store: fresh,
        credentials: async () => ({ identifier: 'alice.test', secret: 'test-secret' }),
      });
      mockFetch
        .mockResolvedValueOnce(jsonResponse(200, {
          accessJwt: 'access-1',
          refreshJwt: 'refresh-1',
          did: 'did:plc:alice',
          handle: 'alice.test',
        }))
        .mockResolvedValueOnce(postCreated());

      const code = await postMessage(firstRun, ['hello'], {});

      expect(code).toBe(0);
      expect(mockFetch.mock.calls[0][0]).toBe('https://bsky.social/xrpc/com.atproto.server.createSession');
      expect(await fresh.load()).toEqual(createMockSession());
    });

    it('recovers from an expired access token', async () => {
      mockFetch
        .mockResolvedValueOnce(tokenExpired())
        .mockResolvedValueOnce(jsonResponse(200, { accessJwt: 'access-2', refreshJwt: 'refresh-2' }))
        .mockResolvedValueOnce(postCreated());

      const code = await postMessage(ctx, ['hello'], {});

      expect(code).toBe(0);
      expect(mockFetch).toHaveBeenCalledTimes(3);
      expect(mockFetch.mock.calls[1][0]).toBe('https://bsky.social/xrpc/com.atproto.server.refreshSession');
      expect(mockFetch.mock.calls[2][1].headers).toEqual({
        'Content-Type': 'application/json',
        Authorization: 'Bearer access-2',
      });
      expect(await store.load()).toEqual(createMockSession({ accessToken: 'access-2', refreshToken: 'refresh-2' }));
    });

    it('tells the user to log in when the refresh is rejected', async () => {
      mockFetch
        .mockResolvedValueOnce(tokenExpired())
        .mockResolvedValueOnce(new Response('{"error":"ExpiredToken"}', { status: 400 }));

      const code = await postMessage(ctx, ['hello'], {});

      expect(code).toBe(1);
      expect(mockFetch).toHaveBeenCalledTimes(2);
      expect(consoleSpy.error).toHaveBeenCalledWith("   Run 'skypost login' to sign in again.");
      expect(await store.load()).toEqual(createMockSession());
    });
  });

  describe('login', () => {
    it('saves the new session', async () => {
      const fresh = new MemoryCredentialStore();
      const loginCtx = createContext(config, { store: fresh });
      mockFetch.mockResolvedValueOnce(jsonResponse(200, {
        accessJwt: 'access-9',
        refreshJwt: 'refresh-9',
        did: 'did:plc:alice',
        handle: 'alice.bsky.social',
      }));

      const code = await login(loginCtx, {}, async () => ({ identifier: 'alice.test', secret: 'test-secret' }));

      expect(code).toBe(0);
      expect(consoleSpy.log).toHaveBeenCalledWith('✅ Logged in as @alice.bsky.social');
      expect(await fresh.load()).toEqual({
        accessToken: 'access-9',
        refreshToken: 'refresh-9',
        handle: 'alice.bsky.social',
        subjectId: 'did:plc:alice',
      });
    });

    it('keeps the old session when the login is rejected', async () => {
      mockFetch.mockResolvedValueOnce(new Response('{"error":"AuthenticationRequired"}', { status: 401 }));

      const code = await login(ctx, {}, async () => ({ identifier: 'alice.test', secret: 'wrong' }));

      expect(code).toBe(1);
      expect(consoleSpy.error).toHaveBeenCalledWith('❌ Login rejected (HTTP 401: {"error":"AuthenticationRequired"})');
      expect(await store.load()).toEqual(createMockSession());
    });

    it('fails without credentials', async () => {
      const code = await login(ctx, { identifier: 'alice.test' }, async () => null);

      expect(code).toBe(1);
      expect(mockFetch).not.toHaveBeenCalled();
    });
  });

  describe('status', () => {
    it('shows the stored handle and DID', async () => {
      const code = await showStatus(ctx);

      expect(code).toBe(0);
      expect(consoleSpy.log).toHaveBeenCalledWith('   Handle:  @alice.test');
      expect(consoleSpy.log).toHaveBeenCalledWith('   DID:     did:plc:alice\n');
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it('reports when nobody is logged in', async () => {
      const code = await showStatus(createContext(config, { store: new MemoryCredentialStore() }));

      expect(code).toBe(0);
      expect(consoleSpy.log).toHaveBeenCalledWith('   Status:  ❌ Not logged in\n');
    });
  });

  describe('logout', () => {
    it('clears the stored session', async () => {
      const code = await logout(ctx);

      expect(code).toBe(0);
      expect(await store.load()).toBeNull();
    });
  });
});
