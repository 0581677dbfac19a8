/**
 * Credential Store
 *
 * Persists the single Session record. Raw passwords never reach a store.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { storedSessionSchema } from '../api/schemas.js';
import type { Session } from '../types.js';

export class CredentialStoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CredentialStoreError';
  }
}

export interface CredentialStore {
  /** Resolves null when no session has ever been saved. */
  load(): Promise<Session | null>;
  save(session: Session): Promise<void>;
  clear(): Promise<void>;
}

function assertComplete(session: Session): void {
  if (!session.accessToken || !session.refreshToken) {
    throw new CredentialStoreError('Refusing to save a session without both tokens');
  }
  if (!session.subjectId) {
    throw new CredentialStoreError('Refusing to save a session without a subject id');
  }
}

function toRecord(session: Session): Session {
  return {
    accessToken: session.accessToken,
    refreshToken: session.refreshToken,
    handle: session.handle,
    subjectId: session.subjectId,
  };
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * JSON file store. Writes go to a temp file that is renamed over the
 * target, so a reader sees either the previous record or the new one.
 */
export class FileCredentialStore implements CredentialStore {
  constructor(private readonly filePath: string) {}

  get location(): string {
    return this.filePath;
  }

  async load(): Promise<Session | null> {
    let data: string;
    try {
      data = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw new CredentialStoreError(`Failed to read ${this.filePath}`, { cause: error });
    }

    let json: unknown;
    try {
      json = JSON.parse(data);
    } catch (error) {
      throw new CredentialStoreError(`Session file ${this.filePath} is not valid JSON`, { cause: error });
    }

    const parsed = storedSessionSchema.safeParse(json);
    if (!parsed.success) {
      throw new CredentialStoreError(`Session file ${this.filePath} is incomplete or corrupt`);
    }
    return parsed.data;
  }

  async save(session: Session): Promise<void> {
    assertComplete(session);

    const dir = path.dirname(this.filePath);
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      await fs.mkdir(dir, { recursive: true, mode: 0o700 });
      await fs.writeFile(tmpPath, JSON.stringify(toRecord(session), null, 2), { mode: 0o600 });
      await fs.rename(tmpPath, this.filePath);
    } catch (error) {
      await fs.rm(tmpPath, { force: true });
      throw new CredentialStoreError(`Failed to write ${this.filePath}`, { cause: error });
    }
  }

  async clear(): Promise<void> {
    try {
      await fs.rm(this.filePath, { force: true });
    } catch (error) {
      throw new CredentialStoreError(`Failed to remove ${this.filePath}`, { cause: error });
    }
  }
}

export class MemoryCredentialStore implements CredentialStore {
  private record: Session | null;

  constructor(initial: Session | null = null) {
    this.record = initial ? toRecord(initial) : null;
  }

  async load(): Promise<Session | null> {
    return this.record ? toRecord(this.record) : null;
  }

  async save(session: Session): Promise<void> {
    assertComplete(session);
    this.record = toRecord(session);
  }

  async clear(): Promise<void> {
    this.record = null;
  }
}
