/**
 * Credential prompts
 *
 * Environment credentials win over the terminal so skypost can run
 * unattended; otherwise the user is asked, with password echo off.
 */

import * as readline from 'readline';
import { Writable } from 'stream';
import { normalizeIdentifier, type Credentials, type CredentialsProvider } from '@skypost/bluesky-client';

export function credentialsFromEnv(env: Record<string, string | undefined>): Credentials | null {
  const identifier = normalizeIdentifier(env.SKYPOST_IDENTIFIER || '');
  const secret = env.SKYPOST_APP_PASSWORD || '';
  if (!identifier || !secret) return null;
  return { identifier, secret };
}

/**
 * Ask one question. With `hidden`, typed characters are not echoed.
 */
export function ask(question: string, hidden = false): Promise<string> {
  let muted = false;
  const output = new Writable({
    write(chunk, encoding, callback) {
      if (!muted) process.stdout.write(chunk, encoding);
      callback();
    },
  });

  const rl = readline.createInterface({ input: process.stdin, output, terminal: true });

  return new Promise((resolve, reject) => {
    rl.question(question, (answer) => {
      rl.close();
      if (hidden) process.stdout.write('\n');
      resolve(answer);
    });
    rl.on('SIGINT', () => {
      rl.close();
      reject(new Error('Prompt cancelled'));
    });
    muted = hidden;
  });
}

export async function promptCredentials(identifier?: string): Promise<Credentials | null> {
  const handle = identifier
    ? normalizeIdentifier(identifier)
    : normalizeIdentifier(await ask("Bluesky handle (without the '@'): "));
  if (!handle) return null;

  const secret = await ask('Password or app password (input hidden): ', true);
  if (!secret) return null;

  return { identifier: handle, secret };
}

/**
 * Provider for SessionManager: environment first, then the terminal.
 */
export function createCredentialsProvider(
  env: Record<string, string | undefined>,
  interactive: boolean = process.stdin.isTTY === true
): CredentialsProvider {
  return async () => {
    const fromEnv = credentialsFromEnv(env);
    if (fromEnv) return fromEnv;
    if (!interactive) return null;
    console.log('No saved session found. Please log in to Bluesky.');
    return promptCredentials();
  };
}

/**
 * Source for the login command: an explicit identifier is combined with
 * SKYPOST_APP_PASSWORD when set, otherwise the password is prompted.
 */
export function createLoginCredentialsSource(
  env: Record<string, string | undefined>,
  interactive: boolean = process.stdin.isTTY === true
): (identifier?: string) => Promise<Credentials | null> {
  return async (identifier) => {
    const fromEnv = credentialsFromEnv(env);
    if (!identifier && fromEnv) return fromEnv;

    const secret = env.SKYPOST_APP_PASSWORD || '';
    if (identifier && secret) {
      const handle = normalizeIdentifier(identifier);
      return handle ? { identifier: handle, secret } : null;
    }

    if (!interactive) return null;
    return promptCredentials(identifier);
  };
}
