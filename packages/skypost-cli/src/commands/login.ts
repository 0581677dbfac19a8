/**
 * Login Command
 *
 * Forces a fresh session, replacing whatever is stored.
 */

import { describeAuthError, formatHandle, type Credentials } from '@skypost/bluesky-client';
import type { CliContext } from '../context.js';

export interface LoginOptions {
  identifier?: string;
}

export type CredentialsSource = (identifier?: string) => Promise<Credentials | null>;

export async function login(ctx: CliContext, options: LoginOptions, getCredentials: CredentialsSource): Promise<number> {
  const credentials = await getCredentials(options.identifier);
  if (!credentials) {
    console.error('❌ A handle and password are required to log in');
    return 1;
  }

  const result = await ctx.sessions.authenticate(credentials.identifier, credentials.secret);
  if (!result.success) {
    console.error(`❌ ${describeAuthError(result.error)}`);
    return 1;
  }

  console.log(`✅ Logged in as ${formatHandle(result.data.handle)}`);
  console.log(`   DID: ${result.data.subjectId}`);
  return 0;
}
