/**
 * Post Command
 *
 * Ensures a session, then publishes the message.
 */

import * as fs from 'fs/promises';
import { describeAuthError, describePostError, formatHandle, truncate } from '@skypost/bluesky-client';
import type { CliContext } from '../context.js';

export interface PostOptions {
  file?: string;
}

async function resolveText(words: string[], options: PostOptions): Promise<string | null> {
  if (options.file) {
    const content = await fs.readFile(options.file, 'utf-8');
    return content.trim();
  }
  const text = words.join(' ');
  return text.trim() ? text : null;
}

export async function postMessage(ctx: CliContext, words: string[], options: PostOptions): Promise<number> {
  let text: string | null;
  try {
    text = await resolveText(words, options);
  } catch (error) {
    console.error(`❌ Could not read ${options.file}: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }

  if (!text) {
    console.error('❌ Please provide a message, e.g. skypost post "hello"');
    return 1;
  }

  const session = await ctx.sessions.ensureSession();
  if (!session.success) {
    console.error(`❌ ${describeAuthError(session.error)}`);
    if (session.error.kind === 'MissingCredentials') {
      console.error("   Run 'skypost login' first.");
    }
    return 1;
  }

  console.log(`\n📤 Posting to Bluesky as ${formatHandle(session.data.handle)}...`);
  console.log(`   "${truncate(text, 60)}"`);

  const result = await ctx.publisher.post(text, session.data);
  if (!result.success) {
    console.error(`❌ ${describePostError(result.error)}`);
    if (result.error.kind === 'AuthExpired') {
      console.error("   Run 'skypost login' to sign in again.");
    }
    return 1;
  }

  console.log('✅ Posted successfully!');
  console.log(`   URI: ${result.data.uri}`);
  return 0;
}
