#!/usr/bin/env -S npx tsx
/**
 * skypost CLI
 *
 * Usage:
 *   skypost "your message"        - Post (logs in on first use)
 *   skypost post -f ./note.txt    - Post the contents of a file
 *   skypost login                 - Log in again, replacing the saved session
 *   skypost status                - Show the saved session
 *   skypost logout                - Remove the saved session
 */

import 'dotenv/config';
import { Command } from 'commander';
import { loadConfigFromEnv, validateConfig } from '@skypost/bluesky-client';
import { createContext, type CliContext } from './context.js';
import { createCredentialsProvider, createLoginCredentialsSource } from './prompt.js';
import { login, logout, postMessage, showStatus } from './commands/index.js';

const program = new Command();

function getContext(): CliContext {
  const config = loadConfigFromEnv(process.env);
  const { valid, errors } = validateConfig(config);
  if (!valid) {
    for (const error of errors) console.error(`❌ Invalid configuration: ${error}`);
    process.exit(1);
  }
  return createContext(config, { credentials: createCredentialsProvider(process.env) });
}

async function run(action: () => Promise<number>): Promise<void> {
  try {
    process.exitCode = await action();
  } catch (error) {
    console.error('❌ Error:', error);
    process.exitCode = 1;
  }
}

program
  .name('skypost')
  .description('Post to Bluesky from the command line')
  .version('0.1.0');

program
  .command('post', { isDefault: true })
  .description('Publish a post (logs in on first use)')
  .argument('[message...]', 'Message text')
  .option('-f, --file <path>', 'Read the message from a file')
  .action(async (message: string[], options: { file?: string }) => {
    await run(() => postMessage(getContext(), message, options));
  });

program
  .command('login')
  .description('Log in and save a new session')
  .option('-i, --identifier <handle>', 'Bluesky handle or email')
  .action(async (options: { identifier?: string }) => {
    await run(() => login(getContext(), options, createLoginCredentialsSource(process.env)));
  });

program
  .command('status')
  .description('Show the saved session')
  .action(async () => {
    await run(() => showStatus(getContext()));
  });

program
  .command('logout')
  .description('Remove the saved session')
  .action(async () => {
    await run(() => logout(getContext()));
  });

program.parseAsync().catch((error: unknown) => {
  console.error('❌ Error:', error);
  process.exit(1);
});
