/**
 * Logout Command
 */

import type { CliContext } from '../context.js';

export async function logout(ctx: CliContext): Promise<number> {
  try {
    await ctx.store.clear();
  } catch (error) {
    console.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
  console.log('✅ Logged out. Stored session removed.');
  return 0;
}
