/**
 * Status Command
 *
 * Shows the stored session without touching the network.
 */

import { formatHandle, type Session } from '@skypost/bluesky-client';
import type { CliContext } from '../context.js';

export async function showStatus(ctx: CliContext): Promise<number> {
  let session: Session | null;
  try {
    session = await ctx.store.load();
  } catch (error) {
    console.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }

  console.log('\n🔐 Session Status\n');
  console.log(`   Service: ${ctx.config.serviceUrl}`);
  console.log(`   File:    ${ctx.config.sessionFile}`);

  if (!session) {
    console.log('   Status:  ❌ Not logged in\n');
    return 0;
  }

  console.log('   Status:  ✅ Logged in');
  console.log(`   Handle:  ${formatHandle(session.handle)}`);
  console.log(`   DID:     ${session.subjectId}\n`);
  return 0;
}
