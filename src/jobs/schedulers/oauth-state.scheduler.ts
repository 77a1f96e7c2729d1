import { Queue } from 'bull';
import { OAuthStateStore } from '../../services/integrations/oauth-state.store';

export const OAUTH_STATE_SWEEP_JOB = 'oauth-state-sweep';

/**
 * Schedule the expired OAuth state sweep
 * Runs every 10 minutes; consume() already rejects expired rows, this only
 * keeps the table small.
 */
export async function scheduleOAuthStateSweep(queue: Queue, stateStore: OAuthStateStore): Promise<void> {
  queue.process(OAUTH_STATE_SWEEP_JOB, async () => {
    const removed = await stateStore.purgeExpired();
    if (removed > 0) {
      console.log(`🧹 Purged ${removed} expired OAuth state(s)`);
    }
    return { removed };
  });

  await queue.add(
    OAUTH_STATE_SWEEP_JOB,
    {},
    {
      repeat: { cron: '*/10 * * * *' }, // Every 10 minutes
      jobId: `${OAUTH_STATE_SWEEP_JOB}-recurring`,
    }
  );

  console.log('✓ OAuth state sweep scheduled (every 10 minutes)');
}
