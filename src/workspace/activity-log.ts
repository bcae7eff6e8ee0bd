import { now } from '../shared/utils';
import { WorkspaceStore, WorkspaceTransaction } from '../store/workspace.store';
import { ActivityLogEntry, ActivityType } from '../types/workspace';
import { ActivityFeedService } from './activity-feed.service';

export type RecordActivity = (
  projectId: number,
  userId: number,
  activityType: ActivityType,
  description: string,
) => Promise<ActivityLogEntry>;

/**
 * Runs `work` in one store transaction, giving it a recorder that appends
 * activity entries to the same transaction. Entries reach the feed only
 * after the commit succeeds.
 */
export async function withActivity<T>(
  store: WorkspaceStore,
  feed: ActivityFeedService,
  work: (tx: WorkspaceTransaction, record: RecordActivity) => Promise<T>,
): Promise<T> {
  const appended: ActivityLogEntry[] = [];

  const result = await store.transaction(tx =>
    work(tx, async (projectId, userId, activityType, description) => {
      const entry = await tx.appendActivity({ projectId, userId, activityType, description, createdAt: now() });
      appended.push(entry);
      return entry;
    }),
  );

  feed.publish(appended);
  return result;
}
