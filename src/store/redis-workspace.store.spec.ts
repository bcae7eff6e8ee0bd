import Redis from 'ioredis';

import { NewProject, NewReview } from '../types/workspace';
import { ActivityFeedService } from '../workspace/activity-feed.service';
import { WorkspaceConflictError } from '../workspace/workspace.errors';
import { WorkspaceService } from '../workspace/workspace.service';
import { RedisWorkspaceStore } from './redis-workspace.store';

function createRedisMock() {
  const strings = new Map<string, string>();
  const sets = new Map<string, Set<string>>();
  const state = { abortNextExec: false };

  const mock = {
    strings,
    sets,
    state,
    get: jest.fn(async (key: string) => strings.get(key) ?? null),
    smembers: jest.fn(async (key: string) => [...(sets.get(key) ?? [])]),
    incr: jest.fn(async (key: string) => {
      const next = Number(strings.get(key) ?? '0') + 1;
      strings.set(key, String(next));
      return next;
    }),
    watch: jest.fn(async (..._keys: string[]) => 'OK'),
    unwatch: jest.fn(async () => 'OK'),
    ping: jest.fn(async () => 'PONG'),
    quit: jest.fn(async () => 'OK'),
    multi: jest.fn(() => {
      const ops: Array<() => void> = [];
      const chain = {
        set: (key: string, value: string) => {
          ops.push(() => strings.set(key, value));
          return chain;
        },
        sadd: (key: string, ...members: string[]) => {
          ops.push(() => {
            const set = sets.get(key) ?? new Set<string>();
            for (const m of members) set.add(m);
            sets.set(key, set);
          });
          return chain;
        },
        exec: async () => {
          if (state.abortNextExec) {
            state.abortNextExec = false;
            return null;
          }
          for (const op of ops) op();
          return ops.map(() => [null, 'OK']);
        },
      };
      return chain;
    }),
  };
  return mock;
}

const PROJECT: NewProject = {
  jobId: 5,
  applicationId: 10,
  freelancerId: 3,
  clientId: 7,
  status: 'active',
  progressPercentage: 0,
  createdAt: '2026-01-01T00:00:00.000Z',
  completedAt: null,
};

describe('RedisWorkspaceStore', () => {
  let redisMock: ReturnType<typeof createRedisMock>;
  let store: RedisWorkspaceStore;

  beforeEach(() => {
    redisMock = createRedisMock();
    store = new RedisWorkspaceStore(redisMock as unknown as Redis, 'test:');
  });

  it('stores records as JSON and indexes them by relation', async () => {
    await store.transaction(tx => tx.insertProject(PROJECT));

    expect(JSON.parse(redisMock.strings.get('test:project:1') ?? 'null')).toEqual({ id: 1, ...PROJECT });
    expect([...(redisMock.sets.get('test:projects') ?? [])]).toEqual(['1']);
    expect([...(redisMock.sets.get('test:freelancer:3:projects') ?? [])]).toEqual(['1']);
    expect([...(redisMock.sets.get('test:client:7:projects') ?? [])]).toEqual(['1']);
  });

  it('writes nothing until the transaction commits, but lets the transaction read its own writes', async () => {
    await store.transaction(async tx => {
      const project = await tx.insertProject(PROJECT);
      expect(await tx.getProject(project.id)).toEqual(project);
      expect(await tx.listProjects({ freelancerId: 3 })).toEqual([project]);
      expect(redisMock.strings.has('test:project:1')).toBe(false);
    });

    expect(redisMock.multi).toHaveBeenCalledTimes(1);
    expect(await store.getProject(1)).toEqual({ id: 1, ...PROJECT });
  });

  it('unwatches and skips MULTI when the work fails', async () => {
    await expect(
      store.transaction(async tx => {
        await tx.insertProject(PROJECT);
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    expect(redisMock.unwatch).toHaveBeenCalledTimes(1);
    expect(redisMock.multi).not.toHaveBeenCalled();
    expect(await store.getProject(1)).toBeNull();
  });

  it('keeps the original error when UNWATCH fails', async () => {
    redisMock.unwatch.mockRejectedValueOnce(new Error('connection lost'));

    await expect(
      store.transaction(async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
    expect(redisMock.multi).not.toHaveBeenCalled();
  });

  it('watches the keys a transaction reads', async () => {
    await store.transaction(async tx => {
      await tx.getMilestone(4);
      await tx.listSubmissions(4);
      await tx.getMilestone(4);
    });

    expect(redisMock.watch.mock.calls).toEqual([['test:milestone:4'], ['test:milestone:4:submissions']]);
  });

  it('raises a conflict when a watched key changed before EXEC', async () => {
    redisMock.state.abortNextExec = true;

    await expect(store.transaction(tx => tx.insertProject(PROJECT))).rejects.toThrow(WorkspaceConflictError);
    expect(redisMock.strings.has('test:project:1')).toBe(false);
  });

  it('applies patches on top of the stored record', async () => {
    await store.transaction(tx => tx.insertProject(PROJECT));

    await store.transaction(tx => tx.updateProject(1, { status: 'disputed' }));

    expect(await store.getProject(1)).toEqual({ id: 1, ...PROJECT, status: 'disputed' });
  });

  it('runs the workspace engine end to end', async () => {
    const service = new WorkspaceService(store, new ActivityFeedService());

    const projectId = await service.createWorkspace({ applicationId: 10, jobId: 5, freelancerId: 3, clientId: 7 });
    const workspace = await service.getWorkspace(projectId);
    const [first] = workspace?.milestones ?? [];
    await service.submitDeliverable(first.id, 3, 'Mockups');
    await service.submitDeliverable(first.id, 3, 'Mockups, take two');
    const progress = await service.approveMilestone(first.id, 7, 'Approved');

    expect(workspace?.milestones.map(m => m.orderNumber)).toEqual([1, 2, 3, 4]);
    expect(progress).toBe(25);
    expect((await service.listSubmissions(first.id)).map(s => [s.versionNumber, s.clientFeedback])).toEqual([
      [2, 'Approved'],
      [1, null],
    ]);
    expect((await service.getActivityLog(projectId)).map(e => e.activityType)).toEqual([
      'milestone_approved',
      'deliverable_submitted',
      'deliverable_submitted',
      'workspace_created',
    ]);
  });

  it('indexes reviews by project and by reviewee', async () => {
    const clientReview: NewReview = {
      projectId: 1,
      reviewerId: 7,
      revieweeId: 3,
      rating: 5,
      comment: 'On time',
      createdAt: '2026-02-01T00:00:00.000Z',
    };
    const freelancerReview: NewReview = {
      projectId: 1,
      reviewerId: 3,
      revieweeId: 7,
      rating: 4,
      comment: null,
      createdAt: '2026-02-02T00:00:00.000Z',
    };

    await store.transaction(async tx => {
      await tx.insertReview(clientReview);
      await tx.insertReview(freelancerReview);
    });

    expect([...(redisMock.sets.get('test:project:1:reviews') ?? [])]).toEqual(['1', '2']);
    expect([...(redisMock.sets.get('test:reviewee:3:reviews') ?? [])]).toEqual(['1']);
    expect(await store.listReviews({ projectId: 1 })).toEqual([
      { id: 2, ...freelancerReview },
      { id: 1, ...clientReview },
    ]);
    expect(await store.listReviews({ revieweeId: 3 })).toEqual([{ id: 1, ...clientReview }]);
  });

  it('reports store health through PING', async () => {
    expect(await store.ping()).toBe(true);

    redisMock.ping.mockRejectedValueOnce(new Error('connection refused'));
    expect(await store.ping()).toBe(false);
  });

  it('closes the connection on shutdown', async () => {
    await store.onModuleDestroy();
    expect(redisMock.quit).toHaveBeenCalled();
  });
});
