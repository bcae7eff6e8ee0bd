import { Logger, OnModuleDestroy } from '@nestjs/common';
import Redis from 'ioredis';

import {
  ActivityLogEntry,
  Milestone,
  MilestonePatch,
  NewActivityLogEntry,
  NewMilestone,
  NewProject,
  NewReview,
  NewSubmission,
  Project,
  ProjectFilter,
  ProjectPatch,
  Review,
  ReviewFilter,
  Submission,
} from '../types/workspace';
import { WorkspaceConflictError } from '../workspace/workspace.errors';
import {
  byNewest,
  matchesProjectFilter,
  WorkspaceReader,
  WorkspaceStore,
  WorkspaceTransaction,
} from './workspace.store';

type Sequence = 'project' | 'milestone' | 'submission' | 'activity' | 'review';

export function workspaceKeys(prefix: string) {
  return {
    sequence: (name: Sequence) => `${prefix}seq:${name}`,
    project: (id: number) => `${prefix}project:${id}`,
    projectList: `${prefix}projects`,
    projectsByFreelancer: (freelancerId: number) => `${prefix}freelancer:${freelancerId}:projects`,
    projectsByClient: (clientId: number) => `${prefix}client:${clientId}:projects`,
    milestone: (id: number) => `${prefix}milestone:${id}`,
    milestonesByProject: (projectId: number) => `${prefix}project:${projectId}:milestones`,
    submission: (id: number) => `${prefix}submission:${id}`,
    submissionsByMilestone: (milestoneId: number) => `${prefix}milestone:${milestoneId}:submissions`,
    activity: (id: number) => `${prefix}activity:${id}`,
    activityByProject: (projectId: number) => `${prefix}project:${projectId}:activity`,
    review: (id: number) => `${prefix}review:${id}`,
    reviewsByProject: (projectId: number) => `${prefix}project:${projectId}:reviews`,
    reviewsByReviewee: (revieweeId: number) => `${prefix}reviewee:${revieweeId}:reviews`,
  } as const;
}

export type WorkspaceKeys = ReturnType<typeof workspaceKeys>;

class RedisWorkspaceReader implements WorkspaceReader {
  constructor(
    protected readonly redis: Redis,
    protected readonly keys: WorkspaceKeys,
  ) {}

  protected async readRecord<T>(key: string): Promise<T | null> {
    const data = await this.redis.get(key);
    return data ? JSON.parse(data) : null;
  }

  protected async readMembers(key: string): Promise<number[]> {
    const ids = await this.redis.smembers(key);
    return ids.map(Number);
  }

  private async readAll<T>(ids: number[], keyOf: (id: number) => string): Promise<T[]> {
    const rows: T[] = [];
    for (const id of ids) {
      const row = await this.readRecord<T>(keyOf(id));
      if (row) rows.push(row);
    }
    return rows;
  }

  getProject(id: number): Promise<Project | null> {
    return this.readRecord<Project>(this.keys.project(id));
  }

  async listProjects(filter?: ProjectFilter): Promise<Project[]> {
    let index: string = this.keys.projectList;
    if (filter?.freelancerId !== undefined) index = this.keys.projectsByFreelancer(filter.freelancerId);
    else if (filter?.clientId !== undefined) index = this.keys.projectsByClient(filter.clientId);

    const projects = await this.readAll<Project>(await this.readMembers(index), this.keys.project);
    return projects.filter(p => matchesProjectFilter(p, filter)).sort(byNewest);
  }

  getMilestone(id: number): Promise<Milestone | null> {
    return this.readRecord<Milestone>(this.keys.milestone(id));
  }

  async listMilestones(projectId: number): Promise<Milestone[]> {
    const ids = await this.readMembers(this.keys.milestonesByProject(projectId));
    const milestones = await this.readAll<Milestone>(ids, this.keys.milestone);
    return milestones.sort((a, b) => a.orderNumber - b.orderNumber);
  }

  async listSubmissions(milestoneId: number): Promise<Submission[]> {
    const ids = await this.readMembers(this.keys.submissionsByMilestone(milestoneId));
    const submissions = await this.readAll<Submission>(ids, this.keys.submission);
    return submissions.sort((a, b) => b.versionNumber - a.versionNumber);
  }

  async listActivity(projectId: number): Promise<ActivityLogEntry[]> {
    const ids = await this.readMembers(this.keys.activityByProject(projectId));
    const entries = await this.readAll<ActivityLogEntry>(ids, this.keys.activity);
    return entries.sort(byNewest);
  }

  async listReviews(filter: ReviewFilter): Promise<Review[]> {
    let index: string;
    if (filter.projectId !== undefined) index = this.keys.reviewsByProject(filter.projectId);
    else if (filter.revieweeId !== undefined) index = this.keys.reviewsByReviewee(filter.revieweeId);
    else return [];

    const reviews = await this.readAll<Review>(await this.readMembers(index), this.keys.review);
    return reviews
      .filter(r => filter.revieweeId === undefined || r.revieweeId === filter.revieweeId)
      .sort(byNewest);
  }
}

/**
 * Optimistic unit of work: every key read is WATCHed first, writes are staged
 * locally and flushed in a single MULTI/EXEC on commit.
 */
class RedisWorkspaceTransaction extends RedisWorkspaceReader implements WorkspaceTransaction {
  private readonly staged = new Map<string, string>();
  private readonly stagedMembers = new Map<string, Set<string>>();
  private readonly watched = new Set<string>();

  private async watch(key: string): Promise<void> {
    if (this.watched.has(key)) return;
    this.watched.add(key);
    await this.redis.watch(key);
  }

  protected override async readRecord<T>(key: string): Promise<T | null> {
    const staged = this.staged.get(key);
    if (staged !== undefined) return JSON.parse(staged);
    await this.watch(key);
    return super.readRecord<T>(key);
  }

  protected override async readMembers(key: string): Promise<number[]> {
    await this.watch(key);
    const ids = new Set(await super.readMembers(key));
    for (const id of this.stagedMembers.get(key) ?? []) ids.add(Number(id));
    return [...ids];
  }

  private stage(key: string, record: object, ...indexes: string[]): void {
    this.staged.set(key, JSON.stringify(record));
    const id = key.slice(key.lastIndexOf(':') + 1);
    for (const index of indexes) {
      const members = this.stagedMembers.get(index) ?? new Set<string>();
      members.add(id);
      this.stagedMembers.set(index, members);
    }
  }

  private async nextId(sequence: Sequence): Promise<number> {
    return this.redis.incr(this.keys.sequence(sequence));
  }

  private async patchRecord<T extends object>(key: string, patch: Partial<T>): Promise<T> {
    const current = await this.readRecord<T>(key);
    if (!current) throw new Error(`Record missing: ${key}`);
    const updated: T = { ...current, ...patch };
    this.stage(key, updated);
    return updated;
  }

  async insertProject(data: NewProject): Promise<Project> {
    const project: Project = { id: await this.nextId('project'), ...data };
    this.stage(
      this.keys.project(project.id),
      project,
      this.keys.projectList,
      this.keys.projectsByFreelancer(project.freelancerId),
      this.keys.projectsByClient(project.clientId),
    );
    return project;
  }

  updateProject(id: number, patch: ProjectPatch): Promise<Project> {
    return this.patchRecord<Project>(this.keys.project(id), patch);
  }

  async insertMilestone(data: NewMilestone): Promise<Milestone> {
    const milestone: Milestone = { id: await this.nextId('milestone'), ...data };
    this.stage(this.keys.milestone(milestone.id), milestone, this.keys.milestonesByProject(milestone.projectId));
    return milestone;
  }

  updateMilestone(id: number, patch: MilestonePatch): Promise<Milestone> {
    return this.patchRecord<Milestone>(this.keys.milestone(id), patch);
  }

  async insertSubmission(data: NewSubmission): Promise<Submission> {
    const submission: Submission = { id: await this.nextId('submission'), ...data };
    this.stage(
      this.keys.submission(submission.id),
      submission,
      this.keys.submissionsByMilestone(submission.milestoneId),
    );
    return submission;
  }

  setSubmissionFeedback(id: number, feedback: string): Promise<Submission> {
    return this.patchRecord<Submission>(this.keys.submission(id), { clientFeedback: feedback });
  }

  async appendActivity(data: NewActivityLogEntry): Promise<ActivityLogEntry> {
    const entry: ActivityLogEntry = { id: await this.nextId('activity'), ...data };
    this.stage(this.keys.activity(entry.id), entry, this.keys.activityByProject(entry.projectId));
    return entry;
  }

  async insertReview(data: NewReview): Promise<Review> {
    const review: Review = { id: await this.nextId('review'), ...data };
    this.stage(
      this.keys.review(review.id),
      review,
      this.keys.reviewsByProject(review.projectId),
      this.keys.reviewsByReviewee(review.revieweeId),
    );
    return review;
  }

  async commit(): Promise<void> {
    const multi = this.redis.multi();
    for (const [key, value] of this.staged) multi.set(key, value);
    for (const [key, members] of this.stagedMembers) multi.sadd(key, ...members);

    const results = await multi.exec();
    if (results === null) {
      throw new WorkspaceConflictError('Workspace data changed during the transaction; nothing was written');
    }
    for (const [error] of results) {
      if (error) throw error;
    }
  }

  async rollback(): Promise<void> {
    await this.redis.unwatch();
  }
}

export class RedisWorkspaceStore extends RedisWorkspaceReader implements WorkspaceStore, OnModuleDestroy {
  private readonly logger = new Logger(RedisWorkspaceStore.name);
  // WATCH state lives on the connection, so transactions take turns
  private queue: Promise<void> = Promise.resolve();

  constructor(redis: Redis, keyPrefix = 'workspace:') {
    super(redis, workspaceKeys(keyPrefix));
  }

  transaction<T>(work: (tx: WorkspaceTransaction) => Promise<T>): Promise<T> {
    const run = this.queue.then(() => this.runTransaction(work));
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async runTransaction<T>(work: (tx: WorkspaceTransaction) => Promise<T>): Promise<T> {
    const tx = new RedisWorkspaceTransaction(this.redis, this.keys);
    let result: T;
    try {
      result = await work(tx);
    } catch (error) {
      await tx.rollback().catch((rollbackError: unknown) => {
        this.logger.error(
          `Rollback failed: ${rollbackError instanceof Error ? rollbackError.message : String(rollbackError)}`,
        );
      });
      throw error;
    }

    try {
      await tx.commit();
    } catch (error) {
      this.logger.error(`Transaction aborted: ${error instanceof Error ? error.message : String(error)}`);
      throw error;
    }
    return result;
  }

  async ping(): Promise<boolean> {
    try {
      return (await this.redis.ping()) === 'PONG';
    } catch (error) {
      this.logger.warn(`Redis ping failed: ${error instanceof Error ? error.message : String(error)}`);
      return false;
    }
  }

  async onModuleDestroy() {
    await this.redis.quit();
  }
}
