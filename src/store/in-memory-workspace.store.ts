import { Logger } from '@nestjs/common';

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
import { byNewest, matchesProjectFilter, WorkspaceStore, WorkspaceTransaction } from './workspace.store';

type TableName = 'projects' | 'milestones' | 'submissions' | 'activity' | 'reviews';

interface Tables {
  projects: Map<number, Project>;
  milestones: Map<number, Milestone>;
  submissions: Map<number, Submission>;
  activity: Map<number, ActivityLogEntry>;
  reviews: Map<number, Review>;
  sequences: Record<TableName, number>;
}

function emptyTables(): Tables {
  return {
    projects: new Map(),
    milestones: new Map(),
    submissions: new Map(),
    activity: new Map(),
    reviews: new Map(),
    sequences: { projects: 0, milestones: 0, submissions: 0, activity: 0, reviews: 0 },
  };
}

function copyTable<T extends object>(table: Map<number, T>): Map<number, T> {
  return new Map([...table].map(([id, row]) => [id, { ...row }]));
}

function copyTables(tables: Tables): Tables {
  return {
    projects: copyTable(tables.projects),
    milestones: copyTable(tables.milestones),
    submissions: copyTable(tables.submissions),
    activity: copyTable(tables.activity),
    reviews: copyTable(tables.reviews),
    sequences: { ...tables.sequences },
  };
}

class InMemoryWorkspaceTransaction implements WorkspaceTransaction {
  constructor(private readonly tables: Tables) {}

  private nextId(table: TableName): number {
    this.tables.sequences[table] += 1;
    return this.tables.sequences[table];
  }

  async getProject(id: number): Promise<Project | null> {
    const project = this.tables.projects.get(id);
    return project ? { ...project } : null;
  }

  async listProjects(filter?: ProjectFilter): Promise<Project[]> {
    return [...this.tables.projects.values()]
      .filter(p => matchesProjectFilter(p, filter))
      .map(p => ({ ...p }))
      .sort(byNewest);
  }

  async getMilestone(id: number): Promise<Milestone | null> {
    const milestone = this.tables.milestones.get(id);
    return milestone ? { ...milestone } : null;
  }

  async listMilestones(projectId: number): Promise<Milestone[]> {
    return [...this.tables.milestones.values()]
      .filter(m => m.projectId === projectId)
      .map(m => ({ ...m }))
      .sort((a, b) => a.orderNumber - b.orderNumber);
  }

  async listSubmissions(milestoneId: number): Promise<Submission[]> {
    return [...this.tables.submissions.values()]
      .filter(s => s.milestoneId === milestoneId)
      .map(s => ({ ...s }))
      .sort((a, b) => b.versionNumber - a.versionNumber);
  }

  async listActivity(projectId: number): Promise<ActivityLogEntry[]> {
    return [...this.tables.activity.values()]
      .filter(a => a.projectId === projectId)
      .map(a => ({ ...a }))
      .sort(byNewest);
  }

  async listReviews(filter: ReviewFilter): Promise<Review[]> {
    return [...this.tables.reviews.values()]
      .filter(r => filter.projectId === undefined || r.projectId === filter.projectId)
      .filter(r => filter.revieweeId === undefined || r.revieweeId === filter.revieweeId)
      .map(r => ({ ...r }))
      .sort(byNewest);
  }

  async insertProject(data: NewProject): Promise<Project> {
    const project: Project = { id: this.nextId('projects'), ...data };
    this.tables.projects.set(project.id, project);
    return { ...project };
  }

  async updateProject(id: number, patch: ProjectPatch): Promise<Project> {
    const project = this.tables.projects.get(id);
    if (!project) throw new Error(`Project row missing: ${id}`);
    Object.assign(project, patch);
    return { ...project };
  }

  async insertMilestone(data: NewMilestone): Promise<Milestone> {
    const milestone: Milestone = { id: this.nextId('milestones'), ...data };
    this.tables.milestones.set(milestone.id, milestone);
    return { ...milestone };
  }

  async updateMilestone(id: number, patch: MilestonePatch): Promise<Milestone> {
    const milestone = this.tables.milestones.get(id);
    if (!milestone) throw new Error(`Milestone row missing: ${id}`);
    Object.assign(milestone, patch);
    return { ...milestone };
  }

  async insertSubmission(data: NewSubmission): Promise<Submission> {
    const submission: Submission = { id: this.nextId('submissions'), ...data };
    this.tables.submissions.set(submission.id, submission);
    return { ...submission };
  }

  async setSubmissionFeedback(id: number, feedback: string): Promise<Submission> {
    const submission = this.tables.submissions.get(id);
    if (!submission) throw new Error(`Submission row missing: ${id}`);
    submission.clientFeedback = feedback;
    return { ...submission };
  }

  async appendActivity(data: NewActivityLogEntry): Promise<ActivityLogEntry> {
    const entry: ActivityLogEntry = { id: this.nextId('activity'), ...data };
    this.tables.activity.set(entry.id, entry);
    return { ...entry };
  }

  async insertReview(data: NewReview): Promise<Review> {
    const review: Review = { id: this.nextId('reviews'), ...data };
    this.tables.reviews.set(review.id, review);
    return { ...review };
  }
}

/**
 * Process-local store. Transactions run one at a time against a copy of the
 * tables; the copy replaces the live tables only when the work resolves.
 */
export class InMemoryWorkspaceStore implements WorkspaceStore {
  private readonly logger = new Logger(InMemoryWorkspaceStore.name);
  private tables: Tables = emptyTables();
  private queue: Promise<void> = Promise.resolve();

  private get view(): InMemoryWorkspaceTransaction {
    return new InMemoryWorkspaceTransaction(this.tables);
  }

  transaction<T>(work: (tx: WorkspaceTransaction) => Promise<T>): Promise<T> {
    const run = this.queue.then(async () => {
      const draft = copyTables(this.tables);
      try {
        const result = await work(new InMemoryWorkspaceTransaction(draft));
        this.tables = draft;
        return result;
      } catch (error) {
        this.logger.debug(`Transaction rolled back: ${error instanceof Error ? error.message : String(error)}`);
        throw error;
      }
    });
    // The caller receives the rejection through `run`; the queue only needs to know it settled.
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  async ping(): Promise<boolean> {
    return true;
  }

  getProject(id: number): Promise<Project | null> {
    return this.view.getProject(id);
  }

  listProjects(filter?: ProjectFilter): Promise<Project[]> {
    return this.view.listProjects(filter);
  }

  getMilestone(id: number): Promise<Milestone | null> {
    return this.view.getMilestone(id);
  }

  listMilestones(projectId: number): Promise<Milestone[]> {
    return this.view.listMilestones(projectId);
  }

  listSubmissions(milestoneId: number): Promise<Submission[]> {
    return this.view.listSubmissions(milestoneId);
  }

  listActivity(projectId: number): Promise<ActivityLogEntry[]> {
    return this.view.listActivity(projectId);
  }

  listReviews(filter: ReviewFilter): Promise<Review[]> {
    return this.view.listReviews(filter);
  }
}
