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

export const WORKSPACE_STORE = Symbol('WORKSPACE_STORE');

/**
 * Read side of the store. Lists come back in a stable order:
 * milestones by order number, submissions by version (highest first),
 * activity newest first, projects newest first.
 */
export interface WorkspaceReader {
  getProject(id: number): Promise<Project | null>;
  listProjects(filter?: ProjectFilter): Promise<Project[]>;
  getMilestone(id: number): Promise<Milestone | null>;
  listMilestones(projectId: number): Promise<Milestone[]>;
  listSubmissions(milestoneId: number): Promise<Submission[]>;
  listActivity(projectId: number): Promise<ActivityLogEntry[]>;
  listReviews(filter: ReviewFilter): Promise<Review[]>;
}

/**
 * Unit of work handed to {@link WorkspaceStore.transaction}. Writes become
 * visible to later reads of the same transaction and to everyone else only
 * once the work resolves. Activity entries can be appended but never changed.
 */
export interface WorkspaceTransaction extends WorkspaceReader {
  insertProject(data: NewProject): Promise<Project>;
  updateProject(id: number, patch: ProjectPatch): Promise<Project>;
  insertMilestone(data: NewMilestone): Promise<Milestone>;
  updateMilestone(id: number, patch: MilestonePatch): Promise<Milestone>;
  insertSubmission(data: NewSubmission): Promise<Submission>;
  setSubmissionFeedback(id: number, feedback: string): Promise<Submission>;
  appendActivity(data: NewActivityLogEntry): Promise<ActivityLogEntry>;
  insertReview(data: NewReview): Promise<Review>;
}

export interface WorkspaceStore extends WorkspaceReader {
  /** Runs `work` atomically. A rejected `work` leaves the store untouched. */
  transaction<T>(work: (tx: WorkspaceTransaction) => Promise<T>): Promise<T>;
  ping(): Promise<boolean>;
}

export function byNewest<T extends { id: number; createdAt: string }>(a: T, b: T): number {
  return b.createdAt.localeCompare(a.createdAt) || b.id - a.id;
}

export function matchesProjectFilter(project: Project, filter?: ProjectFilter): boolean {
  if (filter?.freelancerId !== undefined && project.freelancerId !== filter.freelancerId) return false;
  if (filter?.clientId !== undefined && project.clientId !== filter.clientId) return false;
  if (filter?.status && project.status !== filter.status) return false;
  return true;
}
