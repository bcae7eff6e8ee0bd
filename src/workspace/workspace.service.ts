import { Inject, Injectable, Logger } from '@nestjs/common';

import { now, optionalText, requireText } from '../shared/utils';
import { WORKSPACE_STORE, WorkspaceStore, WorkspaceTransaction } from '../store/workspace.store';
import {
  ActivityLogEntry,
  CreateWorkspaceRequest,
  Milestone,
  Project,
  ProjectPatch,
  Submission,
  WorkspaceDetails,
} from '../types/workspace';
import { ActivityFeedService } from './activity-feed.service';
import { withActivity } from './activity-log';
import { computeProgress, resolveMilestoneTemplates } from './milestones';
import { InvalidTransitionError, WorkspaceNotFoundError } from './workspace.errors';

interface ProgressUpdate {
  progress: number;
  completed: boolean;
}

@Injectable()
export class WorkspaceService {
  private readonly logger = new Logger(WorkspaceService.name);

  constructor(
    @Inject(WORKSPACE_STORE) private readonly store: WorkspaceStore,
    private readonly feed: ActivityFeedService,
  ) {}

  // --- Lifecycle ---

  /**
   * Opens the workspace for an accepted application: the project, its
   * milestones (the default four unless the caller lists its own) and the
   * `workspace_created` entry are written together.
   */
  async createWorkspace(req: CreateWorkspaceRequest): Promise<number> {
    const templates = resolveMilestoneTemplates(req.milestones);

    const projectId = await withActivity(this.store, this.feed, async (tx, record) => {
      const project = await tx.insertProject({
        jobId: req.jobId,
        applicationId: req.applicationId,
        freelancerId: req.freelancerId,
        clientId: req.clientId,
        status: 'active',
        progressPercentage: 0,
        createdAt: now(),
        completedAt: null,
      });

      for (const [index, template] of templates.entries()) {
        await tx.insertMilestone({
          projectId: project.id,
          name: template.name.trim(),
          description: template.description ?? '',
          status: 'pending',
          orderNumber: index + 1,
          dueDate: template.dueDate ?? null,
        });
      }

      await record(
        project.id,
        req.freelancerId,
        'workspace_created',
        `Workspace created for application #${req.applicationId}`,
      );
      return project.id;
    });

    this.logger.log(`Created workspace #${projectId} for application #${req.applicationId} (${templates.length} milestones)`);
    return projectId;
  }

  async submitDeliverable(
    milestoneId: number,
    freelancerId: number,
    description: string,
    fileRef?: string | null,
  ): Promise<number> {
    const text = requireText(description, 'Deliverable description');

    const submission = await withActivity(this.store, this.feed, async (tx, record) => {
      const milestone = await this.requireMilestone(tx, milestoneId);
      const [latest] = await tx.listSubmissions(milestoneId);
      const versionNumber = (latest?.versionNumber ?? 0) + 1;

      const submission = await tx.insertSubmission({
        milestoneId,
        description: text,
        fileRef: optionalText(fileRef),
        versionNumber,
        submittedAt: now(),
        clientFeedback: null,
      });

      // Approved milestones keep their status; the new version is still recorded
      if (milestone.status !== 'approved') {
        await tx.updateMilestone(milestoneId, { status: 'submitted' });
      }

      await record(
        milestone.projectId,
        freelancerId,
        'deliverable_submitted',
        `Deliverable v${versionNumber} submitted for milestone #${milestoneId}`,
      );
      return submission;
    });

    this.logger.log(`Recorded deliverable v${submission.versionNumber} for milestone #${milestoneId}`);
    return submission.id;
  }

  /** Approves the milestone and returns the project's recomputed progress. */
  async approveMilestone(milestoneId: number, clientId: number, feedback?: string | null): Promise<number> {
    const note = optionalText(feedback);

    const update = await withActivity(this.store, this.feed, async (tx, record) => {
      const milestone = await this.requireMilestone(tx, milestoneId);
      await tx.updateMilestone(milestoneId, { status: 'approved' });
      if (note) await this.attachFeedback(tx, milestoneId, note);

      const update = await this.recomputeProgress(tx, milestone.projectId);
      await record(milestone.projectId, clientId, 'milestone_approved', `Milestone #${milestoneId} approved`);
      return { ...update, projectId: milestone.projectId };
    });

    this.logger.log(`Approved milestone #${milestoneId}; project #${update.projectId} at ${update.progress}%`);
    if (update.completed) this.logger.log(`Project #${update.projectId} completed`);
    return update.progress;
  }

  async requestRevision(milestoneId: number, clientId: number, feedback: string): Promise<void> {
    const note = requireText(feedback, 'Revision feedback');

    await withActivity(this.store, this.feed, async (tx, record) => {
      const milestone = await this.requireMilestone(tx, milestoneId);
      if (milestone.status === 'approved') {
        this.logger.warn(`Revision refused for milestone #${milestoneId}: already approved`);
        throw new InvalidTransitionError(`Milestone #${milestoneId} is already approved`);
      }

      await tx.updateMilestone(milestoneId, { status: 'revision_requested' });
      await this.attachFeedback(tx, milestoneId, note);
      await record(
        milestone.projectId,
        clientId,
        'revision_requested',
        `Revision requested for milestone #${milestoneId}`,
      );
    });

    this.logger.log(`Revision requested for milestone #${milestoneId}`);
  }

  async updateProgress(projectId: number): Promise<number> {
    const update = await this.store.transaction(async tx => {
      await this.requireProject(tx, projectId);
      return this.recomputeProgress(tx, projectId);
    });
    if (update.completed) this.logger.log(`Project #${projectId} completed`);
    return update.progress;
  }

  async markDisputed(projectId: number, userId: number, reason: string): Promise<void> {
    await withActivity(this.store, this.feed, async (tx, record) => {
      await this.requireProject(tx, projectId);
      await tx.updateProject(projectId, { status: 'disputed' });
      await record(projectId, userId, 'project_disputed', `Project marked as disputed: ${reason}`);
    });
    this.logger.log(`Project #${projectId} marked as disputed by user #${userId}`);
  }

  async cancelProject(projectId: number, userId: number, reason?: string | null): Promise<void> {
    const note = optionalText(reason);

    await withActivity(this.store, this.feed, async (tx, record) => {
      const project = await this.requireProject(tx, projectId);
      if (project.status !== 'active') {
        this.logger.warn(`Cancellation refused for project #${projectId}: status is ${project.status}`);
        throw new InvalidTransitionError(`Project #${projectId} is ${project.status} and cannot be cancelled`);
      }

      await tx.updateProject(projectId, { status: 'cancelled' });
      await record(projectId, userId, 'project_cancelled', note ? `Project cancelled: ${note}` : 'Project cancelled');
    });
    this.logger.log(`Project #${projectId} cancelled by user #${userId}`);
  }

  // --- Queries ---

  async getWorkspace(projectId: number): Promise<WorkspaceDetails | null> {
    const project = await this.store.getProject(projectId);
    if (!project) return null;
    return { project, milestones: await this.store.listMilestones(projectId) };
  }

  async listFreelancerWorkspaces(freelancerId: number): Promise<Project[]> {
    return this.store.listProjects({ freelancerId, status: 'active' });
  }

  async listClientWorkspaces(clientId: number): Promise<Project[]> {
    return this.store.listProjects({ clientId });
  }

  async getMilestone(milestoneId: number): Promise<Milestone | null> {
    return this.store.getMilestone(milestoneId);
  }

  async listSubmissions(milestoneId: number): Promise<Submission[]> {
    return this.store.listSubmissions(milestoneId);
  }

  async getActivityLog(projectId: number): Promise<ActivityLogEntry[]> {
    return this.store.listActivity(projectId);
  }

  // --- Helpers ---

  private async requireProject(tx: WorkspaceTransaction, projectId: number): Promise<Project> {
    const project = await tx.getProject(projectId);
    if (!project) throw new WorkspaceNotFoundError('project', projectId);
    return project;
  }

  private async requireMilestone(tx: WorkspaceTransaction, milestoneId: number): Promise<Milestone> {
    const milestone = await tx.getMilestone(milestoneId);
    if (!milestone) throw new WorkspaceNotFoundError('milestone', milestoneId);
    return milestone;
  }

  private async attachFeedback(tx: WorkspaceTransaction, milestoneId: number, feedback: string): Promise<void> {
    const [latest] = await tx.listSubmissions(milestoneId);
    if (latest) await tx.setSubmissionFeedback(latest.id, feedback);
  }

  private async recomputeProgress(tx: WorkspaceTransaction, projectId: number): Promise<ProgressUpdate> {
    const project = await this.requireProject(tx, projectId);
    const progress = computeProgress(await tx.listMilestones(projectId));

    const patch: ProjectPatch = { progressPercentage: progress };
    // Disputed and cancelled projects keep their status at 100%
    const completed = progress === 100 && project.status === 'active';
    if (completed) {
      patch.status = 'completed';
      patch.completedAt = now();
    }

    await tx.updateProject(projectId, patch);
    return { progress, completed };
  }
}
