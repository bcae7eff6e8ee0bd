import { Inject, Injectable, Logger } from '@nestjs/common';

import { now, optionalText } from '../shared/utils';
import { WORKSPACE_STORE, WorkspaceStore } from '../store/workspace.store';
import { LeaveReviewRequest, Portfolio, PortfolioProject, Project, Review } from '../types/workspace';
import { ActivityFeedService } from '../workspace/activity-feed.service';
import { withActivity } from '../workspace/activity-log';
import {
  InvalidTransitionError,
  WorkspaceConflictError,
  WorkspaceNotFoundError,
  WorkspaceValidationError,
} from '../workspace/workspace.errors';

@Injectable()
export class ReviewsService {
  private readonly logger = new Logger(ReviewsService.name);

  constructor(
    @Inject(WORKSPACE_STORE) private readonly store: WorkspaceStore,
    private readonly feed: ActivityFeedService,
  ) {}

  /** Records one party's review of the other once the project is completed. */
  async leaveReview(projectId: number, req: LeaveReviewRequest): Promise<Review> {
    if (!Number.isInteger(req.rating) || req.rating < 1 || req.rating > 5) {
      throw new WorkspaceValidationError('Rating must be a whole number from 1 to 5');
    }
    const comment = optionalText(req.comment);

    const review = await withActivity(this.store, this.feed, async (tx, record) => {
      const project = await tx.getProject(projectId);
      if (!project) throw new WorkspaceNotFoundError('project', projectId);
      if (project.status !== 'completed') {
        throw new InvalidTransitionError(`Project #${projectId} is ${project.status}; only completed projects can be reviewed`);
      }

      const revieweeId = counterpartOf(project, req.reviewerId);
      const existing = await tx.listReviews({ projectId });
      if (existing.some(r => r.reviewerId === req.reviewerId)) {
        throw new WorkspaceConflictError(`User #${req.reviewerId} has already reviewed project #${projectId}`);
      }

      const review = await tx.insertReview({
        projectId,
        reviewerId: req.reviewerId,
        revieweeId,
        rating: req.rating,
        comment,
        createdAt: now(),
      });
      await record(projectId, req.reviewerId, 'review_submitted', `Review submitted (${req.rating}/5)`);
      return review;
    });

    this.logger.log(`User #${review.reviewerId} reviewed user #${review.revieweeId} on project #${projectId}`);
    return review;
  }

  async listProjectReviews(projectId: number): Promise<Review[]> {
    return this.store.listReviews({ projectId });
  }

  async getPortfolio(freelancerId: number): Promise<Portfolio> {
    const completed = await this.store.listProjects({ freelancerId, status: 'completed' });
    const reviews = await this.store.listReviews({ revieweeId: freelancerId });
    const byProject = new Map(reviews.map(r => [r.projectId, r]));

    const projects: PortfolioProject[] = completed
      .sort((a, b) => (b.completedAt ?? '').localeCompare(a.completedAt ?? '') || b.id - a.id)
      .map(project => {
        const review = byProject.get(project.id);
        return { project, rating: review?.rating ?? null, reviewComment: review?.comment ?? null };
      });

    const rated = projects.filter(p => p.rating !== null).map(p => p.rating ?? 0);
    const averageRating = rated.length
      ? Math.round((rated.reduce((sum, rating) => sum + rating, 0) / rated.length) * 100) / 100
      : null;

    return {
      freelancerId,
      projects,
      stats: { totalProjects: projects.length, totalReviews: rated.length, averageRating },
      reviews,
    };
  }
}

function counterpartOf(project: Project, reviewerId: number): number {
  if (reviewerId === project.clientId) return project.freelancerId;
  if (reviewerId === project.freelancerId) return project.clientId;
  throw new WorkspaceValidationError(`User #${reviewerId} is not a party to project #${project.id}`);
}
