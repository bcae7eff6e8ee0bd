export type ProjectStatus = 'active' | 'completed' | 'cancelled' | 'disputed';
export type MilestoneStatus = 'pending' | 'submitted' | 'revision_requested' | 'approved';
export type ActivityType =
  | 'workspace_created'
  | 'deliverable_submitted'
  | 'milestone_approved'
  | 'revision_requested'
  | 'project_disputed'
  | 'project_cancelled'
  | 'review_submitted';

export interface Project {
  id: number;
  jobId: number;
  applicationId: number;
  freelancerId: number;
  clientId: number;
  status: ProjectStatus;
  progressPercentage: number;
  createdAt: string;
  completedAt: string | null;
}

export interface Milestone {
  id: number;
  projectId: number;
  name: string;
  description: string;
  status: MilestoneStatus;
  orderNumber: number;
  dueDate: string | null;
}

export interface Submission {
  id: number;
  milestoneId: number;
  description: string;
  fileRef: string | null;
  versionNumber: number;
  submittedAt: string;
  clientFeedback: string | null;
}

export interface ActivityLogEntry {
  readonly id: number;
  readonly projectId: number;
  readonly userId: number;
  readonly activityType: ActivityType;
  readonly description: string;
  readonly createdAt: string;
}

export interface Review {
  id: number;
  projectId: number;
  reviewerId: number;
  revieweeId: number;
  rating: number;
  comment: string | null;
  createdAt: string;
}

export interface MilestoneTemplate {
  name: string;
  description?: string;
  dueDate?: string | null;
}

export interface WorkspaceDetails {
  project: Project;
  milestones: Milestone[];
}

// Insert shapes: the store allocates ids

export type NewProject = Omit<Project, 'id'>;
export type NewMilestone = Omit<Milestone, 'id'>;
export type NewSubmission = Omit<Submission, 'id'>;
export type NewActivityLogEntry = Omit<ActivityLogEntry, 'id'>;
export type NewReview = Omit<Review, 'id'>;

export type ProjectPatch = Partial<Pick<Project, 'status' | 'progressPercentage' | 'completedAt'>>;
export type MilestonePatch = Partial<Pick<Milestone, 'status'>>;

export interface ProjectFilter {
  freelancerId?: number;
  clientId?: number;
  status?: ProjectStatus;
}

export interface ReviewFilter {
  projectId?: number;
  revieweeId?: number;
}

// Request DTOs

export interface CreateWorkspaceRequest {
  applicationId: number;
  jobId: number;
  freelancerId: number;
  clientId: number;
  milestones?: MilestoneTemplate[];
}

export interface SubmitDeliverableRequest {
  freelancerId: number;
  description: string;
  fileRef?: string | null;
}

export interface ApproveMilestoneRequest {
  clientId: number;
  feedback?: string;
}

export interface RequestRevisionRequest {
  clientId: number;
  feedback: string;
}

export interface DisputeRequest {
  userId: number;
  reason: string;
}

export interface CancelRequest {
  userId: number;
  reason?: string;
}

export interface LeaveReviewRequest {
  reviewerId: number;
  rating: number;
  comment?: string | null;
}

// Portfolio

export interface PortfolioProject {
  project: Project;
  rating: number | null;
  reviewComment: string | null;
}

export interface PortfolioStats {
  totalProjects: number;
  totalReviews: number;
  averageRating: number | null;
}

export interface Portfolio {
  freelancerId: number;
  projects: PortfolioProject[];
  stats: PortfolioStats;
  reviews: Review[];
}
