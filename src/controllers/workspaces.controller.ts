import {
    Body,
    Controller,
    Get,
    HttpException,
    HttpStatus,
    Param,
    ParseIntPipe,
    Post,
    Query,
    Sse,
    UseGuards,
} from '@nestjs/common';
import { map, Observable } from 'rxjs';

import { ApiKeyGuard } from '../auth/api-key.guard';
import { requireText } from '../shared/utils';
import {
    ActivityLogEntry,
    CancelRequest,
    CreateWorkspaceRequest,
    DisputeRequest,
    Project,
    WorkspaceDetails,
} from '../types/workspace';
import { ActivityFeedService } from '../workspace/activity-feed.service';
import { WorkspaceService } from '../workspace/workspace.service';
import { requireId, toHttpException } from './http-errors';

@Controller('workspaces')
@UseGuards(ApiKeyGuard)
export class WorkspacesController {
    constructor(
        private workspaceService: WorkspaceService,
        private activityFeed: ActivityFeedService,
    ) {}

    @Post()
    async createWorkspace(@Body() body: CreateWorkspaceRequest): Promise<WorkspaceDetails> {
        const req: CreateWorkspaceRequest = {
            applicationId: requireId(body.applicationId, 'applicationId'),
            jobId: requireId(body.jobId, 'jobId'),
            freelancerId: requireId(body.freelancerId, 'freelancerId'),
            clientId: requireId(body.clientId, 'clientId'),
            milestones: body.milestones,
        };
        try {
            const projectId = await this.workspaceService.createWorkspace(req);
            return await this.getWorkspace(projectId);
        } catch (e) {
            throw toHttpException(e);
        }
    }

    @Get()
    async listWorkspaces(
        @Query('freelancerId') freelancerId?: string,
        @Query('clientId') clientId?: string,
    ): Promise<Project[]> {
        if (freelancerId) return this.workspaceService.listFreelancerWorkspaces(parseQueryId(freelancerId, 'freelancerId'));
        if (clientId) return this.workspaceService.listClientWorkspaces(parseQueryId(clientId, 'clientId'));
        throw new HttpException('freelancerId or clientId is required', HttpStatus.BAD_REQUEST);
    }

    @Get(':id')
    async getWorkspace(@Param('id', ParseIntPipe) id: number): Promise<WorkspaceDetails> {
        const workspace = await this.workspaceService.getWorkspace(id);
        if (!workspace) throw new HttpException('Workspace not found', HttpStatus.NOT_FOUND);
        return workspace;
    }

    @Post(':id/progress')
    async updateProgress(@Param('id', ParseIntPipe) id: number): Promise<{ progressPercentage: number }> {
        try {
            return { progressPercentage: await this.workspaceService.updateProgress(id) };
        } catch (e) {
            throw toHttpException(e);
        }
    }

    @Post(':id/dispute')
    async markDisputed(@Param('id', ParseIntPipe) id: number, @Body() body: DisputeRequest): Promise<WorkspaceDetails> {
        try {
            const reason = requireText(body.reason, 'Dispute reason');
            await this.workspaceService.markDisputed(id, requireId(body.userId, 'userId'), reason);
            return await this.getWorkspace(id);
        } catch (e) {
            throw toHttpException(e);
        }
    }

    @Post(':id/cancel')
    async cancelProject(@Param('id', ParseIntPipe) id: number, @Body() body: CancelRequest): Promise<WorkspaceDetails> {
        try {
            await this.workspaceService.cancelProject(id, requireId(body.userId, 'userId'), body.reason);
            return await this.getWorkspace(id);
        } catch (e) {
            throw toHttpException(e);
        }
    }

    @Get(':id/activity')
    async getActivityLog(@Param('id', ParseIntPipe) id: number): Promise<ActivityLogEntry[]> {
        return this.workspaceService.getActivityLog(id);
    }

    @Sse(':id/activity/stream')
    activityStream(@Param('id', ParseIntPipe) id: number): Observable<{ data: string }> {
        return this.activityFeed.forProject(id).pipe(
            map((entry: ActivityLogEntry) => ({
                data: JSON.stringify(entry),
            })),
        );
    }
}

function parseQueryId(value: string, field: string): number {
    return requireId(Number(value), field);
}
