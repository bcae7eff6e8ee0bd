import { Body, Controller, Get, Param, ParseIntPipe, Post, UseGuards } from '@nestjs/common';

import { ApiKeyGuard } from '../auth/api-key.guard';
import {
    ApproveMilestoneRequest,
    Milestone,
    RequestRevisionRequest,
    Submission,
    SubmitDeliverableRequest,
} from '../types/workspace';
import { WorkspaceService } from '../workspace/workspace.service';
import { requireId, toHttpException } from './http-errors';

@Controller('milestones')
@UseGuards(ApiKeyGuard)
export class MilestonesController {
    constructor(private workspaceService: WorkspaceService) {}

    @Get(':id/submissions')
    async listSubmissions(@Param('id', ParseIntPipe) id: number): Promise<Submission[]> {
        return this.workspaceService.listSubmissions(id);
    }

    @Post(':id/submissions')
    async submitDeliverable(
        @Param('id', ParseIntPipe) id: number,
        @Body() body: SubmitDeliverableRequest,
    ): Promise<Submission[]> {
        try {
            await this.workspaceService.submitDeliverable(
                id,
                requireId(body.freelancerId, 'freelancerId'),
                body.description,
                body.fileRef,
            );
            return await this.workspaceService.listSubmissions(id);
        } catch (e) {
            throw toHttpException(e);
        }
    }

    @Post(':id/approve')
    async approveMilestone(
        @Param('id', ParseIntPipe) id: number,
        @Body() body: ApproveMilestoneRequest,
    ): Promise<{ milestone: Milestone | null; progressPercentage: number }> {
        try {
            const progressPercentage = await this.workspaceService.approveMilestone(
                id,
                requireId(body.clientId, 'clientId'),
                body.feedback,
            );
            return { milestone: await this.workspaceService.getMilestone(id), progressPercentage };
        } catch (e) {
            throw toHttpException(e);
        }
    }

    @Post(':id/revision')
    async requestRevision(
        @Param('id', ParseIntPipe) id: number,
        @Body() body: RequestRevisionRequest,
    ): Promise<{ milestone: Milestone | null }> {
        try {
            await this.workspaceService.requestRevision(id, requireId(body.clientId, 'clientId'), body.feedback);
            return { milestone: await this.workspaceService.getMilestone(id) };
        } catch (e) {
            throw toHttpException(e);
        }
    }
}
