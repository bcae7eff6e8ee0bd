import { Body, Controller, Get, Param, ParseIntPipe, Post, UseGuards } from '@nestjs/common';

import { ApiKeyGuard } from '../auth/api-key.guard';
import { ReviewsService } from '../reviews/reviews.service';
import { LeaveReviewRequest, Portfolio, Review } from '../types/workspace';
import { requireId, toHttpException } from './http-errors';

@Controller()
@UseGuards(ApiKeyGuard)
export class ReviewsController {
    constructor(private reviewsService: ReviewsService) {}

    @Post('workspaces/:id/reviews')
    async leaveReview(@Param('id', ParseIntPipe) id: number, @Body() body: LeaveReviewRequest): Promise<Review> {
        try {
            return await this.reviewsService.leaveReview(id, {
                reviewerId: requireId(body.reviewerId, 'reviewerId'),
                rating: body.rating,
                comment: body.comment,
            });
        } catch (e) {
            throw toHttpException(e);
        }
    }

    @Get('workspaces/:id/reviews')
    async listReviews(@Param('id', ParseIntPipe) id: number): Promise<Review[]> {
        return this.reviewsService.listProjectReviews(id);
    }

    @Get('portfolio/:freelancerId')
    async getPortfolio(@Param('freelancerId', ParseIntPipe) freelancerId: number): Promise<Portfolio> {
        return this.reviewsService.getPortfolio(freelancerId);
    }
}
