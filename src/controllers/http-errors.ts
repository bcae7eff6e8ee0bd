import {
    BadRequestException,
    ConflictException,
    HttpException,
    NotFoundException,
} from '@nestjs/common';

import {
    InvalidTransitionError,
    WorkspaceConflictError,
    WorkspaceNotFoundError,
    WorkspaceValidationError,
} from '../workspace/workspace.errors';

/** Maps engine errors onto HTTP errors; anything else is returned unchanged. */
export function toHttpException(error: unknown): unknown {
    if (error instanceof HttpException) return error;
    if (error instanceof WorkspaceNotFoundError) return new NotFoundException(error.message);
    if (error instanceof WorkspaceValidationError) return new BadRequestException(error.message);
    if (error instanceof InvalidTransitionError || error instanceof WorkspaceConflictError) {
        return new ConflictException(error.message);
    }
    return error;
}

export function requireId(value: unknown, field: string): number {
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
        throw new BadRequestException(`${field} must be a positive integer`);
    }
    return value;
}
