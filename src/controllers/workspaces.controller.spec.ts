import { BadRequestException, ConflictException, HttpException, NotFoundException } from '@nestjs/common';
import { firstValueFrom, take, toArray } from 'rxjs';

import { InMemoryWorkspaceStore } from '../store/in-memory-workspace.store';
import { ActivityLogEntry, WorkspaceDetails } from '../types/workspace';
import { ActivityFeedService } from '../workspace/activity-feed.service';
import { InvalidTransitionError, WorkspaceNotFoundError } from '../workspace/workspace.errors';
import { WorkspaceService } from '../workspace/workspace.service';
import { WorkspacesController } from './workspaces.controller';

describe('WorkspacesController', () => {
    let controller: WorkspacesController;
    let mockWorkspaceService: jest.Mocked<
        Pick<
            WorkspaceService,
            | 'createWorkspace'
            | 'getWorkspace'
            | 'listFreelancerWorkspaces'
            | 'listClientWorkspaces'
            | 'updateProgress'
            | 'markDisputed'
            | 'cancelProject'
            | 'getActivityLog'
        >
    >;
    let feed: ActivityFeedService;

    const mockWorkspace: WorkspaceDetails = {
        project: {
            id: 1,
            jobId: 5,
            applicationId: 10,
            freelancerId: 3,
            clientId: 7,
            status: 'active',
            progressPercentage: 0,
            createdAt: '2026-01-01T00:00:00.000Z',
            completedAt: null,
        },
        milestones: [],
    };

    const entry = (id: number, projectId: number): ActivityLogEntry => ({
        id,
        projectId,
        userId: 3,
        activityType: 'deliverable_submitted',
        description: `Deliverable v1 submitted for milestone #${id}`,
        createdAt: '2026-01-01T00:00:00.000Z',
    });

    beforeEach(() => {
        mockWorkspaceService = {
            createWorkspace: jest.fn(),
            getWorkspace: jest.fn(),
            listFreelancerWorkspaces: jest.fn(),
            listClientWorkspaces: jest.fn(),
            updateProgress: jest.fn(),
            markDisputed: jest.fn(),
            cancelProject: jest.fn(),
            getActivityLog: jest.fn(),
        };
        feed = new ActivityFeedService();
        controller = new WorkspacesController(mockWorkspaceService as unknown as WorkspaceService, feed);
    });

    describe('createWorkspace', () => {
        it('creates the workspace and returns its details', async () => {
            mockWorkspaceService.createWorkspace.mockResolvedValue(1);
            mockWorkspaceService.getWorkspace.mockResolvedValue(mockWorkspace);

            const result = await controller.createWorkspace({ applicationId: 10, jobId: 5, freelancerId: 3, clientId: 7 });

            expect(result).toEqual(mockWorkspace);
            expect(mockWorkspaceService.createWorkspace).toHaveBeenCalledWith({
                applicationId: 10,
                jobId: 5,
                freelancerId: 3,
                clientId: 7,
                milestones: undefined,
            });
        });

        it('rejects a body without a client id', async () => {
            const body = JSON.parse('{"applicationId": 10, "jobId": 5, "freelancerId": 3}');

            await expect(controller.createWorkspace(body)).rejects.toThrow('clientId must be a positive integer');
            expect(mockWorkspaceService.createWorkspace).not.toHaveBeenCalled();
        });

        it.each([{}, 'abc', [{ name: 5 }], [null]])('answers malformed milestones %p with 400', async milestones => {
            const store = new InMemoryWorkspaceStore();
            const service = new WorkspaceService(store, feed);
            const realController = new WorkspacesController(service, feed);
            const body = JSON.parse(JSON.stringify({ applicationId: 10, jobId: 5, freelancerId: 3, clientId: 7, milestones }));

            await expect(realController.createWorkspace(body)).rejects.toThrow(BadRequestException);
            expect(await service.listClientWorkspaces(7)).toEqual([]);
        });
    });

    describe('listWorkspaces', () => {
        it('lists active workspaces of a freelancer', async () => {
            mockWorkspaceService.listFreelancerWorkspaces.mockResolvedValue([mockWorkspace.project]);

            const result = await controller.listWorkspaces('3', undefined);

            expect(result).toEqual([mockWorkspace.project]);
            expect(mockWorkspaceService.listFreelancerWorkspaces).toHaveBeenCalledWith(3);
        });

        it('lists workspaces of a client', async () => {
            mockWorkspaceService.listClientWorkspaces.mockResolvedValue([]);

            await controller.listWorkspaces(undefined, '7');

            expect(mockWorkspaceService.listClientWorkspaces).toHaveBeenCalledWith(7);
        });

        it('requires one of the two filters', async () => {
            await expect(controller.listWorkspaces(undefined, undefined)).rejects.toThrow(HttpException);
        });

        it('rejects a malformed id', async () => {
            await expect(controller.listWorkspaces('abc', undefined)).rejects.toThrow(BadRequestException);
        });
    });

    describe('getWorkspace', () => {
        it('returns 404 when the workspace does not exist', async () => {
            mockWorkspaceService.getWorkspace.mockResolvedValue(null);

            await expect(controller.getWorkspace(9)).rejects.toThrow('Workspace not found');
        });
    });

    describe('updateProgress', () => {
        it('returns the recomputed percentage', async () => {
            mockWorkspaceService.updateProgress.mockResolvedValue(75);

            expect(await controller.updateProgress(1)).toEqual({ progressPercentage: 75 });
        });

        it('maps a missing project to 404', async () => {
            mockWorkspaceService.updateProgress.mockRejectedValue(new WorkspaceNotFoundError('project', 9));

            await expect(controller.updateProgress(9)).rejects.toThrow(NotFoundException);
        });
    });

    describe('markDisputed', () => {
        it('delegates with the trimmed reason', async () => {
            mockWorkspaceService.markDisputed.mockResolvedValue(undefined);
            mockWorkspaceService.getWorkspace.mockResolvedValue(mockWorkspace);

            await controller.markDisputed(1, { userId: 7, reason: ' Late delivery ' });

            expect(mockWorkspaceService.markDisputed).toHaveBeenCalledWith(1, 7, 'Late delivery');
        });

        it('requires a reason', async () => {
            await expect(controller.markDisputed(1, { userId: 7, reason: '' })).rejects.toThrow(BadRequestException);
            expect(mockWorkspaceService.markDisputed).not.toHaveBeenCalled();
        });
    });

    describe('cancelProject', () => {
        it('maps a refused transition to 409', async () => {
            mockWorkspaceService.cancelProject.mockRejectedValue(new InvalidTransitionError('Project #1 is completed'));

            await expect(controller.cancelProject(1, { userId: 7 })).rejects.toThrow(ConflictException);
        });

        it('passes unexpected errors through', async () => {
            const failure = new Error('connection reset');
            mockWorkspaceService.cancelProject.mockRejectedValue(failure);

            await expect(controller.cancelProject(1, { userId: 7 })).rejects.toBe(failure);
        });
    });

    describe('activityStream', () => {
        it('emits the entries of the requested project as SSE payloads', async () => {
            const events = firstValueFrom(controller.activityStream(1).pipe(take(2), toArray()));

            feed.publish([entry(1, 1), entry(2, 2), entry(3, 1)]);

            expect(await events).toEqual([{ data: JSON.stringify(entry(1, 1)) }, { data: JSON.stringify(entry(3, 1)) }]);
        });

        it('does not replay entries published before subscribing', async () => {
            feed.publish([entry(1, 1)]);
            const received: string[] = [];
            const subscription = controller.activityStream(1).subscribe(event => received.push(event.data));
            subscription.unsubscribe();

            expect(received).toEqual([]);
        });
    });
});
