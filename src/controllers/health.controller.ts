import { Controller, Get, Inject } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { WORKSPACE_STORE, WorkspaceStore } from '../store/workspace.store';

@Controller('health')
export class HealthController {
    constructor(
        private configService: ConfigService,
        @Inject(WORKSPACE_STORE) private store: WorkspaceStore,
    ) {}

    @Get()
    async health() {
        const driver = this.configService.get<string>('workspace.store') ?? 'redis';
        const storeUp = await this.store.ping();

        return {
            status: storeUp ? 'ok' : 'degraded',
            service: 'workspace-lifecycle',
            timestamp: new Date().toISOString(),
            dependencies: {
                [driver]: storeUp ? 'up' : 'down',
            },
        };
    }
}
