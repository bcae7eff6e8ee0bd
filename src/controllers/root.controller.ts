import { Controller, Get } from '@nestjs/common';

@Controller()
export class RootController {
    @Get()
    getApiInfo() {
        return {
            service: 'workspace-lifecycle',
            version: '1.0.0',
            endpoints: {
                health: '/api/v1/health',
                workspaces: '/api/v1/workspaces',
                milestones: '/api/v1/milestones',
                portfolio: '/api/v1/portfolio',
            },
        };
    }
}
