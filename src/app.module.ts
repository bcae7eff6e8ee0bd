import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { appConfig, redisConfig, workspaceConfig } from './config/config';
import { validate } from './config/validation';
import { HealthController } from './controllers/health.controller';
import { MilestonesController } from './controllers/milestones.controller';
import { ReviewsController } from './controllers/reviews.controller';
import { RootController } from './controllers/root.controller';
import { WorkspacesController } from './controllers/workspaces.controller';
import { ReviewsService } from './reviews/reviews.service';
import { workspaceStoreProvider } from './store/store.provider';
import { ActivityFeedService } from './workspace/activity-feed.service';
import { WorkspaceService } from './workspace/workspace.service';

@Module({
    imports: [
        ConfigModule.forRoot({
            isGlobal: true,
            validate,
            load: [appConfig, redisConfig, workspaceConfig],
        }),
    ],
    controllers: [RootController, HealthController, WorkspacesController, MilestonesController, ReviewsController],
    providers: [workspaceStoreProvider, ActivityFeedService, WorkspaceService, ReviewsService],
})
export class AppModule { }
