import { FactoryProvider, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';

import { InMemoryWorkspaceStore } from './in-memory-workspace.store';
import { RedisWorkspaceStore } from './redis-workspace.store';
import { WORKSPACE_STORE, WorkspaceStore } from './workspace.store';

export function createWorkspaceStore(configService: ConfigService): WorkspaceStore {
    const logger = new Logger('WorkspaceStore');

    if (configService.get<string>('workspace.store') === 'memory') {
        logger.warn('Using the in-memory workspace store; data is lost on restart');
        return new InMemoryWorkspaceStore();
    }

    const url = configService.get<string>('redis.url') ?? 'redis://localhost:6379';
    const keyPrefix = configService.get<string>('redis.keyPrefix') ?? 'workspace:';
    logger.log(`Using the Redis workspace store (prefix "${keyPrefix}")`);
    return new RedisWorkspaceStore(new Redis(url), keyPrefix);
}

export const workspaceStoreProvider: FactoryProvider<WorkspaceStore> = {
    provide: WORKSPACE_STORE,
    inject: [ConfigService],
    useFactory: createWorkspaceStore,
};
