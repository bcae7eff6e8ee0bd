import { registerAs } from '@nestjs/config';

export const appConfig = registerAs('app', () => ({
    nodeEnv: process.env.NODE_ENV || 'development',
    port: parseInt(process.env.PORT || '8088', 10),
    globalApiPrefix: process.env.GLOBAL_API_PREFIX || 'api/v1',
    apiKey: process.env.API_KEY,
}));

export const redisConfig = registerAs('redis', () => ({
    url: process.env.REDIS_URL || `redis://${process.env.REDIS_HOST || 'localhost'}:${process.env.REDIS_PORT || '6379'}/${process.env.REDIS_DB || '0'}`,
    keyPrefix: process.env.REDIS_KEY_PREFIX || 'workspace:',
}));

export const workspaceConfig = registerAs('workspace', () => ({
    store: process.env.WORKSPACE_STORE === 'memory' ? 'memory' : 'redis',
}));
