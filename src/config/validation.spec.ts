import 'reflect-metadata';

import { validate } from './validation';

describe('validate', () => {
    describe('valid configurations', () => {
        it('applies default values when fields are omitted', () => {
            const result = validate({});

            expect(result.NODE_ENV).toBe('development');
            expect(result.PORT).toBe(8088);
            expect(result.GLOBAL_API_PREFIX).toBe('api/v1');
            expect(result.REDIS_HOST).toBe('localhost');
            expect(result.REDIS_PORT).toBe(6379);
            expect(result.REDIS_DB).toBe(0);
            expect(result.REDIS_KEY_PREFIX).toBe('workspace:');
            expect(result.WORKSPACE_STORE).toBe('redis');
            expect(result.API_KEY).toBeUndefined();
        });

        it('accepts all valid NODE_ENV values', () => {
            for (const env of ['development', 'production', 'test']) {
                expect(validate({ NODE_ENV: env }).NODE_ENV).toBe(env);
            }
        });

        it('converts string numbers via implicit conversion', () => {
            const result = validate({ PORT: '9090', REDIS_PORT: '6380' });
            expect(result.PORT).toBe(9090);
            expect(result.REDIS_PORT).toBe(6380);
        });

        it('accepts the in-memory store', () => {
            expect(validate({ WORKSPACE_STORE: 'memory' }).WORKSPACE_STORE).toBe('memory');
        });

        it('accepts redis and rediss urls', () => {
            expect(validate({ REDIS_URL: 'redis://localhost:6379/0' }).REDIS_URL).toBe('redis://localhost:6379/0');
            expect(validate({ REDIS_URL: 'rediss://cache:6380' }).REDIS_URL).toBe('rediss://cache:6380');
        });
    });

    describe('invalid configurations', () => {
        it('rejects an unknown NODE_ENV', () => {
            expect(() => validate({ NODE_ENV: 'staging' })).toThrow(/NODE_ENV/);
        });

        it('rejects a non-numeric PORT', () => {
            expect(() => validate({ PORT: 'not-a-port' })).toThrow(/PORT/);
        });

        it('rejects an unknown store driver', () => {
            expect(() => validate({ WORKSPACE_STORE: 'postgres' })).toThrow(/WORKSPACE_STORE/);
        });

        it('rejects a REDIS_URL with another scheme', () => {
            expect(() => validate({ REDIS_URL: 'http://localhost:6379' })).toThrow(/REDIS_URL/);
        });
    });
});
