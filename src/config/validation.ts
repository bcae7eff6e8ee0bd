import { plainToClass } from 'class-transformer';
import { IsEnum, IsNumber, IsOptional, IsString, Matches, validateSync } from 'class-validator';

enum NodeEnv {
    Development = 'development',
    Production = 'production',
    Test = 'test',
}

enum StoreDriver {
    Redis = 'redis',
    Memory = 'memory',
}

class EnvironmentVariables {
    @IsEnum(NodeEnv)
    NODE_ENV: NodeEnv = NodeEnv.Development;

    @IsNumber()
    PORT: number = 8088;

    @IsString()
    GLOBAL_API_PREFIX: string = 'api/v1';

    @IsString()
    REDIS_HOST: string = 'localhost';

    @IsNumber()
    REDIS_PORT: number = 6379;

    @IsNumber()
    REDIS_DB: number = 0;

    @Matches(/^rediss?:\/\//)
    @IsOptional()
    REDIS_URL?: string;

    @IsString()
    REDIS_KEY_PREFIX: string = 'workspace:';

    @IsEnum(StoreDriver)
    WORKSPACE_STORE: StoreDriver = StoreDriver.Redis;

    @IsString()
    @IsOptional()
    API_KEY?: string;
}

export function validate(config: Record<string, unknown>) {
    const validatedConfig = plainToClass(EnvironmentVariables, config, {
        enableImplicitConversion: true,
    });
    const errors = validateSync(validatedConfig, {
        skipMissingProperties: false,
    });

    if (errors.length > 0) {
        throw new Error(errors.toString());
    }
    return validatedConfig;
}
