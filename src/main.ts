import 'reflect-metadata';

import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';

import { AppModule } from './app.module';

async function bootstrap() {
    const app = await NestFactory.create(AppModule);
    const configService = app.get(ConfigService);
    const port = configService.get<number>('app.port') || 8088;
    const prefix = configService.get<string>('app.globalApiPrefix') || 'api/v1';
    const logger = new Logger('Bootstrap');

    app.enableCors();
    app.setGlobalPrefix(prefix);
    app.enableShutdownHooks();

    await app.listen(port);
    logger.log(`Workspace service is running on: http://localhost:${port}/${prefix}`);
}

bootstrap().catch((error: unknown) => {
    new Logger('Bootstrap').error(error instanceof Error ? error.stack ?? error.message : String(error));
    process.exit(1);
});
