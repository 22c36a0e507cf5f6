import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { readEnvironment, resolveLogLevels } from './config/environment';
import { RootModule } from './root.module';

export async function bootstrap() {
    // LOG_LEVEL may come from .env, which is only loaded inside the context.
    const app = await NestFactory.createApplicationContext(RootModule, {
        bufferLogs: true,
    });
    const environment = readEnvironment(app.get(ConfigService));
    app.useLogger(resolveLogLevels(environment.LOG_LEVEL));
    app.enableShutdownHooks();
    return app;
}

if (require.main === module) {
    bootstrap().catch((err) => {
        Logger.error('Failed to start application', err);
        process.exit(1);
    });
}
