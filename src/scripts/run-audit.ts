import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { MENU_BOT_STORAGE } from '../app.constants';
import type { IMenuStorage } from '../app.interface';
import { MediaAuditService } from '../menu/media-audit.service';
import { MediaAuditModule } from './media-audit.module';

/**
 * Boots a minimal context with storage and a non-polling client, runs one
 * audit and prints its report lines to stdout.
 */
export const runAudit = async (
    name: string,
    audit: (service: MediaAuditService) => Promise<string[]>,
): Promise<void> => {
    const app = await NestFactory.createApplicationContext(MediaAuditModule, {
        logger: ['error', 'warn'],
    });
    const storage = app.get<IMenuStorage>(MENU_BOT_STORAGE);

    try {
        await storage.init();
        const lines = await audit(app.get(MediaAuditService));
        process.stdout.write(lines.length > 0 ? `${lines.join('\n')}\n` : '');
    } catch (error) {
        Logger.error(`${name} failed`, error instanceof Error ? error.stack : String(error));
        process.exitCode = 1;
    } finally {
        await storage.close();
        await app.close();
    }
};
