import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import TelegramBot = require('node-telegram-bot-api');
import { MENU_BOT_STORAGE } from '../app.constants';
import { readEnvironment, toMenuBotOptions } from '../config/environment';
import {
    MEDIA_AUDIT_CLIENT,
    MediaAuditService,
} from '../menu/media-audit.service';
import { EnvironmentModule } from '../root.module';
import { createMenuStorage } from '../storage/storage.factory';

@Module({
    imports: [EnvironmentModule],
    providers: [
        {
            provide: MENU_BOT_STORAGE,
            useFactory: (config: ConfigService) =>
                createMenuStorage(toMenuBotOptions(readEnvironment(config)).storage),
            inject: [ConfigService],
        },
        {
            provide: MEDIA_AUDIT_CLIENT,
            useFactory: (config: ConfigService) =>
                new TelegramBot(readEnvironment(config).BOT_TOKEN, {
                    polling: false,
                }),
            inject: [ConfigService],
        },
        MediaAuditService,
    ],
})
export class MediaAuditModule {}
