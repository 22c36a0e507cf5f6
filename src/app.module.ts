import { DynamicModule, Module, Provider } from '@nestjs/common';
import { MENU_BOT_MODULE_OPTIONS, MENU_BOT_STORAGE } from './app.constants';
import type { IMenuBotModuleAsyncOptions, IMenuBotOptions } from './app.interface';
import { MenuBotService } from './bot/menu-bot.service';
import { createMenuStorage } from './storage/storage.factory';

@Module({})
export class MenuBotModule {
    /**
     * Resolves bot options through the consumer's factory, then builds the
     * storage driver they describe.
     */
    static forRootAsync(options: IMenuBotModuleAsyncOptions): DynamicModule {
        return {
            module: MenuBotModule,
            imports: options.imports ?? [],
            providers: [
                this.createAsyncOptionsProvider(options),
                this.createStorageProvider(),
                MenuBotService,
            ],
            exports: [MenuBotService, MENU_BOT_MODULE_OPTIONS, MENU_BOT_STORAGE],
        };
    }

    private static createAsyncOptionsProvider(
        options: IMenuBotModuleAsyncOptions,
    ): Provider {
        return {
            provide: MENU_BOT_MODULE_OPTIONS,
            useFactory: (...args: unknown[]) => options.useFactory(...args),
            inject: options.inject ?? [],
        };
    }

    private static createStorageProvider(): Provider {
        return {
            provide: MENU_BOT_STORAGE,
            useFactory: (options: IMenuBotOptions) =>
                createMenuStorage(options.storage),
            inject: [MENU_BOT_MODULE_OPTIONS],
        };
    }
}
