import {
    Inject,
    Injectable,
    Logger,
    OnApplicationBootstrap,
    OnModuleDestroy,
} from '@nestjs/common';
import TelegramBot = require('node-telegram-bot-api');
import { MENU_BOT_MODULE_OPTIONS, MENU_BOT_STORAGE } from '../app.constants';
import type {
    IMenuBotOptions,
    IMenuStorage,
    TMenuBotClient,
} from '../app.interface';
import { RankingClient } from '../search/ranking.client';
import { IMenuBotMessages, createMenuBotMessages } from './bot.messages';
import { MenuBotRuntime } from './menu-bot.runtime';

@Injectable()
export class MenuBotService implements OnApplicationBootstrap, OnModuleDestroy {
    private readonly logger = new Logger(MenuBotService.name);
    private readonly messages: IMenuBotMessages;
    private client?: TMenuBotClient;
    private runtime?: MenuBotRuntime;

    constructor(
        @Inject(MENU_BOT_MODULE_OPTIONS)
        private readonly options: IMenuBotOptions,
        @Inject(MENU_BOT_STORAGE)
        private readonly storage: IMenuStorage,
    ) {
        this.messages = createMenuBotMessages(options.messages);
    }

    /**
     * Opens storage, then starts the runtime. Polling begins last so no update
     * arrives before the handlers are registered.
     */
    public async onApplicationBootstrap(): Promise<void> {
        await this.storage.init();

        const client = new TelegramBot(this.options.token, { polling: false });
        const ranking = this.options.ranking?.apiKey
            ? new RankingClient(this.options.ranking)
            : undefined;

        this.client = client;
        this.runtime = new MenuBotRuntime(
            {
                client,
                storage: this.storage,
                ranking,
                adminIds: this.options.adminIds,
                feedbackChatId: this.options.feedbackChatId,
                searchTrigger: this.options.searchTrigger,
                session: this.options.session,
                sessionStorage: this.options.sessionStorage,
                middlewares: this.options.middlewares,
                messages: this.options.messages,
            },
            { logger: this.logger },
        );
        this.runtime.start();

        if (this.options.polling !== false) {
            await client.startPolling();
            this.logger.log(this.messages.pollingStarted());
        }
    }

    public async onModuleDestroy(): Promise<void> {
        if (this.client && this.options.polling !== false) {
            await this.client.stopPolling();
        }
        await this.storage.close();
    }

    public getRuntime(): MenuBotRuntime | undefined {
        return this.runtime;
    }
}
