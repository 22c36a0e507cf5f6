import { Logger } from '@nestjs/common';
import type TelegramBot from 'node-telegram-bot-api';
import { MAX_SEARCH_RESULTS, MIN_SEARCH_QUERY_LENGTH } from '../app.constants';
import type {
    IChatSession,
    IMenuBotOptions,
    IMenuBotUpdateContext,
    IMenuStorage,
    TMenuBotClient,
    TMenuBotEvent,
} from '../app.interface';
import { AuthoringExecutor } from '../authoring/authoring.executor';
import { advanceAuthoring } from '../authoring/authoring.machine';
import {
    IDLE_STAGE,
    TAuthoringInput,
    TAuthoringStage,
    isAuthoringStage,
    returnNodeOf,
} from '../authoring/authoring.state';
import { ContentStepNotFoundError, isNotFoundError } from '../errors';
import { FeedbackService } from '../feedback/feedback.service';
import {
    TMenuCommand,
    TMenuCommandTag,
    isAdminCommand,
    parseMenuCommand,
} from '../menu/callback-token';
import { ContentDelivery } from '../menu/content-delivery';
import { IViewer, KeyboardBuilder } from '../menu/keyboard.builder';
import { MenuTreeReader, renderStepTexts } from '../menu/menu-tree.reader';
import type { IRankingClient } from '../search/ranking.client';
import { SearchService } from '../search/search.service';
import {
    IMenuBotMessages,
    MenuBotMessageFactory,
    createMenuBotMessages,
} from './bot.messages';
import {
    buildMiddlewarePipeline,
    createUpdateLoggerMiddleware,
} from './runtime/middleware-pipeline';
import { parseBotCommand, toAuthoringInput } from './runtime/message-input';
import { SessionManager, createSessionManager } from './runtime/session-manager';

export interface MenuBotRuntimeOptions
    extends Omit<IMenuBotOptions, 'token' | 'storage' | 'ranking' | 'polling'> {
    client: TMenuBotClient;
    storage: IMenuStorage;
    ranking?: IRankingClient;
}

export interface MenuBotRuntimeDependencies {
    logger?: Logger;
    messageFactory?: MenuBotMessageFactory;
    sessionManager?: SessionManager;
    /** Overrides the pause between content steps. */
    sleep?: (ms: number) => Promise<void>;
}

interface ICallbackScope {
    chatId: TelegramBot.ChatId;
    session: IChatSession;
    isAdmin: boolean;
}

type TCallbackHandlers = {
    [K in TMenuCommandTag]: (
        command: TMenuCommand<K>,
        scope: ICallbackScope,
    ) => Promise<void>;
};

type TBotCommandHandler = (
    message: TelegramBot.Message,
    isAdmin: boolean,
) => Promise<void>;

/**
 * Wires Telegram updates to the menu: navigation and content delivery for
 * everyone, the authoring wizard for admins, search and feedback on demand.
 */
export class MenuBotRuntime {
    private readonly logger: Logger;
    private readonly messages: IMenuBotMessages;
    private readonly client: TMenuBotClient;
    private readonly storage: IMenuStorage;
    private readonly adminIds: ReadonlySet<number>;
    private readonly sessions: SessionManager;
    private readonly reader: MenuTreeReader;
    private readonly keyboards: KeyboardBuilder;
    private readonly delivery: ContentDelivery;
    private readonly executor: AuthoringExecutor;
    private readonly searchService: SearchService;
    private readonly feedback: FeedbackService;
    private started = false;

    constructor(
        private readonly options: MenuBotRuntimeOptions,
        dependencies: MenuBotRuntimeDependencies = {},
    ) {
        this.logger = dependencies.logger ?? new Logger(MenuBotRuntime.name);
        this.messages = (dependencies.messageFactory ?? createMenuBotMessages)(
            options.messages,
        );
        this.client = options.client;
        this.storage = options.storage;
        this.adminIds = new Set(options.adminIds);
        this.sessions =
            dependencies.sessionManager ??
            createSessionManager({
                sessionStorage: options.sessionStorage,
                session: options.session,
            });
        this.reader = new MenuTreeReader(options.storage);
        this.keyboards = new KeyboardBuilder(this.messages);
        this.delivery = new ContentDelivery({
            client: options.client,
            logger: this.logger,
            messages: this.messages,
            sleep: dependencies.sleep,
        });
        this.executor = new AuthoringExecutor(options.storage);
        this.searchService = new SearchService({
            reader: this.reader,
            ranking: options.ranking,
            trigger: options.searchTrigger,
            logger: this.logger,
            messages: this.messages,
        });
        this.feedback = new FeedbackService({
            client: options.client,
            logger: this.logger,
            messages: this.messages,
            feedbackChatId: options.feedbackChatId,
        });
    }

    /** Subscribes to updates. Calling it twice has no effect. */
    public start(): void {
        if (this.started) {
            return;
        }
        this.started = true;

        const middlewares = [
            createUpdateLoggerMiddleware(this.logger),
            ...(this.options.middlewares ?? []),
        ];

        const onMessage = buildMiddlewarePipeline<[TelegramBot.Message]>({
            event: 'message',
            handler: (message) => this.handleMessage(message),
            middlewares,
            contextFactory: (event, [message]) =>
                this.buildContext(event, message.from, message.chat.id, {
                    message,
                }),
        });

        const onCallbackQuery = buildMiddlewarePipeline<
            [TelegramBot.CallbackQuery]
        >({
            event: 'callback_query',
            handler: (query) => this.handleCallbackQuery(query),
            middlewares,
            contextFactory: (event, [query]) =>
                this.buildContext(event, query.from, query.message?.chat.id, {
                    callbackQuery: query,
                }),
        });

        this.client.on('message', (message) =>
            this.runSafely('message', message.chat.id, () => onMessage(message)),
        );
        this.client.on('callback_query', (query) =>
            this.runSafely('callback_query', query.message?.chat.id, () =>
                onCallbackQuery(query),
            ),
        );
        this.client.on('polling_error', (error) =>
            this.logger.error(this.messages.pollingError({ error })),
        );

        this.logger.log(
            this.messages.runtimeInitialized({ adminCount: this.adminIds.size }),
        );
    }

    public isAdmin(userId: number | undefined): boolean {
        return userId !== undefined && this.adminIds.has(userId);
    }

    private buildContext(
        event: TMenuBotEvent,
        user: TelegramBot.User | undefined,
        chatId: TelegramBot.ChatId | undefined,
        payload: Pick<IMenuBotUpdateContext, 'message' | 'callbackQuery'>,
    ): IMenuBotUpdateContext {
        return {
            event,
            chatId,
            user,
            isAdmin: this.isAdmin(user?.id),
            ...payload,
        };
    }

    /** Logs a failed update and apologizes to its chat, when it has one. */
    private async runSafely(
        event: TMenuBotEvent,
        chatId: TelegramBot.ChatId | undefined,
        work: () => Promise<void>,
    ): Promise<void> {
        try {
            await work();
        } catch (error) {
            this.logger.error(this.messages.updateHandlingError({ event, error }));
            if (chatId !== undefined) {
                await this.apologize(event, chatId);
            }
        }
    }

    private async apologize(
        event: TMenuBotEvent,
        chatId: TelegramBot.ChatId,
    ): Promise<void> {
        try {
            await this.client.sendMessage(chatId, this.messages.genericError(), {
                reply_markup: this.keyboards.homeKeyboard(),
            });
            await this.sessions.resetStage(chatId);
        } catch (error) {
            this.logger.error(this.messages.updateHandlingError({ event, error }));
        }
    }

    // messages

    private readonly botCommands: Record<string, TBotCommandHandler> = {
        start: async (message) => {
            const session = await this.sessions.resetStage(message.chat.id);
            await this.showRoot(message.chat.id, session, this.isAdmin(message.from?.id));
        },
        admin: async (message, isAdmin) => {
            const chatId = message.chat.id;
            if (!isAdmin) {
                await this.client.sendMessage(chatId, this.messages.adminOnly());
                return;
            }
            const session: IChatSession = { stage: IDLE_STAGE, mode: 'admin' };
            await this.sessions.saveSession(chatId, session);
            await this.client.sendMessage(chatId, this.messages.adminModeEnabled());
            await this.showRoot(chatId, session, isAdmin);
        },
        user: async (message, isAdmin) => {
            const chatId = message.chat.id;
            const session: IChatSession = { stage: IDLE_STAGE, mode: 'user' };
            await this.sessions.saveSession(chatId, session);
            await this.client.sendMessage(chatId, this.messages.userModeEnabled());
            await this.showRoot(chatId, session, isAdmin);
        },
        search: async (message) => {
            const session = await this.sessions.getSession(message.chat.id);
            await this.promptSearch(message.chat.id, session);
        },
        feedback: async (message) => {
            const session = await this.sessions.getSession(message.chat.id);
            await this.promptFeedback(message.chat.id, session);
        },
        cancel: async (message, isAdmin) => {
            const chatId = message.chat.id;
            const session = await this.sessions.getSession(chatId);
            const idle = await this.sessions.resetStage(chatId);
            if (!isAuthoringStage(session.stage)) {
                await this.showRoot(chatId, idle, isAdmin);
                return;
            }
            await this.client.sendMessage(chatId, this.messages.authoringCancelled());
            await this.showView(chatId, idle, isAdmin, returnNodeOf(session.stage));
        },
    };

    private async handleMessage(message: TelegramBot.Message): Promise<void> {
        const chatId = message.chat.id;
        const isAdmin = this.isAdmin(message.from?.id);

        const command = parseBotCommand(message.text);
        if (command !== undefined && Object.hasOwn(this.botCommands, command)) {
            await this.botCommands[command]?.(message, isAdmin);
            return;
        }

        const session = await this.sessions.getSession(chatId);
        const stage = session.stage;

        if (stage.kind === 'awaitingSearchQuery') {
            await this.runSearch(chatId, session, message.text ?? '');
            return;
        }

        if (stage.kind === 'awaitingFeedback') {
            await this.relayFeedback(message, session, isAdmin);
            return;
        }

        if (isAuthoringStage(stage)) {
            if (!isAdmin) {
                const idle = await this.sessions.resetStage(chatId);
                await this.replyIdle(message, idle, isAdmin);
                return;
            }

            const input = toAuthoringInput(message);
            if (!input) {
                await this.sendRejection(chatId, stage, 'contentRequired');
                return;
            }

            await this.advance(chatId, session, stage, input, isAdmin);
            return;
        }

        await this.replyIdle(message, session, isAdmin);
    }

    private async replyIdle(
        message: TelegramBot.Message,
        session: IChatSession,
        isAdmin: boolean,
    ): Promise<void> {
        if (message.from) {
            await this.client.sendMessage(
                message.chat.id,
                this.messages.userIdInfo({
                    userId: message.from.id,
                    username: message.from.username,
                }),
            );
        }
        await this.showRoot(message.chat.id, session, isAdmin);
    }

    // callbacks

    private async handleCallbackQuery(
        query: TelegramBot.CallbackQuery,
    ): Promise<void> {
        const chatId = query.message?.chat.id;
        const isAdmin = this.isAdmin(query.from.id);
        const command = parseMenuCommand(query.data);

        if (!command || chatId === undefined) {
            await this.answer(query, this.messages.staleButton());
            return;
        }

        if (isAdminCommand(command) && !isAdmin) {
            await this.answer(query, this.messages.adminOnly());
            return;
        }

        await this.answer(query);

        const session = await this.sessions.getSession(chatId);
        try {
            await this.dispatch(command.tag, command, { chatId, session, isAdmin });
        } catch (error) {
            if (!isNotFoundError(error)) {
                throw error;
            }
            await this.reportNotFound(chatId, error);
        }
    }

    private dispatch<K extends TMenuCommandTag>(
        tag: K,
        command: TMenuCommand<K>,
        scope: ICallbackScope,
    ): Promise<void> {
        return this.callbackHandlers[tag](command, scope);
    }

    private readonly callbackHandlers: TCallbackHandlers = {
        home: async (_command, { chatId, isAdmin }) => {
            const session = await this.sessions.resetStage(chatId);
            await this.showRoot(chatId, session, isAdmin);
        },
        open: async (command, { chatId, isAdmin }) => {
            const session = await this.sessions.resetStage(chatId);
            await this.showNode(chatId, session, isAdmin, command.nodeId, true);
        },
        search: async (_command, { chatId, session }) => {
            await this.promptSearch(chatId, session);
        },
        feedback: async (_command, { chatId, session }) => {
            await this.promptFeedback(chatId, session);
        },
        toggleMode: async (_command, { chatId, session, isAdmin }) => {
            const mode = session.mode === 'admin' ? 'user' : 'admin';
            const next: IChatSession = { stage: IDLE_STAGE, mode };
            await this.sessions.saveSession(chatId, next);
            await this.client.sendMessage(
                chatId,
                mode === 'admin'
                    ? this.messages.adminModeEnabled()
                    : this.messages.userModeEnabled(),
            );
            await this.showRoot(chatId, next, isAdmin);
        },
        addNode: async (command, { chatId, session }) => {
            if (command.parentId !== null) {
                await this.reader.requireNode(command.parentId);
            }
            await this.enterStage(chatId, session, {
                kind: 'awaitingLabel',
                parentId: command.parentId,
            });
        },
        renameNode: async (command, { chatId, session }) => {
            await this.reader.requireNode(command.nodeId);
            await this.enterStage(chatId, session, {
                kind: 'awaitingNewLabel',
                nodeId: command.nodeId,
            });
        },
        editBody: async (command, { chatId, session }) => {
            await this.reader.requireNode(command.nodeId);
            await this.enterStage(chatId, session, {
                kind: 'awaitingNodeBody',
                nodeId: command.nodeId,
            });
        },
        attachMedia: async (command, { chatId, session }) => {
            await this.reader.requireNode(command.nodeId);
            await this.enterStage(chatId, session, {
                kind: 'awaitingNodeMedia',
                nodeId: command.nodeId,
            });
        },
        detachMedia: async (command, { chatId, isAdmin }) => {
            await this.executor.detachMedia(command.nodeId);
            const session = await this.sessions.resetStage(chatId);
            await this.client.sendMessage(chatId, this.messages.mediaDetached());
            await this.showNode(chatId, session, isAdmin, command.nodeId, false);
        },
        deleteNode: async (command, { chatId }) => {
            const node = await this.reader.requireNode(command.nodeId);
            const path = await this.reader.getPath(node.id);
            await this.client.sendMessage(
                chatId,
                this.messages.deleteConfirm({ label: node.label, path }),
                { reply_markup: this.keyboards.deleteConfirmKeyboard(node) },
            );
        },
        confirmDelete: async (command, { chatId, isAdmin }) => {
            const node = await this.executor.deleteNode(command.nodeId);
            const session = await this.sessions.resetStage(chatId);
            await this.client.sendMessage(
                chatId,
                this.messages.nodeDeleted({ label: node.label }),
            );
            await this.showView(chatId, session, isAdmin, node.parentId);
        },
        editSteps: async (command, { chatId }) => {
            await this.showStepEditor(chatId, command.nodeId);
        },
        insertStep: async (command, { chatId, session }) => {
            await this.reader.requireNode(command.nodeId);
            const steps = await this.reader.getSteps(command.nodeId);
            await this.enterStage(chatId, session, {
                kind: 'awaitingNewStepContent',
                nodeId: command.nodeId,
                stepCount: steps.length,
            });
        },
        editStep: async (command, { chatId, session }) => {
            await this.requireStep(command.nodeId, command.position);
            await this.enterStage(chatId, session, {
                kind: 'awaitingStepReplacement',
                nodeId: command.nodeId,
                position: command.position,
            });
        },
        editStepDelay: async (command, { chatId, session }) => {
            await this.requireStep(command.nodeId, command.position);
            await this.enterStage(chatId, session, {
                kind: 'awaitingStepDelay',
                nodeId: command.nodeId,
                position: command.position,
            });
        },
        moveStep: async (command, { chatId, session }) => {
            await this.requireStep(command.nodeId, command.position);
            const steps = await this.reader.getSteps(command.nodeId);
            await this.enterStage(chatId, session, {
                kind: 'awaitingMoveTarget',
                nodeId: command.nodeId,
                from: command.position,
                stepCount: steps.length,
            });
        },
        deleteStep: async (command, { chatId }) => {
            await this.executor.deleteStep(command.nodeId, command.position);
            await this.sessions.resetStage(chatId);
            await this.client.sendMessage(
                chatId,
                this.messages.stepDeleted({ position: command.position }),
            );
            await this.showStepEditor(chatId, command.nodeId);
        },
        editWelcome: async (_command, { chatId, session }) => {
            await this.enterStage(chatId, session, { kind: 'awaitingWelcomeText' });
        },
        wizard: async (command, { chatId, session, isAdmin }) => {
            if (!isAuthoringStage(session.stage)) {
                await this.client.sendMessage(chatId, this.messages.staleButton());
                return;
            }
            await this.advance(
                chatId,
                session,
                session.stage,
                { type: 'action', action: command.action },
                isAdmin,
            );
        },
    };

    private async answer(
        query: TelegramBot.CallbackQuery,
        alert?: string,
    ): Promise<void> {
        try {
            await this.client.answerCallbackQuery(
                query.id,
                alert === undefined ? {} : { text: alert, show_alert: true },
            );
        } catch (error) {
            this.logger.warn(this.messages.callbackAnswerFailed({ error }));
        }
    }

    // authoring

    private async enterStage(
        chatId: TelegramBot.ChatId,
        session: IChatSession,
        stage: TAuthoringStage,
    ): Promise<void> {
        await this.sessions.saveSession(chatId, { ...session, stage });
        await this.client.sendMessage(chatId, this.messages.stagePrompt(stage), {
            reply_markup: this.keyboards.wizardKeyboard(stage),
        });
    }

    private async sendRejection(
        chatId: TelegramBot.ChatId,
        stage: TAuthoringStage,
        reason: Parameters<IMenuBotMessages['rejection']>[0],
    ): Promise<void> {
        await this.client.sendMessage(
            chatId,
            [this.messages.rejection(reason), this.messages.stagePrompt(stage)].join(
                '\n',
            ),
            { reply_markup: this.keyboards.wizardKeyboard(stage) },
        );
    }

    private async advance(
        chatId: TelegramBot.ChatId,
        session: IChatSession,
        stage: TAuthoringStage,
        input: TAuthoringInput,
        isAdmin: boolean,
    ): Promise<void> {
        const outcome = advanceAuthoring(stage, input);

        switch (outcome.type) {
            case 'prompt':
                await this.enterStage(chatId, session, outcome.stage);
                return;
            case 'rejected':
                await this.sendRejection(chatId, outcome.stage, outcome.reason);
                return;
            case 'cancelled': {
                const idle = await this.sessions.resetStage(chatId);
                await this.client.sendMessage(
                    chatId,
                    this.messages.authoringCancelled(),
                );
                await this.showView(chatId, idle, isAdmin, outcome.returnTo);
                return;
            }
            case 'commit': {
                const idle = await this.sessions.resetStage(chatId);
                try {
                    await this.executor.apply(outcome.commit);
                    await this.client.sendMessage(
                        chatId,
                        this.messages.authoringCommitted(outcome.commit),
                    );
                } catch (error) {
                    if (isNotFoundError(error)) {
                        await this.client.sendMessage(
                            chatId,
                            this.notFoundText(error),
                        );
                    } else {
                        this.logger.error(
                            this.messages.authoringCommitFailed({
                                kind: outcome.commit.kind,
                                error,
                            }),
                        );
                        await this.client.sendMessage(
                            chatId,
                            this.messages.genericError(),
                        );
                    }
                }
                await this.showView(chatId, idle, isAdmin, outcome.returnTo);
                return;
            }
        }
    }

    // search and feedback

    private async promptSearch(
        chatId: TelegramBot.ChatId,
        session: IChatSession,
    ): Promise<void> {
        await this.sessions.saveSession(chatId, {
            ...session,
            stage: { kind: 'awaitingSearchQuery' },
        });
        await this.client.sendMessage(chatId, this.messages.searchPrompt(), {
            reply_markup: this.keyboards.homeKeyboard(),
        });
    }

    private async promptFeedback(
        chatId: TelegramBot.ChatId,
        session: IChatSession,
    ): Promise<void> {
        await this.sessions.saveSession(chatId, {
            ...session,
            stage: { kind: 'awaitingFeedback' },
        });
        await this.client.sendMessage(chatId, this.messages.feedbackPrompt(), {
            reply_markup: this.keyboards.homeKeyboard(),
        });
    }

    private async runSearch(
        chatId: TelegramBot.ChatId,
        session: IChatSession,
        query: string,
    ): Promise<void> {
        await this.sendTyping(chatId);
        const outcome = await this.searchService.search(query);
        const home = { reply_markup: this.keyboards.homeKeyboard() };

        if (outcome.kind === 'invalidQuery') {
            await this.client.sendMessage(
                chatId,
                this.messages.searchQueryTooShort({ min: MIN_SEARCH_QUERY_LENGTH }),
                home,
            );
            return;
        }

        // Unclear queries and failed rankings keep the search stage.
        if (outcome.kind !== 'notMeaningful' && outcome.kind !== 'error') {
            await this.sessions.saveSession(chatId, { ...session, stage: IDLE_STAGE });
        }

        switch (outcome.kind) {
            case 'easterEgg':
                await this.client.sendMessage(chatId, outcome.reply, home);
                return;
            case 'notMeaningful':
                await this.client.sendMessage(
                    chatId,
                    this.messages.searchNotMeaningful(),
                    home,
                );
                return;
            case 'noMatches':
                await this.client.sendMessage(
                    chatId,
                    this.messages.searchNoMatches(),
                    home,
                );
                return;
            case 'error':
                await this.client.sendMessage(
                    chatId,
                    outcome.reason === 'unavailable'
                        ? this.messages.searchUnavailable()
                        : this.messages.searchFailedReply({ status: outcome.status }),
                    home,
                );
                return;
            case 'matches': {
                const shown = outcome.matches.slice(0, MAX_SEARCH_RESULTS);
                const lines = [
                    this.messages.searchResultsHeader({
                        count: outcome.matches.length,
                    }),
                    ...shown.map((match, index) =>
                        this.messages.searchResultLine({
                            index: index + 1,
                            label: match.node.label,
                            parentLabel: match.parentLabel,
                        }),
                    ),
                ];
                if (outcome.matches.length > shown.length) {
                    lines.push(
                        this.messages.searchMoreResults({
                            count: outcome.matches.length - shown.length,
                        }),
                    );
                }
                await this.client.sendMessage(chatId, lines.join('\n'), {
                    reply_markup: this.keyboards.searchResultsKeyboard(
                        shown.map((match) => match.node),
                    ),
                });
                return;
            }
        }
    }

    private async sendTyping(chatId: TelegramBot.ChatId): Promise<void> {
        try {
            await this.client.sendChatAction(chatId, 'typing');
        } catch (error) {
            this.logger.warn(this.messages.chatActionFailed({ error }));
        }
    }

    private async relayFeedback(
        message: TelegramBot.Message,
        session: IChatSession,
        isAdmin: boolean,
    ): Promise<void> {
        const chatId = message.chat.id;
        const result = await this.feedback.relay(message);
        const idle: IChatSession = { ...session, stage: IDLE_STAGE };
        await this.sessions.saveSession(chatId, idle);
        if (result === 'unavailable') {
            await this.client.sendMessage(chatId, this.messages.feedbackUnavailable());
        } else if (result === 'failed') {
            await this.client.sendMessage(chatId, this.messages.feedbackNotDelivered());
        }
        await this.client.sendMessage(chatId, this.messages.feedbackThanks());
        await this.showRoot(chatId, idle, isAdmin);
    }

    // views

    private viewerOf(session: IChatSession, isAdmin: boolean): IViewer {
        return { isAdmin, mode: isAdmin ? session.mode : 'user' };
    }

    private async showRoot(
        chatId: TelegramBot.ChatId,
        session: IChatSession,
        isAdmin: boolean,
    ): Promise<void> {
        const [welcome, children] = await Promise.all([
            this.storage.getWelcomeMessage(),
            this.reader.getChildren(null),
        ]);
        await this.client.sendMessage(chatId, welcome, {
            reply_markup: this.keyboards.rootKeyboard(
                children,
                this.viewerOf(session, isAdmin),
            ),
        });
    }

    /** Renders a node's menu, sending its content first when `deliver` is set. */
    private async showNode(
        chatId: TelegramBot.ChatId,
        session: IChatSession,
        isAdmin: boolean,
        nodeId: number,
        deliver: boolean,
    ): Promise<void> {
        const node = await this.reader.requireNode(nodeId);

        if (deliver) {
            const steps = await this.reader.getSteps(node.id);
            await this.delivery.deliverNode(chatId, node, steps);
        }

        const children = await this.reader.getChildren(node.id);
        await this.client.sendMessage(chatId, node.body ?? node.label, {
            reply_markup: this.keyboards.nodeKeyboard(
                node,
                children,
                this.viewerOf(session, isAdmin),
            ),
        });
    }

    /** Shows the node, or the root when it is null or gone. */
    private async showView(
        chatId: TelegramBot.ChatId,
        session: IChatSession,
        isAdmin: boolean,
        nodeId: number | null,
    ): Promise<void> {
        const node = nodeId === null ? undefined : await this.reader.getNode(nodeId);
        if (!node) {
            await this.showRoot(chatId, session, isAdmin);
            return;
        }
        await this.showNode(chatId, session, isAdmin, node.id, false);
    }

    private async showStepEditor(
        chatId: TelegramBot.ChatId,
        nodeId: number,
    ): Promise<void> {
        const node = await this.reader.requireNode(nodeId);
        const steps = await this.reader.getSteps(nodeId);
        await this.client.sendMessage(
            chatId,
            this.messages.stepsOverview({
                label: node.label,
                steps: renderStepTexts(steps),
            }),
            { reply_markup: this.keyboards.stepEditorKeyboard(node, steps) },
        );
    }

    private async requireStep(nodeId: number, position: number): Promise<void> {
        await this.reader.requireNode(nodeId);
        if (!(await this.storage.getStep(nodeId, position))) {
            throw new ContentStepNotFoundError(nodeId, position);
        }
    }

    private notFoundText(error: unknown): string {
        return error instanceof ContentStepNotFoundError
            ? this.messages.stepNotFound()
            : this.messages.nodeNotFound();
    }

    private async reportNotFound(
        chatId: TelegramBot.ChatId,
        error: unknown,
    ): Promise<void> {
        await this.sessions.resetStage(chatId);
        await this.client.sendMessage(chatId, this.notFoundText(error), {
            reply_markup: this.keyboards.homeKeyboard(),
        });
    }
}
