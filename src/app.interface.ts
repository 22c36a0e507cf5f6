import type { FactoryProvider, ModuleMetadata } from '@nestjs/common';
import type TelegramBot from 'node-telegram-bot-api';
import type { TConversationStage } from './authoring/authoring.state';
import type { IMenuBotMessages } from './bot/bot.messages';

export type TMediaKind =
    | 'photo'
    | 'video'
    | 'document'
    | 'audio'
    | 'voice'
    | 'video_note';

export type TStepKind = 'text' | 'file';

export type TViewerMode = 'admin' | 'user';

export interface IMediaRef {
    fileId: string;
    kind: TMediaKind;
}

export interface IMenuNode {
    id: number;
    label: string;
    callbackToken: string;
    body: string | null;
    parentId: number | null;
    media: IMediaRef | null;
    /** Fixed delay carried over from nodes authored before per-step delays. */
    delay: number;
    createdAt: Date;
}

export interface IContentStep {
    id: number;
    nodeId: number;
    position: number;
    kind: TStepKind;
    text: string | null;
    media: IMediaRef | null;
    delay: number;
    createdAt: Date;
}

export interface IMenuNodeInput {
    label: string;
    parentId: number | null;
    body?: string | null;
    media?: IMediaRef | null;
}

export interface IContentStepInput {
    text: string | null;
    media: IMediaRef | null;
    delay: number;
}

export interface IContentStepPatch {
    text: string | null;
    media: IMediaRef | null;
}

export interface IMenuStorage {
    init(): Promise<void>;
    close(): Promise<void>;

    createNode(input: IMenuNodeInput): Promise<IMenuNode>;
    createNodeWithSteps(
        input: IMenuNodeInput,
        steps: IContentStepInput[],
    ): Promise<IMenuNode>;
    getNode(id: number): Promise<IMenuNode | undefined>;
    listChildren(parentId: number | null): Promise<IMenuNode[]>;
    listNodes(): Promise<IMenuNode[]>;
    updateNodeLabel(id: number, label: string): Promise<boolean>;
    updateNodeBody(id: number, body: string | null): Promise<boolean>;
    setNodeMedia(id: number, media: IMediaRef | null): Promise<boolean>;
    deleteNode(id: number): Promise<boolean>;

    listSteps(nodeId: number): Promise<IContentStep[]>;
    listStepsForNodes(nodeIds: number[]): Promise<Map<number, IContentStep[]>>;
    getStep(nodeId: number, position: number): Promise<IContentStep | undefined>;
    appendStep(
        nodeId: number,
        step: IContentStepInput,
    ): Promise<IContentStep | undefined>;
    insertStep(
        nodeId: number,
        position: number,
        step: IContentStepInput,
    ): Promise<IContentStep | undefined>;
    updateStepContent(
        nodeId: number,
        position: number,
        patch: IContentStepPatch,
    ): Promise<boolean>;
    updateStepDelay(
        nodeId: number,
        position: number,
        delay: number,
    ): Promise<boolean>;
    deleteStep(nodeId: number, position: number): Promise<boolean>;
    moveStep(nodeId: number, from: number, to: number): Promise<boolean>;

    getWelcomeMessage(): Promise<string>;
    setWelcomeMessage(text: string): Promise<void>;
}

export interface IPostgresConnectionOptions {
    host: string;
    port: number;
    database: string;
    user: string;
    password: string;
    poolMin?: number;
    poolMax?: number;
}

export type TMenuStorageConfig =
    | { driver: 'memory' }
    | { driver: 'postgres'; connection: IPostgresConnectionOptions }
    | { driver: 'custom'; instance: IMenuStorage };

/**
 * The slice of the Telegram client the bot relies on. Narrowing it keeps the
 * runtime testable against light-weight doubles.
 */
export type TMenuBotClient = Pick<
    TelegramBot,
    | 'sendMessage'
    | 'sendPhoto'
    | 'sendVideo'
    | 'sendDocument'
    | 'sendAudio'
    | 'sendVoice'
    | 'sendVideoNote'
    | 'answerCallbackQuery'
    | 'forwardMessage'
    | 'sendChatAction'
    | 'getFile'
    | 'on'
    | 'startPolling'
    | 'stopPolling'
>;

export interface IBotSessionStorage<TState> {
    get(
        chatId: TelegramBot.ChatId,
    ): Promise<TState | undefined> | TState | undefined;
    set(chatId: TelegramBot.ChatId, state: TState): Promise<void> | void;
}

export type TMenuBotEvent = 'message' | 'callback_query';

export interface IMenuBotUpdateContext {
    event: TMenuBotEvent;
    chatId?: TelegramBot.ChatId;
    user?: TelegramBot.User;
    isAdmin: boolean;
    message?: TelegramBot.Message;
    callbackQuery?: TelegramBot.CallbackQuery;
}

export type TMenuBotMiddlewareNext = () => Promise<void>;

export type TMenuBotMiddlewareHandler = (
    context: IMenuBotUpdateContext,
    next: TMenuBotMiddlewareNext,
) => void | Promise<void>;

export interface IMenuBotMiddlewareConfig {
    name?: string;
    handler: TMenuBotMiddlewareHandler;
    priority?: number;
}

export interface IRankingOptions {
    apiKey?: string;
    baseUrl: string;
    model: string;
    timeoutMs: number;
}

export interface ISearchTriggerOptions {
    phrase: string;
    reply: string;
}

export interface ISessionOptions {
    ttlMs?: number;
    maxEntries?: number;
}

export interface IMenuBotOptions {
    token: string;
    adminIds: number[];
    storage: TMenuStorageConfig;
    feedbackChatId?: TelegramBot.ChatId;
    ranking?: IRankingOptions;
    searchTrigger?: ISearchTriggerOptions;
    session?: ISessionOptions;
    sessionStorage?: IBotSessionStorage<IChatSession>;
    middlewares?: IMenuBotMiddlewareConfig[];
    messages?: TMenuBotMessageOverrides;
    /** Starts long polling on bootstrap. Defaults to true. */
    polling?: boolean;
}

export interface IMenuBotModuleAsyncOptions
    extends Pick<ModuleMetadata, 'imports'> {
    useFactory: FactoryProvider<
        Promise<IMenuBotOptions> | IMenuBotOptions
    >['useFactory'];
    inject?: FactoryProvider['inject'];
}

export interface IChatSession {
    stage: TConversationStage;
    mode: TViewerMode;
}

export type TMenuBotMessageOverrides = Partial<IMenuBotMessages>;
