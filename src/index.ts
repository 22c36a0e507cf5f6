export { MenuBotModule } from './app.module';
export { RootModule, EnvironmentModule } from './root.module';
export { MenuBotService } from './bot/menu-bot.service';
export {
    MenuBotRuntime,
    MenuBotRuntimeOptions,
    MenuBotRuntimeDependencies,
} from './bot/menu-bot.runtime';
export {
    IMenuBotMessages,
    MenuBotMessageFactory,
    DEFAULT_MENU_BOT_MESSAGES,
    createMenuBotMessages,
} from './bot/bot.messages';
export {
    buildMiddlewarePipeline,
    sortMiddlewareConfigs,
    createUpdateLoggerMiddleware,
} from './bot/runtime/middleware-pipeline';
export {
    SessionManager,
    SessionManagerOptions,
    MemorySessionStorage,
    MemorySessionStorageOptions,
    createSessionManager,
} from './bot/runtime/session-manager';
export { advanceAuthoring } from './authoring/authoring.machine';
export { AuthoringExecutor } from './authoring/authoring.executor';
export {
    IDLE_STAGE,
    TAuthoringCommit,
    TAuthoringInput,
    TAuthoringOutcome,
    TAuthoringStage,
    TConversationStage,
    TRejectionReason,
    TWizardAction,
} from './authoring/authoring.state';
export {
    TMenuCommand,
    TMenuCommandTag,
    encodeMenuCommand,
    parseMenuCommand,
    toCallbackData,
} from './menu/callback-token';
export { KeyboardBuilder, IViewer } from './menu/keyboard.builder';
export { ContentDelivery } from './menu/content-delivery';
export { MenuTreeReader, IMenuTreeEntry } from './menu/menu-tree.reader';
export { MediaAuditService } from './menu/media-audit.service';
export { SearchService, TSearchOutcome, ISearchMatch } from './search/search.service';
export { RankingClient, IRankingClient } from './search/ranking.client';
export { FeedbackService, TFeedbackRelayResult } from './feedback/feedback.service';
export { MemoryStorage } from './storage/memory.storage';
export { PostgresStorage } from './storage/postgres.storage';
export { createMenuStorage } from './storage/storage.factory';
export {
    validateEnvironment,
    toMenuBotOptions,
    IMenuBotEnvironment,
} from './config/environment';
export * from './errors';
export { MENU_BOT_MODULE_OPTIONS, MENU_BOT_STORAGE } from './app.constants';
export {
    IChatSession,
    IContentStep,
    IMediaRef,
    IMenuBotModuleAsyncOptions,
    IMenuBotMiddlewareConfig,
    IMenuBotOptions,
    IMenuBotUpdateContext,
    IMenuNode,
    IMenuStorage,
    IBotSessionStorage,
    TMenuBotClient,
    TMenuStorageConfig,
} from './app.interface';
