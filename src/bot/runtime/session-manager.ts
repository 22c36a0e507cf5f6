import type TelegramBot from 'node-telegram-bot-api';
import {
    DEFAULT_SESSION_MAX_ENTRIES,
    DEFAULT_SESSION_TTL_MS,
} from '../../app.constants';
import type {
    IBotSessionStorage,
    IChatSession,
    ISessionOptions,
} from '../../app.interface';
import { IDLE_STAGE } from '../../authoring/authoring.state';

interface IStoredSession {
    session: IChatSession;
    touchedAt: number;
}

export interface MemorySessionStorageOptions extends ISessionOptions {
    now?: () => number;
}

/**
 * In-process session store. Entries expire `ttlMs` after their last write;
 * past `maxEntries` the least recently written chat is dropped.
 */
export class MemorySessionStorage implements IBotSessionStorage<IChatSession> {
    private readonly store = new Map<string, IStoredSession>();
    private readonly ttlMs: number;
    private readonly maxEntries: number;
    private readonly now: () => number;

    constructor(options: MemorySessionStorageOptions = {}) {
        this.ttlMs = options.ttlMs ?? DEFAULT_SESSION_TTL_MS;
        this.maxEntries = options.maxEntries ?? DEFAULT_SESSION_MAX_ENTRIES;
        this.now = options.now ?? Date.now;
    }

    public get(chatId: TelegramBot.ChatId): IChatSession | undefined {
        const key = chatId.toString();
        const entry = this.store.get(key);
        if (!entry) {
            return undefined;
        }

        if (this.now() - entry.touchedAt > this.ttlMs) {
            this.store.delete(key);
            return undefined;
        }

        return entry.session;
    }

    public set(chatId: TelegramBot.ChatId, session: IChatSession): void {
        const key = chatId.toString();
        // Re-inserting moves the key to the end of the Map's insertion order.
        this.store.delete(key);
        this.store.set(key, { session, touchedAt: this.now() });

        while (this.store.size > this.maxEntries) {
            const oldest = this.store.keys().next();
            if (oldest.done) {
                break;
            }
            this.store.delete(oldest.value);
        }
    }
}

export interface SessionManagerOptions {
    sessionStorage?: IBotSessionStorage<IChatSession>;
    session?: ISessionOptions;
}

const createIdleSession = (): IChatSession => ({
    stage: IDLE_STAGE,
    mode: 'user',
});

export class SessionManager {
    private readonly sessionStorage: IBotSessionStorage<IChatSession>;

    /**
     * Uses the provided storage backend or falls back to an in-memory store
     * configured from `options.session`.
     */
    constructor(options: SessionManagerOptions = {}) {
        this.sessionStorage =
            options.sessionStorage ?? new MemorySessionStorage(options.session);
    }

    /** Returns the chat's session, or a fresh idle user-mode one. */
    public async getSession(chatId: TelegramBot.ChatId): Promise<IChatSession> {
        const stored = await this.sessionStorage.get(chatId);
        return stored ?? createIdleSession();
    }

    public async saveSession(
        chatId: TelegramBot.ChatId,
        session: IChatSession,
    ): Promise<void> {
        await this.sessionStorage.set(chatId, session);
    }

    /** Drops any pending conversation while keeping the viewer mode. */
    public async resetStage(chatId: TelegramBot.ChatId): Promise<IChatSession> {
        const current = await this.getSession(chatId);
        const session: IChatSession = { ...current, stage: IDLE_STAGE };
        await this.saveSession(chatId, session);
        return session;
    }
}

export const createSessionManager = (
    options: SessionManagerOptions = {},
): SessionManager => new SessionManager(options);
