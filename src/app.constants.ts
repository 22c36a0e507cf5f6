import type { TMediaKind } from './app.interface';

export const MENU_BOT_MODULE_OPTIONS = Symbol('MENU_BOT_MODULE_OPTIONS');
export const MENU_BOT_STORAGE = Symbol('MENU_BOT_STORAGE');

export const MAX_LABEL_LENGTH = 35;
export const MAX_CALLBACK_DATA_BYTES = 64;
export const CALLBACK_HASH_LENGTH = 16;

export const MIN_STEP_DELAY = 0;
export const MAX_STEP_DELAY = 10;

export const MIN_SEARCH_QUERY_LENGTH = 2;
export const MAX_SEARCH_RESULTS = 10;
export const SEARCH_SNIPPET_LENGTH = 100;

export const DEFAULT_RANKING_BASE_URL = 'https://api.deepseek.com/v1';
export const DEFAULT_RANKING_MODEL = 'deepseek-chat';
export const DEFAULT_RANKING_TIMEOUT_MS = 15_000;

export const DEFAULT_SESSION_TTL_MS = 60 * 60 * 1000;
export const DEFAULT_SESSION_MAX_ENTRIES = 10_000;

export const DEFAULT_WELCOME_MESSAGE =
    'Welcome! Pick a section below or use search to find what you need.';

export const MEDIA_KINDS: readonly TMediaKind[] = [
    'photo',
    'video',
    'document',
    'audio',
    'voice',
    'video_note',
];
