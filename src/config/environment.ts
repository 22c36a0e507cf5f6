import type { LogLevel } from '@nestjs/common';
import type { ConfigService } from '@nestjs/config';
import * as yup from 'yup';
import {
    DEFAULT_RANKING_BASE_URL,
    DEFAULT_RANKING_MODEL,
    DEFAULT_RANKING_TIMEOUT_MS,
} from '../app.constants';
import type { IMenuBotOptions, TMenuStorageConfig } from '../app.interface';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type TLogLevel = (typeof LOG_LEVELS)[number];

export const STORAGE_DRIVERS = ['postgres', 'memory'] as const;

const ADMIN_IDS_PATTERN = /^\s*-?\d+\s*(,\s*-?\d+\s*)*,?\s*$/;

const blankToUndefined = <T>(value: T, original: unknown): T | undefined =>
    original === '' ? undefined : value;

const optionalString = () => yup.string().trim().transform(blankToUndefined);

const optionalInteger = () =>
    yup.number().integer().transform(blankToUndefined);

const requiredForPostgres = <S extends yup.Schema>(schema: S) =>
    schema.when('STORAGE_DRIVER', {
        is: 'postgres',
        then: (current) => current.required(),
    });

export const environmentSchema = yup.object({
    BOT_TOKEN: yup.string().trim().required(),
    ADMIN_IDS: yup
        .string()
        .required()
        .matches(ADMIN_IDS_PATTERN, 'ADMIN_IDS must be comma-separated integers'),
    LOG_LEVEL: yup.string().oneOf(LOG_LEVELS).default('info'),
    STORAGE_DRIVER: yup.string().oneOf(STORAGE_DRIVERS).default('postgres'),
    DB_HOST: requiredForPostgres(optionalString()),
    DB_PORT: requiredForPostgres(optionalInteger().min(1).max(65535)),
    DB_NAME: requiredForPostgres(optionalString()),
    DB_USER: requiredForPostgres(optionalString()),
    DB_PASSWORD: requiredForPostgres(optionalString()),
    DB_POOL_MIN: optionalInteger().min(0).default(1),
    DB_POOL_MAX: optionalInteger().min(1).default(10),
    AI_API_KEY: optionalString(),
    AI_SERVICE_URL: optionalString().url().default(DEFAULT_RANKING_BASE_URL),
    AI_MODEL: optionalString().default(DEFAULT_RANKING_MODEL),
    AI_TIMEOUT_MS: optionalInteger().positive().default(DEFAULT_RANKING_TIMEOUT_MS),
    FEEDBACK_CHAT_ID: optionalString(),
    SESSION_TTL_MINUTES: optionalInteger().positive().default(60),
    SEARCH_TRIGGER_PHRASE: optionalString(),
    SEARCH_TRIGGER_REPLY: optionalString(),
});

export type IMenuBotEnvironment = yup.InferType<typeof environmentSchema>;

export const ENVIRONMENT_KEYS = Object.keys(environmentSchema.fields);

/**
 * `validate` hook for `ConfigModule.forRoot`. Collects every problem before
 * failing so a broken deployment is fixed in one pass.
 */
export const validateEnvironment = (
    config: Record<string, unknown>,
): IMenuBotEnvironment => {
    try {
        return environmentSchema.validateSync(config, { abortEarly: false });
    } catch (error) {
        if (error instanceof yup.ValidationError) {
            throw new Error(
                `Invalid environment:\n${error.errors.map((line) => `- ${line}`).join('\n')}`,
            );
        }
        throw error;
    }
};

/** Re-reads the validated environment through the config service. */
export const readEnvironment = (config: ConfigService): IMenuBotEnvironment =>
    validateEnvironment(
        Object.fromEntries(
            ENVIRONMENT_KEYS.map((key) => [key, config.get<unknown>(key)]),
        ),
    );

export const parseAdminIds = (raw: string): number[] =>
    raw
        .split(',')
        .map((part) => part.trim())
        .filter((part) => part !== '')
        .map(Number);

const toStorageConfig = (env: IMenuBotEnvironment): TMenuStorageConfig => {
    if (env.STORAGE_DRIVER === 'memory') {
        return { driver: 'memory' };
    }

    const { DB_HOST, DB_PORT, DB_NAME, DB_USER, DB_PASSWORD } = env;
    if (
        !DB_HOST ||
        DB_PORT === undefined ||
        !DB_NAME ||
        !DB_USER ||
        DB_PASSWORD === undefined
    ) {
        throw new Error(
            'Postgres storage needs DB_HOST, DB_PORT, DB_NAME, DB_USER and DB_PASSWORD',
        );
    }

    return {
        driver: 'postgres',
        connection: {
            host: DB_HOST,
            port: DB_PORT,
            database: DB_NAME,
            user: DB_USER,
            password: DB_PASSWORD,
            poolMin: env.DB_POOL_MIN,
            poolMax: env.DB_POOL_MAX,
        },
    };
};

export const toMenuBotOptions = (env: IMenuBotEnvironment): IMenuBotOptions => ({
    token: env.BOT_TOKEN,
    adminIds: parseAdminIds(env.ADMIN_IDS),
    storage: toStorageConfig(env),
    feedbackChatId: env.FEEDBACK_CHAT_ID,
    ranking: {
        apiKey: env.AI_API_KEY,
        baseUrl: env.AI_SERVICE_URL,
        model: env.AI_MODEL,
        timeoutMs: env.AI_TIMEOUT_MS,
    },
    searchTrigger:
        env.SEARCH_TRIGGER_PHRASE && env.SEARCH_TRIGGER_REPLY
            ? { phrase: env.SEARCH_TRIGGER_PHRASE, reply: env.SEARCH_TRIGGER_REPLY }
            : undefined,
    session: { ttlMs: env.SESSION_TTL_MINUTES * 60 * 1000 },
});

const NEST_LOG_LEVELS: Record<TLogLevel, LogLevel[]> = {
    debug: ['error', 'warn', 'log', 'debug', 'verbose'],
    info: ['error', 'warn', 'log'],
    warn: ['error', 'warn'],
    error: ['error'],
};

export const resolveLogLevels = (level: TLogLevel): LogLevel[] =>
    NEST_LOG_LEVELS[level];
