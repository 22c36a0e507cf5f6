import { Logger } from '@nestjs/common';
import type {
    IMenuBotMiddlewareConfig,
    IMenuBotUpdateContext,
    TMenuBotEvent,
} from '../../app.interface';

export interface BuildMiddlewarePipelineOptions<TArgs extends unknown[]> {
    event: TMenuBotEvent;
    handler: (...args: TArgs) => void | Promise<void>;
    middlewares?: IMenuBotMiddlewareConfig[];
    contextFactory: (
        event: TMenuBotEvent,
        args: TArgs,
    ) => IMenuBotUpdateContext | Promise<IMenuBotUpdateContext>;
}

/**
 * Returns a new list of middleware configs sorted by descending priority so
 * higher-priority entries execute earlier.
 */
export const sortMiddlewareConfigs = <T extends { priority?: number }>(
    middlewares: T[] = [],
): T[] =>
    [...middlewares].sort((a, b) => (b.priority ?? 0) - (a.priority ?? 0));

/**
 * Builds an executable pipeline that invokes configured middlewares before the
 * target handler. A middleware that never calls `next` stops the update.
 */
export const buildMiddlewarePipeline = <TArgs extends unknown[]>(
    options: BuildMiddlewarePipelineOptions<TArgs>,
) => {
    const sorted = sortMiddlewareConfigs(options.middlewares);

    return async (...args: TArgs): Promise<void> => {
        const context = await options.contextFactory(options.event, args);

        const execute = async (index: number): Promise<void> => {
            const current = sorted[index];
            if (!current) {
                await options.handler(...args);
                return;
            }

            let called = false;
            const next = async () => {
                if (called) {
                    return;
                }
                called = true;
                await execute(index + 1);
            };

            await current.handler(context, next);
        };

        await execute(0);
    };
};

export const UPDATE_LOGGER_PRIORITY = 1000;

/** Debug-logs every update before anything else sees it. */
export const createUpdateLoggerMiddleware = (
    logger: Logger,
): IMenuBotMiddlewareConfig => ({
    name: 'update-logger',
    priority: UPDATE_LOGGER_PRIORITY,
    handler: async (context, next) => {
        const payload =
            context.event === 'callback_query'
                ? `data=${context.callbackQuery?.data ?? ''}`
                : `text=${context.message?.text ?? '<non-text>'}`;
        logger.debug(
            `${context.event} chat=${context.chatId ?? '?'} user=${context.user?.id ?? '?'} ${payload}`,
        );
        await next();
    },
});
