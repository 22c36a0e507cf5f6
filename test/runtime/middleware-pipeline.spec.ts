import type { IMenuBotUpdateContext } from '../../src/app.interface';
import {
    buildMiddlewarePipeline,
    createUpdateLoggerMiddleware,
    sortMiddlewareConfigs,
} from '../../src/bot/runtime/middleware-pipeline';
import { createLoggerMock, createCallbackQuery, createMessage } from '../factories/menu';

const contextFor = (text?: string): IMenuBotUpdateContext => ({
    event: 'message',
    chatId: 100,
    user: { id: 2, is_bot: false, first_name: 'Tester' },
    isAdmin: false,
    message: createMessage({ text }),
});

describe('middleware pipeline', () => {
    it('sorts by descending priority without mutating the input', () => {
        const input = [
            { name: 'a', priority: 1 },
            { name: 'b' },
            { name: 'c', priority: 5 },
        ];

        expect(sortMiddlewareConfigs(input).map((entry) => entry.name)).toEqual([
            'c',
            'a',
            'b',
        ]);
        expect(input.map((entry) => entry.name)).toEqual(['a', 'b', 'c']);
    });

    it('runs middlewares around the handler in priority order', async () => {
        const calls: string[] = [];
        const pipeline = buildMiddlewarePipeline<[string]>({
            event: 'message',
            handler: async (value) => {
                calls.push(`handler ${value}`);
            },
            contextFactory: () => contextFor('hi'),
            middlewares: [
                {
                    priority: 1,
                    handler: async (_context, next) => {
                        calls.push('low');
                        await next();
                    },
                },
                {
                    priority: 10,
                    handler: async (_context, next) => {
                        calls.push('high:before');
                        await next();
                        await next();
                        calls.push('high:after');
                    },
                },
            ],
        });

        await pipeline('x');

        expect(calls).toEqual(['high:before', 'low', 'handler x', 'high:after']);
    });

    it('stops when a middleware does not call next', async () => {
        const handler = jest.fn();
        const pipeline = buildMiddlewarePipeline<[]>({
            event: 'message',
            handler,
            contextFactory: () => contextFor(),
            middlewares: [{ handler: () => undefined }],
        });

        await pipeline();

        expect(handler).not.toHaveBeenCalled();
    });

    it('propagates handler errors', async () => {
        const failure = new Error('boom');
        const pipeline = buildMiddlewarePipeline<[]>({
            event: 'message',
            handler: async () => {
                throw failure;
            },
            contextFactory: () => contextFor(),
        });

        await expect(pipeline()).rejects.toBe(failure);
    });

    it('logs each update at debug level', async () => {
        const logger = createLoggerMock();
        const middleware = createUpdateLoggerMiddleware(logger);
        const next = jest.fn(async () => undefined);

        await middleware.handler(contextFor(), next);
        await middleware.handler(
            {
                event: 'callback_query',
                isAdmin: false,
                callbackQuery: createCallbackQuery('id:3'),
            },
            next,
        );

        expect(logger.debug).toHaveBeenNthCalledWith(
            1,
            'message chat=100 user=2 text=<non-text>',
        );
        expect(logger.debug).toHaveBeenNthCalledWith(
            2,
            'callback_query chat=? user=? data=id:3',
        );
        expect(next).toHaveBeenCalledTimes(2);
    });
});
