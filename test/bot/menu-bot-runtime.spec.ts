import type TelegramBot from 'node-telegram-bot-api';
import type { IChatSession } from '../../src/app.interface';
import {
    MenuBotRuntime,
    MenuBotRuntimeOptions,
} from '../../src/bot/menu-bot.runtime';
import {
    ADMIN_ID,
    CHAT_ID,
    USER_ID,
    createCallbackQuery,
    createLoggerMock,
    createMessage,
    seedTree,
} from '../factories/menu';
import { NodeTelegramBotApiMock } from '../mocks/node-telegram-bot-api';
import { createInMemorySessionStorage } from '../mocks/session-storage';

const FEEDBACK_CHAT_ID = -500;

const userOf = (id: number): TelegramBot.User => ({
    id,
    is_bot: false,
    first_name: 'Tester',
});

describe('MenuBotRuntime', () => {
    const GENERIC_ERROR = 'Something went wrong. Please try again later.';
    const HOME_KEYBOARD = {
        reply_markup: {
            inline_keyboard: [[{ text: '🏠 Main menu', callback_data: 'home' }]],
        },
    };

    const setup = async (overrides: Partial<MenuBotRuntimeOptions> = {}) => {
        const tree = await seedTree();
        const client = new NodeTelegramBotApiMock();
        const logger = createLoggerMock();
        const sessionStorage = createInMemorySessionStorage<IChatSession>();
        const complete = jest.fn<Promise<string>, [string, string]>(async () => '3');
        const sleep = jest.fn(async (_ms: number) => undefined);
        const runtime = new MenuBotRuntime(
            {
                client: client.asClient(),
                storage: tree.storage,
                adminIds: [ADMIN_ID],
                feedbackChatId: FEEDBACK_CHAT_ID,
                ranking: { complete },
                searchTrigger: { phrase: 'open sesame', reply: 'You found it.' },
                sessionStorage,
                ...overrides,
            },
            { logger, sleep },
        );
        runtime.start();

        const sendText = (text: string, fromId: number = USER_ID) =>
            client.emit('message', createMessage({ text, from: userOf(fromId) }));
        const press = (data: string, fromId: number = USER_ID) =>
            client.emit('callback_query', createCallbackQuery(data, fromId));
        const stageOf = () => sessionStorage.store.get(CHAT_ID.toString())?.stage;

        return {
            ...tree,
            client,
            logger,
            sessionStorage,
            complete,
            sleep,
            runtime,
            sendText,
            press,
            stageOf,
        };
    };

    it('subscribes once to messages, callbacks and polling errors', async () => {
        const { client, runtime, logger } = await setup();

        runtime.start();

        expect(client.on.mock.calls.map(([event]) => event)).toEqual([
            'message',
            'callback_query',
            'polling_error',
        ]);
        expect(logger.log).toHaveBeenCalledWith(
            'Menu bot runtime initialized with 1 admin(s)',
        );
        expect(runtime.isAdmin(ADMIN_ID)).toBe(true);
        expect(runtime.isAdmin(USER_ID)).toBe(false);
        expect(runtime.isAdmin(undefined)).toBe(false);
    });

    it('shows the welcome text and root buttons on /start', async () => {
        const { client, sendText } = await setup();

        await sendText('/start');

        expect(client.sendMessage).toHaveBeenCalledTimes(1);
        expect(client.sendMessage).toHaveBeenCalledWith(CHAT_ID, 'Hi there', {
            reply_markup: {
                inline_keyboard: [
                    [{ text: 'About', callback_data: 'id:1' }],
                    [{ text: 'Contacts', callback_data: 'id:2' }],
                    [{ text: '🔍 Search', callback_data: 'search' }],
                    [{ text: '✉️ Feedback', callback_data: 'feedback' }],
                ],
            },
        });
    });

    it('answers idle text with the user id and the root menu', async () => {
        const { client, sendText } = await setup();

        await sendText('hello?');

        expect(client.sentTexts()).toEqual(['Your user ID: 2', 'Hi there']);
    });

    it('delivers the steps of an opened node before its menu', async () => {
        const { client, press, sleep } = await setup();

        await press('id:1');

        expect(client.answerCallbackQuery).toHaveBeenCalledWith('query-1', {});
        expect(client.sentTexts()).toEqual(['We make menus', 'Since 2020', 'About us']);
        expect(sleep).toHaveBeenCalledTimes(1);
        expect(sleep).toHaveBeenCalledWith(2000);
    });

    it('opens nodes from legacy tokens', async () => {
        const { client, press } = await setup();

        await press('btn_id_2');

        expect(client.sentTexts()).toEqual(['Contacts']);
    });

    it('alerts on stale buttons without sending messages', async () => {
        const { client, press } = await setup();

        await press('h:0123456789abcdef');

        expect(client.answerCallbackQuery).toHaveBeenCalledWith('query-1', {
            text: 'This button is outdated. Please open the menu again.',
            show_alert: true,
        });
        expect(client.sendMessage).not.toHaveBeenCalled();
    });

    it('refuses authoring buttons to regular users', async () => {
        const { client, press, stageOf } = await setup();

        await press('add:0');

        expect(client.answerCallbackQuery).toHaveBeenCalledWith('query-1', {
            text: 'This action is available to administrators only.',
            show_alert: true,
        });
        expect(client.sendMessage).not.toHaveBeenCalled();
        expect(stageOf()).toBeUndefined();
    });

    it('reports a node that no longer exists', async () => {
        const { client, press } = await setup();

        await press('id:99');

        expect(client.sendMessage).toHaveBeenCalledWith(
            CHAT_ID,
            'This section no longer exists.',
            {
                reply_markup: {
                    inline_keyboard: [[{ text: '🏠 Main menu', callback_data: 'home' }]],
                },
            },
        );
    });

    it('lets an admin create a root button through the wizard', async () => {
        const { client, storage, press, sendText, stageOf } = await setup();

        await press('add:0', ADMIN_ID);
        expect(stageOf()).toEqual({ kind: 'awaitingLabel', parentId: null });

        await sendText('Test', ADMIN_ID);
        await sendText('Hello', ADMIN_ID);
        expect(stageOf()?.kind).toBe('awaitingFinalization');

        await press('wz:finish', ADMIN_ID);

        expect(client.sentTexts()).toEqual([
            'Send the name of the new button (up to 35 characters).',
            '"Test": send the first step, text or a single file.',
            '"Test" has 1 step(s).\nAdd another step, set a delay for it, or finish.',
            'Button created.',
            'Hi there',
        ]);
        expect(stageOf()).toEqual({ kind: 'idle' });

        const roots = await storage.listChildren(null);
        expect(roots.map((node) => node.label)).toEqual(['About', 'Contacts', 'Test']);
        const created = roots[2];
        expect(
            (await storage.listSteps(created?.id ?? 0)).map((step) => step.text),
        ).toEqual(['Hello']);
    });

    it('re-prompts with the reason when input is rejected', async () => {
        const { client, press, sendText, stageOf } = await setup();
        await press('add:0', ADMIN_ID);

        await sendText('x'.repeat(36), ADMIN_ID);

        expect(client.sentTexts()[1]).toBe(
            'The name must be at most 35 characters.\nSend the name of the new button (up to 35 characters).',
        );
        expect(stageOf()).toEqual({ kind: 'awaitingLabel', parentId: null });
    });

    it('cancels the wizard and returns to the edited node', async () => {
        const { client, press, stageOf } = await setup();
        await press('ren:2', ADMIN_ID);

        await press('wz:cancel', ADMIN_ID);

        expect(client.sentTexts().slice(-2)).toEqual(['Cancelled.', 'Contacts']);
        expect(stageOf()).toEqual({ kind: 'idle' });
    });

    it('drops an authoring stage held by a non-admin chat', async () => {
        const { client, sessionStorage, sendText, stageOf } = await setup();
        sessionStorage.store.set(CHAT_ID.toString(), {
            stage: { kind: 'awaitingNewLabel', nodeId: 1 },
            mode: 'admin',
        });

        await sendText('Renamed');

        expect(client.sentTexts()).toEqual(['Your user ID: 2', 'Hi there']);
        expect(stageOf()).toEqual({ kind: 'idle' });
    });

    it('switches admins into admin mode with authoring controls', async () => {
        const { client, sendText } = await setup();

        await sendText('/admin', USER_ID);
        await sendText('/admin', ADMIN_ID);

        expect(client.sentTexts()).toEqual([
            'This action is available to administrators only.',
            'Admin mode enabled.',
            'Hi there',
        ]);
        const [, , options] = client.sendMessage.mock.calls[2] ?? [];
        expect(options).toMatchObject({
            reply_markup: {
                inline_keyboard: expect.arrayContaining([
                    [{ text: '➕ Add button', callback_data: 'add:0' }],
                    [{ text: '👤 User mode', callback_data: 'mode' }],
                ]),
            },
        });
    });

    it('deletes a node after confirmation', async () => {
        const { client, storage, press } = await setup();

        await press('del:2', ADMIN_ID);
        await press('delok:2', ADMIN_ID);

        expect(client.sentTexts()).toEqual([
            'Delete "Contacts" together with all nested buttons and steps?',
            '"Contacts" deleted.',
            'Hi there',
        ]);
        await expect(storage.getNode(3)).resolves.toBeUndefined();
    });

    it('keeps asking for a search query that is too short', async () => {
        const { client, press, sendText, stageOf, complete } = await setup();

        await press('search');
        await sendText('a');

        expect(client.sentTexts()).toEqual([
            'What are you looking for? Send a few words.',
            'Please send at least 2 characters.',
        ]);
        expect(stageOf()).toEqual({ kind: 'awaitingSearchQuery' });
        expect(complete).not.toHaveBeenCalled();
    });

    it('lists ranked search results as buttons', async () => {
        const { client, press, sendText, stageOf } = await setup();

        await press('search');
        await sendText('office');

        expect(client.sendChatAction).toHaveBeenCalledWith(CHAT_ID, 'typing');
        expect(client.sendMessage).toHaveBeenLastCalledWith(
            CHAT_ID,
            'Found 1 section(s):\n1. Office (in Contacts)',
            {
                reply_markup: {
                    inline_keyboard: [
                        [{ text: 'Office', callback_data: 'id:3' }],
                        [{ text: '🏠 Main menu', callback_data: 'home' }],
                    ],
                },
            },
        );
        expect(stageOf()).toEqual({ kind: 'idle' });
    });

    it('answers the trigger phrase without ranking', async () => {
        const { client, press, sendText, complete } = await setup();

        await press('search');
        await sendText('Open Sesame');

        expect(client.sentTexts().at(-1)).toBe('You found it.');
        expect(complete).not.toHaveBeenCalled();
    });

    it('relays feedback and thanks the user', async () => {
        const { client, press, sendText } = await setup();

        await press('feedback');
        await sendText('Great bot');

        expect(client.forwardMessage).toHaveBeenCalledWith(FEEDBACK_CHAT_ID, CHAT_ID, 1);
        expect(client.sentTexts().slice(-2)).toEqual([
            'Thank you! Your message has been received.',
            'Hi there',
        ]);
    });

    it('apologizes when a message handler fails', async () => {
        const { client, storage, logger, sendText, stageOf } = await setup();
        jest.spyOn(storage, 'getWelcomeMessage').mockRejectedValue(new Error('db down'));

        await sendText('/start');

        expect(logger.error).toHaveBeenCalledWith(
            'Error while handling "message": db down',
        );
        expect(client.sendMessage).toHaveBeenCalledTimes(1);
        expect(client.sendMessage).toHaveBeenCalledWith(CHAT_ID, GENERIC_ERROR, HOME_KEYBOARD);
        expect(stageOf()).toEqual({ kind: 'idle' });
    });

    it('apologizes when a button handler fails', async () => {
        const { client, storage, logger, press } = await setup();
        jest.spyOn(storage, 'getNode').mockRejectedValue(new Error('db down'));

        await press('id:1');

        expect(client.answerCallbackQuery).toHaveBeenCalledWith('query-1', {});
        expect(logger.error).toHaveBeenCalledWith(
            'Error while handling "callback_query": db down',
        );
        expect(client.sentTexts()).toEqual([GENERIC_ERROR]);
    });

    it('reports a failed commit and drops the wizard', async () => {
        const { client, storage, logger, press, sendText, stageOf } = await setup();
        jest
            .spyOn(storage, 'createNodeWithSteps')
            .mockRejectedValue(new Error('disk full'));

        await press('add:0', ADMIN_ID);
        await sendText('Test', ADMIN_ID);
        await sendText('Hello', ADMIN_ID);
        await press('wz:finish', ADMIN_ID);

        expect(logger.error).toHaveBeenCalledWith('Could not apply "createNode": disk full');
        expect(client.sentTexts().slice(-2)).toEqual([GENERIC_ERROR, 'Hi there']);
        expect(stageOf()).toEqual({ kind: 'idle' });
        expect((await storage.listChildren(null)).map((node) => node.label)).toEqual([
            'About',
            'Contacts',
        ]);
    });

    it('inserts a step at a confirmed position', async () => {
        const { client, storage, press, sendText, stageOf } = await setup();

        await press('ins:1', ADMIN_ID);
        await sendText('Middle', ADMIN_ID);
        await sendText('2', ADMIN_ID);
        await press('wz:confirm', ADMIN_ID);

        expect(client.sentTexts()).toEqual([
            'Send the content of the new step, text or a single file.',
            'Send the position for the new step (1-3).',
            'Insert the step at position 2? Steps from there on move down by one.',
            'Step inserted.',
            'About us',
        ]);
        expect(stageOf()).toEqual({ kind: 'idle' });
        const steps = await storage.listSteps(1);
        expect(steps.map((step) => [step.position, step.text, step.delay])).toEqual([
            [1, 'We make menus', 0],
            [2, 'Middle', 0],
            [3, 'Since 2020', 2],
        ]);
    });

    it('shows the full path when confirming a nested delete', async () => {
        const { client, press } = await setup();

        await press('del:3', ADMIN_ID);

        expect(client.sentTexts()).toEqual([
            'Delete "Contacts > Office" together with all nested buttons and steps?',
        ]);
    });

    it('only confirms /cancel when something was in progress', async () => {
        const { client, sendText } = await setup();

        await sendText('/cancel');

        expect(client.sentTexts()).toEqual(['Hi there']);
    });

    it('keeps the search stage when the query is unclear', async () => {
        const { client, press, sendText, stageOf, complete } = await setup();
        complete.mockResolvedValue('UNCLEAR');

        await press('search');
        await sendText('qwerty asdf');

        expect(client.sentTexts().at(-1)).toBe(
            'I could not understand the request. Try rephrasing it.',
        );
        expect(stageOf()).toEqual({ kind: 'awaitingSearchQuery' });
    });

    it('keeps the search stage when ranking fails', async () => {
        const { client, press, sendText, stageOf, complete } = await setup();
        complete.mockRejectedValue(new Error('timeout'));

        await press('search');
        await sendText('office');

        expect(client.sentTexts().at(-1)).toBe('Search failed. Please try again later.');
        expect(stageOf()).toEqual({ kind: 'awaitingSearchQuery' });
    });

    it('tells the user when feedback cannot be relayed at all', async () => {
        const { client, press, sendText } = await setup({ feedbackChatId: undefined });

        await press('feedback');
        await sendText('Great bot');

        expect(client.forwardMessage).not.toHaveBeenCalled();
        expect(client.sentTexts()).toEqual([
            'Send your message and we will pass it on to the team.',
            'Feedback is temporarily unavailable.',
            'Thank you! Your message has been received.',
            'Hi there',
        ]);
    });

    it('tells the user when relaying feedback fails', async () => {
        const { client, logger, press, sendText } = await setup();
        client.forwardMessage.mockRejectedValueOnce(new Error('chat not found'));

        await press('feedback');
        await sendText('Great bot');

        expect(logger.warn).toHaveBeenCalledWith(
            'Could not relay feedback to chat -500: chat not found',
        );
        expect(client.sentTexts().slice(-3)).toEqual([
            'We could not pass your message on to the team right now, but it has been received.',
            'Thank you! Your message has been received.',
            'Hi there',
        ]);
    });
});
