import type { IContentStep, IMenuNode } from '../../src/app.interface';
import { DEFAULT_MENU_BOT_MESSAGES } from '../../src/bot/bot.messages';
import { ContentDelivery } from '../../src/menu/content-delivery';
import { CHAT_ID, createLoggerMock, seedTree } from '../factories/menu';
import { NodeTelegramBotApiMock } from '../mocks/node-telegram-bot-api';

describe('ContentDelivery', () => {
    const setup = () => {
        const client = new NodeTelegramBotApiMock();
        const logger = createLoggerMock();
        const events: string[] = [];
        const sleep = jest.fn(async (ms: number) => {
            events.push(`sleep ${ms}`);
        });
        client.sendMessage.mockImplementation(async (...args: unknown[]) => {
            events.push(`text ${String(args[1])}`);
            return {};
        });
        client.sendPhoto.mockImplementation(async (...args: unknown[]) => {
            events.push(`photo ${String(args[1])}`);
            return {};
        });
        const delivery = new ContentDelivery({
            client: client.asClient(),
            logger,
            messages: DEFAULT_MENU_BOT_MESSAGES,
            sleep,
        });
        return { client, logger, events, sleep, delivery };
    };

    it('sends steps in order and waits only for non-zero delays', async () => {
        const { storage, about } = await seedTree();
        const { delivery, events } = setup();

        await delivery.deliverNode(CHAT_ID, about, await storage.listSteps(about.id));

        expect(events).toEqual(['text We make menus', 'sleep 2000', 'text Since 2020']);
    });

    it('sends the node media first, with its legacy delay', async () => {
        const { office } = await seedTree();
        const { delivery, events } = setup();

        await delivery.deliverNode(CHAT_ID, { ...office, delay: 3 }, []);

        expect(events).toEqual(['sleep 3000', 'photo photo-1']);
    });

    it('reports an unavailable file and keeps going', async () => {
        const { office } = await seedTree();
        const { delivery, client, logger, events } = setup();
        client.sendPhoto.mockRejectedValueOnce(new Error('wrong file id'));
        const step: IContentStep = {
            id: 1,
            nodeId: office.id,
            position: 1,
            kind: 'text',
            text: 'Open 9-18',
            media: null,
            delay: 0,
            createdAt: new Date(0),
        };

        await delivery.deliverNode(CHAT_ID, office, [step]);

        expect(logger.warn).toHaveBeenCalledWith(
            'Could not deliver file photo-1 of node 3: wrong file id',
        );
        expect(events).toEqual([
            'text Sorry, a file in this section is currently unavailable.',
            'text Open 9-18',
        ]);
    });

    it('sends long captions as a separate message', async () => {
        const { delivery, client } = setup();
        const caption = 'x'.repeat(1025);

        await delivery.sendMedia(CHAT_ID, { fileId: 'doc-1', kind: 'document' }, caption);

        expect(client.sendDocument).toHaveBeenCalledWith(CHAT_ID, 'doc-1', {});
        expect(client.sendMessage).toHaveBeenCalledWith(CHAT_ID, caption);
    });

    it('follows a video note with its caption', async () => {
        const { delivery, client } = setup();

        await delivery.sendMedia(CHAT_ID, { fileId: 'note-1', kind: 'video_note' }, 'Hi');

        expect(client.sendVideoNote).toHaveBeenCalledWith(CHAT_ID, 'note-1');
        expect(client.sendMessage).toHaveBeenCalledWith(CHAT_ID, 'Hi');
    });

    it('skips empty text steps', async () => {
        const { delivery, client } = setup();
        const node: IMenuNode = {
            id: 9,
            label: 'Empty',
            callbackToken: 'id:9',
            body: null,
            parentId: null,
            media: null,
            delay: 0,
            createdAt: new Date(0),
        };

        await delivery.deliverNode(CHAT_ID, node, []);

        expect(client.sendMessage).not.toHaveBeenCalled();
    });
});
