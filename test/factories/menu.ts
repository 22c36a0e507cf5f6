import { Logger } from '@nestjs/common';
import type TelegramBot from 'node-telegram-bot-api';
import type { IContentStepInput, IMenuNode } from '../../src/app.interface';
import { MemoryStorage } from '../../src/storage/memory.storage';

export const ADMIN_ID = 1;
export const USER_ID = 2;
export const CHAT_ID = 100;

export const createLoggerMock = (): jest.Mocked<Logger> =>
    ({
        log: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
        verbose: jest.fn(),
        debug: jest.fn(),
        setContext: jest.fn(),
    }) as unknown as jest.Mocked<Logger>;

export const createMessage = (
    overrides: Partial<TelegramBot.Message> = {},
): TelegramBot.Message => ({
    message_id: 1,
    date: 0,
    chat: { id: CHAT_ID, type: 'private' },
    from: { id: USER_ID, is_bot: false, first_name: 'Tester' },
    ...overrides,
});

export const createCallbackQuery = (
    data: string,
    fromId: number = USER_ID,
): TelegramBot.CallbackQuery => ({
    id: 'query-1',
    chat_instance: 'instance',
    data,
    from: { id: fromId, is_bot: false, first_name: 'Tester' },
    message: createMessage(),
});

export const textStep = (text: string, delay = 0): IContentStepInput => ({
    text,
    media: null,
    delay,
});

export interface ISeededTree {
    storage: MemoryStorage;
    about: IMenuNode;
    contacts: IMenuNode;
    office: IMenuNode;
}

/**
 * Root "About" with two steps, root "Contacts" with the child "Office"
 * carrying a photo.
 */
export const seedTree = async (
    storage: MemoryStorage = new MemoryStorage('Hi there'),
): Promise<ISeededTree> => {
    const about = await storage.createNodeWithSteps(
        { label: 'About', parentId: null, body: 'About us' },
        [textStep('We make menus'), textStep('Since 2020', 2)],
    );
    const contacts = await storage.createNode({ label: 'Contacts', parentId: null });
    const office = await storage.createNode({
        label: 'Office',
        parentId: contacts.id,
        media: { fileId: 'photo-1', kind: 'photo' },
    });

    return { storage, about, contacts, office };
};
