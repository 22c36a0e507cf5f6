import { Logger } from '@nestjs/common';
import type TelegramBot from 'node-telegram-bot-api';
import { setTimeout as wait } from 'node:timers/promises';
import type {
    IContentStep,
    IMediaRef,
    IMenuNode,
    TMenuBotClient,
} from '../app.interface';
import type { IMenuBotMessages } from '../bot/bot.messages';

const MAX_CAPTION_LENGTH = 1024;

export interface ContentDeliveryOptions {
    client: TMenuBotClient;
    logger: Logger;
    messages: IMenuBotMessages;
    sleep?: (ms: number) => Promise<void>;
}

export class ContentDelivery {
    private readonly client: TMenuBotClient;
    private readonly logger: Logger;
    private readonly messages: IMenuBotMessages;
    private readonly sleep: (ms: number) => Promise<void>;

    constructor(options: ContentDeliveryOptions) {
        this.client = options.client;
        this.logger = options.logger;
        this.messages = options.messages;
        this.sleep = options.sleep ?? ((ms) => wait(ms));
    }

    /**
     * Sends the node's attached media and then each step in position order,
     * waiting each step's delay before it. Files that fail to send are
     * reported to the user and skipped.
     */
    public async deliverNode(
        chatId: TelegramBot.ChatId,
        node: IMenuNode,
        steps: IContentStep[],
    ): Promise<void> {
        if (node.media) {
            await this.pause(node.delay);
            await this.sendMediaSafely(chatId, node, node.media, null);
        }

        for (const step of steps) {
            await this.pause(step.delay);

            if (step.media) {
                await this.sendMediaSafely(chatId, node, step.media, step.text);
            } else if (step.text) {
                await this.client.sendMessage(chatId, step.text);
            }
        }
    }

    public async sendMedia(
        chatId: TelegramBot.ChatId,
        media: IMediaRef,
        caption: string | null,
    ): Promise<void> {
        const fitsCaption =
            caption !== null && caption.length <= MAX_CAPTION_LENGTH;
        const options: { caption?: string } =
            caption !== null && fitsCaption ? { caption } : {};

        switch (media.kind) {
            case 'photo':
                await this.client.sendPhoto(chatId, media.fileId, options);
                break;
            case 'video':
                await this.client.sendVideo(chatId, media.fileId, options);
                break;
            case 'document':
                await this.client.sendDocument(chatId, media.fileId, options);
                break;
            case 'audio':
                await this.client.sendAudio(chatId, media.fileId, options);
                break;
            case 'voice':
                await this.client.sendVoice(chatId, media.fileId, options);
                break;
            case 'video_note':
                await this.client.sendVideoNote(chatId, media.fileId);
                break;
        }

        if (caption && (!fitsCaption || media.kind === 'video_note')) {
            await this.client.sendMessage(chatId, caption);
        }
    }

    private async sendMediaSafely(
        chatId: TelegramBot.ChatId,
        node: IMenuNode,
        media: IMediaRef,
        caption: string | null,
    ): Promise<void> {
        try {
            await this.sendMedia(chatId, media, caption);
        } catch (error) {
            this.logger.warn(
                this.messages.mediaDeliveryFailed({
                    nodeId: node.id,
                    fileId: media.fileId,
                    error,
                }),
            );
            await this.client.sendMessage(chatId, this.messages.mediaUnavailable());
        }
    }

    private async pause(seconds: number): Promise<void> {
        if (seconds > 0) {
            await this.sleep(seconds * 1000);
        }
    }
}
