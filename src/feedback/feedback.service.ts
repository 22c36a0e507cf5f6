import { Logger } from '@nestjs/common';
import type TelegramBot from 'node-telegram-bot-api';
import type { TMenuBotClient } from '../app.interface';
import type { IMenuBotMessages } from '../bot/bot.messages';

export type TFeedbackRelayResult = 'delivered' | 'unavailable' | 'failed';

export interface FeedbackServiceOptions {
    client: TMenuBotClient;
    logger: Logger;
    messages: IMenuBotMessages;
    feedbackChatId?: TelegramBot.ChatId;
}

const fullNameOf = (user?: TelegramBot.User): string =>
    [user?.first_name, user?.last_name].filter(Boolean).join(' ');

export class FeedbackService {
    constructor(private readonly options: FeedbackServiceOptions) {}

    /**
     * Passes a user's message on to the operator chat: a header describing the
     * sender first, then the original message forwarded as is.
     */
    public async relay(message: TelegramBot.Message): Promise<TFeedbackRelayResult> {
        const { client, feedbackChatId, messages } = this.options;
        if (feedbackChatId === undefined || feedbackChatId === '') {
            return 'unavailable';
        }

        try {
            await client.sendMessage(
                feedbackChatId,
                messages.feedbackHeader({
                    userId: message.from?.id,
                    username: message.from?.username,
                    fullName: fullNameOf(message.from),
                    chatId: message.chat.id,
                    chatType: message.chat.type,
                }),
            );
            await client.forwardMessage(
                feedbackChatId,
                message.chat.id,
                message.message_id,
            );
            return 'delivered';
        } catch (error) {
            this.options.logger.warn(
                messages.feedbackRelayFailed({ chatId: feedbackChatId, error }),
            );
            return 'failed';
        }
    }
}
