import type TelegramBot from 'node-telegram-bot-api';
import type { IMediaRef } from '../../app.interface';
import type { TAuthoringInput } from '../../authoring/authoring.state';

/**
 * Picks the single attachment of a message. Photos arrive in several sizes;
 * the largest one is kept.
 */
export const extractMedia = (message: TelegramBot.Message): IMediaRef | null => {
    const photo = message.photo?.at(-1);
    if (photo) {
        return { fileId: photo.file_id, kind: 'photo' };
    }
    if (message.video) {
        return { fileId: message.video.file_id, kind: 'video' };
    }
    if (message.video_note) {
        return { fileId: message.video_note.file_id, kind: 'video_note' };
    }
    if (message.voice) {
        return { fileId: message.voice.file_id, kind: 'voice' };
    }
    if (message.audio) {
        return { fileId: message.audio.file_id, kind: 'audio' };
    }
    if (message.document) {
        return { fileId: message.document.file_id, kind: 'document' };
    }
    return null;
};

/** Maps a message onto the input the authoring machine understands. */
export const toAuthoringInput = (
    message: TelegramBot.Message,
): TAuthoringInput | undefined => {
    const media = extractMedia(message);
    if (media) {
        return { type: 'media', media, caption: message.caption ?? null };
    }

    if (message.text !== undefined) {
        return { type: 'text', text: message.text };
    }

    return undefined;
};

const COMMAND_PATTERN = /^\/([a-z_]+)(?:@\w+)?(?:\s|$)/i;

/** Returns the bare lower-case command name of `/cmd` or `/cmd@bot`. */
export const parseBotCommand = (text: string | undefined): string | undefined => {
    const match = text ? COMMAND_PATTERN.exec(text.trim()) : null;
    return match?.[1]?.toLowerCase();
};
