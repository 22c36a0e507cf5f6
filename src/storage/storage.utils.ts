import { MEDIA_KINDS } from '../app.constants';
import type { IMediaRef, TMediaKind, TStepKind } from '../app.interface';

export const NODE_TOKEN_PREFIX = 'id:';

export const buildNodeToken = (nodeId: number): string =>
    `${NODE_TOKEN_PREFIX}${nodeId}`;

export const isMediaKind = (value: unknown): value is TMediaKind =>
    typeof value === 'string' &&
    MEDIA_KINDS.some((kind) => kind === value);

/**
 * Rebuilds a media reference from the loose column pair used by the relational
 * schema. Unknown kinds are treated as documents, which Telegram accepts for
 * any file id.
 */
export const toMediaRef = (
    fileId: string | null | undefined,
    fileType: string | null | undefined,
): IMediaRef | null => {
    if (!fileId) {
        return null;
    }

    return {
        fileId,
        kind: isMediaKind(fileType) ? fileType : 'document',
    };
};

export const stepKindOf = (media: IMediaRef | null): TStepKind =>
    media ? 'file' : 'text';

/** Positions accepted for insertion run from 1 to one past the last step. */
export const clampInsertPosition = (position: number, count: number): number =>
    Math.min(Math.max(Math.trunc(position), 1), count + 1);

export const isExistingPosition = (position: number, count: number): boolean =>
    Number.isInteger(position) && position >= 1 && position <= count;
