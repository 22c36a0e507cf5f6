import { Inject, Injectable, Logger } from '@nestjs/common';
import { MENU_BOT_STORAGE } from '../app.constants';
import type { IMediaRef, IMenuStorage, TMenuBotClient } from '../app.interface';
import { IMenuTreeEntry, MenuTreeReader } from './menu-tree.reader';

export const MEDIA_AUDIT_CLIENT = Symbol('MEDIA_AUDIT_CLIENT');

export type TMediaAuditClient = Pick<TMenuBotClient, 'getFile'>;

export interface IMissingMediaEntry {
    nodeId: number;
    path: string;
}

export interface IBrokenMediaEntry {
    nodeId: number;
    path: string;
    /** Step position, or null for media attached to the node itself. */
    position: number | null;
    fileId: string;
    reason: string;
}

interface IMediaUsage {
    entry: IMenuTreeEntry;
    position: number | null;
}

const pathOf = (entry: IMenuTreeEntry): string =>
    [...entry.path, entry.node.label].join(' > ');

@Injectable()
export class MediaAuditService {
    private readonly logger = new Logger(MediaAuditService.name);
    private readonly reader: MenuTreeReader;

    constructor(
        @Inject(MENU_BOT_STORAGE) storage: IMenuStorage,
        @Inject(MEDIA_AUDIT_CLIENT) private readonly client: TMediaAuditClient,
    ) {
        this.reader = new MenuTreeReader(storage);
    }

    /** Nodes with no file on the node itself nor on any of its steps. */
    public async findNodesWithoutMedia(): Promise<IMissingMediaEntry[]> {
        const entries = await this.reader.getTree();
        return entries
            .filter(
                (entry) =>
                    !entry.node.media && entry.steps.every((step) => !step.media),
            )
            .map((entry) => ({ nodeId: entry.node.id, path: pathOf(entry) }));
    }

    /**
     * Asks Telegram about every distinct file id once and reports each usage of
     * the ids it rejects.
     */
    public async findBrokenMedia(): Promise<IBrokenMediaEntry[]> {
        const usages = new Map<string, IMediaUsage[]>();
        const track = (media: IMediaRef | null, usage: IMediaUsage): void => {
            if (!media) {
                return;
            }
            const list = usages.get(media.fileId) ?? [];
            list.push(usage);
            usages.set(media.fileId, list);
        };

        for (const entry of await this.reader.getTree()) {
            track(entry.node.media, { entry, position: null });
            for (const step of entry.steps) {
                track(step.media, { entry, position: step.position });
            }
        }

        const broken: IBrokenMediaEntry[] = [];
        for (const [fileId, list] of usages) {
            try {
                await this.client.getFile(fileId);
            } catch (error) {
                const reason = error instanceof Error ? error.message : String(error);
                this.logger.debug(`File ${fileId} rejected: ${reason}`);
                for (const { entry, position } of list) {
                    broken.push({
                        nodeId: entry.node.id,
                        path: pathOf(entry),
                        position,
                        fileId,
                        reason,
                    });
                }
            }
        }

        return broken;
    }
}
