import { Logger } from '@nestjs/common';
import { MIN_SEARCH_QUERY_LENGTH } from '../app.constants';
import type { IMenuNode, ISearchTriggerOptions } from '../app.interface';
import type { IMenuBotMessages } from '../bot/bot.messages';
import { RankingRequestError } from '../errors';
import type { MenuTreeReader } from '../menu/menu-tree.reader';
import type { IRankingClient } from './ranking.client';
import {
    SEARCH_SYSTEM_PROMPT,
    buildSearchListing,
    buildSearchUserPrompt,
    parseRankingReply,
} from './search.prompt';

export interface ISearchMatch {
    node: IMenuNode;
    parentLabel?: string;
}

export type TSearchOutcome =
    | { kind: 'invalidQuery'; reason: 'empty' | 'tooShort' }
    | { kind: 'easterEgg'; reply: string; matches: [] }
    | { kind: 'notMeaningful' }
    | { kind: 'noMatches' }
    | { kind: 'matches'; matches: ISearchMatch[] }
    | { kind: 'error'; reason: 'unavailable' | 'failed'; status?: number };

export interface SearchServiceOptions {
    reader: MenuTreeReader;
    ranking?: IRankingClient;
    trigger?: ISearchTriggerOptions;
    logger: Logger;
    messages: IMenuBotMessages;
}

/**
 * Free-text search over every node. Short queries and the trigger phrase are
 * answered locally; everything else is ranked by the external model.
 */
export class SearchService {
    constructor(private readonly options: SearchServiceOptions) {}

    public async search(rawQuery: string): Promise<TSearchOutcome> {
        const query = rawQuery.trim();
        if (query.length === 0) {
            return { kind: 'invalidQuery', reason: 'empty' };
        }

        if (query.length < MIN_SEARCH_QUERY_LENGTH) {
            return { kind: 'invalidQuery', reason: 'tooShort' };
        }

        const trigger = this.options.trigger;
        if (
            trigger &&
            query.toLowerCase() === trigger.phrase.trim().toLowerCase()
        ) {
            return { kind: 'easterEgg', reply: trigger.reply, matches: [] };
        }

        const entries = await this.options.reader.getTree();
        if (entries.length === 0) {
            return { kind: 'noMatches' };
        }

        const ranking = this.options.ranking;
        if (!ranking) {
            return { kind: 'error', reason: 'unavailable' };
        }

        let reply: string;
        try {
            reply = await ranking.complete(
                SEARCH_SYSTEM_PROMPT,
                buildSearchUserPrompt(query, buildSearchListing(entries)),
            );
        } catch (error) {
            this.options.logger.warn(this.options.messages.searchFailed({ error }));
            return {
                kind: 'error',
                reason: 'failed',
                status: error instanceof RankingRequestError ? error.status : undefined,
            };
        }

        const verdict = parseRankingReply(reply, entries.length);
        if (verdict.kind !== 'indices') {
            return verdict;
        }

        const matches: ISearchMatch[] = [];
        const seenIds = new Set<number>();
        const seenLabels = new Set<string>();
        for (const index of verdict.indices) {
            const entry = entries[index - 1];
            if (!entry) {
                continue;
            }

            const label = entry.node.label.trim().toLowerCase();
            if (seenIds.has(entry.node.id) || seenLabels.has(label)) {
                continue;
            }

            seenIds.add(entry.node.id);
            seenLabels.add(label);
            matches.push({ node: entry.node, parentLabel: entry.path.at(-1) });
        }

        return matches.length > 0 ? { kind: 'matches', matches } : { kind: 'noMatches' };
    }
}
