import { SEARCH_SNIPPET_LENGTH } from '../app.constants';
import type { IMenuTreeEntry } from '../menu/menu-tree.reader';

export const UNCLEAR_SENTINEL = 'UNCLEAR';
export const NO_RESULTS_SENTINEL = 'NO_RESULTS';

export const SEARCH_SYSTEM_PROMPT = [
    'You help users find sections of a chat bot menu.',
    'You receive a numbered list of menu sections and a user request.',
    `If the request is meaningless or not a search at all, answer exactly ${UNCLEAR_SENTINEL}.`,
    `If no section is relevant, answer exactly ${NO_RESULTS_SENTINEL}.`,
    'Otherwise answer only with the numbers of the relevant sections, most relevant first, separated by commas.',
    'Do not add any other words.',
].join('\n');

export type TRankingVerdict =
    | { kind: 'notMeaningful' }
    | { kind: 'noMatches' }
    | { kind: 'indices'; indices: number[] };

const truncate = (value: string): string =>
    value.length > SEARCH_SNIPPET_LENGTH
        ? `${value.slice(0, SEARCH_SNIPPET_LENGTH)}...`
        : value;

const describeEntry = (entry: IMenuTreeEntry): string => {
    const parts: string[] = [];
    if (entry.node.body) {
        parts.push(entry.node.body);
    }
    if (entry.node.media) {
        parts.push(`[${entry.node.media.kind}]`);
    }
    for (const step of entry.steps) {
        if (step.media) {
            parts.push(step.text ? `[${step.media.kind}] ${step.text}` : `[${step.media.kind}]`);
        } else if (step.text) {
            parts.push(step.text);
        }
    }
    return truncate(parts.join(' | ').replace(/\s+/g, ' ').trim());
};

/** One numbered line per node, 1-based, in tree order. */
export const buildSearchListing = (entries: IMenuTreeEntry[]): string =>
    entries
        .map((entry, index) => {
            const location =
                entry.path.length > 0 ? ` (inside: ${entry.path.join(' > ')})` : '';
            const content = describeEntry(entry);
            return `${index + 1}. ${entry.node.label}${location}${content ? ` - ${content}` : ''}`;
        })
        .join('\n');

export const buildSearchUserPrompt = (query: string, listing: string): string =>
    `Menu sections:\n${listing}\n\nUser request: ${query}`;

/**
 * Interprets the model's reply against a listing of `count` entries. Indices
 * outside the listing are dropped; repeated ones are kept once.
 */
export const parseRankingReply = (
    reply: string,
    count: number,
): TRankingVerdict => {
    const normalized = reply.trim().toUpperCase();

    if (normalized.includes(UNCLEAR_SENTINEL)) {
        return { kind: 'notMeaningful' };
    }

    if (normalized === '' || normalized.includes(NO_RESULTS_SENTINEL)) {
        return { kind: 'noMatches' };
    }

    const indices: number[] = [];
    for (const match of normalized.match(/\d+/g) ?? []) {
        const index = Number(match);
        if (index >= 1 && index <= count && !indices.includes(index)) {
            indices.push(index);
        }
    }

    return indices.length > 0 ? { kind: 'indices', indices } : { kind: 'noMatches' };
};
