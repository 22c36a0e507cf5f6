import type { RequestInit } from 'undici';
import { RankingRequestError } from '../../src/errors';
import { RankingClient, TRankingFetch } from '../../src/search/ranking.client';

const OPTIONS = {
    apiKey: 'test-secret',
    baseUrl: 'https://ranking.test/v1/',
    model: 'test-model',
    timeoutMs: 1000,
};

const respond = (status: number, body: unknown) =>
    jest.fn<ReturnType<TRankingFetch>, Parameters<TRankingFetch>>(async () => ({
        status,
        json: async () => body,
    }));

describe('RankingClient', () => {
    it('posts a chat completion and returns the trimmed reply', async () => {
        const fetchImpl = respond(200, {
            choices: [{ message: { content: ' 2, 1 \n' } }],
        });
        const client = new RankingClient(OPTIONS, fetchImpl);

        await expect(client.complete('system', 'user')).resolves.toBe('2, 1');

        const [url, init] = fetchImpl.mock.calls[0] ?? [];
        expect(url).toBe('https://ranking.test/v1/chat/completions');
        expect(init?.method).toBe('POST');
        expect(init?.headers).toEqual({
            Authorization: 'Bearer test-secret',
            'Content-Type': 'application/json',
        });
        expect(JSON.parse(String(init?.body))).toEqual({
            model: 'test-model',
            messages: [
                { role: 'system', content: 'system' },
                { role: 'user', content: 'user' },
            ],
            temperature: 0.1,
            max_tokens: 200,
        });
    });

    it('fails without an API key and never calls out', async () => {
        const fetchImpl = respond(200, {});
        const client = new RankingClient({ ...OPTIONS, apiKey: undefined }, fetchImpl);

        await expect(client.complete('s', 'u')).rejects.toThrow(
            'Ranking API key is not configured',
        );
        expect(fetchImpl).not.toHaveBeenCalled();
    });

    it('carries the HTTP status of a failed request', async () => {
        const client = new RankingClient(OPTIONS, respond(503, {}));

        const attempt = client.complete('s', 'u');

        await expect(attempt).rejects.toBeInstanceOf(RankingRequestError);
        await expect(attempt).rejects.toMatchObject({
            status: 503,
            message: 'Ranking endpoint answered with status 503',
        });
    });

    it('rejects a payload without choices', async () => {
        const client = new RankingClient(OPTIONS, respond(200, { choices: [] }));

        await expect(client.complete('s', 'u')).rejects.toMatchObject({
            name: 'RankingRequestError',
            status: undefined,
        });
    });

    it('reports a timeout once the request is aborted', async () => {
        const hanging: TRankingFetch = (_url: string, init: RequestInit) =>
            new Promise((_resolve, reject) => {
                init.signal?.addEventListener('abort', () => reject(new Error('aborted')));
            });
        const client = new RankingClient({ ...OPTIONS, timeoutMs: 5 }, hanging);

        await expect(client.complete('s', 'u')).rejects.toThrow(
            'Ranking request timed out after 5 ms',
        );
    });
});
