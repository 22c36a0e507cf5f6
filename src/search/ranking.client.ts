import { fetch, RequestInit, Response } from 'undici';
import * as yup from 'yup';
import type { IRankingOptions } from '../app.interface';
import { RankingRequestError } from '../errors';

const RANKING_TEMPERATURE = 0.1;
const RANKING_MAX_TOKENS = 200;

const completionSchema = yup.object({
    choices: yup
        .array()
        .of(
            yup.object({
                message: yup.object({
                    content: yup.string().nullable(),
                }),
            }),
        )
        .min(1)
        .required(),
});

export type TRankingFetch = (
    url: string,
    init: RequestInit,
) => Promise<Pick<Response, 'status' | 'json'>>;

export interface IRankingClient {
    /** Returns the model's plain-text reply. */
    complete(systemPrompt: string, userPrompt: string): Promise<string>;
}

/**
 * Chat-completion client for the external ranking endpoint. Every failure
 * surfaces as a `RankingRequestError`.
 */
export class RankingClient implements IRankingClient {
    private readonly fetchImpl: TRankingFetch;

    constructor(
        private readonly options: IRankingOptions,
        fetchImpl: TRankingFetch = fetch,
    ) {
        this.fetchImpl = fetchImpl;
    }

    public async complete(
        systemPrompt: string,
        userPrompt: string,
    ): Promise<string> {
        if (!this.options.apiKey) {
            throw new RankingRequestError('Ranking API key is not configured');
        }

        const controller = new AbortController();
        const timeout = setTimeout(
            () => controller.abort(),
            this.options.timeoutMs,
        );

        try {
            const response = await this.fetchImpl(
                `${this.options.baseUrl.replace(/\/+$/, '')}/chat/completions`,
                {
                    method: 'POST',
                    headers: {
                        Authorization: `Bearer ${this.options.apiKey}`,
                        'Content-Type': 'application/json',
                    },
                    body: JSON.stringify({
                        model: this.options.model,
                        messages: [
                            { role: 'system', content: systemPrompt },
                            { role: 'user', content: userPrompt },
                        ],
                        temperature: RANKING_TEMPERATURE,
                        max_tokens: RANKING_MAX_TOKENS,
                    }),
                    signal: controller.signal,
                },
            );

            if (response.status !== 200) {
                throw new RankingRequestError(
                    `Ranking endpoint answered with status ${response.status}`,
                    response.status,
                );
            }

            const payload = await completionSchema.validate(await response.json());
            return payload.choices[0]?.message?.content?.trim() ?? '';
        } catch (error) {
            if (error instanceof RankingRequestError) {
                throw error;
            }

            if (controller.signal.aborted) {
                throw new RankingRequestError(
                    `Ranking request timed out after ${this.options.timeoutMs} ms`,
                );
            }

            throw new RankingRequestError(
                `Ranking request failed: ${error instanceof Error ? error.message : String(error)}`,
            );
        } finally {
            clearTimeout(timeout);
        }
    }
}
