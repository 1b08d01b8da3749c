import { z } from 'zod';
import type { LLMProvider } from '../providers/LLMProvider';
import type { CandidateResult } from '../../domain/entities/CandidateResult';
import { RerankError } from '../../domain/errors/AppError';
import { JsonParser } from '../utils/JsonParser';
import logger from '../../infrastructure/logger';

export interface ReRankingConfig {
    enabled: boolean;
    maxPassageChars: number;
    timeoutMs: number;
}

export interface RerankCandidate {
    index: number;
    text: string;
}

export interface RerankScore {
    index: number;
    score: number;
}

export const rerankResultSchema = z.object({
    results: z.array(
        z.object({
            id: z.number().int(),
            score: z.number(),
        })
    ),
});

export type RerankResult = z.infer<typeof rerankResultSchema>;

const RERANKING_SYSTEM_PROMPT = `
You are a relevance scoring model for Retrieval-Augmented Generation.

Return ONLY valid JSON.
No explanations. No extra text.

JSON Schema:

{
  "results": [
    {"id": number, "score": number between 0 and 1},
    ...
  ]
}

Rules:
- Score reflects how well the passage answers the query.
- Higher = more relevant.
- Score ONLY based on semantic relevance.
- Do not change passage IDs.
- Do not include text from passages.
`;

/**
 * Parses a reranker reply into its `results`, accepting JSON wrapped in prose.
 */
export function parseRerankResponse(raw: string): RerankResult {
    let data: unknown;
    try {
        data = JsonParser.parse(raw);
    } catch (error) {
        throw new RerankError('Failed to parse reranker JSON', { cause: error });
    }

    const parsed = rerankResultSchema.safeParse(data);
    if (!parsed.success) {
        throw new RerankError('Reranker JSON does not match {"results":[{"id","score"}]}', { cause: parsed.error });
    }
    return parsed.data;
}

export class ReRankingService {
    private config: ReRankingConfig;

    constructor(
        private llmProvider: LLMProvider,
        config?: Partial<ReRankingConfig>
    ) {
        this.config = {
            enabled: config?.enabled ?? true,
            maxPassageChars: config?.maxPassageChars ?? 1000,
            timeoutMs: config?.timeoutMs ?? 3000,
        };
    }

    buildUserPrompt(query: string, candidates: RerankCandidate[]): string {
        const passagesBlock = candidates
            .map((c) => `## Passage ${c.index}\n${c.text.substring(0, this.config.maxPassageChars)}`)
            .join('\n\n');

        return `
Query:
${query}

Passages:
${passagesBlock}

Return JSON only.
`;
    }

    /**
     * Scores every candidate in one provider call. The result has one entry
     * per input index, in input order; candidates the model left out score 0.
     */
    async score(query: string, candidates: RerankCandidate[]): Promise<RerankScore[]> {
        if (candidates.length === 0) return [];

        let raw: string;
        try {
            raw = await this.llmProvider.complete(RERANKING_SYSTEM_PROMPT, this.buildUserPrompt(query, candidates), {
                temperature: 0,
                timeoutMs: this.config.timeoutMs,
            });
        } catch (error) {
            throw new RerankError('Reranker call failed', { cause: error });
        }

        const { results } = parseRerankResponse(raw);
        const validIds = new Set(candidates.map((c) => c.index));
        const scores = new Map<number, number>();

        for (const { id, score } of results) {
            if (!validIds.has(id)) {
                throw new RerankError(`Reranker returned unknown passage id ${id}`);
            }
            if (scores.has(id)) {
                throw new RerankError(`Reranker scored passage id ${id} more than once`);
            }

            const clamped = Math.max(0, Math.min(1, score));
            if (clamped !== score) {
                logger.warn('Rerank score was outside [0, 1] range, clamped', { id, original: score, clamped });
            }
            scores.set(id, clamped);
        }

        const missing = candidates.filter((c) => !scores.has(c.index)).map((c) => c.index);
        if (missing.length > 0) {
            logger.warn('Reranker omitted passages, scoring them 0', { missing });
        }

        return candidates.map((c) => ({ index: c.index, score: scores.get(c.index) ?? 0 }));
    }

    async rerank(query: string, candidates: CandidateResult[], topK: number): Promise<CandidateResult[]> {
        if (topK <= 0) {
            logger.warn('Invalid topK value, returning empty results', { topK });
            return [];
        }

        if (!this.config.enabled) {
            logger.info('Re-ranking disabled, returning fused order', { count: candidates.length });
            return candidates.slice(0, topK);
        }

        const startTime = Date.now();
        const scores = await this.score(
            query,
            candidates.map((candidate, index) => ({ index, text: candidate.chunk.text }))
        );

        // stable: equal scores keep candidate order
        const ranked = [...scores].sort((a, b) => b.score - a.score).slice(0, topK);

        logger.info('Re-ranking completed', {
            latency: Date.now() - startTime,
            originalCount: candidates.length,
            topK,
            query: query.substring(0, 50),
        });

        return ranked.map(({ index, score }) => candidates[index].withRerankScore(score));
    }
}
