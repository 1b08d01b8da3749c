import type { SemanticIndex, LexicalIndex, ChunkSearchResult } from '../../domain/entities/SearchIndex';
import type { VectorProvider } from '../providers/VectorProvider';
import type { Chunk } from '../../domain/entities/Chunk';
import { CandidateResult } from '../../domain/entities/CandidateResult';
import type { CandidateMetadata } from '../../domain/entities/CandidateResult';
import { RetrievalError } from '../../domain/errors/AppError';
import { sanitizeInput } from '../utils/sanitizeInput';
import { withTimeout } from '../utils/withRetry';
import logger from '../../infrastructure/logger';

export interface HybridSearchConfig {
    rrfK: number;
    semanticWeight: number;
    lexicalWeight: number;
    embeddingTimeoutMs: number;
}

interface FusedEntry {
    chunk: Chunk;
    score: number;
    semanticRank?: number;
    lexicalRank?: number;
}

/**
 * Weighted reciprocal rank fusion: each list contributes `weight / (k + rank)`
 * for every chunk it ranks. Ranks are compared rather than raw scores because
 * L2 distance and BM25 are not on the same scale. Chunks are deduplicated by
 * id; equal fused scores keep first-seen order, semantic list first.
 */
export function fuseByRank(
    semanticResults: ChunkSearchResult[],
    lexicalResults: ChunkSearchResult[],
    config: Pick<HybridSearchConfig, 'rrfK' | 'semanticWeight' | 'lexicalWeight'>,
    limit: number
): CandidateResult[] {
    const k = config.rrfK;
    const scoreMap = new Map<string, FusedEntry>();

    const accumulate = (results: ChunkSearchResult[], weight: number, key: 'semanticRank' | 'lexicalRank') => {
        results.forEach((result, index) => {
            const rank = index + 1;
            const score = weight / (k + rank);

            const existing = scoreMap.get(result.chunk.id);
            if (existing) {
                existing.score += score;
                existing[key] = Math.min(existing[key] ?? rank, rank);
            } else {
                const entry: FusedEntry = { chunk: result.chunk, score };
                entry[key] = rank;
                scoreMap.set(result.chunk.id, entry);
            }
        });
    };

    accumulate(semanticResults, config.semanticWeight, 'semanticRank');
    accumulate(lexicalResults, config.lexicalWeight, 'lexicalRank');

    return Array.from(scoreMap.values())
        .sort((a, b) => b.score - a.score)
        .slice(0, limit)
        .map(({ chunk, score, semanticRank, lexicalRank }) => {
            const metadata: CandidateMetadata = {
                semanticRank,
                lexicalRank,
                retrievalMethod:
                    semanticRank !== undefined && lexicalRank !== undefined
                        ? 'hybrid'
                        : semanticRank !== undefined
                            ? 'semantic'
                            : 'lexical',
            };
            return new CandidateResult(chunk, score, metadata);
        });
}

export class HybridSearchService {
    private config: HybridSearchConfig;

    constructor(
        private semanticIndex: SemanticIndex,
        private lexicalIndex: LexicalIndex,
        private vectorProvider: VectorProvider,
        config?: Partial<HybridSearchConfig>
    ) {
        this.config = {
            rrfK: config?.rrfK ?? 60,
            semanticWeight: config?.semanticWeight ?? 0.6,
            lexicalWeight: config?.lexicalWeight ?? 0.4,
            embeddingTimeoutMs: config?.embeddingTimeoutMs ?? 3000,
        };
    }

    async retrieve(query: string, candidateK: number): Promise<CandidateResult[]> {
        const sanitized = sanitizeInput(query);
        if (!sanitized) {
            throw new RetrievalError('Query is empty after sanitization');
        }
        if (candidateK <= 0) {
            logger.warn('Invalid candidateK value, returning empty results', { candidateK });
            return [];
        }

        const startTime = Date.now();
        const queryEmbedding = await this.embed(sanitized);

        let semanticResults: ChunkSearchResult[];
        let lexicalResults: ChunkSearchResult[];
        try {
            semanticResults = this.semanticIndex.search(queryEmbedding, candidateK);
            lexicalResults = this.lexicalIndex.search(sanitized, candidateK);
        } catch (error) {
            throw new RetrievalError('Index search failed', { cause: error });
        }

        if (semanticResults.length === 0 && lexicalResults.length === 0) {
            throw new RetrievalError('Both semantic and lexical indexes returned no candidates');
        }

        const fused = fuseByRank(semanticResults, lexicalResults, this.config, candidateK);

        logger.info('Hybrid search completed', {
            latency: Date.now() - startTime,
            semantic: semanticResults.length,
            lexical: lexicalResults.length,
            fused: fused.length,
            query: sanitized.substring(0, 50),
        });

        return fused;
    }

    private async embed(query: string): Promise<number[]> {
        try {
            return await withTimeout(
                this.vectorProvider.generateEmbedding(query),
                this.config.embeddingTimeoutMs,
                `Embedding timed out after ${this.config.embeddingTimeoutMs}ms`
            );
        } catch (error) {
            throw new RetrievalError('Failed to embed query', { cause: error });
        }
    }
}
