import { describe, it, expect, beforeEach } from 'vitest';
import { HybridSearchService, fuseByRank } from '../src/application/services/HybridSearchService';
import type { ChunkSearchResult } from '../src/domain/entities/SearchIndex';
import { RetrievalError } from '../src/domain/errors/AppError';
import { InMemoryChunkStore } from '../src/infrastructure/index/InMemoryChunkStore';
import { FlatL2Index } from '../src/infrastructure/index/FlatL2Index';
import { Bm25Index } from '../src/infrastructure/index/Bm25Index';
import { createChunk, createVectorProvider, fireSafetyChunks, fireSafetyVectors } from './fixtures';

const ranked = (ids: string[]): ChunkSearchResult[] =>
    ids.map((id, index) => ({ chunk: createChunk(id, index + 1, `text ${id}`), score: 0, rank: index + 1 }));

const weights = { rrfK: 60, semanticWeight: 0.6, lexicalWeight: 0.4 };

describe('fuseByRank', () => {
    it('should combine ranks with weighted reciprocal rank fusion', () => {
        const fused = fuseByRank(ranked(['c1', 'c2', 'c3']), ranked(['c2']), weights, 10);

        expect(fused.map((r) => r.chunk.id)).toEqual(['c2', 'c1', 'c3']);
        expect(fused[0].score).toBeCloseTo(0.6 / 62 + 0.4 / 61, 10);
        expect(fused[1].score).toBeCloseTo(0.6 / 61, 10);
        expect(fused[2].score).toBeCloseTo(0.6 / 63, 10);
    });

    it('should record which list found each chunk', () => {
        const fused = fuseByRank(ranked(['c1', 'c2']), ranked(['c2', 'c4']), weights, 10);
        const byId = new Map(fused.map((r) => [r.chunk.id, r.metadata]));

        expect(byId.get('c2')).toEqual({ semanticRank: 2, lexicalRank: 1, retrievalMethod: 'hybrid' });
        expect(byId.get('c1')).toEqual({ semanticRank: 1, lexicalRank: undefined, retrievalMethod: 'semantic' });
        expect(byId.get('c4')).toEqual({ semanticRank: undefined, lexicalRank: 2, retrievalMethod: 'lexical' });
    });

    it('should deduplicate chunks by id', () => {
        const fused = fuseByRank(ranked(['c1', 'c1']), ranked(['c1']), weights, 10);

        expect(fused).toHaveLength(1);
        expect(fused[0].metadata.semanticRank).toBe(1);
        expect(fused[0].score).toBeCloseTo(0.6 / 61 + 0.6 / 62 + 0.4 / 61, 10);
    });

    it('should keep first-seen order for equal scores and apply the limit', () => {
        const equal = { rrfK: 60, semanticWeight: 0.5, lexicalWeight: 0.5 };
        const fused = fuseByRank(ranked(['s1']), ranked(['l1']), equal, 10);

        expect(fused.map((r) => r.chunk.id)).toEqual(['s1', 'l1']);
        expect(fuseByRank(ranked(['c1', 'c2', 'c3']), [], weights, 2)).toHaveLength(2);
    });
});

describe('HybridSearchService', () => {
    let vectorProvider: ReturnType<typeof createVectorProvider>;
    let service: HybridSearchService;

    beforeEach(() => {
        const store = new InMemoryChunkStore(fireSafetyChunks());
        vectorProvider = createVectorProvider([1, 0, 0]);
        service = new HybridSearchService(
            new FlatL2Index(store, fireSafetyVectors(), 3),
            new Bm25Index(store),
            vectorProvider
        );
    });

    it('should fuse semantic and lexical candidates', async () => {
        const results = await service.retrieve('fire door rating', 30);

        expect(results.map((r) => r.chunk.id)).toEqual(['c0', 'c1', 'c2', 'c3']);
        expect(results[0].metadata.retrievalMethod).toBe('hybrid');
        expect(results[0].score).toBeCloseTo(1 / 61, 10);
        expect(results[1].metadata.retrievalMethod).toBe('semantic');
    });

    it('should search with the sanitized query', async () => {
        await service.retrieve('<i>fire</i> door {rating}', 30);

        expect(vectorProvider.generateEmbedding).toHaveBeenCalledWith('fire door rating');
    });

    it('should return nothing for a non-positive candidate count', async () => {
        await expect(service.retrieve('fire door rating', 0)).resolves.toEqual([]);
        expect(vectorProvider.generateEmbedding).not.toHaveBeenCalled();
    });

    it('should reject a query that is empty after sanitization', async () => {
        await expect(service.retrieve('<b></b>', 5)).rejects.toThrow(
            new RetrievalError('Query is empty after sanitization')
        );
    });

    it('should wrap embedding failures', async () => {
        const cause = new Error('connection refused');
        vectorProvider.generateEmbedding.mockRejectedValueOnce(cause);

        const error = await service.retrieve('fire door rating', 5).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(RetrievalError);
        expect(error instanceof RetrievalError && error.message).toBe('Failed to embed query');
        expect(error instanceof RetrievalError && error.cause).toBe(cause);
    });

    it('should time out a slow embedding call', async () => {
        const store = new InMemoryChunkStore(fireSafetyChunks());
        vectorProvider.generateEmbedding.mockReturnValueOnce(new Promise<number[]>(() => {}));
        const slow = new HybridSearchService(
            new FlatL2Index(store, fireSafetyVectors(), 3),
            new Bm25Index(store),
            vectorProvider,
            { embeddingTimeoutMs: 10 }
        );

        const error = await slow.retrieve('fire door rating', 5).catch((e: unknown) => e);

        expect(error instanceof RetrievalError && error.cause).toEqual(new Error('Embedding timed out after 10ms'));
    });

    it('should wrap index failures', async () => {
        vectorProvider.generateEmbedding.mockResolvedValueOnce([1, 0]);

        await expect(service.retrieve('fire door rating', 5)).rejects.toThrow(
            new RetrievalError('Index search failed')
        );
    });

    it('should fail when neither index returns candidates', async () => {
        const empty = new InMemoryChunkStore([]);
        const emptyService = new HybridSearchService(new FlatL2Index(empty, [], 3), new Bm25Index(empty), vectorProvider);

        await expect(emptyService.retrieve('fire door rating', 5)).rejects.toThrow(
            new RetrievalError('Both semantic and lexical indexes returned no candidates')
        );
    });
});
