import type { ChunkStore } from '../../domain/entities/ChunkStore';
import { LexicalIndex } from '../../domain/entities/SearchIndex';
import type { ChunkSearchResult } from '../../domain/entities/SearchIndex';
import { tokenize } from '../../application/utils/tokenize';

interface Posting {
    position: number;
    frequency: number;
}

export interface Bm25Params {
    k1: number;
    b: number;
}

/**
 * BM25 scorer over the chunk texts of a store, built once at load time.
 */
export class Bm25Index extends LexicalIndex {
    private readonly postings = new Map<string, Posting[]>();
    private readonly lengths: number[] = [];
    private readonly averageLength: number;
    private readonly params: Bm25Params;

    constructor(private readonly store: ChunkStore, params?: Partial<Bm25Params>) {
        super();
        this.params = { k1: params?.k1 ?? 1.5, b: params?.b ?? 0.75 };

        store.all().forEach((chunk, position) => {
            const tokens = tokenize(chunk.text);
            this.lengths.push(tokens.length);

            const frequencies = new Map<string, number>();
            for (const token of tokens) {
                frequencies.set(token, (frequencies.get(token) ?? 0) + 1);
            }
            for (const [token, frequency] of frequencies) {
                const list = this.postings.get(token) ?? [];
                list.push({ position, frequency });
                this.postings.set(token, list);
            }
        });

        const total = this.lengths.reduce((sum, length) => sum + length, 0);
        this.averageLength = this.lengths.length ? total / this.lengths.length : 0;
    }

    search(query: string, limit: number): ChunkSearchResult[] {
        const queryTokens = [...new Set(tokenize(query))];
        if (queryTokens.length === 0 || limit <= 0) return [];

        const { k1, b } = this.params;
        const totalChunks = this.store.size;
        const avgLength = this.averageLength || 1;
        const scores = new Map<number, number>();

        for (const token of queryTokens) {
            const postings = this.postings.get(token);
            if (!postings) continue;

            const docFreq = postings.length;
            const idf = Math.log(1 + (totalChunks - docFreq + 0.5) / (docFreq + 0.5));

            for (const { position, frequency } of postings) {
                const lengthNorm = 1 - b + b * (this.lengths[position] / avgLength);
                const score = idf * ((frequency * (k1 + 1)) / (frequency + k1 * lengthNorm));
                scores.set(position, (scores.get(position) ?? 0) + score);
            }
        }

        const ranked = Array.from(scores.entries())
            .filter(([, score]) => score > 0)
            .sort((a, b) => b[1] - a[1] || a[0] - b[0])
            .slice(0, limit);

        const results: ChunkSearchResult[] = [];
        for (const [position, score] of ranked) {
            const chunk = this.store.at(position);
            if (!chunk) continue;
            results.push({ chunk, score, rank: results.length + 1 });
        }
        return results;
    }
}
