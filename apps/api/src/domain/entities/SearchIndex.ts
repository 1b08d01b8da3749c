import type { Chunk } from './Chunk';

export interface ChunkSearchResult {
    chunk: Chunk;
    score: number;
    rank: number;
}

/**
 * Nearest-neighbour search over chunk embeddings. Lower `score` is closer.
 */
export abstract class SemanticIndex {
    abstract get dimension(): number;
    abstract search(queryVector: number[], limit: number): ChunkSearchResult[];
}

/**
 * Keyword search over chunk texts. Higher `score` is better.
 */
export abstract class LexicalIndex {
    abstract search(query: string, limit: number): ChunkSearchResult[];
}
