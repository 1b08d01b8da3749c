import type { Chunk } from './Chunk';

export interface CandidateMetadata {
    semanticRank?: number;
    lexicalRank?: number;
    rerankScore?: number;
    retrievalMethod: 'semantic' | 'lexical' | 'hybrid';
}

export class CandidateResult {
    constructor(
        public readonly chunk: Chunk,
        public readonly score: number,
        public readonly metadata: CandidateMetadata
    ) {}

    withRerankScore(score: number): CandidateResult {
        return new CandidateResult(this.chunk, score, {
            ...this.metadata,
            rerankScore: score,
        });
    }
}
