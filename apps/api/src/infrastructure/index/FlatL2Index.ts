import type { ChunkStore } from '../../domain/entities/ChunkStore';
import { SemanticIndex } from '../../domain/entities/SearchIndex';
import type { ChunkSearchResult } from '../../domain/entities/SearchIndex';

/**
 * Exact nearest-neighbour search by squared L2 distance. Vector `i` belongs to
 * the chunk at position `i` of the store.
 */
export class FlatL2Index extends SemanticIndex {
    constructor(
        private readonly store: ChunkStore,
        private readonly vectors: readonly number[][],
        private readonly dim: number
    ) {
        super();
        if (vectors.length !== store.size) {
            throw new Error(`Index holds ${vectors.length} vectors for ${store.size} chunks`);
        }
    }

    get dimension(): number {
        return this.dim;
    }

    search(queryVector: number[], limit: number): ChunkSearchResult[] {
        if (queryVector.length !== this.dim) {
            throw new Error(`Query vector has dimension ${queryVector.length}, index expects ${this.dim}`);
        }
        if (limit <= 0) return [];

        const scored = this.vectors.map((vector, position) => ({
            position,
            distance: squaredL2(queryVector, vector),
        }));

        // Array.prototype.sort is stable, equal distances keep store order
        scored.sort((a, b) => a.distance - b.distance);

        const results: ChunkSearchResult[] = [];
        for (const { position, distance } of scored.slice(0, limit)) {
            const chunk = this.store.at(position);
            if (!chunk) continue;
            results.push({ chunk, score: distance, rank: results.length + 1 });
        }
        return results;
    }
}

export function squaredL2(a: readonly number[], b: readonly number[]): number {
    let sum = 0;
    for (let i = 0; i < a.length; i++) {
        const diff = a[i] - (b[i] ?? 0);
        sum += diff * diff;
    }
    return sum;
}
