import type { Chunk } from '../../domain/entities/Chunk';
import { ChunkStore } from '../../domain/entities/ChunkStore';

export class InMemoryChunkStore extends ChunkStore {
    private readonly chunks: readonly Chunk[];

    constructor(chunks: readonly Chunk[]) {
        super();
        this.chunks = Object.freeze([...chunks]);
    }

    get size(): number {
        return this.chunks.length;
    }

    all(): readonly Chunk[] {
        return this.chunks;
    }

    at(position: number): Chunk | undefined {
        return this.chunks[position];
    }
}
