import type { Chunk } from './Chunk';

/**
 * Read-only collection of extracted chunks, positionally aligned with the
 * vectors of the semantic index.
 */
export abstract class ChunkStore {
    abstract get size(): number;
    abstract all(): readonly Chunk[];
    abstract at(position: number): Chunk | undefined;
}
