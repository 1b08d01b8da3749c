import { readFile, writeFile, mkdir, access } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { Chunk } from '../../domain/entities/Chunk';
import { SnapshotError } from '../../domain/errors/AppError';
import { InMemoryChunkStore } from './InMemoryChunkStore';
import { FlatL2Index } from './FlatL2Index';
import { Bm25Index } from './Bm25Index';
import logger from '../logger';

export const chunkRecordSchema = z.object({
    id: z.string().min(1).optional(),
    page: z.number().int().positive(),
    text: z.string(),
    token_count: z.number().int().nonnegative().default(0),
    diagram_ids: z.array(z.string()).default([]),
    media: z.array(z.string()).default([]),
    is_table: z.boolean().default(false),
});

export type ChunkRecord = z.input<typeof chunkRecordSchema>;

const vectorFileSchema = z.object({
    dimension: z.number().int().positive(),
    vectors: z.array(z.array(z.number())),
});

export type VectorFile = z.infer<typeof vectorFileSchema>;

export interface Snapshot {
    store: InMemoryChunkStore;
    semanticIndex: FlatL2Index;
    lexicalIndex: Bm25Index;
}

const unique = (values: readonly string[]) => [...new Set(values)];

export function toChunks(records: unknown): Chunk[] {
    const parsed = z.array(chunkRecordSchema).safeParse(records);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new SnapshotError(`Invalid chunk records: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'unknown'}`);
    }

    const seen = new Set<string>();
    return parsed.data.map((record, position) => {
        const id = record.id ?? `chunk-${position}`;
        if (seen.has(id)) {
            throw new SnapshotError(`Duplicate chunk id: ${id}`);
        }
        seen.add(id);

        return new Chunk(
            id,
            record.page,
            record.text,
            record.token_count,
            Object.freeze(unique(record.diagram_ids)),
            Object.freeze(unique(record.media)),
            record.is_table
        );
    });
}

export function buildSnapshot(chunks: Chunk[], vectorFile: VectorFile): Snapshot {
    if (vectorFile.vectors.length !== chunks.length) {
        throw new SnapshotError(
            `Snapshot mismatch: ${vectorFile.vectors.length} vectors for ${chunks.length} chunks`
        );
    }

    const badVector = vectorFile.vectors.findIndex((vector) => vector.length !== vectorFile.dimension);
    if (badVector !== -1) {
        throw new SnapshotError(`Vector ${badVector} does not have dimension ${vectorFile.dimension}`);
    }

    const store = new InMemoryChunkStore(chunks);
    return {
        store,
        semanticIndex: new FlatL2Index(store, vectorFile.vectors, vectorFile.dimension),
        lexicalIndex: new Bm25Index(store),
    };
}

async function readJson(filePath: string, label: string): Promise<unknown> {
    try {
        await access(filePath);
    } catch (error) {
        throw new SnapshotError(`${label} not found at ${filePath}. Run the index build first.`, { cause: error });
    }

    try {
        return JSON.parse(await readFile(filePath, 'utf-8'));
    } catch (error) {
        throw new SnapshotError(`${label} at ${filePath} is not valid JSON`, { cause: error });
    }
}

/**
 * Loads the chunk records and the vector index written together by the
 * offline build. Either artifact missing is a fatal configuration error.
 */
export async function loadSnapshot(chunksPath: string, vectorsPath: string): Promise<Snapshot> {
    const [records, rawVectors] = await Promise.all([
        readJson(chunksPath, 'Chunk metadata'),
        readJson(vectorsPath, 'Vector index'),
    ]);

    const vectorFile = vectorFileSchema.safeParse(rawVectors);
    if (!vectorFile.success) {
        throw new SnapshotError(`Vector index at ${vectorsPath} has an invalid shape`);
    }

    const snapshot = buildSnapshot(toChunks(records), vectorFile.data);
    logger.info('Snapshot loaded', {
        chunks: snapshot.store.size,
        dimension: vectorFile.data.dimension,
    });
    return snapshot;
}

export async function snapshotExists(chunksPath: string, vectorsPath: string): Promise<boolean> {
    const checks = await Promise.allSettled([access(chunksPath), access(vectorsPath)]);
    return checks.every((check) => check.status === 'fulfilled');
}

export async function writeSnapshot(
    chunksPath: string,
    vectorsPath: string,
    chunks: readonly Chunk[],
    vectors: number[][]
): Promise<void> {
    if (vectors.length !== chunks.length) {
        throw new SnapshotError(`Refusing to write ${vectors.length} vectors for ${chunks.length} chunks`);
    }

    const records = chunks.map((chunk) => ({
        id: chunk.id,
        page: chunk.page,
        text: chunk.text,
        token_count: chunk.tokenCount,
        diagram_ids: chunk.diagramIds,
        media: chunk.media,
        is_table: chunk.isTable,
    }));
    const vectorFile: VectorFile = { dimension: vectors[0]?.length ?? 0, vectors };

    await mkdir(path.dirname(chunksPath), { recursive: true });
    await mkdir(path.dirname(vectorsPath), { recursive: true });
    await writeFile(chunksPath, JSON.stringify(records, null, 2), 'utf-8');
    await writeFile(vectorsPath, JSON.stringify(vectorFile), 'utf-8');
}
