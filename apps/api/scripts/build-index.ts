import 'dotenv/config';
import { readFile } from 'fs/promises';
import { ragConfig } from '../src/application/config/ragConfig';
import { toChunks, writeSnapshot } from '../src/infrastructure/index/Snapshot';
import { OllamaVectorProvider } from '../src/infrastructure/providores/OllamaVectorProvider';
import logger from '../src/infrastructure/logger';

/**
 * Offline build: embeds pre-extracted chunk records and writes the chunk
 * metadata and vector index together. Must not run against the paths of a
 * serving instance.
 *
 * Usage: npm run build-index -- <extracted-chunks.json>
 */
async function buildIndex(sourcePath: string) {
    const startTime = Date.now();
    const chunks = toChunks(JSON.parse(await readFile(sourcePath, 'utf-8')));
    logger.info('Loaded extracted chunks', { source: sourcePath, chunks: chunks.length });

    const vectors = await new OllamaVectorProvider().generateEmbeddings(chunks.map((chunk) => chunk.text));

    await writeSnapshot(ragConfig.metaPath, ragConfig.indexPath, chunks, vectors);
    logger.info('Snapshot written', {
        chunks: chunks.length,
        dimension: vectors[0]?.length ?? 0,
        metaPath: ragConfig.metaPath,
        indexPath: ragConfig.indexPath,
        latency: Date.now() - startTime,
    });
}

const sourcePath = process.argv[2] ?? process.env.CHUNKS_SOURCE;
if (!sourcePath) {
    logger.error('Usage: build-index <extracted-chunks.json>');
    process.exit(1);
}

buildIndex(sourcePath).catch((error: unknown) => {
    logger.error('Index build failed', { error: error instanceof Error ? error.message : String(error) });
    process.exit(1);
});
