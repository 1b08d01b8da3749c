import 'dotenv/config';
import { OllamaEmbeddings } from '@langchain/ollama';
import type { VectorProvider } from '../../application/providers/VectorProvider';
import logger from '../logger';

const BATCH_SIZE = 64;

export class OllamaVectorProvider implements VectorProvider {
    private embeddings = new OllamaEmbeddings({
        model: process.env.OLLAMA_EMBEDDING_MODEL || 'nomic-embed-text',
        baseUrl: process.env.OLLAMA_BASE_URL || 'http://127.0.0.1:11434',
    });

    async generateEmbedding(text: string): Promise<number[]> {
        return this.embeddings.embedQuery(text);
    }

    async generateEmbeddings(texts: string[]): Promise<number[][]> {
        const vectors: number[][] = [];

        for (let i = 0; i < texts.length; i += BATCH_SIZE) {
            const batch = texts.slice(i, i + BATCH_SIZE);
            const embedded = await this.embeddings.embedDocuments(batch);

            if (embedded.length !== batch.length) {
                throw new Error(`Embedding batch at ${i} returned ${embedded.length} vectors for ${batch.length} texts`);
            }
            vectors.push(...embedded);
            logger.debug('Embedded batch', { offset: i, size: batch.length });
        }

        return vectors;
    }
}
