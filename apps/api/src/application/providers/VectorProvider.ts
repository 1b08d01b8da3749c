export interface VectorProvider {
    generateEmbedding(text: string): Promise<number[]>;
    /**
     * Embeds texts in order. Implementations may batch the input; any failing
     * batch fails the whole call.
     */
    generateEmbeddings(texts: string[]): Promise<number[][]>;
}
