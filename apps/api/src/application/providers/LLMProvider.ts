export interface CompletionOptions {
    temperature: number;
    timeoutMs: number;
}

export interface LLMProvider {
    /**
     * Single system + user turn completion. Must be deterministic at
     * temperature 0 and reject once `timeoutMs` elapses.
     */
    complete(systemPrompt: string, userPrompt: string, options: CompletionOptions): Promise<string>;
}
