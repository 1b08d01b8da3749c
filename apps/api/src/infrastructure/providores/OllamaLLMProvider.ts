import 'dotenv/config';
import { ChatOllama } from '@langchain/ollama';
import { HumanMessage, SystemMessage } from '@langchain/core/messages';
import type { MessageContent } from '@langchain/core/messages';
import type { CompletionOptions, LLMProvider } from '../../application/providers/LLMProvider';
import logger from '../logger';

export interface OllamaLLMConfig {
    model: string;
    baseUrl: string;
}

export function contentToText(content: MessageContent): string {
    if (typeof content === 'string') return content;

    return content
        .map((part) => ('text' in part && typeof part.text === 'string' ? part.text : ''))
        .join('');
}

export class OllamaLLMProvider implements LLMProvider {
    private config: OllamaLLMConfig;
    private models = new Map<number, ChatOllama>();

    constructor(config?: Partial<OllamaLLMConfig>) {
        this.config = {
            model: config?.model ?? process.env.OLLAMA_MODEL ?? 'llama3.1:8b',
            baseUrl: config?.baseUrl ?? process.env.OLLAMA_BASE_URL ?? 'http://127.0.0.1:11434',
        };
    }

    async complete(systemPrompt: string, userPrompt: string, options: CompletionOptions): Promise<string> {
        const startTime = Date.now();

        const response = await this.modelFor(options.temperature).invoke(
            [new SystemMessage(systemPrompt), new HumanMessage(userPrompt)],
            { timeout: options.timeoutMs }
        );

        logger.debug('Ollama completion finished', {
            model: this.config.model,
            latency: Date.now() - startTime,
        });

        return contentToText(response.content);
    }

    private modelFor(temperature: number): ChatOllama {
        let model = this.models.get(temperature);
        if (!model) {
            model = new ChatOllama({
                model: this.config.model,
                baseUrl: this.config.baseUrl,
                temperature,
            });
            this.models.set(temperature, model);
        }
        return model;
    }
}
