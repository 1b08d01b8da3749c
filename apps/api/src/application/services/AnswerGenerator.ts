import { answerResponseSchema, rawAnswerSchema } from '@docent/types';
import type { AnswerResponse, RawAnswer } from '@docent/types';
import type { LLMProvider } from '../providers/LLMProvider';
import type { HallucinationDetector } from '../../domain/services/HallucinationDetector';
import type { PromptBuilder } from '../useCases/chat/PromptBuilder';
import { GenerationError, ValidationError } from '../../domain/errors/AppError';
import { JsonParser } from '../utils/JsonParser';
import { withRetry, isTransientError, RetryExhaustedError } from '../utils/withRetry';
import logger from '../../infrastructure/logger';

export const NO_INFORMATION_TITLE = 'No Information Found';
export const NO_INFORMATION_SUMMARY = 'No relevant information was found in the documentation.';

export function noInformationAnswer(latencyMs = 0): AnswerResponse {
    return {
        mode: 'answer',
        answer: {
            title: NO_INFORMATION_TITLE,
            summary: NO_INFORMATION_SUMMARY,
            steps: [],
            verification: [],
        },
        links: [],
        media: { images: [] },
        latency_ms: Math.max(0, Math.round(latencyMs)),
    };
}

export interface AnswerGeneratorConfig {
    timeoutMs: number;
    maxRetries: number;
    retryBaseDelayMs: number;
    sleep?: (ms: number) => Promise<void>;
}

function keepAllowed(values: string[], allowed: readonly string[]): { kept: string[]; dropped: string[] } {
    const allowedSet = new Set(allowed);
    const kept: string[] = [];
    const dropped: string[] = [];

    for (const value of values) {
        if (!allowedSet.has(value)) {
            dropped.push(value);
        } else if (!kept.includes(value)) {
            kept.push(value);
        }
    }
    return { kept, dropped };
}

export class AnswerGenerator {
    private config: AnswerGeneratorConfig;

    constructor(
        private llmProvider: LLMProvider,
        private promptBuilder: PromptBuilder,
        private hallucinationDetector: HallucinationDetector,
        config?: Partial<AnswerGeneratorConfig>
    ) {
        this.config = {
            timeoutMs: config?.timeoutMs ?? 3000,
            maxRetries: config?.maxRetries ?? 2,
            retryBaseDelayMs: config?.retryBaseDelayMs ?? 1000,
            sleep: config?.sleep,
        };
    }

    async generate(
        query: string,
        context: string,
        allowedPages: readonly string[],
        allowedMedia: readonly string[]
    ): Promise<AnswerResponse> {
        if (!query.trim()) {
            throw new ValidationError('Query must not be empty');
        }
        if (!context.trim()) {
            throw new ValidationError('Context must not be empty');
        }

        const startTime = Date.now();
        const raw = await this.complete(query, context, allowedPages, allowedMedia);
        const candidate = this.parse(raw);

        const check = await this.hallucinationDetector.detect({
            question: query,
            context,
            answer: candidate.answer,
        });
        if (check.hallucinated) {
            logger.warn('Hallucination detected, returning no-information answer', {
                reason: check.reason,
                query: query.substring(0, 50),
            });
            return noInformationAnswer(Date.now() - startTime);
        }

        const links = keepAllowed(candidate.links, allowedPages);
        const images = keepAllowed(candidate.media.images, allowedMedia);
        if (links.dropped.length > 0 || images.dropped.length > 0) {
            logger.warn('Dropped references outside the retrieved set', {
                links: links.dropped,
                images: images.dropped,
                query: query.substring(0, 50),
            });
        }

        const result = answerResponseSchema.safeParse({
            mode: 'answer',
            answer: candidate.answer,
            links: links.kept,
            media: { images: images.kept },
            latency_ms: Math.round(Date.now() - startTime),
        });
        if (!result.success) {
            const issue = result.error.issues[0];
            throw new GenerationError(
                `Generated answer failed schema validation: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'unknown'}`,
                { cause: result.error }
            );
        }

        return result.data;
    }

    private async complete(
        query: string,
        context: string,
        allowedPages: readonly string[],
        allowedMedia: readonly string[]
    ): Promise<string> {
        const prompt = this.promptBuilder.build(query, context, allowedPages, allowedMedia);

        try {
            return await withRetry(
                () =>
                    this.llmProvider.complete(prompt.system, prompt.user, {
                        temperature: 0,
                        timeoutMs: this.config.timeoutMs,
                    }),
                {
                    maxRetries: this.config.maxRetries,
                    baseDelayMs: this.config.retryBaseDelayMs,
                    sleep: this.config.sleep,
                    shouldRetry: isTransientError,
                    onRetry: (attempt, error, delayMs) =>
                        logger.warn('Generation call failed, retrying', {
                            attempt,
                            delayMs,
                            error: error instanceof Error ? error.message : 'Unknown error',
                        }),
                }
            );
        } catch (error) {
            const attempts = error instanceof RetryExhaustedError ? error.attempts : 1;
            throw new GenerationError(`Text generation failed after ${attempts} attempt(s)`, {
                cause: error instanceof RetryExhaustedError ? error.cause : error,
            });
        }
    }

    private parse(raw: string): RawAnswer {
        let data: unknown;
        try {
            data = JsonParser.parse(raw);
        } catch (error) {
            throw new GenerationError('Failed to parse generator JSON', { cause: error });
        }

        const parsed = rawAnswerSchema.safeParse(data);
        if (!parsed.success) {
            throw new GenerationError('Generator JSON is missing required answer fields', { cause: parsed.error });
        }
        return parsed.data;
    }
}
