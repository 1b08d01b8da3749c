import type { GuardrailValidator } from '../../services/GuardrailValidator';
import type { HybridSearchService } from '../../services/HybridSearchService';
import type { ReRankingService } from '../../services/ReRankingService';
import type { AnswerGenerator } from '../../services/AnswerGenerator';
import { noInformationAnswer } from '../../services/AnswerGenerator';
import { AppError, PipelineTimeoutError } from '../../../domain/errors/AppError';
import type { ChatContext } from './ChatContext';
import { assembleContext, hasLexicalOverlap } from './ContextAssembler';
import logger from '../../../infrastructure/logger';

export interface ChatPipelineConfig {
    topK: number;
    candidateK: number;
    strictOutput: boolean;
    requestBudgetMs: number;
    now: () => number;
}

type Stage = 'input' | 'retrieve' | 'rerank' | 'assemble' | 'context' | 'generate' | 'output';

export class ChatPipeline {
    private config: ChatPipelineConfig;

    constructor(
        private guardrails: GuardrailValidator,
        private retriever: HybridSearchService,
        private reranker: ReRankingService,
        private generator: AnswerGenerator,
        config?: Partial<ChatPipelineConfig>
    ) {
        this.config = {
            topK: config?.topK ?? 5,
            candidateK: config?.candidateK ?? 30,
            strictOutput: config?.strictOutput ?? false,
            requestBudgetMs: config?.requestBudgetMs ?? 60000,
            now: config?.now ?? Date.now,
        };
    }

    now(): number {
        return this.config.now();
    }

    async execute(ctx: ChatContext): Promise<void> {
        await this.stage(ctx, 'input', async () => {
            ctx.query = this.guardrails.validateInput(ctx.question);
        });

        await this.stage(ctx, 'retrieve', async () => {
            ctx.candidates = await this.retriever.retrieve(ctx.query, this.config.candidateK);
        });

        await this.stage(ctx, 'rerank', async () => {
            ctx.selected = await this.reranker.rerank(ctx.query, ctx.candidates, this.config.topK);
        });

        const assembled = await this.stage(ctx, 'assemble', async () => {
            const chunks = ctx.selected.map((candidate) => candidate.chunk);
            ctx.assembled = assembleContext(chunks);
            return { ...ctx.assembled, relevant: hasLexicalOverlap(ctx.query, chunks.map((c) => c.text).join(' ')) };
        });

        if (!assembled.relevant) {
            logger.info('Retrieved context has no overlap with the query', { query: ctx.query.substring(0, 50) });
            ctx.response = noInformationAnswer();
            return;
        }

        await this.stage(ctx, 'context', async () => {
            ctx.sanitizedContext = this.guardrails.validateContext(assembled.text);
        });

        const generated = await this.stage(ctx, 'generate', () =>
            this.generator.generate(ctx.query, ctx.sanitizedContext, assembled.allowedPages, assembled.allowedMedia)
        );

        await this.stage(ctx, 'output', async () => {
            ctx.response = this.guardrails.validateOutput(
                generated,
                assembled.allowedPages,
                assembled.allowedMedia,
                { strict: this.config.strictOutput }
            );
        });
    }

    private async stage<T>(ctx: ChatContext, name: Stage, run: () => Promise<T>): Promise<T> {
        try {
            this.checkpoint(ctx, name);
            return await run();
        } catch (error) {
            logger.error('Pipeline stage failed', {
                stage: name,
                query: (ctx.query || ctx.question).substring(0, 50),
                error: error instanceof Error ? error.message : 'Unknown error',
                cause: error instanceof Error && error.cause instanceof Error ? error.cause.message : undefined,
            });
            throw error;
        }
    }

    private checkpoint(ctx: ChatContext, name: Stage): void {
        if (ctx.signal?.aborted) {
            throw new AppError(`Request aborted before stage "${name}"`, 499);
        }
        if (this.now() - ctx.startedAt > this.config.requestBudgetMs) {
            throw new PipelineTimeoutError(name, this.config.requestBudgetMs);
        }
    }
}
