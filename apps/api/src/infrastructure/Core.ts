import type { LLMProvider } from '../application/providers/LLMProvider';
import type { VectorProvider } from '../application/providers/VectorProvider';
import type { RagConfig } from '../application/config/ragConfig';
import { ragConfig, validateRagConfig } from '../application/config/ragConfig';
import type { HallucinationDetector } from '../domain/services/HallucinationDetector';
import { KeywordHallucinationDetector } from '../domain/services/HallucinationDetector';
import { ModelHallucinationDetector } from '../domain/services/ModelHallucinationDetector';
import { GuardrailValidator } from '../application/services/GuardrailValidator';
import { HybridSearchService } from '../application/services/HybridSearchService';
import { ReRankingService } from '../application/services/ReRankingService';
import { AnswerGenerator } from '../application/services/AnswerGenerator';
import { PromptBuilder } from '../application/useCases/chat/PromptBuilder';
import { ChatPipeline } from '../application/useCases/chat/ChatPipeline';
import { Chat } from '../application/useCases/chat/Chat';
import { GetHealth } from '../application/useCases/GetHealth';
import type { Snapshot } from './index/Snapshot';
import { loadSnapshot, snapshotExists } from './index/Snapshot';
import { OllamaLLMProvider } from './providores/OllamaLLMProvider';
import { OllamaVectorProvider } from './providores/OllamaVectorProvider';
import logger from './logger';

export interface CoreDependencies {
    config: RagConfig;
    snapshot: Snapshot;
    llmProvider: LLMProvider;
    rerankProvider?: LLMProvider;
    vectorProvider: VectorProvider;
    hallucinationDetector?: HallucinationDetector;
    snapshotReady?: () => Promise<boolean>;
    sleep?: (ms: number) => Promise<void>;
    now?: () => number;
}

/**
 * Composition root. Every service is built once here and shared read-only
 * across requests.
 */
export class Core {
    public readonly chat: Chat;
    public readonly health: GetHealth;

    constructor(deps: CoreDependencies) {
        const { config, snapshot } = deps;

        const guardrails = new GuardrailValidator();
        const retriever = new HybridSearchService(snapshot.semanticIndex, snapshot.lexicalIndex, deps.vectorProvider, {
            embeddingTimeoutMs: config.apiTimeoutMs,
        });
        const reranker = new ReRankingService(deps.rerankProvider ?? deps.llmProvider, {
            enabled: config.rerankEnabled,
            timeoutMs: config.apiTimeoutMs,
        });
        const generator = new AnswerGenerator(
            deps.llmProvider,
            new PromptBuilder(),
            deps.hallucinationDetector ?? this.createDetector(config, deps.llmProvider),
            {
                timeoutMs: config.apiTimeoutMs,
                maxRetries: config.apiMaxRetries,
                retryBaseDelayMs: config.retryBaseDelayMs,
                sleep: deps.sleep,
            }
        );

        const pipeline = new ChatPipeline(guardrails, retriever, reranker, generator, {
            topK: config.topK,
            candidateK: config.candidateK,
            strictOutput: config.guardrailStrict,
            requestBudgetMs: config.requestBudgetMs,
            now: deps.now,
        });

        this.chat = new Chat(pipeline);
        this.health = new GetHealth(
            snapshot.store,
            deps.snapshotReady ?? (() => snapshotExists(config.metaPath, config.indexPath))
        );
    }

    static async bootstrap(config: RagConfig = ragConfig): Promise<Core> {
        validateRagConfig(config);
        const snapshot = await loadSnapshot(config.metaPath, config.indexPath);

        const llmProvider = new OllamaLLMProvider();
        const rerankModel = process.env.OLLAMA_RERANK_MODEL;

        logger.info('Core initialized', {
            topK: config.topK,
            candidateK: config.candidateK,
            detector: config.hallucinationDetector,
            strict: config.guardrailStrict,
        });

        return new Core({
            config,
            snapshot,
            llmProvider,
            rerankProvider: rerankModel ? new OllamaLLMProvider({ model: rerankModel }) : undefined,
            vectorProvider: new OllamaVectorProvider(),
        });
    }

    private createDetector(config: RagConfig, llmProvider: LLMProvider): HallucinationDetector {
        return config.hallucinationDetector === 'model'
            ? new ModelHallucinationDetector(llmProvider, config.apiTimeoutMs)
            : new KeywordHallucinationDetector();
    }
}
