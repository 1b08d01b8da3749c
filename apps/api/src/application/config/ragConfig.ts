/**
 * Pipeline configuration from environment variables
 */

export type HallucinationDetectorKind = 'keyword' | 'model';

export interface RagConfig {
    topK: number;
    candidateK: number;
    apiTimeoutMs: number;
    apiMaxRetries: number;
    retryBaseDelayMs: number;
    requestBudgetMs: number;
    rerankEnabled: boolean;
    guardrailStrict: boolean;
    hallucinationDetector: HallucinationDetectorKind;
    indexPath: string;
    metaPath: string;
}

export function readRagConfig(env: NodeJS.ProcessEnv = process.env): RagConfig {
    return {
        topK: parseInt(env.TOP_K || '5', 10),
        candidateK: parseInt(env.CANDIDATE_K || '30', 10),
        apiTimeoutMs: parseInt(env.API_TIMEOUT_MS || '3000', 10),
        apiMaxRetries: parseInt(env.API_MAX_RETRIES || '2', 10),
        retryBaseDelayMs: parseInt(env.RETRY_BASE_DELAY_MS || '1000', 10),
        requestBudgetMs: parseInt(env.REQUEST_BUDGET_MS || '60000', 10),
        rerankEnabled: env.RERANK_ENABLED !== 'false',
        guardrailStrict: env.GUARDRAIL_STRICT === 'true',
        hallucinationDetector: env.HALLUCINATION_DETECTOR === 'model' ? 'model' : 'keyword',
        indexPath: env.INDEX_PATH || 'data/index.vectors.json',
        metaPath: env.META_PATH || 'data/chunks.json',
    };
}

export const ragConfig = readRagConfig();

/**
 * Validates pipeline configuration
 * Throws error if configuration is invalid
 */
export function validateRagConfig(config: RagConfig = ragConfig): void {
    if (!Number.isInteger(config.topK) || config.topK < 1 || config.topK > 50) {
        throw new Error('TOP_K must be between 1 and 50');
    }

    if (!Number.isInteger(config.candidateK) || config.candidateK < config.topK || config.candidateK > 200) {
        throw new Error('CANDIDATE_K must be between TOP_K and 200');
    }

    if (!Number.isInteger(config.apiTimeoutMs) || config.apiTimeoutMs < 100 || config.apiTimeoutMs > 600000) {
        throw new Error('API_TIMEOUT_MS must be between 100 and 600000');
    }

    if (!Number.isInteger(config.apiMaxRetries) || config.apiMaxRetries < 0 || config.apiMaxRetries > 10) {
        throw new Error('API_MAX_RETRIES must be between 0 and 10');
    }

    if (!Number.isInteger(config.retryBaseDelayMs) || config.retryBaseDelayMs < 0) {
        throw new Error('RETRY_BASE_DELAY_MS must be a non-negative integer');
    }

    if (!Number.isInteger(config.requestBudgetMs) || config.requestBudgetMs < 1000) {
        throw new Error('REQUEST_BUDGET_MS must be at least 1000');
    }
}
