import type { AnswerResponse } from '@docent/types';
import type { CandidateResult } from '../../../domain/entities/CandidateResult';
import type { AssembledContext } from './ContextAssembler';

/**
 * State of a single request as it moves through the pipeline stages.
 */
export class ChatContext {
    constructor(
        public question: string,
        public readonly startedAt: number,
        public signal?: AbortSignal
    ) {}

    query = '';

    candidates: CandidateResult[] = [];
    selected: CandidateResult[] = [];

    assembled?: AssembledContext;
    sanitizedContext = '';

    response?: AnswerResponse;

    toResponse(now: number): AnswerResponse {
        if (!this.response) {
            throw new Error('Pipeline finished without a response');
        }
        return {
            ...this.response,
            latency_ms: Math.max(0, Math.round(now - this.startedAt)),
        };
    }
}
