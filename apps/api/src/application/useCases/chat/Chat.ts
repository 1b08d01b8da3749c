import type { AnswerResponse } from '@docent/types';
import type { ChatPipeline } from './ChatPipeline';
import { ChatContext } from './ChatContext';

export class Chat {
    constructor(private pipeline: ChatPipeline) {}

    async execute(question: string, options?: { signal?: AbortSignal }): Promise<AnswerResponse> {
        const ctx = new ChatContext(question, this.pipeline.now(), options?.signal);

        await this.pipeline.execute(ctx);

        return ctx.toResponse(this.pipeline.now());
    }
}
