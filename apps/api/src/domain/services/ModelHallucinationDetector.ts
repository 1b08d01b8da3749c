import { z } from 'zod';
import type { LLMProvider } from '../../application/providers/LLMProvider';
import { JsonParser } from '../../application/utils/JsonParser';
import type { HallucinationCheck, HallucinationDetector, HallucinationInput } from './HallucinationDetector';
import { GenerationError } from '../errors/AppError';

const SYSTEM_PROMPT = 'You are a RAG faithfulness judge. Respond only with JSON.';

const verdictSchema = z.object({
    isFaithful: z.boolean(),
    reasoning: z.string().default(''),
});

/**
 * Asks a model whether every claim of the answer is supported by the context.
 */
export class ModelHallucinationDetector implements HallucinationDetector {
    constructor(
        private llmProvider: LLMProvider,
        private timeoutMs: number
    ) {}

    async detect({ question, context, answer }: HallucinationInput): Promise<HallucinationCheck> {
        const prompt = `
        Evaluate whether the ANSWER is faithful to the CONTEXT and invents nothing.

        CONTEXT:
        ${context}

        QUESTION:
        ${question}

        ANSWER:
        ${JSON.stringify(answer)}

        RULES:
        1. The answer must be based ONLY on the context.
        2. Any claim that is not in the context makes the answer unfaithful (isFaithful: false).
        3. An answer stating that no information was found is faithful when the context indeed lacks it.
        4. Judge only veracity against the context, not tone.

        Return ONLY a JSON object:
        {
            "isFaithful": boolean,
            "reasoning": "short explanation"
        }
        `;

        let raw: string;
        try {
            raw = await this.llmProvider.complete(SYSTEM_PROMPT, prompt, {
                temperature: 0,
                timeoutMs: this.timeoutMs,
            });
        } catch (error) {
            throw new GenerationError('Faithfulness check failed', { cause: error });
        }

        const verdict = verdictSchema.safeParse(this.parse(raw));
        if (!verdict.success) {
            throw new GenerationError('Faithfulness check returned an invalid verdict');
        }

        return verdict.data.isFaithful
            ? { hallucinated: false }
            : { hallucinated: true, reason: verdict.data.reasoning || 'judged unfaithful' };
    }

    private parse(raw: string): unknown {
        try {
            return JsonParser.parse(raw);
        } catch (error) {
            throw new GenerationError('Faithfulness check returned malformed JSON', { cause: error });
        }
    }
}
