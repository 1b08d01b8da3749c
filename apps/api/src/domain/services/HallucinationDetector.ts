import type { AnswerContent } from '@docent/types';

export interface HallucinationCheck {
    hallucinated: boolean;
    reason?: string;
}

export interface HallucinationInput {
    question: string;
    context: string;
    answer: AnswerContent;
}

/**
 * Decides whether a generated answer reached outside the supplied context.
 * A positive result replaces the answer with the no-information answer.
 */
export interface HallucinationDetector {
    detect(input: HallucinationInput): Promise<HallucinationCheck>;
}

export const HEDGE_PHRASES = [
    'general knowledge',
    'common knowledge',
    'based on my knowledge',
    'does not provide any information',
    'does not provide information',
    'context does not contain',
    "context doesn't contain",
    'outside the provided context',
    'not mentioned in the context',
    'not mentioned in the provided',
    'not covered in the provided',
] as const;

/**
 * Case-insensitive substring match of hedge phrases over the summary and
 * verification fields.
 */
export class KeywordHallucinationDetector implements HallucinationDetector {
    constructor(private readonly phrases: readonly string[] = HEDGE_PHRASES) {}

    async detect({ answer }: HallucinationInput): Promise<HallucinationCheck> {
        const haystacks = [answer.summary, ...answer.verification].map((text) => text.toLowerCase());

        for (const phrase of this.phrases) {
            const needle = phrase.toLowerCase();
            if (haystacks.some((text) => text.includes(needle))) {
                return { hallucinated: true, reason: `hedge phrase "${phrase}"` };
            }
        }

        return { hallucinated: false };
    }
}
