import DOMPurify from 'isomorphic-dompurify';
import { ANSWER_LIMITS, MEDIA_PREFIX, answerResponseSchema } from '@docent/types';
import type { AnswerResponse } from '@docent/types';
import { GuardrailViolation } from '../../domain/errors/AppError';
import { sanitizeInput } from '../utils/sanitizeInput';
import logger from '../../infrastructure/logger';

export interface GuardrailConfig {
    minQueryLength: number;
    maxQueryLength: number;
    minContextLength: number;
    maxContextLength: number;
    maxMedia: number;
}

export interface OutputValidationOptions {
    /**
     * Strict: every link and image must be one of the allowed references.
     * Lenient: only the format is checked, so diagram labels such as
     * "Diagram 2.4" pass even when absent from the allowed set.
     */
    strict?: boolean;
}

const MARKUP_TAGS = [
    'a', 'abbr', 'article', 'b', 'blockquote', 'body', 'br', 'button', 'center', 'code', 'div', 'em',
    'embed', 'font', 'footer', 'form', 'h[1-6]', 'head', 'header', 'hr', 'html', 'i', 'iframe', 'img',
    'input', 'label', 'li', 'link', 'math', 'meta', 'nav', 'noscript', 'object', 'ol', 'option', 'p',
    'pre', 'script', 'section', 'select', 'small', 'span', 'strong', 'style', 'sub', 'sup', 'svg',
    'table', 'tbody', 'td', 'template', 'textarea', 'th', 'thead', 'title', 'tr', 'u', 'ul',
];

// A '<' that does not open a known tag or a comment is text ("< 18 m", "R<the limit")
const STRAY_BRACKET = new RegExp(`<(?!/?(?:${MARKUP_TAGS.join('|')})\\b|!)`, 'gi');

function escapeStrayBrackets(text: string): string {
    return text.replace(STRAY_BRACKET, '&lt;');
}

// Prompt injection phrasing, checked before sanitization
const INJECTION_PATTERNS = [
    /ignore\s+.*(previous|above|all).*instructions?/i,
    /you\s+are\s+now/i,
    /new\s+instructions?/i,
    /system\s*:\s*you/i,
    /<\s*script\s*>/i,
    /javascript:/i,
    /eval\s*\(/i,
    /exec\s*\(/i,
    /__import__/i,
    /forget\s+(everything|all)/i,
    /disregard\s+(previous|above)/i,
    /override\s+your/i,
    /new\s+role/i,
    /act\s+as\s+if/i,
];

const DIAGRAM_LABEL_PREFIX = 'Diagram ';

const REQUIRED_FIELDS = ['mode', 'answer', 'links', 'media'] as const;
const REQUIRED_ANSWER_FIELDS = ['title', 'summary', 'steps', 'verification'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class GuardrailValidator {
    private config: GuardrailConfig;

    constructor(config?: Partial<GuardrailConfig>) {
        this.config = {
            minQueryLength: config?.minQueryLength ?? 5,
            maxQueryLength: config?.maxQueryLength ?? 500,
            minContextLength: config?.minContextLength ?? 50,
            maxContextLength: config?.maxContextLength ?? 50000,
            maxMedia: config?.maxMedia ?? ANSWER_LIMITS.maxMedia,
        };
    }

    validateInput(query: unknown): string {
        try {
            if (typeof query !== 'string' || query.length === 0) {
                throw new GuardrailViolation('Query must be a non-empty string');
            }

            const length = query.trim().length;
            if (length < this.config.minQueryLength) {
                throw new GuardrailViolation(`Query too short (min ${this.config.minQueryLength} chars)`);
            }
            if (length > this.config.maxQueryLength) {
                throw new GuardrailViolation(`Query too long (max ${this.config.maxQueryLength} chars)`);
            }

            const pattern = INJECTION_PATTERNS.find((p) => p.test(query));
            if (pattern) {
                logger.warn('Injection attempt detected', { pattern: pattern.source });
                throw new GuardrailViolation('Query contains suspicious patterns and was blocked for security');
            }

            return sanitizeInput(query);
        } catch (error) {
            if (error instanceof GuardrailViolation) {
                logger.error('Input guardrail violation', { reason: error.reason });
            }
            throw error;
        }
    }

    /**
     * Too-long context is fatal, too-short context only logs a warning.
     * Returns the context with all markup and script content removed.
     */
    validateContext(context: string): string {
        if (!context) {
            throw this.contextViolation('Context is empty');
        }

        if (context.length > this.config.maxContextLength) {
            throw this.contextViolation(`Context too long (max ${this.config.maxContextLength} chars)`);
        }

        if (context.length < this.config.minContextLength) {
            logger.warn('Context very short', { length: context.length });
        }

        const fragment = DOMPurify.sanitize(escapeStrayBrackets(context), {
            ALLOWED_TAGS: [],
            KEEP_CONTENT: true,
            RETURN_DOM_FRAGMENT: true,
        });
        const sanitized = fragment.textContent ?? '';

        if (!sanitized.trim()) {
            throw this.contextViolation('Context is empty after sanitization');
        }

        return sanitized;
    }

    validateOutput(
        output: unknown,
        allowedPages: readonly string[],
        allowedMedia: readonly string[],
        options: OutputValidationOptions = {}
    ): AnswerResponse {
        try {
            const response = this.checkStructure(output);
            this.checkReferences(response, allowedPages, allowedMedia, options.strict ?? false);
            return response;
        } catch (error) {
            if (error instanceof GuardrailViolation) {
                logger.error('Output guardrail violation', { reason: error.reason, strict: options.strict ?? false });
            }
            throw error;
        }
    }

    private checkStructure(output: unknown): AnswerResponse {
        if (!isRecord(output)) {
            throw new GuardrailViolation('Output must be an object');
        }

        for (const field of REQUIRED_FIELDS) {
            if (!(field in output)) {
                throw new GuardrailViolation(`Missing required field: ${field}`);
            }
        }

        const answer = output.answer;
        if (!isRecord(answer)) {
            throw new GuardrailViolation('Field "answer" must be an object');
        }

        for (const field of REQUIRED_ANSWER_FIELDS) {
            if (!(field in answer)) {
                throw new GuardrailViolation(`Missing required answer field: ${field}`);
            }
        }

        const parsed = answerResponseSchema.safeParse(output);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            throw new GuardrailViolation(issue ? issue.message : 'Output failed schema validation');
        }

        return parsed.data;
    }

    private checkReferences(
        response: AnswerResponse,
        allowedPages: readonly string[],
        allowedMedia: readonly string[],
        strict: boolean
    ): void {
        if (strict) {
            for (const link of response.links) {
                if (!allowedPages.includes(link)) {
                    throw new GuardrailViolation(`Invalid page reference: ${link}`);
                }
            }
        }

        const images = response.media.images;
        if (images.length > this.config.maxMedia) {
            throw new GuardrailViolation(`Too many media files (max ${this.config.maxMedia})`);
        }

        for (const image of images) {
            if (!image.startsWith(MEDIA_PREFIX) && !image.startsWith(DIAGRAM_LABEL_PREFIX)) {
                throw new GuardrailViolation(`Invalid media format: ${image}`);
            }
            if (strict && !allowedMedia.includes(image)) {
                throw new GuardrailViolation(`Invalid media reference: ${image}`);
            }
        }
    }

    private contextViolation(reason: string): GuardrailViolation {
        logger.error('Context guardrail violation', { reason });
        return new GuardrailViolation(reason);
    }
}
