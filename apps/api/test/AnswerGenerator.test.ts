import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Mock } from 'vitest';
import * as fc from 'fast-check';
import {
    AnswerGenerator,
    NO_INFORMATION_SUMMARY,
    NO_INFORMATION_TITLE,
    noInformationAnswer,
} from '../src/application/services/AnswerGenerator';
import { PromptBuilder } from '../src/application/useCases/chat/PromptBuilder';
import { KeywordHallucinationDetector } from '../src/domain/services/HallucinationDetector';
import type { HallucinationDetector } from '../src/domain/services/HallucinationDetector';
import { GenerationError, ValidationError } from '../src/domain/errors/AppError';
import { createLLMProvider, generatorReply } from './fixtures';

const CONTEXT = '[Page 5]\nFire doors on escape routes must be self-closing.';
const PAGES = ['/media/page_5.png'];
const MEDIA = ['Diagram 2.1'];

describe('AnswerGenerator', () => {
    let llmProvider: ReturnType<typeof createLLMProvider>;
    let sleep: Mock<(ms: number) => Promise<void>>;
    let generator: AnswerGenerator;

    beforeEach(() => {
        llmProvider = createLLMProvider();
        sleep = vi.fn<(ms: number) => Promise<void>>().mockResolvedValue(undefined);
        generator = new AnswerGenerator(llmProvider, new PromptBuilder(), new KeywordHallucinationDetector(), { sleep });
    });

    it('should return a schema-valid answer', async () => {
        llmProvider.complete.mockResolvedValueOnce(generatorReply({ links: ['/media/page_5.png'] }));

        const response = await generator.generate('fire door rules', CONTEXT, PAGES, MEDIA);

        expect(response.mode).toBe('answer');
        expect(response.answer.title).toBe('Fire door requirements');
        expect(response.links).toEqual(['/media/page_5.png']);
        expect(response.media.images).toEqual(['Diagram 2.1']);
        expect(Number.isInteger(response.latency_ms)).toBe(true);
        expect(llmProvider.complete).toHaveBeenCalledWith(expect.stringContaining('RAG answering assistant'), expect.stringContaining('PAGES:\n["/media/page_5.png"]'), {
            temperature: 0,
            timeoutMs: 3000,
        });
    });

    it('should drop references outside the retrieved set', async () => {
        llmProvider.complete.mockResolvedValueOnce(
            generatorReply({
                links: ['/media/page_5.png', '/media/page_999.png', '/media/page_5.png'],
                images: ['Diagram 2.1', 'Diagram 9.9'],
            })
        );

        const response = await generator.generate('fire door rules', CONTEXT, PAGES, MEDIA);

        expect(response.links).toEqual(['/media/page_5.png']);
        expect(response.media.images).toEqual(['Diagram 2.1']);
    });

    it('should only ever return references from the allowed sets', async () => {
        const pages = Array.from({ length: 8 }, (_, i) => `/media/page_${i + 1}.png`);
        const diagrams = ['Diagram 1.1', 'Diagram 2.1', 'Diagram 3.1', 'Diagram 4.2'];

        await fc.assert(
            fc.asyncProperty(
                fc.subarray(pages),
                fc.array(fc.constantFrom(...pages, '/media/page_999.png'), { maxLength: 12 }),
                fc.subarray(diagrams),
                fc.array(fc.constantFrom(...diagrams, 'Diagram 9.9'), { maxLength: 6 }),
                async (allowedPages, links, allowedMedia, images) => {
                    llmProvider.complete.mockResolvedValueOnce(generatorReply({ links, images }));

                    const response = await generator.generate('fire door rules', CONTEXT, allowedPages, allowedMedia);

                    expect(response.links.every((link) => allowedPages.includes(link))).toBe(true);
                    expect(response.media.images.every((image) => allowedMedia.includes(image))).toBe(true);
                }
            )
        );
    });

    it('should accept JSON wrapped in prose and fill optional lists', async () => {
        llmProvider.complete.mockResolvedValueOnce(
            'Here you go: {"answer": {"title": "Door closers", "summary": "Doors must close by themselves."}}'
        );

        const response = await generator.generate('fire door rules', CONTEXT, PAGES, MEDIA);

        expect(response).toMatchObject({
            mode: 'answer',
            answer: { title: 'Door closers', summary: 'Doors must close by themselves.', steps: [], verification: [] },
            links: [],
            media: { images: [] },
        });
    });

    it('should replace a hallucinated answer with the no-information answer', async () => {
        llmProvider.complete.mockResolvedValueOnce(
            generatorReply({ summary: 'Doors are usually rated, this is based on common knowledge.' })
        );

        const response = await generator.generate('fire door rules', CONTEXT, PAGES, MEDIA);

        expect(response.answer).toEqual({
            title: NO_INFORMATION_TITLE,
            summary: NO_INFORMATION_SUMMARY,
            steps: [],
            verification: [],
        });
        expect(response.links).toEqual([]);
        expect(response.media.images).toEqual([]);
    });

    it('should consult the configured detector with the question and context', async () => {
        const detect = vi.fn<HallucinationDetector['detect']>().mockResolvedValue({ hallucinated: false });
        const custom = new AnswerGenerator(llmProvider, new PromptBuilder(), { detect }, { sleep });
        llmProvider.complete.mockResolvedValueOnce(generatorReply({ links: [] }));

        await custom.generate('fire door rules', CONTEXT, PAGES, MEDIA);

        expect(detect).toHaveBeenCalledWith({
            question: 'fire door rules',
            context: CONTEXT,
            answer: {
                title: 'Fire door requirements',
                summary: 'Fire doors on escape routes must be self-closing and rated for 30 minutes.',
                steps: ['Check the door closer'],
                verification: ['Page 12 states the requirement'],
            },
        });
    });

    it('should retry with exponential backoff', async () => {
        llmProvider.complete
            .mockRejectedValueOnce(new Error('timeout'))
            .mockRejectedValueOnce(new Error('timeout'))
            .mockResolvedValueOnce(generatorReply({ links: [] }));

        const response = await generator.generate('fire door rules', CONTEXT, PAGES, MEDIA);

        expect(response.answer.title).toBe('Fire door requirements');
        expect(llmProvider.complete).toHaveBeenCalledTimes(3);
        expect(sleep.mock.calls).toEqual([[1000], [2000]]);
    });

    it('should fail after exhausting retries', async () => {
        const last = new Error('still down');
        llmProvider.complete
            .mockRejectedValueOnce(new Error('down'))
            .mockRejectedValueOnce(new Error('down'))
            .mockRejectedValueOnce(last);

        const error = await generator.generate('fire door rules', CONTEXT, PAGES, MEDIA).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(GenerationError);
        expect(error instanceof GenerationError && error.message).toBe('Text generation failed after 3 attempt(s)');
        expect(error instanceof GenerationError && error.cause).toBe(last);
        expect(llmProvider.complete).toHaveBeenCalledTimes(3);
    });

    it('should not retry a client error such as an unknown model', async () => {
        const notFound = Object.assign(new Error('model "x" not found'), { status_code: 404 });
        llmProvider.complete.mockRejectedValueOnce(notFound);

        const error = await generator.generate('fire door rules', CONTEXT, PAGES, MEDIA).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(GenerationError);
        expect(error instanceof GenerationError && error.message).toBe('Text generation failed after 1 attempt(s)');
        expect(error instanceof GenerationError && error.cause).toBe(notFound);
        expect(llmProvider.complete).toHaveBeenCalledTimes(1);
        expect(sleep).not.toHaveBeenCalled();
    });

    it('should reject empty inputs without calling the model', async () => {
        await expect(generator.generate('  ', CONTEXT, PAGES, MEDIA)).rejects.toThrow(
            new ValidationError('Query must not be empty')
        );
        await expect(generator.generate('fire door rules', '', PAGES, MEDIA)).rejects.toThrow(
            new ValidationError('Context must not be empty')
        );
        expect(llmProvider.complete).not.toHaveBeenCalled();
    });

    it('should fail on unparseable output', async () => {
        llmProvider.complete.mockResolvedValueOnce('I could not find anything.');

        await expect(generator.generate('fire door rules', CONTEXT, PAGES, MEDIA)).rejects.toThrow(
            new GenerationError('Failed to parse generator JSON')
        );
    });

    it('should fail when answer fields are missing', async () => {
        llmProvider.complete.mockResolvedValueOnce('{"mode": "answer", "links": []}');

        await expect(generator.generate('fire door rules', CONTEXT, PAGES, MEDIA)).rejects.toThrow(
            new GenerationError('Generator JSON is missing required answer fields')
        );
    });

    it('should fail when the answer violates the response schema', async () => {
        llmProvider.complete.mockResolvedValueOnce(generatorReply({ title: 'Hi', links: [] }));

        await expect(generator.generate('fire door rules', CONTEXT, PAGES, MEDIA)).rejects.toThrow(
            new GenerationError('Generated answer failed schema validation: answer.title Title too short or empty')
        );
    });
});

describe('noInformationAnswer', () => {
    it('should build the canonical empty answer', () => {
        expect(noInformationAnswer(12.6)).toEqual({
            mode: 'answer',
            answer: { title: NO_INFORMATION_TITLE, summary: NO_INFORMATION_SUMMARY, steps: [], verification: [] },
            links: [],
            media: { images: [] },
            latency_ms: 13,
        });
    });
});
