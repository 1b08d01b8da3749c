import { vi } from 'vitest';
import type { AnswerResponse } from '@docent/types';
import { Chunk } from '../src/domain/entities/Chunk';
import type { LLMProvider } from '../src/application/providers/LLMProvider';
import type { VectorProvider } from '../src/application/providers/VectorProvider';

export const createChunk = (
    id: string,
    page: number,
    text: string,
    options: { diagramIds?: string[]; media?: string[]; isTable?: boolean } = {}
): Chunk =>
    new Chunk(
        id,
        page,
        text,
        text.split(/\s+/).length,
        options.diagramIds ?? [],
        options.media ?? [`/media/page_${page}.png`],
        options.isTable ?? false
    );

/** Small fire-safety corpus; vector i belongs to chunk i. */
export const fireSafetyChunks = (): Chunk[] => [
    createChunk(
        'c0',
        12,
        'Fire doors on escape routes must be self-closing and rated for at least 30 minutes of fire resistance. See Diagram 2.1 for door hardware.',
        { diagramIds: ['Diagram 2.1'] }
    ),
    createChunk(
        'c1',
        14,
        'Emergency lighting must cover every escape route and stair, with a minimum duration of three hours.'
    ),
    createChunk(
        'c2',
        30,
        'Sprinkler systems are required in buildings taller than 30 metres. Diagram 5.3 shows the sprinkler layout.',
        { diagramIds: ['Diagram 5.3'] }
    ),
    createChunk('c3', 41, 'Travel distance to the nearest exit must not exceed 45 metres in office buildings.'),
];

export const fireSafetyVectors = (): number[][] => [
    [1, 0, 0],
    [0.9, 0.1, 0],
    [0, 1, 0],
    [0, 0, 1],
];

export const createLLMProvider = () => ({
    complete: vi.fn<LLMProvider['complete']>(),
});

export const createVectorProvider = (vector: number[] = [1, 0, 0]) => ({
    generateEmbedding: vi.fn<VectorProvider['generateEmbedding']>().mockResolvedValue(vector),
    generateEmbeddings: vi.fn<VectorProvider['generateEmbeddings']>(),
});

export const validOutput = (overrides: Partial<AnswerResponse> = {}): AnswerResponse => ({
    mode: 'answer',
    answer: {
        title: 'Fire door requirements',
        summary: 'Fire doors on escape routes must be self-closing and rated for 30 minutes.',
        steps: ['Check the door closer', 'Confirm the 30 minute rating label'],
        verification: ['Page 12 states the self-closing and rating requirement'],
    },
    links: ['/media/page_12.png'],
    media: { images: ['Diagram 2.1'] },
    latency_ms: 0,
    ...overrides,
});

export const generatorReply = (body: {
    title?: string;
    summary?: string;
    steps?: string[];
    verification?: string[];
    links?: string[];
    images?: string[];
}): string =>
    JSON.stringify({
        mode: 'answer',
        answer: {
            title: body.title ?? 'Fire door requirements',
            summary: body.summary ?? 'Fire doors on escape routes must be self-closing and rated for 30 minutes.',
            steps: body.steps ?? ['Check the door closer'],
            verification: body.verification ?? ['Page 12 states the requirement'],
        },
        links: body.links ?? ['/media/page_12.png'],
        media: { images: body.images ?? ['Diagram 2.1'] },
    });
