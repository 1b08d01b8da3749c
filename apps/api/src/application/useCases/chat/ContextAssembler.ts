import type { Chunk } from '../../../domain/entities/Chunk';
import { tokenize } from '../../utils/tokenize';

export const PASSAGE_SEPARATOR = '\n\n---\n\n';

export interface AssembledContext {
    text: string;
    /** Page-level media paths, the only values allowed in `links`. */
    allowedPages: string[];
    /** Diagram ids, the only values allowed in `media.images`. */
    allowedMedia: string[];
}

const sortedUnique = (values: Iterable<string>) => [...new Set(values)].sort();

/**
 * Reference sets come from the selected chunks only, never from the rest of
 * the corpus.
 */
export function assembleContext(chunks: readonly Chunk[]): AssembledContext {
    return {
        text: chunks.map((chunk) => `[Page ${chunk.page}]\n${chunk.text}`).join(PASSAGE_SEPARATOR),
        allowedPages: sortedUnique(chunks.flatMap((chunk) => chunk.media)),
        allowedMedia: sortedUnique(chunks.flatMap((chunk) => chunk.diagramIds)),
    };
}

export function hasLexicalOverlap(query: string, context: string): boolean {
    const contextWords = new Set(tokenize(context));
    return tokenize(query).some((word) => contextWords.has(word));
}
