import type { z } from 'zod';
import type { answerContentSchema, answerResponseSchema, rawAnswerSchema } from './schemas';

export * from './schemas';

/**
 * Structured body of an answer
 */
export type AnswerContent = z.infer<typeof answerContentSchema>;

/**
 * Response of `POST /chat/answer`. `links` and `media.images` only ever hold
 * references taken from the chunks retrieved for the request.
 */
export type AnswerResponse = z.infer<typeof answerResponseSchema>;

export type RawAnswer = z.infer<typeof rawAnswerSchema>;

export interface AskQuestionRequest {
  question: string;
}

export interface HealthResponse {
  status: 'healthy';
  index_ready: boolean;
  chunks: number;
}

export interface ErrorResponse {
  status: 'error' | 'fail';
  message: string;
  errors?: unknown[];
}
