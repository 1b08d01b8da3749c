import { z } from 'zod';

export const MEDIA_PREFIX = '/media/';

export const ANSWER_LIMITS = {
  minTitleLength: 5,
  minSummaryLength: 10,
  maxSummaryLength: 2000,
  maxSteps: 10,
  maxLinks: 10,
  maxMedia: 5,
} as const;

export const askQuestionSchema = z.object({
  question: z.string({ required_error: 'question is required' }),
});

export const answerContentSchema = z.object({
  title: z.string().trim().min(ANSWER_LIMITS.minTitleLength, 'Title too short or empty'),
  summary: z
    .string()
    .trim()
    .min(ANSWER_LIMITS.minSummaryLength, 'Summary too short or empty')
    .max(ANSWER_LIMITS.maxSummaryLength, `Summary too long (max ${ANSWER_LIMITS.maxSummaryLength} chars)`),
  steps: z.array(z.string()).max(ANSWER_LIMITS.maxSteps, `Too many steps (max ${ANSWER_LIMITS.maxSteps})`),
  verification: z.array(z.string()),
});

export const mediaSchema = z.object({
  images: z.array(z.string()),
});

export const answerResponseSchema = z.object({
  mode: z.literal('answer'),
  answer: answerContentSchema,
  links: z
    .array(z.string().startsWith(MEDIA_PREFIX, `Links must start with ${MEDIA_PREFIX}`))
    .max(ANSWER_LIMITS.maxLinks, `Too many links (max ${ANSWER_LIMITS.maxLinks})`),
  media: mediaSchema,
  latency_ms: z.number().int().nonnegative().default(0),
});

/**
 * Raw generator output before references are filtered. Links and images are
 * only required to be string arrays here; the output guardrail checks them.
 */
export const rawAnswerSchema = z.object({
  mode: z.string().optional(),
  answer: z.object({
    title: z.string(),
    summary: z.string(),
    steps: z.array(z.string()).default([]),
    verification: z.array(z.string()).default([]),
  }),
  links: z.array(z.string()).default([]),
  media: z.object({ images: z.array(z.string()).default([]) }).default({ images: [] }),
});
