import { z } from 'zod';

/**
 * One item of a NewsAPI `top-headlines` page. Every field may be null or absent upstream.
 */
export const NewsApiArticleSchema = z.object({
  title: z.string().nullish(),
  description: z.string().nullish(),
  url: z.string().nullish(),
  publishedAt: z.string().nullish(),
  source: z.object({
    name: z.string().nullish(),
  }).passthrough().nullish(),
}).passthrough();

export type NewsApiArticle = z.infer<typeof NewsApiArticleSchema>;

export const NewsApiResponseSchema = z.object({
  status: z.string(),
  articles: z.array(NewsApiArticleSchema).optional(),
  message: z.string().optional(),
  code: z.string().optional(),
});

export const MAX_PROMPT_LENGTH = 2000;

/**
 * Body of POST /v1/chat
 */
export const ChatRequestSchema = z.object({
  prompt: z.string({
    required_error: 'prompt is required',
    invalid_type_error: 'prompt must be a string',
  })
    .trim()
    .min(1, 'prompt cannot be empty')
    .max(MAX_PROMPT_LENGTH, `prompt too long (max ${MAX_PROMPT_LENGTH} characters)`),
});

export const ReferenceSchema = z.object({
  source: z.string(),
  date: z.string(),
  url: z.string(),
});

/**
 * Response of POST /v1/chat, snake_case on the wire
 */
export const ChatResponseSchema = z.object({
  answer: z.string(),
  references: z.array(ReferenceSchema),
  metadata: z.object({
    retrieved_docs: z.number().int().min(0),
  }),
});

export type ChatResponse = z.infer<typeof ChatResponseSchema>;
