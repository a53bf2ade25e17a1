import { z } from 'zod'

const timestampLink = z.object({
  text: z.string(),
  seconds: z.number().int().nonnegative(),
  link: z.string(),
})

const matchedComment = z.object({
  text: z.string(),
  author: z.string(),
  published: z.string(),
  likes: z.number(),
  link: z.string(),
  timestamps: z.array(timestampLink),
})

const base = {
  id: z.string().min(1),
  videoUrl: z.string(),
  phrases: z.array(z.string()),
  email: z.string(),
  sequence: z.number().int().positive(),
  requestId: z.string().optional(),
  submissionTime: z.string().datetime(),
  startedAt: z.string().optional(),
  attempts: z.number().int().nonnegative().default(0),
}

/** Shape of a persisted job record, checked when the store loads from disk. */
export const jobRecordSchema = z.union([
  z.object({
    ...base,
    status: z.enum(['pending', 'processing']),
  }),
  z.object({
    ...base,
    status: z.literal('completed'),
    completionTime: z.string().datetime(),
    result: z.object({
      commentCount: z.number().int().nonnegative(),
      emailSent: z.boolean(),
      comments: z.array(matchedComment).default([]),
      truncated: z.boolean().default(false),
    }),
  }),
  z.object({
    ...base,
    status: z.literal('failed'),
    completionTime: z.string().datetime(),
    result: z.object({ errorMessage: z.string() }),
  }),
])
