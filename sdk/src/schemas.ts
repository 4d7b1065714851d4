import { z } from 'zod';

export const passageSchema = z.object({
  id: z.string(),
  text: z.string(),
});

export const chatResponseSchema = z.object({
  sessionId: z.string(),
  response: z.string(),
  passages: z.array(passageSchema),
  fallback: z.boolean(),
  timestamp: z.string(),
});

export const voiceResponseSchema = chatResponseSchema.extend({
  text: z.string(),
});

export const transcriptSchema = z.object({
  text: z.string(),
});

export const historySchema = z.object({
  sessionId: z.string(),
  turns: z.array(
    z.object({
      role: z.enum(['user', 'assistant']),
      text: z.string(),
      timestamp: z.string(),
    }),
  ),
});

export const randomQuoteSchema = z.object({
  quote: passageSchema,
  source: z.string(),
});

export const emptySchema = z.undefined();

/** Frames the server sends over the chat socket. */
export const serverFrameSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('session'), sessionId: z.string() }),
  z.object({ type: z.literal('response'), content: z.string(), sessionId: z.string() }),
  z.object({ type: z.literal('error'), content: z.string() }),
  z.object({ type: z.literal('ping') }),
  z.object({ type: z.literal('pong') }),
]);

export type ServerFrame = z.infer<typeof serverFrameSchema>;
