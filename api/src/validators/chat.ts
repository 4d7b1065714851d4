/**
 * Chat Validators
 *
 * Zod schemas for the chat, voice and session routes
 */

import { z } from 'zod';
import { SESSION_ID_PATTERN } from '@/services/session.service';

export const MAX_MESSAGE_LENGTH = 4000;

export const sessionIdSchema = z
  .string()
  .regex(SESSION_ID_PATTERN, 'Session id must be 8-64 letters, digits, "-" or "_"');

// Form posts send empty strings for untouched fields
const optionalSessionIdSchema = z.preprocess(
  (value) => (value === '' || value === null ? undefined : value),
  sessionIdSchema.optional(),
);

/**
 * POST /api/chat
 */
export const chatRequestSchema = z.object({
  // length is capped by ChatService.submit after trimming
  message: z.string(),
  sessionId: optionalSessionIdSchema,
});

export type ChatRequest = z.infer<typeof chatRequestSchema>;

/**
 * POST /api/voice (form fields next to the audio file)
 */
export const voiceFieldsSchema = z.object({
  sessionId: optionalSessionIdSchema,
});

/**
 * GET/DELETE /api/sessions/:sessionId
 */
export const sessionParamSchema = z.object({
  sessionId: sessionIdSchema,
});
