/**
 * Audio Routes
 *
 * POST /api/transcribe - speech to text only
 * POST /api/voice      - speech to text, then a chat turn with the transcript
 */

import { Hono } from 'hono';
import { bodyLimit } from 'hono/body-limit';
import type { HonoEnv } from '@/types/hono';
import type { ChatService } from '@/services/chat.service';
import type { TranscriptionService } from '@/services/transcription.service';
import { rateLimit } from '@/middleware/rateLimit';
import { errorResponse } from '@/middleware/errorHandler';
import { RateLimitTier } from '@/services/rateLimit.service';
import { voiceFieldsSchema } from '@/validators/chat';
import { toChatResponse } from '@/routes/chat';

// room for the multipart envelope around the file itself
const MULTIPART_OVERHEAD_BYTES = 64 * 1024;

function fileField(body: Record<string, unknown>): File | undefined {
  const value = body.file;
  return value instanceof File ? value : undefined;
}

export function createAudioRoutes(transcription: TranscriptionService, chat: ChatService) {
  const routes = new Hono<HonoEnv>();

  const limitBody = bodyLimit({
    maxSize: transcription.maxBytes + MULTIPART_OVERHEAD_BYTES,
    onError: (c) =>
      c.json(
        errorResponse('AUDIO_TOO_LARGE', `Audio files are limited to ${transcription.maxBytes} bytes`),
        413,
      ),
  });

  /**
   * POST /api/transcribe
   *
   * multipart/form-data with a `file` field -> { text }
   */
  routes.post('/transcribe', rateLimit(RateLimitTier.AUDIO), limitBody, async (c) => {
    const body = await c.req.parseBody();
    const text = await transcription.transcribe(fileField(body));
    return c.json({ text });
  });

  /**
   * POST /api/voice
   *
   * multipart/form-data with `file` and optional `sessionId`
   */
  routes.post('/voice', rateLimit(RateLimitTier.AUDIO), limitBody, async (c) => {
    const body = await c.req.parseBody();
    const fields = voiceFieldsSchema.parse(body);
    const text = await transcription.transcribe(fileField(body));

    const result = await chat.submit({ sessionId: fields.sessionId, text, transport: 'voice' });
    return c.json({ text, ...toChatResponse(result) });
  });

  return routes;
}
