/**
 * WebSocket frame formats
 *
 * Clients may send raw text, `{ type: 'message', content }`, the bare string
 * "ping", `{ type: 'ping' }` or `{ type: 'pong' }`. The server answers with
 * the ServerFrame union below, always as JSON.
 */

import { z } from 'zod';

export const clientEnvelopeSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('message'), content: z.string() }),
  z.object({ type: z.literal('ping') }),
  z.object({ type: z.literal('pong') }),
]);

export type ClientFrame =
  | { kind: 'message'; text: string }
  | { kind: 'ping' }
  | { kind: 'pong' }
  | { kind: 'invalid'; reason: string };

export type ServerFrame =
  | { type: 'session'; sessionId: string }
  | { type: 'response'; content: string; sessionId: string }
  | { type: 'error'; content: string }
  | { type: 'ping' }
  | { type: 'pong' };

// a JSON object with a "type" key, even if it fails to parse
const ENVELOPE_LIKE = /^\{\s*"type"\s*:/;

export function parseClientFrame(raw: string): ClientFrame {
  const trimmed = raw.trim();

  if (trimmed.toLowerCase() === 'ping') {
    return { kind: 'ping' };
  }

  // anything that does not look like an envelope is the message itself
  if (!trimmed.startsWith('{')) {
    return { kind: 'message', text: raw };
  }

  let json: unknown;
  try {
    json = JSON.parse(trimmed);
  } catch {
    if (!ENVELOPE_LIKE.test(trimmed)) {
      return { kind: 'message', text: raw };
    }
    return { kind: 'invalid', reason: 'Malformed message envelope' };
  }

  const parsed = clientEnvelopeSchema.safeParse(json);
  if (!parsed.success) {
    return { kind: 'invalid', reason: 'Unrecognised message envelope' };
  }

  const envelope = parsed.data;
  switch (envelope.type) {
    case 'message':
      return { kind: 'message', text: envelope.content };
    case 'ping':
      return { kind: 'ping' };
    case 'pong':
      return { kind: 'pong' };
  }
}

const decoder = new TextDecoder();

/**
 * Frame payload as text. Node delivers Buffers, browsers strings or Blobs.
 */
export async function readFrame(data: string | Blob | ArrayBufferLike | ArrayBufferView): Promise<string> {
  if (typeof data === 'string') return data;
  if (data instanceof Blob) return data.text();
  if (ArrayBuffer.isView(data)) return decoder.decode(data);
  return decoder.decode(new Uint8Array(data));
}
