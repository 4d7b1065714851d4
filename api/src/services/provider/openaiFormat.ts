/**
 * Helpers for OpenAI-compatible response bodies. OpenRouter, OpenAI and most
 * self-hosted gateways agree on this shape, with `content` either a string or
 * an array of typed parts.
 */

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function contentToText(content: unknown): string {
  if (typeof content === 'string') return content.trim();
  if (!Array.isArray(content)) return '';

  const parts: string[] = [];
  for (const item of content) {
    if (typeof item === 'string') {
      parts.push(item);
      continue;
    }
    if (!isRecord(item)) continue;
    if (item.type === 'text' && typeof item.text === 'string') {
      parts.push(item.text);
    }
  }
  return parts.join('\n').trim();
}

export function extractAssistantText(responseBody: unknown): string {
  if (!isRecord(responseBody)) return '';
  const choices = responseBody.choices;
  if (!Array.isArray(choices) || choices.length === 0) return '';

  const firstChoice: unknown = choices[0];
  if (!isRecord(firstChoice)) return '';
  const message = firstChoice.message;
  if (!isRecord(message)) return '';

  return contentToText(message.content);
}

/** Provider error bodies are usually `{ error: { message } }` or `{ error: "..." }`. */
export function extractErrorMessage(responseBody: unknown): string | undefined {
  if (!isRecord(responseBody)) return undefined;
  const error = responseBody.error;
  if (typeof error === 'string') return error;
  if (isRecord(error) && typeof error.message === 'string') return error.message;
  return undefined;
}

/**
 * Retry-After in seconds (or an HTTP date) converted to milliseconds.
 */
export function parseRetryAfter(header: string | null, now: number = Date.now()): number | undefined {
  if (!header) return undefined;
  const trimmed = header.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.round(Number(trimmed) * 1000);
  }
  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}
