/**
 * Transcription Service
 *
 * Validates an uploaded audio file and forwards it to an OpenAI-compatible
 * /v1/audio/transcriptions endpoint (Whisper by default).
 *
 * Checks run in this order: missing, empty, too large, unsupported type.
 */

import { z } from 'zod';
import type { TranscriptionConfig } from '@/config/env';
import { TranscriptionError } from '@/errors/chatErrors';
import type { FetchFn } from '@/types/fetch';
import { logger } from '@/utils/logger';

export const SUPPORTED_AUDIO_EXTENSIONS = [
  'm4a',
  'mp3',
  'mp4',
  'mpeg',
  'mpga',
  'wav',
  'webm',
  'ogg',
  'flac',
] as const;

const SUPPORTED_EXTENSIONS: ReadonlySet<string> = new Set(SUPPORTED_AUDIO_EXTENSIONS);

// Browsers record as video/webm or video/mp4 even for audio-only streams
const SUPPORTED_VIDEO_TYPES: ReadonlySet<string> = new Set(['video/mp4', 'video/webm']);

const TRANSCRIPTION_TIMEOUT_MS = 60_000;

const transcriptionResponseSchema = z.object({ text: z.string() });

function extensionOf(filename: string): string {
  const dot = filename.lastIndexOf('.');
  return dot === -1 ? '' : filename.slice(dot + 1).toLowerCase();
}

export function isSupportedAudio(file: Pick<File, 'name' | 'type'>): boolean {
  const mime = file.type.split(';')[0].trim().toLowerCase();
  if (mime.startsWith('audio/') || SUPPORTED_VIDEO_TYPES.has(mime)) {
    return true;
  }
  return SUPPORTED_EXTENSIONS.has(extensionOf(file.name));
}

export class TranscriptionService {
  constructor(
    private readonly config: TranscriptionConfig,
    private readonly fetchFn: FetchFn = fetch,
  ) {}

  get maxBytes(): number {
    return this.config.maxBytes;
  }

  validate(file: File | null | undefined): File {
    if (!file) {
      throw new TranscriptionError('NO_AUDIO', 'No audio file was uploaded');
    }
    if (file.size === 0) {
      throw new TranscriptionError('EMPTY_AUDIO', 'The uploaded audio file is empty');
    }
    if (file.size > this.config.maxBytes) {
      throw new TranscriptionError(
        'AUDIO_TOO_LARGE',
        `Audio files are limited to ${this.config.maxBytes} bytes`,
      );
    }
    if (!isSupportedAudio(file)) {
      throw new TranscriptionError(
        'UNSUPPORTED_AUDIO',
        `Unsupported audio format; use one of ${SUPPORTED_AUDIO_EXTENSIONS.join(', ')}`,
      );
    }
    return file;
  }

  /**
   * @returns the transcript, trimmed and never blank
   */
  async transcribe(input: File | null | undefined): Promise<string> {
    const file = this.validate(input);

    const form = new FormData();
    form.append('file', file, file.name || 'audio.webm');
    form.append('model', this.config.model);
    form.append('response_format', 'json');

    let response: Response;
    try {
      response = await this.fetchFn(`${this.config.baseUrl}/v1/audio/transcriptions`, {
        method: 'POST',
        headers: { Authorization: `Bearer ${this.config.apiKey}` },
        body: form,
        signal: AbortSignal.timeout(TRANSCRIPTION_TIMEOUT_MS),
      });
    } catch (error) {
      logger.error('Transcription request failed', { error: String(error), bytes: file.size });
      throw new TranscriptionError('TRANSCRIPTION_FAILED', 'Transcription service unavailable', {
        cause: error,
      });
    }

    if (!response.ok) {
      const detail = await response.text().catch(() => '');
      logger.error('Transcription service error', {
        status: response.status,
        detail: detail.slice(0, 500),
      });
      throw new TranscriptionError(
        'TRANSCRIPTION_FAILED',
        `Transcription service returned ${response.status}`,
      );
    }

    const parsed = transcriptionResponseSchema.safeParse(await response.json().catch(() => null));
    if (!parsed.success) {
      throw new TranscriptionError('TRANSCRIPTION_FAILED', 'Transcription service returned an unexpected body');
    }

    const text = parsed.data.text.trim();
    if (!text) {
      throw new TranscriptionError('UNINTELLIGIBLE_AUDIO', 'No speech could be recognised in the audio');
    }

    logger.debug('Audio transcribed', { bytes: file.size, characters: text.length });
    return text;
  }
}
