import { describe, it, expect } from 'vitest';
import { TranscriptionService, isSupportedAudio } from '@/services/transcription.service';
import { TranscriptionError } from '@/errors/chatErrors';
import { testConfig } from '../../helpers/fixtures';
import { createFetchMock, jsonResponse } from '../../helpers/fetch';

function audioFile(bytes = 4, name = 'clip.webm', type = 'audio/webm') {
  return new File([new Uint8Array(bytes)], name, { type });
}

describe('isSupportedAudio', () => {
  it('should accept audio mime types and browser video containers', () => {
    expect(isSupportedAudio({ name: 'clip', type: 'audio/ogg' })).toBe(true);
    expect(isSupportedAudio({ name: 'clip', type: 'video/webm;codecs=opus' })).toBe(true);
  });

  it('should fall back to the file extension', () => {
    expect(isSupportedAudio({ name: 'voice.M4A', type: '' })).toBe(true);
    expect(isSupportedAudio({ name: 'notes.txt', type: 'text/plain' })).toBe(false);
  });
});

describe('TranscriptionService.validate', () => {
  const service = new TranscriptionService(testConfig({ TRANSCRIPTION_MAX_BYTES: '10' }).transcription);

  it.each([
    ['a missing file', undefined, 'NO_AUDIO', 400],
    ['a zero-byte file', audioFile(0), 'EMPTY_AUDIO', 400],
    ['an oversized file', audioFile(11), 'AUDIO_TOO_LARGE', 413],
    ['a non-audio file', audioFile(4, 'notes.txt', 'text/plain'), 'UNSUPPORTED_AUDIO', 415],
  ])('should reject %s', (_label, file, code, status) => {
    let caught: unknown;
    try {
      service.validate(file);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(TranscriptionError);
    expect(caught).toMatchObject({ code, status });
  });

  it('should accept a file at the size limit', () => {
    const file = audioFile(10);
    expect(service.validate(file)).toBe(file);
  });
});

describe('TranscriptionService.transcribe', () => {
  const config = testConfig();

  it('should upload the file and return the trimmed transcript', async () => {
    const { fetchMock, requests } = createFetchMock(() => jsonResponse({ text: '  I feel anxious today  ' }));
    const service = new TranscriptionService(config.transcription, fetchMock);

    const text = await service.transcribe(audioFile());

    expect(text).toBe('I feel anxious today');
    expect(requests[0].url).toBe('https://speech.test/v1/audio/transcriptions');
    expect(new Headers(requests[0].init?.headers).get('authorization')).toBe('Bearer test-key');

    const form = requests[0].init?.body;
    expect(form).toBeInstanceOf(FormData);
    if (form instanceof FormData) {
      expect(form.get('model')).toBe('whisper-1');
      expect(form.get('response_format')).toBe('json');
      expect(form.get('file')).toBeInstanceOf(File);
    }
  });

  it('should report TRANSCRIPTION_FAILED when the service errors', async () => {
    const { fetchMock } = createFetchMock(() => jsonResponse({ error: 'bad gateway' }, 502));
    const service = new TranscriptionService(config.transcription, fetchMock);

    await expect(service.transcribe(audioFile())).rejects.toMatchObject({
      code: 'TRANSCRIPTION_FAILED',
      status: 502,
    });
  });

  it('should report TRANSCRIPTION_FAILED when the service is unreachable', async () => {
    const { fetchMock } = createFetchMock(() => {
      throw new TypeError('fetch failed');
    });
    const service = new TranscriptionService(config.transcription, fetchMock);

    await expect(service.transcribe(audioFile())).rejects.toMatchObject({ code: 'TRANSCRIPTION_FAILED' });
  });

  it('should report UNINTELLIGIBLE_AUDIO for a blank transcript', async () => {
    const { fetchMock } = createFetchMock(() => jsonResponse({ text: '   ' }));
    const service = new TranscriptionService(config.transcription, fetchMock);

    await expect(service.transcribe(audioFile())).rejects.toMatchObject({
      code: 'UNINTELLIGIBLE_AUDIO',
      status: 422,
    });
  });

  it('should not call the service for an invalid upload', async () => {
    const { fetchMock, requests } = createFetchMock(() => jsonResponse({ text: 'unused' }));
    const service = new TranscriptionService(config.transcription, fetchMock);

    await expect(service.transcribe(audioFile(0))).rejects.toMatchObject({ code: 'EMPTY_AUDIO' });
    expect(requests).toHaveLength(0);
  });
});
