import { describe, it, expect } from 'vitest';
import { audioUpload, createTestApp } from '../../helpers/app';
import { completionResponse, jsonResponse } from '../../helpers/fetch';

describe('POST /api/transcribe', () => {
  it('should return the transcript', async () => {
    const { app, requests } = await createTestApp({
      outcomes: [() => jsonResponse({ text: 'I feel anxious' })],
    });

    const res = await app.request('/api/transcribe', { method: 'POST', body: audioUpload() });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ text: 'I feel anxious' });
    expect(requests[0].url).toBe('https://speech.test/v1/audio/transcriptions');
  });

  it('should reject a request without a file', async () => {
    const { app, requests } = await createTestApp();
    const form = new FormData();
    form.append('note', 'no audio here');

    const res = await app.request('/api/transcribe', { method: 'POST', body: form });

    expect(res.status).toBe(400);
    expect((await res.json()).error.code).toBe('NO_AUDIO');
    expect(requests).toHaveLength(0);
  });

  it('should reject a zero-byte file', async () => {
    const { app } = await createTestApp();

    const res = await app.request('/api/transcribe', { method: 'POST', body: audioUpload({}, 0) });

    expect(res.status).toBe(400);
    expect((await res.json()).error.code).toBe('EMPTY_AUDIO');
  });

  it('should reject a file over the size limit', async () => {
    const { app } = await createTestApp({ env: { TRANSCRIPTION_MAX_BYTES: '8' } });

    const res = await app.request('/api/transcribe', { method: 'POST', body: audioUpload({}, 16) });

    expect(res.status).toBe(413);
    expect((await res.json()).error.code).toBe('AUDIO_TOO_LARGE');
  });

  it('should report audio with no recognisable speech', async () => {
    const { app } = await createTestApp({ outcomes: [() => jsonResponse({ text: '' })] });

    const res = await app.request('/api/transcribe', { method: 'POST', body: audioUpload() });

    expect(res.status).toBe(422);
    expect((await res.json()).error.code).toBe('UNINTELLIGIBLE_AUDIO');
  });
});

describe('POST /api/voice', () => {
  it('should transcribe and answer in one round trip', async () => {
    const { app, services } = await createTestApp({
      outcomes: [
        () => jsonResponse({ text: 'I feel anxious' }),
        () => completionResponse('Take a breath.'),
      ],
    });

    const res = await app.request('/api/voice', {
      method: 'POST',
      body: audioUpload({ sessionId: 'voice-session-1' }),
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      text: 'I feel anxious',
      sessionId: 'voice-session-1',
      response: 'Take a breath.',
      fallback: false,
    });
    expect(services.sessions.get('voice-session-1')?.snapshot().map((t) => t.text)).toEqual([
      'I feel anxious',
      'Take a breath.',
    ]);
  });

  it('should not start a turn when transcription fails', async () => {
    const { app, services } = await createTestApp({
      outcomes: [() => jsonResponse({ error: 'unavailable' }, 503)],
    });

    const res = await app.request('/api/voice', {
      method: 'POST',
      body: audioUpload({ sessionId: 'voice-session-2' }),
    });

    expect(res.status).toBe(502);
    expect((await res.json()).error.code).toBe('TRANSCRIPTION_FAILED');
    expect(services.sessions.get('voice-session-2')).toBeUndefined();
  });
});
