import { describe, it, expect } from 'vitest';
import { createTestApp, jsonHeaders } from '../../helpers/app';

describe('/api/sessions/:sessionId', () => {
  it('should return the turn log with ISO timestamps', async () => {
    const { app } = await createTestApp();
    await app.request('/api/chat', {
      method: 'POST',
      headers: jsonHeaders(),
      body: JSON.stringify({ message: 'hello', sessionId: 'history-session-1' }),
    });

    const res = await app.request('/api/sessions/history-session-1');

    expect(res.status).toBe(200);
    const body = await res.json();
    expect(body.sessionId).toBe('history-session-1');
    expect(body.turns.map((t: { role: string; text: string }) => [t.role, t.text])).toEqual([
      ['user', 'hello'],
      ['assistant', 'Peace be upon you.'],
    ]);
    expect(Number.isNaN(Date.parse(body.turns[0].timestamp))).toBe(false);
  });

  it('should return 404 for an unknown session', async () => {
    const { app } = await createTestApp();

    const res = await app.request('/api/sessions/unknown-session');

    expect(res.status).toBe(404);
    expect((await res.json()).error.code).toBe('NOT_FOUND');
  });

  it('should reject a malformed session id', async () => {
    const { app } = await createTestApp();

    const res = await app.request('/api/sessions/short');

    expect(res.status).toBe(400);
    expect((await res.json()).error.code).toBe('VALIDATION_ERROR');
  });

  it('should clear a session', async () => {
    const { app, services } = await createTestApp();
    services.sessions.resolve('clear-me-please').append('user', 'hello');

    const res = await app.request('/api/sessions/clear-me-please', { method: 'DELETE' });

    expect(res.status).toBe(204);
    expect(services.sessions.get('clear-me-please')).toBeUndefined();
    expect((await app.request('/api/sessions/clear-me-please')).status).toBe(404);
  });

  it('should return 404 when clearing an unknown session', async () => {
    const { app } = await createTestApp();

    const res = await app.request('/api/sessions/unknown-session', { method: 'DELETE' });

    expect(res.status).toBe(404);
  });
});
