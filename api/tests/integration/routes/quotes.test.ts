import { describe, it, expect } from 'vitest';
import { createTestApp } from '../../helpers/app';
import { testPassages } from '../../helpers/fixtures';

describe('GET /api/quotes/random', () => {
  it('should return one passage from the corpus', async () => {
    const { app } = await createTestApp();

    const res = await app.request('/api/quotes/random');

    expect(res.status).toBe(200);
    const body = await res.json();
    expect(body.source).toBe('The Hidden Words');
    expect(testPassages()).toContainEqual(body.quote);
  });

  it('should return 404 when no passages are loaded', async () => {
    const { app } = await createTestApp({ passages: [] });

    const res = await app.request('/api/quotes/random');

    expect(res.status).toBe(404);
    expect((await res.json()).error.code).toBe('NOT_FOUND');
  });
});
