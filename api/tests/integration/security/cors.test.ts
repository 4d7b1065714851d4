/**
 * CORS Tests
 *
 * The web page sends its Origin, the mobile app sends none:
 * 1. no Origin: wildcard
 * 2. local dev servers and CORS_ORIGIN entries: echoed back
 * 3. anything else: no Access-Control-Allow-Origin
 */

import { describe, test, expect } from 'vitest';
import { createTestApp } from '../../helpers/app';

describe('CORS', () => {
  test('should allow requests without an Origin header', async () => {
    const { app } = await createTestApp();

    const response = await app.request('/api/health');

    expect(response.headers.get('access-control-allow-origin')).toBe('*');
  });

  test('should echo a local dev origin', async () => {
    const { app } = await createTestApp();

    const response = await app.request('/api/health', {
      headers: { origin: 'http://localhost:5173' },
    });

    expect(response.headers.get('access-control-allow-origin')).toBe('http://localhost:5173');
  });

  test('should echo origins listed in CORS_ORIGIN', async () => {
    const { app } = await createTestApp({
      env: { CORS_ORIGIN: 'https://companion.test, https://other.test' },
    });

    const response = await app.request('/api/health', {
      headers: { origin: 'https://other.test' },
    });

    expect(response.headers.get('access-control-allow-origin')).toBe('https://other.test');
  });

  test('should reject unknown origins', async () => {
    const { app } = await createTestApp();

    const response = await app.request('/api/health', {
      headers: { origin: 'https://elsewhere.test' },
    });

    expect(response.headers.get('access-control-allow-origin')).toBeNull();
  });

  test('should answer preflight requests for the chat route', async () => {
    const { app } = await createTestApp();

    const response = await app.request('/api/chat', {
      method: 'OPTIONS',
      headers: {
        origin: 'http://localhost:8081',
        'access-control-request-method': 'POST',
      },
    });

    expect(response.status).toBe(204);
    expect(response.headers.get('access-control-allow-methods')).toContain('POST');
  });
});
