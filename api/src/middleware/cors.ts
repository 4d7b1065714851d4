/**
 * CORS Middleware
 *
 * The web page is served from its own origin and the mobile app sends no
 * Origin header at all, so:
 * - no origin: wildcard, no credentials
 * - known origin (local dev servers, CORS_ORIGIN): echoed back
 * - unknown origin: rejected (no Access-Control-Allow-Origin)
 */

import { cors } from 'hono/cors';
import type { MiddlewareHandler } from 'hono';

const DEV_ORIGINS = [
  'http://localhost:5173', // Vite dev server
  'http://localhost:3000', // API dev server
  'http://localhost:8081', // Expo dev server
];

export function allowedOrigins(corsOrigin?: string): string[] {
  const configured = (corsOrigin ?? '')
    .split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);
  return [...DEV_ORIGINS, ...configured];
}

export function createCorsMiddleware(corsOrigin?: string): MiddlewareHandler {
  const origins = allowedOrigins(corsOrigin);

  return cors({
    origin: (origin) => {
      if (!origin) return '*';
      return origins.includes(origin) ? origin : null;
    },
    allowMethods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowHeaders: ['Content-Type', 'X-Request-ID'],
    exposeHeaders: ['Content-Length', 'X-Request-ID', 'Retry-After'],
    maxAge: 86400, // 24 hours
  });
}
