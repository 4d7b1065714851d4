/**
 * Hono Type Extensions
 *
 * Custom types for Hono context variables
 */

export type HonoEnv = {
  Variables: {
    /** Set by the request logger; echoed as X-Request-ID. */
    requestId: string;
  };
};
