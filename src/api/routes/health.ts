import { Hono } from 'hono';

export const healthRoutes = new Hono();

// GET /healthz - Liveness check (no auth required)
healthRoutes.get('/', (c) => {
  return c.json({ ok: true });
});
