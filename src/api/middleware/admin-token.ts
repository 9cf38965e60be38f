import { createMiddleware } from 'hono/factory';

export const ADMIN_TOKEN_HEADER = 'X-Admin-Token';

/**
 * Shared-secret check for operator endpoints.
 * With no token configured the admin routes are open (trusted network only).
 */
export function adminToken(expected: string) {
  return createMiddleware(async (c, next) => {
    if (!expected) {
      return next();
    }

    if (c.req.header(ADMIN_TOKEN_HEADER) !== expected) {
      return c.json({ detail: 'Unauthorized' }, 401);
    }

    return next();
  });
}
