import { Hono } from 'hono';
import { z } from 'zod';
import type { SyncService } from '../../sync/service.js';
import type { WatchState } from '../../shared/types/sync.js';

const fullSyncQuery = z.object({
  max_cycles: z.coerce.number().int().positive().optional(),
});

const processedQuery = z.object({
  limit: z.coerce.number().int().positive().max(1000).default(100),
});

function serializeWatch(state: WatchState) {
  return {
    mailbox: state.mailbox,
    historyCursor: state.historyCursor,
    watchExpiry: state.watchExpiry ? state.watchExpiry.toISOString() : null,
    labelFilter: state.labelFilter,
    updatedAt: state.updatedAt ? state.updatedAt.toISOString() : null,
  };
}

export function adminRoutes(service: SyncService) {
  const routes = new Hono();

  // POST /admin/start-watch - Create or renew the Gmail watch
  routes.post('/start-watch', async (c) => {
    const result = await service.startWatch();
    if ('skipped' in result) {
      return c.json({ ok: true, ...result });
    }

    return c.json({
      ok: true,
      watch: serializeWatch(result.watch),
      cursorBefore: result.cursorBefore,
      cursorAfter: result.cursorAfter,
      expiry: result.expiry,
      ...(result.sync ? { sync: result.sync } : {}),
    });
  });

  // POST /admin/full-sync?max_cycles=N - Cursor-independent backstop
  routes.post('/full-sync', async (c) => {
    const parsed = fullSyncQuery.safeParse({ max_cycles: c.req.query('max_cycles') });
    if (!parsed.success) {
      return c.json({ detail: 'max_cycles must be a positive integer' }, 400);
    }

    const result = await service.fullSync(parsed.data.max_cycles ?? service.defaultMaxCycles);
    return c.json({ ok: true, ...result });
  });

  // GET /admin/state - Stored cursor and watch expiry
  routes.get('/state', async (c) => {
    const state = await service.readState();
    return c.json({ ok: true, state: state ? serializeWatch(state) : null });
  });

  // POST /admin/reset-state - Forget the cursor; the next push bootstraps
  routes.post('/reset-state', async (c) => {
    const result = await service.resetState();
    return c.json({ ok: true, ...result });
  });

  // GET /admin/processed?limit=N - Local processed-message index
  routes.get('/processed', async (c) => {
    const parsed = processedQuery.safeParse({ limit: c.req.query('limit') });
    if (!parsed.success) {
      return c.json({ detail: 'limit must be an integer between 1 and 1000' }, 400);
    }

    const records = await service.listProcessed(parsed.data.limit);
    return c.json({
      ok: true,
      messages: records.map((record) => ({ ...record, processedAt: record.processedAt.toISOString() })),
    });
  });

  return routes;
}
