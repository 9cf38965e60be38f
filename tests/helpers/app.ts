/**
 * Hono app wired to the in-memory harness
 */

import type { Hono } from 'hono';
import { createApp } from '../../src/api/app.js';
import { silentLogger } from '../../src/lib/logger.js';
import type { PushRequest, PushVerifier } from '../../src/services/google/push-verifier.js';
import { AuthRejectedError } from '../../src/lib/errors.js';
import { createHarness } from './harness.js';
import type { Harness } from './harness.js';
import type { SyncServiceSettings } from '../../src/sync/service.js';

export class TokenVerifier implements PushVerifier {
  requests: PushRequest[] = [];

  constructor(private readonly expected: string | null = null) {}

  async verify(request: PushRequest): Promise<void> {
    this.requests.push(request);
    if (this.expected !== null && request.token !== this.expected) {
      throw new AuthRejectedError('Push verification token mismatch');
    }
  }
}

export interface TestApp extends Harness {
  app: Hono;
  verifier: TokenVerifier;
}

export async function createTestApp(
  options: { adminToken?: string; pushToken?: string; settings?: Partial<SyncServiceSettings> } = {}
): Promise<TestApp> {
  const harness = await createHarness({ settings: options.settings });
  const verifier = new TokenVerifier(options.pushToken ?? null);
  const app = createApp({
    service: harness.service,
    verifier,
    adminToken: options.adminToken ?? 'test-admin-token',
    logger: silentLogger,
  });
  return { ...harness, app, verifier };
}

export function pushBody(payload: unknown): string {
  return JSON.stringify({
    message: { data: Buffer.from(JSON.stringify(payload)).toString('base64'), messageId: 'pubsub-1' },
    subscription: 'projects/example/subscriptions/gmail-push',
  });
}
