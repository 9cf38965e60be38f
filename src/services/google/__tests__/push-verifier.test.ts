import { describe, expect, test, vi } from 'vitest';
import { AuthRejectedError } from '../../../lib/errors.js';
import { PubSubPushVerifier } from '../push-verifier.js';
import type { IdTokenVerifier } from '../push-verifier.js';

const AUDIENCE = 'https://invoices.example.com/pubsub/push';
const SERVICE_ACCOUNT = 'pubsub-push@example.iam.gserviceaccount.com';

describe('PubSubPushVerifier', () => {
  test('accepts everything when nothing is configured', async () => {
    await expect(new PubSubPushVerifier({ verifyIdToken: vi.fn() }).verify({})).resolves.toBeUndefined();
  });

  test('checks the shared token query parameter', async () => {
    const verifier = new PubSubPushVerifier({ verificationToken: 'test-secret', verifyIdToken: vi.fn() });

    await expect(verifier.verify({ token: 'test-secret' })).resolves.toBeUndefined();
    await expect(verifier.verify({ token: 'wrong' })).rejects.toBeInstanceOf(AuthRejectedError);
    await expect(verifier.verify({})).rejects.toThrow('Push verification token mismatch');
  });

  test('verifies the bearer token for the configured audience', async () => {
    const verifyIdToken = vi.fn<IdTokenVerifier>().mockResolvedValue({ email: SERVICE_ACCOUNT, email_verified: true });
    const verifier = new PubSubPushVerifier({ audience: AUDIENCE, serviceAccountEmail: SERVICE_ACCOUNT, verifyIdToken });

    await verifier.verify({ authorization: 'Bearer test-token' });

    expect(verifyIdToken).toHaveBeenCalledWith('test-token', AUDIENCE);
  });

  test('rejects a missing bearer token', async () => {
    const verifier = new PubSubPushVerifier({ audience: AUDIENCE, verifyIdToken: vi.fn() });
    await expect(verifier.verify({ authorization: 'Basic abc' })).rejects.toThrow('Missing push bearer token');
  });

  test('rejects a token that fails verification', async () => {
    const verifyIdToken = vi.fn<IdTokenVerifier>().mockRejectedValue(new Error('Wrong recipient'));
    const verifier = new PubSubPushVerifier({ audience: AUDIENCE, verifyIdToken });

    await expect(verifier.verify({ authorization: 'Bearer test-token' })).rejects.toThrow(
      'Invalid push token: Wrong recipient'
    );
  });

  test('rejects a token issued to another or unverified account', async () => {
    const verifyIdToken = vi
      .fn<IdTokenVerifier>()
      .mockResolvedValueOnce({ email: 'someone@example.com', email_verified: true })
      .mockResolvedValueOnce({ email: SERVICE_ACCOUNT, email_verified: false });
    const verifier = new PubSubPushVerifier({ audience: AUDIENCE, serviceAccountEmail: SERVICE_ACCOUNT, verifyIdToken });

    await expect(verifier.verify({ authorization: 'Bearer a' })).rejects.toBeInstanceOf(AuthRejectedError);
    await expect(verifier.verify({ authorization: 'Bearer b' })).rejects.toBeInstanceOf(AuthRejectedError);
  });
});
