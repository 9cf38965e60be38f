// Origin checks for Pub/Sub push deliveries
import { OAuth2Client } from 'google-auth-library';
import { AuthRejectedError, errorMessage } from '../../lib/errors.js';

export interface PushRequest {
  authorization?: string;
  /** `token` query parameter, when the push subscription URL carries one */
  token?: string;
}

export interface PushVerifier {
  /** Throws AuthRejectedError when the request did not come from the expected transport */
  verify(request: PushRequest): Promise<void>;
}

export interface IdTokenPayload {
  email?: string;
  email_verified?: boolean;
  aud?: string | string[];
}

export type IdTokenVerifier = (idToken: string, audience: string) => Promise<IdTokenPayload | undefined>;

export interface PubSubPushVerifierOptions {
  audience?: string;
  serviceAccountEmail?: string;
  verificationToken?: string;
  verifyIdToken?: IdTokenVerifier;
}

export function googleIdTokenVerifier(client = new OAuth2Client()): IdTokenVerifier {
  return async (idToken, audience) => {
    const ticket = await client.verifyIdToken({ idToken, audience });
    return ticket.getPayload();
  };
}

/**
 * Verifies the shared `token` query parameter and/or the OIDC bearer token
 * Pub/Sub attaches to authenticated push subscriptions. With neither
 * configured every request is accepted.
 */
export class PubSubPushVerifier implements PushVerifier {
  private readonly verifyIdToken: IdTokenVerifier;

  constructor(private readonly options: PubSubPushVerifierOptions) {
    this.verifyIdToken = options.verifyIdToken ?? googleIdTokenVerifier();
  }

  async verify(request: PushRequest): Promise<void> {
    const { verificationToken, audience, serviceAccountEmail } = this.options;

    if (verificationToken && request.token !== verificationToken) {
      throw new AuthRejectedError('Push verification token mismatch');
    }

    if (!audience) {
      return;
    }

    const header = request.authorization ?? '';
    if (!header.startsWith('Bearer ')) {
      throw new AuthRejectedError('Missing push bearer token');
    }

    let payload: IdTokenPayload | undefined;
    try {
      payload = await this.verifyIdToken(header.slice('Bearer '.length), audience);
    } catch (error) {
      throw new AuthRejectedError(`Invalid push token: ${errorMessage(error)}`, { cause: error });
    }

    if (!payload) {
      throw new AuthRejectedError('Push token has no payload');
    }

    if (serviceAccountEmail && (payload.email !== serviceAccountEmail || payload.email_verified !== true)) {
      throw new AuthRejectedError('Push token issued to an unexpected service account');
    }
  }
}
