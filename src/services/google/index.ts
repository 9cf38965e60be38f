// Google service exports
export { createAuthorizedClient, loadCredentials, loadToken, SCOPES } from './auth.js';
export { GmailMailbox, collectAttachmentParts, getHeader } from './gmail-mailbox.js';
export { DriveStorage } from './drive-storage.js';
export { PubSubPushVerifier, googleIdTokenVerifier } from './push-verifier.js';
export type { PushVerifier, PushRequest } from './push-verifier.js';
