// Google OAuth 2.0 credential loading for the Gmail and Drive clients
import { google } from 'googleapis';
import type { OAuth2Client, Credentials } from 'google-auth-library';
import { readFileSync, writeFileSync, existsSync } from 'fs';
import type { Logger } from '../../lib/logger.js';
import { silentLogger } from '../../lib/logger.js';

export const SCOPES = [
  'https://www.googleapis.com/auth/gmail.modify',
  'https://www.googleapis.com/auth/drive',
];

interface ClientKeys {
  client_id: string;
  client_secret: string;
  redirect_uris?: string[];
}

export interface GoogleCredentials {
  installed?: ClientKeys;
  web?: ClientKeys;
}

export interface TokenData {
  access_token?: string;
  refresh_token?: string;
  scope?: string;
  token_type?: string;
  expiry_date?: number;
}

function readJson(path: string): unknown {
  return JSON.parse(readFileSync(path, 'utf-8'));
}

function isClientKeys(value: unknown): value is ClientKeys {
  return (
    typeof value === 'object' &&
    value !== null &&
    'client_id' in value &&
    typeof value.client_id === 'string' &&
    'client_secret' in value &&
    typeof value.client_secret === 'string'
  );
}

/**
 * Load OAuth client credentials (the JSON downloaded from the Cloud console)
 */
export function loadCredentials(credentialsPath: string): GoogleCredentials {
  if (!existsSync(credentialsPath)) {
    throw new Error(`Google OAuth credentials not found at ${credentialsPath}`);
  }

  const raw = readJson(credentialsPath);
  if (typeof raw !== 'object' || raw === null) {
    throw new Error(`Invalid credentials file: ${credentialsPath}`);
  }

  const installed = 'installed' in raw && isClientKeys(raw.installed) ? raw.installed : undefined;
  const web = 'web' in raw && isClientKeys(raw.web) ? raw.web : undefined;
  if (!installed && !web) {
    throw new Error('Invalid credentials format: missing installed or web keys');
  }

  return { installed, web };
}

/**
 * Load token from file if it exists
 */
export function loadToken(tokenPath: string): TokenData | null {
  if (!existsSync(tokenPath)) {
    return null;
  }

  const raw = readJson(tokenPath);
  if (typeof raw !== 'object' || raw === null) {
    return null;
  }

  const field = (name: string): unknown => (name in raw ? Reflect.get(raw, name) : undefined);
  const str = (name: string) => {
    const value = field(name);
    return typeof value === 'string' ? value : undefined;
  };
  const expiry = field('expiry_date');

  return {
    access_token: str('access_token'),
    refresh_token: str('refresh_token'),
    scope: str('scope'),
    token_type: str('token_type'),
    expiry_date: typeof expiry === 'number' ? expiry : undefined,
  };
}

export function saveToken(tokenPath: string, token: TokenData): void {
  writeFileSync(tokenPath, JSON.stringify(token, null, 2));
}

function mergeTokens(previous: TokenData, next: Credentials): TokenData {
  return {
    access_token: next.access_token ?? previous.access_token,
    // Google only returns a refresh token on first consent
    refresh_token: next.refresh_token ?? previous.refresh_token,
    scope: next.scope ?? previous.scope,
    token_type: next.token_type ?? previous.token_type,
    expiry_date: next.expiry_date ?? previous.expiry_date,
  };
}

/**
 * Build an OAuth2 client from stored credentials and token. The client
 * refreshes its access token on demand; refreshed tokens are written back
 * to `tokenPath`. Obtaining the initial token (consent) happens elsewhere.
 */
export function createAuthorizedClient(
  credentialsPath: string,
  tokenPath: string,
  logger: Logger = silentLogger
): OAuth2Client {
  const credentials = loadCredentials(credentialsPath);
  const keys = credentials.installed ?? credentials.web;
  if (!keys) {
    throw new Error('Invalid credentials format: missing installed or web keys');
  }

  const token = loadToken(tokenPath);
  if (!token?.refresh_token && !token?.access_token) {
    throw new Error(`No stored OAuth token at ${tokenPath}; authorize the account first`);
  }

  const client = new google.auth.OAuth2(keys.client_id, keys.client_secret, keys.redirect_uris?.[0]);
  client.setCredentials(token);

  let current = token;
  client.on('tokens', (tokens) => {
    current = mergeTokens(current, tokens);
    try {
      saveToken(tokenPath, current);
      logger.info({ tokenPath }, 'OAuth token refreshed and saved');
    } catch (error) {
      // The refreshed token stays usable in memory
      logger.warn({ tokenPath, err: error }, 'Could not persist refreshed OAuth token');
    }
  });

  return client;
}
