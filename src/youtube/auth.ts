/**
 * OAuth for the YouTube Data API.
 *
 * Credentials are an explicit object: tokens are loaded from a TokenStore when
 * the client is built and written back whenever google-auth-library refreshes
 * them. With no stored token, a one-off loopback consent flow runs in the
 * browser.
 */

import { randomBytes } from 'crypto';
import { existsSync } from 'fs';
import { readFile, writeFile } from 'fs/promises';
import type { Server } from 'http';
import express from 'express';
import { OAuth2Client, type Credentials } from 'google-auth-library';
import open from 'open';

import { AuthError } from '../errors.js';
import { logger } from '../logger.js';
import { toYouTubeError } from './client.js';

export const YOUTUBE_SCOPES = ['https://www.googleapis.com/auth/youtube'];

const CALLBACK_PATH = '/oauth2callback';
const CONSENT_TIMEOUT_MS = 5 * 60 * 1000;

export interface ClientSecrets {
  clientId: string;
  clientSecret: string;
}

export interface TokenStore {
  load(): Promise<Credentials | null>;
  save(credentials: Credentials): Promise<void>;
}

export interface AuthorizeOptions {
  clientSecretFile: string;
  tokenStore: TokenStore;
  /** Loopback port for the consent redirect, 0 picks a free one */
  port?: number;
  openBrowser?: (url: string) => Promise<unknown>;
  onAuthUrl?: (url: string) => void;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

const readString = (record: Record<string, unknown>, key: string): string | undefined => {
  const value = record[key];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
};

/**
 * Token JSON on disk. A corrupt file is treated as "no token".
 */
export class FileTokenStore implements TokenStore {
  constructor(private readonly filePath: string) {}

  async load(): Promise<Credentials | null> {
    if (!existsSync(this.filePath)) {
      return null;
    }

    try {
      const parsed: unknown = JSON.parse(await readFile(this.filePath, 'utf8'));
      if (!isRecord(parsed)) {
        throw new Error('token file is not a JSON object');
      }

      const credentials: Credentials = {};
      const accessToken = readString(parsed, 'access_token');
      const refreshToken = readString(parsed, 'refresh_token');
      if (accessToken) credentials.access_token = accessToken;
      if (refreshToken) credentials.refresh_token = refreshToken;
      if (typeof parsed.expiry_date === 'number') credentials.expiry_date = parsed.expiry_date;
      const scope = readString(parsed, 'scope');
      if (scope) credentials.scope = scope;
      const tokenType = readString(parsed, 'token_type');
      if (tokenType) credentials.token_type = tokenType;

      if (!credentials.access_token && !credentials.refresh_token) {
        throw new Error('token file holds no access or refresh token');
      }
      return credentials;
    } catch (error) {
      logger.warn({ path: this.filePath, err: error }, 'stored youtube token unreadable, re-authorization needed');
      return null;
    }
  }

  async save(credentials: Credentials): Promise<void> {
    await writeFile(this.filePath, JSON.stringify(credentials, null, 2), { encoding: 'utf8', mode: 0o600 });
    logger.debug({ path: this.filePath }, 'saved youtube token');
  }
}

/**
 * Read the OAuth client JSON downloaded from Google Cloud Console
 * (either the "installed" or the "web" flavour).
 */
export const loadClientSecrets = async (filePath: string): Promise<ClientSecrets> => {
  if (!existsSync(filePath)) {
    throw new AuthError(
      'youtube',
      `Google OAuth client secret file not found: ${filePath}. Download it from Google Cloud Console (APIs & Services > Credentials).`
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(filePath, 'utf8'));
  } catch (error) {
    throw new AuthError('youtube', `Google OAuth client secret file is not valid JSON: ${filePath}`, { cause: error });
  }

  const section = isRecord(parsed) ? (parsed.installed ?? parsed.web) : undefined;
  const clientId = isRecord(section) ? readString(section, 'client_id') : undefined;
  const clientSecret = isRecord(section) ? readString(section, 'client_secret') : undefined;

  if (!clientId || !clientSecret) {
    throw new AuthError('youtube', `Google OAuth client secret file is missing client_id or client_secret: ${filePath}`);
  }

  return { clientId, clientSecret };
};

/**
 * Write refreshed tokens back to the store. The token endpoint omits the
 * refresh token on refresh, so the known one is carried over.
 */
export const persistTokenRefreshes = (client: OAuth2Client, store: TokenStore): void => {
  client.on('tokens', (tokens: Credentials) => {
    const merged: Credentials = {
      ...client.credentials,
      ...tokens,
      refresh_token: tokens.refresh_token ?? client.credentials.refresh_token
    };
    store.save(merged).catch(error => {
      logger.error({ err: error }, 'failed to persist refreshed youtube token');
    });
  });
};

const listen = (app: express.Express, port: number): Promise<Server> =>
  new Promise((resolve, reject) => {
    const server = app.listen(port, '127.0.0.1', () => resolve(server));
    server.once('error', reject);
  });

const closeServer = (server: Server): Promise<void> =>
  new Promise((resolve, reject) => {
    server.close(error => (error ? reject(error) : resolve()));
  });

/**
 * Browser consent on a loopback redirect; resolves with the exchanged tokens
 */
export const runConsentFlow = async (
  secrets: ClientSecrets,
  options: Pick<AuthorizeOptions, 'port' | 'openBrowser' | 'onAuthUrl'> = {}
): Promise<{ client: OAuth2Client; tokens: Credentials }> => {
  const app = express();
  const server = await listen(app, options.port ?? 0);

  try {
    const address = server.address();
    const port = typeof address === 'object' && address !== null ? address.port : options.port ?? 0;
    const redirectUri = `http://127.0.0.1:${port}${CALLBACK_PATH}`;
    const client = new OAuth2Client(secrets.clientId, secrets.clientSecret, redirectUri);
    const state = randomBytes(16).toString('hex');

    const code = await new Promise<string>((resolve, reject) => {
      const timer = setTimeout(
        () => reject(new AuthError('youtube', 'Timed out waiting for YouTube authorization in the browser')),
        CONSENT_TIMEOUT_MS
      );

      app.get(CALLBACK_PATH, (req, res) => {
        const error = typeof req.query.error === 'string' ? req.query.error : undefined;
        const receivedCode = typeof req.query.code === 'string' ? req.query.code : undefined;

        if (req.query.state !== state) {
          res.status(400).send('State mismatch. Start the authorization again.');
          return;
        }
        clearTimeout(timer);
        if (error || !receivedCode) {
          res.status(400).send('Authorization was not granted. You can close this tab.');
          reject(new AuthError('youtube', `YouTube authorization failed: ${error ?? 'missing code'}`));
          return;
        }
        res.send('Authorization complete. You can close this tab and return to the terminal.');
        resolve(receivedCode);
      });

      const authUrl = client.generateAuthUrl({
        access_type: 'offline',
        prompt: 'consent',
        scope: YOUTUBE_SCOPES,
        state
      });
      options.onAuthUrl?.(authUrl);
      const openBrowser = options.openBrowser ?? open;
      openBrowser(authUrl).catch(openError => {
        logger.warn({ err: openError }, 'could not open browser, visit the authorization URL manually');
      });
    });

    const { tokens } = await client.getToken(code);
    client.setCredentials(tokens);
    logger.info('youtube authorization granted');
    return { client, tokens };
  } finally {
    await closeServer(server);
  }
};

/**
 * Build an authorized OAuth2 client: reuse the stored token while it is valid
 * or refreshable, otherwise run the consent flow and store the result.
 */
export const authorizeYouTube = async (options: AuthorizeOptions): Promise<OAuth2Client> => {
  const secrets = await loadClientSecrets(options.clientSecretFile);
  const stored = await options.tokenStore.load();

  if (stored) {
    const client = new OAuth2Client(secrets.clientId, secrets.clientSecret);
    client.setCredentials(stored);
    persistTokenRefreshes(client, options.tokenStore);

    // Refreshes an expired token now rather than on the first API call
    try {
      await client.getAccessToken();
      logger.debug({ hasRefreshToken: Boolean(stored.refresh_token) }, 'using stored youtube token');
      return client;
    } catch (error) {
      const mapped = toYouTubeError(error, 'refreshing the stored token');
      if (!(mapped instanceof AuthError)) {
        throw mapped;
      }
      logger.warn({ err: error }, 'stored youtube token is no longer valid, authorizing again');
    }
  }

  const { client, tokens } = await runConsentFlow(secrets, options);
  await options.tokenStore.save(tokens);
  persistTokenRefreshes(client, options.tokenStore);
  return client;
};
