import express from 'express';
import { randomBytes } from 'crypto';
import open from 'open';
import { TokenManager } from './auth.js';
import { OAuthConfig } from '../types/auth.js';
import { AuthExchangeFailedError } from '../types/errors.js';

export const SMARTTHINGS_AUTHORIZE_URL = 'https://api.smartthings.com/oauth/authorize';

export interface AuthorizeOptions {
  openBrowser?: (url: string) => Promise<unknown>;
  log?: (line: string) => void;
  timeoutMs?: number;
}

export function buildAuthorizeUrl(config: OAuthConfig, state: string): string {
  const params = new URLSearchParams({
    client_id: config.clientId,
    response_type: 'code',
    redirect_uri: config.redirectUri,
    scope: config.scope,
    state,
  });
  return `${SMARTTHINGS_AUTHORIZE_URL}?${params.toString()}`;
}

/**
 * Opens the consent page and waits for SmartThings to redirect back to the
 * local callback server with an authorization code.
 */
export function getAuthorizationCode(config: OAuthConfig, options: AuthorizeOptions = {}): Promise<string> {
  const log = options.log ?? console.log;
  const openBrowser = options.openBrowser ?? open;
  const state = randomBytes(16).toString('hex');
  const redirect = new URL(config.redirectUri);
  const port = Number(redirect.port || (redirect.protocol === 'https:' ? 443 : 80));

  return new Promise((resolve, reject) => {
    const app = express();
    const server = app.listen(port);
    const timer = setTimeout(() => {
      server.close();
      reject(new AuthExchangeFailedError('Timed out waiting for the authorization callback'));
    }, options.timeoutMs ?? 5 * 60 * 1000);

    const finish = (error: Error | null, code?: string) => {
      clearTimeout(timer);
      server.close();
      if (error) {
        reject(error);
      } else if (code) {
        resolve(code);
      }
    };

    server.on('error', (error) => finish(error));

    app.get(redirect.pathname, (req, res) => {
      const { code, state: returnedState, error } = req.query;
      res.set('Connection', 'close');

      if (error) {
        res.send('Authentication failed: ' + String(error));
        finish(new AuthExchangeFailedError('Authentication failed: ' + String(error)));
        return;
      }

      if (returnedState !== state) {
        res.status(400).send('Invalid state parameter');
        finish(new AuthExchangeFailedError('Invalid state parameter'));
        return;
      }

      if (typeof code !== 'string' || code.length === 0) {
        res.status(400).send('Missing authorization code');
        finish(new AuthExchangeFailedError('Missing authorization code'));
        return;
      }

      res.send('Authentication successful! You can close this window.');
      finish(null, code);
    });

    const authUrl = buildAuthorizeUrl(config, state);
    log('Opening browser for authentication...');
    log('If the browser does not open automatically, please visit:');
    log(authUrl);

    openBrowser(authUrl).catch((error: unknown) => {
      log(`⚠️ Could not open a browser: ${error instanceof Error ? error.message : String(error)}`);
    });
  });
}

export async function authorize(
  manager: TokenManager,
  config: OAuthConfig,
  options: AuthorizeOptions = {}
): Promise<void> {
  const code = await getAuthorizationCode(config, options);
  await manager.exchangeCode(code, config.redirectUri);
}
