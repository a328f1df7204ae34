import type { Credentials } from '../types.js';
import { AuthError, HttpError } from '../types.js';
import type { HttpClient } from './http-client.js';
import type { Logger } from '../logger.js';

interface CachedToken {
  readonly accessToken: string;
  readonly expiresAtMs: number;
}

const REFRESH_BUFFER_S = 60;
const DEFAULT_EXPIRES_IN_S = 300;
const TOKEN_SCOPE = 'offline_access openid';

function isRecord(val: unknown): val is Record<string, unknown> {
  return typeof val === 'object' && val !== null && !Array.isArray(val);
}

/**
 * Exchanges the long-lived offline token for short-lived access tokens
 * (OAuth2 `refresh_token` grant) and caches them until shortly before expiry.
 */
export function createTokenManager(
  httpClient: HttpClient,
  tokenUrl: string,
  credentials: Credentials,
  logger: Logger,
  now: () => number = Date.now,
): {
  readonly get: () => Promise<string>;
  readonly invalidate: () => void;
} {
  let cached: CachedToken | null = null;
  let refreshInFlight: Promise<string> | null = null;

  async function requestToken(): Promise<{ accessToken: string; expiresIn: number }> {
    logger.info('Requesting access token');

    let body: unknown;
    try {
      const response = await httpClient.postForm(tokenUrl, {
        client_id: credentials.clientId,
        client_secret: credentials.clientSecret,
        grant_type: 'refresh_token',
        refresh_token: credentials.offlineToken,
        scope: TOKEN_SCOPE,
      });
      body = response.body;
    } catch (err) {
      const detail = err instanceof HttpError ? `HTTP ${err.status}` : err instanceof Error ? err.message : String(err);
      throw new AuthError(`Failed to refresh token: ${detail}`, err);
    }

    const fields: Record<string, unknown> = isRecord(body) ? body : {};
    const accessToken = fields['access_token'];
    if (typeof accessToken !== 'string' || accessToken === '') {
      throw new AuthError('No access_token in token response');
    }

    const expiresIn = fields['expires_in'];
    return {
      accessToken,
      expiresIn: typeof expiresIn === 'number' && Number.isFinite(expiresIn) ? expiresIn : DEFAULT_EXPIRES_IN_S,
    };
  }

  async function get(): Promise<string> {
    const startedAt = now();

    // Return cached if still valid
    if (cached && startedAt < cached.expiresAtMs) {
      return cached.accessToken;
    }

    // Deduplicate concurrent refresh requests
    if (refreshInFlight) {
      return refreshInFlight;
    }

    refreshInFlight = requestToken().then(({ accessToken, expiresIn }) => {
      const expiresAtMs = startedAt + Math.max(0, expiresIn - REFRESH_BUFFER_S) * 1000;
      cached = { accessToken, expiresAtMs };
      logger.info({ expiresIn }, 'Access token acquired');
      return accessToken;
    }).finally(() => {
      refreshInFlight = null;
    });

    return refreshInFlight;
  }

  function invalidate(): void {
    cached = null;
  }

  return { get, invalidate };
}

export type TokenManager = ReturnType<typeof createTokenManager>;
