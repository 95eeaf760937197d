import { fetch, type Response } from 'undici';
import { z } from 'zod';
import { TokenRefreshError } from './errors';
import { HelixError } from './twitch';
import type { CachedToken } from './types';

const TOKEN_URL = 'https://id.twitch.tv/oauth2/token';
export const REFRESH_MARGIN_SECONDS = 300;

const appTokenSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number()
});

type AppTokenRequest = {
  clientId: string;
  clientSecret: string;
  timeoutMs?: number;
};

type AppTokenResult = {
  accessToken: string;
  expiresIn: number;
};

export async function requestAppToken({ clientId, clientSecret, timeoutMs }: AppTokenRequest): Promise<AppTokenResult> {
  let res: Response;
  try {
    res = await fetch(TOKEN_URL, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        client_id: clientId,
        client_secret: clientSecret,
        grant_type: 'client_credentials'
      }),
      signal: timeoutMs ? AbortSignal.timeout(timeoutMs) : undefined
    });
  } catch (error) {
    throw new TokenRefreshError('App token request failed', { cause: error });
  }

  if (!res.ok) {
    const text = await res.text();
    throw new TokenRefreshError(`App token request failed ${res.status}: ${text}`, {
      cause: new HelixError(res.status, text)
    });
  }

  const parsed = appTokenSchema.safeParse(await res.json().catch(() => null));
  if (!parsed.success) {
    throw new TokenRefreshError('App token response is malformed', { cause: parsed.error });
  }

  return {
    accessToken: parsed.data.access_token,
    expiresIn: parsed.data.expires_in
  };
}

export type AppTokenCacheOptions = AppTokenRequest & {
  now?: () => number;
};

export type AppTokenCache = {
  ensureValid(): Promise<void>;
  getToken(): string;
  validToken(): Promise<string>;
  invalidate(): void;
};

export function createAppTokenCache(options: AppTokenCacheOptions): AppTokenCache {
  const now = options.now ?? Date.now;
  let cached: CachedToken | null = null;
  let inflight: Promise<void> | null = null;

  const isValid = (token: CachedToken | null): token is CachedToken => !!token && now() < token.expiresAt;

  const refresh = async () => {
    const result = await requestAppToken(options);
    cached = {
      value: result.accessToken,
      expiresAt: now() + (result.expiresIn - REFRESH_MARGIN_SECONDS) * 1000
    };
  };

  const ensureValid = async () => {
    if (isValid(cached)) return;

    // one refresh at a time; late callers wait on the same request
    if (!inflight) {
      inflight = refresh().finally(() => {
        inflight = null;
      });
    }
    await inflight;
  };

  const getToken = () => {
    if (!cached) {
      throw new TokenRefreshError('No app token has been fetched yet');
    }
    return cached.value;
  };

  return {
    ensureValid,
    getToken,
    async validToken() {
      await ensureValid();
      return getToken();
    },
    invalidate() {
      cached = null;
    }
  };
}
