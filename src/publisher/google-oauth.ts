// Google OAuth credentials for Blogger
// Loads an authorized-user token and refreshes it non-interactively

import fs from 'fs';
import axios from 'axios';
import { z } from 'zod';
import configManager from '../shared/config';
import logger from '../shared/logger';
import { BloggerError, safeErrorMessage } from '../shared/errors';

export const BLOGGER_SCOPE = 'https://www.googleapis.com/auth/blogger';
const DEFAULT_TOKEN_URI = 'https://oauth2.googleapis.com/token';
// Refresh slightly before the real expiry
const EXPIRY_SKEW_MS = 60_000;

const authorizedUserSchema = z.object({
  token: z.string().optional(),
  access_token: z.string().optional(),
  refresh_token: z.string().optional(),
  token_uri: z.string().optional(),
  client_id: z.string().optional(),
  client_secret: z.string().optional(),
  scopes: z.array(z.string()).optional(),
  expiry: z.string().optional(),
});

export type AuthorizedUser = z.infer<typeof authorizedUserSchema>;

interface TokenResponse {
  access_token: string;
  expires_in?: number;
}

export function parseAuthorizedUser(json: string): AuthorizedUser | null {
  try {
    const result = authorizedUserSchema.safeParse(JSON.parse(json));
    return result.success ? result.data : null;
  } catch {
    return null;
  }
}

export function isTokenExpired(user: AuthorizedUser, now: number = Date.now()): boolean {
  const accessToken = user.token || user.access_token;
  if (!accessToken) return true;
  if (!user.expiry) return false;
  const expiresAt = Date.parse(user.expiry);
  return Number.isNaN(expiresAt) || expiresAt - EXPIRY_SKEW_MS <= now;
}

export class GoogleOAuth {
  private cached: AuthorizedUser | null = null;

  /**
   * Env JSON wins; the token file is only consulted outside CI.
   */
  loadCredentials(): AuthorizedUser | null {
    const config = configManager.getSection('blogger');

    if (config.tokenJson) {
      const fromEnv = parseAuthorizedUser(config.tokenJson);
      if (!fromEnv) {
        logger.error('[GoogleOAuth] GOOGLE_OAUTH_TOKEN_JSON is not valid token JSON');
      }
      return fromEnv;
    }

    if (!config.isCI && fs.existsSync(config.tokenFile)) {
      const fromFile = parseAuthorizedUser(fs.readFileSync(config.tokenFile, 'utf8'));
      if (!fromFile) {
        logger.error(`[GoogleOAuth] Could not parse ${config.tokenFile}`);
      }
      return fromFile;
    }

    logger.error('[GoogleOAuth] No Blogger credentials found (set GOOGLE_OAUTH_TOKEN_JSON or provide a token file)');
    return null;
  }

  /**
   * A valid access token, refreshing when needed. Null when credentials are missing or refresh fails.
   */
  async getAccessToken(): Promise<string | null> {
    const user = this.cached ?? this.loadCredentials();
    if (!user) return null;

    if (!isTokenExpired(user)) {
      this.cached = user;
      return user.token || user.access_token || null;
    }

    if (!user.refresh_token || !user.client_id || !user.client_secret) {
      logger.error('[GoogleOAuth] Token expired and no refresh credentials are available');
      return null;
    }

    try {
      const refreshed = await this.refresh(user);
      this.cached = refreshed;
      this.persist(refreshed);
      return refreshed.token || null;
    } catch (error) {
      logger.error(`[GoogleOAuth] Token refresh failed: ${safeErrorMessage(error)}`);
      return null;
    }
  }

  private async refresh(user: AuthorizedUser): Promise<AuthorizedUser> {
    logger.info('[GoogleOAuth] Refreshing Blogger access token');
    const body = new URLSearchParams({
      client_id: user.client_id ?? '',
      client_secret: user.client_secret ?? '',
      refresh_token: user.refresh_token ?? '',
      grant_type: 'refresh_token',
    });

    const response = await axios.post<TokenResponse>(user.token_uri || DEFAULT_TOKEN_URI, body.toString(), {
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      timeout: 20000,
    });

    if (!response.data?.access_token) {
      throw new BloggerError('Token endpoint returned no access_token', 'REFRESH_FAILED');
    }

    const expiresIn = response.data.expires_in ?? 3600;
    return {
      ...user,
      token: response.data.access_token,
      expiry: new Date(Date.now() + expiresIn * 1000).toISOString(),
      scopes: user.scopes ?? [BLOGGER_SCOPE],
    };
  }

  private persist(user: AuthorizedUser): void {
    const config = configManager.getSection('blogger');
    if (config.isCI || config.tokenJson) return;

    try {
      fs.writeFileSync(config.tokenFile, JSON.stringify(user, null, 2));
      logger.info(`[GoogleOAuth] Saved refreshed token to ${config.tokenFile}`);
    } catch (error) {
      logger.warn(`[GoogleOAuth] Could not save refreshed token: ${safeErrorMessage(error)}`);
    }
  }
}

const googleOAuth = new GoogleOAuth();
export default googleOAuth;
