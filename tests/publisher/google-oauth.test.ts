/**
 * Google OAuth Credential Tests
 */

jest.mock('../../src/shared/logger', () => ({
  info: jest.fn(),
  debug: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
}));

import fs from 'fs';
import os from 'os';
import path from 'path';
import axios from 'axios';
import configManager from '../../src/shared/config';
import { GoogleOAuth, isTokenExpired, parseAuthorizedUser } from '../../src/publisher/google-oauth';
import { okResponse } from '../helpers/axios';

const NOW = Date.parse('2026-01-01T00:00:00Z');

function tokenJson(overrides: Record<string, unknown> = {}): string {
  return JSON.stringify({
    token: 'test-token',
    refresh_token: 'test-refresh',
    client_id: 'test-client',
    client_secret: 'test-secret',
    token_uri: 'https://oauth.test/token',
    ...overrides,
  });
}

describe('isTokenExpired', () => {
  it('refreshes a minute before expiry', () => {
    expect(isTokenExpired({ token: 't', expiry: new Date(NOW + 30_000).toISOString() }, NOW)).toBe(true);
    expect(isTokenExpired({ token: 't', expiry: new Date(NOW + 120_000).toISOString() }, NOW)).toBe(false);
  });

  it('treats a missing access token as expired', () => {
    expect(isTokenExpired({ refresh_token: 'r' }, NOW)).toBe(true);
  });

  it('treats a token without expiry as valid', () => {
    expect(isTokenExpired({ access_token: 't' }, NOW)).toBe(false);
  });
});

describe('parseAuthorizedUser', () => {
  it('rejects malformed payloads', () => {
    expect(parseAuthorizedUser('{oops')).toBeNull();
    expect(parseAuthorizedUser(JSON.stringify({ scopes: 'blogger' }))).toBeNull();
  });
});

describe('GoogleOAuth', () => {
  let dir: string;
  let post: jest.SpyInstance;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'blog-oauth-'));
    post = jest.spyOn(axios, 'post');
    configManager.update('blogger', { tokenJson: '', tokenFile: path.join(dir, 'token.json'), isCI: false });
  });

  afterEach(() => {
    post.mockRestore();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('returns a still-valid token from the environment', async () => {
    configManager.update('blogger', { tokenJson: tokenJson({ expiry: '2999-01-01T00:00:00Z' }) });

    await expect(new GoogleOAuth().getAccessToken()).resolves.toBe('test-token');
    expect(post).not.toHaveBeenCalled();
  });

  it('refreshes an expired token', async () => {
    configManager.update('blogger', { tokenJson: tokenJson({ expiry: '2000-01-01T00:00:00Z' }) });
    post.mockResolvedValue(okResponse({ access_token: 'fresh-token', expires_in: 3600 }));

    await expect(new GoogleOAuth().getAccessToken()).resolves.toBe('fresh-token');
    expect(post).toHaveBeenCalledWith(
      'https://oauth.test/token',
      'client_id=test-client&client_secret=test-secret&refresh_token=test-refresh&grant_type=refresh_token',
      expect.objectContaining({ headers: { 'Content-Type': 'application/x-www-form-urlencoded' } })
    );
    expect(fs.existsSync(path.join(dir, 'token.json'))).toBe(false);
  });

  it('gives up when an expired token cannot be refreshed', async () => {
    configManager.update('blogger', { tokenJson: tokenJson({ expiry: '2000-01-01T00:00:00Z', refresh_token: undefined }) });

    await expect(new GoogleOAuth().getAccessToken()).resolves.toBeNull();
    expect(post).not.toHaveBeenCalled();
  });

  it('loads the token file and saves the refreshed token back', async () => {
    const file = path.join(dir, 'token.json');
    fs.writeFileSync(file, tokenJson({ expiry: '2000-01-01T00:00:00Z' }));
    post.mockResolvedValue(okResponse({ access_token: 'fresh-token' }));

    await expect(new GoogleOAuth().getAccessToken()).resolves.toBe('fresh-token');

    const saved = parseAuthorizedUser(fs.readFileSync(file, 'utf8'));
    expect(saved?.token).toBe('fresh-token');
    expect(saved?.refresh_token).toBe('test-refresh');
    expect(saved?.scopes).toEqual(['https://www.googleapis.com/auth/blogger']);
  });

  it('ignores the token file in CI', async () => {
    fs.writeFileSync(path.join(dir, 'token.json'), tokenJson());
    configManager.update('blogger', { isCI: true });

    await expect(new GoogleOAuth().getAccessToken()).resolves.toBeNull();
  });
});
