/**
 * Blogger Client Unit Tests
 */

jest.mock('../../src/shared/logger', () => ({
  info: jest.fn(),
  debug: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
}));

import axios from 'axios';
import logger from '../../src/shared/logger';
import { BloggerClient } from '../../src/publisher/blogger-client';
import { GoogleOAuth } from '../../src/publisher/google-oauth';
import { httpError, okResponse } from '../helpers/axios';

const POST = { title: 'BTC Weekly', content: '<p>body</p>', labels: ['btc', 'crypto'] };

describe('BloggerClient', () => {
  let auth: GoogleOAuth;
  let client: BloggerClient;
  let post: jest.SpyInstance;

  beforeEach(() => {
    jest.clearAllMocks();
    auth = new GoogleOAuth();
    jest.spyOn(auth, 'getAccessToken').mockResolvedValue('test-token');
    client = new BloggerClient(auth);
    post = jest.spyOn(axios, 'post');
  });

  afterEach(() => {
    post.mockRestore();
  });

  it('inserts a live post', async () => {
    post.mockResolvedValue(okResponse({ id: '42', url: 'https://blog.test/42', labels: ['crypto', 'btc'] }));

    const result = await client.insertPost('123', POST);

    expect(result).toEqual({ success: true, postId: '42', url: 'https://blog.test/42', labels: ['crypto', 'btc'] });
    expect(post).toHaveBeenCalledWith(
      'https://www.googleapis.com/blogger/v3/blogs/123/posts/',
      {
        kind: 'blogger#post',
        blog: { id: '123' },
        title: 'BTC Weekly',
        content: '<p>body</p>',
        labels: ['btc', 'crypto'],
        status: 'LIVE',
      },
      expect.objectContaining({
        params: { isDraft: false },
        headers: expect.objectContaining({ Authorization: 'Bearer test-token' }),
      })
    );
    expect(jest.mocked(logger).warn).not.toHaveBeenCalled();
  });

  it('warns when the returned labels differ', async () => {
    post.mockResolvedValue(okResponse({ id: '42', url: 'https://blog.test/42', labels: ['btc'] }));

    await client.insertPost('123', POST);

    expect(jest.mocked(logger).warn).toHaveBeenCalledWith(
      '[Blogger] Labels mismatch. Sent: btc, crypto Received: btc'
    );
  });

  it('reports permission failures with a hint', async () => {
    post.mockRejectedValue(httpError(403, { error: { message: 'User lacks permission' } }));

    const result = await client.insertPost('123', POST);

    expect(result).toEqual({
      success: false,
      error: 'HTTP 403 api=User lacks permission msg=Request failed with status code 403',
    });
    expect(jest.mocked(logger).error).toHaveBeenCalledWith(
      '[Blogger] The authenticated Google account needs Author or Admin rights on the target blog.'
    );
  });

  it('does not call the API without credentials', async () => {
    jest.spyOn(auth, 'getAccessToken').mockResolvedValue(null);

    await expect(client.insertPost('123', POST)).resolves.toEqual({ success: false, error: 'NOT_AUTHENTICATED' });
    await expect(client.isAuthenticated()).resolves.toBe(false);
    expect(post).not.toHaveBeenCalled();
  });
});
