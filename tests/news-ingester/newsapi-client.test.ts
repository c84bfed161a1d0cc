/**
 * NewsAPI Client Unit Tests
 */

jest.mock('../../src/shared/logger', () => ({
  info: jest.fn(),
  debug: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
}));

import axios from 'axios';
import configManager from '../../src/shared/config';
import { NewsApiClient } from '../../src/news-ingester/newsapi-client';
import { networkError, okResponse } from '../helpers/axios';

describe('NewsApiClient', () => {
  let client: NewsApiClient;
  let get: jest.SpyInstance;
  let sleep: jest.Mock<Promise<void>, [number]>;

  beforeEach(() => {
    configManager.update('newsApi', {
      apiKey: 'test-secret',
      baseUrl: 'https://newsapi.test',
      language: 'en',
      pageSize: 100,
    });
    sleep = jest.fn<Promise<void>, [number]>().mockResolvedValue(undefined);
    client = new NewsApiClient();
    client.setSleep(sleep);
    get = jest.spyOn(axios, 'get');
  });

  afterEach(() => {
    get.mockRestore();
  });

  it('queries the everything endpoint with a capped page size', async () => {
    get.mockResolvedValue(okResponse({ status: 'ok', articles: [{ title: 'A' }] }));

    await expect(client.fetchArticles('bitcoin', 250)).resolves.toEqual([{ title: 'A' }]);
    expect(get).toHaveBeenCalledWith(
      'https://newsapi.test/everything?q=bitcoin&language=en&sortBy=relevancy&pageSize=100&apiKey=test-secret',
      expect.objectContaining({ timeout: expect.any(Number) })
    );
  });

  it('treats an error status as a failed attempt', async () => {
    get
      .mockResolvedValueOnce(okResponse({ status: 'error', code: 'rateLimited', message: 'slow down' }))
      .mockResolvedValueOnce(okResponse({ status: 'ok', articles: [{ title: 'B' }] }));

    await expect(client.fetchArticles('bitcoin')).resolves.toEqual([{ title: 'B' }]);
    expect(sleep.mock.calls).toEqual([[1000]]);
  });

  it('returns [] after three failed attempts', async () => {
    get.mockRejectedValue(networkError());

    await expect(client.fetchArticles('bitcoin')).resolves.toEqual([]);
    expect(get).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[1000], [2000]]);
  });

  it('returns [] without retrying when nothing matched', async () => {
    get.mockResolvedValue(okResponse({ status: 'ok', totalResults: 0, articles: [] }));

    await expect(client.fetchArticles('bitcoin')).resolves.toEqual([]);
    expect(get).toHaveBeenCalledTimes(1);
  });

  it('does nothing without an API key', async () => {
    configManager.update('newsApi', { apiKey: '' });

    await expect(client.fetchArticles('bitcoin')).resolves.toEqual([]);
    expect(get).not.toHaveBeenCalled();
  });
});
