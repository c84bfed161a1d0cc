// NewsAPI Client - Article ingestion for the blog pipeline
// Pulls the most relevant recent articles for a query from /v2/everything

import axios from 'axios';
import configManager from '../shared/config';
import logger from '../shared/logger';
import { NewsApiError, safeErrorMessage } from '../shared/errors';
import { withRetry, sleep } from '../shared/retry';
import { NewsApiArticle } from '../shared/types';

interface NewsApiResponse {
  status: 'ok' | 'error';
  totalResults?: number;
  articles?: NewsApiArticle[];
  code?: string;
  message?: string;
}

const MAX_PAGE_SIZE = 100;
const MAX_ATTEMPTS = 3;

export class NewsApiClient {
  private sleepFn: (ms: number) => Promise<void> = sleep;

  canUseService(): boolean {
    return !!configManager.getSection('newsApi').apiKey;
  }

  setSleep(fn: (ms: number) => Promise<void>): void {
    this.sleepFn = fn;
  }

  /**
   * Fetch articles for a query. Never throws: every failure path yields [].
   */
  async fetchArticles(query: string, pageSize?: number): Promise<NewsApiArticle[]> {
    const config = configManager.getSection('newsApi');
    if (!this.canUseService()) {
      logger.error('[NewsAPI] API key not configured');
      return [];
    }

    const size = Math.min(Math.max(1, pageSize ?? config.pageSize), MAX_PAGE_SIZE);
    const params = new URLSearchParams({
      q: query,
      language: config.language,
      sortBy: 'relevancy',
      pageSize: String(size),
      apiKey: config.apiKey,
    });

    logger.info(`[NewsAPI] Fetching up to ${size} articles for "${query}"`);

    try {
      const articles = await withRetry(async () => {
        const response = await axios.get<NewsApiResponse>(`${config.baseUrl}/everything?${params.toString()}`, {
          timeout: config.timeout,
          headers: { Accept: 'application/json' },
        });

        const data = response.data;
        if (data.status !== 'ok') {
          throw new NewsApiError(data.message || 'NewsAPI returned an error status', data.code || 'API_ERROR');
        }
        return data.articles ?? [];
      }, {
        maxRetries: MAX_ATTEMPTS,
        initialDelayMs: 1000,
        label: 'NewsAPI',
        sleep: this.sleepFn,
      });

      if (articles.length === 0) {
        logger.warn(`[NewsAPI] No articles returned for "${query}"`);
        return [];
      }

      logger.info(`[NewsAPI] Query: "${query}" - Found ${articles.length} articles`);
      return articles;
    } catch (error) {
      logger.error(`[NewsAPI] Fetch failed for "${query}" after ${MAX_ATTEMPTS} attempts: ${safeErrorMessage(error)}`);
      return [];
    }
  }
}

const newsApiClient = new NewsApiClient();
export default newsApiClient;
