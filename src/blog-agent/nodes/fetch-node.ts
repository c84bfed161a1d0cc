// Fetch Node
// Pulls the raw article pool for the cycle from NewsAPI

import { BlogAgentState } from '../state';
import newsApiClient from '../../news-ingester/newsapi-client';
import logger from '../../shared/logger';

export async function fetchNode(state: BlogAgentState): Promise<Partial<BlogAgentState>> {
  logger.info(`[FetchNode] Fetching articles for query "${state.query}"`);

  const articles = await newsApiClient.fetchArticles(state.query);

  logger.info(`[FetchNode] Fetched ${articles.length} articles`);

  return {
    currentStep: articles.length > 0 ? 'ARTICLES_FETCHED' : 'NO_ARTICLES_FOUND',
    articles,
    stats: { ...state.stats, fetched: articles.length },
    thoughts: [...state.thoughts, `Fetched ${articles.length} articles for "${state.query}"`],
  };
}
