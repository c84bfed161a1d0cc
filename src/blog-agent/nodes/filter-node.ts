// Filter Node
// Narrows the article pool to one topic and merges the survivors

import { BlogAgentState, TopicDraft } from '../state';
import geminiService from '../../shared/gemini-service';
import configManager from '../../shared/config';
import logger from '../../shared/logger';
import { safeErrorMessage } from '../../shared/errors';
import { NewsApiArticle } from '../../shared/types';
import {
  FALLBACK_ARTICLE_COUNT,
  buildRelevancePrompt,
  parseRelevantIndices,
  selectArticles,
} from '../../content/article-filter';
import { aggregateArticles } from '../../content/aggregator';

async function rankArticles(topic: string, articles: NewsApiArticle[]): Promise<number[]> {
  if (!geminiService.canUseService()) {
    logger.warn(`[FilterNode] Gemini not configured, using first ${FALLBACK_ARTICLE_COUNT} articles`);
    return [];
  }

  try {
    const response = await geminiService.generateText(buildRelevancePrompt(topic, articles), {
      model: configManager.getSection('gemini').researchModel,
      purpose: 'article relevance',
    });
    const indices = parseRelevantIndices(response, articles.length);
    if (indices.length === 0) {
      logger.warn(`[FilterNode] No valid indices in response, using first ${FALLBACK_ARTICLE_COUNT} articles`);
    }
    return indices;
  } catch (error) {
    logger.error(`[FilterNode] Relevance ranking failed: ${safeErrorMessage(error)}`);
    return [];
  }
}

export async function filterNode(state: BlogAgentState, draft: TopicDraft): Promise<Partial<TopicDraft>> {
  logger.info(`[FilterNode] Filtering ${state.articles.length} articles for "${draft.topic}"`);

  const indices = await rankArticles(draft.topic, state.articles);
  const articles = selectArticles(state.articles, indices);
  const aggregate = aggregateArticles(articles, state.category);

  if (!aggregate) {
    logger.warn(`[FilterNode] Nothing to aggregate for "${draft.topic}"`);
    return { articles, aggregate: null };
  }

  logger.info(
    `[FilterNode] Aggregated ${articles.length} articles from ${aggregate.competitors.length} sources`
  );

  return {
    articles,
    // The trending topic names the post, not the first headline
    aggregate: { ...aggregate, consolidatedTopic: draft.topic },
  };
}
