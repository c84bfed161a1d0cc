// Article relevance filter
// Asks the model which fetched articles belong to a topic

import { NewsApiArticle } from '../shared/types';
import { stripCodeFence, tryParseJson } from './json-response';

export const FALLBACK_ARTICLE_COUNT = 10;

export function buildRelevancePrompt(topic: string, articles: NewsApiArticle[]): string {
  const listing = articles.map((article, i) => `${i}. ${article.title ?? ''}`).join('\n');
  return (
    `Given the topic '${topic}', analyze these articles and return a JSON array of indices ` +
    `of the most relevant articles (0-based), sorted by relevance. Return ONLY the array.\n\n` +
    `Articles:\n${listing}`
  );
}

/**
 * Valid, de-duplicated indices in the order the model ranked them.
 */
export function parseRelevantIndices(response: string, articleCount: number): number[] {
  const parsed = tryParseJson(stripCodeFence(response));
  if (!Array.isArray(parsed)) return [];

  const indices: number[] = [];
  for (const value of parsed) {
    const index = typeof value === 'string' && value.trim() ? Number(value) : value;
    if (typeof index !== 'number' || !Number.isInteger(index)) continue;
    if (index < 0 || index >= articleCount || indices.includes(index)) continue;
    indices.push(index);
  }
  return indices;
}

export function selectArticles(articles: NewsApiArticle[], indices: number[]): NewsApiArticle[] {
  if (indices.length === 0) {
    return articles.slice(0, FALLBACK_ARTICLE_COUNT);
  }
  return indices.map(i => articles[i]);
}
