// Trending topic extraction
// Prompt and response parsing for picking post topics out of the fetched news

import { NewsApiArticle } from '../shared/types';
import { stripCodeFence, tryParseJson } from './json-response';

export const FALLBACK_TOPIC = 'Latest Cryptocurrency News';
export const MAX_TOPIC_ARTICLES = 50;

export function buildArticleDigest(articles: NewsApiArticle[]): string {
  let digest = '';
  for (const article of articles.slice(0, MAX_TOPIC_ARTICLES)) {
    if (article.title && article.title !== '[Removed]') {
      digest += `Title: ${article.title}\n`;
    }
    if (article.description && article.description !== '[Removed]') {
      digest += `Description: ${article.description}\n\n`;
    }
  }
  return digest.trim();
}

export function buildTopicPrompt(digest: string, count: number): string {
  return (
    `You are an expert crypto analyst. Given the following news headlines and summaries ` +
    `from recent cryptocurrency news, identify the ${count} most distinct and trending ` +
    `topics or themes. Each topic should be specific enough for a blog post but broad enough ` +
    `to be trending. Return ONLY a JSON array of ${count} strings, each being a distinct topic.\n\n` +
    `Example format: ["Bitcoin Halving Impact", "Ethereum ETF Developments", "DeFi Innovations"]\n\n` +
    `News Articles:\n${digest}\n\n` +
    `Topics:`
  );
}

function dedupe(topics: string[], count: number): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const topic of topics) {
    const trimmed = topic.trim();
    const key = trimmed.toLowerCase();
    if (!trimmed || seen.has(key)) continue;
    seen.add(key);
    result.push(trimmed);
    if (result.length === count) break;
  }
  return result;
}

/**
 * JSON array first, then every "quoted" string. Empty when nothing usable was found.
 */
export function parseTopicsResponse(response: string, count: number): string[] {
  const parsed = tryParseJson(stripCodeFence(response));
  if (Array.isArray(parsed)) {
    const strings = parsed.filter((item): item is string => typeof item === 'string');
    const topics = dedupe(strings, count);
    if (topics.length > 0) return topics;
  }

  const quoted = Array.from(response.matchAll(/"([^"]+)"/g), match => match[1]);
  return dedupe(quoted, count);
}
