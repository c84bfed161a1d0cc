// Article Aggregator
// Merges the articles selected for one topic into a single research bundle

import { AggregatedArticles, NewsApiArticle } from '../shared/types';

const REMOVED = '[Removed]';
const MIN_CONTENT_LENGTH = 50;
const MAX_TOPIC_LENGTH = 150;
const MAX_DESCRIPTION_LENGTH = 300;

export const FALLBACK_SOURCE_URL = 'https://news.example.com/source-unavailable';
export const NO_CONTENT_MESSAGE = 'No substantial content found from sources. AI will generate based on topic.';

function usable(value: string | null | undefined): value is string {
  return !!value && value !== REMOVED;
}

export function extractDomain(url: string): string | null {
  const host = url.replace(/^[a-z][a-z0-9+.-]*:\/\//i, '').split('/')[0];
  return host ? host : null;
}

export function aggregateArticles(articles: NewsApiArticle[], category: string): AggregatedArticles | null {
  if (articles.length === 0) return null;

  const titles: string[] = [];
  const descriptions: string[] = [];
  const pieces: string[] = [];
  const competitors = new Set<string>();
  let imageUrl: string | null = null;
  let primarySourceUrl: string | null = null;

  for (const article of articles) {
    if (usable(article.title)) {
      titles.push(article.title);
      pieces.push(`### Source: ${article.title}\n\n`);
    }
    if (usable(article.description)) {
      descriptions.push(article.description);
      pieces.push(`${article.description}\n`);
    }
    const content = article.content;
    if (usable(content) && content.trim().length > MIN_CONTENT_LENGTH) {
      pieces.push(`${content}\n`);
    }

    if (!imageUrl && article.urlToImage) {
      imageUrl = article.urlToImage;
      primarySourceUrl = article.url || null;
    }

    if (article.url) {
      const domain = extractDomain(article.url);
      if (domain) competitors.add(domain);
    }
  }

  let consolidatedTopic = titles[0] || 'Recent Cryptocurrency News';
  if (titles.length > 1) {
    consolidatedTopic = `Comprehensive Crypto: ${titles[0]} and more...`;
    if (consolidatedTopic.length > MAX_TOPIC_LENGTH) {
      consolidatedTopic = `${consolidatedTopic.slice(0, MAX_TOPIC_LENGTH)}...`;
    }
  }

  const combinedDescription = descriptions.length > 0
    ? descriptions.join(' ').slice(0, MAX_DESCRIPTION_LENGTH).trim()
    : `A deep dive into recent developments in ${category}.`;

  return {
    consolidatedTopic,
    combinedContent: pieces.length > 0 ? pieces.join('\n\n---\n\n') : NO_CONTENT_MESSAGE,
    combinedDescription,
    imageUrl,
    competitors: Array.from(competitors),
    primarySourceUrl: primarySourceUrl || articles[0].url || FALLBACK_SOURCE_URL,
  };
}
