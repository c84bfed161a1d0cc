// Post document builder
// Turns generated markdown into the final HTML document and its SEO fields

import { parseMarkdownMetadata, parseListValue } from './metadata-parser';
import { markdownToHtml } from './markdown-renderer';
import { renderPostDocument } from './html-template';
import { sanitizeFilename } from './filename';
import { FeaturedImage, PostMetadata } from '../shared/types';

export interface PostDocumentOptions {
  fallbackTitle: string;
  category: string;
  featuredImage: FeaturedImage | null;
  primarySourceUrl: string;
  blogName: string;
  author: string;
  now?: Date;
}

export interface PostDocument {
  title: string;
  description: string;
  keywords: string;
  publishedDate: string;
  metadata: PostMetadata;
  bodyHtml: string;
  html: string;
  fileStem: string;
}

export function formatDate(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Meta description: attribute-safe, single line, at most 155 characters of source text.
 */
export function buildMetaDescription(description: string): string {
  return description
    .replace(/"/g, '&quot;')
    .replace(/\n/g, ' ')
    .trim()
    .slice(0, 155)
    .replace(/'/g, '&apos;');
}

export function buildKeywords(metadata: PostMetadata, category: string, title: string): string {
  const tags = parseListValue(metadata.tags).map(tag => tag.replace(/ /g, '_').toLowerCase());
  if (tags.length > 0) {
    return tags.join(',');
  }
  return [category, 'crypto news', 'latest crypto', sanitizeFilename(title).slice(0, 30)].join(',');
}

export function buildPostDocument(markdown: string, options: PostDocumentOptions): PostDocument {
  const { metadata, content } = parseMarkdownMetadata(markdown);

  const title = metadata.title || options.fallbackTitle;
  const description = buildMetaDescription(
    metadata.description || `A comprehensive look at the latest news in ${options.category} related to '${title}'.`
  );
  const keywords = buildKeywords(metadata, options.category, title);
  const publishedDate = metadata.date || formatDate(options.now ?? new Date());

  const bodyHtml = markdownToHtml(content, options.featuredImage);

  const html = renderPostDocument({
    title,
    description,
    keywords,
    category: options.category,
    bodyHtml,
    featuredImageSrc: options.featuredImage?.dataUri ?? null,
    primarySourceUrl: options.primarySourceUrl,
    publishedDate,
    blogName: options.blogName,
    author: options.author,
  });

  return {
    title,
    description,
    keywords,
    publishedDate,
    metadata,
    bodyHtml,
    html,
    fileStem: sanitizeFilename(title),
  };
}
