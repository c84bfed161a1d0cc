// Blogger label and title resolution

import { parseListValue } from '../content/metadata-parser';
import { PostMetadata } from '../shared/types';

export const DEFAULT_POST_TITLE = 'Generated Crypto Blog Post';
const MAX_TITLE_LABELS = 5;

/**
 * tags + categories, lowercased and de-duplicated in first-seen order. Falls
 * back to long title words, and always carries the blog category.
 */
export function resolveLabels(metadata: PostMetadata, title: string, category: string): string[] {
  const labels: string[] = [];
  const add = (label: string) => {
    const normalized = label.trim().toLowerCase();
    if (normalized && !labels.includes(normalized)) labels.push(normalized);
  };

  parseListValue(metadata.tags).forEach(add);
  parseListValue(metadata.categories).forEach(add);

  if (labels.length === 0) {
    const words = (title.match(/\w+/g) ?? []).filter(word => word.length > 3);
    words.slice(0, MAX_TITLE_LABELS).forEach(add);
  }

  add(category);
  return labels;
}

function decodeEntities(text: string): string {
  return text
    .replace(/&quot;/g, '"')
    .replace(/&apos;|&#39;/g, "'")
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&amp;/g, '&');
}

/**
 * Title from metadata, else the document's first <h1>, else a fixed default.
 */
export function resolvePostTitle(metadata: PostMetadata, html: string): string {
  if (metadata.title?.trim()) return metadata.title.trim();

  const h1 = /<h1[^>]*>([\s\S]*?)<\/h1>/i.exec(html);
  const fromHeading = h1 ? decodeEntities(h1[1].replace(/<[^>]+>/g, '')).trim() : '';
  return fromHeading || DEFAULT_POST_TITLE;
}
