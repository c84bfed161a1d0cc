// Markdown metadata parser
// Splits the leading `key: value` block off a generated post

import { ParsedMarkdown, PostMetadata } from '../shared/types';

/**
 * Metadata runs from the first line until a blank line (consumed) or a line
 * without a colon (kept as content). A leading `# ` heading in the content is
 * lifted out and used as the title when none was given.
 */
export function parseMarkdownMetadata(markdown: string): ParsedMarkdown {
  const metadata: PostMetadata = {};
  const lines = markdown.replace(/\r\n?/g, '\n').split('\n');

  let contentStart = lines.length;
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line) {
      contentStart = i + 1;
      break;
    }
    const separator = line.indexOf(':');
    if (separator === -1) {
      contentStart = i;
      break;
    }
    const key = line.slice(0, separator).trim();
    metadata[key] = line.slice(separator + 1).trim();
  }

  let content = lines.slice(contentStart).join('\n').trim();

  if (content.startsWith('# ')) {
    const newline = content.indexOf('\n');
    const heading = (newline === -1 ? content.slice(2) : content.slice(2, newline)).trim();
    if (!metadata.title) {
      metadata.title = heading;
    }
    content = newline === -1 ? '' : content.slice(newline + 1).trim();
  }

  return { metadata, content };
}

/**
 * `[a, b, "c"]` or `a, b` → ['a', 'b', 'c']
 */
export function parseListValue(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .trim()
    .replace(/^\[/, '')
    .replace(/\]$/, '')
    .split(',')
    .map(item => item.trim().replace(/^["']|["']$/g, '').trim())
    .filter(item => item.length > 0);
}
