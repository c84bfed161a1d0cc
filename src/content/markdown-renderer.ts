// Markdown → HTML Renderer
// Regex-based converter for the subset of markdown the content agent produces

import path from 'path';
import { cleanAiArtifacts } from './artifact-cleaner';
import { FeaturedImage } from '../shared/types';

const HEADING = /^(#{1,6})[ \t]+(.+?)[ \t]*#*[ \t]*$/gm;
const LIST_ITEM = /^\s*([-*+]|\d+\.)\s+(.*)$/;
const IMAGE = /!\[([^\]\n]*)\]\(\s*([^)\s]+)(?:\s+"[^"]*")?\s*\)/g;
const LINK = /\[([^\]\n]+)\]\(\s*([^)\s]+)(?:\s+"[^"]*")?\s*\)/g;
const BLOCK_TAG = /^<\/?(h[1-6]|ul|ol|li|img|div|p|blockquote|pre|table|hr|figure|script|style|br)\b/i;

function escapeAttribute(value: string): string {
  return value.replace(/&(?![a-z]+;|#\d+;)/gi, '&amp;').replace(/"/g, '&quot;');
}

function convertHeadings(text: string): string {
  return text.replace(HEADING, (_match, hashes: string, heading: string) => {
    // The page template owns the only <h1>
    const level = Math.max(2, hashes.length);
    return `<h${level}>${heading}</h${level}>`;
  });
}

function nextNonBlank(lines: string[], from: number): string | undefined {
  for (let i = from; i < lines.length; i++) {
    if (lines[i].trim()) return lines[i];
  }
  return undefined;
}

function listTypeOf(marker: string): 'ul' | 'ol' {
  return /^\d/.test(marker) ? 'ol' : 'ul';
}

/**
 * Consecutive list items become one <ul>/<ol>; blank lines between items of
 * the same kind do not split the list.
 */
function convertLists(text: string): string {
  const lines = text.split('\n');
  const out: string[] = [];
  let open: 'ul' | 'ol' | null = null;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    const match = LIST_ITEM.exec(line);

    if (match) {
      const type = listTypeOf(match[1]);
      if (open !== type) {
        if (open) out.push(`</${open}>`);
        out.push(`<${type}>`);
        open = type;
      }
      out.push(`<li>${match[2].trim()}</li>`);
      continue;
    }

    if (open && !line.trim()) {
      const upcoming = nextNonBlank(lines, i + 1);
      const upcomingMatch = upcoming === undefined ? null : LIST_ITEM.exec(upcoming);
      if (upcomingMatch && listTypeOf(upcomingMatch[1]) === open) continue;
    }

    if (open) {
      out.push(`</${open}>`);
      open = null;
    }
    out.push(line);
  }

  if (open) out.push(`</${open}>`);
  return out.join('\n');
}

function convertImages(text: string, featured?: FeaturedImage | null): string {
  const featuredName = featured ? path.basename(featured.filePath) : null;

  return text.replace(IMAGE, (_match, alt: string, src: string) => {
    const srcName = path.basename(src.split(/[?#]/)[0]);
    const resolved = featured && featuredName && srcName === featuredName ? featured.dataUri : src;
    return `<img src="${escapeAttribute(resolved)}" alt="${escapeAttribute(alt)}" class="in-content-image">`;
  });
}

function convertLinks(text: string): string {
  return text.replace(
    LINK,
    (_match, label: string, href: string) =>
      `<a href="${escapeAttribute(href)}" target="_blank" rel="noopener noreferrer">${label}</a>`
  );
}

/**
 * Apply `fn` to the text between tags only, so attribute values stay untouched.
 */
function mapTextSegments(html: string, fn: (text: string) => string): string {
  return html
    .split(/(<[^>]+>)/)
    .map(segment => (segment.startsWith('<') && segment.endsWith('>') ? segment : fn(segment)))
    .join('');
}

function convertEmphasis(text: string): string {
  return text
    .split('\n')
    .map(line => {
      // Bold-italic and bold may wrap links, so they run on the whole line
      let converted = line
        .replace(/\*\*\*([^*\n]+?)\*\*\*/g, '<strong><em>$1</em></strong>')
        .replace(/\*\*([^*\n]+?)\*\*/g, '<strong>$1</strong>');
      converted = mapTextSegments(converted, segment =>
        segment
          .replace(/\*([^*\n]+?)\*/g, '<em>$1</em>')
          .replace(/(^|[^\w])_([^_\n]+?)_(?!\w)/g, '$1<em>$2</em>')
      );
      return converted;
    })
    .join('\n');
}

function wrapParagraphs(html: string): string {
  const output: string[] = [];
  let paragraph: string[] = [];

  const flush = () => {
    const content = paragraph.join(' ').trim();
    if (content) output.push(`<p>${content}</p>`);
    paragraph = [];
  };

  for (const line of html.split('\n')) {
    const stripped = line.trim();
    if (!stripped) {
      flush();
      output.push('');
    } else if (BLOCK_TAG.test(stripped)) {
      flush();
      output.push(stripped);
    } else {
      paragraph.push(stripped);
    }
  }
  flush();

  return output.join('\n');
}

/**
 * Convert generated markdown into the article body HTML. An image whose file
 * name matches the featured image is inlined as its data URI.
 */
export function markdownToHtml(markdown: string, featured?: FeaturedImage | null): string {
  let html = cleanAiArtifacts(markdown);
  if (!html) return '';

  html = convertHeadings(html);
  html = convertLists(html);
  html = convertImages(html, featured);
  html = convertLinks(html);
  html = convertEmphasis(html);
  html = wrapParagraphs(html);

  return html
    .replace(/<p>\s*<\/p>/g, '')
    .replace(/<p><br\s*\/?><\/p>/g, '')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}
