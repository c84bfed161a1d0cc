// AI Artifact Cleaner
// Strips placeholder links, handles and leftover model instructions from generated markdown

export const PLACEHOLDER_DOMAINS = [
  'example.com',
  'example.org',
  'placeholder.com',
  'yoursite.com',
  'website.com',
  'domain.com',
  'site.com',
  'yourblogname.com',
  'ai-generated.com',
  'yourcryptoblog.com',
];

const INSTRUCTION_PATTERNS: RegExp[] = [
  /note:.*$/gim,
  /important:.*$/gim,
  /remember to.*$/gim,
  /please.*$/gim,
  /you should.*$/gim,
  /<!--[\s\S]*?-->/g,
  /\/\*[\s\S]*?\*\//g,
];

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const DOMAIN_ALTERNATION = PLACEHOLDER_DOMAINS.map(escapeRegExp).join('|');
const PLACEHOLDER_LINK = new RegExp(
  `!?\\[[^\\]\\n]*\\]\\(\\s*(?:https?:\\/\\/)?(?:[\\w-]+\\.)*(?:${DOMAIN_ALTERNATION})(?:[\\/?#][^)\\s]*)?\\s*\\)`,
  'gi'
);
// Left boundary keeps `site.com` from matching inside `mysite.com`
const PLACEHOLDER_URL = new RegExp(
  `(?<![\\w.-])(?:https?:\\/\\/)?(?:[\\w-]+\\.)*(?:${DOMAIN_ALTERNATION})(?![\\w-])(?:[\\/?#][^\\s)]*)?`,
  'gi'
);

/**
 * Remove model artifacts from generated markdown. Links and images pointing at
 * real hosts survive; bracketed placeholders like `[Insert chart here]` do not.
 */
export function cleanAiArtifacts(text: string): string {
  if (!text) return '';

  let cleaned = text.replace(/\r\n?/g, '\n');

  cleaned = cleaned.replace(PLACEHOLDER_LINK, '');
  // Bracketed text that is neither a link label nor an image alt
  cleaned = cleaned.replace(/(?<!!)\[[^\]\n]*\](?!\()/g, '');
  // Handles and emails; `/@user` path segments inside URLs are kept
  cleaned = cleaned.replace(/[ \t]*(?<!\/)@\S+/g, '');
  cleaned = cleaned.replace(PLACEHOLDER_URL, '');

  for (const pattern of INSTRUCTION_PATTERNS) {
    cleaned = cleaned.replace(pattern, '');
  }

  cleaned = cleaned.replace(/\n{3,}/g, '\n\n');
  cleaned = cleaned
    .split('\n')
    .map(line => line.trim())
    .join('\n');
  // Trimming can leave fresh runs of blank lines behind
  cleaned = cleaned.replace(/\n{3,}/g, '\n\n');

  return cleaned.trim();
}
