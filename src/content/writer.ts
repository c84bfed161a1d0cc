// Content agent prompt and post assembly
// Builds the writing prompt, guarantees the metadata block, and cleans the generated body

import { AggregatedArticles, ResearchOutput } from '../shared/types';
import { cleanAiArtifacts } from './artifact-cleaner';
import { parseMarkdownMetadata } from './metadata-parser';
import { stripCodeFence } from './json-response';
import { flattenSecondaryKeywords, toResearchJson } from './research';

export const MAX_PROMPT_CONTENT_LENGTH = 4000;
export const TRUNCATION_MARKER = '\n\n[...Content truncated for prompt brevity...]';

const METADATA_PRESENT = /title:\s*.*\n[\s\S]*?tags:\s*\[.*\]/;

export interface PostContext {
  topic: string;
  category: string;
  aggregate: AggregatedArticles;
  research: ResearchOutput;
  imagePath: string | null;
  date: string;
  siteUrl: string;
}

export function truncateForPrompt(content: string): string {
  if (content.length <= MAX_PROMPT_CONTENT_LENGTH) return content;
  return content.slice(0, MAX_PROMPT_CONTENT_LENGTH) + TRUNCATION_MARKER;
}

export function buildPromptDescription(description: string): string {
  return description.replace(/"/g, '').replace(/[\r\n]/g, ' ').trim().slice(0, 155);
}

export function buildMetadataBlock(context: PostContext): string {
  const primary = context.research.primaryKeywords;
  const secondary = flattenSecondaryKeywords(context.research);
  const categories = [context.category, ...primary.slice(0, 2)];
  const tags = [...primary, ...secondary.slice(0, 5)];

  return [
    `title: ${context.research.suggestedBlogTitle}`,
    `description: ${buildPromptDescription(context.aggregate.combinedDescription)}`,
    `date: ${context.date}`,
    `categories: [${categories.join(', ')}]`,
    `tags: [${tags.join(', ')}]`,
    `featuredImage: ${context.imagePath ?? 'None'}`,
  ].join('\n');
}

export function buildContentPrompt(context: PostContext): string {
  const { aggregate, research } = context;
  const sourceData = JSON.stringify(
    {
      consolidated_topic: context.topic,
      category: context.category,
      combined_content: truncateForPrompt(aggregate.combinedContent),
      combined_description: aggregate.combinedDescription,
      primary_source_url: aggregate.primarySourceUrl,
      competitors: aggregate.competitors,
    },
    null,
    2
  );
  const primary = research.primaryKeywords.join(', ');
  const secondary = flattenSecondaryKeywords(research).join(', ');
  const siteUrl = context.siteUrl.replace(/\/+$/, '');
  const year = context.date.slice(0, 4);

  return (
    `You are a specialized crypto blog writing agent. Turn the SEO research and aggregated article data below ` +
    `into a comprehensive, publication-ready, SEO-optimized blog post for a cryptocurrency audience.\n\n` +
    `## Inputs\n` +
    `1. aggregated_source_data: ${sourceData}\n` +
    `2. research_output: ${toResearchJson(research)}\n` +
    `3. featured_image_path: '${context.imagePath ?? 'None'}' (handled by the page template; do not embed it)\n\n` +
    `## Content requirements\n` +
    `- Length: 2500-3000 words. Synthesize and expand on combined_content; never copy it verbatim.\n` +
    `- Headings: follow research_output.blog_outline with at least 25 headings, using ## and ### only apart from the H1.\n` +
    `- Paragraphs: at least 5 sentences each, except short intros, outros and list explanations.\n` +
    `- Style: professional yet conversational. Never mention being an AI.\n` +
    `- Keywords: weave in primary keywords (${primary}) and secondary keywords (${secondary}) naturally, including headings.\n` +
    `- Data: include relevant statistics and real-world examples that support the sourced points.\n` +
    `- External links: plausible URLs on reputable crypto domains (cointelegraph.com, decrypt.co, theblock.co, ethereum.org, bitcoin.org) embedded in sentences. No @ prefixes and no placeholder domains.\n` +
    `- Internal links: 2-3 links to related posts on ${siteUrl}, e.g. [Understanding DeFi Yield Farming](${siteUrl}/${year}/defi-yield-farming-explained.html).\n` +
    `- Images: do not include any markdown image syntax.\n\n` +
    `## Output\n` +
    `Markdown that starts with this exact metadata block (no --- delimiters), then a blank line, then the post:\n\n` +
    `${buildMetadataBlock(context)}\n\n` +
    `The post itself:\n` +
    `1. An H1 heading: # ${research.suggestedBlogTitle}\n` +
    `2. An introduction of 2-3 paragraphs.\n` +
    `3. The outline's sections (##) and sub-sections (###), each substantial.\n` +
    `4. An FAQ section with 5-7 detailed questions and answers.\n` +
    `5. A conclusion with key takeaways, an outlook and a call to action.\n\n` +
    `Output only the post. No bracketed instructions, placeholders or comments addressed to me.`
  );
}

export function hasMetadataBlock(markdown: string): boolean {
  return METADATA_PRESENT.test(markdown);
}

/**
 * Fence-stripped, metadata-guaranteed, artifact-free post markdown. The
 * metadata block is kept out of the cleaner so bracketed tag lists survive.
 */
export function finalizeGeneratedPost(raw: string, context: PostContext): string {
  let markdown = stripCodeFence(raw);
  if (!hasMetadataBlock(markdown)) {
    markdown = `${buildMetadataBlock(context)}\n\n${markdown}`;
  }

  const { metadata, content } = parseMarkdownMetadata(markdown);
  const header = Object.entries(metadata)
    .map(([key, value]) => `${key}: ${value}`)
    .join('\n');
  const title = metadata.title || context.research.suggestedBlogTitle;

  return `${header}\n\n# ${title}\n\n${cleanAiArtifacts(content)}`.trim();
}

/**
 * Post written without a model: metadata plus a short note built from the sources.
 */
export function buildPlaceholderPost(context: PostContext): string {
  const metadata = buildMetadataBlock(context).replace(/^tags: .*$/m, `tags: [${context.category}, news]`);
  return [
    metadata,
    '',
    `# ${context.research.suggestedBlogTitle}`,
    '',
    context.aggregate.combinedDescription,
    '',
    '## Source Highlights',
    '',
    truncateForPrompt(context.aggregate.combinedContent),
    '',
    '## Conclusion',
    '',
    `Stay tuned for deeper analysis of ${context.topic} as the story develops.`,
  ].join('\n');
}
