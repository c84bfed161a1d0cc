// SEO research agent prompt and output schema

import { z } from 'zod';
import { ResearchOutput } from '../shared/types';
import { extractJsonObject } from './json-response';

function onlyStrings(items: unknown[]): string[] {
  return items.filter((item): item is string => typeof item === 'string');
}

// Models return null or mixed lists often enough; a bad field falls back to its default
const keywordList = z.array(z.unknown()).transform(onlyStrings);

const keywordGroups = z
  .record(z.unknown())
  .transform(groups =>
    Object.fromEntries(
      Object.entries(groups)
        .filter((entry): entry is [string, unknown[]] => Array.isArray(entry[1]))
        .map(([group, items]) => [group, onlyStrings(items)] as const)
    )
  );

const researchSchema = z.object({
  suggested_blog_title: z.string().trim().optional().catch(undefined),
  primary_keywords: keywordList.catch([]),
  secondary_keywords: z.union([keywordList, keywordGroups]).catch({}),
  competitor_insights: z.string().catch(''),
  blog_outline: z.string().catch(''),
});

export function buildResearchPrompt(topic: string, competitors: string[]): string {
  return (
    `You are an expert SEO Keyword Research Agent specializing in crypto market analysis and content strategy. ` +
    `Perform comprehensive SEO keyword research and outline generation for the trending crypto topic: '${topic}'.\n\n` +
    `Analyze content from top crypto competitors (e.g., ${competitors.slice(0, 5).join(', ')}) to identify relevant SEO keywords, ` +
    `content gaps and structural insights for the cryptocurrency, blockchain, DeFi, NFT and Web3 space.\n\n` +
    `Also write a unique, catchy, SEO-optimized blog post title (H1) that is distinct from the source headlines ` +
    `and reflects a consolidated, in-depth perspective on the topic.\n\n` +
    `## Process\n` +
    `1. Keyword discovery: primary (high volume, high relevance) and secondary (long-tail) keyword clusters across informational, commercial and navigational intent.\n` +
    `2. Competitive analysis: 2-3 insights into competitor strategies and content gaps.\n` +
    `3. Keyword evaluation: prioritize high-value crypto keywords and related entities.\n` +
    `4. Outline: a hierarchical markdown outline (## and ###) with at least 8 headings that works the keywords in, including FAQ or case-study sections where they fit.\n\n` +
    `## Output\n` +
    `Return a single JSON object in a \`\`\`json block with exactly this structure:\n` +
    '```json\n' +
    '{\n' +
    '  "suggested_blog_title": "Catchy title under 70 characters",\n' +
    '  "primary_keywords": ["crypto keyword1", "crypto keyword2", "crypto keyword3"],\n' +
    '  "secondary_keywords": {"sub_topic1": ["long-tail A", "long-tail B"], "sub_topic2": ["specific C", "specific D"]},\n' +
    '  "competitor_insights": "Summary of competitor strategies and content gaps.",\n' +
    '  "blog_outline": "## Introduction\\n\\n### Background\\n\\n## Main Section\\n\\n## Conclusion\\n"\n' +
    '}\n' +
    '```\n' +
    `Focus on commercially relevant terms and exclude branded competitor terms. Output nothing outside the JSON block.`
  );
}

/**
 * Parse and normalize the research agent's reply, or null when it holds no usable JSON object.
 */
export function parseResearchOutput(response: string, fallbackTitle: string): ResearchOutput | null {
  const raw = extractJsonObject(response);
  const result = researchSchema.safeParse(raw);
  if (!result.success) return null;

  const data = result.data;
  const secondaryKeywords = Array.isArray(data.secondary_keywords)
    ? { general: data.secondary_keywords }
    : data.secondary_keywords;

  return {
    suggestedBlogTitle: data.suggested_blog_title || fallbackTitle,
    primaryKeywords: data.primary_keywords.map(k => k.trim()).filter(Boolean),
    secondaryKeywords,
    competitorInsights: data.competitor_insights,
    blogOutline: data.blog_outline,
  };
}

export function flattenSecondaryKeywords(research: ResearchOutput): string[] {
  return Object.values(research.secondaryKeywords).flat();
}

/**
 * Research stand-in used when no model is configured.
 */
export function defaultResearch(topic: string): ResearchOutput {
  return {
    suggestedBlogTitle: topic,
    primaryKeywords: [],
    secondaryKeywords: {},
    competitorInsights: '',
    blogOutline: '',
  };
}

/**
 * Wire format (snake_case) for embedding in the content prompt.
 */
export function toResearchJson(research: ResearchOutput): string {
  return JSON.stringify(
    {
      suggested_blog_title: research.suggestedBlogTitle,
      primary_keywords: research.primaryKeywords,
      secondary_keywords: research.secondaryKeywords,
      competitor_insights: research.competitorInsights,
      blog_outline: research.blogOutline,
    },
    null,
    2
  );
}
