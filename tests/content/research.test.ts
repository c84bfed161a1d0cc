/**
 * Research Output Unit Tests
 */

import {
  buildResearchPrompt,
  defaultResearch,
  flattenSecondaryKeywords,
  parseResearchOutput,
  toResearchJson,
} from '../../src/content/research';

describe('parseResearchOutput', () => {
  it('parses a fenced JSON reply and normalizes keywords', () => {
    const response =
      'Sure!\n```json\n{"suggested_blog_title": "Big Title", "primary_keywords": [" btc ", ""], ' +
      '"secondary_keywords": ["a", "b"], "competitor_insights": "gaps", "blog_outline": "## Intro"}\n```';

    expect(parseResearchOutput(response, 'Fallback')).toEqual({
      suggestedBlogTitle: 'Big Title',
      primaryKeywords: ['btc'],
      secondaryKeywords: { general: ['a', 'b'] },
      competitorInsights: 'gaps',
      blogOutline: '## Intro',
    });
  });

  it('fills defaults for missing fields', () => {
    expect(parseResearchOutput('{"suggested_blog_title": "  "}', 'Fallback')).toEqual({
      suggestedBlogTitle: 'Fallback',
      primaryKeywords: [],
      secondaryKeywords: {},
      competitorInsights: '',
      blogOutline: '',
    });
  });

  it('returns null without a usable object', () => {
    expect(parseResearchOutput('no json at all', 'F')).toBeNull();
    expect(parseResearchOutput('["btc", "eth"]', 'F')).toBeNull();
  });

  it('keeps the rest of the reply when keyword lists are null', () => {
    const response =
      '{"suggested_blog_title": "Big Title", "primary_keywords": null, "secondary_keywords": null, ' +
      '"competitor_insights": "gaps", "blog_outline": "## Intro"}';

    expect(parseResearchOutput(response, 'Fallback')).toEqual({
      suggestedBlogTitle: 'Big Title',
      primaryKeywords: [],
      secondaryKeywords: {},
      competitorInsights: 'gaps',
      blogOutline: '## Intro',
    });
  });

  it('drops keyword entries that are not strings', () => {
    const response =
      '{"primary_keywords": ["btc", 3, null], "secondary_keywords": {"etf": ["flows", {"x": 1}], "bad": "oops"}, ' +
      '"competitor_insights": 42}';

    expect(parseResearchOutput(response, 'Fallback')).toEqual({
      suggestedBlogTitle: 'Fallback',
      primaryKeywords: ['btc'],
      secondaryKeywords: { etf: ['flows'] },
      competitorInsights: '',
      blogOutline: '',
    });
  });
});

describe('research helpers', () => {
  it('flattens secondary keyword groups', () => {
    const research = { ...defaultResearch('T'), secondaryKeywords: { a: ['x'], b: ['y', 'z'] } };
    expect(flattenSecondaryKeywords(research)).toEqual(['x', 'y', 'z']);
  });

  it('defaults the title to the topic', () => {
    expect(defaultResearch('Solana Outage').suggestedBlogTitle).toBe('Solana Outage');
  });

  it('serializes to snake_case', () => {
    const json = JSON.parse(toResearchJson(defaultResearch('T')));
    expect(Object.keys(json)).toEqual([
      'suggested_blog_title',
      'primary_keywords',
      'secondary_keywords',
      'competitor_insights',
      'blog_outline',
    ]);
  });

  it('names at most five competitors in the prompt', () => {
    const prompt = buildResearchPrompt('BTC', ['a', 'b', 'c', 'd', 'e', 'f']);
    expect(prompt).toContain("trending crypto topic: 'BTC'");
    expect(prompt).toContain('(e.g., a, b, c, d, e)');
  });
});
