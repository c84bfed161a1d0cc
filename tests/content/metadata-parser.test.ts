/**
 * Metadata Parser Unit Tests
 */

import { parseMarkdownMetadata, parseListValue } from '../../src/content/metadata-parser';

describe('parseMarkdownMetadata', () => {
  it('splits the metadata block from the content', () => {
    const markdown = 'title: Hello\ndescription: World: again\ntags: [a, b]\n\n# Heading\n\nBody text';
    const { metadata, content } = parseMarkdownMetadata(markdown);

    expect(metadata).toEqual({ title: 'Hello', description: 'World: again', tags: '[a, b]' });
    expect(content).toBe('Body text');
  });

  it('keeps key casing', () => {
    const { metadata } = parseMarkdownMetadata('featuredImage: img/a.jpg\n\nBody');
    expect(metadata.featuredImage).toBe('img/a.jpg');
  });

  it('lifts the leading heading into the title when metadata has none', () => {
    const { metadata, content } = parseMarkdownMetadata('# Only Title\nParagraph');
    expect(metadata).toEqual({ title: 'Only Title' });
    expect(content).toBe('Paragraph');
  });

  it('treats the whole text as metadata when there is no blank line', () => {
    const { metadata, content } = parseMarkdownMetadata('title: A\ndate: 2024-05-01');
    expect(metadata).toEqual({ title: 'A', date: '2024-05-01' });
    expect(content).toBe('');
  });
});

describe('parseListValue', () => {
  it('parses bracketed lists and strips quotes', () => {
    expect(parseListValue('[Bitcoin, "ETF", \'DeFi\']')).toEqual(['Bitcoin', 'ETF', 'DeFi']);
  });

  it('accepts bare comma lists', () => {
    expect(parseListValue('a, b')).toEqual(['a', 'b']);
  });

  it('returns [] for empty values', () => {
    expect(parseListValue(undefined)).toEqual([]);
    expect(parseListValue('[]')).toEqual([]);
  });
});
