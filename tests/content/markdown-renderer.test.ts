/**
 * Markdown Renderer Unit Tests
 */

import { markdownToHtml } from '../../src/content/markdown-renderer';

describe('markdownToHtml', () => {
  it('renders headings, paragraphs and bold text', () => {
    expect(markdownToHtml('## Market Update\n\nBitcoin is **up** today.')).toBe(
      '<h2>Market Update</h2>\n\n<p>Bitcoin is <strong>up</strong> today.</p>'
    );
  });

  it('demotes h1 to h2', () => {
    expect(markdownToHtml('# Title')).toBe('<h2>Title</h2>');
  });

  it('does not treat hashtags as headings', () => {
    expect(markdownToHtml('#bitcoin trends')).toBe('<p>#bitcoin trends</p>');
  });

  it('builds unordered and ordered lists', () => {
    const markdown = '- one\n- two\n\n- three\n\n1. first\n2. second';
    expect(markdownToHtml(markdown)).toBe(
      '<ul>\n<li>one</li>\n<li>two</li>\n<li>three</li>\n</ul>\n\n<ol>\n<li>first</li>\n<li>second</li>\n</ol>'
    );
  });

  it('renders links that open in a new tab', () => {
    expect(markdownToHtml('Read [CoinDesk](https://www.coindesk.com/markets) now.')).toBe(
      '<p>Read <a href="https://www.coindesk.com/markets" target="_blank" rel="noopener noreferrer">CoinDesk</a> now.</p>'
    );
  });

  it('inlines the featured image by file name', () => {
    const featured = { filePath: '/tmp/out/btc_123.jpg', dataUri: 'data:image/jpeg;base64,AAA' };
    expect(markdownToHtml('![Chart](images/btc_123.jpg)', featured)).toBe(
      '<img src="data:image/jpeg;base64,AAA" alt="Chart" class="in-content-image">'
    );
  });

  it('keeps other images as they are', () => {
    expect(markdownToHtml('![Chart](https://cdn.test/other.png)')).toBe(
      '<img src="https://cdn.test/other.png" alt="Chart" class="in-content-image">'
    );
  });

  it('renders italics with asterisks and underscores', () => {
    expect(markdownToHtml('This is *very* _notable_ news')).toBe('<p>This is <em>very</em> <em>notable</em> news</p>');
  });

  it('joins wrapped lines into one paragraph', () => {
    expect(markdownToHtml('First line\nsecond line')).toBe('<p>First line second line</p>');
  });

  it('cleans artifacts before rendering', () => {
    expect(markdownToHtml('[Insert image]\n\nText')).toBe('<p>Text</p>');
  });

  it('returns an empty string for empty input', () => {
    expect(markdownToHtml('')).toBe('');
  });
});
