/**
 * Artifact Cleaner Unit Tests
 */

import { cleanAiArtifacts } from '../../src/content/artifact-cleaner';

describe('cleanAiArtifacts', () => {
  it('removes markdown links to placeholder domains', () => {
    expect(cleanAiArtifacts('See [the docs](https://example.com/guide) for more.')).toBe('See  for more.');
  });

  it('keeps links to real hosts', () => {
    const text = 'Read [CoinDesk](https://www.coindesk.com/markets) today.';
    expect(cleanAiArtifacts(text)).toBe(text);
  });

  it('removes bracketed placeholders but keeps image alt text', () => {
    expect(cleanAiArtifacts('[Insert chart here]\nBitcoin rallied.')).toBe('Bitcoin rallied.');
    expect(cleanAiArtifacts('![Chart](chart.jpg)')).toBe('![Chart](chart.jpg)');
  });

  it('removes handles but keeps @ path segments in URLs', () => {
    expect(cleanAiArtifacts('Follow @cryptoguy for updates')).toBe('Follow for updates');
    expect(cleanAiArtifacts('Watch https://youtube.com/@channel now')).toBe('Watch https://youtube.com/@channel now');
  });

  it('removes bare placeholder URLs without touching similar real domains', () => {
    expect(cleanAiArtifacts('Visit yourcryptoblog.com/2024/post for details')).toBe('Visit  for details');
    expect(cleanAiArtifacts('Visit mysite.com today')).toBe('Visit mysite.com today');
  });

  it('drops leftover instructions and comments', () => {
    expect(cleanAiArtifacts('Bitcoin rose.\nNote: add a chart\nEnd.')).toBe('Bitcoin rose.\n\nEnd.');
    expect(cleanAiArtifacts('A<!-- hidden -->B')).toBe('AB');
    expect(cleanAiArtifacts('A/* draft */B')).toBe('AB');
  });

  it('normalizes line endings and collapses blank lines', () => {
    expect(cleanAiArtifacts('a\r\nb')).toBe('a\nb');
    expect(cleanAiArtifacts('a\n\n\n\nb')).toBe('a\n\nb');
    expect(cleanAiArtifacts('  a  \n   \n   \n  b  ')).toBe('a\n\nb');
  });

  it('returns an empty string for empty input', () => {
    expect(cleanAiArtifacts('')).toBe('');
  });
});
