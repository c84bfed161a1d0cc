/**
 * Filename Sanitizer Unit Tests
 */

import { sanitizeFilename } from '../../src/content/filename';

describe('sanitizeFilename', () => {
  it('lowercases and joins words with underscores', () => {
    expect(sanitizeFilename('Bitcoin ETF Inflows: What Next?')).toBe('bitcoin_etf_inflows_what_next_');
  });

  it('strips accents and non-ASCII characters', () => {
    expect(sanitizeFilename('Café Über 🚀 Rally')).toBe('cafe_uber_rally');
  });

  it('collapses runs of separators', () => {
    expect(sanitizeFilename('a -- b__c')).toBe('a_b_c');
  });

  it('caps the length at 100 characters', () => {
    expect(sanitizeFilename('x'.repeat(150))).toHaveLength(100);
  });
});
