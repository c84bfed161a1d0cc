// Well-known crypto publishers used as research benchmarks for every post

export const GLOBAL_COMPETITORS = [
  'cointelegraph.com',
  'coindesk.com',
  'decrypt.co',
  'theblockcrypto.com',
  'binance.com/blog',
  'ethereum.org',
  'bitcoin.org',
  'forbes.com/crypto',
  'bloomberg.com/crypto',
  'cryptoslate.com',
  'blockworks.co',
  'investopedia.com/cryptocurrency',
];

export function mergeCompetitors(sourceDomains: string[]): string[] {
  return Array.from(new Set([...GLOBAL_COMPETITORS, ...sourceDomains]));
}
