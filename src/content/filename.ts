// Filename sanitizer
// Turns post titles into portable, lowercase file stems

const MAX_LENGTH = 100;

export function sanitizeFilename(name: string): string {
  const ascii = name
    .normalize('NFKD')
    .replace(/[^\x00-\x7F]/g, '');

  return ascii
    .replace(/[^A-Za-z0-9 _-]/g, '_')
    .trim()
    .replace(/[_ -]+/g, '_')
    .toLowerCase()
    .slice(0, MAX_LENGTH);
}
