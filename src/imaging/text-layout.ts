// Title overlay layout
// Wraps the post title and renders it as a right-aligned SVG block with a drop shadow

export interface TitleOverlayOptions {
  canvasWidth: number;
  canvasHeight: number;
  fontSize: number;
  lineHeight: number;
  padding: number;
  /** Highest allowed top edge of the text block */
  minTop: number;
  fontFamily: string;
}

// Average advance of a bold sans-serif glyph, as a fraction of the font size
const AVERAGE_GLYPH_WIDTH = 0.6;
const ASCENT = 0.8;
const SHADOW_OFFSET = 2;
const SHADOW_OPACITY = 180 / 255;

export function estimateTextWidth(text: string, fontSize: number): number {
  return text.length * fontSize * AVERAGE_GLYPH_WIDTH;
}

/**
 * Greedy word wrap. A single word wider than `maxWidth` gets a line to itself.
 */
export function wrapText(
  text: string,
  maxWidth: number,
  measure: (line: string) => number
): string[] {
  const words = text.split(/\s+/).filter(Boolean);
  const lines: string[] = [];
  let current = '';

  for (const word of words) {
    const candidate = current ? `${current} ${word}` : word;
    if (!current || measure(candidate) <= maxWidth) {
      current = candidate;
    } else {
      lines.push(current);
      current = word;
    }
  }
  if (current) lines.push(current);
  return lines;
}

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/**
 * Top edge of the text block: bottom-aligned above the padding, never above `minTop`.
 */
export function titleBlockTop(lineCount: number, options: TitleOverlayOptions): number {
  const blockHeight = lineCount * options.lineHeight;
  return Math.max(options.canvasHeight - options.padding - blockHeight, options.minTop);
}

export function buildTitleOverlaySvg(lines: string[], options: TitleOverlayOptions): string {
  const top = titleBlockTop(lines.length, options);
  const x = options.canvasWidth - options.padding;
  const fontFamily = escapeXml(options.fontFamily);

  const textLines = lines
    .map((line, i) => {
      const baseline = top + i * options.lineHeight + Math.round(options.fontSize * ASCENT);
      const content = escapeXml(line);
      return [
        `<text x="${x + SHADOW_OFFSET}" y="${baseline + SHADOW_OFFSET}" fill="#000000" fill-opacity="${SHADOW_OPACITY.toFixed(3)}">${content}</text>`,
        `<text x="${x}" y="${baseline}" fill="#ffffff">${content}</text>`,
      ].join('');
    })
    .join('');

  return (
    `<svg xmlns="http://www.w3.org/2000/svg" width="${options.canvasWidth}" height="${options.canvasHeight}">` +
    `<g font-family="${fontFamily}" font-size="${options.fontSize}" font-weight="bold" text-anchor="end">` +
    textLines +
    `</g></svg>`
  );
}

export function buildGradientSvg(width: number, height: number, maxOpacity: number): string {
  return (
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}">` +
    `<defs><linearGradient id="fade" x1="0" y1="0" x2="0" y2="1">` +
    `<stop offset="0" stop-color="#000000" stop-opacity="0"/>` +
    `<stop offset="1" stop-color="#000000" stop-opacity="${maxOpacity}"/>` +
    `</linearGradient></defs>` +
    `<rect x="0" y="0" width="${width}" height="${height}" fill="url(#fade)"/>` +
    `</svg>`
  );
}
