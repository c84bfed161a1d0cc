// Border detection
// Finds letterbox/pillarbox bands of near-black or near-white pixels

export interface RawImage {
  data: Buffer;
  width: number;
  height: number;
  channels: number;
}

export interface ContentBounds {
  left: number;
  top: number;
  width: number;
  height: number;
}

const BORDER_COLORS: ReadonlyArray<readonly [number, number, number]> = [
  [0, 0, 0],
  [255, 255, 255],
];

export const DEFAULT_TOLERANCE = 20;
export const MIN_CONTENT_RATIO = 0.75;

function isBorderPixel(image: RawImage, x: number, y: number, tolerance: number): boolean {
  const offset = (y * image.width + x) * image.channels;
  const r = image.data[offset];
  const g = image.data[offset + 1];
  const b = image.data[offset + 2];
  return BORDER_COLORS.some(
    ([br, bg, bb]) => Math.abs(r - br) <= tolerance && Math.abs(g - bg) <= tolerance && Math.abs(b - bb) <= tolerance
  );
}

function rowIsBorder(image: RawImage, y: number, tolerance: number): boolean {
  for (let x = 0; x < image.width; x++) {
    if (!isBorderPixel(image, x, y, tolerance)) return false;
  }
  return true;
}

function columnIsBorder(image: RawImage, x: number, tolerance: number): boolean {
  for (let y = 0; y < image.height; y++) {
    if (!isBorderPixel(image, x, y, tolerance)) return false;
  }
  return true;
}

/**
 * Bounds of the non-border content, or null when nothing should be trimmed:
 * no border found, or trimming would keep 75% or less of either dimension.
 * Expects at least 3 interleaved channels (RGB order).
 */
export function findContentBounds(image: RawImage, tolerance: number = DEFAULT_TOLERANCE): ContentBounds | null {
  const { width, height } = image;

  let top = 0;
  while (top < height && rowIsBorder(image, top, tolerance)) top++;
  if (top === height) return null; // uniform image

  let bottom = height;
  while (bottom > top + 1 && rowIsBorder(image, bottom - 1, tolerance)) bottom--;

  let left = 0;
  while (left < width && columnIsBorder(image, left, tolerance)) left++;

  let right = width;
  while (right > left + 1 && columnIsBorder(image, right - 1, tolerance)) right--;

  const bounds = { left, top, width: right - left, height: bottom - top };
  if (bounds.left === 0 && bounds.top === 0 && bounds.width === width && bounds.height === height) {
    return null;
  }
  if (bounds.width <= width * MIN_CONTENT_RATIO || bounds.height <= height * MIN_CONTENT_RATIO) {
    return null;
  }
  return bounds;
}
