// Featured Image Compositor
// Trims, crops and enhances a generated image, then brands it with a gradient, logo and title

import fs from 'fs';
import path from 'path';
import sharp from 'sharp';
import configManager from '../shared/config';
import logger from '../shared/logger';
import { safeErrorMessage } from '../shared/errors';
import { FeaturedImage } from '../shared/types';
import { findContentBounds } from './border-trim';
import {
  buildGradientSvg,
  buildTitleOverlaySvg,
  estimateTextWidth,
  wrapText,
} from './text-layout';

export const CONTENT_WIDTH = 1200;
export const CONTENT_HEIGHT = 675;
export const EXTENSION_HEIGHT = Math.floor(CONTENT_HEIGHT * 0.25);
export const CANVAS_HEIGHT = CONTENT_HEIGHT + EXTENSION_HEIGHT;

const STRIP_HEIGHT = Math.floor(CONTENT_HEIGHT * 0.05);
const GRADIENT_MAX_OPACITY = 0.95;
const LOGO_HEIGHT = Math.floor(CONTENT_HEIGHT * 0.08);
const PADDING = Math.floor(CONTENT_WIDTH * 0.02);
const FONT_SIZE = Math.max(Math.floor(CONTENT_HEIGHT * 0.035), 20);
const LINE_HEIGHT = FONT_SIZE + Math.floor(FONT_SIZE * 0.2);
const TEXT_MAX_WIDTH = Math.floor(CONTENT_WIDTH * 0.45);
const JPEG_QUALITY = 85;

export interface ComposeOptions {
  outputDir: string;
  logoPath?: string;
  fontFamily?: string;
  now?: Date;
}

/**
 * Flatten onto white and cut uniform black/white borders.
 */
async function trimBorders(input: Buffer): Promise<Buffer> {
  const flattened = await sharp(input)
    .flatten({ background: { r: 255, g: 255, b: 255 } })
    .removeAlpha()
    .png()
    .toBuffer();

  const { data, info } = await sharp(flattened).raw().toBuffer({ resolveWithObject: true });
  const bounds = findContentBounds({ data, width: info.width, height: info.height, channels: info.channels });
  if (!bounds) return flattened;

  logger.info(
    `[ImageCompositor] Trimmed borders: ${info.width}x${info.height} -> ${bounds.width}x${bounds.height}`
  );
  return sharp(flattened).extract(bounds).png().toBuffer();
}

/**
 * Cover-crop to 16:9 and apply sharpen / contrast / saturation boosts.
 */
async function fitAndEnhance(input: Buffer): Promise<Buffer> {
  const contrast = 1.1;
  return sharp(input)
    .resize(CONTENT_WIDTH, CONTENT_HEIGHT, { fit: 'cover', position: 'centre', kernel: 'lanczos3' })
    .sharpen({ sigma: 1 })
    .linear(contrast, 128 * (1 - contrast))
    .modulate({ saturation: 1.05 })
    .png()
    .toBuffer();
}

async function buildExtension(content: Buffer): Promise<Buffer> {
  return sharp(content)
    .extract({ left: 0, top: CONTENT_HEIGHT - STRIP_HEIGHT, width: CONTENT_WIDTH, height: STRIP_HEIGHT })
    .resize(CONTENT_WIDTH, EXTENSION_HEIGHT, { fit: 'fill', kernel: 'cubic' })
    .png()
    .toBuffer();
}

async function loadLogo(logoPath: string | undefined): Promise<{ input: Buffer; width: number } | null> {
  if (!logoPath) return null;
  if (!fs.existsSync(logoPath)) {
    logger.warn(`[ImageCompositor] Logo not found at ${logoPath}, skipping branding`);
    return null;
  }

  try {
    const { data, info } = await sharp(logoPath)
      .resize({ height: LOGO_HEIGHT })
      .png()
      .toBuffer({ resolveWithObject: true });
    return { input: data, width: info.width };
  } catch (error) {
    logger.warn(`[ImageCompositor] Could not load logo ${logoPath}, skipping branding: ${safeErrorMessage(error)}`);
    return null;
  }
}

export async function composeFeaturedImageBuffer(
  input: Buffer,
  title: string,
  options: Pick<ComposeOptions, 'logoPath' | 'fontFamily'> = {}
): Promise<Buffer> {
  const trimmed = await trimBorders(input);
  const content = await fitAndEnhance(trimmed);
  const extension = await buildExtension(content);
  const logo = await loadLogo(options.logoPath);

  const lines = wrapText(title, TEXT_MAX_WIDTH, line => estimateTextWidth(line, FONT_SIZE));
  const titleSvg = buildTitleOverlaySvg(lines, {
    canvasWidth: CONTENT_WIDTH,
    canvasHeight: CANVAS_HEIGHT,
    fontSize: FONT_SIZE,
    lineHeight: LINE_HEIGHT,
    padding: PADDING,
    minTop: CONTENT_HEIGHT + PADDING,
    fontFamily: options.fontFamily || configManager.getSection('output').fontFamily,
  });

  const layers: sharp.OverlayOptions[] = [
    { input: content, top: 0, left: 0 },
    { input: extension, top: CONTENT_HEIGHT, left: 0 },
    {
      input: Buffer.from(buildGradientSvg(CONTENT_WIDTH, EXTENSION_HEIGHT, GRADIENT_MAX_OPACITY)),
      top: CONTENT_HEIGHT,
      left: 0,
    },
  ];
  if (logo) {
    layers.push({ input: logo.input, top: PADDING, left: CONTENT_WIDTH - logo.width - PADDING });
  }
  if (lines.length > 0) {
    layers.push({ input: Buffer.from(titleSvg), top: 0, left: 0 });
  }

  return sharp({
    create: {
      width: CONTENT_WIDTH,
      height: CANVAS_HEIGHT,
      channels: 3,
      background: { r: 0, g: 0, b: 0 },
    },
  })
    .composite(layers)
    .jpeg({ quality: JPEG_QUALITY })
    .toBuffer();
}

/**
 * Compose and save the featured image. Returns null (never throws) when the
 * bytes cannot be processed or written.
 */
export async function composeFeaturedImage(
  input: Buffer | null,
  title: string,
  safeName: string,
  options: ComposeOptions
): Promise<FeaturedImage | null> {
  if (!input || input.length === 0) {
    logger.info('[ImageCompositor] No image bytes provided, skipping');
    return null;
  }

  try {
    logger.info(`[ImageCompositor] Processing image for: ${title.slice(0, 70)}`);
    const jpeg = await composeFeaturedImageBuffer(input, title, options);

    fs.mkdirSync(options.outputDir, { recursive: true });
    const timestamp = Math.floor((options.now ?? new Date()).getTime() / 1000);
    const filePath = path.join(options.outputDir, `${safeName}_${timestamp}.jpg`);
    fs.writeFileSync(filePath, jpeg);

    logger.info(`[ImageCompositor] Saved featured image to ${filePath}`);
    return {
      filePath,
      dataUri: `data:image/jpeg;base64,${jpeg.toString('base64')}`,
    };
  } catch (error) {
    logger.error(`[ImageCompositor] Failed to process image: ${safeErrorMessage(error)}`);
    return null;
  }
}
