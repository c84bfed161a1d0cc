/**
 * Featured Image Compositor Tests
 */

jest.mock('../../src/shared/logger', () => ({
  info: jest.fn(),
  debug: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
}));

import fs from 'fs';
import os from 'os';
import path from 'path';
import sharp from 'sharp';
import {
  CANVAS_HEIGHT,
  CONTENT_HEIGHT,
  CONTENT_WIDTH,
  composeFeaturedImage,
  composeFeaturedImageBuffer,
} from '../../src/imaging/image-compositor';

interface Pixel {
  r: number;
  g: number;
  b: number;
}

async function readPixels(jpeg: Buffer): Promise<(x: number, y: number) => Pixel> {
  const { data, info } = await sharp(jpeg).raw().toBuffer({ resolveWithObject: true });
  return (x, y) => {
    const offset = (y * info.width + x) * info.channels;
    return { r: data[offset], g: data[offset + 1], b: data[offset + 2] };
  };
}

describe('composeFeaturedImage', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'blog-images-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  async function sampleImage(): Promise<Buffer> {
    return sharp({ create: { width: 64, height: 36, channels: 3, background: { r: 200, g: 40, b: 40 } } })
      .png()
      .toBuffer();
  }

  it('writes a branded 1200x843 JPEG', async () => {
    const image = await composeFeaturedImage(await sampleImage(), 'BTC Rally', 'btc_rally', {
      outputDir: path.join(dir, 'crypto'),
      now: new Date(1_700_000_000_000),
    });

    expect(image?.filePath).toBe(path.join(dir, 'crypto', 'btc_rally_1700000000.jpg'));
    expect(image?.dataUri.startsWith('data:image/jpeg;base64,')).toBe(true);

    const metadata = await sharp(fs.readFileSync(path.join(dir, 'crypto', 'btc_rally_1700000000.jpg'))).metadata();
    expect(metadata.format).toBe('jpeg');
    expect(metadata.width).toBe(CONTENT_WIDTH);
    expect(metadata.height).toBe(CANVAS_HEIGHT);
    expect(CANVAS_HEIGHT).toBe(843);
  });

  it('returns null without image bytes', async () => {
    await expect(composeFeaturedImage(null, 'BTC', 'btc', { outputDir: dir })).resolves.toBeNull();
  });

  it('returns null for bytes that are not an image', async () => {
    await expect(
      composeFeaturedImage(Buffer.from('not an image'), 'BTC', 'btc', { outputDir: dir })
    ).resolves.toBeNull();
    expect(fs.readdirSync(dir)).toEqual([]);
  });

  it('darkens the extension towards the bottom edge', async () => {
    const pixelAt = await readPixels(await composeFeaturedImageBuffer(await sampleImage(), ''));

    expect(pixelAt(900, CONTENT_HEIGHT).r).toBeGreaterThan(150);
    expect(pixelAt(900, CANVAS_HEIGHT - 1).r).toBeLessThan(40);
  });

  it('trims a letterbox band before cropping', async () => {
    // 8 black rows above a 64x36 red picture
    const letterboxed = await sharp({
      create: { width: 64, height: 44, channels: 3, background: { r: 200, g: 40, b: 40 } },
    })
      .composite([
        {
          input: await sharp({
            create: { width: 64, height: 8, channels: 3, background: { r: 0, g: 0, b: 0 } },
          })
            .png()
            .toBuffer(),
          top: 0,
          left: 0,
        },
      ])
      .png()
      .toBuffer();

    const pixelAt = await readPixels(await composeFeaturedImageBuffer(letterboxed, ''));

    expect(pixelAt(600, 10).r).toBeGreaterThan(150);
    expect(pixelAt(600, 60).r).toBeGreaterThan(150);
  });

  it('places the logo in the top-right corner', async () => {
    const logoPath = path.join(dir, 'logo.png');
    await sharp({ create: { width: 20, height: 20, channels: 3, background: { r: 0, g: 0, b: 255 } } })
      .png()
      .toFile(logoPath);

    const pixelAt = await readPixels(await composeFeaturedImageBuffer(await sampleImage(), '', { logoPath }));

    // 54px logo at left 1122, top 24
    const logo = pixelAt(1149, 51);
    expect(logo.b).toBeGreaterThan(200);
    expect(logo.r).toBeLessThan(60);
    const below = pixelAt(1149, 100);
    expect(below.r).toBeGreaterThan(150);
    expect(below.b).toBeLessThan(60);
  });

  it('skips a logo file that cannot be decoded', async () => {
    const logoPath = path.join(dir, 'logo.png');
    fs.writeFileSync(logoPath, 'not a png');

    const image = await composeFeaturedImage(await sampleImage(), 'BTC', 'btc', {
      outputDir: path.join(dir, 'out'),
      logoPath,
      now: new Date(1_700_000_000_000),
    });

    expect(image?.filePath).toBe(path.join(dir, 'out', 'btc_1700000000.jpg'));
    const pixelAt = await readPixels(fs.readFileSync(path.join(dir, 'out', 'btc_1700000000.jpg')));
    expect(pixelAt(1149, 51).r).toBeGreaterThan(150);
  });
});
