// Together AI Image Service
// Generates featured images with FLUX through the Together images endpoint

import axios from 'axios';
import configManager from './config';
import logger from './logger';
import { ImageGenerationError, safeErrorMessage } from './errors';
import { withRetry, sleep } from './retry';

interface TogetherImageResponse {
  data?: { url?: string; b64_json?: string }[];
}

const IMAGE_WIDTH = 1024;
const IMAGE_HEIGHT = 576;
const DOWNLOAD_TIMEOUT_MS = 30000;

export function buildImagePrompt(topic: string): string {
  return `A futuristic representation of ${topic} in the world of cryptocurrency, digital art style, high contrast, vibrant colors, blockchain background, intricate details, concept art, 8k`;
}

export class TogetherImageService {
  private sleepFn: (ms: number) => Promise<void> = sleep;

  canUseService(): boolean {
    return !!configManager.getSection('together').apiKey;
  }

  setSleep(fn: (ms: number) => Promise<void>): void {
    this.sleepFn = fn;
  }

  /**
   * Generate one 16:9 image and return its raw bytes, or null when every attempt fails.
   */
  async generateImage(prompt: string): Promise<Buffer | null> {
    if (!this.canUseService()) {
      logger.warn('[Together] API key not configured, skipping image generation');
      return null;
    }

    logger.info(`[Together] Generating image: ${prompt.slice(0, 80)}...`);

    try {
      return await withRetry(() => this.requestImage(prompt), {
        maxRetries: 3,
        initialDelayMs: 5000,
        maxJitterMs: 2000,
        label: 'Together',
        // A malformed payload will not fix itself on retry
        isRetryable: error => !(error instanceof ImageGenerationError),
        sleep: this.sleepFn,
      });
    } catch (error) {
      logger.error(`[Together] Image generation failed: ${safeErrorMessage(error)}`);
      return null;
    }
  }

  private async requestImage(prompt: string): Promise<Buffer> {
    const config = configManager.getSection('together');
    const response = await axios.post<TogetherImageResponse>(
      `${config.baseUrl}/images/generations`,
      {
        model: config.model,
        prompt: `${prompt} --ar 16:9`,
        n: 1,
        width: IMAGE_WIDTH,
        height: IMAGE_HEIGHT,
      },
      {
        headers: {
          Authorization: `Bearer ${config.apiKey}`,
          'Content-Type': 'application/json',
        },
        timeout: config.timeout,
      }
    );

    const image = response.data?.data?.[0];
    if (image?.b64_json) {
      return Buffer.from(image.b64_json, 'base64');
    }
    if (!image?.url) {
      throw new ImageGenerationError('Response did not contain an image URL', 'INVALID_RESPONSE');
    }

    logger.info(`[Together] Image generated, downloading from ${image.url}`);
    const download = await axios.get<ArrayBuffer>(image.url, {
      responseType: 'arraybuffer',
      timeout: DOWNLOAD_TIMEOUT_MS,
    });
    return Buffer.from(download.data);
  }
}

const togetherService = new TogetherImageService();
export default togetherService;
