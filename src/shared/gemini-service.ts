// Gemini Service - Wrapper for the Google Generative Language REST API
// Used for topic extraction, article relevance, SEO research and post writing

import axios from 'axios';
import configManager from './config';
import logger from './logger';
import { GeminiError, isTransientHttpError, safeErrorMessage } from './errors';
import { withRetry, sleep } from './retry';

interface GeminiPart {
    text?: string;
}

interface GeminiResponse {
    candidates?: {
        content?: { parts?: GeminiPart[] };
        finishReason?: string;
    }[];
    promptFeedback?: { blockReason?: string };
}

export interface GenerateOptions {
    model?: string;
    temperature?: number;
    maxOutputTokens?: number;
    /** Label used in retry logs */
    purpose?: string;
}

/**
 * Gemini text generation with exponential backoff.
 * Empty or blocked responses count as failures and are retried like transport errors.
 */
export class GeminiService {
    private sleepFn: (ms: number) => Promise<void> = sleep;

    canUseService(): boolean {
        const apiKey = configManager.getSection('gemini').apiKey;
        return !!apiKey && apiKey.length > 0 && apiKey !== 'your-api-key-here';
    }

    /**
     * Swap the delay implementation (tests run the retry loop without waiting).
     */
    setSleep(fn: (ms: number) => Promise<void>): void {
        this.sleepFn = fn;
    }

    async generateText(prompt: string, options: GenerateOptions = {}): Promise<string> {
        const config = configManager.getSection('gemini');
        if (!this.canUseService()) {
            throw new GeminiError('Gemini API key not configured', 'NOT_CONFIGURED');
        }

        const model = options.model || config.contentModel;
        const label = `Gemini:${options.purpose || model}`;

        return withRetry(() => this.callAPI(prompt, model, options), {
            maxRetries: config.maxRetries,
            initialDelayMs: config.initialRetryDelayMs,
            maxJitterMs: 2000,
            label,
            isRetryable: (error) => {
                if (error instanceof GeminiError) return error.code === 'EMPTY_RESPONSE';
                return isTransientHttpError(error);
            },
            sleep: this.sleepFn,
        }).catch((error: unknown) => {
            logger.error(`[Gemini] ${options.purpose || 'generation'} failed after retries: ${safeErrorMessage(error)}`);
            throw error;
        });
    }

    private async callAPI(prompt: string, model: string, options: GenerateOptions): Promise<string> {
        const config = configManager.getSection('gemini');
        const generationConfig: Record<string, number> = {};
        if (options.temperature !== undefined) generationConfig.temperature = options.temperature;
        if (options.maxOutputTokens !== undefined) generationConfig.maxOutputTokens = options.maxOutputTokens;

        const response = await axios.post<GeminiResponse>(
            `${config.baseUrl}/models/${encodeURIComponent(model)}:generateContent`,
            {
                contents: [{ role: 'user', parts: [{ text: prompt }] }],
                ...(Object.keys(generationConfig).length > 0 ? { generationConfig } : {}),
            },
            {
                headers: {
                    'x-goog-api-key': config.apiKey,
                    'Content-Type': 'application/json',
                },
                timeout: config.timeout,
            }
        );

        const text = extractText(response.data);
        if (!text.trim()) {
            const blockReason = response.data.promptFeedback?.blockReason;
            throw new GeminiError(
                blockReason ? `Empty response (blocked: ${blockReason})` : 'Empty response from model',
                'EMPTY_RESPONSE'
            );
        }
        return text;
    }
}

export function extractText(data: GeminiResponse): string {
    const parts = data.candidates?.[0]?.content?.parts ?? [];
    return parts.map(part => part.text ?? '').join('');
}

const geminiService = new GeminiService();
export default geminiService;
