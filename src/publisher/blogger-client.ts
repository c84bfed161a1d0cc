// Blogger Client - Publishes rendered posts through the Blogger v3 API

import axios from 'axios';
import logger from '../shared/logger';
import { safeErrorMessage } from '../shared/errors';
import { BloggerPostInput, PublishResult } from '../shared/types';
import googleOAuth, { GoogleOAuth } from './google-oauth';

const BLOGGER_API = 'https://www.googleapis.com/blogger/v3';

interface BloggerPostResponse {
  id?: string;
  url?: string;
  labels?: string[];
}

function sameLabels(sent: string[], received: string[]): boolean {
  const a = new Set(sent.map(l => l.toLowerCase()));
  const b = new Set(received.map(l => l.toLowerCase()));
  return a.size === b.size && Array.from(a).every(l => b.has(l));
}

function describeFailure(error: unknown): { details: string; hint: string | null } {
  const details = axios.isAxiosError(error)
    ? JSON.stringify(error.response?.data ?? {})
    : '';
  const haystack = `${details} ${error instanceof Error ? error.message : String(error)}`;

  let hint: string | null = null;
  if (haystack.includes('rateLimitExceeded')) {
    hint = 'Blogger API rate limit exceeded. Consider reducing posting frequency.';
  } else if (/user lacks permission|insufficient permission/i.test(haystack)) {
    hint = 'The authenticated Google account needs Author or Admin rights on the target blog.';
  }
  return { details, hint };
}

export class BloggerClient {
  constructor(private readonly auth: GoogleOAuth = googleOAuth) {}

  async isAuthenticated(): Promise<boolean> {
    return (await this.auth.getAccessToken()) !== null;
  }

  /**
   * Insert a LIVE post. Never throws; failures come back as `{ success: false }`.
   */
  async insertPost(blogId: string, post: BloggerPostInput): Promise<PublishResult> {
    const accessToken = await this.auth.getAccessToken();
    if (!accessToken) {
      logger.error('[Blogger] Credentials are not valid, cannot publish');
      return { success: false, error: 'NOT_AUTHENTICATED' };
    }

    logger.info(`[Blogger] Publishing "${post.title}" (${post.content.length} chars) with labels: ${post.labels.join(', ')}`);

    try {
      const response = await axios.post<BloggerPostResponse>(
        `${BLOGGER_API}/blogs/${encodeURIComponent(blogId)}/posts/`,
        {
          kind: 'blogger#post',
          blog: { id: blogId },
          title: post.title,
          content: post.content,
          labels: post.labels,
          status: 'LIVE',
        },
        {
          params: { isDraft: false },
          headers: {
            Authorization: `Bearer ${accessToken}`,
            'Content-Type': 'application/json',
          },
          timeout: 60000,
        }
      );

      const created = response.data;
      const responseLabels = created.labels ?? [];
      logger.info(`[Blogger] Published "${post.title}" - Post ID: ${created.id ?? 'unknown'}`);
      logger.info(`[Blogger] View live at: ${created.url ?? 'unknown'}`);

      if (responseLabels.length === 0) {
        logger.warn('[Blogger] Response carried no labels; they may not have been applied');
      } else if (!sameLabels(post.labels, responseLabels)) {
        logger.warn(`[Blogger] Labels mismatch. Sent: ${post.labels.join(', ')} Received: ${responseLabels.join(', ')}`);
      }

      return { success: true, postId: created.id, url: created.url, labels: responseLabels };
    } catch (error) {
      const { details, hint } = describeFailure(error);
      logger.error(`[Blogger] Failed to publish "${post.title}": ${safeErrorMessage(error)}`);
      if (details) logger.error(`[Blogger] Error details: ${details}`);
      if (hint) logger.error(`[Blogger] ${hint}`);
      return { success: false, error: safeErrorMessage(error) };
    }
  }
}

const bloggerClient = new BloggerClient();
export default bloggerClient;
