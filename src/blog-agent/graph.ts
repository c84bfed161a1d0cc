// Blog Agent Orchestrator
// Coordinates the blog pipeline: fetch, topic selection, then one post per topic

import { BlogAgentState, BlogCycleOptions, TopicDraft, createInitialBlogState, createTopicDraft } from './state';
import {
  fetchNode,
  topicNode,
  filterNode,
  imageNode,
  researchNode,
  contentNode,
  renderNode,
  publishNode,
  cleanupNode,
} from './nodes';
import { FALLBACK_TOPIC } from '../content/topics';
import postStore, { PostStore } from '../data/post-store';
import configManager from '../shared/config';
import logger from '../shared/logger';
import circuitBreaker from '../shared/circuit-breaker';
import { sleep } from '../shared/retry';
import { PostStatus } from '../shared/types';

export { BlogAgentState, BlogCycleOptions, TopicDraft, createInitialBlogState };

/**
 * Blog Orchestrator - sequential post pipeline with per-node circuit breakers.
 * A failing topic is recorded and skipped; the remaining topics still run.
 */
export class BlogOrchestrator {
  private consecutiveErrors: number = 0;
  private maxConsecutiveErrors: number = 5;

  constructor(
    private readonly store: PostStore = postStore,
    private readonly wait: (ms: number) => Promise<void> = sleep
  ) {}

  /**
   * Execute one full blog cycle
   */
  async invoke(initialState: BlogAgentState): Promise<BlogAgentState> {
    if (circuitBreaker.isBlocking('blog-execution')) {
      logger.warn('[BlogOrchestrator] Execution circuit breaker is OPEN, skipping cycle');
      return {
        ...initialState,
        currentStep: 'SKIPPED_CIRCUIT_BREAKER',
        thoughts: [...initialState.thoughts, 'Cycle skipped: Execution circuit breaker is open'],
        errors: [...initialState.errors, 'Execution circuit breaker is open'],
      };
    }

    let state = { ...initialState };

    try {
      logger.info(`[BlogOrchestrator] Starting blog cycle ${state.cycleId}`);
      logger.info(
        `[BlogOrchestrator] Query: "${state.query}", category: ${state.category}, posts: ${state.postsRequested}` +
        (state.dryRun ? ' (dry run)' : '')
      );

      // Step 1: Fetch articles
      state = { ...state, ...await this.safeExecute('fetch', () => fetchNode(state), () => this.getFallbackResult('fetch')) };

      if (state.articles.length === 0) {
        logger.warn('[BlogOrchestrator] No articles found, ending cycle');
        return {
          ...state,
          currentStep: 'NO_ARTICLES_FOUND',
          thoughts: [...state.thoughts, 'No articles returned by NewsAPI'],
        };
      }

      // Step 2: Trending topics
      state = { ...state, ...await this.safeExecute('topics', () => topicNode(state), () => this.getFallbackResult('topics')) };
      state.stats = { ...state.stats, topics: state.topics.length };

      // Step 3: One post per topic, in sequence
      for (let i = 0; i < state.topics.length; i++) {
        const draft = await this.processTopic(state, createTopicDraft(state.topics[i], i));
        state = this.applyDraft(state, draft);

        if (i < state.topics.length - 1) {
          const delay = configManager.getSection('pipeline').delayBetweenPostsMs;
          if (delay > 0) {
            logger.info(`[BlogOrchestrator] Waiting ${Math.round(delay / 1000)}s before the next post`);
            await this.wait(delay);
          }
        }
      }

      // Step 4: Cleanup and stats
      state = { ...state, ...await this.safeExecute('cleanup', () => cleanupNode(state)) };

      this.consecutiveErrors = 0;
      if (circuitBreaker.getBreakerStatus('blog-execution')?.isOpen) {
        // Half-open trial cycle succeeded
        circuitBreaker.resetBreaker('blog-execution');
      }

      return state;
    } catch (error) {
      this.consecutiveErrors++;
      logger.error('[BlogOrchestrator] Cycle failed:', error);

      const errorMsg = error instanceof Error ? error.message : String(error);

      if (this.consecutiveErrors >= this.maxConsecutiveErrors) {
        circuitBreaker.openBreaker('blog-execution');
        logger.error(`[BlogOrchestrator] Opened execution circuit breaker after ${this.consecutiveErrors} consecutive errors`);
      }

      return {
        ...state,
        errors: [...state.errors, `Orchestrator error: ${errorMsg}`],
        currentStep: 'ERROR',
        thoughts: [
          ...state.thoughts,
          `Cycle failed with error: ${errorMsg}`,
          `Consecutive errors: ${this.consecutiveErrors}/${this.maxConsecutiveErrors}`,
        ],
      };
    }
  }

  /**
   * Run one topic through filter, image, research, content, render and publish.
   */
  private async processTopic(state: BlogAgentState, initial: TopicDraft): Promise<TopicDraft> {
    let draft = initial;
    const label = `[${draft.index + 1}/${state.topics.length}] "${draft.topic}"`;
    logger.info(`[BlogOrchestrator] Processing topic ${label}`);

    const windowHours = configManager.getSection('pipeline').recentTopicWindowHours;
    if (draft.topic !== FALLBACK_TOPIC && this.isRecentlyPublished(draft.topic, windowHours)) {
      logger.info(`[BlogOrchestrator] ${label} was published in the last ${windowHours}h, skipping`);
      return { ...draft, status: 'SKIPPED' };
    }

    draft = { ...draft, ...await this.safeExecute('filter', () => filterNode(state, draft), () => this.getDraftFallback('filter')) };
    if (!draft.aggregate) {
      logger.warn(`[BlogOrchestrator] ${label} has no source material, skipping`);
      return { ...draft, status: 'SKIPPED' };
    }

    draft = { ...draft, ...await this.safeExecute('image', () => imageNode(state, draft), () => this.getDraftFallback('image')) };

    draft = { ...draft, ...await this.safeExecute('research', () => researchNode(state, draft), () => this.getDraftFallback('research')) };
    if (!draft.research) {
      logger.error(`[BlogOrchestrator] ${label} research failed, skipping topic`);
      return this.finishDraft(state, { ...draft, status: 'FAILED' });
    }

    draft = { ...draft, ...await this.safeExecute('content', () => contentNode(state, draft), () => this.getDraftFallback('content')) };
    if (!draft.markdown) {
      logger.error(`[BlogOrchestrator] ${label} has no content, skipping topic`);
      return this.finishDraft(state, { ...draft, status: 'FAILED' });
    }

    draft = { ...draft, ...await this.safeExecute('render', () => renderNode(state, draft), () => this.getDraftFallback('render')) };
    if (!draft.document || !draft.htmlPath) {
      logger.error(`[BlogOrchestrator] ${label} could not be rendered, skipping topic`);
      return this.finishDraft(state, { ...draft, status: 'FAILED' });
    }

    draft = { ...draft, ...await this.safeExecute('publish', () => publishNode(state, draft), () => this.getDraftFallback('publish')) };

    let status: PostStatus = 'SAVED';
    if (draft.publish) {
      status = draft.publish.success ? 'PUBLISHED' : 'FAILED';
    }
    return this.finishDraft(state, { ...draft, status });
  }

  /**
   * Post history lookup. A store failure is logged and the topic is processed anyway.
   */
  private isRecentlyPublished(topic: string, windowHours: number): boolean {
    try {
      return this.store.wasRecentlyPublished(topic, windowHours);
    } catch (error) {
      logger.error(`[BlogOrchestrator] Could not read post history for "${topic}":`, error);
      return false;
    }
  }

  /**
   * Record the outcome in the post history. A store failure is logged, never fatal.
   */
  private finishDraft(state: BlogAgentState, draft: TopicDraft): TopicDraft {
    if (draft.status === 'PENDING' || draft.status === 'SKIPPED') return draft;

    try {
      this.store.record({
        cycleId: state.cycleId,
        topic: draft.topic,
        title: draft.document?.title ?? null,
        htmlPath: draft.htmlPath,
        imagePath: draft.image?.filePath ?? null,
        status: draft.status,
        bloggerPostId: draft.publish?.postId ?? null,
        bloggerUrl: draft.publish?.url ?? null,
        labels: draft.labels,
        error: draft.errors.length > 0 ? draft.errors.join('; ') : null,
      });
    } catch (error) {
      logger.error('[BlogOrchestrator] Failed to record post history:', error);
    }
    return draft;
  }

  private applyDraft(state: BlogAgentState, draft: TopicDraft): BlogAgentState {
    const stats = { ...state.stats };
    if (draft.markdown) stats.generated++;
    if (draft.htmlPath) stats.saved++;
    if (draft.status === 'PUBLISHED') stats.published++;
    if (draft.status === 'SKIPPED') stats.skipped++;
    if (draft.status === 'FAILED') stats.failed++;

    const summary = draft.publish?.url
      ? `Published "${draft.topic}" at ${draft.publish.url}`
      : `${draft.status} "${draft.topic}"${draft.htmlPath ? ` (${draft.htmlPath})` : ''}`;

    return {
      ...state,
      currentStep: `TOPIC_${draft.index + 1}_${draft.status}`,
      drafts: [...state.drafts, draft],
      stats,
      errors: [...state.errors, ...draft.errors.map(error => `${draft.topic}: ${error}`)],
      thoughts: [...state.thoughts, summary],
    };
  }

  /**
   * Execute a node with circuit breaker protection and fallback handling
   */
  private async safeExecute<T>(
    nodeName: string,
    fn: () => Promise<T>,
    fallback?: () => T
  ): Promise<T> {
    const breakerName = fallback ? nodeName : 'blog-execution';
    return circuitBreaker.execute(breakerName, fn, fallback);
  }

  /**
   * Get fallback result when a cycle-level node fails
   */
  private getFallbackResult(nodeName: string): Partial<BlogAgentState> {
    logger.warn(`[BlogOrchestrator] Using fallback for ${nodeName}`);

    switch (nodeName) {
      case 'fetch':
        return {
          currentStep: 'FETCH_FALLBACK',
          articles: [],
        };

      case 'topics':
        return {
          currentStep: 'TOPICS_FALLBACK',
          topics: [FALLBACK_TOPIC],
        };

      default:
        return {
          currentStep: `${nodeName.toUpperCase()}_FALLBACK`,
        };
    }
  }

  /**
   * Get fallback result when a per-topic node fails
   */
  private getDraftFallback(nodeName: string): Partial<TopicDraft> {
    logger.warn(`[BlogOrchestrator] Using fallback for ${nodeName}`);

    switch (nodeName) {
      case 'filter':
        return { aggregate: null };

      case 'image':
        return { image: null };

      case 'research':
        return { research: null };

      case 'content':
        return { markdown: null };

      case 'render':
        return { document: null, htmlPath: null };

      case 'publish':
        return { publish: { success: false, error: 'Publish step failed' } };

      default:
        return {};
    }
  }
}

// Singleton instance
const orchestrator = new BlogOrchestrator();

/**
 * Exit code for a finished cycle: 0 ok, 1 some topics failed, 2 nothing could run.
 */
export function cycleExitCode(state: BlogAgentState): 0 | 1 | 2 {
  if (state.currentStep === 'ERROR' || state.currentStep === 'NO_ARTICLES_FOUND' ||
    state.currentStep === 'SKIPPED_CIRCUIT_BREAKER') {
    return 2;
  }
  return state.stats.failed > 0 ? 1 : 0;
}

/**
 * Run a full blog cycle
 */
export async function runBlogCycle(options: BlogCycleOptions = {}): Promise<BlogAgentState> {
  const initialState = createInitialBlogState(options);
  const result = await orchestrator.invoke(initialState);

  const stats = result.stats;
  logger.info(
    `[BlogOrchestrator] Cycle completed. ` +
    `Fetched: ${stats.fetched}, ` +
    `Topics: ${stats.topics}, ` +
    `Generated: ${stats.generated}, ` +
    `Saved: ${stats.saved}, ` +
    `Published: ${stats.published}, ` +
    `Skipped: ${stats.skipped}, ` +
    `Failed: ${stats.failed}`
  );

  return result;
}
