// Topic Node
// Picks the trending topics that become this cycle's posts

import { BlogAgentState } from '../state';
import geminiService from '../../shared/gemini-service';
import configManager from '../../shared/config';
import logger from '../../shared/logger';
import { safeErrorMessage } from '../../shared/errors';
import {
  FALLBACK_TOPIC,
  buildArticleDigest,
  buildTopicPrompt,
  parseTopicsResponse,
} from '../../content/topics';

function withTopics(state: BlogAgentState, topics: string[], note: string): Partial<BlogAgentState> {
  return {
    currentStep: 'TOPICS_SELECTED',
    topics,
    stats: { ...state.stats, topics: topics.length },
    thoughts: [...state.thoughts, note],
  };
}

export async function topicNode(state: BlogAgentState): Promise<Partial<BlogAgentState>> {
  const count = state.postsRequested;
  logger.info(`[TopicNode] Extracting ${count} trending topics from ${state.articles.length} articles`);

  if (!geminiService.canUseService()) {
    logger.warn('[TopicNode] Gemini not configured, using fallback topic');
    return withTopics(state, [FALLBACK_TOPIC], 'Topic extraction skipped: no model configured');
  }

  const digest = buildArticleDigest(state.articles);
  if (!digest) {
    logger.warn('[TopicNode] No usable titles or descriptions, using fallback topic');
    return withTopics(state, [FALLBACK_TOPIC], 'Topic extraction skipped: no usable article text');
  }

  try {
    const response = await geminiService.generateText(buildTopicPrompt(digest, count), {
      model: configManager.getSection('gemini').researchModel,
      purpose: 'topic extraction',
    });
    const topics = parseTopicsResponse(response, count);

    if (topics.length === 0) {
      logger.warn('[TopicNode] Could not parse topics from response, using fallback topic');
      return withTopics(state, [FALLBACK_TOPIC], 'Topic response held no topics');
    }

    logger.info(`[TopicNode] Topics: ${topics.join(' | ')}`);
    return withTopics(state, topics, `Selected topics: ${topics.join(', ')}`);
  } catch (error) {
    const message = safeErrorMessage(error);
    logger.error(`[TopicNode] Topic extraction failed: ${message}`);
    return {
      ...withTopics(state, [FALLBACK_TOPIC], `Topic extraction failed, using fallback topic`),
      errors: [...state.errors, `Topic extraction failed: ${message}`],
    };
  }
}
