// Content Node
// Writes the post markdown from the aggregate and the research

import { BlogAgentState, TopicDraft } from '../state';
import geminiService from '../../shared/gemini-service';
import configManager from '../../shared/config';
import logger from '../../shared/logger';
import { safeErrorMessage } from '../../shared/errors';
import { formatDate } from '../../content/post-document';
import {
  PostContext,
  buildContentPrompt,
  buildPlaceholderPost,
  finalizeGeneratedPost,
} from '../../content/writer';

export async function contentNode(state: BlogAgentState, draft: TopicDraft): Promise<Partial<TopicDraft>> {
  if (!draft.aggregate || !draft.research) {
    return { markdown: null, errors: [...draft.errors, 'Content skipped: missing aggregate or research'] };
  }

  const context: PostContext = {
    topic: draft.topic,
    category: state.category,
    aggregate: draft.aggregate,
    research: draft.research,
    imagePath: draft.image?.filePath ?? null,
    date: formatDate(new Date()),
    siteUrl: configManager.getSection('blog').siteUrl,
  };

  if (!geminiService.canUseService()) {
    logger.warn(`[ContentNode] Gemini not configured, writing placeholder post for "${draft.topic}"`);
    return { markdown: buildPlaceholderPost(context) };
  }

  try {
    const raw = await geminiService.generateText(buildContentPrompt(context), {
      model: configManager.getSection('gemini').contentModel,
      purpose: 'post writing',
    });
    const markdown = finalizeGeneratedPost(raw, context);
    logger.info(`[ContentNode] Generated ${markdown.length} characters for "${draft.topic}"`);
    return { markdown };
  } catch (error) {
    const message = safeErrorMessage(error);
    logger.error(`[ContentNode] Writing failed for "${draft.topic}": ${message}`);
    return { markdown: null, errors: [...draft.errors, `Content generation failed: ${message}`] };
  }
}
