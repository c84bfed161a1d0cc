// Publish Node
// Sends the rendered document to Blogger

import { BlogAgentState, TopicDraft } from '../state';
import bloggerClient from '../../publisher/blogger-client';
import configManager from '../../shared/config';
import logger from '../../shared/logger';
import { resolveLabels, resolvePostTitle } from '../../publisher/post-labels';

export async function publishNode(state: BlogAgentState, draft: TopicDraft): Promise<Partial<TopicDraft>> {
  if (!draft.document) {
    return { publish: null };
  }

  const { metadata, html } = draft.document;
  const labels = resolveLabels(metadata, draft.document.title, state.category);

  const blogId = configManager.getSection('blogger').blogId;
  if (state.dryRun || !blogId) {
    logger.info(`[PublishNode] ${state.dryRun ? 'Dry run' : 'Blogger not configured'}, keeping local copy only`);
    return { labels, publish: null };
  }

  const publish = await bloggerClient.insertPost(blogId, {
    title: resolvePostTitle(metadata, html),
    content: html,
    labels,
  });

  return {
    labels,
    publish,
    errors: publish.success ? draft.errors : [...draft.errors, `Publish failed: ${publish.error ?? 'unknown error'}`],
  };
}
