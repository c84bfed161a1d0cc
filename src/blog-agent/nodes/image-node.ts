// Image Node
// Generates the featured image and brands it with the post topic

import path from 'path';
import { BlogAgentState, TopicDraft } from '../state';
import togetherService, { buildImagePrompt } from '../../shared/together-service';
import configManager from '../../shared/config';
import logger from '../../shared/logger';
import { composeFeaturedImage } from '../../imaging/image-compositor';
import { sanitizeFilename } from '../../content/filename';

export async function imageNode(state: BlogAgentState, draft: TopicDraft): Promise<Partial<TopicDraft>> {
  if (!togetherService.canUseService()) {
    logger.info('[ImageNode] Together not configured, post will have no featured image');
    return { image: null };
  }

  const bytes = await togetherService.generateImage(buildImagePrompt(draft.topic));
  if (!bytes) {
    logger.warn(`[ImageNode] No image generated for "${draft.topic}"`);
    return { image: null };
  }

  const output = configManager.getSection('output');
  const image = await composeFeaturedImage(bytes, draft.topic, sanitizeFilename(draft.topic), {
    outputDir: path.join(output.imageDir, state.category),
    logoPath: output.logoPath || undefined,
    fontFamily: output.fontFamily,
  });

  return { image };
}
