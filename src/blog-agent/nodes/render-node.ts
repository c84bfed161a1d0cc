// Render Node
// Renders the markdown into the final HTML document and saves it

import fs from 'fs';
import path from 'path';
import { BlogAgentState, TopicDraft } from '../state';
import configManager from '../../shared/config';
import logger from '../../shared/logger';
import { buildPostDocument } from '../../content/post-document';

export async function renderNode(state: BlogAgentState, draft: TopicDraft): Promise<Partial<TopicDraft>> {
  if (!draft.markdown) {
    return { document: null, htmlPath: null };
  }

  const blog = configManager.getSection('blog');
  const document = buildPostDocument(draft.markdown, {
    fallbackTitle: draft.research?.suggestedBlogTitle || draft.topic,
    category: state.category,
    featuredImage: draft.image,
    primarySourceUrl: draft.aggregate?.primarySourceUrl ?? '',
    blogName: blog.name,
    author: blog.author,
  });

  const outputDir = path.join(configManager.getSection('output').blogDir, state.category);
  fs.mkdirSync(outputDir, { recursive: true });
  const htmlPath = path.join(outputDir, `${document.fileStem || 'untitled_post'}.html`);
  fs.writeFileSync(htmlPath, document.html, 'utf8');

  logger.info(`[RenderNode] Saved "${document.title}" to ${htmlPath}`);
  return { document, htmlPath };
}
