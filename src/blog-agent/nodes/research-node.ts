// Research Node
// SEO keyword research and outline for one topic

import { BlogAgentState, TopicDraft } from '../state';
import geminiService from '../../shared/gemini-service';
import configManager from '../../shared/config';
import logger from '../../shared/logger';
import { safeErrorMessage } from '../../shared/errors';
import { buildResearchPrompt, defaultResearch, parseResearchOutput } from '../../content/research';
import { mergeCompetitors } from '../competitors';

export async function researchNode(_state: BlogAgentState, draft: TopicDraft): Promise<Partial<TopicDraft>> {
  if (!geminiService.canUseService()) {
    logger.warn('[ResearchNode] Gemini not configured, using topic as title with no keywords');
    return { research: defaultResearch(draft.topic) };
  }

  const competitors = mergeCompetitors(draft.aggregate?.competitors ?? []);
  logger.info(`[ResearchNode] Researching "${draft.topic}" against ${competitors.length} competitors`);

  try {
    const response = await geminiService.generateText(buildResearchPrompt(draft.topic, competitors), {
      model: configManager.getSection('gemini').researchModel,
      purpose: 'SEO research',
    });
    const research = parseResearchOutput(response, draft.topic);

    if (!research) {
      logger.error(`[ResearchNode] Research response for "${draft.topic}" held no JSON object`);
      return { research: null, errors: [...draft.errors, 'Research response could not be parsed'] };
    }

    logger.info(
      `[ResearchNode] Title: "${research.suggestedBlogTitle}", ${research.primaryKeywords.length} primary keywords`
    );
    return { research };
  } catch (error) {
    const message = safeErrorMessage(error);
    logger.error(`[ResearchNode] Research failed for "${draft.topic}": ${message}`);
    return { research: null, errors: [...draft.errors, `Research failed: ${message}`] };
  }
}
