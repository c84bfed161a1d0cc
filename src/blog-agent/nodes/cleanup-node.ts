// Cleanup Node
// Final statistics for the cycle

import { BlogAgentState } from '../state';
import logger from '../../shared/logger';

export async function cleanupNode(state: BlogAgentState): Promise<Partial<BlogAgentState>> {
  logger.info('[CleanupNode] Performing cleanup and final statistics');

  const row = (label: string, value: string | number): string =>
    `║  ${label.padEnd(16)}${String(value).padEnd(40)}║`;

  const draftLines = state.drafts
    .map(draft => row(draft.status, draft.topic.length > 38 ? `${draft.topic.slice(0, 37)}…` : draft.topic))
    .join('\n');

  const summary = `
╔══════════════════════════════════════════════════════════╗
║  BLOG AGENT CYCLE SUMMARY                                ║
╠══════════════════════════════════════════════════════════╣
${row('Cycle ID:', state.cycleId.slice(0, 36))}
${row('Duration:', `${Date.now() - state.cycleStartTime.getTime()}ms`)}
${row('Mode:', state.dryRun ? 'dry run' : 'live')}
╠══════════════════════════════════════════════════════════╣
${row('Fetched:', state.stats.fetched)}
${row('Topics:', state.stats.topics)}
${row('Generated:', state.stats.generated)}
${row('Saved:', state.stats.saved)}
${row('Published:', state.stats.published)}
${row('Skipped:', state.stats.skipped)}
${row('Failed:', state.stats.failed)}
╠══════════════════════════════════════════════════════════╣
${draftLines || row('Posts:', 'none')}
╠══════════════════════════════════════════════════════════╣
${row('Errors:', state.errors.length)}
╚══════════════════════════════════════════════════════════╝`;

  logger.info(summary);

  return {
    currentStep: 'CYCLE_COMPLETE',
    thoughts: [
      ...state.thoughts,
      `Cycle completed: Generated ${state.stats.generated}, Saved ${state.stats.saved}, Published ${state.stats.published}`,
    ],
  };
}
