// Main Entry Point - Blog Agent
// Turns trending crypto news into published blog posts, once or on a cron schedule

import * as dotenv from 'dotenv';
dotenv.config();

import cron from 'node-cron';
import { cycleExitCode, runBlogCycle } from './blog-agent/graph';
import { parseCliArgs, validateEnvironment } from './blog-agent/cli';
import postStore from './data/post-store';
import bloggerClient from './publisher/blogger-client';
import configManager from './shared/config';
import logger from './shared/logger';

const EXIT_CRITICAL = 2;

async function runCycle(cycleCount: number, dryRun: boolean, count: number | null): Promise<0 | 1 | 2> {
  logger.info(`╔════════════════════════════════════════════════════════╗`);
  logger.info(`║  BLOG CYCLE ${cycleCount} - ${new Date().toISOString()}`);
  logger.info(`╚════════════════════════════════════════════════════════╝`);

  const result = await runBlogCycle({ dryRun, postsRequested: count ?? undefined });

  for (const draft of result.drafts) {
    logger.info(`  - ${draft.status.padEnd(9)} ${draft.topic}${draft.publish?.url ? ` → ${draft.publish.url}` : ''}`);
  }
  if (result.errors.length > 0) {
    logger.warn(`  - Errors: ${result.errors.length}`);
    for (const err of result.errors) {
      logger.warn(`    → ${err}`);
    }
  }

  return cycleExitCode(result);
}

/**
 * Resolves with the process exit code, or null when the scheduler keeps running.
 */
async function main(): Promise<number | null> {
  logger.info('═════════════════════════════════════════════════════════');
  logger.info('  Crypto Blog Agent - Starting');
  logger.info('═════════════════════════════════════════════════════════');

  const options = parseCliArgs(process.argv.slice(2));
  const config = configManager.get();
  const dryRun = options.dryRun || config.pipeline.dryRun;

  const check = validateEnvironment(config);
  for (const warning of check.warnings) {
    logger.warn(`[Main] ${warning}`);
  }
  if (!check.ok) {
    for (const error of check.errors) {
      logger.error(`[Main] ${error}`);
    }
    logger.error('[Main] Environment validation failed, exiting');
    return EXIT_CRITICAL;
  }

  if (check.canPublish && !dryRun && !(await bloggerClient.isAuthenticated())) {
    logger.error('[Main] BLOGGER_BLOG_ID is set but no usable Blogger credentials were found');
    return EXIT_CRITICAL;
  }

  postStore.initialize();
  const stats = postStore.getStats();
  logger.info(`[Main] Post history: ${stats.total} posts (${stats.byStatus.PUBLISHED} published)`);
  logger.info(`[Main] Mode: ${options.schedule ? `SCHEDULED (${config.schedule.cron})` : 'ONCE'}${dryRun ? ', DRY RUN' : ''}`);
  logger.info(`[Main] Posts per run: ${options.count ?? config.pipeline.postsPerRun}`);

  let cycleCount = 1;
  const firstExit = await runCycle(cycleCount, dryRun, options.count);

  if (!options.schedule) {
    return firstExit;
  }

  if (!cron.validate(config.schedule.cron)) {
    logger.error(`[Main] Invalid cron expression: ${config.schedule.cron}`);
    return EXIT_CRITICAL;
  }

  let running = false;
  cron.schedule(config.schedule.cron, () => {
    if (running) {
      logger.warn('[Main] Previous cycle still running, skipping this tick');
      return;
    }
    running = true;
    cycleCount++;
    runCycle(cycleCount, dryRun, options.count)
      .then(code => logger.info(`[Main] Cycle ${cycleCount} finished with exit code ${code}`))
      .catch(error => logger.error(`[Main] Cycle ${cycleCount} failed:`, error))
      .finally(() => {
        running = false;
      });
  });

  logger.info(`[Main] Scheduler started, next cycles follow "${config.schedule.cron}"`);
  return null;
}

function setupShutdown() {
  const shutdown = (signal: string) => {
    logger.info(`[Main] Received ${signal}, shutting down...`);
    postStore.close();
    logger.info('[Main] Shutdown complete');
    process.exit(0);
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  process.on('uncaughtException', (error) => {
    logger.error('[Main] Uncaught Exception:', error);
  });

  process.on('unhandledRejection', (reason, promise) => {
    logger.error('[Main] Unhandled Rejection at:', promise, 'reason:', reason);
  });
}

setupShutdown();
main()
  .then(code => {
    if (code !== null) {
      postStore.close();
      process.exit(code);
    }
  })
  .catch(error => {
    logger.error('[Main] Fatal error:', error);
    process.exit(EXIT_CRITICAL);
  });
