// CLI arguments and start-up checks for the blog agent

import { Config } from '../shared/types';

export interface CliOptions {
  schedule: boolean;
  dryRun: boolean;
  count: number | null;
}

export interface EnvironmentCheck {
  ok: boolean;
  errors: string[];
  warnings: string[];
  canPublish: boolean;
}

function readNumberArg(argv: string[], name: string): number | null {
  const index = argv.findIndex(arg => arg === name || arg.startsWith(`${name}=`));
  if (index === -1) return null;

  const arg = argv[index];
  const raw = arg.includes('=') ? arg.slice(arg.indexOf('=') + 1) : argv[index + 1];
  const value = raw ? Number.parseInt(raw, 10) : NaN;
  return Number.isFinite(value) && value > 0 ? value : null;
}

/**
 * `[--once|--schedule] [--dry-run] [--count N]`. The last of --once/--schedule wins.
 */
export function parseCliArgs(argv: string[]): CliOptions {
  const once = argv.lastIndexOf('--once');
  const schedule = argv.lastIndexOf('--schedule');

  return {
    schedule: schedule > once,
    dryRun: argv.includes('--dry-run'),
    count: readNumberArg(argv, '--count'),
  };
}

export function validateEnvironment(config: Config): EnvironmentCheck {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!config.newsApi.apiKey) {
    errors.push('NEWSAPI_API_KEY is not set');
  }
  if (!config.gemini.apiKey) {
    warnings.push('GEMINI_API_KEY is not set: topics, research and writing fall back to placeholders');
  }
  if (!config.together.apiKey) {
    warnings.push('TOGETHER_API_KEY is not set: posts will have no featured image');
  }
  if (!config.blogger.blogId) {
    warnings.push('BLOGGER_BLOG_ID is not set: posts are saved locally and not published');
  }

  return {
    ok: errors.length === 0,
    errors,
    warnings,
    canPublish: !!config.blogger.blogId,
  };
}
