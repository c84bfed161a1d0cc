/**
 * CLI Argument and Environment Check Tests
 */

import { ConfigManager } from '../../src/shared/config';
import { parseCliArgs, validateEnvironment } from '../../src/blog-agent/cli';
import { Config } from '../../src/shared/types';

describe('parseCliArgs', () => {
  it('defaults to a single live run', () => {
    expect(parseCliArgs([])).toEqual({ schedule: false, dryRun: false, count: null });
  });

  it('lets the last mode flag win', () => {
    expect(parseCliArgs(['--schedule', '--once']).schedule).toBe(false);
    expect(parseCliArgs(['--once', '--schedule']).schedule).toBe(true);
  });

  it('reads the post count in both forms', () => {
    expect(parseCliArgs(['--count', '4', '--dry-run'])).toEqual({ schedule: false, dryRun: true, count: 4 });
    expect(parseCliArgs(['--count=2']).count).toBe(2);
  });

  it('ignores a count that is not positive', () => {
    expect(parseCliArgs(['--count', '0']).count).toBeNull();
    expect(parseCliArgs(['--count', 'many']).count).toBeNull();
    expect(parseCliArgs(['--count']).count).toBeNull();
  });
});

describe('validateEnvironment', () => {
  function configWith(keys: { newsApi: string; gemini: string; together: string; blogId: string }): Config {
    const base = new ConfigManager('/nonexistent/config.json').get();
    return {
      ...base,
      newsApi: { ...base.newsApi, apiKey: keys.newsApi },
      gemini: { ...base.gemini, apiKey: keys.gemini },
      together: { ...base.together, apiKey: keys.together },
      blogger: { ...base.blogger, blogId: keys.blogId },
    };
  }

  it('requires only the NewsAPI key', () => {
    const check = validateEnvironment(configWith({ newsApi: '', gemini: 'test-secret', together: 'test-secret', blogId: '1' }));

    expect(check.ok).toBe(false);
    expect(check.errors).toEqual(['NEWSAPI_API_KEY is not set']);
    expect(check.warnings).toEqual([]);
  });

  it('warns about optional services and disables publishing without a blog id', () => {
    const check = validateEnvironment(configWith({ newsApi: 'test-secret', gemini: '', together: '', blogId: '' }));

    expect(check.ok).toBe(true);
    expect(check.canPublish).toBe(false);
    expect(check.warnings).toHaveLength(3);
    expect(check.warnings[2]).toBe('BLOGGER_BLOG_ID is not set: posts are saved locally and not published');
  });

  it('can publish with a blog id', () => {
    expect(validateEnvironment(configWith({ newsApi: 'test-secret', gemini: 'k', together: 'k', blogId: '42' })).canPublish).toBe(true);
  });
});
