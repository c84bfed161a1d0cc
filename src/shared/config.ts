import 'dotenv/config';
import fs from 'fs';
import path from 'path';
import { Config } from './types';

const PLACEHOLDER_BLOG_ID = 'YOUR_BLOG_ID_HERE';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function mergeSection<T extends object>(defaults: T, override: unknown): T {
  const section = { ...defaults };
  if (!isRecord(override)) return section;

  for (const [field, value] of Object.entries(override)) {
    if (!(field in section)) continue;
    if (typeof value !== typeof Reflect.get(section, field)) continue;
    if (typeof value === 'string' && value.length === 0) continue;
    if (typeof value === 'number' && !Number.isFinite(value)) continue;
    Reflect.set(section, field, value);
  }
  return section;
}

function parseEnvironment(value: string | undefined): Config['app']['environment'] {
  return value === 'production' || value === 'test' ? value : 'development';
}

function parseLogLevel(value: string | undefined): Config['app']['logLevel'] {
  return value === 'debug' || value === 'warn' || value === 'error' ? value : 'info';
}

class ConfigManager {
  private config: Config;
  private configPath: string;

  constructor(configPath?: string) {
    this.configPath = configPath || process.env.CONFIG_PATH || path.join(process.cwd(), 'config', 'config.json');
    this.config = this.loadConfig();
  }

  private loadConfig(): Config {
    const blogId = process.env.BLOGGER_BLOG_ID || '';

    const defaultConfig: Config = {
      app: {
        name: 'Crypto Blog Agent',
        version: '1.0.0',
        environment: parseEnvironment(process.env.NODE_ENV),
        logLevel: parseLogLevel(process.env.LOG_LEVEL),
        logFile: process.env.LOG_FILE || 'blog_creation.log'
      },
      newsApi: {
        apiKey: process.env.NEWSAPI_API_KEY || '',
        baseUrl: process.env.NEWSAPI_BASE_URL || 'https://newsapi.org/v2',
        query: process.env.NEWS_QUERY || 'cryptocurrency',
        language: process.env.NEWS_LANGUAGE || 'en',
        pageSize: parseInt(process.env.NEWS_PAGE_SIZE || '100'),
        timeout: parseInt(process.env.NEWSAPI_TIMEOUT || '20000')
      },
      gemini: {
        apiKey: process.env.GEMINI_API_KEY || '',
        baseUrl: process.env.GEMINI_BASE_URL || 'https://generativelanguage.googleapis.com/v1beta',
        researchModel: process.env.GEMINI_RESEARCH_MODEL || 'gemini-2.5-flash',
        contentModel: process.env.GEMINI_CONTENT_MODEL || 'gemini-2.5-flash',
        timeout: parseInt(process.env.GEMINI_TIMEOUT || '120000'),
        maxRetries: parseInt(process.env.LLM_MAX_RETRIES || '5'),
        initialRetryDelayMs: parseInt(process.env.LLM_INITIAL_RETRY_DELAY_MS || '5000')
      },
      together: {
        apiKey: process.env.TOGETHER_API_KEY || '',
        baseUrl: process.env.TOGETHER_BASE_URL || 'https://api.together.xyz/v1',
        model: process.env.TOGETHER_IMAGE_MODEL || 'black-forest-labs/FLUX.1-schnell-Free',
        timeout: parseInt(process.env.TOGETHER_TIMEOUT || '120000')
      },
      blogger: {
        // The sample value shipped in .env files counts as unset
        blogId: blogId === PLACEHOLDER_BLOG_ID ? '' : blogId,
        tokenJson: process.env.GOOGLE_OAUTH_TOKEN_JSON || '',
        tokenFile: process.env.BLOGGER_TOKEN_FILE || 'token_blogger.json',
        isCI: process.env.CI === 'true'
      },
      blog: {
        name: process.env.BLOG_NAME || 'AI Crypto Insights',
        author: process.env.BLOG_AUTHOR || 'AI Crypto Insights',
        siteUrl: process.env.BLOG_SITE_URL || 'https://yourcryptoblog.com',
        category: process.env.BLOG_CATEGORY || 'crypto'
      },
      pipeline: {
        postsPerRun: parseInt(process.env.POSTS_PER_RUN || '3'),
        delayBetweenPostsMs: parseInt(process.env.DELAY_BETWEEN_POSTS_MS || '30000'),
        dryRun: process.env.DRY_RUN === 'true',
        recentTopicWindowHours: parseFloat(process.env.RECENT_TOPIC_WINDOW_HOURS || '24')
      },
      output: {
        imageDir: process.env.IMAGE_OUTPUT_DIR || 'transformed_images',
        blogDir: process.env.BLOG_OUTPUT_DIR || 'blog_drafts',
        logoPath: process.env.BRANDING_LOGO_PATH || '',
        fontFamily: process.env.FEATURED_IMAGE_FONT || 'DejaVu Sans, Liberation Sans, Arial, Helvetica, sans-serif'
      },
      storage: {
        dbPath: process.env.BLOG_DB_PATH || './data/blog-posts.db'
      },
      schedule: {
        cron: process.env.BLOG_SCHEDULE_CRON || '0 */5 * * *'
      }
    };

    try {
      if (fs.existsSync(this.configPath)) {
        const configData = fs.readFileSync(this.configPath, 'utf8');
        const parsed: unknown = JSON.parse(configData);
        return this.mergeConfig(defaultConfig, parsed);
      }
    } catch (error) {
      console.warn(`Could not load config file ${this.configPath}, using defaults:`, error);
    }

    return defaultConfig;
  }

  /**
   * Section-wise merge. Empty strings, non-finite numbers and values whose type
   * differs from the default count as "unset" so env/defaults win.
   */
  private mergeConfig(defaults: Config, parsed: unknown): Config {
    if (!isRecord(parsed)) return defaults;
    const app = mergeSection(defaults.app, parsed.app);
    return {
      app: { ...app, environment: parseEnvironment(app.environment), logLevel: parseLogLevel(app.logLevel) },
      newsApi: mergeSection(defaults.newsApi, parsed.newsApi),
      gemini: mergeSection(defaults.gemini, parsed.gemini),
      together: mergeSection(defaults.together, parsed.together),
      blogger: mergeSection(defaults.blogger, parsed.blogger),
      blog: mergeSection(defaults.blog, parsed.blog),
      pipeline: mergeSection(defaults.pipeline, parsed.pipeline),
      output: mergeSection(defaults.output, parsed.output),
      storage: mergeSection(defaults.storage, parsed.storage),
      schedule: mergeSection(defaults.schedule, parsed.schedule)
    };
  }

  public get(): Config {
    return this.config;
  }

  public getSection<K extends keyof Config>(section: K): Config[K] {
    return this.config[section];
  }

  /**
   * In-memory override (CLI flags, tests). Nothing is written back to disk.
   */
  public update<K extends keyof Config>(section: K, updates: Partial<Config[K]>): void {
    this.config[section] = { ...this.config[section], ...updates };
  }
}

const configManager = new ConfigManager();
export { ConfigManager, PLACEHOLDER_BLOG_ID };
export default configManager;
