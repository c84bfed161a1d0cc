// Core Types for the Crypto Blog Agent

// =============================================================================
// Articles
// =============================================================================

export interface NewsApiSource {
  id: string | null;
  name: string;
}

/**
 * Article as returned by the NewsAPI `everything` endpoint.
 * Every text field may be null or the literal "[Removed]".
 */
export interface NewsApiArticle {
  source?: NewsApiSource;
  author?: string | null;
  title?: string | null;
  description?: string | null;
  url?: string | null;
  urlToImage?: string | null;
  publishedAt?: string | null;
  content?: string | null;
}

export interface AggregatedArticles {
  consolidatedTopic: string;
  combinedContent: string;
  combinedDescription: string;
  imageUrl: string | null;
  competitors: string[];
  primarySourceUrl: string;
}

// =============================================================================
// AI outputs
// =============================================================================

export interface ResearchOutput {
  suggestedBlogTitle: string;
  primaryKeywords: string[];
  secondaryKeywords: Record<string, string[]>;
  competitorInsights: string;
  blogOutline: string;
}

export type PostMetadata = Record<string, string>;

export interface ParsedMarkdown {
  metadata: PostMetadata;
  content: string;
}

export interface FeaturedImage {
  filePath: string;
  dataUri: string;
}

// =============================================================================
// Publishing
// =============================================================================

export interface BloggerPostInput {
  title: string;
  content: string;
  labels: string[];
}

export interface PublishResult {
  success: boolean;
  postId?: string;
  url?: string;
  labels?: string[];
  error?: string;
}

export type PostStatus = 'PUBLISHED' | 'SAVED' | 'FAILED';

export interface PostRecord {
  id: string;
  cycleId: string;
  topic: string;
  topicKey: string;
  title: string | null;
  htmlPath: string | null;
  imagePath: string | null;
  status: PostStatus;
  bloggerPostId: string | null;
  bloggerUrl: string | null;
  labels: string[];
  error: string | null;
  createdAt: Date;
}

// =============================================================================
// Configuration
// =============================================================================

export interface Config {
  app: {
    name: string;
    version: string;
    environment: 'development' | 'production' | 'test';
    logLevel: 'debug' | 'info' | 'warn' | 'error';
    logFile: string;
  };
  newsApi: {
    apiKey: string;
    baseUrl: string;
    query: string;
    language: string;
    pageSize: number;
    timeout: number;
  };
  gemini: {
    apiKey: string;
    baseUrl: string;
    researchModel: string;
    contentModel: string;
    timeout: number;
    maxRetries: number;
    initialRetryDelayMs: number;
  };
  together: {
    apiKey: string;
    baseUrl: string;
    model: string;
    timeout: number;
  };
  blogger: {
    blogId: string;
    tokenJson: string;
    tokenFile: string;
    isCI: boolean;
  };
  blog: {
    name: string;
    author: string;
    siteUrl: string;
    category: string;
  };
  pipeline: {
    postsPerRun: number;
    delayBetweenPostsMs: number;
    dryRun: boolean;
    recentTopicWindowHours: number;
  };
  output: {
    imageDir: string;
    blogDir: string;
    logoPath: string;
    fontFamily: string;
  };
  storage: {
    dbPath: string;
  };
  schedule: {
    cron: string;
  };
}
