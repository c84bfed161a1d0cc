// Blog Agent State Definition
// Shared state that flows through the blog pipeline

import { v4 as uuidv4 } from 'uuid';
import configManager from '../shared/config';
import {
  AggregatedArticles,
  FeaturedImage,
  NewsApiArticle,
  PublishResult,
  ResearchOutput,
} from '../shared/types';
import { PostDocument } from '../content/post-document';

export type DraftStatus = 'PENDING' | 'SKIPPED' | 'SAVED' | 'PUBLISHED' | 'FAILED';

/**
 * One post in the making, from trending topic to published URL
 */
export interface TopicDraft {
  topic: string;
  index: number;
  articles: NewsApiArticle[];
  aggregate: AggregatedArticles | null;
  image: FeaturedImage | null;
  research: ResearchOutput | null;
  markdown: string | null;
  document: PostDocument | null;
  htmlPath: string | null;
  labels: string[];
  publish: PublishResult | null;
  status: DraftStatus;
  errors: string[];
}

export interface BlogCycleStats {
  fetched: number;
  topics: number;
  generated: number;
  saved: number;
  published: number;
  skipped: number;
  failed: number;
}

export interface BlogAgentState {
  cycleId: string;
  cycleStartTime: Date;
  currentStep: string;

  // Configuration
  query: string;
  category: string;
  postsRequested: number;
  dryRun: boolean;

  // Pipeline data
  articles: NewsApiArticle[];
  topics: string[];
  drafts: TopicDraft[];

  thoughts: string[];
  errors: string[];

  stats: BlogCycleStats;
}

export interface BlogCycleOptions {
  query?: string;
  category?: string;
  postsRequested?: number;
  dryRun?: boolean;
}

export function createTopicDraft(topic: string, index: number): TopicDraft {
  return {
    topic,
    index,
    articles: [],
    aggregate: null,
    image: null,
    research: null,
    markdown: null,
    document: null,
    htmlPath: null,
    labels: [],
    publish: null,
    status: 'PENDING',
    errors: [],
  };
}

export function createInitialBlogState(options: BlogCycleOptions = {}): BlogAgentState {
  const config = configManager.get();

  return {
    cycleId: uuidv4(),
    cycleStartTime: new Date(),
    currentStep: 'INIT',

    query: options.query ?? config.newsApi.query,
    category: options.category ?? config.blog.category,
    postsRequested: options.postsRequested ?? config.pipeline.postsPerRun,
    dryRun: options.dryRun ?? config.pipeline.dryRun,

    articles: [],
    topics: [],
    drafts: [],

    thoughts: [],
    errors: [],

    stats: {
      fetched: 0,
      topics: 0,
      generated: 0,
      saved: 0,
      published: 0,
      skipped: 0,
      failed: 0,
    },
  };
}
