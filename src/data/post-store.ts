// Post History Store - SQLite
// Ledger of generated posts; keeps scheduled runs from re-posting a topic

import fs from 'fs';
import path from 'path';
import BetterSqlite3 from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';
import logger from '../shared/logger';
import configManager from '../shared/config';
import { PostRecord, PostStatus } from '../shared/types';

interface PostRow {
  id: string;
  cycle_id: string;
  topic: string;
  topic_key: string;
  title: string | null;
  html_path: string | null;
  image_path: string | null;
  status: PostStatus;
  blogger_post_id: string | null;
  blogger_url: string | null;
  labels: string;
  error: string | null;
  created_at: string;
}

export type NewPostRecord = Omit<PostRecord, 'id' | 'topicKey' | 'createdAt'> & { createdAt?: Date };

export interface PostStats {
  total: number;
  byStatus: Record<PostStatus, number>;
}

/**
 * Topic identity ignoring case, punctuation and spacing.
 */
export function topicKey(topic: string): string {
  return topic.toLowerCase().replace(/[^a-z0-9]+/g, ' ').trim();
}

function parseLabels(value: string): string[] {
  try {
    const parsed: unknown = JSON.parse(value);
    return Array.isArray(parsed) ? parsed.filter((l): l is string => typeof l === 'string') : [];
  } catch {
    return [];
  }
}

function toRecord(row: PostRow): PostRecord {
  return {
    id: row.id,
    cycleId: row.cycle_id,
    topic: row.topic,
    topicKey: row.topic_key,
    title: row.title,
    htmlPath: row.html_path,
    imagePath: row.image_path,
    status: row.status,
    bloggerPostId: row.blogger_post_id,
    bloggerUrl: row.blogger_url,
    labels: parseLabels(row.labels),
    error: row.error,
    createdAt: new Date(row.created_at),
  };
}

export class PostStore {
  private db: BetterSqlite3.Database | null = null;
  private initialized: boolean = false;
  private dbPath: string;

  constructor(dbPath?: string) {
    this.dbPath = dbPath || configManager.getSection('storage').dbPath;
  }

  initialize(): void {
    if (this.initialized) return;

    logger.info(`[PostStore] Initializing post history at ${this.dbPath}`);

    if (this.dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });
    }

    this.db = new BetterSqlite3(this.dbPath);
    this.db.pragma('journal_mode = WAL');

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS post_history (
        id TEXT PRIMARY KEY,
        cycle_id TEXT NOT NULL,
        topic TEXT NOT NULL,
        topic_key TEXT NOT NULL,
        title TEXT,
        html_path TEXT,
        image_path TEXT,
        status TEXT NOT NULL,
        blogger_post_id TEXT,
        blogger_url TEXT,
        labels TEXT NOT NULL DEFAULT '[]',
        error TEXT,
        created_at TEXT NOT NULL
      )
    `);

    this.db.exec(`
      CREATE INDEX IF NOT EXISTS idx_post_history_topic
      ON post_history(topic_key, status, created_at)
    `);

    this.initialized = true;
  }

  private getDb(): BetterSqlite3.Database {
    if (!this.db) {
      this.initialize();
    }
    if (!this.db) {
      throw new Error('Post store failed to initialize');
    }
    return this.db;
  }

  record(entry: NewPostRecord): PostRecord {
    const db = this.getDb();
    const record: PostRecord = {
      ...entry,
      id: uuidv4(),
      topicKey: topicKey(entry.topic),
      createdAt: entry.createdAt ?? new Date(),
    };

    db.prepare(`
      INSERT INTO post_history (
        id, cycle_id, topic, topic_key, title, html_path, image_path, status,
        blogger_post_id, blogger_url, labels, error, created_at
      ) VALUES (
        @id, @cycleId, @topic, @topicKey, @title, @htmlPath, @imagePath, @status,
        @bloggerPostId, @bloggerUrl, @labels, @error, @createdAt
      )
    `).run({
      id: record.id,
      cycleId: record.cycleId,
      topic: record.topic,
      topicKey: record.topicKey,
      title: record.title,
      htmlPath: record.htmlPath,
      imagePath: record.imagePath,
      status: record.status,
      bloggerPostId: record.bloggerPostId,
      bloggerUrl: record.bloggerUrl,
      labels: JSON.stringify(record.labels),
      error: record.error,
      createdAt: record.createdAt.toISOString(),
    });

    return record;
  }

  /**
   * True when the same topic was published within the last `windowHours`.
   */
  wasRecentlyPublished(topic: string, windowHours: number, now: Date = new Date()): boolean {
    if (windowHours <= 0) return false;
    const since = new Date(now.getTime() - windowHours * 3600_000).toISOString();
    const row = this.getDb()
      .prepare(`
        SELECT 1 FROM post_history
        WHERE topic_key = ? AND status = 'PUBLISHED' AND created_at >= ?
        LIMIT 1
      `)
      .get(topicKey(topic), since);
    return row !== undefined;
  }

  getRecent(limit: number = 20): PostRecord[] {
    const rows = this.getDb()
      .prepare<[number], PostRow>('SELECT * FROM post_history ORDER BY created_at DESC LIMIT ?')
      .all(limit);
    return rows.map(toRecord);
  }

  getStats(): PostStats {
    const rows = this.getDb()
      .prepare<[], { status: PostStatus; count: number }>(
        'SELECT status, COUNT(*) AS count FROM post_history GROUP BY status'
      )
      .all();

    const byStatus: Record<PostStatus, number> = { PUBLISHED: 0, SAVED: 0, FAILED: 0 };
    let total = 0;
    for (const row of rows) {
      byStatus[row.status] = row.count;
      total += row.count;
    }
    return { total, byStatus };
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
      this.initialized = false;
    }
  }
}

const postStore = new PostStore();
export default postStore;
