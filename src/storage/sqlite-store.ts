/**
 * SQLite-backed InsightStore (@libsql/client, local file or in-memory)
 *
 * Scalar keys live in columns so lookups and range filters stay in SQL;
 * nested records (pattern details, insight contexts) are stored as JSON text.
 * The schema is created on first use.
 */

import { createClient, type Client, type InStatement, type Row, type Value } from '@libsql/client';
import { dirname, resolve } from 'path';
import { pathToFileURL } from 'url';
import { getLogger } from '../core/logger.js';
import { StorageError, toError } from '../core/errors.js';
import { EMPTY_DETECTION_STATE, type DetectionState, type MetricPoint, type MetricSeries, type PatternRecord } from '../analysis/types.js';
import type { InsightRecord, InsightType } from '../insights/types.js';
import type {
  EnergyCheckIn,
  FeedbackEvent,
  PreferenceCategory,
  PreferenceWeight,
} from '../personalization/types.js';
import { FEEDBACK_TYPES, PREFERENCE_CATEGORIES } from '../personalization/types.js';
import type { TokenUsageRecord } from '../cost/types.js';
import { USAGE_OUTCOMES } from '../cost/types.js';
import { ensureDirSync } from '../utils/fs.js';
import type { InsightQuery, InsightStore, TokenUsageQuery } from './types.js';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS metrics (
    metric TEXT NOT NULL,
    date TEXT NOT NULL,
    value REAL,
    PRIMARY KEY (metric, date)
  );
  CREATE TABLE IF NOT EXISTS check_ins (
    date TEXT NOT NULL,
    time TEXT NOT NULL,
    level INTEGER NOT NULL,
    PRIMARY KEY (date, time)
  );
  CREATE TABLE IF NOT EXISTS patterns (
    id TEXT PRIMARY KEY,
    active INTEGER NOT NULL,
    discovered_at TEXT NOT NULL,
    record TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_patterns_active ON patterns(active);
  CREATE TABLE IF NOT EXISTS detection_state (
    id INTEGER PRIMARY KEY CHECK (id = 1),
    state TEXT NOT NULL
  );
  CREATE TABLE IF NOT EXISTS insights (
    id TEXT PRIMARY KEY,
    type TEXT NOT NULL,
    date TEXT NOT NULL,
    acted_on INTEGER NOT NULL DEFAULT 0,
    record TEXT NOT NULL,
    UNIQUE (type, date)
  );
  CREATE TABLE IF NOT EXISTS preferences (
    category TEXT NOT NULL,
    key TEXT NOT NULL,
    value TEXT NOT NULL,
    weight REAL NOT NULL,
    evidence_count INTEGER NOT NULL,
    last_reinforced TEXT NOT NULL,
    source TEXT NOT NULL,
    PRIMARY KEY (category, key)
  );
  CREATE TABLE IF NOT EXISTS feedback (
    id TEXT PRIMARY KEY,
    insight_id TEXT NOT NULL,
    feedback_type TEXT NOT NULL,
    timestamp TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_feedback_insight ON feedback(insight_id);
  CREATE TABLE IF NOT EXISTS token_usage (
    id TEXT PRIMARY KEY,
    feature TEXT NOT NULL,
    model TEXT NOT NULL,
    input_tokens INTEGER NOT NULL,
    output_tokens INTEGER NOT NULL,
    total_tokens INTEGER NOT NULL,
    cost_usd REAL NOT NULL,
    outcome TEXT NOT NULL,
    timestamp TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_token_usage_timestamp ON token_usage(timestamp);
`;

// ─── Row decoding ──────────────────────────────────────────────────────────

function column(row: Row, name: string): Value {
  const value = row[name];
  if (value === undefined) {
    throw new StorageError(`Missing column "${name}"`);
  }
  return value;
}

function text(row: Row, name: string): string {
  const value = column(row, name);
  if (typeof value !== 'string') {
    throw new StorageError(`Column "${name}" is not text`);
  }
  return value;
}

function num(row: Row, name: string): number {
  const value = column(row, name);
  if (typeof value === 'number') return value;
  if (typeof value === 'bigint') return Number(value);
  throw new StorageError(`Column "${name}" is not numeric`);
}

function nullableNum(row: Row, name: string): number | null {
  return column(row, name) === null ? null : num(row, name);
}

function oneOf<T extends string>(row: Row, name: string, allowed: readonly T[]): T {
  const value = text(row, name);
  const match = allowed.find(option => option === value);
  if (match === undefined) {
    throw new StorageError(`Column "${name}" has unknown value "${value}"`);
  }
  return match;
}

/** JSON text written by this store */
function decode<T>(row: Row, name: string): T {
  return JSON.parse(text(row, name));
}

function toInsight(row: Row): InsightRecord {
  const insight = decode<InsightRecord>(row, 'record');
  return { ...insight, actedOn: num(row, 'acted_on') === 1 };
}

function toPreference(row: Row): PreferenceWeight {
  return {
    category: oneOf(row, 'category', PREFERENCE_CATEGORIES),
    key: text(row, 'key'),
    value: text(row, 'value'),
    weight: num(row, 'weight'),
    evidenceCount: num(row, 'evidence_count'),
    lastReinforced: text(row, 'last_reinforced'),
    source: oneOf(row, 'source', ['explicit', 'inferred'] as const),
  };
}

function toUsage(row: Row): TokenUsageRecord {
  return {
    id: text(row, 'id'),
    feature: text(row, 'feature'),
    model: text(row, 'model'),
    inputTokens: num(row, 'input_tokens'),
    outputTokens: num(row, 'output_tokens'),
    totalTokens: num(row, 'total_tokens'),
    costUsd: num(row, 'cost_usd'),
    outcome: oneOf(row, 'outcome', USAGE_OUTCOMES),
    timestamp: text(row, 'timestamp'),
  };
}

function toDatabaseUrl(dbPath: string): string {
  return dbPath === ':memory:' ? ':memory:' : pathToFileURL(resolve(dbPath)).href;
}

export class SqliteInsightStore implements InsightStore {
  private client: Client;
  private ready: Promise<void> | null = null;
  private logger = getLogger().child({ component: 'sqlite-store' });

  /**
   * @param dbPath - file path, or ':memory:'
   */
  constructor(private readonly dbPath: string) {
    try {
      if (dbPath !== ':memory:') {
        ensureDirSync(dirname(resolve(dbPath)));
      }
      this.client = createClient({ url: toDatabaseUrl(dbPath) });
    } catch (err) {
      throw new StorageError(`Failed to open database at ${dbPath}: ${toError(err).message}`, toError(err));
    }
  }

  // ─── Metrics ───────────────────────────────────────────────────────────────

  async getMetricSeries(metric: string, from: string, to: string): Promise<MetricSeries> {
    const rows = await this.query('getMetricSeries', {
      sql: 'SELECT date, value FROM metrics WHERE metric = ? AND date >= ? AND date <= ? ORDER BY date',
      args: [metric, from, to],
    });
    return rows.map(row => ({ date: text(row, 'date'), value: nullableNum(row, 'value') }));
  }

  async listMetricNames(): Promise<string[]> {
    const rows = await this.query('listMetricNames', 'SELECT DISTINCT metric FROM metrics ORDER BY metric');
    return rows.map(row => text(row, 'metric'));
  }

  async putMetricValues(metric: string, points: MetricPoint[]): Promise<void> {
    if (points.length === 0) return;
    await this.write(
      'putMetricValues',
      points.map(point => ({
        sql: 'INSERT OR REPLACE INTO metrics (metric, date, value) VALUES (?, ?, ?)',
        args: [metric, point.date, point.value],
      })),
    );
  }

  async listCheckIns(from: string, to: string): Promise<EnergyCheckIn[]> {
    const rows = await this.query('listCheckIns', {
      sql: 'SELECT date, time, level FROM check_ins WHERE date >= ? AND date <= ? ORDER BY date, time',
      args: [from, to],
    });
    return rows.map(row => ({ date: text(row, 'date'), time: text(row, 'time'), level: num(row, 'level') }));
  }

  async putCheckIn(checkIn: EnergyCheckIn): Promise<void> {
    await this.write('putCheckIn', [{
      sql: 'INSERT OR REPLACE INTO check_ins (date, time, level) VALUES (?, ?, ?)',
      args: [checkIn.date, checkIn.time, checkIn.level],
    }]);
  }

  // ─── Patterns ──────────────────────────────────────────────────────────────

  async listPatterns(options: { activeOnly?: boolean } = {}): Promise<PatternRecord[]> {
    const sql = options.activeOnly
      ? 'SELECT record FROM patterns WHERE active = 1 ORDER BY discovered_at, id'
      : 'SELECT record FROM patterns ORDER BY discovered_at, id';
    const rows = await this.query('listPatterns', sql);
    return rows.map(row => decode<PatternRecord>(row, 'record'));
  }

  async putPattern(pattern: PatternRecord): Promise<void> {
    await this.write('putPattern', [{
      sql: 'INSERT OR REPLACE INTO patterns (id, active, discovered_at, record) VALUES (?, ?, ?, ?)',
      args: [pattern.id, pattern.active ? 1 : 0, pattern.discoveredAt, JSON.stringify(pattern)],
    }]);
  }

  async getDetectionState(): Promise<DetectionState> {
    const [row] = await this.query('getDetectionState', 'SELECT state FROM detection_state WHERE id = 1');
    return row ? decode<DetectionState>(row, 'state') : { ...EMPTY_DETECTION_STATE, lastSeen: {} };
  }

  async putDetectionState(state: DetectionState): Promise<void> {
    await this.write('putDetectionState', [{
      sql: 'INSERT OR REPLACE INTO detection_state (id, state) VALUES (1, ?)',
      args: [JSON.stringify(state)],
    }]);
  }

  // ─── Insights ──────────────────────────────────────────────────────────────

  async getInsight(type: InsightType, date: string): Promise<InsightRecord | null> {
    const [row] = await this.query('getInsight', {
      sql: 'SELECT record, acted_on FROM insights WHERE type = ? AND date = ?',
      args: [type, date],
    });
    return row ? toInsight(row) : null;
  }

  async getInsightById(id: string): Promise<InsightRecord | null> {
    const [row] = await this.query('getInsightById', {
      sql: 'SELECT record, acted_on FROM insights WHERE id = ?',
      args: [id],
    });
    return row ? toInsight(row) : null;
  }

  async putInsight(insight: InsightRecord): Promise<void> {
    await this.write('putInsight', [
      { sql: 'DELETE FROM insights WHERE type = ? AND date = ?', args: [insight.type, insight.date] },
      {
        sql: 'INSERT INTO insights (id, type, date, acted_on, record) VALUES (?, ?, ?, ?, ?)',
        args: [insight.id, insight.type, insight.date, insight.actedOn ? 1 : 0, JSON.stringify(insight)],
      },
    ]);
  }

  async listInsights(query: InsightQuery = {}): Promise<InsightRecord[]> {
    const clauses: string[] = [];
    const args: string[] = [];
    if (query.type) {
      clauses.push('type = ?');
      args.push(query.type);
    }
    if (query.from) {
      clauses.push('date >= ?');
      args.push(query.from);
    }
    if (query.to) {
      clauses.push('date <= ?');
      args.push(query.to);
    }
    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    const rows = await this.query('listInsights', {
      sql: `SELECT record, acted_on FROM insights ${where} ORDER BY date, type`,
      args,
    });
    return rows.map(toInsight);
  }

  async markActedOn(id: string): Promise<void> {
    await this.write('markActedOn', [{ sql: 'UPDATE insights SET acted_on = 1 WHERE id = ?', args: [id] }]);
  }

  // ─── Preferences ───────────────────────────────────────────────────────────

  async getPreference(category: PreferenceCategory, key: string): Promise<PreferenceWeight | null> {
    const [row] = await this.query('getPreference', {
      sql: 'SELECT * FROM preferences WHERE category = ? AND key = ?',
      args: [category, key],
    });
    return row ? toPreference(row) : null;
  }

  async putPreference(preference: PreferenceWeight): Promise<void> {
    await this.write('putPreference', [{
      sql: `
        INSERT OR REPLACE INTO preferences
          (category, key, value, weight, evidence_count, last_reinforced, source)
        VALUES (?, ?, ?, ?, ?, ?, ?)
      `,
      args: [
        preference.category,
        preference.key,
        preference.value,
        preference.weight,
        preference.evidenceCount,
        preference.lastReinforced,
        preference.source,
      ],
    }]);
  }

  async listPreferences(category?: PreferenceCategory): Promise<PreferenceWeight[]> {
    const rows = await this.query(
      'listPreferences',
      category
        ? { sql: 'SELECT * FROM preferences WHERE category = ? ORDER BY key', args: [category] }
        : 'SELECT * FROM preferences ORDER BY category, key',
    );
    return rows.map(toPreference);
  }

  // ─── Feedback ──────────────────────────────────────────────────────────────

  async putFeedback(event: FeedbackEvent): Promise<void> {
    await this.write('putFeedback', [{
      sql: 'INSERT INTO feedback (id, insight_id, feedback_type, timestamp) VALUES (?, ?, ?, ?)',
      args: [event.id, event.insightId, event.feedbackType, event.timestamp],
    }]);
  }

  async listFeedback(insightId?: string): Promise<FeedbackEvent[]> {
    const rows = await this.query(
      'listFeedback',
      insightId
        ? { sql: 'SELECT * FROM feedback WHERE insight_id = ? ORDER BY timestamp, rowid', args: [insightId] }
        : 'SELECT * FROM feedback ORDER BY timestamp, rowid',
    );
    return rows.map(row => ({
      id: text(row, 'id'),
      insightId: text(row, 'insight_id'),
      feedbackType: oneOf(row, 'feedback_type', FEEDBACK_TYPES),
      timestamp: text(row, 'timestamp'),
    }));
  }

  // ─── Token usage ───────────────────────────────────────────────────────────

  async appendTokenUsage(record: TokenUsageRecord): Promise<void> {
    await this.write('appendTokenUsage', [{
      sql: `
        INSERT INTO token_usage
          (id, feature, model, input_tokens, output_tokens, total_tokens, cost_usd, outcome, timestamp)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
      `,
      args: [
        record.id,
        record.feature,
        record.model,
        record.inputTokens,
        record.outputTokens,
        record.totalTokens,
        record.costUsd,
        record.outcome,
        record.timestamp,
      ],
    }]);
  }

  async listTokenUsage(query: TokenUsageQuery = {}): Promise<TokenUsageRecord[]> {
    const clauses: string[] = [];
    const args: string[] = [];
    if (query.since !== undefined) {
      clauses.push('timestamp >= ?');
      args.push(query.since);
    }
    if (query.feature) {
      clauses.push('feature = ?');
      args.push(query.feature);
    }
    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    const rows = await this.query('listTokenUsage', {
      sql: `SELECT * FROM token_usage ${where} ORDER BY timestamp, rowid`,
      args,
    });
    return rows.map(toUsage);
  }

  close(): void {
    if (!this.client.closed) {
      this.client.close();
    }
  }

  // ─── Internals ─────────────────────────────────────────────────────────────

  private initialize(): Promise<void> {
    if (!this.ready) {
      this.ready = this.migrate().catch((err: unknown) => {
        this.ready = null;
        throw err;
      });
    }
    return this.ready;
  }

  private async migrate(): Promise<void> {
    if (this.dbPath !== ':memory:') {
      await this.client.execute('PRAGMA journal_mode = WAL');
    }
    await this.client.executeMultiple(SCHEMA);
    this.logger.debug({ dbPath: this.dbPath }, 'SQLite store opened');
  }

  private async query(operation: string, statement: InStatement): Promise<Row[]> {
    return this.guard(operation, async () => (await this.client.execute(statement)).rows);
  }

  /** Statements run in one write transaction */
  private async write(operation: string, statements: InStatement[]): Promise<void> {
    await this.guard(operation, async () => {
      await this.client.batch(statements, 'write');
    });
  }

  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      await this.initialize();
      return await fn();
    } catch (err) {
      const error = toError(err);
      this.logger.error({ operation, error: error.message }, 'SQLite operation failed');
      throw new StorageError(`${operation} failed: ${error.message}`, error);
    }
  }
}
