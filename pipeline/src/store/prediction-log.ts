/**
 * Prediction log (SQLite via sql.js)
 *
 * One row per scored matchup per scorer. Re-running a day updates the
 * prediction in place and keeps any outcome already recorded. The database
 * lives in memory and is exported to its file after every write.
 */

import initSqlJs, { type BindParams, type Database, type SqlJsStatic } from 'sql.js';
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import type { Confidence, ScoreResult, ScoringInput, Tier } from '@hrcast/model';
import { scoringInputSchema } from '../inputs.js';

export interface LoggedPrediction {
  gameDate: string;
  matchupId: string;
  gameId: string;
  batterId: string;
  batterName: string;
  pitcherId: string;
  pitcherName: string;
  venue: string;
  score: number;
  probability: number;
  tier: Tier;
  confidence: Confidence;
  imputed: string[];
  scorer: string;
  input: ScoringInput;
  /** null until results are recorded */
  hitHr: boolean | null;
  createdAt: string;
}

export interface PredictionRecord {
  input: ScoringInput;
  result: ScoreResult;
}

const rowSchema = z.object({
  game_date: z.string(),
  matchup_id: z.string(),
  game_id: z.string(),
  batter_id: z.string(),
  batter_name: z.string(),
  pitcher_id: z.string(),
  pitcher_name: z.string(),
  venue: z.string(),
  score: z.number(),
  probability: z.number(),
  tier: z.enum(['Lock', 'Sleeper', 'Risky']),
  confidence: z.enum(['high', 'medium', 'low']),
  imputed_json: z.string(),
  scorer: z.string(),
  inputs_json: z.string(),
  hit_hr: z.union([z.literal(0), z.literal(1)]).nullable(),
  created_at: z.string(),
});

const imputedSchema = z.array(z.string());

export function createPredictionSchema(db: Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS predictions (
      game_date TEXT NOT NULL,
      matchup_id TEXT NOT NULL,
      game_id TEXT NOT NULL,
      batter_id TEXT NOT NULL,
      batter_name TEXT NOT NULL,
      pitcher_id TEXT NOT NULL,
      pitcher_name TEXT NOT NULL,
      venue TEXT NOT NULL,
      score REAL NOT NULL,
      probability REAL NOT NULL,
      tier TEXT NOT NULL CHECK(tier IN ('Lock', 'Sleeper', 'Risky')),
      confidence TEXT NOT NULL CHECK(confidence IN ('high', 'medium', 'low')),
      imputed_json TEXT NOT NULL,
      scorer TEXT NOT NULL,
      inputs_json TEXT NOT NULL,
      hit_hr INTEGER CHECK(hit_hr IN (0, 1)),
      created_at TEXT NOT NULL,
      PRIMARY KEY (game_date, matchup_id, scorer)
    );

    CREATE INDEX IF NOT EXISTS idx_predictions_game ON predictions(game_id);
  `);
}

function toPrediction(raw: unknown): LoggedPrediction {
  const row = rowSchema.parse(raw);
  return {
    gameDate: row.game_date,
    matchupId: row.matchup_id,
    gameId: row.game_id,
    batterId: row.batter_id,
    batterName: row.batter_name,
    pitcherId: row.pitcher_id,
    pitcherName: row.pitcher_name,
    venue: row.venue,
    score: row.score,
    probability: row.probability,
    tier: row.tier,
    confidence: row.confidence,
    imputed: imputedSchema.parse(JSON.parse(row.imputed_json)),
    scorer: row.scorer,
    input: scoringInputSchema.parse(JSON.parse(row.inputs_json)),
    hitHr: row.hit_hr === null ? null : row.hit_hr === 1,
    createdAt: row.created_at,
  };
}

let SQL: Promise<SqlJsStatic> | null = null;

function loadSqlJs(): Promise<SqlJsStatic> {
  SQL ??= initSqlJs();
  return SQL;
}

const MEMORY = ':memory:';

export class PredictionLog {
  private readonly db: Database;
  /** File the database is exported to, or null for ':memory:' */
  private readonly file: string | null;

  constructor(db: Database, file: string | null = null) {
    this.db = db;
    this.file = file;
    createPredictionSchema(db);
  }

  /**
   * Open (creating if needed) the log at a file path, or ':memory:'
   */
  static async open(file: string): Promise<PredictionLog> {
    const sql = await loadSqlJs();
    if (file === MEMORY) {
      return new PredictionLog(new sql.Database());
    }

    fs.mkdirSync(path.dirname(file), { recursive: true });
    const db = fs.existsSync(file) ? new sql.Database(fs.readFileSync(file)) : new sql.Database();
    const log = new PredictionLog(db, file);
    log.save();
    return log;
  }

  record(records: PredictionRecord[], createdAt: Date = new Date()): number {
    this.transaction(() => {
      for (const { input, result } of records) {
        const { matchup } = result;
        this.db.run(
          `INSERT INTO predictions (
            game_date, matchup_id, game_id, batter_id, batter_name, pitcher_id, pitcher_name, venue,
            score, probability, tier, confidence, imputed_json, scorer, inputs_json, hit_hr, created_at
          ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, NULL, ?)
          ON CONFLICT(game_date, matchup_id, scorer) DO UPDATE SET
            score = excluded.score,
            probability = excluded.probability,
            tier = excluded.tier,
            confidence = excluded.confidence,
            imputed_json = excluded.imputed_json,
            inputs_json = excluded.inputs_json,
            created_at = excluded.created_at`,
          [
            matchup.gameDate,
            result.matchupId,
            matchup.gameId,
            matchup.batter.id,
            matchup.batter.name,
            matchup.pitcher.id,
            matchup.pitcher.name,
            matchup.venue.name,
            result.score,
            result.probability,
            result.tier,
            result.confidence,
            JSON.stringify(result.imputed),
            result.scorer,
            JSON.stringify(input),
            createdAt.toISOString(),
          ]
        );
      }
    });
    return records.length;
  }

  /**
   * Label every prediction for one game from its box score hitters.
   * Returns the number of rows updated.
   */
  recordGameOutcome(gameId: string, homeRunHitters: ReadonlySet<string>): number {
    const batters = z
      .array(z.string())
      .parse(this.column('SELECT DISTINCT batter_id FROM predictions WHERE game_id = ?', [gameId]));

    let updated = 0;
    this.transaction(() => {
      for (const batterId of batters) {
        this.db.run('UPDATE predictions SET hit_hr = ? WHERE game_id = ? AND batter_id = ?', [
          homeRunHitters.has(batterId) ? 1 : 0,
          gameId,
          batterId,
        ]);
        updated += this.db.getRowsModified();
      }
    });
    return updated;
  }

  gameIds(gameDate: string): string[] {
    const ids = this.column('SELECT DISTINCT game_id FROM predictions WHERE game_date = ? ORDER BY game_id', [gameDate]);
    return z.array(z.string()).parse(ids);
  }

  forDate(gameDate: string, scorer?: string): LoggedPrediction[] {
    return this.between(gameDate, gameDate, scorer);
  }

  between(start: string, end: string, scorer?: string): LoggedPrediction[] {
    const rows =
      scorer === undefined
        ? this.rows(
            'SELECT * FROM predictions WHERE game_date BETWEEN ? AND ? ORDER BY game_date, score DESC, matchup_id',
            [start, end]
          )
        : this.rows(
            'SELECT * FROM predictions WHERE game_date BETWEEN ? AND ? AND scorer = ? ORDER BY game_date, score DESC, matchup_id',
            [start, end, scorer]
          );
    return rows.map(toPrediction);
  }

  /** Dates that still have predictions without an outcome */
  pendingDates(): string[] {
    const dates = this.column('SELECT DISTINCT game_date FROM predictions WHERE hit_hr IS NULL ORDER BY game_date');
    return z.array(z.string()).parse(dates);
  }

  close(): void {
    this.db.close();
  }

  private transaction(work: () => void): void {
    this.db.run('BEGIN TRANSACTION');
    try {
      work();
      this.db.run('COMMIT');
    } catch (error) {
      try {
        this.db.run('ROLLBACK');
      } catch (rollbackError) {
        console.error('[PredictionLog] Failed to roll back transaction:', rollbackError);
      }
      throw error;
    }
    this.save();
  }

  private save(): void {
    if (this.file === null) return;
    fs.writeFileSync(this.file, this.db.export());
  }

  private rows(sql: string, params: BindParams = []): Record<string, unknown>[] {
    const stmt = this.db.prepare(sql);
    try {
      stmt.bind(params);
      const rows: Record<string, unknown>[] = [];
      while (stmt.step()) {
        rows.push(stmt.getAsObject());
      }
      return rows;
    } finally {
      stmt.free();
    }
  }

  private column(sql: string, params: BindParams = []): unknown[] {
    const stmt = this.db.prepare(sql);
    try {
      stmt.bind(params);
      const values: unknown[] = [];
      while (stmt.step()) {
        values.push(stmt.get()[0]);
      }
      return values;
    } finally {
      stmt.free();
    }
  }
}
