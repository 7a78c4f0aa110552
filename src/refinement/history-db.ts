/**
 * RefinementHistory - SQLite log of refinement iterations
 *
 * One row per evaluated iteration. In-memory by default; pass a file path to
 * keep history across runs.
 */

import Database from "better-sqlite3";

export interface IterationRow {
  runId: string;
  artifact: string;
  iteration: number;
  version: string;
  accuracy: number;
  /** Change from the previous iteration; null on the first */
  delta: number | null;
  failures: number;
  refinements: number;
  /** State the loop moved to after this iteration */
  state: string;
  recordedAt: number;
}

export interface BestRun {
  artifact: string;
  runId: string;
  version: string;
  accuracy: number;
}

const COLUMNS = `
  run_id as runId, artifact, iteration, version, accuracy, delta,
  failures, refinements, state, recorded_at as recordedAt
`;

export class RefinementHistory {
  private db: Database.Database | null;

  constructor(path = ":memory:") {
    this.db = new Database(path);
    this.initSchema();
  }

  private initSchema(): void {
    if (!this.db) return;

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS iterations (
        run_id TEXT NOT NULL,
        artifact TEXT NOT NULL,
        iteration INTEGER NOT NULL,
        version TEXT NOT NULL,
        accuracy REAL NOT NULL,
        delta REAL,
        failures INTEGER NOT NULL,
        refinements INTEGER NOT NULL,
        state TEXT NOT NULL,
        recorded_at INTEGER NOT NULL,
        PRIMARY KEY (run_id, iteration)
      );

      CREATE INDEX IF NOT EXISTS iterations_artifact ON iterations(artifact);
    `);
  }

  isOpen(): boolean {
    return this.db !== null;
  }

  record(row: Omit<IterationRow, "recordedAt"> & { recordedAt?: number }): void {
    if (!this.db) return;
    this.db
      .prepare(
        `INSERT OR REPLACE INTO iterations
          (run_id, artifact, iteration, version, accuracy, delta, failures, refinements, state, recorded_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        row.runId,
        row.artifact,
        row.iteration,
        row.version,
        row.accuracy,
        row.delta,
        row.failures,
        row.refinements,
        row.state,
        row.recordedAt ?? Date.now()
      );
  }

  /**
   * Iterations of one run, in order
   */
  getRun(runId: string): IterationRow[] {
    if (!this.db) return [];
    return this.db
      .prepare<[string], IterationRow>(`SELECT ${COLUMNS} FROM iterations WHERE run_id = ? ORDER BY iteration`)
      .all(runId);
  }

  /**
   * Every iteration recorded for an artifact, oldest first
   */
  getArtifact(artifact: string): IterationRow[] {
    if (!this.db) return [];
    return this.db
      .prepare<[string], IterationRow>(
        `SELECT ${COLUMNS} FROM iterations WHERE artifact = ? ORDER BY recorded_at, run_id, iteration`
      )
      .all(artifact);
  }

  /**
   * Highest accuracy seen for an artifact, earliest iteration on ties
   */
  bestAccuracy(artifact: string): BestRun | null {
    if (!this.db) return null;
    const row = this.db
      .prepare<[string], BestRun>(
        `SELECT artifact, run_id as runId, version, accuracy FROM iterations
         WHERE artifact = ?
         ORDER BY accuracy DESC, recorded_at, iteration
         LIMIT 1`
      )
      .get(artifact);
    return row ?? null;
  }

  runIds(artifact: string): string[] {
    if (!this.db) return [];
    return this.db
      .prepare<[string], { runId: string }>(
        `SELECT run_id as runId FROM iterations WHERE artifact = ?
         GROUP BY run_id ORDER BY MIN(recorded_at), run_id`
      )
      .all(artifact)
      .map((r) => r.runId);
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }
}
