import Database from "better-sqlite3";
import type { RunEventEnvelope, RunEventType } from "../contracts/events.js";
import type { PipelineRun, RunState, RunTrigger } from "../state/types.js";


/** Persistence for run history. The gate never reads from it. */
export interface RunStore {
  createRun(run: PipelineRun): void;
  updateRun(run: PipelineRun): void;
  recordTransition(runId: string, from: RunState, to: RunState, reason?: string): void;
  recordEvent<T>(event: RunEventEnvelope<T>): void;
  getRun(id: string): PipelineRun | null;
  listUnfinished(): PipelineRun[];
  listHistory(limit: number): PipelineRun[];
  getRecentEvents(runId: string, limit?: number): RunEventEnvelope[];
  close(): void;
}

interface RunRow {
  id: string;
  pipeline: string;
  branch: string;
  trigger: string;
  commit_sha: string | null;
  author: string | null;
  message: string | null;
  state: string;
  queued_at: string;
  started_at: string | null;
  completed_at: string | null;
  verdict_json: string | null;
  invocation_json: string | null;
  probe_json: string | null;
  reason: string | null;
}

const UNFINISHED = `('QUEUED', 'TESTING', 'DEPLOYING', 'VERIFYING')`;

export class SqliteRunStore implements RunStore {
  private db: Database.Database;

  constructor(filePath: string) {
    this.db = new Database(filePath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("synchronous = NORMAL");
    this.init();
  }

  init(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS runs (
        id TEXT PRIMARY KEY,
        pipeline TEXT NOT NULL,
        branch TEXT NOT NULL,
        trigger TEXT NOT NULL,
        commit_sha TEXT,
        author TEXT,
        message TEXT,
        state TEXT NOT NULL,
        queued_at TEXT NOT NULL,
        started_at TEXT,
        completed_at TEXT,
        verdict_json TEXT,
        invocation_json TEXT,
        probe_json TEXT,
        reason TEXT
      );

      CREATE TABLE IF NOT EXISTS state_transitions (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        run_id TEXT NOT NULL,
        from_state TEXT NOT NULL,
        to_state TEXT NOT NULL,
        reason TEXT,
        timestamp TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
        FOREIGN KEY(run_id) REFERENCES runs(id)
      );

      CREATE TABLE IF NOT EXISTS events (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        run_id TEXT NOT NULL,
        event_type TEXT NOT NULL,
        payload_json TEXT NOT NULL,
        timestamp TEXT NOT NULL,
        FOREIGN KEY(run_id) REFERENCES runs(id)
      );

      CREATE INDEX IF NOT EXISTS idx_runs_queued_at ON runs(queued_at);
      CREATE INDEX IF NOT EXISTS idx_events_run ON events(run_id);
    `);
  }

  createRun(run: PipelineRun): void {
    this.db
      .prepare(
        `
      INSERT INTO runs (
        id, pipeline, branch, trigger, commit_sha, author, message, state, queued_at,
        started_at, completed_at, verdict_json, invocation_json, probe_json, reason
      ) VALUES (
        @id, @pipeline, @branch, @trigger, @commit_sha, @author, @message, @state, @queued_at,
        @started_at, @completed_at, @verdict_json, @invocation_json, @probe_json, @reason
      )
    `
      )
      .run(this.toRow(run));
  }

  updateRun(run: PipelineRun): void {
    this.db
      .prepare(
        `
      UPDATE runs
      SET
        state = @state,
        started_at = @started_at,
        completed_at = @completed_at,
        verdict_json = @verdict_json,
        invocation_json = @invocation_json,
        probe_json = @probe_json,
        reason = @reason
      WHERE id = @id
    `
      )
      .run(this.toRow(run));
  }

  recordTransition(runId: string, from: RunState, to: RunState, reason?: string): void {
    this.db
      .prepare(`INSERT INTO state_transitions (run_id, from_state, to_state, reason) VALUES (?, ?, ?, ?)`)
      .run(runId, from, to, reason ?? null);
  }

  recordEvent<T>(event: RunEventEnvelope<T>): void {
    this.db
      .prepare(`INSERT INTO events (run_id, event_type, payload_json, timestamp) VALUES (?, ?, ?, ?)`)
      .run(event.run_id, event.type, JSON.stringify(event.data), event.timestamp);
  }

  getRun(id: string): PipelineRun | null {
    const row = this.db.prepare(`SELECT * FROM runs WHERE id = ?`).get(id) as RunRow | undefined;
    return row ? this.fromRow(row) : null;
  }

  listUnfinished(): PipelineRun[] {
    const rows = this.db
      .prepare(`SELECT * FROM runs WHERE state IN ${UNFINISHED} ORDER BY queued_at ASC`)
      .all() as RunRow[];
    return rows.map((row) => this.fromRow(row));
  }

  listHistory(limit: number): PipelineRun[] {
    const rows = this.db
      .prepare(`SELECT * FROM runs ORDER BY queued_at DESC, rowid DESC LIMIT ?`)
      .all(limit) as RunRow[];
    return rows.map((row) => this.fromRow(row));
  }

  getRecentEvents(runId: string, limit = 50): RunEventEnvelope[] {
    const rows = this.db
      .prepare(`SELECT event_type, timestamp, payload_json FROM events WHERE run_id = ? ORDER BY id DESC LIMIT ?`)
      .all(runId, limit) as Array<{ event_type: RunEventType; timestamp: string; payload_json: string }>;

    return rows.map((row) => ({
      type: row.event_type,
      timestamp: row.timestamp,
      run_id: runId,
      data: JSON.parse(row.payload_json) as unknown
    }));
  }

  close(): void {
    this.db.close();
  }

  private toRow(run: PipelineRun): RunRow {
    return {
      id: run.id,
      pipeline: run.pipeline,
      branch: run.branch,
      trigger: run.trigger,
      commit_sha: run.commit ?? null,
      author: run.author ?? null,
      message: run.message ?? null,
      state: run.state,
      queued_at: run.queuedAt,
      started_at: run.startedAt ?? null,
      completed_at: run.completedAt ?? null,
      verdict_json: run.verdict ? JSON.stringify(run.verdict) : null,
      invocation_json: run.invocation ? JSON.stringify(run.invocation) : null,
      probe_json: run.probe ? JSON.stringify(run.probe) : null,
      reason: run.reason ?? null
    };
  }

  private fromRow(row: RunRow): PipelineRun {
    return {
      id: row.id,
      pipeline: row.pipeline,
      branch: row.branch,
      trigger: row.trigger as RunTrigger,
      state: row.state as RunState,
      queuedAt: row.queued_at,
      ...(row.commit_sha ? { commit: row.commit_sha } : {}),
      ...(row.author ? { author: row.author } : {}),
      ...(row.message ? { message: row.message } : {}),
      ...(row.started_at ? { startedAt: row.started_at } : {}),
      ...(row.completed_at ? { completedAt: row.completed_at } : {}),
      ...(row.verdict_json ? { verdict: JSON.parse(row.verdict_json) as PipelineRun["verdict"] } : {}),
      ...(row.invocation_json ? { invocation: JSON.parse(row.invocation_json) as PipelineRun["invocation"] } : {}),
      ...(row.probe_json ? { probe: JSON.parse(row.probe_json) as PipelineRun["probe"] } : {}),
      ...(row.reason ? { reason: row.reason } : {})
    };
  }
}
