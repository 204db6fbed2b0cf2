import Database from "better-sqlite3";
import { join } from "node:path";
import { homedir } from "node:os";
import { mkdirSync } from "node:fs";
import type { ReportRecord, ReportSink, ReportStatus } from "../engine/types.js";

const DEFAULT_DB_DIR = join(homedir(), ".product-research");
const DEFAULT_DB_PATH = join(DEFAULT_DB_DIR, "reports.db");

const PREVIEW_CHARS = 100;

/** Listing entry: the report without its payload. */
export type ReportSummary = {
  id: string;
  query: string;
  sessionId?: string;
  intent: string | null;
  status: ReportStatus;
  preview: string;
  createdAt: number;
  finishedAt?: number;
};

/** Finished research runs in SQLite. Pass `":memory:"` for a throwaway store. */
export class ReportStore implements ReportSink {
  private db: Database.Database;

  constructor(dbPath?: string) {
    const path = dbPath ?? DEFAULT_DB_PATH;
    if (!dbPath) {
      mkdirSync(DEFAULT_DB_DIR, { recursive: true });
    }
    this.db = new Database(path);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS reports (
        id            TEXT PRIMARY KEY,
        query         TEXT NOT NULL,
        session_id    TEXT,
        deep_research INTEGER NOT NULL DEFAULT 0,
        intent        TEXT,
        status        TEXT NOT NULL,
        plan          TEXT,
        task_results  TEXT NOT NULL DEFAULT '[]',
        final_output  TEXT,
        error         TEXT,
        created_at    INTEGER NOT NULL,
        finished_at   INTEGER
      );
      CREATE INDEX IF NOT EXISTS idx_reports_created ON reports(created_at DESC);
      CREATE INDEX IF NOT EXISTS idx_reports_session ON reports(session_id);
    `);
  }

  /** Insert or overwrite a report by id. */
  saveReport(record: ReportRecord): void {
    this.db.prepare(`
      INSERT OR REPLACE INTO reports
        (id, query, session_id, deep_research, intent, status, plan, task_results, final_output, error, created_at, finished_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      record.id,
      record.query,
      record.sessionId ?? null,
      record.deepResearch ? 1 : 0,
      record.intent,
      record.status,
      record.plan ? JSON.stringify(record.plan) : null,
      JSON.stringify(record.taskResults),
      record.finalOutput,
      record.error ?? null,
      record.createdAt,
      record.finishedAt ?? null,
    );
  }

  save(record: ReportRecord): void {
    this.saveReport(record);
  }

  get(id: string): ReportRecord | undefined {
    const row = this.db.prepare("SELECT * FROM reports WHERE id = ?").get(id) as ReportRow | undefined;
    return row ? rowToRecord(row) : undefined;
  }

  /** Newest first. */
  list(limit = 50): ReportSummary[] {
    const rows = this.db.prepare("SELECT * FROM reports ORDER BY created_at DESC LIMIT ?").all(limit) as ReportRow[];
    return rows.map(rowToSummary);
  }

  listBySession(sessionId: string, limit = 50): ReportSummary[] {
    const rows = this.db
      .prepare("SELECT * FROM reports WHERE session_id = ? ORDER BY created_at DESC LIMIT ?")
      .all(sessionId, limit) as ReportRow[];
    return rows.map(rowToSummary);
  }

  /** Returns true if a report was deleted. */
  delete(id: string): boolean {
    const result = this.db.prepare("DELETE FROM reports WHERE id = ?").run(id);
    return result.changes > 0;
  }

  /** Returns the number of deleted reports. */
  deleteAll(): number {
    const result = this.db.prepare("DELETE FROM reports").run();
    return result.changes;
  }

  close(): void {
    this.db.close();
  }
}

type ReportRow = {
  id: string;
  query: string;
  session_id: string | null;
  deep_research: number;
  intent: string | null;
  status: string;
  plan: string | null;
  task_results: string;
  final_output: string | null;
  error: string | null;
  created_at: number;
  finished_at: number | null;
};

function toStatus(value: string): ReportStatus {
  return value === "cancelled" || value === "failed" ? value : "completed";
}

function preview(text: string | null): string {
  if (!text) return "";
  const flat = text.replace(/\s+/g, " ").trim();
  return flat.length > PREVIEW_CHARS ? `${flat.slice(0, PREVIEW_CHARS)}...` : flat;
}

function rowToSummary(row: ReportRow): ReportSummary {
  return {
    id: row.id,
    query: row.query,
    sessionId: row.session_id ?? undefined,
    intent: row.intent,
    status: toStatus(row.status),
    preview: preview(row.final_output),
    createdAt: row.created_at,
    finishedAt: row.finished_at ?? undefined,
  };
}

function rowToRecord(row: ReportRow): ReportRecord {
  return {
    id: row.id,
    query: row.query,
    sessionId: row.session_id ?? undefined,
    deepResearch: row.deep_research === 1,
    intent: row.intent,
    status: toStatus(row.status),
    plan: row.plan ? JSON.parse(row.plan) : null,
    taskResults: JSON.parse(row.task_results),
    finalOutput: row.final_output,
    error: row.error ?? undefined,
    createdAt: row.created_at,
    finishedAt: row.finished_at ?? undefined,
  };
}
