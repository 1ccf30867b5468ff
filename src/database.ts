import Database from "better-sqlite3";
import path from "path";
import fs from "fs";
import { config } from "./config";

export interface DBChartPayload {
  id: string;
  payload_json: string;
  created_at: string;
  updated_at: string;
}

export function openDatabase(dbPath: string = config.dbPath): Database.Database {
  if (dbPath !== ":memory:") {
    const resolved = path.isAbsolute(dbPath) ? dbPath : path.resolve(dbPath);
    const dir = path.dirname(resolved);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }
  return new Database(dbPath);
}

export function initializeDatabase(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS chart_payloads (
      id TEXT PRIMARY KEY,
      payload_json TEXT NOT NULL,
      created_at TEXT NOT NULL DEFAULT (datetime('now')),
      updated_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_chart_payloads_updated_at ON chart_payloads(updated_at);
  `);
}

let shared: Database.Database | null = null;

export function getDatabase(): Database.Database {
  if (!shared) {
    shared = openDatabase();
    initializeDatabase(shared);
    console.log("Database initialized successfully");
  }
  return shared;
}

export function createChartPayloadDb(db: Database.Database) {
  return {
    upsert: (id: string, payloadJson: string) => {
      const stmt = db.prepare<[string, string]>(
        `INSERT INTO chart_payloads (id, payload_json, created_at, updated_at)
         VALUES (?, ?, datetime('now'), datetime('now'))
         ON CONFLICT(id) DO UPDATE SET payload_json = excluded.payload_json, updated_at = datetime('now')`
      );
      stmt.run(id, payloadJson);
    },

    findById: (id: string): DBChartPayload | undefined => {
      const stmt = db.prepare<[string], DBChartPayload>(`SELECT * FROM chart_payloads WHERE id = ?`);
      return stmt.get(id);
    },

    listIds: (limit: number = 50): string[] => {
      const stmt = db.prepare<[number], { id: string }>(
        `SELECT id FROM chart_payloads ORDER BY updated_at DESC, id ASC LIMIT ?`
      );
      return stmt.all(limit).map((row) => row.id);
    },

    delete: (id: string): boolean => {
      const stmt = db.prepare<[string]>(`DELETE FROM chart_payloads WHERE id = ?`);
      return stmt.run(id).changes > 0;
    },
  };
}

export type ChartPayloadDb = ReturnType<typeof createChartPayloadDb>;
