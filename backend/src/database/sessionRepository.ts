import { Pool } from "pg";
import type { Session } from "../models/session";
import {
  fromSessionRecord,
  parseSessionRecord,
  toSessionRecord,
} from "./serialization";

const DEBUG = process.env.DEBUG === "true";

/**
 * Durable storage for session snapshots. Saves are never awaited inside a
 * session lock and a failed save never reaches the command that caused it.
 */
export interface SessionStore {
  saveSession(session: Session): Promise<void>;
  loadSession(code: string): Promise<Session | null>;
  getAllSessions(): Promise<Session[]>;
  close(): Promise<void>;
}

/** The slice of a `pg` Pool the repository talks to. */
export interface SessionQueryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
  end(): Promise<void>;
}

interface SessionRow {
  code: string;
  data: string;
}

function toSessionRow(row: unknown): SessionRow | null {
  if (typeof row !== "object" || row === null) return null;
  const code: unknown = Reflect.get(row, "code");
  const data: unknown = Reflect.get(row, "data");
  if (typeof code !== "string" || typeof data !== "string") return null;
  return { code, data };
}

export class SessionRepository implements SessionStore {
  private ready: Promise<void>;

  constructor(private db: SessionQueryable) {
    this.ready = this.initializeTables();
    this.ready.catch((err: unknown) => {
      console.error("❌ Failed to initialize sessions table:", err);
    });
  }

  static connect(databaseUrl: string, nodeEnv: string): SessionRepository {
    const pool = new Pool({
      connectionString: databaseUrl,
      ssl: nodeEnv === "production" ? { rejectUnauthorized: false } : false,
    });
    pool.on("error", (err) => {
      console.error("❌ Idle PostgreSQL client error:", err.message);
    });
    if (DEBUG) console.log("✅ Connected to PostgreSQL database");

    return new SessionRepository({
      query: (text, values) => pool.query(text, values),
      end: () => pool.end(),
    });
  }

  private async initializeTables(): Promise<void> {
    await this.db.query(`
      CREATE TABLE IF NOT EXISTS sessions (
        code TEXT PRIMARY KEY,
        host_id TEXT NOT NULL,
        event_name TEXT NOT NULL DEFAULT '',
        created_at TIMESTAMPTZ NOT NULL,
        expires_at TIMESTAMPTZ NOT NULL,
        current_round INTEGER NOT NULL DEFAULT 0,
        is_game_started BOOLEAN NOT NULL DEFAULT FALSE,
        is_game_ended BOOLEAN NOT NULL DEFAULT FALSE,
        is_archived BOOLEAN NOT NULL DEFAULT FALSE,
        data TEXT NOT NULL,
        updated_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP
      )
    `);
  }

  async saveSession(session: Session): Promise<void> {
    // Serialize before the first await so the row matches the session as it
    // was when the save was requested.
    const record = toSessionRecord(session);
    await this.ready;
    const sql = `
      INSERT INTO sessions (code, host_id, event_name, created_at, expires_at, current_round,
                            is_game_started, is_game_ended, is_archived, data, updated_at)
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, CURRENT_TIMESTAMP)
      ON CONFLICT (code) DO UPDATE SET
        event_name = EXCLUDED.event_name,
        expires_at = EXCLUDED.expires_at,
        current_round = EXCLUDED.current_round,
        is_game_started = EXCLUDED.is_game_started,
        is_game_ended = EXCLUDED.is_game_ended,
        is_archived = EXCLUDED.is_archived,
        data = EXCLUDED.data,
        updated_at = CURRENT_TIMESTAMP
    `;
    await this.db.query(sql, [
      record.code.toUpperCase(),
      record.hostId,
      record.eventName,
      record.createdAt,
      record.expiresAt,
      record.currentRound,
      record.isGameStarted,
      record.isGameEnded,
      record.isArchived,
      JSON.stringify(record),
    ]);
  }

  async loadSession(code: string): Promise<Session | null> {
    await this.ready;
    const result = await this.db.query(
      "SELECT code, data FROM sessions WHERE code = $1",
      [code.toUpperCase()],
    );
    const row = toSessionRow(result.rows[0]);
    return row ? fromSessionRecord(parseSessionRecord(row.data)) : null;
  }

  async getAllSessions(): Promise<Session[]> {
    await this.ready;
    const result = await this.db.query(
      "SELECT code, data FROM sessions ORDER BY created_at DESC",
    );

    const sessions: Session[] = [];
    for (const raw of result.rows) {
      const row = toSessionRow(raw);
      if (!row) continue;
      try {
        sessions.push(fromSessionRecord(parseSessionRecord(row.data)));
      } catch (parseError) {
        console.error(`❌ Skipping unreadable session ${row.code}:`, parseError);
      }
    }
    return sessions;
  }

  async close(): Promise<void> {
    await this.ready.catch(() => undefined);
    await this.db.end();
  }
}
