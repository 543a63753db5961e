import { describe, it, expect, beforeEach, vi } from "vitest";
import { createParticipant, createSession } from "../models/session";
import { SessionRepository, type SessionQueryable } from "./sessionRepository";

interface StoredRow {
  code: string;
  created_at: string;
  data: string;
}

/**
 * Answers the handful of statements the repository issues, keeping rows in
 * a Map the way the sessions table would.
 */
class FakeSessionsTable implements SessionQueryable {
  rows = new Map<string, StoredRow>();
  statements: string[] = [];
  ended = false;

  async query(text: string, values: unknown[] = []): Promise<{ rows: unknown[] }> {
    const sql = text.trim();
    this.statements.push(sql.split(/\s+/).slice(0, 2).join(" "));

    if (sql.startsWith("CREATE TABLE")) return { rows: [] };
    if (sql.startsWith("INSERT INTO sessions")) {
      const [code, , , createdAt, , , , , , data] = values;
      if (typeof code !== "string" || typeof createdAt !== "string" || typeof data !== "string") {
        throw new Error("unexpected insert values");
      }
      this.rows.set(code, { code, created_at: createdAt, data });
      return { rows: [] };
    }
    if (sql.includes("WHERE code = $1")) {
      const row = this.rows.get(String(values[0]));
      return { rows: row ? [row] : [] };
    }
    if (sql.includes("ORDER BY created_at DESC")) {
      const all = [...this.rows.values()].sort((a, b) =>
        b.created_at.localeCompare(a.created_at),
      );
      return { rows: all };
    }
    throw new Error(`unexpected statement: ${sql}`);
  }

  async end(): Promise<void> {
    this.ended = true;
  }
}

function session(code: string, createdAt: string) {
  const s = createSession({
    code,
    hostId: "host",
    createdAt: new Date(createdAt),
    expiresAt: new Date("2026-12-31T00:00:00Z"),
  });
  s.participants.set("u1", createParticipant({ id: "u1", name: "Alice" }));
  return s;
}

describe("SessionRepository", () => {
  let table: FakeSessionsTable;
  let repository: SessionRepository;

  beforeEach(() => {
    table = new FakeSessionsTable();
    repository = new SessionRepository(table);
  });

  it("creates the sessions table before anything else", async () => {
    await repository.saveSession(session("ABCDEF", "2026-01-01T00:00:00Z"));

    expect(table.statements).toEqual(["CREATE TABLE", "INSERT INTO"]);
  });

  it("saves and loads a session by code, case-insensitively", async () => {
    await repository.saveSession(session("ABCDEF", "2026-01-01T00:00:00Z"));

    const loaded = await repository.loadSession("abcdef");

    expect(loaded?.code).toBe("ABCDEF");
    expect(loaded?.participants.get("u1")?.name).toBe("Alice");
  });

  it("returns null for an unknown code", async () => {
    await expect(repository.loadSession("NOPE")).resolves.toBeNull();
  });

  it("overwrites an existing row on save", async () => {
    const s = session("ABCDEF", "2026-01-01T00:00:00Z");
    await repository.saveSession(s);
    s.currentRound = 3;
    s.eventName = "Finals";
    await repository.saveSession(s);

    const all = await repository.getAllSessions();

    expect(all).toHaveLength(1);
    expect(all[0]?.currentRound).toBe(3);
    expect(all[0]?.eventName).toBe("Finals");
  });

  it("lists sessions newest first", async () => {
    await repository.saveSession(session("OLDEST", "2026-01-01T00:00:00Z"));
    await repository.saveSession(session("NEWEST", "2026-03-01T00:00:00Z"));

    const all = await repository.getAllSessions();

    expect(all.map((s) => s.code)).toEqual(["NEWEST", "OLDEST"]);
  });

  it("skips rows whose document cannot be read", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    await repository.saveSession(session("ABCDEF", "2026-01-01T00:00:00Z"));
    table.rows.set("BROKEN", { code: "BROKEN", created_at: "2026-02-01T00:00:00Z", data: "{}" });

    const all = await repository.getAllSessions();

    expect(all.map((s) => s.code)).toEqual(["ABCDEF"]);
    vi.restoreAllMocks();
  });

  it("captures the session as it was when the save was requested", async () => {
    const s = session("ABCDEF", "2026-01-01T00:00:00Z");
    const pending = repository.saveSession(s);
    s.eventName = "changed after save";
    await pending;

    const loaded = await repository.loadSession("ABCDEF");

    expect(loaded?.eventName).toBe("");
  });

  it("ends the pool on close", async () => {
    await repository.close();

    expect(table.ended).toBe(true);
  });
});
