import { describe, it, expect } from "vitest";
import { createParticipant, createSession } from "../models/session";
import { makeTable } from "../testing/fixtures";
import {
  fromSessionRecord,
  parseSessionRecord,
  toSessionRecord,
} from "./serialization";

function sampleSession() {
  const session = createSession({
    code: "HJKMNP",
    hostId: "host",
    createdAt: new Date("2026-02-01T10:00:00Z"),
    expiresAt: new Date("2026-02-08T10:00:00Z"),
  });
  session.eventName = "League night";
  const alice = createParticipant({
    id: "a",
    name: "Alice",
    character: "Tymna",
    joinedAt: new Date("2026-02-01T10:05:00Z"),
  });
  alice.points = 3;
  session.participants.set("a", alice);
  const archived = makeTable(1, ["a", "b", "c"], { winnerId: "a", tableNumber: 1 });
  archived.completedAt = new Date("2026-02-01T11:30:00Z");
  archived.statistics = { turns: 8 };
  session.archivedRounds.push(Object.freeze([Object.freeze(archived)]));
  session.tables = [makeTable(2, ["a", "b", "c", "d"], { tableNumber: 1 })];
  session.currentRound = 2;
  session.isGameStarted = true;
  return session;
}

describe("toSessionRecord", () => {
  it("writes timestamps as ISO strings and participants as an array", () => {
    const record = toSessionRecord(sampleSession());

    expect(record.createdAt).toBe("2026-02-01T10:00:00.000Z");
    expect(record.participants).toEqual([
      {
        id: "a",
        name: "Alice",
        character: "Tymna",
        points: 3,
        joinedAt: "2026-02-01T10:05:00.000Z",
        dropped: false,
        order: 0,
        customGroupId: "",
        autoFill: false,
      },
    ]);
    expect(record.archivedRounds[0]?.[0]?.hasResult).toBe(true);
    expect(record.archivedRounds[0]?.[0]?.completedAt).toBe("2026-02-01T11:30:00.000Z");
    expect(record.tables?.[0]?.hasResult).toBe(false);
  });
});

describe("fromSessionRecord", () => {
  it("restores dates, the participant map and frozen archived rounds", () => {
    const json = JSON.stringify(toSessionRecord(sampleSession()));
    const restored = fromSessionRecord(parseSessionRecord(json));

    expect(restored.createdAt).toEqual(new Date("2026-02-01T10:00:00Z"));
    expect(restored.participants.get("a")?.joinedAt).toEqual(new Date("2026-02-01T10:05:00Z"));
    expect(restored.archivedRounds[0]?.[0]?.winnerId).toBe("a");
    expect(restored.archivedRounds[0]?.[0]?.statistics).toEqual({ turns: 8 });
    expect(Object.isFrozen(restored.archivedRounds[0])).toBe(true);
    expect(restored.tables?.[0]?.participants).toHaveLength(4);
    expect(restored.eventName).toBe("League night");
  });

  it("fills settings missing from older documents with defaults", () => {
    const record = toSessionRecord(sampleSession());
    const json = JSON.stringify({ ...record, settings: { maxRounds: 5 } });

    const restored = fromSessionRecord(parseSessionRecord(json));

    expect(restored.settings.maxRounds).toBe(5);
    expect(restored.settings.maxTableSize).toBe(4);
    expect(restored.settings.pointsSchema).toEqual({ win: 3, draw: 1, loss: 0 });
  });
});

describe("parseSessionRecord", () => {
  it("rejects a document without the required fields", () => {
    expect(() => parseSessionRecord(JSON.stringify({ code: "X" }))).toThrow(
      "Stored session document is malformed",
    );
  });
});
