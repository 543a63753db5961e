import { describe, it, expect } from "vitest";
import { BYE_TABLE_NUMBER, defaultSettings, type SessionSettings } from "../models/session";
import { generateRound, type GenerateRoundInput } from "./groupGeneration";
import { allSeatedIds, makePlayers, makeRound, seededRandom } from "../testing/fixtures";

function input(overrides: Partial<GenerateRoundInput> = {}): GenerateRoundInput {
  return {
    participants: makePlayers(8),
    archivedRounds: [],
    settings: defaultSettings(),
    roundNumber: 1,
    isFirstRound: true,
    random: seededRandom(42),
    ...overrides,
  };
}

function settings(overrides: Partial<SessionSettings>): SessionSettings {
  return { ...defaultSettings(), ...overrides };
}

describe("generateRound", () => {
  it("seats everyone with the default random source", () => {
    const { tables } = generateRound(
      input({ participants: makePlayers(13), random: undefined }),
    );

    expect(tables.map((t) => t.participants.length).sort()).toEqual([3, 3, 3, 4]);
    expect(allSeatedIds(tables)).toHaveLength(13);
  });

  it("splits six participants into two tables of three", () => {
    const { tables, plan } = generateRound(input({ participants: makePlayers(6) }));

    expect(plan).toEqual({ fours: 0, threes: 2 });
    expect(tables.map((t) => t.participants.length)).toEqual([3, 3]);
    expect(allSeatedIds(tables).sort()).toEqual(["p1", "p2", "p3", "p4", "p5", "p6"]);
    expect(tables.map((t) => t.tableNumber)).toEqual([1, 2]);
  });

  it("assigns seat orders 1..n within every table", () => {
    const { tables } = generateRound(input({ participants: makePlayers(11) }));

    for (const table of tables) {
      const orders = table.participants.map((p) => p.order).sort((a, b) => a - b);
      expect(orders).toEqual(table.participants.map((_, i) => i + 1));
      expect(table.roundNumber).toBe(1);
    }
  });

  it("seats last round's winner with three non-winners at table 1", () => {
    const players = makePlayers(8);
    const round1 = makeRound(
      1,
      [
        ["p1", "p2", "p3", "p4"],
        ["p5", "p6", "p7", "p8"],
      ],
      ["p1", undefined],
    );

    const { tables } = generateRound(
      input({
        participants: players,
        archivedRounds: [round1],
        roundNumber: 2,
        isFirstRound: false,
      }),
    );

    expect(tables).toHaveLength(2);
    const first = tables[0];
    expect(first?.tableNumber).toBe(1);
    expect(first?.participants.map((p) => p.id)).toContain("p1");
    expect(first?.participants).toHaveLength(4);
    expect(tables[1]?.participants).toHaveLength(4);
    expect(new Set(allSeatedIds(tables)).size).toBe(8);
  });

  it("ignores winners in the first round", () => {
    const round0 = makeRound(1, [["p1", "p2", "p3", "p4"]], ["p1"]);
    const { tables } = generateRound(
      input({ archivedRounds: [round0], isFirstRound: true, random: seededRandom(3) }),
    );
    expect(tables).toHaveLength(2);
    expect(new Set(allSeatedIds(tables)).size).toBe(8);
  });

  it("tops up a two-member auto-fill custom group to four", () => {
    const players = makePlayers(8);
    for (const p of players.slice(0, 2)) {
      p.customGroupId = "g1";
      p.autoFill = true;
    }

    const { tables } = generateRound(input({ participants: players }));

    const custom = tables.find((t) => t.isCustom);
    expect(custom?.participants).toHaveLength(4);
    const ids = custom?.participants.map((p) => p.id) ?? [];
    expect(ids).toContain("p1");
    expect(ids).toContain("p2");
    // custom tables are numbered after regular ones
    expect(custom?.tableNumber).toBe(2);
  });

  it("leaves a complete custom table exactly as grouped", () => {
    const players = makePlayers(10);
    for (const p of players.slice(0, 2)) {
      p.customGroupId = "g1";
      p.autoFill = false;
    }

    const { tables } = generateRound(input({ participants: players }));

    const custom = tables.find((t) => t.isCustom);
    expect(custom?.participants.map((p) => p.id).sort()).toEqual(["p1", "p2"]);
    expect(custom?.autoFill).toBe(false);
    expect(tables.filter((t) => !t.isCustom).map((t) => t.participants.length)).toEqual([4, 4]);
  });

  it("reports dissolved one-member groups", () => {
    const players = makePlayers(8);
    const loner = players[4];
    if (!loner) throw new Error("fixture");
    loner.customGroupId = "solo";
    loner.autoFill = true;

    const { dissolvedIds, tables } = generateRound(input({ participants: players }));

    expect(dissolvedIds).toEqual(["p5"]);
    expect(tables.some((t) => t.isCustom)).toBe(false);
    // the caller's participant is untouched
    expect(loner.customGroupId).toBe("solo");
  });

  it("sends the remainder to bye table 99 when 3-seat tables are off", () => {
    const { tables } = generateRound(
      input({
        participants: makePlayers(10),
        settings: settings({ allowThreeSeatTables: false }),
      }),
    );

    expect(tables.map((t) => t.tableNumber)).toEqual([1, 2, BYE_TABLE_NUMBER]);
    const bye = tables[2];
    expect(bye?.isBye).toBe(true);
    expect(bye?.participants).toHaveLength(2);
    expect(bye?.participants.every((p) => p.order === 0)).toBe(true);
    expect(tables.slice(0, 2).every((t) => t.participants.length === 4)).toBe(true);
  });

  it("only builds 3-seat tables when the size cap is 3", () => {
    const { tables } = generateRound(
      input({ participants: makePlayers(9), settings: settings({ maxTableSize: 3 }) }),
    );
    expect(tables.map((t) => t.participants.length)).toEqual([3, 3, 3]);
  });

  it("never seats anyone twice across many seeds and sizes", () => {
    for (let seed = 1; seed <= 20; seed++) {
      for (const n of [6, 7, 9, 10, 13, 17]) {
        const players = makePlayers(n);
        const history = makeRound(1, [players.slice(0, 4).map((p) => p.id)], ["p1"]);
        const { tables } = generateRound(
          input({
            participants: players,
            archivedRounds: [history],
            roundNumber: 2,
            isFirstRound: false,
            random: seededRandom(seed),
          }),
        );
        const seated = allSeatedIds(tables);
        expect(seated).toHaveLength(n);
        expect(new Set(seated).size).toBe(n);
        for (const table of tables) {
          expect(table.participants.length).toBeGreaterThanOrEqual(3);
          expect(table.participants.length).toBeLessThanOrEqual(4);
        }
      }
    }
  });
});
