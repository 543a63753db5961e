/**
 * Shared builders for the test suites.
 */
import {
  createParticipant,
  createTable,
  type Participant,
  type Round,
  type Table,
} from "../models/session";
import type { RandomSource } from "../utils/secureRandom";

/**
 * Deterministic RNG (so failures are reproducible)
 */
export function mulberry32(seed: number): () => number {
  return function rng() {
    let t = (seed += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function seededRandom(seed: number): RandomSource {
  const rng = mulberry32(seed);
  return {
    nextInt: (maxExclusive) => Math.floor(rng() * maxExclusive),
    nextFloat: () => rng(),
  };
}

/**
 * Always answers the same values. `nextInt` is clamped into range.
 */
export function fixedRandom(float = 0, int = 0): RandomSource {
  return {
    nextInt: (maxExclusive) => Math.min(int, Math.max(maxExclusive - 1, 0)),
    nextFloat: () => float,
  };
}

export function makePlayers(count: number, prefix = "p"): Participant[] {
  return Array.from({ length: count }, (_, i) =>
    createParticipant({
      id: `${prefix}${i + 1}`,
      name: `Player ${i + 1}`,
      joinedAt: new Date("2026-01-01T00:00:00Z"),
    }),
  );
}

export function makeTable(
  roundNumber: number,
  ids: readonly string[],
  options: { winnerId?: string; isDraw?: boolean; isBye?: boolean; tableNumber?: number } = {},
): Table {
  const table = createTable(roundNumber, { isBye: options.isBye });
  table.participants = ids.map((id) => createParticipant({ id }));
  table.winnerId = options.winnerId ?? null;
  table.isDraw = options.isDraw ?? false;
  table.tableNumber = options.tableNumber ?? 0;
  return table;
}

export function makeRound(
  roundNumber: number,
  tables: ReadonlyArray<readonly string[]>,
  winners: ReadonlyArray<string | undefined> = [],
): Round {
  return tables.map((ids, i) =>
    makeTable(roundNumber, ids, { winnerId: winners[i], tableNumber: i + 1 }),
  );
}

export function allSeatedIds(tables: readonly Table[]): string[] {
  return tables.flatMap((t) => t.participants.map((p) => p.id));
}
