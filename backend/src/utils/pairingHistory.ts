/**
 * Pairing history derived from archived rounds.
 *
 * Both maps are rebuilt from scratch on every generation so they always
 * reflect the archive exactly; archived rounds never change once appended.
 */
import type { Round } from "../models/session";

export type PairingHistory = Map<string, number>;
export type UndersizedHistory = Map<string, number>;

// Extra weight per 3-seat placement when the session asks for it (1 + 3).
const EXTRA_UNDERSIZED_PENALTY = 3;

/**
 * Order-independent key for two participant ids.
 */
export function pairKey(a: string, b: string): string {
  return a < b ? `${a}|${b}` : `${b}|${a}`;
}

export function timesPaired(
  history: PairingHistory,
  a: string,
  b: string,
): number {
  return history.get(pairKey(a, b)) ?? 0;
}

export function buildPairingHistory(
  archivedRounds: readonly Round[],
): PairingHistory {
  const counts: PairingHistory = new Map();

  for (const round of archivedRounds) {
    for (const table of round) {
      if (table.isBye) continue;
      const ids = table.participants.map((p) => p.id);
      for (let i = 0; i < ids.length; i++) {
        for (let j = i + 1; j < ids.length; j++) {
          const key = pairKey(ids[i]!, ids[j]!);
          counts.set(key, (counts.get(key) ?? 0) + 1);
        }
      }
    }
  }

  return counts;
}

export function buildUndersizedHistory(
  archivedRounds: readonly Round[],
  extraPenalty: boolean,
): UndersizedHistory {
  const counts: UndersizedHistory = new Map();
  const increment = extraPenalty ? 1 + EXTRA_UNDERSIZED_PENALTY : 1;

  for (const round of archivedRounds) {
    for (const table of round) {
      if (table.isBye || table.participants.length !== 3) continue;
      for (const p of table.participants) {
        counts.set(p.id, (counts.get(p.id) ?? 0) + increment);
      }
    }
  }

  return counts;
}

/**
 * Ids seated at a 3-seat table in the most recent archived round. Used by
 * the flat-bonus selection variant.
 */
export function lastRoundUndersized(
  archivedRounds: readonly Round[],
): Set<string> {
  const last = archivedRounds[archivedRounds.length - 1];
  const ids = new Set<string>();
  if (!last) return ids;
  for (const table of last) {
    if (table.isBye || table.participants.length !== 3) continue;
    for (const p of table.participants) ids.add(p.id);
  }
  return ids;
}
