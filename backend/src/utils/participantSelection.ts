/**
 * Weighted minimal-repeat seat selection.
 *
 * Seats are filled one at a time. Every remaining candidate gets a pairing
 * score (how often they already shared a table with the people who would
 * sit with them), the score becomes a weight through 2^-score, the weight
 * is boosted for people who have been stuck at 3-seat tables, and one
 * candidate is drawn at random in proportion to weight.
 *
 * Greedy and non-backtracking: no guarantee of zero repeats.
 */
import type { Participant } from "../models/session";
import {
  timesPaired,
  type PairingHistory,
  type UndersizedHistory,
} from "./pairingHistory";
import { cryptoRandom, weightedPick, type RandomSource } from "./secureRandom";

/**
 * "pool": score against committed members and every other remaining
 * candidate. "committed": score against committed members only.
 */
export type ScoreScope = "pool" | "committed";

/**
 * "progressive": bonus doubles per past 3-seat placement, capped at 32x.
 * "flat": 3x for anyone at a 3-seat table in the last round.
 */
export type FairnessBonus = "progressive" | "flat";

export interface SelectionContext {
  pairingHistory: PairingHistory;
  undersizedHistory: UndersizedHistory;
  lastRoundUndersized?: ReadonlySet<string>;
  scoreScope?: ScoreScope;
  fairnessBonus?: FairnessBonus;
  random?: RandomSource;
}

const PROGRESSIVE_BONUS = [1, 2, 4, 8, 16, 32] as const;
const FLAT_BONUS = 3;

export function progressiveBonus(undersizedCount: number): number {
  const idx = Math.min(Math.max(undersizedCount, 0), PROGRESSIVE_BONUS.length - 1);
  return PROGRESSIVE_BONUS[idx] ?? 1;
}

function fairnessMultiplier(id: string, ctx: SelectionContext): number {
  if (ctx.fairnessBonus === "flat") {
    return ctx.lastRoundUndersized?.has(id) ? FLAT_BONUS : 1;
  }
  return progressiveBonus(ctx.undersizedHistory.get(id) ?? 0);
}

export function pairingScore(
  candidate: Participant,
  committed: readonly Participant[],
  remaining: readonly Participant[],
  ctx: SelectionContext,
): number {
  let score = 0;
  for (const member of committed) {
    score += timesPaired(ctx.pairingHistory, candidate.id, member.id);
  }
  if ((ctx.scoreScope ?? "pool") === "pool") {
    for (const other of remaining) {
      if (other.id === candidate.id) continue;
      score += timesPaired(ctx.pairingHistory, candidate.id, other.id);
    }
  }
  return score;
}

/**
 * Selection weights for the candidates, in input order.
 */
export function selectionWeights(
  candidates: readonly Participant[],
  committed: readonly Participant[],
  ctx: SelectionContext,
): number[] {
  const scores = candidates.map((c) =>
    pairingScore(c, committed, candidates, ctx),
  );
  const allTied = scores.every((s) => s === scores[0]);

  return candidates.map((c, i) => {
    const base = allTied ? 1 : Math.pow(2, -(scores[i] ?? 0));
    return base * fairnessMultiplier(c.id, ctx);
  });
}

/**
 * Choose up to `count` participants from `available` to sit with
 * `existingMembers`. `available` is not modified; the caller removes the
 * returned participants from its own pool.
 */
export function selectParticipantsMinimizingPairings(
  available: readonly Participant[],
  existingMembers: readonly Participant[],
  count: number,
  ctx: SelectionContext,
): Participant[] {
  const random = ctx.random ?? cryptoRandom;
  const selected: Participant[] = [];
  const working = [...available];

  while (selected.length < count && working.length > 0) {
    const committed = [...existingMembers, ...selected];
    const weights = selectionWeights(working, committed, ctx);
    const index = weightedPick(
      working.map((_, i) => i),
      (i) => weights[i] ?? 0,
      random,
    );
    const [picked] = working.splice(index, 1);
    if (!picked) break;
    selected.push(picked);
  }

  return selected;
}

/**
 * Remove the given participants from a pool in place.
 */
export function removeFromPool(
  pool: Participant[],
  taken: readonly Participant[],
): void {
  const ids = new Set(taken.map((p) => p.id));
  for (let i = pool.length - 1; i >= 0; i--) {
    if (ids.has(pool[i]!.id)) pool.splice(i, 1);
  }
}
