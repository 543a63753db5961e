/**
 * Winner-priority seating.
 *
 * Last round's table winners are seated together in groups of four. A
 * remainder of one to three winners borrows just enough non-winners to
 * make one more table of four; when that is not possible the winners go
 * back to the general pool instead of forming a short winners table.
 */
import type { Participant, Round } from "../models/session";
import type { FillTarget } from "./customGroups";
import {
  removeFromPool,
  selectParticipantsMinimizingPairings,
  type SelectionContext,
} from "./participantSelection";
import { cryptoRandom, shuffled } from "./secureRandom";

const WINNERS_TABLE_SIZE = 4;

/**
 * Winners of the given round who are still in the pool, in round order.
 */
export function collectWinners(
  lastRound: Round | undefined,
  pool: readonly Participant[],
): Participant[] {
  if (!lastRound) return [];
  const byId = new Map(pool.map((p) => [p.id, p] as const));
  const winners: Participant[] = [];
  for (const table of lastRound) {
    if (table.isBye || table.winnerId === null) continue;
    const winner = byId.get(table.winnerId);
    if (winner) winners.push(winner);
  }
  return winners;
}

function isEmptyFreshFour(target: FillTarget): boolean {
  return (
    !target.isCustom &&
    target.size === WINNERS_TABLE_SIZE &&
    target.table.participants.length === 0
  );
}

/**
 * Open custom tables with room for the whole remainder come first, then an
 * untouched regular table of four.
 */
function remainderTarget(
  targets: readonly FillTarget[],
  remainderCount: number,
): FillTarget | undefined {
  const custom = targets.find(
    (t) =>
      t.isCustom &&
      !t.isWinnersTable &&
      t.size === WINNERS_TABLE_SIZE &&
      t.table.participants.length + remainderCount <= WINNERS_TABLE_SIZE,
  );
  return custom ?? targets.find(isEmptyFreshFour);
}

/**
 * Seat winners into the fill targets. Borrowed non-winners are removed from
 * `regularPool`. Returns the winners that could not be seated.
 */
export function fillWinnerTables(
  winners: readonly Participant[],
  targets: FillTarget[],
  regularPool: Participant[],
  ctx: SelectionContext,
): Participant[] {
  const random = ctx.random ?? cryptoRandom;
  const order = shuffled(winners, random);
  const unseated: Participant[] = [];
  const fullTables = Math.floor(order.length / WINNERS_TABLE_SIZE);

  for (let i = 0; i < fullTables; i++) {
    const group = order.slice(i * WINNERS_TABLE_SIZE, (i + 1) * WINNERS_TABLE_SIZE);
    const target = targets.find(isEmptyFreshFour);
    if (!target) {
      unseated.push(...group);
      continue;
    }
    target.table.participants.push(...group);
    target.isWinnersTable = true;
  }

  const remainder = order.slice(fullTables * WINNERS_TABLE_SIZE);
  if (remainder.length === 0) return unseated;

  const target = remainderTarget(targets, remainder.length);
  if (!target) return [...unseated, ...remainder];

  const needed =
    target.size - target.table.participants.length - remainder.length;
  if (needed > regularPool.length) return [...unseated, ...remainder];

  const borrowed = selectParticipantsMinimizingPairings(
    regularPool,
    [...target.table.participants, ...remainder],
    needed,
    ctx,
  );
  removeFromPool(regularPool, borrowed);

  target.table.participants.push(...shuffled([...remainder, ...borrowed], random));
  target.isWinnersTable = true;
  return unseated;
}
