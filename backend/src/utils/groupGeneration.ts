/**
 * Round generation.
 *
 * Order of operations:
 * 1. Custom groups are carved out (complete tables are final, open ones
 *    become fill targets).
 * 2. The remaining pool plus open custom members is sized into 4- and
 *    3-seat tables; open custom tables claim their slots first.
 * 3. Targets are shuffled so custom tables do not always fill first.
 * 4. Last round's winners are seated together where possible.
 * 5. Every target is filled seat by seat with the weighted selector.
 * 6. Whoever is left sits out at the bye table (always number 99).
 * 7. Tables are relabeled: winners first, then regular, then custom.
 */
import {
  BYE_TABLE_NUMBER,
  copyParticipant,
  createTable,
  type Participant,
  type Round,
  type SessionSettings,
  type Table,
} from "../models/session";
import { InternalConsistencyError } from "../models/results";
import {
  assignOpenTableSizes,
  resolveCustomTables,
  type FillTarget,
} from "./customGroups";
import { calculateTablePlan, type TablePlan } from "./groupSizing";
import {
  buildPairingHistory,
  buildUndersizedHistory,
  lastRoundUndersized,
} from "./pairingHistory";
import {
  removeFromPool,
  selectParticipantsMinimizingPairings,
  type FairnessBonus,
  type ScoreScope,
  type SelectionContext,
} from "./participantSelection";
import {
  cryptoRandom,
  shuffleInPlace,
  shuffled,
  type RandomSource,
} from "./secureRandom";
import { collectWinners, fillWinnerTables } from "./winnerGroups";

const DEBUG = process.env.DEBUG === "true";

export interface GenerateRoundInput {
  participants: readonly Participant[];
  archivedRounds: readonly Round[];
  settings: SessionSettings;
  roundNumber: number;
  isFirstRound: boolean;
  random?: RandomSource;
  scoreScope?: ScoreScope;
  fairnessBonus?: FairnessBonus;
}

export interface GeneratedRound {
  tables: Table[];
  plan: TablePlan;
  /** Participants whose one-person custom group was dissolved. */
  dissolvedIds: string[];
}

export function generateRound(input: GenerateRoundInput): GeneratedRound {
  const random = input.random ?? cryptoRandom;
  const { settings, roundNumber } = input;

  // Seats hold copies; the live participants are only touched by the caller.
  const pool = input.participants.map((p) => ({ ...copyParticipant(p), order: 0 }));

  const custom = resolveCustomTables(pool, roundNumber, settings.allowCustomGroups);
  const openMembers = custom.openTables.reduce(
    (sum, t) => sum + t.participants.length,
    0,
  );
  const plan = calculateTablePlan(
    custom.available.length + openMembers,
    settings.allowThreeSeatTables,
    settings.maxTableSize,
  );

  const sized = assignOpenTableSizes(custom.openTables, plan, random);
  const available = [...custom.available];
  for (const table of sized.unplaced) available.push(...table.participants);

  const targets: FillTarget[] = [...sized.targets];
  for (let i = 0; i < sized.remaining.fours; i++) {
    targets.push(freshTarget(roundNumber, 4));
  }
  for (let i = 0; i < sized.remaining.threes; i++) {
    targets.push(freshTarget(roundNumber, 3));
  }
  shuffleInPlace(targets, random);

  const ctx: SelectionContext = {
    pairingHistory: buildPairingHistory(input.archivedRounds),
    undersizedHistory: buildUndersizedHistory(
      input.archivedRounds,
      settings.extraThreeSeatPenalty,
    ),
    lastRoundUndersized: lastRoundUndersized(input.archivedRounds),
    scoreScope: input.scoreScope ?? "pool",
    fairnessBonus: input.fairnessBonus ?? "progressive",
    random,
  };

  const lastRound = input.archivedRounds[input.archivedRounds.length - 1];
  const winners =
    settings.prioritizeWinners && !input.isFirstRound
      ? collectWinners(lastRound, available)
      : [];
  const regular = available.filter((p) => !winners.some((w) => w.id === p.id));
  const unseatedWinners = fillWinnerTables(winners, targets, regular, ctx);

  const remaining = shuffled([...unseatedWinners, ...regular], random);

  for (const target of targets) {
    while (
      target.table.participants.length < target.size &&
      remaining.length > 0
    ) {
      const picked = selectParticipantsMinimizingPairings(
        remaining,
        target.table.participants,
        1,
        ctx,
      );
      if (picked.length === 0) break;
      target.table.participants.push(...picked);
      removeFromPool(remaining, picked);
    }
  }

  for (const target of targets) {
    if (target.table.participants.length !== target.size) {
      throw new InternalConsistencyError(
        `Table has ${target.table.participants.length} participants but expected ${target.size} ` +
          `[round=${roundNumber} plan=${plan.fours}x4+${plan.threes}x3 remaining=${remaining.length}]`,
      );
    }
  }

  let bye: Table | null = null;
  if (remaining.length > 0) {
    bye = createTable(roundNumber, { isBye: true });
    bye.participants.push(...remaining);
  }

  if (DEBUG) {
    console.log(
      `🎲 Round ${roundNumber}: ${plan.fours}x4 + ${plan.threes}x3, ` +
        `${winners.length} winner(s), ${custom.completeTables.length} complete custom, ` +
        `${sized.targets.length} open custom, bye=${remaining.length}`,
    );
  }

  return {
    tables: relabelTables(custom.completeTables, targets, bye, random),
    plan,
    dissolvedIds: custom.dissolvedIds,
  };
}

function freshTarget(roundNumber: number, size: number): FillTarget {
  return {
    table: createTable(roundNumber),
    size,
    isCustom: false,
    isWinnersTable: false,
  };
}

/**
 * Number tables from 1 with winners tables first, then regular, then custom,
 * each band shuffled, and shuffle seat order inside every table. The bye
 * table is outside this ordering: it keeps number 99 and goes last.
 */
export function relabelTables(
  completeCustom: readonly Table[],
  targets: readonly FillTarget[],
  bye: Table | null,
  random: RandomSource = cryptoRandom,
): Table[] {
  const winnersBand: Table[] = [];
  const regularBand: Table[] = [];
  const customBand: Table[] = [...completeCustom];

  for (const target of targets) {
    if (target.isWinnersTable) winnersBand.push(target.table);
    else if (target.isCustom) customBand.push(target.table);
    else regularBand.push(target.table);
  }

  const ordered = [
    ...shuffleInPlace(winnersBand, random),
    ...shuffleInPlace(regularBand, random),
    ...shuffleInPlace(customBand, random),
  ];

  let tableNumber = 1;
  for (const table of ordered) {
    table.tableNumber = tableNumber++;
    const seats = shuffled(
      table.participants.map((_, i) => i + 1),
      random,
    );
    table.participants.forEach((p, i) => {
      p.order = seats[i] ?? i + 1;
    });
  }

  if (bye) {
    bye.tableNumber = BYE_TABLE_NUMBER;
    ordered.push(bye);
  }

  return ordered;
}
