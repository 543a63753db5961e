/**
 * Custom table resolution.
 *
 * Participants sharing a customGroupId asked to sit together. A group that
 * is already a full table (4+) or that does not want auto-fill is emitted
 * as-is. Smaller auto-fill groups become open tables that the generator
 * tops up like any other table.
 */
import { createTable, type Participant, type Table } from "../models/session";
import type { TablePlan } from "./groupSizing";
import { cryptoRandom, type RandomSource } from "./secureRandom";

export interface FillTarget {
  table: Table;
  size: number;
  isCustom: boolean;
  isWinnersTable: boolean;
}

export interface CustomResolution {
  completeTables: Table[];
  openTables: Table[];
  available: Participant[];
  dissolvedIds: string[];
}

export function resolveCustomTables(
  participants: readonly Participant[],
  roundNumber: number,
  allowCustomGroups: boolean,
): CustomResolution {
  const groups = new Map<string, Participant[]>();
  const available: Participant[] = [];

  for (const p of participants) {
    if (!allowCustomGroups || p.customGroupId === "") {
      available.push(p);
      continue;
    }
    const members = groups.get(p.customGroupId) ?? [];
    members.push(p);
    groups.set(p.customGroupId, members);
  }

  const completeTables: Table[] = [];
  const openTables: Table[] = [];
  const dissolvedIds: string[] = [];

  for (const members of groups.values()) {
    if (members.length === 1) {
      const [loner] = members;
      if (!loner) continue;
      loner.customGroupId = "";
      loner.autoFill = false;
      dissolvedIds.push(loner.id);
      available.push(loner);
      continue;
    }

    // The first member's flag speaks for the group; creation sets it on all.
    const autoFill = members[0]?.autoFill ?? false;
    if (members.length >= 4 || !autoFill) {
      const table = createTable(roundNumber, { isCustom: true, autoFill: false });
      table.participants.push(...members);
      completeTables.push(table);
    } else {
      const table = createTable(roundNumber, { isCustom: true, autoFill: true });
      table.participants.push(...members);
      openTables.push(table);
    }
  }

  return { completeTables, openTables, available, dissolvedIds };
}

/**
 * Give each open custom table a target size out of the plan, consuming the
 * plan as it goes. When both sizes remain the choice is a coin flip. Open
 * tables left without a planned slot are returned in `unplaced`.
 */
export function assignOpenTableSizes(
  openTables: readonly Table[],
  plan: TablePlan,
  random: RandomSource = cryptoRandom,
): { targets: FillTarget[]; remaining: TablePlan; unplaced: Table[] } {
  let { fours, threes } = plan;
  const targets: FillTarget[] = [];
  const unplaced: Table[] = [];

  for (const table of openTables) {
    const members = table.participants.length;
    const fitsFour = fours > 0 && members <= 4;
    const fitsThree = threes > 0 && members <= 3;

    let size: number;
    if (fitsFour && fitsThree) {
      size = random.nextInt(2) === 0 ? 4 : 3;
    } else if (fitsFour) {
      size = 4;
    } else if (fitsThree) {
      size = 3;
    } else {
      unplaced.push(table);
      continue;
    }

    if (size === 4) fours--;
    else threes--;

    targets.push({ table, size, isCustom: true, isWinnersTable: false });
  }

  return { targets, remaining: { fours, threes }, unplaced };
}
