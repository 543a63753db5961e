/**
 * Table size planning.
 *
 * Pods play at 4 seats where possible. With 3-seat tables allowed the
 * remainder mod 4 is absorbed by converting 4-seat tables into 3-seat ones:
 *   r=1 -> two fours become three threes (8+1 = 9 = 3*3)
 *   r=2 -> one four becomes two threes   (4+2 = 6 = 2*3)
 *   r=3 -> one extra three
 * With 3-seat tables disallowed the remainder sits out as a bye.
 */

export const MIN_PARTICIPANTS = 6;

export interface TablePlan {
  fours: number;
  threes: number;
}

export function calculateTablePlan(
  participantCount: number,
  allowThreeSeatTables: boolean,
  maxTableSize: 3 | 4 = 4,
): TablePlan {
  const n = Math.max(0, Math.floor(participantCount));

  if (maxTableSize === 3) {
    return { fours: 0, threes: Math.floor(n / 3) };
  }

  const k = Math.floor(n / 4);
  if (!allowThreeSeatTables) return { fours: k, threes: 0 };

  // Pools of 1, 2 and 5 cannot be split exactly. Only reachable when custom
  // tables have already absorbed most of the room.
  if (n < MIN_PARTICIPANTS && n % 4 !== 0 && n % 4 !== 3) {
    return { fours: 0, threes: Math.floor(n / 3) };
  }

  switch (n % 4) {
    case 1:
      return { fours: k - 2, threes: 3 };
    case 2:
      return { fours: k - 1, threes: 2 };
    case 3:
      return { fours: k, threes: 1 };
    default:
      return { fours: k, threes: 0 };
  }
}
