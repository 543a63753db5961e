/**
 * Moving the live round into the archive.
 */
import {
  snapshotTables,
  type PointsSchema,
  type Round,
  type Session,
} from "../models/session";

/**
 * Award points for every decided, non-bye table of an archived round to
 * the participants still in the session.
 */
export function awardPoints(
  session: Session,
  round: Round,
  schema: PointsSchema,
): void {
  for (const table of round) {
    if (table.isBye) continue;
    if (!table.isDraw && table.winnerId === null) continue;

    for (const seat of table.participants) {
      const live = session.participants.get(seat.id);
      if (!live) continue;
      if (table.isDraw) live.points += schema.draw;
      else if (seat.id === table.winnerId) live.points += schema.win;
      else live.points += schema.loss;
    }
  }
}

/**
 * Snapshot the current tables onto the end of the archive and clear them.
 * Returns the archived round, or null when there was nothing to archive.
 */
export function archiveCurrentRound(session: Session, now: Date): Round | null {
  if (!session.tables || session.tables.length === 0) return null;

  const round = snapshotTables(session.tables, now);
  session.archivedRounds.push(round);
  awardPoints(session, round, session.settings.pointsSchema);
  session.tables = null;
  return round;
}
