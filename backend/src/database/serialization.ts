/**
 * Plain JSON shapes for sessions. Used by the store and by API responses;
 * timestamps are ISO-8601 strings and the participant map becomes an array.
 */
import type {
  Participant,
  Round,
  Session,
  SessionSettings,
  Table,
  TableStatistics,
} from "../models/session";
import { defaultSettings } from "../models/session";

export interface ParticipantRecord {
  id: string;
  name: string;
  character: string;
  points: number;
  joinedAt: string;
  dropped: boolean;
  order: number;
  customGroupId: string;
  autoFill: boolean;
}

export interface TableRecord {
  tableNumber: number;
  roundNumber: number;
  participants: ParticipantRecord[];
  winnerId: string | null;
  isDraw: boolean;
  hasResult: boolean;
  roundStarted: boolean;
  startedAt: string | null;
  completedAt: string | null;
  statistics: TableStatistics;
  isCustom: boolean;
  autoFill: boolean;
  isBye: boolean;
}

export interface SessionRecord {
  code: string;
  hostId: string;
  eventName: string;
  createdAt: string;
  expiresAt: string;
  settings: SessionSettings;
  currentRound: number;
  participants: ParticipantRecord[];
  tables: TableRecord[] | null;
  archivedRounds: TableRecord[][];
  isGameStarted: boolean;
  isGameEnded: boolean;
  isArchived: boolean;
}

const iso = (d: Date | null): string | null => (d ? d.toISOString() : null);
const date = (s: string | null): Date | null => (s ? new Date(s) : null);

export function toParticipantRecord(p: Participant): ParticipantRecord {
  return {
    id: p.id,
    name: p.name,
    character: p.character,
    points: p.points,
    joinedAt: p.joinedAt.toISOString(),
    dropped: p.dropped,
    order: p.order,
    customGroupId: p.customGroupId,
    autoFill: p.autoFill,
  };
}

export function toTableRecord(t: Table): TableRecord {
  return {
    tableNumber: t.tableNumber,
    roundNumber: t.roundNumber,
    participants: t.participants.map(toParticipantRecord),
    winnerId: t.winnerId,
    isDraw: t.isDraw,
    hasResult: t.isDraw || t.winnerId !== null,
    roundStarted: t.roundStarted,
    startedAt: iso(t.startedAt),
    completedAt: iso(t.completedAt),
    statistics: { ...t.statistics },
    isCustom: t.isCustom,
    autoFill: t.autoFill,
    isBye: t.isBye,
  };
}

export function toSessionRecord(s: Session): SessionRecord {
  return {
    code: s.code,
    hostId: s.hostId,
    eventName: s.eventName,
    createdAt: s.createdAt.toISOString(),
    expiresAt: s.expiresAt.toISOString(),
    settings: { ...s.settings, pointsSchema: { ...s.settings.pointsSchema } },
    currentRound: s.currentRound,
    participants: [...s.participants.values()].map(toParticipantRecord),
    tables: s.tables ? s.tables.map(toTableRecord) : null,
    archivedRounds: s.archivedRounds.map((round) => round.map(toTableRecord)),
    isGameStarted: s.isGameStarted,
    isGameEnded: s.isGameEnded,
    isArchived: s.isArchived,
  };
}

export function fromParticipantRecord(r: ParticipantRecord): Participant {
  return {
    id: r.id,
    name: r.name,
    character: r.character ?? "",
    points: r.points ?? 0,
    joinedAt: new Date(r.joinedAt),
    dropped: r.dropped ?? false,
    order: r.order ?? 0,
    customGroupId: r.customGroupId ?? "",
    autoFill: r.autoFill ?? false,
  };
}

export function fromTableRecord(r: TableRecord): Table {
  return {
    tableNumber: r.tableNumber,
    roundNumber: r.roundNumber,
    participants: r.participants.map(fromParticipantRecord),
    winnerId: r.winnerId ?? null,
    isDraw: r.isDraw ?? false,
    roundStarted: r.roundStarted ?? false,
    startedAt: date(r.startedAt),
    completedAt: date(r.completedAt),
    statistics: { ...(r.statistics ?? {}) },
    isCustom: r.isCustom ?? false,
    autoFill: r.autoFill ?? false,
    isBye: r.isBye ?? false,
  };
}

export function fromSessionRecord(r: SessionRecord): Session {
  const participants = new Map<string, Participant>();
  for (const p of r.participants) participants.set(p.id, fromParticipantRecord(p));

  const archivedRounds: Round[] = r.archivedRounds.map((round) =>
    Object.freeze(round.map((t) => Object.freeze(fromTableRecord(t)))),
  );

  return {
    code: r.code,
    hostId: r.hostId,
    eventName: r.eventName ?? "",
    createdAt: new Date(r.createdAt),
    expiresAt: new Date(r.expiresAt),
    settings: { ...defaultSettings(), ...r.settings },
    currentRound: r.currentRound,
    participants,
    tables: r.tables ? r.tables.map(fromTableRecord) : null,
    archivedRounds,
    isGameStarted: r.isGameStarted,
    isGameEnded: r.isGameEnded,
    isArchived: r.isArchived ?? false,
  };
}

/**
 * Parse a stored document. Only the fields every session must have are
 * checked; missing optional fields fall back to defaults above.
 */
export function parseSessionRecord(json: string): SessionRecord {
  const parsed: unknown = JSON.parse(json);
  if (!isSessionRecord(parsed)) {
    throw new Error("Stored session document is malformed");
  }
  return parsed;
}

function isSessionRecord(value: unknown): value is SessionRecord {
  if (typeof value !== "object" || value === null) return false;
  return (
    "code" in value &&
    typeof value.code === "string" &&
    "hostId" in value &&
    typeof value.hostId === "string" &&
    "participants" in value &&
    Array.isArray(value.participants) &&
    "archivedRounds" in value &&
    Array.isArray(value.archivedRounds)
  );
}
