/**
 * Session, table and participant shapes shared by the generation engine,
 * the round controller and the store.
 */

export const BYE_TABLE_NUMBER = 99;

export interface PointsSchema {
  win: number;
  draw: number;
  loss: number;
}

export interface SessionSettings {
  allowThreeSeatTables: boolean;
  extraThreeSeatPenalty: boolean; // each 3-seat placement weighs 4 instead of 1
  prioritizeWinners: boolean;
  allowJoinAfterStart: boolean;
  allowCustomGroups: boolean;
  roundLengthMinutes: number;
  pointsSchema: PointsSchema;
  maxRounds: number; // 0 = unlimited
  maxTableSize: 3 | 4;
}

export interface Participant {
  id: string;
  name: string;
  character: string; // deck / commander / role label, editable between rounds
  points: number;
  joinedAt: Date;
  dropped: boolean;
  order: number; // seat order within the current table, 1-based
  customGroupId: string; // "" when not in a custom group
  autoFill: boolean;
}

export type TableStatistics = Record<string, unknown>;

export interface Table {
  tableNumber: number;
  roundNumber: number;
  participants: Participant[];
  winnerId: string | null;
  isDraw: boolean;
  roundStarted: boolean;
  startedAt: Date | null;
  completedAt: Date | null;
  statistics: TableStatistics;
  isCustom: boolean;
  autoFill: boolean;
  isBye: boolean;
}

export type Round = readonly Table[];

export interface Session {
  code: string;
  hostId: string;
  eventName: string;
  createdAt: Date;
  expiresAt: Date;
  settings: SessionSettings;
  currentRound: number;
  participants: Map<string, Participant>;
  tables: Table[] | null;
  archivedRounds: Round[]; // oldest first
  isGameStarted: boolean;
  isGameEnded: boolean;
  isArchived: boolean;
}

export function defaultSettings(): SessionSettings {
  return {
    allowThreeSeatTables: true,
    extraThreeSeatPenalty: false,
    prioritizeWinners: true,
    allowJoinAfterStart: true,
    allowCustomGroups: true,
    roundLengthMinutes: 90,
    pointsSchema: { win: 3, draw: 1, loss: 0 },
    maxRounds: 0,
    maxTableSize: 4,
  };
}

export function createParticipant(params: {
  id: string;
  name?: string;
  character?: string;
  joinedAt?: Date;
}): Participant {
  return {
    id: params.id,
    name: params.name || params.id,
    character: params.character ?? "",
    points: 0,
    joinedAt: params.joinedAt ?? new Date(),
    dropped: false,
    order: 0,
    customGroupId: "",
    autoFill: false,
  };
}

export function createTable(
  roundNumber: number,
  flags: { isCustom?: boolean; autoFill?: boolean; isBye?: boolean } = {},
): Table {
  return {
    tableNumber: 0,
    roundNumber,
    participants: [],
    winnerId: null,
    isDraw: false,
    roundStarted: false,
    startedAt: null,
    completedAt: null,
    statistics: {},
    isCustom: flags.isCustom ?? false,
    autoFill: flags.autoFill ?? true,
    isBye: flags.isBye ?? false,
  };
}

export function createSession(params: {
  code: string;
  hostId: string;
  createdAt: Date;
  expiresAt: Date;
}): Session {
  return {
    code: params.code,
    hostId: params.hostId,
    eventName: "",
    createdAt: params.createdAt,
    expiresAt: params.expiresAt,
    settings: defaultSettings(),
    currentRound: 0,
    participants: new Map(),
    tables: null,
    archivedRounds: [],
    isGameStarted: false,
    isGameEnded: false,
    isArchived: false,
  };
}

export function hasResult(table: Table): boolean {
  return table.isDraw || table.winnerId !== null;
}

export function hasAnyRoundStarted(session: Session): boolean {
  return session.tables?.some((t) => t.roundStarted) ?? false;
}

export function isExpired(session: Session, now: Date): boolean {
  return now.getTime() >= session.expiresAt.getTime();
}

export function copyParticipant(p: Participant): Participant {
  return { ...p, joinedAt: new Date(p.joinedAt.getTime()) };
}

export function copyTable(t: Table): Table {
  return {
    ...t,
    participants: t.participants.map(copyParticipant),
    startedAt: t.startedAt ? new Date(t.startedAt.getTime()) : null,
    completedAt: t.completedAt ? new Date(t.completedAt.getTime()) : null,
    statistics: { ...t.statistics },
  };
}

/**
 * Freeze the current tables into an archive entry. Tables still missing a
 * completion time are stamped with `now` before copying.
 */
export function snapshotTables(tables: readonly Table[], now: Date): Round {
  const snapshot = tables.map((t) => {
    if (t.completedAt === null) t.completedAt = new Date(now.getTime());
    return Object.freeze(copyTable(t));
  });
  return Object.freeze(snapshot);
}

export function findTableOf(
  tables: readonly Table[] | null,
  participantId: string,
): Table | undefined {
  return tables?.find((t) => t.participants.some((p) => p.id === participantId));
}
