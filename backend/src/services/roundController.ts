/**
 * Round lifecycle commands. Each command runs under the room's lock via
 * `SessionRegistry.withSession` and either mutates the session and answers
 * `ok`, or answers a failure with the session untouched.
 */
import { v4 as uuidv4 } from "uuid";
import {
  hasAnyRoundStarted,
  hasResult,
  findTableOf,
  type Participant,
  type PointsSchema,
  type Session,
  type SessionSettings,
  type Table,
  type TableStatistics,
} from "../models/session";
import { failure, success, type CommandResult } from "../models/results";
import { generateRound } from "../utils/groupGeneration";
import { MIN_PARTICIPANTS } from "../utils/groupSizing";
import { archiveCurrentRound } from "../utils/roundArchive";
import type { RandomSource } from "../utils/secureRandom";
import type { SessionRegistry } from "./sessionRegistry";

const DEBUG = process.env.DEBUG === "true";

export type GenerateCommand = "generate-first" | "generate-next" | "regenerate";
export type ReportOutcome = "win" | "draw" | "drop" | "data";
export type TableResult =
  | { kind: "win"; participantId: string }
  | { kind: "draw" }
  | { kind: "none" };

export interface GeneratedRoundResult {
  round: number;
  tables: Table[];
}

export interface ReportResult {
  winnerId?: string;
  removedParticipant?: Participant;
  tableNumber?: number;
}

export interface MoveResult {
  participantId: string;
  fromTable: number;
  toTable: number;
  tables: Table[];
}

export type SettingsUpdate = Partial<Omit<SessionSettings, "pointsSchema">> & {
  pointsSchema?: Partial<PointsSchema>;
};

export interface SettingsPatch {
  eventName?: string;
  settings?: SettingsUpdate;
}

export interface RoundControllerOptions {
  random?: RandomSource;
}

export class RoundController {
  private random?: RandomSource;

  constructor(
    private registry: SessionRegistry,
    options: RoundControllerOptions = {},
  ) {
    this.random = options.random;
  }

  generateRound(
    code: string,
    command: GenerateCommand,
  ): Promise<CommandResult<GeneratedRoundResult>> {
    return this.registry.withSession(code, (session) => {
      if (session.isGameEnded) return failure("GameEnded", "Game has ended");

      const active = [...session.participants.values()].filter((p) => !p.dropped);
      if (active.length < MIN_PARTICIPANTS) {
        return failure(
          "InsufficientParticipants",
          `At least ${MIN_PARTICIPANTS} participants are required`,
        );
      }

      const { maxRounds } = session.settings;
      switch (command) {
        case "generate-first":
          if (session.currentRound > 0) {
            return failure("AlreadyStarted", "First round has already been generated");
          }
          break;
        case "generate-next":
          if (maxRounds > 0 && session.currentRound >= maxRounds) {
            return failure("MaxRoundsReached", `Maximum of ${maxRounds} rounds reached`);
          }
          break;
        case "regenerate":
          if (!session.tables || session.tables.length === 0) {
            return failure("NotStarted", "There is no current round to regenerate");
          }
          if (hasAnyRoundStarted(session)) {
            return failure("RoundInProgress", "Cannot regenerate a round that has started");
          }
          break;
      }

      // Generation can only throw on a defect, so it runs before anything
      // on the session changes.
      const roundNumber = command === "regenerate" ? session.currentRound : session.currentRound + 1;
      const archivedRounds =
        command === "generate-next" && session.tables && session.tables.length > 0
          ? [...session.archivedRounds, session.tables]
          : session.archivedRounds;
      const generated = generateRound({
        participants: active,
        archivedRounds,
        settings: session.settings,
        roundNumber,
        isFirstRound: roundNumber === 1 && archivedRounds.length === 0,
        random: this.random,
      });

      if (command === "generate-next") archiveCurrentRound(session, this.registry.now());
      session.currentRound = roundNumber;
      session.tables = generated.tables;
      session.isGameStarted = true;

      for (const id of generated.dissolvedIds) {
        const live = session.participants.get(id);
        if (live) {
          live.customGroupId = "";
          live.autoFill = false;
        }
      }

      if (DEBUG) {
        console.log(`🎯 ${session.code}: ${command} -> round ${roundNumber}, ${generated.tables.length} table(s)`);
      }
      this.registry.persist(session);
      this.registry.events.emit("roundGenerated", {
        session,
        round: roundNumber,
        tables: session.tables,
      });
      return success({ round: roundNumber, tables: session.tables });
    });
  }

  startRound(code: string): Promise<CommandResult<Table[]>> {
    return this.registry.withSession(code, (session) => {
      const tables = currentTables(session);
      if (!tables.ok) return tables;

      const now = this.registry.now();
      for (const table of tables.value) {
        table.roundStarted = true;
        table.startedAt = new Date(now.getTime());
        for (const seat of table.participants) {
          const live = session.participants.get(seat.id);
          if (live) seat.character = live.character;
        }
      }

      this.registry.persist(session);
      this.registry.events.emit("roundStarted", {
        session,
        round: session.currentRound,
        tables: tables.value,
      });
      return success(tables.value);
    });
  }

  resetRound(code: string): Promise<CommandResult<Table[]>> {
    return this.registry.withSession(code, (session) => {
      const tables = currentTables(session);
      if (!tables.ok) return tables;

      for (const table of tables.value) {
        table.roundStarted = false;
        table.startedAt = null;
        table.completedAt = null;
      }

      this.registry.persist(session);
      return success(tables.value);
    });
  }

  /**
   * Archive the current tables. The session then waits for the next
   * generation.
   */
  endRound(code: string): Promise<CommandResult<number>> {
    return this.registry.withSession(code, (session) => {
      if (session.isGameEnded) return failure("GameEnded", "Game has ended");
      if (!archiveCurrentRound(session, this.registry.now())) {
        return failure("NotStarted", "There is no current round to end");
      }
      this.registry.persist(session);
      return success(session.archivedRounds.length);
    });
  }

  endGame(code: string): Promise<CommandResult<Session>> {
    return this.registry.withSession(code, (session) => {
      if (session.isGameEnded) return failure("GameEnded", "Game has already ended");

      archiveCurrentRound(session, this.registry.now());
      session.isGameEnded = true;

      console.log(`🏁 Session ${session.code} ended after ${session.archivedRounds.length} round(s)`);
      this.registry.persist(session);
      this.registry.events.emit("sessionEnded", { session });
      return success(session);
    });
  }

  reportOutcome(
    code: string,
    participantId: string,
    outcome: ReportOutcome,
    character = "",
    statistics: TableStatistics = {},
  ): Promise<CommandResult<ReportResult>> {
    if (!code || !code.trim()) {
      return Promise.resolve(failure("InvalidInput", "Room code is required"));
    }
    if (!participantId || !participantId.trim()) {
      return Promise.resolve(failure("InvalidInput", "participantId is required"));
    }

    return this.registry.withSession(code, (session) => {
      if (session.isGameEnded) return failure("GameEnded", "Game has ended");

      if (outcome === "drop") {
        if (hasAnyRoundStarted(session)) {
          return failure("RoundInProgress", "Cannot drop out while a round is in progress");
        }
        const removed = session.participants.get(participantId);
        if (!removed) return failure("ParticipantNotFound", "Participant not found in room");

        session.participants.delete(participantId);
        removed.dropped = true;
        this.registry.persist(session);
        this.registry.events.emit("participantDropped", { session, participant: removed });
        return success({ removedParticipant: removed });
      }

      const live = session.participants.get(participantId);
      const table = findTableOf(session.tables, participantId);
      if (!live || !table || table.isBye) {
        return failure(
          "ParticipantNotFound",
          "Participant not found in room or not in current round",
        );
      }
      if (outcome !== "data" && hasResult(table)) {
        return failure("AlreadyReported", "This table already has a result");
      }

      if (character.trim()) live.character = character.trim();
      Object.assign(table.statistics, statistics);

      if (outcome === "data") {
        this.registry.persist(session);
        return success({ tableNumber: table.tableNumber });
      }

      table.completedAt = this.registry.now();
      if (outcome === "win") {
        table.winnerId = participantId;
        table.isDraw = false;
      } else {
        table.winnerId = null;
        table.isDraw = true;
      }

      this.registry.persist(session);
      this.registry.events.emit("gameEnded", {
        session,
        outcome,
        winnerId: table.winnerId,
        tableNumber: table.tableNumber,
      });
      return success({
        winnerId: table.winnerId ?? undefined,
        tableNumber: table.tableNumber,
      });
    });
  }

  /**
   * Host correction of a current-round table. Unlike a report, this may
   * overwrite an existing result.
   */
  setTableResult(
    code: string,
    tableNumber: number,
    result: TableResult,
  ): Promise<CommandResult<Table>> {
    return this.registry.withSession(code, (session) => {
      if (session.isGameEnded) return failure("GameEnded", "Game has ended");

      const table = session.tables?.find((t) => t.tableNumber === tableNumber && !t.isBye);
      if (!table) return failure("TableNotFound", `Table ${tableNumber} not found`);

      switch (result.kind) {
        case "win":
          if (!table.participants.some((p) => p.id === result.participantId)) {
            return failure("ParticipantNotFound", "Participant is not seated at this table");
          }
          table.winnerId = result.participantId;
          table.isDraw = false;
          table.completedAt = this.registry.now();
          break;
        case "draw":
          table.winnerId = null;
          table.isDraw = true;
          table.completedAt = this.registry.now();
          break;
        case "none":
          table.winnerId = null;
          table.isDraw = false;
          table.completedAt = null;
          break;
      }

      this.registry.persist(session);
      return success(table);
    });
  }

  moveParticipant(
    code: string,
    fromTable: number,
    toTable: number,
    round: number,
    participantId: string,
  ): Promise<CommandResult<MoveResult>> {
    return this.registry.withSession(code, (session) => {
      if (session.isGameEnded) return failure("GameEnded", "Game has ended");
      if (round !== session.currentRound) {
        return failure("InvalidInput", "Only tables of the current round can be changed");
      }

      const tables = session.tables ?? [];
      const source = tables.find((t) => t.tableNumber === fromTable);
      if (!source) return failure("TableNotFound", "Source table not found");
      const target = tables.find((t) => t.tableNumber === toTable);
      if (!target) return failure("TableNotFound", "Target table not found");

      const idx = source.participants.findIndex((p) => p.id === participantId);
      if (idx < 0) return failure("ParticipantNotFound", "Participant not found in source table");
      if (source === target) {
        return success({ participantId, fromTable, toTable, tables });
      }

      const [seat] = source.participants.splice(idx, 1);
      if (seat) {
        seat.order = target.isBye ? 0 : target.participants.length + 1;
        target.participants.push(seat);
      }
      if (source.winnerId === participantId) source.winnerId = null;
      source.participants.forEach((p, i) => {
        p.order = source.isBye ? 0 : i + 1;
      });

      this.registry.persist(session);
      return success({ participantId, fromTable, toTable, tables });
    });
  }

  createCustomGroup(
    code: string,
    participantIds: readonly string[],
    autoFill: boolean,
  ): Promise<CommandResult<string>> {
    return this.registry.withSession(code, (session) => {
      if (session.isGameEnded) return failure("GameEnded", "Game has ended");
      if (!session.settings.allowCustomGroups) {
        return failure("CustomGroupsDisabled", "Custom groups are not allowed for this session");
      }
      const ids = [...new Set(participantIds)];
      if (ids.length === 0) {
        return failure("InvalidInput", "A custom group needs at least one participant");
      }
      if (hasAnyRoundStarted(session)) {
        return failure("RoundInProgress", "Cannot create custom groups after the round has started");
      }

      const members: Participant[] = [];
      for (const id of ids) {
        const p = session.participants.get(id);
        if (!p) return failure("ParticipantNotFound", `Participant ${id} not found in session`);
        members.push(p);
      }

      const groupId = uuidv4();
      for (const p of members) {
        p.customGroupId = groupId;
        p.autoFill = autoFill;
      }
      dissolveSingleMemberGroups(session, groupId);

      this.registry.persist(session);
      return success(groupId);
    });
  }

  deleteCustomGroup(code: string, groupId: string): Promise<CommandResult<number>> {
    return this.registry.withSession(code, (session) => {
      if (session.isGameEnded) return failure("GameEnded", "Game has ended");
      if (hasAnyRoundStarted(session)) {
        return failure("RoundInProgress", "Cannot delete custom groups after the round has started");
      }

      const cleared = clearGroup(session, groupId);
      if (cleared === 0) return failure("InvalidInput", `Custom group ${groupId} not found`);

      this.registry.persist(session);
      return success(cleared);
    });
  }

  updateSettings(
    code: string,
    hostId: string,
    patch: SettingsPatch,
  ): Promise<CommandResult<Session>> {
    return this.registry.withSession(code, (session) => {
      if (session.hostId !== hostId) {
        return failure("Forbidden", "Only the host can change settings");
      }
      if (session.isGameEnded) return failure("GameEnded", "Game has ended");
      if (session.isGameStarted) {
        return failure("AlreadyStarted", "Settings cannot change after the game starts");
      }

      const next: SessionSettings = {
        ...session.settings,
        ...patch.settings,
        pointsSchema: {
          ...session.settings.pointsSchema,
          ...patch.settings?.pointsSchema,
        },
      };
      const problem = validateSettings(next);
      if (problem) return failure("InvalidInput", problem);

      session.settings = next;
      if (patch.eventName !== undefined) session.eventName = patch.eventName.trim();

      this.registry.persist(session);
      return success(session);
    });
  }
}

function currentTables(session: Session): CommandResult<Table[]> {
  if (session.isGameEnded) return failure("GameEnded", "Game has ended");
  if (!session.tables || session.tables.length === 0) {
    return failure("NotStarted", "No tables available");
  }
  return success(session.tables);
}

function clearGroup(session: Session, groupId: string): number {
  let cleared = 0;
  for (const p of session.participants.values()) {
    if (p.customGroupId !== groupId) continue;
    p.customGroupId = "";
    p.autoFill = false;
    cleared++;
  }
  return cleared;
}

function dissolveSingleMemberGroups(session: Session, keep: string): void {
  const counts = new Map<string, number>();
  for (const p of session.participants.values()) {
    if (!p.customGroupId || p.customGroupId === keep) continue;
    counts.set(p.customGroupId, (counts.get(p.customGroupId) ?? 0) + 1);
  }
  for (const [groupId, count] of counts) {
    if (count === 1) clearGroup(session, groupId);
  }
}

export function validateSettings(s: SessionSettings): string | null {
  if (s.maxTableSize !== 3 && s.maxTableSize !== 4) return "maxTableSize must be 3 or 4";
  if (!Number.isInteger(s.maxRounds) || s.maxRounds < 0) {
    return "maxRounds must be a non-negative integer";
  }
  if (!Number.isFinite(s.roundLengthMinutes) || s.roundLengthMinutes <= 0) {
    return "roundLengthMinutes must be positive";
  }
  const { win, draw, loss } = s.pointsSchema;
  if (![win, draw, loss].every(Number.isFinite)) return "points must be numbers";
  if (s.maxTableSize === 3 && !s.allowThreeSeatTables) {
    return "3-seat tables must be allowed when maxTableSize is 3";
  }
  return null;
}
