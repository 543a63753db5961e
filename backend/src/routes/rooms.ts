import express from "express";
import type { ErrorCode, CommandResult } from "../models/results";
import type { PointsSchema, Session, TableStatistics } from "../models/session";
import { findTableOf } from "../models/session";
import {
  toParticipantRecord,
  toSessionRecord,
  toTableRecord,
} from "../database/serialization";
import type {
  GenerateCommand,
  ReportOutcome,
  RoundController,
  SettingsUpdate,
  TableResult,
} from "../services/roundController";
import type { SessionRegistry } from "../services/sessionRegistry";

export function httpStatusFor(code: ErrorCode): number {
  switch (code) {
    case "RoomNotFound":
    case "TableNotFound":
    case "ParticipantNotFound":
      return 404;
    case "DuplicateParticipant":
      return 409;
    case "Forbidden":
      return 403;
    default:
      return 400;
  }
}

function field(body: unknown, key: string): unknown {
  if (typeof body !== "object" || body === null) return undefined;
  const value: unknown = Reflect.get(body, key);
  return value;
}

function stringField(body: unknown, key: string): string {
  const value = field(body, key);
  return typeof value === "string" ? value : "";
}

function numberField(body: unknown, key: string): number | undefined {
  const value = field(body, key);
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function recordField(body: unknown, key: string): Record<string, unknown> | undefined {
  const value = field(body, key);
  if (typeof value !== "object" || value === null || Array.isArray(value)) return undefined;
  const record: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(value)) record[k] = v;
  return record;
}

const GAME_ACTIONS = {
  generatefirst: "generate-first",
  generate: "generate-next",
  regenerate: "regenerate",
  start: "start",
  resetround: "reset",
  endround: "end-round",
  endgame: "end-game",
} as const;

type GameAction = (typeof GAME_ACTIONS)[keyof typeof GAME_ACTIONS];

function parseGameAction(raw: string): GameAction | undefined {
  const key = raw.trim().toLowerCase();
  for (const [name, action] of Object.entries(GAME_ACTIONS)) {
    if (name === key) return action;
  }
  return undefined;
}

function parseOutcome(raw: string): ReportOutcome | undefined {
  const value = raw.trim().toLowerCase();
  if (value === "win" || value === "draw" || value === "drop" || value === "data") {
    return value;
  }
  return undefined;
}

/**
 * Keep only the known settings keys whose values have the right type.
 * Range checks happen in the controller.
 */
function parseSettingsPatch(raw: Record<string, unknown> | undefined): SettingsUpdate {
  const patch: SettingsUpdate = {};
  if (!raw) return patch;

  const flags = [
    "allowThreeSeatTables",
    "extraThreeSeatPenalty",
    "prioritizeWinners",
    "allowJoinAfterStart",
    "allowCustomGroups",
  ] as const;
  for (const flag of flags) {
    const value = raw[flag];
    if (typeof value === "boolean") patch[flag] = value;
  }

  const roundLength = numberField(raw, "roundLengthMinutes");
  if (roundLength !== undefined) patch.roundLengthMinutes = roundLength;
  const maxRounds = numberField(raw, "maxRounds");
  if (maxRounds !== undefined) patch.maxRounds = maxRounds;
  const maxTableSize = numberField(raw, "maxTableSize");
  if (maxTableSize === 3 || maxTableSize === 4) patch.maxTableSize = maxTableSize;

  const points = recordField(raw, "pointsSchema");
  if (points) {
    const pointsPatch: Partial<PointsSchema> = {};
    for (const key of ["win", "draw", "loss"] as const) {
      const value = numberField(points, key);
      if (value !== undefined) pointsPatch[key] = value;
    }
    patch.pointsSchema = pointsPatch;
  }
  return patch;
}

export function toSessionSummary(session: Session) {
  return {
    code: session.code,
    eventName: session.eventName,
    createdAt: session.createdAt.toISOString(),
    expiresAt: session.expiresAt.toISOString(),
    settings: session.settings,
    currentRound: session.currentRound,
    isGameStarted: session.isGameStarted,
    isGameEnded: session.isGameEnded,
    participants: [...session.participants.values()].map(toParticipantRecord),
    archivedRoundCount: session.archivedRounds.length,
  };
}

export function createRoomsRouter(
  registry: SessionRegistry,
  controller: RoundController,
  options: { sessionTtlMs?: number } = {},
): express.Router {
  const router = express.Router();

  const reply = <T>(
    res: express.Response,
    result: CommandResult<T>,
    onSuccess: (value: T) => unknown,
    status = 200,
  ) => {
    if (result.ok) {
      res.status(status).json(onSuccess(result.value));
    } else {
      res.status(httpStatusFor(result.error.code)).json({
        error: result.error.message,
        code: result.error.code,
      });
    }
  };

  // Answers 404/403 itself and returns false when the caller is not the host.
  const requireHost = async (
    req: express.Request,
    res: express.Response,
  ): Promise<boolean> => {
    const session = await registry.getSession(req.params.code ?? "");
    if (!session) {
      res.status(404).json({ error: "Room not found or expired", code: "RoomNotFound" });
      return false;
    }
    const hostId = stringField(req.body, "hostId");
    if (!hostId || hostId !== session.hostId) {
      res.status(403).json({ error: "Only the host can do this", code: "Forbidden" });
      return false;
    }
    return true;
  };

  // Create a room
  router.post("/", async (req, res, next) => {
    try {
      const hostId = stringField(req.body, "hostId");
      const codeLength = numberField(req.body, "codeLength");
      const ttlMinutes = numberField(req.body, "ttlMinutes");
      const ttlMs = ttlMinutes !== undefined ? ttlMinutes * 60 * 1000 : options.sessionTtlMs;

      const result = registry.createSession(hostId, codeLength, ttlMs);
      reply(res, result, (session) => toSessionRecord(session), 201);
    } catch (error) {
      next(error);
    }
  });

  // All rooms, full snapshots
  router.get("/", async (req, res, next) => {
    try {
      const sessions = await registry.getAllSessions();
      res.json(sessions.map(toSessionRecord));
    } catch (error) {
      next(error);
    }
  });

  router.get("/:code", async (req, res, next) => {
    try {
      const session = await registry.getSession(req.params.code);
      if (!session) {
        res.status(404).json({ error: "Room not found or expired", code: "RoomNotFound" });
        return;
      }
      res.json(toSessionSummary(session));
    } catch (error) {
      next(error);
    }
  });

  router.post("/:code/join", async (req, res, next) => {
    try {
      const result = await registry.join(
        req.params.code,
        stringField(req.body, "participantId"),
        stringField(req.body, "participantName"),
        stringField(req.body, "character"),
      );
      reply(res, result, toParticipantRecord);
    } catch (error) {
      next(error);
    }
  });

  router.post("/:code/settings", async (req, res, next) => {
    try {
      const eventName = field(req.body, "eventName");
      const result = await controller.updateSettings(
        req.params.code,
        stringField(req.body, "hostId"),
        {
          eventName: typeof eventName === "string" ? eventName : undefined,
          settings: parseSettingsPatch(recordField(req.body, "settings")),
        },
      );
      reply(res, result, toSessionSummary);
    } catch (error) {
      next(error);
    }
  });

  router.post("/:code/handlegame", async (req, res, next) => {
    try {
      if (!(await requireHost(req, res))) return;

      const action = parseGameAction(stringField(req.body, "action"));
      if (!action) {
        res.status(400).json({ error: "Unknown action", code: "InvalidInput" });
        return;
      }

      const code = req.params.code;
      switch (action) {
        case "generate-first":
        case "generate-next":
        case "regenerate": {
          const command: GenerateCommand = action;
          const result = await controller.generateRound(code, command);
          return reply(res, result, (value) => ({
            round: value.round,
            tables: value.tables.map(toTableRecord),
          }));
        }
        case "start":
          return reply(res, await controller.startRound(code), (tables) =>
            tables.map(toTableRecord),
          );
        case "reset":
          return reply(res, await controller.resetRound(code), (tables) =>
            tables.map(toTableRecord),
          );
        case "end-round":
          return reply(res, await controller.endRound(code), (archived) => ({
            archivedRounds: archived,
          }));
        case "end-game":
          return reply(res, await controller.endGame(code), toSessionSummary);
      }
    } catch (error) {
      next(error);
    }
  });

  router.post("/:code/report", async (req, res, next) => {
    try {
      const outcome = parseOutcome(stringField(req.body, "result"));
      if (!outcome) {
        res.status(400).json({ error: "result must be win, draw, drop or data", code: "InvalidInput" });
        return;
      }
      const statistics: TableStatistics = recordField(req.body, "statistics") ?? {};
      const result = await controller.reportOutcome(
        req.params.code,
        stringField(req.body, "participantId"),
        outcome,
        stringField(req.body, "character"),
        statistics,
      );
      reply(res, result, (value) => ({
        winnerId: value.winnerId ?? null,
        tableNumber: value.tableNumber ?? null,
        removedParticipant: value.removedParticipant
          ? toParticipantRecord(value.removedParticipant)
          : null,
      }));
    } catch (error) {
      next(error);
    }
  });

  router.post("/:code/custom-groups", async (req, res, next) => {
    try {
      if (!(await requireHost(req, res))) return;

      const rawIds = field(req.body, "participantIds");
      const ids = Array.isArray(rawIds)
        ? rawIds.filter((id): id is string => typeof id === "string")
        : [];
      const autoFill = field(req.body, "autoFill") === true;

      const result = await controller.createCustomGroup(req.params.code, ids, autoFill);
      reply(res, result, (groupId) => ({ groupId }), 201);
    } catch (error) {
      next(error);
    }
  });

  router.delete("/:code/custom-groups/:groupId", async (req, res, next) => {
    try {
      if (!(await requireHost(req, res))) return;
      const result = await controller.deleteCustomGroup(req.params.code, req.params.groupId);
      reply(res, result, (cleared) => ({ cleared }));
    } catch (error) {
      next(error);
    }
  });

  router.post("/:code/move", async (req, res, next) => {
    try {
      if (!(await requireHost(req, res))) return;

      const fromTable = numberField(req.body, "fromTable");
      const toTable = numberField(req.body, "toTable");
      const round = numberField(req.body, "round");
      const participantId = stringField(req.body, "participantId");
      if (fromTable === undefined || toTable === undefined || round === undefined || !participantId) {
        res.status(400).json({
          error: "fromTable, toTable, round and participantId are required",
          code: "InvalidInput",
        });
        return;
      }

      const result = await controller.moveParticipant(
        req.params.code,
        fromTable,
        toTable,
        round,
        participantId,
      );
      reply(res, result, (value) => ({
        participantId: value.participantId,
        fromTable: value.fromTable,
        toTable: value.toTable,
        tables: value.tables.map(toTableRecord),
      }));
    } catch (error) {
      next(error);
    }
  });

  router.post("/:code/tables/:tableNumber/result", async (req, res, next) => {
    try {
      if (!(await requireHost(req, res))) return;

      const tableNumber = Number(req.params.tableNumber);
      if (!Number.isInteger(tableNumber)) {
        res.status(400).json({ error: "tableNumber must be an integer", code: "InvalidInput" });
        return;
      }
      const kind = stringField(req.body, "result").trim().toLowerCase();
      let result: TableResult;
      if (kind === "win") {
        result = { kind: "win", participantId: stringField(req.body, "participantId") };
      } else if (kind === "draw" || kind === "none") {
        result = { kind };
      } else {
        res.status(400).json({ error: "result must be win, draw or none", code: "InvalidInput" });
        return;
      }

      const outcome = await controller.setTableResult(req.params.code, tableNumber, result);
      reply(res, outcome, toTableRecord);
    } catch (error) {
      next(error);
    }
  });

  router.get("/:code/current", async (req, res, next) => {
    try {
      const session = await registry.getSession(req.params.code);
      if (!session) {
        res.status(404).json({ error: "Room not found or expired", code: "RoomNotFound" });
        return;
      }
      res.json({
        round: session.currentRound,
        tables: (session.tables ?? []).map(toTableRecord),
      });
    } catch (error) {
      next(error);
    }
  });

  router.get("/:code/table/:participantId", async (req, res, next) => {
    try {
      const session = await registry.getSession(req.params.code);
      if (!session) {
        res.status(404).json({ error: "Room not found or expired", code: "RoomNotFound" });
        return;
      }
      const table = findTableOf(session.tables, req.params.participantId);
      if (!table) {
        res.status(404).json({
          error: "Participant is not seated in the current round",
          code: "ParticipantNotFound",
        });
        return;
      }
      res.json(toTableRecord(table));
    } catch (error) {
      next(error);
    }
  });

  router.get("/:code/archived", async (req, res, next) => {
    try {
      const session = await registry.getSession(req.params.code);
      if (!session) {
        res.status(404).json({ error: "Room not found or expired", code: "RoomNotFound" });
        return;
      }
      res.json(session.archivedRounds.map((round) => round.map(toTableRecord)));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
