/**
 * In-memory registry of live sessions keyed by room code.
 *
 * Every read-modify-write on a session goes through `withSession`, which
 * holds that room's lock for the whole command. Saving to the store and
 * notifying listeners are side effects: both are best-effort and neither
 * can fail a command.
 */
import {
  createParticipant,
  createSession,
  isExpired,
  type Participant,
  type Session,
} from "../models/session";
import { failure, success, type CommandResult } from "../models/results";
import type { SessionStore } from "../database/sessionRepository";
import { archiveCurrentRound } from "../utils/roundArchive";
import { generateRoomCode } from "../utils/secureRandom";
import { KeyedMutex } from "./sessionLock";
import { SessionEvents } from "./sessionEvents";

const DEBUG = process.env.DEBUG === "true";

export const DEFAULT_TTL_MS = 7 * 24 * 60 * 60 * 1000;
export const DEFAULT_CODE_LENGTH = 6;
const MIN_CODE_LENGTH = 4;
const MAX_CODE_LENGTH = 12;
const MAX_CODE_ATTEMPTS = 1000;

export interface SessionRegistryOptions {
  store?: SessionStore;
  events?: SessionEvents;
  clock?: () => Date;
}

export function normalizeCode(code: string): string {
  return code.trim().toUpperCase();
}

export class SessionRegistry {
  readonly events: SessionEvents;
  private sessions = new Map<string, Session>();
  private locks = new KeyedMutex();
  private store?: SessionStore;
  private clock: () => Date;
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(options: SessionRegistryOptions = {}) {
    this.store = options.store;
    this.events = options.events ?? new SessionEvents();
    this.clock = options.clock ?? (() => new Date());
  }

  now(): Date {
    return this.clock();
  }

  createSession(
    hostId: string,
    codeLength = DEFAULT_CODE_LENGTH,
    ttlMs = DEFAULT_TTL_MS,
  ): CommandResult<Session> {
    if (!hostId || !hostId.trim()) {
      return failure("InvalidInput", "hostId is required");
    }
    if (
      !Number.isInteger(codeLength) ||
      codeLength < MIN_CODE_LENGTH ||
      codeLength > MAX_CODE_LENGTH
    ) {
      return failure(
        "InvalidInput",
        `codeLength must be between ${MIN_CODE_LENGTH} and ${MAX_CODE_LENGTH}`,
      );
    }
    if (!Number.isFinite(ttlMs) || ttlMs <= 0) {
      return failure("InvalidInput", "ttl must be positive");
    }

    for (let attempt = 0; attempt < MAX_CODE_ATTEMPTS; attempt++) {
      const code = generateRoomCode(codeLength);
      if (this.sessions.has(code)) continue;

      const now = this.now();
      const session = createSession({
        code,
        hostId: hostId.trim(),
        createdAt: now,
        expiresAt: new Date(now.getTime() + ttlMs),
      });
      this.sessions.set(code, session);
      this.persist(session);
      if (DEBUG) console.log(`🏠 Created room ${code} for host ${session.hostId}`);
      return success(session);
    }

    throw new Error(
      "Unable to generate a unique room code. Try increasing code length.",
    );
  }

  async join(
    code: string,
    participantId: string,
    participantName = "",
    character = "",
  ): Promise<CommandResult<Participant>> {
    if (!code || !code.trim()) return failure("InvalidInput", "Room code is required");
    if (!participantId || !participantId.trim()) {
      return failure("InvalidInput", "participantId is required");
    }

    return this.withSession(code, (session) => {
      if (session.isGameEnded) return failure("GameEnded", "Game has ended");
      if (session.isGameStarted && !session.settings.allowJoinAfterStart) {
        return failure("JoinClosed", "Game has started");
      }
      if (session.participants.has(participantId)) {
        return failure(
          "DuplicateParticipant",
          `A user with the id ${participantId} is already in the game`,
        );
      }

      const participant = createParticipant({
        id: participantId,
        name: participantName.trim(),
        character: character.trim(),
        joinedAt: this.now(),
      });
      session.participants.set(participant.id, participant);

      this.persist(session);
      this.events.emit("participantJoined", { session, participant });
      return success(participant);
    });
  }

  /**
   * Memory first, then the store. A session found only in the store is
   * cached so later commands operate on the same object. Expired sessions
   * read as missing.
   */
  async getSession(code: string): Promise<Session | null> {
    const session = await this.lookup(code);
    if (!session || isExpired(session, this.now())) return null;
    return session;
  }

  private async lookup(code: string): Promise<Session | null> {
    if (!code || !code.trim()) return null;
    const key = normalizeCode(code);

    const cached = this.sessions.get(key);
    if (cached) return cached;
    if (!this.store) return null;

    const loaded = await this.store.loadSession(key);
    if (!loaded || loaded.isArchived) return null;

    // Another caller may have cached it while we were loading.
    const raced = this.sessions.get(key);
    if (raced) return raced;
    this.sessions.set(key, loaded);
    return loaded;
  }

  async getAllSessions(): Promise<Session[]> {
    const result = [...this.sessions.values()];
    if (!this.store) return result;

    try {
      for (const stored of await this.store.getAllSessions()) {
        // Listed, not cached: archived sessions stay out of the registry.
        if (this.sessions.has(normalizeCode(stored.code))) continue;
        result.push(stored);
      }
    } catch (error) {
      console.error("❌ Failed to load sessions from store:", error);
    }
    return result;
  }

  /**
   * Run `body` holding the room's exclusive lock.
   */
  async withSession<T>(
    code: string,
    body: (session: Session) => CommandResult<T>,
  ): Promise<CommandResult<T>> {
    const session = await this.getSession(code);
    if (!session) return failure("RoomNotFound", "Room not found or expired");
    return this.locks.runExclusive(session.code, () => body(session));
  }

  /**
   * Load every live stored session into memory at startup. Sessions that
   * expired while the server was down are closed out by the next sweep.
   */
  async loadFromStore(): Promise<number> {
    if (!this.store) return 0;
    let loaded = 0;
    for (const session of await this.store.getAllSessions()) {
      if (session.isArchived) continue;
      this.sessions.set(normalizeCode(session.code), session);
      loaded++;
    }
    return loaded;
  }

  /**
   * Archive and evict every expired session, one lock at a time. Returns
   * the evicted room codes.
   */
  async sweepExpired(): Promise<string[]> {
    const now = this.now();
    const expired = [...this.sessions.values()].filter((s) => isExpired(s, now));
    const evicted: string[] = [];

    for (const session of expired) {
      await this.locks.runExclusive(session.code, () => {
        if (this.sessions.get(session.code) !== session) return;

        if (!session.isGameEnded) {
          archiveCurrentRound(session, now);
          session.isGameEnded = true;
        }
        session.isArchived = true;
        this.persist(session);
        this.sessions.delete(session.code);
        evicted.push(session.code);
        this.events.emit("sessionExpired", { session });
      });
    }

    if (evicted.length > 0) {
      console.log(`🧹 Swept ${evicted.length} expired session(s)`);
    }
    return evicted;
  }

  startSweeper(intervalMs: number): void {
    this.stopSweeper();
    this.sweepTimer = setInterval(() => {
      this.sweepExpired().catch((error: unknown) => {
        console.error("❌ Expiry sweep failed:", error);
      });
    }, intervalMs);
    this.sweepTimer.unref();
  }

  stopSweeper(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  /**
   * Fire-and-forget save. The in-memory change has already happened and
   * stands regardless of the outcome.
   */
  persist(session: Session): void {
    if (!this.store) return;
    this.store.saveSession(session).catch((error: unknown) => {
      console.error(`❌ Failed to save session ${session.code}:`, error);
    });
  }
}
