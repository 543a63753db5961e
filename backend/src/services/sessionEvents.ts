/**
 * Outbound session notifications.
 *
 * Delivery is best-effort and at-most-once: a listener that throws is
 * logged and skipped, and nothing in the round lifecycle depends on a
 * listener having run.
 */
import type { Participant, Session, Table } from "../models/session";

export interface SessionEventMap {
  participantJoined: { session: Session; participant: Participant };
  roundGenerated: { session: Session; round: number; tables: readonly Table[] };
  roundStarted: { session: Session; round: number; tables: readonly Table[] };
  gameEnded: {
    session: Session;
    outcome: "win" | "draw";
    winnerId: string | null;
    tableNumber: number;
  };
  participantDropped: { session: Session; participant: Participant };
  sessionEnded: { session: Session };
  sessionExpired: { session: Session };
}

export type SessionEventName = keyof SessionEventMap;

type Listener<K extends SessionEventName> = (payload: SessionEventMap[K]) => void;

type ListenerLists = { [K in SessionEventName]: Listener<K>[] };

export class SessionEvents {
  private listeners: ListenerLists = {
    participantJoined: [],
    roundGenerated: [],
    roundStarted: [],
    gameEnded: [],
    participantDropped: [],
    sessionEnded: [],
    sessionExpired: [],
  };

  /**
   * Register a listener; the returned function unregisters it.
   */
  on<K extends SessionEventName>(event: K, listener: Listener<K>): () => void {
    const list: Listener<K>[] = this.listeners[event];
    list.push(listener);
    return () => {
      const idx = list.indexOf(listener);
      if (idx >= 0) list.splice(idx, 1);
    };
  }

  emit<K extends SessionEventName>(event: K, payload: SessionEventMap[K]): void {
    const list: Listener<K>[] = this.listeners[event];
    for (const listener of [...list]) {
      try {
        listener(payload);
      } catch (error) {
        console.error(`❌ Listener for ${event} failed:`, error);
      }
    }
  }
}
