import * as crypto from "node:crypto";
import { ClaimSession } from "./claim-session";
import { logger } from "../utils/logger";

export interface SessionStoreOptions {
  /** Sessions not initialized again within this window are discarded. */
  idleTimeoutMs: number;
  now?: () => number;
}

interface StoredSession {
  session: ClaimSession;
  lastSeen: number;
}

export class SessionStore {
  private readonly sessions = new Map<string, StoredSession>();
  readonly idleTimeoutMs: number;
  private readonly now: () => number;

  constructor({ idleTimeoutMs, now = Date.now }: SessionStoreOptions) {
    this.idleTimeoutMs = idleTimeoutMs;
    this.now = now;
  }

  /**
   * Returns the session for `sessionId`, creating one with a single empty
   * claim group when it is unknown or has expired. Never resets a live session.
   */
  initialize(sessionId?: string): ClaimSession {
    const now = this.now();
    this.evictIdle(now);

    const existing = sessionId ? this.sessions.get(sessionId) : undefined;
    if (existing) {
      existing.lastSeen = now;
      return existing.session;
    }

    const session = new ClaimSession(crypto.randomUUID());
    this.sessions.set(session.id, { session, lastSeen: now });
    logger.info("Session created", { sessionId: session.id, activeSessions: this.sessions.size });
    return session;
  }

  /** Drops every session idle for the full timeout, returning how many were removed. */
  evictIdle(now = this.now()): number {
    let evicted = 0;
    for (const [id, entry] of this.sessions) {
      if (now - entry.lastSeen >= this.idleTimeoutMs) {
        this.sessions.delete(id);
        evicted += 1;
      }
    }
    if (evicted > 0) {
      logger.info("Expired idle sessions", { evicted, activeSessions: this.sessions.size });
    }
    return evicted;
  }

  get size(): number {
    return this.sessions.size;
  }
}
