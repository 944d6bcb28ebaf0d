import { getCookie, setCookie } from "hono/cookie";
import { createMiddleware } from "hono/factory";
import type { ClaimSession } from "../services/claim-session";
import type { SessionStore } from "../services/session-store";
import { logger, type Logger } from "../utils/logger";

export const SESSION_COOKIE = "claim_session";

export type SessionEnv = {
  Variables: {
    session: ClaimSession;
    log: Logger;
  };
};

export const sessionMiddleware = (store: SessionStore) =>
  createMiddleware<SessionEnv>(async (c, next) => {
    const session = store.initialize(getCookie(c, SESSION_COOKIE));
    setCookie(c, SESSION_COOKIE, session.id, {
      path: "/",
      httpOnly: true,
      sameSite: "Lax",
      maxAge: Math.floor(store.idleTimeoutMs / 1000),
    });
    c.set("session", session);
    c.set("log", logger.child({ sessionId: session.id }));
    await next();
  });
