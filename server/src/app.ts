import { Hono } from "hono";
import { logger as requestLogger } from "hono/logger";
import { serveStatic } from "@hono/node-server/serve-static";
import env from "./utils/env-vars";
import { logger } from "./utils/logger";
import { createSessionRoutes } from "./routes/session";
import type { SessionStore } from "./services/session-store";
import type { Extractor } from "./services/extraction";

export interface AppOptions {
  store: SessionStore;
  extractor: Extractor;
  /** Directory of the built client; nothing is served statically when omitted. */
  staticRoot?: string;
  /** Largest accepted voucher image in bytes. */
  maxFileSize?: number;
}

export function createApp({
  store,
  extractor,
  staticRoot,
  maxFileSize = env.MAX_FILE_SIZE,
}: AppOptions) {
  const app = new Hono();

  app.use(requestLogger((message, ...rest) => logger.info(message, ...rest)));

  app.get("/healthz", (c) => {
    return c.text("OK", 200);
  });

  app.route("/api/session", createSessionRoutes(store, extractor, maxFileSize));

  if (staticRoot) {
    app.use("/*", serveStatic({ root: staticRoot }));
  }

  return app;
}
