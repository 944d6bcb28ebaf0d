import { serve } from "@hono/node-server";
import env from "./utils/env-vars";
import { logger } from "./utils/logger";
import { createApp } from "./app";
import { SessionStore } from "./services/session-store";
import { getExtractor } from "./services/extraction";

const app = createApp({
  store: new SessionStore({ idleTimeoutMs: env.SESSION_IDLE_MINUTES * 60 * 1000 }),
  extractor: getExtractor(),
  staticRoot: env.STATIC_ROOT,
  maxFileSize: env.MAX_FILE_SIZE,
});

serve({ fetch: app.fetch, port: env.APP_PORT, hostname: "0.0.0.0" }, (info) => {
  logger.info(`Grouped claim uploader listening on http://${info.address}:${info.port}`);
});
