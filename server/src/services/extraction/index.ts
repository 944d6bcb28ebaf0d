import env from "../../utils/env-vars";
import { logger } from "../../utils/logger";
import type { Extractor } from "./extractor";
import { MockExtractor } from "./mock-extractor";

export type { Extractor } from "./extractor";

export function getExtractor(): Extractor {
  if (env.GOOGLE_APPLICATION_CREDENTIALS) {
    logger.info(
      `Extraction credentials configured at ${env.GOOGLE_APPLICATION_CREDENTIALS}, mock extraction in use`
    );
  }

  return new MockExtractor();
}
