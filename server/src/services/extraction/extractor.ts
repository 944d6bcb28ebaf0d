import type { ExtractionResult } from "shared";
import type { UploadedImage } from "../claim-session";

/**
 * Document-understanding capability used on submit. Implementations receive
 * a non-empty image and return its fields as ordered (field, value) rows.
 */
export interface Extractor {
  extract(image: UploadedImage): Promise<ExtractionResult>;
}
