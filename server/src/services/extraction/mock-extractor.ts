import type { ExtractionResult } from "shared";
import type { UploadedImage } from "../claim-session";
import type { Extractor } from "./extractor";
import { logger } from "../../utils/logger";

export const MOCK_FIELDS: ExtractionResult = [
  { field: "brand_name", value: "MockBrand" },
  { field: "payment_type", value: "Credit Card" },
  { field: "category", value: "Meals" },
  { field: "tax_code", value: "TX123" },
];

export class MockExtractor implements Extractor {
  async extract(image: UploadedImage): Promise<ExtractionResult> {
    logger.debug("Mock extraction", { fileName: image.fileName, size: image.size });
    return MOCK_FIELDS.map((row) => ({ ...row }));
  }
}
