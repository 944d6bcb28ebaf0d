import type { DocumentType } from "./claim";

export interface ExtractionField {
  field: string;
  value: string;
}

export type ExtractionResult = ExtractionField[];

export interface ExtractionTable {
  groupIndex: number;
  groupLabel: string;
  claimantId: string;
  slotIndex: number;
  voucherLabel: string;
  documentType: DocumentType;
  fileName: string;
  fields: ExtractionResult;
}

export interface SubmissionResult {
  tables: ExtractionTable[];
}

export interface ApiError {
  error: string;
}
