export const SLOTS_PER_GROUP = 4;

export const DOCUMENT_TYPES = ["receipt", "proof of payment", "other"] as const;

export type DocumentType = (typeof DOCUMENT_TYPES)[number];

export const ACCEPTED_IMAGE_TYPES = ["image/jpeg", "image/jpg", "image/png"];

export const ACCEPTED_IMAGE_EXTENSIONS = [".jpg", ".jpeg", ".png"];

export interface UploadedImageInfo {
  fileName: string;
  contentType: string;
  size: number;
  /** Increases with every upload in the session, so a replaced image never reuses the value. */
  revision: number;
}

export interface VoucherSlotView {
  index: number;
  documentType: DocumentType;
  image: UploadedImageInfo | null;
}

export interface ClaimGroupView {
  index: number;
  claimantId: string;
  slots: VoucherSlotView[];
}

export interface SessionView {
  groups: ClaimGroupView[];
}

export const toDocumentType = (value: string): DocumentType | undefined =>
  DOCUMENT_TYPES.find((type) => type === value);
