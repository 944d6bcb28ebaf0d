import {
  SLOTS_PER_GROUP,
  groupLabel,
  voucherLabel,
  type DocumentType,
  type ExtractionResult,
  type ExtractionTable,
  type SessionView,
  type UploadedImageInfo,
} from "shared";
import type { Extractor } from "./extraction/extractor";
import { logger, type Logger } from "../utils/logger";

export interface UploadedImage extends UploadedImageInfo {
  data: ArrayBuffer;
}

/** An image as received, before the session assigns its revision. */
export type ImageUpload = Omit<UploadedImage, "revision">;

interface VoucherSlot {
  documentType: DocumentType;
  image: UploadedImage | null;
}

interface ClaimGroup {
  claimantId: string;
  slots: VoucherSlot[];
}

const createClaimGroup = (): ClaimGroup => ({
  claimantId: "",
  slots: Array.from({ length: SLOTS_PER_GROUP }, (_, index): VoucherSlot => ({
    documentType: index === 0 ? "receipt" : "proof of payment",
    image: null,
  })),
});

/**
 * Upload state of a single user: an append-only list of claim groups,
 * each holding exactly four voucher slots.
 */
export class ClaimSession {
  private readonly groups: ClaimGroup[] = [createClaimGroup()];
  private uploadCount = 0;
  private readonly log: Logger;

  constructor(readonly id: string) {
    this.log = logger.child({ sessionId: id });
  }

  get groupCount(): number {
    return this.groups.length;
  }

  addGroup(): void {
    this.groups.push(createClaimGroup());
    this.log.debug("Claim group added", { groupCount: this.groups.length });
  }

  setClaimantId(groupIndex: number, claimantId: string): void {
    this.getGroup(groupIndex).claimantId = claimantId;
  }

  setDocumentType(groupIndex: number, slotIndex: number, documentType: DocumentType): void {
    this.getSlot(groupIndex, slotIndex).documentType = documentType;
  }

  /** Replaces the slot content; `null` clears it. */
  setSlotImage(groupIndex: number, slotIndex: number, image: ImageUpload | null): void {
    const slot = this.getSlot(groupIndex, slotIndex);
    if (!image) {
      slot.image = null;
      return;
    }
    this.uploadCount += 1;
    slot.image = { ...image, revision: this.uploadCount };
  }

  getSlotImage(groupIndex: number, slotIndex: number): UploadedImage | null {
    return this.getSlot(groupIndex, slotIndex).image;
  }

  /**
   * Runs the extractor over every filled slot, group by group and slot by
   * slot. Empty slots produce no table. Session state is left untouched.
   */
  async submit(extractor: Extractor): Promise<ExtractionTable[]> {
    const tables: ExtractionTable[] = [];

    for (const [groupIndex, group] of this.groups.entries()) {
      for (const [slotIndex, slot] of group.slots.entries()) {
        // The slot may be changed by another request while the extractor runs
        const { image, documentType } = slot;
        const { claimantId } = group;
        if (!image) continue;

        let fields: ExtractionResult;
        try {
          fields = await extractor.extract(image);
        } catch (err) {
          throw new ExtractionError(groupIndex, slotIndex, err);
        }

        tables.push({
          groupIndex,
          groupLabel: groupLabel(groupIndex),
          claimantId,
          slotIndex,
          voucherLabel: voucherLabel(slotIndex),
          documentType,
          fileName: image.fileName,
          fields,
        });
      }
    }

    this.log.debug("Session submitted", { tableCount: tables.length });
    return tables;
  }

  toView(): SessionView {
    return {
      groups: this.groups.map((group, index) => ({
        index,
        claimantId: group.claimantId,
        slots: group.slots.map((slot, slotIndex) => ({
          index: slotIndex,
          documentType: slot.documentType,
          image: slot.image
            ? {
                fileName: slot.image.fileName,
                contentType: slot.image.contentType,
                size: slot.image.size,
                revision: slot.image.revision,
              }
            : null,
        })),
      })),
    };
  }

  private getGroup(groupIndex: number): ClaimGroup {
    const group = this.groups[groupIndex];
    if (!Number.isInteger(groupIndex) || !group) {
      throw new ClaimSlotNotFoundError(groupIndex);
    }
    return group;
  }

  private getSlot(groupIndex: number, slotIndex: number): VoucherSlot {
    const slot = this.getGroup(groupIndex).slots[slotIndex];
    if (!Number.isInteger(slotIndex) || !slot) {
      throw new ClaimSlotNotFoundError(groupIndex, slotIndex);
    }
    return slot;
  }
}

export class ClaimSlotNotFoundError extends Error {
  constructor(groupIndex: number, slotIndex?: number) {
    super(
      slotIndex === undefined
        ? `${groupLabel(groupIndex)} does not exist`
        : `${groupLabel(groupIndex)} has no ${voucherLabel(slotIndex)}`
    );
    this.name = "ClaimSlotNotFoundError";
  }
}

export class ExtractionError extends Error {
  constructor(groupIndex: number, slotIndex: number, cause: unknown) {
    super(
      `Failed to extract fields from ${groupLabel(groupIndex)} ${voucherLabel(slotIndex)}`,
      { cause }
    );
    this.name = "ExtractionError";
  }
}
