export const groupLabel = (groupIndex: number) => `Claim Group ${groupIndex + 1}`;

export const voucherLabel = (slotIndex: number) => `Voucher ${slotIndex + 1}`;
