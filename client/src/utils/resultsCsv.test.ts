import type { ExtractionTable } from "shared";
import { buildResultsCsv } from "./resultsCsv";

describe("buildResultsCsv", () => {
  it("writes one row per extracted field", () => {
    const tables: ExtractionTable[] = [
      {
        groupIndex: 0,
        groupLabel: "Claim Group 1",
        claimantId: "EMP-7",
        slotIndex: 0,
        voucherLabel: "Voucher 1",
        documentType: "receipt",
        fileName: "a.png",
        fields: [
          { field: "brand_name", value: "Cafe, Bar" },
          { field: "tax_code", value: "TX123" },
        ],
      },
      {
        groupIndex: 1,
        groupLabel: "Claim Group 2",
        claimantId: "",
        slotIndex: 3,
        voucherLabel: "Voucher 4",
        documentType: "proof of payment",
        fileName: "b.png",
        fields: [{ field: "category", value: "Meals" }],
      },
    ];

    expect(buildResultsCsv(tables).split("\r\n")).toEqual([
      "Claim Group,Claimant ID,Voucher,Document Type,File,Field,Value",
      'Claim Group 1,EMP-7,Voucher 1,receipt,a.png,brand_name,"Cafe, Bar"',
      "Claim Group 1,EMP-7,Voucher 1,receipt,a.png,tax_code,TX123",
      "Claim Group 2,,Voucher 4,proof of payment,b.png,category,Meals",
    ]);
  });
});
