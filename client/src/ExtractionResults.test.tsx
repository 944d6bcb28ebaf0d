// @vitest-environment jsdom
import { render, screen, within } from "@testing-library/react";
import type { ExtractionTable } from "shared";
import { ExtractionResults } from "./ExtractionResults";

const fields = [
  { field: "brand_name", value: "MockBrand" },
  { field: "tax_code", value: "TX123" },
];

const table = (groupIndex: number, slotIndex: number, claimantId = ""): ExtractionTable => ({
  groupIndex,
  groupLabel: `Claim Group ${groupIndex + 1}`,
  claimantId,
  slotIndex,
  voucherLabel: `Voucher ${slotIndex + 1}`,
  documentType: slotIndex === 0 ? "receipt" : "proof of payment",
  fileName: `g${groupIndex}-s${slotIndex}.png`,
  fields,
});

describe("ExtractionResults", () => {
  it("groups the tables under their claim group", () => {
    render(<ExtractionResults tables={[table(0, 1), table(1, 0, "EMP-7"), table(1, 3, "EMP-7")]} />);

    expect(screen.getByText("Entity Tables for Claim Group 1")).toBeInTheDocument();
    expect(screen.getByText("Entity Tables for Claim Group 2")).toBeInTheDocument();
    expect(screen.getByText("Claimant ID: EMP-7")).toBeInTheDocument();
    expect(screen.getAllByRole("table")).toHaveLength(3);

    const lastTable = screen.getByRole("table", { name: "Claim Group 2 Voucher 4 fields" });
    expect(within(lastTable).getByText("tax_code")).toBeInTheDocument();
    expect(within(lastTable).getByText("TX123")).toBeInTheDocument();
  });

  it("labels each table with its voucher and document type", () => {
    render(<ExtractionResults tables={[table(0, 0), table(0, 2)]} />);

    expect(screen.getByText("Voucher 1 (receipt)")).toBeInTheDocument();
    expect(screen.getByText("Voucher 3 (proof of payment)")).toBeInTheDocument();
    expect(screen.getByRole("button", { name: "Download CSV" })).toBeInTheDocument();
  });

  it("renders an info message without tables", () => {
    render(<ExtractionResults tables={[]} />);

    expect(
      screen.getByText("No vouchers uploaded yet. Add images to a claim group and submit again.")
    ).toBeInTheDocument();
    expect(screen.queryByRole("button", { name: "Download CSV" })).not.toBeInTheDocument();
  });
});
