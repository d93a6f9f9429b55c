import * as XLSX from "xlsx";
import { describe, expect, it } from "vitest";

import { projectEarnings } from "@/lib/projection/projection";
import type { ProjectionParameters } from "@/lib/projection/types";

import {
  PROJECTION_SHEET,
  SUMMARY_SHEET,
  buildParameterEntries,
  buildProjectionWorkbook,
  formatTimestamp,
  workbookToArrayBuffer,
} from "./workbook";

const PARAMETERS: ProjectionParameters = {
  horizonMonths: 3,
  defaultNewClients: 1,
  override: null,
  cancellation: { mode: "fixed", perMonth: 0 },
  commissionRate: 50,
  payout: { policy: "recurringOnly", type: "commissionable" },
  bonus: { enabled: false, amountPerClient: 0, durationMonths: 0 },
  contract: { type: "flat", freeMonths: 0, flatAmount: 100 },
  lifetime: { months: 0, mode: "fromActivation" },
};

const GENERATED_AT = new Date(2026, 0, 5, 9, 7);

const cellValue = (sheet: XLSX.WorkSheet, address: string): unknown => {
  const cell: XLSX.CellObject | undefined = sheet[address];
  return cell?.v;
};

const buildWorkbook = (parameters: ProjectionParameters = PARAMETERS) =>
  buildProjectionWorkbook({
    rows: projectEarnings(parameters),
    parameters,
    currency: "£",
    generatedAt: GENERATED_AT,
  });

describe("formatTimestamp", () => {
  it("renders local date and minutes", () => {
    expect(formatTimestamp(GENERATED_AT)).toBe("2026-01-05 09:07");
  });
});

describe("buildParameterEntries", () => {
  it("marks settings of inactive variants as not applicable", () => {
    const entries = new Map(buildParameterEntries(PARAMETERS, "£"));

    expect(entries.get("Override month")).toBe("-");
    expect(entries.get("Churn % (if Churn)")).toBe("-");
    expect(entries.get("Cancellations / month (if Fixed)")).toBe(0);
    expect(entries.get("Contract Type")).toBe("Flat Monthly");
    expect(entries.get("Intro Amount")).toBe(0);
    expect(entries.get("Flat Amount")).toBe(100);
    expect(entries.get("Payout policy")).toBe("Recurring only (no bonus)");
    expect(entries.get("Use New Sale Payout")).toBe(false);
  });

  it("lists every input in the export order", () => {
    const labels = buildParameterEntries(PARAMETERS, "£").map(([label]) => label);

    expect(labels).toHaveLength(22);
    expect(labels[0]).toBe("Months");
    expect(labels[21]).toBe("Payout duration (months)");
  });
});

describe("buildProjectionWorkbook", () => {
  it("creates the projection and summary sheets in order", () => {
    expect(buildWorkbook().SheetNames).toEqual([PROJECTION_SHEET, SUMMARY_SHEET]);
  });

  it("writes inputs from A1 followed by the monthly table", () => {
    const sheet = buildWorkbook().Sheets[PROJECTION_SHEET];

    expect(cellValue(sheet, "A1")).toBe("Inputs");
    expect(cellValue(sheet, "A2")).toBe("Months");
    expect(cellValue(sheet, "B2")).toBe(3);
    expect(cellValue(sheet, "B3")).toBe("£");
    expect(cellValue(sheet, "B5")).toBe("-");
    expect(cellValue(sheet, "A23")).toBe("Payout duration (months)");
    expect(cellValue(sheet, "A24")).toBeUndefined();

    expect(cellValue(sheet, "A25")).toBe("Month");
    expect(cellValue(sheet, "E25")).toBe("Signed SMEs (Cumulative)");
    expect(cellValue(sheet, "J25")).toBe("Total Monthly Earnings");

    expect(cellValue(sheet, "A26")).toBe(1);
    expect(cellValue(sheet, "C26")).toBe(0);
    expect(cellValue(sheet, "G26")).toBe(100);
    expect(cellValue(sheet, "J26")).toBe(50);
    expect(cellValue(sheet, "G28")).toBe(300);
    expect(cellValue(sheet, "A29")).toBeUndefined();

    expect(sheet["!cols"]).toHaveLength(10);
    expect(sheet["!cols"]?.[0]).toEqual({ wch: 24 });
  });

  it("writes a dash for cancellations in churn mode", () => {
    const sheet = buildWorkbook({
      ...PARAMETERS,
      cancellation: { mode: "churn", churnPercent: 10 },
    }).Sheets[PROJECTION_SHEET];

    expect(cellValue(sheet, "B8")).toBe("-");
    expect(cellValue(sheet, "B9")).toBe(10);
    expect(cellValue(sheet, "C26")).toBe("-");
  });

  it("summarises yearly totals under the run timestamp", () => {
    const sheet = buildWorkbook().Sheets[SUMMARY_SHEET];

    expect(cellValue(sheet, "A1")).toBe("Earnings – Summary");
    expect(cellValue(sheet, "A2")).toBe("Generated");
    expect(cellValue(sheet, "B2")).toBe("2026-01-05 09:07");
    expect(cellValue(sheet, "A4")).toBe("Year");
    expect(cellValue(sheet, "B4")).toBe("Client Payments (Gross)");
    expect(cellValue(sheet, "E4")).toBe("Total Yearly Earnings");
    expect(cellValue(sheet, "A5")).toBe(1);
    expect(cellValue(sheet, "B5")).toBe(600);
    expect(cellValue(sheet, "D5")).toBe(300);
    expect(cellValue(sheet, "E5")).toBe(300);
    expect(sheet["!cols"]?.[5]).toEqual({ wch: 28 });
  });
});

describe("workbookToArrayBuffer", () => {
  it("serialises to an xlsx archive that reads back with both sheets", () => {
    const bytes = new Uint8Array(workbookToArrayBuffer(buildWorkbook()));

    expect(bytes[0]).toBe(0x50);
    expect(bytes[1]).toBe(0x4b);
    expect(XLSX.read(bytes, { type: "array" }).SheetNames).toEqual([PROJECTION_SHEET, SUMMARY_SHEET]);
  });
});
