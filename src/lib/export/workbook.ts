import * as XLSX from "xlsx";

import { aggregateByYear } from "@/lib/projection/projection";
import {
  CANCELLATION_MODE_LABELS,
  CONTRACT_TYPE_LABELS,
  LIFETIME_MODE_LABELS,
  MONTHLY_COLUMNS,
  PAYOUT_POLICY_LABELS,
  PAYOUT_TYPE_LABELS,
  YEARLY_COLUMNS,
} from "@/lib/projection/labels";
import type { MonthlyResultRow, ProjectionParameters } from "@/lib/projection/types";

export const PROJECTION_SHEET = "Projection";
export const SUMMARY_SHEET = "Summary";
export const EXPORT_FILE_NAME = "Earnings_Projection.xlsx";

const NOT_APPLICABLE = "-";
const PROJECTION_COLUMN_WIDTH = 24;
const SUMMARY_COLUMN_WIDTH = 28;
const SUMMARY_COLUMN_COUNT = 6;

type CellValue = string | number | boolean;

export type ParameterEntry = [label: string, value: CellValue];

export interface ProjectionExport {
  rows: readonly MonthlyResultRow[];
  parameters: ProjectionParameters;
  currency: string;
  generatedAt: Date;
}

const pad = (value: number): string => String(value).padStart(2, "0");

export const formatTimestamp = (date: Date): string =>
  `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}`;

export const buildParameterEntries = (
  parameters: ProjectionParameters,
  currency: string,
): ParameterEntry[] => {
  const { cancellation, contract, override, bonus, lifetime, payout } = parameters;

  return [
    ["Months", parameters.horizonMonths],
    ["Currency", currency],
    ["New Clients / month (default)", parameters.defaultNewClients],
    ["Override month", override ? override.month : NOT_APPLICABLE],
    ["Override New Clients", override ? override.newClients : NOT_APPLICABLE],
    ["Cancellations mode", CANCELLATION_MODE_LABELS[cancellation.mode]],
    [
      "Cancellations / month (if Fixed)",
      cancellation.mode === "fixed" ? cancellation.perMonth : NOT_APPLICABLE,
    ],
    ["Churn % (if Churn)", cancellation.mode === "churn" ? cancellation.churnPercent : NOT_APPLICABLE],
    ["Lifetime (months)", lifetime.months],
    ["Lifetime mode", LIFETIME_MODE_LABELS[lifetime.mode]],
    ["Contract Type", CONTRACT_TYPE_LABELS[contract.type]],
    ["Free Months", contract.freeMonths],
    ["Intro Months", contract.type === "introRecurring" ? contract.introMonths : 0],
    ["Intro Amount", contract.type === "introRecurring" ? contract.introAmount : 0],
    ["Recurring Amount", contract.type === "introRecurring" ? contract.recurringAmount : 0],
    ["Flat Amount", contract.type === "flat" ? contract.flatAmount : 0],
    ["Commission Rate (%)", parameters.commissionRate],
    ["Payout policy", PAYOUT_POLICY_LABELS[payout.policy]],
    ["Payout type", PAYOUT_TYPE_LABELS[payout.type]],
    ["Use New Sale Payout", bonus.enabled],
    ["New Sale Payout", bonus.amountPerClient],
    ["Payout duration (months)", bonus.durationMonths],
  ];
};

const toMonthlyCells = (row: MonthlyResultRow): CellValue[] =>
  MONTHLY_COLUMNS.map(({ key }) => row[key] ?? NOT_APPLICABLE);

const columnWidths = (count: number, width: number): XLSX.ColInfo[] =>
  Array.from({ length: count }, () => ({ wch: width }));

const buildProjectionSheet = (input: ProjectionExport): XLSX.WorkSheet => {
  const aoa: CellValue[][] = [
    ["Inputs"],
    ...buildParameterEntries(input.parameters, input.currency),
    [],
    MONTHLY_COLUMNS.map(({ label }) => label),
    ...input.rows.map(toMonthlyCells),
  ];

  const sheet = XLSX.utils.aoa_to_sheet(aoa);
  sheet["!cols"] = columnWidths(MONTHLY_COLUMNS.length, PROJECTION_COLUMN_WIDTH);
  return sheet;
};

const buildSummarySheet = (input: ProjectionExport): XLSX.WorkSheet => {
  const yearly = aggregateByYear(input.rows);
  const aoa: CellValue[][] = [
    ["Earnings – Summary"],
    ["Generated", formatTimestamp(input.generatedAt)],
  ];

  if (yearly.length > 0) {
    aoa.push(
      [],
      YEARLY_COLUMNS.map(({ label }) => label),
      ...yearly.map((totals) => YEARLY_COLUMNS.map(({ key }) => totals[key])),
    );
  }

  const sheet = XLSX.utils.aoa_to_sheet(aoa);
  sheet["!cols"] = columnWidths(SUMMARY_COLUMN_COUNT, SUMMARY_COLUMN_WIDTH);
  return sheet;
};

/**
 * Two-sheet workbook: inputs followed by the monthly table, then a yearly summary.
 * Cell positions (inputs from A1, yearly header on row 4) match earlier exports.
 */
export const buildProjectionWorkbook = (input: ProjectionExport): XLSX.WorkBook => {
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, buildProjectionSheet(input), PROJECTION_SHEET);
  XLSX.utils.book_append_sheet(workbook, buildSummarySheet(input), SUMMARY_SHEET);
  return workbook;
};

export const XLSX_MIME_TYPE = "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet";

export const workbookToArrayBuffer = (workbook: XLSX.WorkBook): ArrayBuffer => {
  const buffer: ArrayBuffer = XLSX.write(workbook, { type: "array", bookType: "xlsx" });
  return buffer;
};
