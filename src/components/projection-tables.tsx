"use client";

import { Card, CardContent, CardDescription, CardHeader, CardTitle } from "@/components/ui/card";
import { formatMoney, formatNumber } from "@/lib/format";
import { MONTHLY_COLUMNS, YEARLY_COLUMNS } from "@/lib/projection/labels";
import type { MonthlyResultRow, YearlyTotals } from "@/lib/projection/types";
import { cn } from "@/lib/utils";

type DisplayFormat = "integer" | "clients" | "money" | "optional";

const MONTHLY_FORMATS: Record<keyof MonthlyResultRow, DisplayFormat> = {
  month: "integer",
  newClients: "integer",
  cancellations: "optional",
  netActivations: "integer",
  signedClientsCumulative: "integer",
  payingClients: "clients",
  clientPaymentsGross: "money",
  newSaleIncome: "money",
  commissionFromClients: "money",
  totalEarnings: "money",
};

const YEARLY_FORMATS: Record<keyof YearlyTotals, DisplayFormat> = {
  year: "integer",
  clientPaymentsGross: "money",
  newSaleIncome: "money",
  commissionFromClients: "money",
  totalEarnings: "money",
};

type TableFormatting = {
  currency: string;
  locale: string;
};

const formatCell = (
  value: number | null,
  format: DisplayFormat,
  { currency, locale }: TableFormatting,
): string => {
  if (value === null) {
    return "-";
  }

  switch (format) {
    case "money":
      return formatMoney(value, locale, currency);
    case "clients":
      return formatNumber(value, locale, { fractionDigits: 2 });
    case "integer":
    case "optional":
      return formatNumber(value, locale, { fractionDigits: 0 });
  }
};

const headerCell = "sticky top-0 bg-background px-3 py-2 text-right text-xs font-semibold uppercase tracking-wide text-muted-foreground first:text-left";
const bodyCell = "px-3 py-1.5 text-right tabular-nums first:text-left";

export function MonthlyTable({ rows, ...formatting }: { rows: readonly MonthlyResultRow[] } & TableFormatting) {
  return (
    <div className="max-h-[480px] overflow-auto rounded-lg border">
      <table className="w-full border-collapse text-sm">
        <thead>
          <tr className="border-b">
            {MONTHLY_COLUMNS.map((column) => (
              <th key={column.key} className={headerCell}>
                {column.label}
              </th>
            ))}
          </tr>
        </thead>
        <tbody>
          {rows.map((row) => (
            <tr key={row.month} className={cn("border-b last:border-b-0", row.month % 12 === 0 && "border-b-2")}>
              {MONTHLY_COLUMNS.map((column) => (
                <td key={column.key} className={bodyCell}>
                  {formatCell(row[column.key], MONTHLY_FORMATS[column.key], formatting)}
                </td>
              ))}
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  );
}

export function YearlyTable({ totals, ...formatting }: { totals: readonly YearlyTotals[] } & TableFormatting) {
  return (
    <div className="overflow-auto rounded-lg border">
      <table className="w-full border-collapse text-sm">
        <thead>
          <tr className="border-b">
            {YEARLY_COLUMNS.map((column) => (
              <th key={column.key} className={headerCell}>
                {column.label}
              </th>
            ))}
          </tr>
        </thead>
        <tbody>
          {totals.map((year) => (
            <tr key={year.year} className="border-b last:border-b-0">
              {YEARLY_COLUMNS.map((column) => (
                <td key={column.key} className={bodyCell}>
                  {formatCell(year[column.key], YEARLY_FORMATS[column.key], formatting)}
                </td>
              ))}
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  );
}

type ProjectionTablesProps = {
  monthly: readonly MonthlyResultRow[];
  yearly: readonly YearlyTotals[];
} & TableFormatting;

export function ProjectionTables({ monthly, yearly, ...formatting }: ProjectionTablesProps) {
  return (
    <div className="grid gap-6 2xl:grid-cols-[2fr_1fr]">
      <Card className="min-w-0 shadow-sm">
        <CardHeader>
          <CardTitle>Monthly Breakdown</CardTitle>
          <CardDescription>Paying clients are expected values once churn applies.</CardDescription>
        </CardHeader>
        <CardContent>
          <MonthlyTable rows={monthly} {...formatting} />
        </CardContent>
      </Card>
      <Card className="min-w-0 shadow-sm">
        <CardHeader>
          <CardTitle>Yearly Totals</CardTitle>
          <CardDescription>Months grouped in twelves; the last year may be partial.</CardDescription>
        </CardHeader>
        <CardContent>
          <YearlyTable totals={yearly} {...formatting} />
        </CardContent>
      </Card>
    </div>
  );
}
