"use client";

import {
  CartesianGrid,
  Legend,
  Line,
  LineChart,
  ResponsiveContainer,
  Tooltip,
  XAxis,
  YAxis,
} from "recharts";

import { formatMoney } from "@/lib/format";
import type { MonthlyResultRow } from "@/lib/projection/types";

type TrendSeries = {
  key: "clientPaymentsGross" | "commissionFromClients" | "totalEarnings";
  label: string;
  color: string;
};

const TREND_SERIES: TrendSeries[] = [
  { key: "clientPaymentsGross", label: "Client Payments (Gross)", color: "#0f172a" },
  { key: "commissionFromClients", label: "Commission from Clients", color: "#059669" },
  { key: "totalEarnings", label: "Total Monthly Earnings", color: "#d97706" },
];

type TrendChartProps = {
  rows: readonly MonthlyResultRow[];
  currency: string;
  locale: string;
};

export function TrendChart({ rows, currency, locale }: TrendChartProps) {
  const formatAxis = (value: number) => formatMoney(value, locale, currency, { fractionDigits: 0 });
  const formatTooltip = (value: unknown) =>
    typeof value === "number" ? formatMoney(value, locale, currency) : String(value);

  return (
    <div className="h-80 w-full">
      <ResponsiveContainer width="100%" height="100%">
        <LineChart data={[...rows]} margin={{ top: 16, right: 16, left: 8, bottom: 0 }}>
          <CartesianGrid strokeDasharray="3 3" vertical={false} stroke="#e2e8f0" />
          <XAxis
            dataKey="month"
            axisLine={false}
            tickLine={false}
            tick={{ fill: "#94a3b8", fontSize: 11 }}
          />
          <YAxis
            axisLine={false}
            tickLine={false}
            width={88}
            tick={{ fill: "#94a3b8", fontSize: 11 }}
            tickFormatter={formatAxis}
          />
          <Tooltip
            formatter={formatTooltip}
            labelFormatter={(month) => `Month ${String(month)}`}
          />
          <Legend />
          {TREND_SERIES.map((series) => (
            <Line
              key={series.key}
              type="monotone"
              dataKey={series.key}
              name={series.label}
              stroke={series.color}
              strokeWidth={2}
              dot={false}
            />
          ))}
        </LineChart>
      </ResponsiveContainer>
    </div>
  );
}
