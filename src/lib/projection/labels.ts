import {
  CancellationMode,
  ContractType,
  LifetimeMode,
  MonthlyResultRow,
  PayoutPolicy,
  PayoutType,
  YearlyTotals,
} from "./types";

export const CANCELLATION_MODE_LABELS: Record<CancellationMode, string> = {
  fixed: "Fixed",
  churn: "Churn",
};

export const LIFETIME_MODE_LABELS: Record<LifetimeMode, string> = {
  fromActivation: "From activation",
  afterFreeMonths: "After free months",
};

export const CONTRACT_TYPE_LABELS: Record<ContractType, string> = {
  introRecurring: "Intro + Recurring",
  flat: "Flat Monthly",
};

export const PAYOUT_POLICY_LABELS: Record<PayoutPolicy, string> = {
  bonusOnly: "Bonus only (no recurring)",
  bonusAndRecurring: "Bonus + Recurring",
  recurringOnly: "Recurring only (no bonus)",
};

export const PAYOUT_TYPE_LABELS: Record<PayoutType, string> = {
  commissionable: "Commissionable (x%)",
  flat: "Flat (direct)",
};

// Column order is shared by the on-screen table and the exported sheet.
export const MONTHLY_COLUMNS: ReadonlyArray<{ key: keyof MonthlyResultRow; label: string }> = [
  { key: "month", label: "Month" },
  { key: "newClients", label: "New Clients" },
  { key: "cancellations", label: "Cancellations" },
  { key: "netActivations", label: "Net Activations" },
  { key: "signedClientsCumulative", label: "Signed SMEs (Cumulative)" },
  { key: "payingClients", label: "Paying SMEs (this month)" },
  { key: "clientPaymentsGross", label: "Client Payments (Gross)" },
  { key: "newSaleIncome", label: "New Sale Income" },
  { key: "commissionFromClients", label: "Commission from Clients" },
  { key: "totalEarnings", label: "Total Monthly Earnings" },
];

export const YEARLY_COLUMNS: ReadonlyArray<{ key: keyof YearlyTotals; label: string }> = [
  { key: "year", label: "Year" },
  { key: "clientPaymentsGross", label: "Client Payments (Gross)" },
  { key: "newSaleIncome", label: "New Sale Income" },
  { key: "commissionFromClients", label: "Commission from Clients" },
  { key: "totalEarnings", label: "Total Yearly Earnings" },
];
