type Float = number;

export type CancellationMode = "fixed" | "churn";

export type CancellationPolicy =
  | { mode: "fixed"; perMonth: number }
  | { mode: "churn"; churnPercent: Float };

export type LifetimeMode = "fromActivation" | "afterFreeMonths";

export interface LifetimeSettings {
  months: number;
  mode: LifetimeMode;
}

export type ContractType = "introRecurring" | "flat";

export type ContractPlan =
  | {
      type: "introRecurring";
      freeMonths: number;
      introMonths: number;
      introAmount: number;
      recurringAmount: number;
    }
  | {
      type: "flat";
      freeMonths: number;
      flatAmount: number;
    };

export type PayoutPolicy = "bonusOnly" | "bonusAndRecurring" | "recurringOnly";

export type PayoutType = "commissionable" | "flat";

export interface PayoutSettings {
  policy: PayoutPolicy;
  type: PayoutType;
}

export interface NewSaleBonus {
  enabled: boolean;
  amountPerClient: number;
  durationMonths: number;
}

export interface MonthOverride {
  month: number;
  newClients: number;
}

export interface ProjectionParameters {
  horizonMonths: number;
  defaultNewClients: number;
  override: MonthOverride | null;
  cancellation: CancellationPolicy;
  commissionRate: Float;
  payout: PayoutSettings;
  bonus: NewSaleBonus;
  contract: ContractPlan;
  lifetime: LifetimeSettings;
}

export interface Cohort {
  readonly birthMonth: number;
  readonly size: number;
}

export interface MonthlyResultRow {
  month: number;
  newClients: number;
  cancellations: number | null;
  netActivations: number;
  signedClientsCumulative: number;
  payingClients: Float;
  clientPaymentsGross: number;
  newSaleIncome: number;
  commissionFromClients: number;
  totalEarnings: number;
}

export interface YearlyTotals {
  year: number;
  clientPaymentsGross: number;
  newSaleIncome: number;
  commissionFromClients: number;
  totalEarnings: number;
}

export interface ProjectionTotals {
  months: number;
  clientPaymentsGross: number;
  newSaleIncome: number;
  commissionFromClients: number;
  totalEarnings: number;
}

export interface ProjectionResult {
  parameters: ProjectionParameters;
  monthly: MonthlyResultRow[];
  yearly: YearlyTotals[];
  totals: ProjectionTotals;
}
