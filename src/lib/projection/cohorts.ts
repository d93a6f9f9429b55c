import { CancellationMode, CancellationPolicy, ContractPlan, LifetimeMode } from "./types";

const MAX_CHURN_RATE = 0.99;

const toDecimal = (value: number): number => value / 100;

export const clampChurnRate = (churnPercent: number): number => {
  if (!Number.isFinite(churnPercent)) {
    return 0;
  }

  return Math.min(MAX_CHURN_RATE, Math.max(0, toDecimal(churnPercent)));
};

/**
 * Whether a cohort of the given age is still inside the client lifetime window.
 * A limit of 0 (or less) means the relationship never expires.
 */
export const isActiveByLifetime = (
  ageFromActivation: number,
  ageFromFirstPayment: number,
  lifetimeMonths: number,
  lifetimeMode: LifetimeMode,
): boolean => {
  if (lifetimeMonths <= 0) {
    return true;
  }

  if (lifetimeMode === "fromActivation") {
    return ageFromActivation < lifetimeMonths;
  }

  return ageFromFirstPayment < lifetimeMonths;
};

/** Share of a cohort that has not churned after `churnAge` months at a constant monthly rate. */
export const survivalFraction = (churnRate: number, churnAge: number): number => {
  if (churnRate <= 0 || churnAge <= 0) {
    return 1;
  }

  return Math.pow(1 - churnRate, churnAge);
};

export const pricePerClient = (contract: ContractPlan, ageFromActivation: number): number => {
  if (ageFromActivation < contract.freeMonths) {
    return 0;
  }

  if (contract.type === "flat") {
    return contract.flatAmount;
  }

  const effectiveAge = ageFromActivation - contract.freeMonths;
  return effectiveAge < contract.introMonths ? contract.introAmount : contract.recurringAmount;
};

export interface CohortAges {
  ageFromActivation: number;
  ageFromFirstPayment: number;
}

export const deriveCohortAges = (
  month: number,
  birthMonth: number,
  freeMonths: number,
): CohortAges | null => {
  const ageFromActivation = month - birthMonth;
  if (ageFromActivation < 0) {
    return null;
  }

  return {
    ageFromActivation,
    ageFromFirstPayment: Math.max(ageFromActivation - freeMonths, 0),
  };
};

// Fixed mode bakes cancellations into the cohort size, so only churn mode decays at read time.
export const cohortSurvival = (
  mode: CancellationMode,
  churnRate: number,
  lifetimeMode: LifetimeMode,
  ages: CohortAges,
): number => {
  if (mode === "fixed") {
    return 1;
  }

  const churnAge =
    lifetimeMode === "fromActivation" ? ages.ageFromActivation : ages.ageFromFirstPayment;

  return survivalFraction(churnRate, churnAge);
};

export const netCohortSize = (newClients: number, cancellation: CancellationPolicy): number =>
  cancellation.mode === "fixed" ? Math.max(newClients - cancellation.perMonth, 0) : newClients;
