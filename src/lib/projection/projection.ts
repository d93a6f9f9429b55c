import {
  clampChurnRate,
  cohortSurvival,
  deriveCohortAges,
  isActiveByLifetime,
  netCohortSize,
  pricePerClient,
} from "./cohorts";
import { assertProjectionParameters } from "./errors";
import {
  Cohort,
  MonthlyResultRow,
  PayoutPolicy,
  ProjectionParameters,
  ProjectionResult,
  ProjectionTotals,
  YearlyTotals,
} from "./types";

const MONTHS_PER_YEAR = 12;

const toDecimal = (value: number): number => value / 100;

export const includesBonus = (policy: PayoutPolicy): boolean =>
  policy === "bonusOnly" || policy === "bonusAndRecurring";

export const includesRecurring = (policy: PayoutPolicy): boolean =>
  policy === "bonusAndRecurring" || policy === "recurringOnly";

export const newClientsForMonth = (parameters: ProjectionParameters, month: number): number => {
  const { override } = parameters;
  if (override !== null && override.month === month && override.month > 0) {
    return override.newClients;
  }

  return parameters.defaultNewClients;
};

interface RecurringRevenue {
  payingClients: number;
  clientPaymentsGross: number;
}

const sumRecurringRevenue = (
  parameters: ProjectionParameters,
  cohorts: readonly Cohort[],
  month: number,
  churnRate: number,
): RecurringRevenue => {
  const { cancellation, contract, lifetime } = parameters;
  let payingClients = 0;
  let clientPaymentsGross = 0;

  for (const cohort of cohorts) {
    const ages = deriveCohortAges(month, cohort.birthMonth, contract.freeMonths);
    if (ages === null) {
      continue;
    }

    if (
      !isActiveByLifetime(
        ages.ageFromActivation,
        ages.ageFromFirstPayment,
        lifetime.months,
        lifetime.mode,
      )
    ) {
      continue;
    }

    const survival = cohortSurvival(cancellation.mode, churnRate, lifetime.mode, ages);
    const price = pricePerClient(contract, ages.ageFromActivation);

    if (price > 0) {
      const activeClients = cohort.size * survival;
      payingClients += activeClients;
      clientPaymentsGross += price * activeClients;
    }
  }

  return { payingClients, clientPaymentsGross };
};

const calculateBonusRaw = (parameters: ProjectionParameters, month: number, newClients: number): number => {
  const { bonus, payout } = parameters;
  if (
    !includesBonus(payout.policy) ||
    !bonus.enabled ||
    bonus.durationMonths <= 0 ||
    month > bonus.durationMonths
  ) {
    return 0;
  }

  // Paid on this month's signups, not on the cumulative book.
  return bonus.amountPerClient * newClients;
};

const calculateTotal = (policy: PayoutPolicy, bonusToAgent: number, commission: number): number => {
  switch (policy) {
    case "bonusOnly":
      return bonusToAgent;
    case "recurringOnly":
      return commission;
    case "bonusAndRecurring":
      return bonusToAgent + commission;
  }
};

/**
 * Runs the month-by-month cohort simulation and returns one row per month of the horizon.
 *
 * Every month appends a cohort sized by that month's net activations. Recurring revenue is
 * then read across all cohorts born so far, applying the lifetime cutoff, churn decay (churn
 * mode only) and the contract price schedule for each cohort's age.
 *
 * @throws {ProjectionPreconditionError} when the parameter set is out of range.
 */
export const projectEarnings = (parameters: ProjectionParameters): MonthlyResultRow[] => {
  assertProjectionParameters(parameters);

  const { cancellation, payout } = parameters;
  const commissionRate = toDecimal(parameters.commissionRate);
  const churnRate = cancellation.mode === "churn" ? clampChurnRate(cancellation.churnPercent) : 0;
  const withRecurring = includesRecurring(payout.policy);

  const cohorts: Cohort[] = [];
  const rows: MonthlyResultRow[] = [];
  let signedCumulative = 0;

  for (let month = 1; month <= parameters.horizonMonths; month += 1) {
    const newClients = newClientsForMonth(parameters, month);
    const netActivations = netCohortSize(newClients, cancellation);

    cohorts.push({ birthMonth: month, size: netActivations });
    signedCumulative += netActivations;

    const recurring = withRecurring
      ? sumRecurringRevenue(parameters, cohorts, month, churnRate)
      : { payingClients: 0, clientPaymentsGross: 0 };

    const commissionFromClients = withRecurring ? recurring.clientPaymentsGross * commissionRate : 0;

    const bonusRaw = calculateBonusRaw(parameters, month, newClients);
    const newSaleIncome = payout.type === "commissionable" ? bonusRaw * commissionRate : bonusRaw;

    rows.push({
      month,
      newClients,
      cancellations: cancellation.mode === "fixed" ? cancellation.perMonth : null,
      netActivations,
      signedClientsCumulative: signedCumulative,
      payingClients: recurring.payingClients,
      clientPaymentsGross: recurring.clientPaymentsGross,
      newSaleIncome,
      commissionFromClients,
      totalEarnings: calculateTotal(payout.policy, newSaleIncome, commissionFromClients),
    });
  }

  return rows;
};

export const yearOfMonth = (month: number): number => Math.floor((month - 1) / MONTHS_PER_YEAR) + 1;

export const aggregateByYear = (rows: readonly MonthlyResultRow[]): YearlyTotals[] => {
  const byYear = new Map<number, YearlyTotals>();

  for (const row of rows) {
    const year = yearOfMonth(row.month);
    const current = byYear.get(year) ?? {
      year,
      clientPaymentsGross: 0,
      newSaleIncome: 0,
      commissionFromClients: 0,
      totalEarnings: 0,
    };

    byYear.set(year, {
      year,
      clientPaymentsGross: current.clientPaymentsGross + row.clientPaymentsGross,
      newSaleIncome: current.newSaleIncome + row.newSaleIncome,
      commissionFromClients: current.commissionFromClients + row.commissionFromClients,
      totalEarnings: current.totalEarnings + row.totalEarnings,
    });
  }

  return [...byYear.values()].sort((a, b) => a.year - b.year);
};

export const summariseProjection = (rows: readonly MonthlyResultRow[]): ProjectionTotals =>
  rows.reduce<ProjectionTotals>(
    (totals, row) => ({
      months: totals.months + 1,
      clientPaymentsGross: totals.clientPaymentsGross + row.clientPaymentsGross,
      newSaleIncome: totals.newSaleIncome + row.newSaleIncome,
      commissionFromClients: totals.commissionFromClients + row.commissionFromClients,
      totalEarnings: totals.totalEarnings + row.totalEarnings,
    }),
    {
      months: 0,
      clientPaymentsGross: 0,
      newSaleIncome: 0,
      commissionFromClients: 0,
      totalEarnings: 0,
    },
  );

export const projectScenario = (parameters: ProjectionParameters): ProjectionResult => {
  const monthly = projectEarnings(parameters);

  return {
    parameters,
    monthly,
    yearly: aggregateByYear(monthly),
    totals: summariseProjection(monthly),
  };
};
