import { describe, expect, it } from "vitest";

import {
  clampChurnRate,
  cohortSurvival,
  deriveCohortAges,
  isActiveByLifetime,
  netCohortSize,
  pricePerClient,
  survivalFraction,
} from "./cohorts";
import { ContractPlan } from "./types";

const INTRO_CONTRACT: ContractPlan = {
  type: "introRecurring",
  freeMonths: 1,
  introMonths: 2,
  introAmount: 300,
  recurringAmount: 150,
};

const FLAT_CONTRACT: ContractPlan = {
  type: "flat",
  freeMonths: 2,
  flatAmount: 100,
};

describe("isActiveByLifetime", () => {
  it("treats a zero limit as unlimited", () => {
    expect(isActiveByLifetime(500, 500, 0, "fromActivation")).toBe(true);
    expect(isActiveByLifetime(500, 500, 0, "afterFreeMonths")).toBe(true);
  });

  it("counts from activation when configured", () => {
    expect(isActiveByLifetime(5, 2, 6, "fromActivation")).toBe(true);
    expect(isActiveByLifetime(6, 3, 6, "fromActivation")).toBe(false);
  });

  it("counts from the first paid month when configured", () => {
    expect(isActiveByLifetime(8, 5, 6, "afterFreeMonths")).toBe(true);
    expect(isActiveByLifetime(9, 6, 6, "afterFreeMonths")).toBe(false);
  });

  it("never reactivates a cohort once the window has closed", () => {
    for (const mode of ["fromActivation", "afterFreeMonths"] as const) {
      let expired = false;
      for (let age = 0; age <= 24; age += 1) {
        const active = isActiveByLifetime(age, Math.max(age - 2, 0), 7, mode);
        if (expired) {
          expect(active).toBe(false);
        }
        expired = expired || !active;
      }
      expect(expired).toBe(true);
    }
  });
});

describe("survivalFraction", () => {
  it("returns full survival at age zero or without churn", () => {
    expect(survivalFraction(0.3, 0)).toBe(1);
    expect(survivalFraction(0, 12)).toBe(1);
    expect(survivalFraction(-0.1, 4)).toBe(1);
  });

  it("decays geometrically with age", () => {
    expect(survivalFraction(0.2, 1)).toBeCloseTo(0.8, 10);
    expect(survivalFraction(0.2, 2)).toBeCloseTo(0.64, 10);
  });

  it("is strictly decreasing for a positive churn rate", () => {
    let previous = survivalFraction(0.05, 0);
    for (let age = 1; age <= 60; age += 1) {
      const next = survivalFraction(0.05, age);
      expect(next).toBeLessThan(previous);
      previous = next;
    }
  });
});

describe("clampChurnRate", () => {
  it("converts percentages and clamps into [0, 0.99]", () => {
    expect(clampChurnRate(25)).toBeCloseTo(0.25, 10);
    expect(clampChurnRate(100)).toBe(0.99);
    expect(clampChurnRate(150)).toBe(0.99);
    expect(clampChurnRate(-5)).toBe(0);
    expect(clampChurnRate(Number.NaN)).toBe(0);
  });
});

describe("pricePerClient", () => {
  it("charges nothing during free months for either contract", () => {
    expect(pricePerClient(INTRO_CONTRACT, 0)).toBe(0);
    expect(pricePerClient(FLAT_CONTRACT, 0)).toBe(0);
    expect(pricePerClient(FLAT_CONTRACT, 1)).toBe(0);
  });

  it("applies the intro price before switching to recurring", () => {
    expect(pricePerClient(INTRO_CONTRACT, 1)).toBe(300);
    expect(pricePerClient(INTRO_CONTRACT, 2)).toBe(300);
    expect(pricePerClient(INTRO_CONTRACT, 3)).toBe(150);
    expect(pricePerClient(INTRO_CONTRACT, 30)).toBe(150);
  });

  it("charges the flat amount once the free period ends", () => {
    expect(pricePerClient(FLAT_CONTRACT, 2)).toBe(100);
    expect(pricePerClient(FLAT_CONTRACT, 40)).toBe(100);
  });
});

describe("deriveCohortAges", () => {
  it("skips cohorts born after the evaluated month", () => {
    expect(deriveCohortAges(3, 5, 0)).toBeNull();
  });

  it("offsets the payment age by the free months without going negative", () => {
    expect(deriveCohortAges(5, 2, 1)).toEqual({ ageFromActivation: 3, ageFromFirstPayment: 2 });
    expect(deriveCohortAges(2, 2, 3)).toEqual({ ageFromActivation: 0, ageFromFirstPayment: 0 });
  });
});

describe("cohortSurvival", () => {
  const ages = { ageFromActivation: 3, ageFromFirstPayment: 1 };

  it("ignores churn in fixed mode", () => {
    expect(cohortSurvival("fixed", 0.5, "fromActivation", ages)).toBe(1);
  });

  it("follows the lifetime reference point for the churn clock", () => {
    expect(cohortSurvival("churn", 0.5, "fromActivation", ages)).toBeCloseTo(0.125, 10);
    expect(cohortSurvival("churn", 0.5, "afterFreeMonths", ages)).toBeCloseTo(0.5, 10);
  });
});

describe("netCohortSize", () => {
  it("subtracts fixed cancellations without going below zero", () => {
    expect(netCohortSize(12, { mode: "fixed", perMonth: 2 })).toBe(10);
    expect(netCohortSize(5, { mode: "fixed", perMonth: 7 })).toBe(0);
  });

  it("keeps the full intake in churn mode", () => {
    expect(netCohortSize(12, { mode: "churn", churnPercent: 10 })).toBe(12);
  });
});
