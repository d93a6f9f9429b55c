import { describe, expect, it } from "vitest";

import {
  DEFAULT_PLANNER_INPUTS,
  plannerInputsSchema,
  toProjectionParameters,
} from "./schema";

describe("plannerInputsSchema", () => {
  it("coerces numeric strings coming from form inputs", () => {
    const parsed = plannerInputsSchema.parse({
      ...DEFAULT_PLANNER_INPUTS,
      horizonMonths: "24",
      commissionRate: "65",
      flatAmount: "99.5",
    });

    expect(parsed.horizonMonths).toBe(24);
    expect(parsed.commissionRate).toBe(65);
    expect(parsed.flatAmount).toBe(99.5);
  });

  it("rejects an enabled override month beyond the horizon", () => {
    const result = plannerInputsSchema.safeParse({
      ...DEFAULT_PLANNER_INPUTS,
      horizonMonths: 12,
      overrideEnabled: true,
      overrideMonth: 13,
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].path).toEqual(["overrideMonth"]);
      expect(result.error.issues[0].message).toBe(
        "Override month must be within the 12-month projection.",
      );
    }
  });

  it("ignores an out-of-range override month while the override is off", () => {
    const result = plannerInputsSchema.safeParse({
      ...DEFAULT_PLANNER_INPUTS,
      horizonMonths: 12,
      overrideEnabled: false,
      overrideMonth: 40,
    });

    expect(result.success).toBe(true);
  });

  it("limits churn to the slider range", () => {
    const result = plannerInputsSchema.safeParse({
      ...DEFAULT_PLANNER_INPUTS,
      cancellationMode: "churn",
      churnPercent: 60,
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].path).toEqual(["churnPercent"]);
      expect(result.error.issues[0].message).toBe("Must be ≤ 50%.");
    }
  });

  it("ignores leftover text in controls that are hidden", () => {
    const flat = plannerInputsSchema.safeParse({
      ...DEFAULT_PLANNER_INPUTS,
      contractType: "flat",
      introAmount: "abc",
      recurringAmount: "",
    });
    const overrideOff = plannerInputsSchema.safeParse({
      ...DEFAULT_PLANNER_INPUTS,
      overrideEnabled: false,
      overrideMonth: "x",
    });
    const bonusOff = plannerInputsSchema.safeParse({
      ...DEFAULT_PLANNER_INPUTS,
      bonusEnabled: false,
      bonusAmount: "-",
    });

    expect(flat.success).toBe(true);
    expect(overrideOff.success).toBe(true);
    expect(bonusOff.success).toBe(true);
  });

  it("reports leftover text once its control is shown again", () => {
    const result = plannerInputsSchema.safeParse({
      ...DEFAULT_PLANNER_INPUTS,
      contractType: "introRecurring",
      introAmount: "abc",
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues).toHaveLength(1);
      expect(result.error.issues[0].path).toEqual(["introAmount"]);
    }
  });

  it("checks the flat amount only on a flat contract", () => {
    const result = plannerInputsSchema.safeParse({
      ...DEFAULT_PLANNER_INPUTS,
      contractType: "flat",
      flatAmount: -5,
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].path).toEqual(["flatAmount"]);
    }
  });

  it("rejects fractional month counts and negative amounts", () => {
    const fractional = plannerInputsSchema.safeParse({ ...DEFAULT_PLANNER_INPUTS, freeMonths: 1.5 });
    const negative = plannerInputsSchema.safeParse({ ...DEFAULT_PLANNER_INPUTS, recurringAmount: -10 });

    expect(fractional.success).toBe(false);
    expect(negative.success).toBe(false);
  });
});

describe("toProjectionParameters", () => {
  it("maps the default inputs onto fixed-mode intro pricing", () => {
    expect(toProjectionParameters(DEFAULT_PLANNER_INPUTS)).toEqual({
      horizonMonths: 36,
      defaultNewClients: 12,
      override: null,
      cancellation: { mode: "fixed", perMonth: 2 },
      commissionRate: 80,
      payout: { policy: "bonusAndRecurring", type: "commissionable" },
      bonus: { enabled: true, amountPerClient: 160, durationMonths: 1 },
      contract: {
        type: "introRecurring",
        freeMonths: 0,
        introMonths: 3,
        introAmount: 300,
        recurringAmount: 150,
      },
      lifetime: { months: 0, mode: "fromActivation" },
    });
  });

  it("keeps only the fields of the selected variants", () => {
    const parameters = toProjectionParameters({
      ...DEFAULT_PLANNER_INPUTS,
      overrideEnabled: true,
      overrideMonth: 6,
      overrideNewClients: 40,
      cancellationMode: "churn",
      churnPercent: 5,
      contractType: "flat",
      freeMonths: 2,
      flatAmount: 120,
    });

    expect(parameters.override).toEqual({ month: 6, newClients: 40 });
    expect(parameters.cancellation).toEqual({ mode: "churn", churnPercent: 5 });
    expect(parameters.contract).toEqual({ type: "flat", freeMonths: 2, flatAmount: 120 });
  });

  it("maps a disabled bonus with leftover text to a zero bonus", () => {
    const inputs = plannerInputsSchema.parse({
      ...DEFAULT_PLANNER_INPUTS,
      bonusEnabled: false,
      bonusAmount: "abc",
    });

    expect(toProjectionParameters(inputs).bonus).toEqual({
      enabled: false,
      amountPerClient: 0,
      durationMonths: 0,
    });
  });
});
