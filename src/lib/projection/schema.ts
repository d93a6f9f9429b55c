import { z } from "zod";

import {
  CancellationMode,
  ContractType,
  LifetimeMode,
  PayoutPolicy,
  PayoutType,
  ProjectionParameters,
} from "./types";

const cancellationModeEnum = z.enum(["fixed", "churn"] satisfies [CancellationMode, ...CancellationMode[]]);
const lifetimeModeEnum = z.enum(["fromActivation", "afterFreeMonths"] satisfies [LifetimeMode, ...LifetimeMode[]]);
const contractTypeEnum = z.enum(["introRecurring", "flat"] satisfies [ContractType, ...ContractType[]]);
const payoutPolicyEnum = z.enum([
  "bonusOnly",
  "bonusAndRecurring",
  "recurringOnly",
] satisfies [PayoutPolicy, ...PayoutPolicy[]]);
const payoutTypeEnum = z.enum(["commissionable", "flat"] satisfies [PayoutType, ...PayoutType[]]);

// Helper to coerce input to number and apply min/max
const num = (min?: number, max?: number) => {
  let s = z.coerce.number();
  if (min !== undefined) s = s.min(min);
  if (max !== undefined) s = s.max(max);
  return s;
};

const months = (min: number, max?: number) => {
  let s = z.coerce.number().int({ message: "Use whole months." }).min(min);
  if (max !== undefined) s = s.max(max);
  return s;
};

const clients = () => z.coerce.number().int({ message: "Use whole clients." }).min(0);

const percentage = (min: number, max: number) => z.coerce.number().min(min, { message: `Must be ≥ ${min}%.` }).max(max, { message: `Must be ≤ ${max}%.` });

const amount = () => num(0);

export const HORIZON_OPTIONS = [12, 24, 36, 48, 60] as const;
export const MAX_UI_CHURN_PERCENT = 50;
export const MAX_PLAN_MONTHS = 24;

// Controls that can be hidden keep whatever was last typed; a hidden value never blocks the form.
const hideable = () => z.coerce.number().catch(Number.NaN);

const plannerFieldsSchema = z.object({
  horizonMonths: months(12, 60),
  currency: z.string().trim().min(1, { message: "Enter a currency symbol." }).max(8),
  numberFormatLocale: z.string().min(2),
  defaultNewClients: clients(),
  overrideEnabled: z.boolean(),
  overrideMonth: hideable(),
  overrideNewClients: hideable(),
  cancellationMode: cancellationModeEnum,
  cancellationsPerMonth: hideable(),
  churnPercent: hideable(),
  lifetimeMonths: months(0),
  lifetimeMode: lifetimeModeEnum,
  contractType: contractTypeEnum,
  freeMonths: months(0, MAX_PLAN_MONTHS),
  introMonths: hideable(),
  introAmount: hideable(),
  recurringAmount: hideable(),
  flatAmount: hideable(),
  commissionRate: percentage(0, 100),
  payoutPolicy: payoutPolicyEnum,
  payoutType: payoutTypeEnum,
  bonusEnabled: z.boolean(),
  bonusAmount: hideable(),
  bonusDurationMonths: hideable(),
});

type PlannerFields = z.infer<typeof plannerFieldsSchema>;

type HideableField = {
  field: keyof PlannerFields;
  rule: z.ZodType<number>;
  shown: (value: PlannerFields) => boolean;
};

const HIDEABLE_FIELDS: readonly HideableField[] = [
  { field: "overrideMonth", rule: months(1), shown: (v) => v.overrideEnabled },
  { field: "overrideNewClients", rule: clients(), shown: (v) => v.overrideEnabled },
  { field: "cancellationsPerMonth", rule: clients(), shown: (v) => v.cancellationMode === "fixed" },
  {
    field: "churnPercent",
    rule: percentage(0, MAX_UI_CHURN_PERCENT),
    shown: (v) => v.cancellationMode === "churn",
  },
  {
    field: "introMonths",
    rule: months(0, MAX_PLAN_MONTHS),
    shown: (v) => v.contractType === "introRecurring",
  },
  { field: "introAmount", rule: amount(), shown: (v) => v.contractType === "introRecurring" },
  { field: "recurringAmount", rule: amount(), shown: (v) => v.contractType === "introRecurring" },
  { field: "flatAmount", rule: amount(), shown: (v) => v.contractType === "flat" },
  { field: "bonusAmount", rule: amount(), shown: (v) => v.bonusEnabled },
  { field: "bonusDurationMonths", rule: months(0, MAX_PLAN_MONTHS), shown: (v) => v.bonusEnabled },
];

export const plannerInputsSchema = plannerFieldsSchema.superRefine((value, ctx) => {
  for (const { field, rule, shown } of HIDEABLE_FIELDS) {
    if (!shown(value)) continue;

    const result = rule.safeParse(value[field]);
    if (!result.success) {
      for (const issue of result.error.issues) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [field], message: issue.message });
      }
    }
  }

  if (value.overrideEnabled && value.overrideMonth > value.horizonMonths) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["overrideMonth"],
      message: `Override month must be within the ${value.horizonMonths}-month projection.`,
    });
  }
});

export type PlannerInputs = z.infer<typeof plannerInputsSchema>;

export const DEFAULT_PLANNER_INPUTS: PlannerInputs = plannerInputsSchema.parse({
  horizonMonths: 36,
  currency: "£",
  numberFormatLocale: "en-GB",
  defaultNewClients: 12,
  overrideEnabled: false,
  overrideMonth: 5,
  overrideNewClients: 20,
  cancellationMode: "fixed",
  cancellationsPerMonth: 2,
  churnPercent: 0,
  lifetimeMonths: 0,
  lifetimeMode: "fromActivation",
  contractType: "introRecurring",
  freeMonths: 0,
  introMonths: 3,
  introAmount: 300,
  recurringAmount: 150,
  flatAmount: 100,
  commissionRate: 80,
  payoutPolicy: "bonusAndRecurring",
  payoutType: "commissionable",
  bonusEnabled: true,
  bonusAmount: 160,
  bonusDurationMonths: 1,
});

const cancellationSchema = z.discriminatedUnion("mode", [
  z.object({ mode: z.literal("fixed"), perMonth: z.number().min(0) }),
  z.object({ mode: z.literal("churn"), churnPercent: z.number().min(0).max(100) }),
]);

const contractSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("introRecurring"),
    freeMonths: z.number().int().min(0),
    introMonths: z.number().int().min(0),
    introAmount: z.number().min(0),
    recurringAmount: z.number().min(0),
  }),
  z.object({
    type: z.literal("flat"),
    freeMonths: z.number().int().min(0),
    flatAmount: z.number().min(0),
  }),
]);

export const projectionParametersSchema = z
  .object({
    horizonMonths: z.number().int().min(1),
    defaultNewClients: z.number().min(0),
    override: z
      .object({
        month: z.number().int().min(1),
        newClients: z.number().min(0),
      })
      .nullable(),
    cancellation: cancellationSchema,
    commissionRate: z.number().min(0).max(100),
    payout: z.object({
      policy: payoutPolicyEnum,
      type: payoutTypeEnum,
    }),
    bonus: z.object({
      enabled: z.boolean(),
      amountPerClient: z.number().min(0),
      durationMonths: z.number().int().min(0),
    }),
    contract: contractSchema,
    lifetime: z.object({
      months: z.number().int().min(0),
      mode: lifetimeModeEnum,
    }),
  })
  .refine((value) => value.override === null || value.override.month <= value.horizonMonths, {
    path: ["override", "month"],
    message: "Override month must fall inside the horizon.",
  });

/**
 * Collapses the flat form values into the tagged parameter set the engine consumes.
 * Fields that belong to an inactive variant (churn % in fixed mode, intro pricing on a
 * flat contract, the override when disabled) are dropped here, and a disabled bonus
 * becomes a zero bonus.
 */
export const toProjectionParameters = (inputs: PlannerInputs): ProjectionParameters => ({
  horizonMonths: inputs.horizonMonths,
  defaultNewClients: inputs.defaultNewClients,
  override: inputs.overrideEnabled
    ? { month: inputs.overrideMonth, newClients: inputs.overrideNewClients }
    : null,
  cancellation:
    inputs.cancellationMode === "fixed"
      ? { mode: "fixed", perMonth: inputs.cancellationsPerMonth }
      : { mode: "churn", churnPercent: inputs.churnPercent },
  commissionRate: inputs.commissionRate,
  payout: {
    policy: inputs.payoutPolicy,
    type: inputs.payoutType,
  },
  bonus: inputs.bonusEnabled
    ? { enabled: true, amountPerClient: inputs.bonusAmount, durationMonths: inputs.bonusDurationMonths }
    : { enabled: false, amountPerClient: 0, durationMonths: 0 },
  contract:
    inputs.contractType === "introRecurring"
      ? {
          type: "introRecurring",
          freeMonths: inputs.freeMonths,
          introMonths: inputs.introMonths,
          introAmount: inputs.introAmount,
          recurringAmount: inputs.recurringAmount,
        }
      : {
          type: "flat",
          freeMonths: inputs.freeMonths,
          flatAmount: inputs.flatAmount,
        },
  lifetime: {
    months: inputs.lifetimeMonths,
    mode: inputs.lifetimeMode,
  },
});
