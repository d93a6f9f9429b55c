"use client";

import Link from "next/link";
import { useEffect, useMemo, useState } from "react";
import { useForm, type Control, type Resolver } from "react-hook-form";
import { zodResolver } from "@hookform/resolvers/zod";
import { Download } from "lucide-react";

import { ProjectionTables } from "@/components/projection-tables";
import { SliderField } from "@/components/slider-field";
import { TrendChart } from "@/components/trend-chart";
import { Badge } from "@/components/ui/badge";
import { Button } from "@/components/ui/button";
import { Card, CardContent, CardDescription, CardHeader, CardTitle } from "@/components/ui/card";
import {
  Form,
  FormControl,
  FormDescription,
  FormField,
  FormItem,
  FormLabel,
  FormMessage,
} from "@/components/ui/form";
import { Input } from "@/components/ui/input";
import {
  Select,
  SelectContent,
  SelectItem,
  SelectTrigger,
  SelectValue,
} from "@/components/ui/select";
import { downloadWorkbook } from "@/lib/export/download";
import {
  EXPORT_FILE_NAME,
  buildProjectionWorkbook,
  workbookToArrayBuffer,
} from "@/lib/export/workbook";
import { formatMoney, formatNumber, formatPercent } from "@/lib/format";
import {
  CANCELLATION_MODE_LABELS,
  CONTRACT_TYPE_LABELS,
  LIFETIME_MODE_LABELS,
  PAYOUT_POLICY_LABELS,
  PAYOUT_TYPE_LABELS,
} from "@/lib/projection/labels";
import { projectScenario } from "@/lib/projection/projection";
import {
  DEFAULT_PLANNER_INPUTS,
  HORIZON_OPTIONS,
  MAX_UI_CHURN_PERCENT,
  plannerInputsSchema,
  toProjectionParameters,
  type PlannerInputs,
} from "@/lib/projection/schema";
import type { PayoutPolicy } from "@/lib/projection/types";

const numberParser = (value: string) => {
  if (value === "") {
    return "";
  }

  const parsed = Number(value);
  return Number.isNaN(parsed) ? value : parsed;
};

const LOCALE_OPTIONS = [
  { value: "en-GB", label: "English (UK)" },
  { value: "en-US", label: "English (US)" },
  { value: "de-DE", label: "German (EU)" },
] as const;

const toOptions = <T extends string>(labels: Record<T, string>, order: readonly T[]) =>
  order.map((value) => ({ value, label: labels[value] }));

const CANCELLATION_OPTIONS = toOptions(CANCELLATION_MODE_LABELS, ["fixed", "churn"]);
const LIFETIME_OPTIONS = toOptions(LIFETIME_MODE_LABELS, ["fromActivation", "afterFreeMonths"]);
const CONTRACT_OPTIONS = toOptions(CONTRACT_TYPE_LABELS, ["introRecurring", "flat"]);
const PAYOUT_TYPE_OPTIONS = toOptions(PAYOUT_TYPE_LABELS, ["commissionable", "flat"]);
const PAYOUT_POLICY_OPTIONS = toOptions(PAYOUT_POLICY_LABELS, [
  "bonusOnly",
  "bonusAndRecurring",
  "recurringOnly",
]);

const isPayoutPolicy = (value: string): value is PayoutPolicy =>
  PAYOUT_POLICY_OPTIONS.some((option) => option.value === value);

type ExportStatus = { kind: "success" | "error"; message: string } | null;

type NumericFieldName = {
  [K in keyof PlannerInputs]-?: PlannerInputs[K] extends number ? K : never;
}[keyof PlannerInputs];

type ChoiceFieldName = "cancellationMode" | "lifetimeMode" | "contractType" | "payoutType";

type ToggleFieldName = "overrideEnabled" | "bonusEnabled";

export function EarningsPlanner() {
  // Fix zodResolver type inference issue by casting to proper resolver type
  const resolver = zodResolver(plannerInputsSchema) as Resolver<PlannerInputs>;

  const form = useForm<PlannerInputs>({
    resolver,
    defaultValues: DEFAULT_PLANNER_INPUTS,
    mode: "onChange",
  });

  const [lastValidInputs, setLastValidInputs] = useState<PlannerInputs>(DEFAULT_PLANNER_INPUTS);
  const [exportStatus, setExportStatus] = useState<ExportStatus>(null);

  const watchedInputs = form.watch();
  const validation = plannerInputsSchema.safeParse(watchedInputs);
  const validInputs = validation.success ? validation.data : null;
  const validKey = validInputs ? JSON.stringify(validInputs) : null;

  // Invalid edits keep the last good projection on screen instead of blanking the tables.
  useEffect(() => {
    if (validInputs) {
      setLastValidInputs(validInputs);
    }
  }, [validKey]);

  const activeInputs = validInputs ?? lastValidInputs;
  const activeKey = validKey ?? JSON.stringify(lastValidInputs);

  const scenario = useMemo(
    () => projectScenario(toProjectionParameters(activeInputs)),
    [activeKey],
  );

  const { currency, numberFormatLocale: locale } = activeInputs;
  const finalMonth = scenario.monthly[scenario.monthly.length - 1];

  const headline = [
    { label: "Total earnings", value: formatMoney(scenario.totals.totalEarnings, locale, currency) },
    {
      label: `Commission from clients at ${formatPercent(scenario.parameters.commissionRate, locale)}`,
      value: formatMoney(scenario.totals.commissionFromClients, locale, currency),
    },
    { label: "New sale income", value: formatMoney(scenario.totals.newSaleIncome, locale, currency) },
    {
      label: `Paying clients in month ${finalMonth?.month ?? 0}`,
      value: formatNumber(finalMonth?.payingClients, locale, { fractionDigits: 1 }),
    },
  ];

  const handleExport = () => {
    try {
      const workbook = buildProjectionWorkbook({
        rows: scenario.monthly,
        parameters: scenario.parameters,
        currency,
        generatedAt: new Date(),
      });
      downloadWorkbook(workbookToArrayBuffer(workbook), EXPORT_FILE_NAME);
      setExportStatus({ kind: "success", message: `Saved ${EXPORT_FILE_NAME}.` });
    } catch (error) {
      setExportStatus({
        kind: "error",
        message: error instanceof Error ? `Export failed: ${error.message}` : "Export failed.",
      });
    }
  };

  const { control } = form;
  const overrideEnabled = form.watch("overrideEnabled");
  const cancellationMode = form.watch("cancellationMode");
  const contractType = form.watch("contractType");
  const bonusEnabled = form.watch("bonusEnabled");

  return (
    <div className="min-h-dvh bg-background">
      <div className="mx-auto flex w-full max-w-7xl flex-col gap-6 px-6 py-10 lg:gap-8 lg:px-10">
        <header className="flex flex-col justify-between gap-4 lg:flex-row lg:items-end">
          <div className="space-y-2">
            <h1 className="text-3xl font-semibold tracking-tight text-foreground lg:text-4xl">
              Earnings Projector
            </h1>
            <p className="max-w-2xl text-base text-muted-foreground">
              Project monthly commission and new-sale income from your client funnel, contract plan,
              and payout policy. Change any input to update the tables, chart, and export.
            </p>
            <Link href="/glossary" className="text-sm font-medium text-cta underline-offset-2 hover:underline">
              Glossary & methodology
            </Link>
          </div>
          <div className="flex flex-col items-start gap-2 lg:items-end">
            <Button size="lg" className="bg-cta text-white hover:bg-cta/90" onClick={handleExport}>
              <Download />
              Download as Excel
            </Button>
            {exportStatus ? (
              <p
                className={
                  exportStatus.kind === "error"
                    ? "text-xs font-medium text-destructive"
                    : "text-xs text-muted-foreground"
                }
              >
                {exportStatus.message}
              </p>
            ) : null}
          </div>
        </header>

        <Form {...form}>
          <main className="grid gap-6 lg:grid-cols-[minmax(320px,1fr)_2.4fr] xl:gap-8">
            <aside className="flex flex-col gap-6">
              <Card className="shadow-sm">
                <CardHeader>
                  <CardTitle>Scope & Horizon</CardTitle>
                  <CardDescription>Projection length and display formatting.</CardDescription>
                </CardHeader>
                <CardContent className="space-y-6">
                  <SliderInput
                    control={control}
                    name="horizonMonths"
                    label="Months to project"
                    min={HORIZON_OPTIONS[0]}
                    max={HORIZON_OPTIONS[HORIZON_OPTIONS.length - 1]}
                    step={12}
                  />
                  <FormField
                    control={control}
                    name="currency"
                    render={({ field }) => (
                      <FormItem>
                        <FormLabel>Currency symbol</FormLabel>
                        <FormControl>
                          <Input {...field} className="w-24" />
                        </FormControl>
                        <FormMessage />
                      </FormItem>
                    )}
                  />
                  <FormField
                    control={control}
                    name="numberFormatLocale"
                    render={({ field }) => (
                      <FormItem>
                        <FormLabel>Number formatting</FormLabel>
                        <Select value={field.value} onValueChange={field.onChange}>
                          <FormControl>
                            <SelectTrigger>
                              <SelectValue placeholder="Select" />
                            </SelectTrigger>
                          </FormControl>
                          <SelectContent>
                            {LOCALE_OPTIONS.map((option) => (
                              <SelectItem key={option.value} value={option.value}>
                                {option.label}
                              </SelectItem>
                            ))}
                          </SelectContent>
                        </Select>
                      </FormItem>
                    )}
                  />
                </CardContent>
              </Card>

              <Card className="shadow-sm">
                <CardHeader>
                  <CardTitle>Funnel</CardTitle>
                  <CardDescription>New clients each month and how they drop off.</CardDescription>
                </CardHeader>
                <CardContent className="space-y-6">
                  <NumberField control={control} name="defaultNewClients" label="New clients per month (default)" />
                  <ToggleField
                    control={control}
                    name="overrideEnabled"
                    label="Test month override"
                    onLabel="Override on"
                    offLabel="Override a specific month"
                  />
                  {overrideEnabled ? (
                    <div className="grid gap-4 sm:grid-cols-2">
                      <NumberField control={control} name="overrideMonth" label="Month to override" />
                      <NumberField control={control} name="overrideNewClients" label="New clients that month" />
                    </div>
                  ) : null}
                  <ChoiceField
                    control={control}
                    name="cancellationMode"
                    label="Cancellations mode"
                    options={CANCELLATION_OPTIONS}
                  />
                  {cancellationMode === "fixed" ? (
                    <NumberField
                      control={control}
                      name="cancellationsPerMonth"
                      label="Cancellations per month"
                      sublabel="Deducted from each month's new clients."
                    />
                  ) : (
                    <SliderInput
                      control={control}
                      name="churnPercent"
                      label="Churn per active month"
                      min={0}
                      max={MAX_UI_CHURN_PERCENT}
                      unit="%"
                    />
                  )}
                </CardContent>
              </Card>

              <Card className="shadow-sm">
                <CardHeader>
                  <CardTitle>Lifetime</CardTitle>
                  <CardDescription>When a client stops generating recurring revenue.</CardDescription>
                </CardHeader>
                <CardContent className="space-y-6">
                  <NumberField
                    control={control}
                    name="lifetimeMonths"
                    label="Average client lifetime"
                    sublabel="0 = unlimited"
                    suffix="mo"
                  />
                  <ChoiceField control={control} name="lifetimeMode" label="Lifetime counting mode" options={LIFETIME_OPTIONS} />
                </CardContent>
              </Card>

              <Card className="shadow-sm">
                <CardHeader>
                  <CardTitle>Contract Plan</CardTitle>
                  <CardDescription>What each client pays, month by month.</CardDescription>
                </CardHeader>
                <CardContent className="space-y-6">
                  <ChoiceField control={control} name="contractType" label="Type" options={CONTRACT_OPTIONS} />
                  <NumberField control={control} name="freeMonths" label="Free months at start" suffix="mo" />
                  {contractType === "introRecurring" ? (
                    <div className="grid gap-4 sm:grid-cols-2">
                      <NumberField control={control} name="introMonths" label="Intro months" suffix="mo" />
                      <NumberField control={control} name="introAmount" label="Intro monthly amount" prefix={currency} />
                      <NumberField
                        control={control}
                        name="recurringAmount"
                        label="Recurring monthly amount"
                        prefix={currency}
                      />
                    </div>
                  ) : (
                    <NumberField control={control} name="flatAmount" label="Flat monthly amount" prefix={currency} />
                  )}
                </CardContent>
              </Card>

              <Card className="shadow-sm">
                <CardHeader>
                  <CardTitle>Commission & Bonus</CardTitle>
                  <CardDescription>How client payments and new sales turn into your earnings.</CardDescription>
                </CardHeader>
                <CardContent className="space-y-6">
                  <SliderInput
                    control={control}
                    name="commissionRate"
                    label="Commission rate"
                    min={0}
                    max={100}
                    step={5}
                    unit="%"
                  />
                  <FormField
                    control={control}
                    name="payoutPolicy"
                    render={({ field }) => (
                      <FormItem>
                        <FormLabel>Payout policy</FormLabel>
                        <Select
                          value={field.value}
                          onValueChange={(value) => {
                            if (isPayoutPolicy(value)) {
                              field.onChange(value);
                            }
                          }}
                        >
                          <FormControl>
                            <SelectTrigger>
                              <SelectValue placeholder="Select" />
                            </SelectTrigger>
                          </FormControl>
                          <SelectContent>
                            {PAYOUT_POLICY_OPTIONS.map((option) => (
                              <SelectItem key={option.value} value={option.value}>
                                {option.label}
                              </SelectItem>
                            ))}
                          </SelectContent>
                        </Select>
                      </FormItem>
                    )}
                  />
                  <ChoiceField control={control} name="payoutType" label="Payout type" options={PAYOUT_TYPE_OPTIONS} />
                  <ToggleField
                    control={control}
                    name="bonusEnabled"
                    label="One-off new sale payout"
                    onLabel="Bonus on"
                    offLabel="Bonus off"
                  />
                  {bonusEnabled ? (
                    <div className="grid gap-4 sm:grid-cols-2">
                      <NumberField
                        control={control}
                        name="bonusAmount"
                        label="Payout per new client"
                        prefix={currency}
                      />
                      <NumberField
                        control={control}
                        name="bonusDurationMonths"
                        label="Payout duration"
                        sublabel="Your first months only. 0 = off."
                        suffix="mo"
                      />
                    </div>
                  ) : null}
                </CardContent>
              </Card>
            </aside>

            <section className="flex min-w-0 flex-col gap-6 lg:gap-8">
              {!validation.success ? (
                <div className="rounded-lg border border-destructive/40 bg-destructive/5 p-3 text-sm text-destructive">
                  Some inputs are out of range. Showing the last valid projection.
                </div>
              ) : null}

              <div className="grid gap-4 sm:grid-cols-2 xl:grid-cols-4">
                {headline.map((metric) => (
                  <Card key={metric.label} className="shadow-sm">
                    <CardContent className="space-y-1 pt-6">
                      <p className="text-xs text-muted-foreground">{metric.label}</p>
                      <p className="text-xl font-semibold tabular-nums text-foreground">{metric.value}</p>
                    </CardContent>
                  </Card>
                ))}
              </div>

              <ProjectionTables
                monthly={scenario.monthly}
                yearly={scenario.yearly}
                currency={currency}
                locale={locale}
              />

              <Card className="shadow-sm">
                <CardHeader>
                  <div className="flex items-center justify-between gap-3">
                    <CardTitle>Trend</CardTitle>
                    <Badge variant="secondary">{scenario.monthly.length} months</Badge>
                  </div>
                  <CardDescription>
                    Gross client payments against your commission and total monthly earnings.
                  </CardDescription>
                </CardHeader>
                <CardContent>
                  <TrendChart rows={scenario.monthly} currency={currency} locale={locale} />
                </CardContent>
              </Card>
            </section>
          </main>
        </Form>
      </div>
    </div>
  );
}

type NumberFieldProps = {
  control: Control<PlannerInputs>;
  name: NumericFieldName;
  label: string;
  prefix?: string;
  suffix?: string;
  sublabel?: string;
};

function NumberField({ control, name, label, prefix, suffix, sublabel }: NumberFieldProps) {
  return (
    <FormField
      control={control}
      name={name}
      render={({ field }) => (
        <FormItem>
          <FormLabel>{label}</FormLabel>
          {sublabel ? <FormDescription>{sublabel}</FormDescription> : null}
          <FormControl>
            <div className="relative">
              {prefix ? (
                <span className="pointer-events-none absolute inset-y-0 left-3 flex items-center text-sm text-muted-foreground">
                  {prefix}
                </span>
              ) : null}
              <Input
                inputMode="decimal"
                value={field.value === undefined ? "" : String(field.value)}
                onChange={(event) => field.onChange(numberParser(event.target.value))}
                onBlur={field.onBlur}
                className={prefix || suffix ? `${prefix ? "pl-8" : ""} ${suffix ? "pr-9" : ""}` : undefined}
              />
              {suffix ? (
                <span className="pointer-events-none absolute inset-y-0 right-3 flex items-center text-sm text-muted-foreground">
                  {suffix}
                </span>
              ) : null}
            </div>
          </FormControl>
          <FormMessage />
        </FormItem>
      )}
    />
  );
}

type SliderInputProps = {
  control: Control<PlannerInputs>;
  name: "horizonMonths" | "churnPercent" | "commissionRate";
  label: string;
  min: number;
  max: number;
  step?: number;
  unit?: string;
};

function SliderInput({ control, name, label, min, max, step, unit }: SliderInputProps) {
  return (
    <FormField
      control={control}
      name={name}
      render={({ field, fieldState }) => (
        <SliderField
          label={label}
          value={Number(field.value)}
          onChange={field.onChange}
          min={min}
          max={max}
          step={step}
          unit={unit}
          error={fieldState.error?.message}
        />
      )}
    />
  );
}

type ChoiceFieldProps = {
  control: Control<PlannerInputs>;
  name: ChoiceFieldName;
  label: string;
  options: ReadonlyArray<{ value: PlannerInputs[ChoiceFieldName]; label: string }>;
};

function ChoiceField({ control, name, label, options }: ChoiceFieldProps) {
  return (
    <FormField
      control={control}
      name={name}
      render={({ field }) => (
        <FormItem>
          <FormLabel>{label}</FormLabel>
          <div className="flex flex-wrap gap-2">
            {options.map((option) => (
              <Button
                key={option.value}
                type="button"
                size="sm"
                variant={field.value === option.value ? "default" : "outline"}
                onClick={() => field.onChange(option.value)}
              >
                {option.label}
              </Button>
            ))}
          </div>
        </FormItem>
      )}
    />
  );
}

type ToggleFieldProps = {
  control: Control<PlannerInputs>;
  name: ToggleFieldName;
  label: string;
  onLabel: string;
  offLabel: string;
};

function ToggleField({ control, name, label, onLabel, offLabel }: ToggleFieldProps) {
  return (
    <FormField
      control={control}
      name={name}
      render={({ field }) => (
        <FormItem>
          <div className="flex items-center justify-between gap-3">
            <FormLabel>{label}</FormLabel>
            <Button
              type="button"
              size="sm"
              variant={field.value ? "default" : "outline"}
              onClick={() => field.onChange(!field.value)}
            >
              {field.value ? onLabel : offLabel}
            </Button>
          </div>
        </FormItem>
      )}
    />
  );
}
