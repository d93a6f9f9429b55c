"use client";

import * as React from "react";

import { Badge } from "@/components/ui/badge";
import { Input } from "@/components/ui/input";
import { Label } from "@/components/ui/label";
import { clampToBounds, commitTypedValue, readTypedValue } from "@/lib/slider-input";
import { cn } from "@/lib/utils";

type Props = {
  label: string;
  value: number;
  onChange: (v: number) => void;
  min: number;
  max: number;
  step?: number;
  unit?: string;
  description?: string;
  error?: string;
};

export function SliderField({
  label,
  value,
  onChange,
  min,
  max,
  step = 1,
  unit,
  description,
  error,
}: Props) {
  const bounds = { min, max, step };
  const safeValue = clampToBounds(bounds, Number.isFinite(value) ? value : min);
  const atEdge = safeValue === min || safeValue === max;
  const [draft, setDraft] = React.useState<string | null>(null);

  const handleSliderChange = (event: React.ChangeEvent<HTMLInputElement>) => {
    setDraft(null);
    const next = clampToBounds(bounds, Number(event.target.value));
    onChange(Number.isFinite(next) ? next : min);
  };

  const handleInputChange = (event: React.ChangeEvent<HTMLInputElement>) => {
    setDraft(event.target.value);
    const next = readTypedValue(event.target.value, bounds);
    if (next !== null) {
      onChange(next);
    }
  };

  const handleInputBlur = () => {
    if (draft === null) {
      return;
    }

    onChange(commitTypedValue(draft, bounds, safeValue));
    setDraft(null);
  };

  return (
    <div className="space-y-3">
      <div className="flex items-center justify-between gap-3">
        <Label className="text-sm font-medium text-foreground">{label}</Label>
        <Badge variant={atEdge ? "secondary" : "default"}>
          {safeValue}
          {unit}
        </Badge>
      </div>
      <div className="flex items-center gap-4">
        <div className="flex-1">
          <input
            type="range"
            min={min}
            max={max}
            step={step}
            value={safeValue}
            onChange={handleSliderChange}
            className="h-2 w-full appearance-none rounded-full bg-muted [accent-color:var(--accent-color,#0f172a)]"
            aria-label={label}
          />
          <p className="mt-1 text-xs text-muted-foreground">
            {min}
            {unit} – {max}
            {unit}
          </p>
          {description ? (
            <p className="mt-1 text-xs text-muted-foreground">{description}</p>
          ) : null}
        </div>
        <Input
          value={draft ?? String(safeValue)}
          onChange={handleInputChange}
          onBlur={handleInputBlur}
          inputMode="decimal"
          className={cn("w-20 text-right", error && "border-destructive")}
          aria-label={`${label} numeric input`}
        />
      </div>
      {error ? <p className="text-xs font-medium text-destructive">{error}</p> : null}
    </div>
  );
}
