import { describe, expect, it } from "vitest";

import { type SliderBounds, commitTypedValue, readTypedValue } from "./slider-input";

const HORIZON: SliderBounds = { min: 12, max: 60, step: 12 };
const COMMISSION: SliderBounds = { min: 0, max: 100, step: 5 };

// Feeds the text one keystroke at a time and returns every value applied along the way.
const typeKeys = (keys: string, bounds: SliderBounds): number[] => {
  const applied: number[] = [];
  let text = "";

  for (const key of keys) {
    text += key;
    const value = readTypedValue(text, bounds);
    if (value !== null) {
      applied.push(value);
    }
  }

  return applied;
};

describe("readTypedValue", () => {
  it("lets multi-digit horizons be typed", () => {
    expect(typeKeys("36", HORIZON)).toEqual([36]);
    expect(typeKeys("48", HORIZON)).toEqual([48]);
  });

  it("lets multi-digit commission rates be typed", () => {
    expect(typeKeys("75", COMMISSION)).toEqual([75]);
    expect(typeKeys("100", COMMISSION)).toEqual([10, 100]);
  });

  it("holds back values that are off the step or out of range", () => {
    expect(readTypedValue("30", HORIZON)).toBeNull();
    expect(readTypedValue("72", HORIZON)).toBeNull();
    expect(readTypedValue("7", COMMISSION)).toBeNull();
    expect(readTypedValue("", COMMISSION)).toBeNull();
    expect(readTypedValue("abc", COMMISSION)).toBeNull();
  });

  it("accepts fractional steps", () => {
    expect(readTypedValue("2.5", { min: 0, max: 50, step: 0.5 })).toBe(2.5);
  });
});

describe("commitTypedValue", () => {
  it("snaps and clamps the draft on blur", () => {
    expect(commitTypedValue("7", COMMISSION, 80)).toBe(5);
    expect(commitTypedValue("3", HORIZON, 36)).toBe(12);
    expect(commitTypedValue("126", HORIZON, 36)).toBe(60);
    expect(commitTypedValue("40", HORIZON, 36)).toBe(36);
  });

  it("falls back to the current value for blank or non-numeric drafts", () => {
    expect(commitTypedValue("", HORIZON, 24)).toBe(24);
    expect(commitTypedValue("x", COMMISSION, 80)).toBe(80);
  });
});
