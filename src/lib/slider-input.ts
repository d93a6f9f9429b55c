export interface SliderBounds {
  min: number;
  max: number;
  step: number;
}

export const clampToBounds = ({ min, max }: SliderBounds, value: number) =>
  Math.min(max, Math.max(min, value));

const snapToStep = ({ min, step }: SliderBounds, value: number) =>
  min + Math.round((value - min) / step) * step;

const parseTyped = (text: string): number | null => {
  const trimmed = text.trim();
  if (trimmed === "") {
    return null;
  }

  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
};

/**
 * Value to apply while the user is still typing, or null to keep the draft text.
 * Only in-range values that sit on the step are applied, so "3" on the way to "36"
 * leaves the field alone.
 */
export const readTypedValue = (text: string, bounds: SliderBounds): number | null => {
  const parsed = parseTyped(text);
  if (parsed === null || parsed < bounds.min || parsed > bounds.max) {
    return null;
  }

  return Math.abs(snapToStep(bounds, parsed) - parsed) < 1e-9 ? parsed : null;
};

/** Value committed when the numeric box loses focus. */
export const commitTypedValue = (text: string, bounds: SliderBounds, fallback: number): number => {
  const parsed = parseTyped(text);
  if (parsed === null) {
    return fallback;
  }

  return clampToBounds(bounds, snapToStep(bounds, parsed));
};
