const NA_SYMBOL = "—";

const isFiniteNumber = (value: unknown): value is number =>
  typeof value === "number" && Number.isFinite(value);

export const formatNumber = (
  value: number | null | undefined,
  locale: string,
  options?: { fractionDigits?: number },
): string => {
  if (!isFiniteNumber(value)) {
    return NA_SYMBOL;
  }

  const fractionDigits = options?.fractionDigits ?? 1;
  return new Intl.NumberFormat(locale, {
    minimumFractionDigits: fractionDigits,
    maximumFractionDigits: fractionDigits,
  }).format(value);
};

// The currency is a free-text label, so it is prefixed rather than passed to Intl as an ISO code.
export const formatMoney = (
  value: number | null | undefined,
  locale: string,
  symbol: string,
  options?: { fractionDigits?: number },
): string => {
  const formatted = formatNumber(value, locale, { fractionDigits: options?.fractionDigits ?? 2 });

  if (formatted === NA_SYMBOL) {
    return NA_SYMBOL;
  }

  return `${symbol}${formatted}`;
};

export const formatPercent = (
  value: number | null | undefined,
  locale: string,
  options?: { fractionDigits?: number },
): string => {
  const fractionDigits = options?.fractionDigits ?? 0;
  const formatted = formatNumber(value, locale, { fractionDigits });

  if (formatted === NA_SYMBOL) {
    return NA_SYMBOL;
  }

  return `${formatted}%`;
};

export { NA_SYMBOL };
