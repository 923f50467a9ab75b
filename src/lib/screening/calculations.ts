export function round(value: number, digits = 2): number {
  const p = Math.pow(10, digits);
  return Math.round(value * p) / p;
}

export function finiteOrNull(value: number | null | undefined): number | null {
  if (value == null || !Number.isFinite(value)) {
    return null;
  }
  return value;
}

export function safeDivide(
  numerator: number | null | undefined,
  denominator: number | null | undefined,
): number | null {
  if (numerator == null || denominator == null || denominator === 0) {
    return null;
  }
  return finiteOrNull(numerator / denominator);
}

export function allPresent(values: Array<number | null | undefined>): values is number[] {
  return values.every((value) => value != null);
}

export function average(values: Array<number | null | undefined>): number | null {
  if (values.length === 0 || !allPresent(values)) {
    return null;
  }
  return finiteOrNull(values.reduce((sum, value) => sum + value, 0) / values.length);
}

export function mean(values: number[]): number {
  if (values.length === 0) {
    return 0;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

export function calculateAgeInYears(from: Date, reference: Date): number {
  const days = (reference.getTime() - from.getTime()) / (24 * 60 * 60 * 1000);
  return days / 365.25;
}
