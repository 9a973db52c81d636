// src/utils/money.ts

/** Rounds to cents. */
export function roundMoney(value: number): number {
  return Math.round((value + Number.EPSILON) * 100) / 100;
}

export function sumMoney(...values: number[]): number {
  return roundMoney(values.reduce((acc, v) => acc + v, 0));
}
