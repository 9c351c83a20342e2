// Rounds to cents, nudging by EPSILON so values like 1.005 round up
export const roundCurrency = (value: number): number =>
  Math.round((value + Number.EPSILON) * 100) / 100;

