/** Rounds half away from zero to two decimals. */
export const roundMoney = (value: number) => {
  const sign = value < 0 ? -1 : 1;
  return (sign * Math.round((Math.abs(value) + Number.EPSILON) * 100)) / 100;
};

export const sumMoney = (values: number[]) =>
  roundMoney(values.reduce((total, value) => total + value, 0));

export const clamp = (value: number, min: number, max: number) =>
  Math.min(Math.max(value, min), max);

/** TypeORM column transformer: SQLite hands decimals back as numbers or strings. */
export const moneyColumn = {
  to: (value: number | null | undefined) => value,
  from: (value: string | number | null) =>
    value === null ? null : Number(value),
};
