import { ValueTransformer } from 'typeorm';

// mysql2 returns DECIMAL columns as strings.
export const decimalTransformer: ValueTransformer = {
  to: (value: number | null | undefined) => value,
  from: (value: string | number | null) =>
    value === null || value === undefined ? null : Number(value),
};
