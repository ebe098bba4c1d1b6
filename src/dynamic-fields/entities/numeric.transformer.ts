import { ValueTransformer } from "typeorm";

/**
 * pg returns bigint columns as strings; object ids and integer slots are
 * handled as numbers everywhere else.
 */
export const bigintTransformer: ValueTransformer = {
  to: (value: number | null | undefined) => value,
  from: (value: string | number | null) =>
    value === null || value === undefined ? null : Number(value),
};
