import { FilterCondition } from "./filter-plan";

const OPERATOR_SUFFIXES = [
  "contains",
  "gt",
  "gte",
  "lt",
  "lte",
  "ne",
  "in",
  "notin",
  "empty",
  "notempty",
];

function compareText(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

function firstValue(raw: unknown): string | undefined {
  if (typeof raw === "string") {
    return raw;
  }
  if (Array.isArray(raw)) {
    const first: unknown = raw[0];
    return typeof first === "string" ? first : undefined;
  }
  return undefined;
}

/**
 * Reads filter conditions out of query parameters of the form
 * `<prefix><Field>` or `<prefix><Field>_<operator>`. Keys without the
 * prefix and empty values are ignored. Conditions come back sorted by
 * field name, then operator.
 */
export function parseFilterQuery(
  query: Record<string, unknown>,
  prefix: string
): FilterCondition[] {
  const conditions: Array<FilterCondition & { fieldName: string; operator: string }> = [];

  for (const [key, raw] of Object.entries(query)) {
    if (!key.startsWith(prefix)) {
      continue;
    }
    const value = firstValue(raw);
    if (!value) {
      continue;
    }

    const remainder = key.slice(prefix.length);
    let fieldName = remainder;
    let operator = "eq";
    for (const suffix of OPERATOR_SUFFIXES) {
      if (remainder.endsWith(`_${suffix}`)) {
        fieldName = remainder.slice(0, -(suffix.length + 1));
        operator = suffix;
        break;
      }
    }
    if (fieldName === "") {
      continue;
    }

    conditions.push({ fieldName, operator, value });
  }

  return conditions.sort(
    (a, b) => compareText(a.fieldName, b.fieldName) || compareText(a.operator, b.operator)
  );
}
