import { FieldType } from "../types/field-types";

export const FILTER_OPERATORS = [
  "eq",
  "ne",
  "contains",
  "gt",
  "lt",
  "gte",
  "lte",
  "in",
  "notin",
  "empty",
  "notempty",
] as const;

export type FilterOperator = (typeof FILTER_OPERATORS)[number];

export function isFilterOperator(value: unknown): value is FilterOperator {
  return FILTER_OPERATORS.some((operator) => operator === value);
}

/** One condition on a dynamic field, referenced by id or by name. */
export interface FilterCondition {
  fieldId?: number;
  fieldName?: string;
  operator?: string;
  value: string;
}

export type ValueColumn = "value_text" | "value_int" | "value_date";

export type Comparator = "=" | ">" | "<" | ">=" | "<=";

export type Predicate =
  | { kind: "checked" }
  | { kind: "unchecked" }
  | { kind: "compare"; comparator: Comparator; param: number }
  | { kind: "notEqualOrNull"; param: number }
  | { kind: "like"; param: number }
  | { kind: "in"; params: number[] }
  | { kind: "notIn"; params: number[] }
  | { kind: "notEmpty" };

/**
 * A correlated existence test against the value rows of one field. With
 * `negated` set the node matches when no such row exists.
 */
export interface PredicateNode {
  alias: string;
  negated: boolean;
  fieldParam: number;
  column: ValueColumn;
  predicate: Predicate;
}

export interface FilterPlan {
  nodes: PredicateNode[];
  params: Array<string | number>;
}

export interface ResolvedCondition {
  condition: FilterCondition;
  field: { id: number; fieldType: FieldType } | null;
}

export function valueColumnFor(fieldType: FieldType): ValueColumn {
  switch (fieldType) {
    case FieldType.CHECKBOX:
      return "value_int";
    case FieldType.DATE:
    case FieldType.DATETIME:
      return "value_date";
    case FieldType.TEXT:
    case FieldType.TEXTAREA:
    case FieldType.DROPDOWN:
    case FieldType.MULTISELECT:
      return "value_text";
  }
}

class ParamAllocator {
  readonly params: Array<string | number> = [];

  constructor(private next: number) {}

  bind(value: string | number): number {
    this.params.push(value);
    return this.next++;
  }
}

const CHECKED_TOKENS = ["1", "true", "on"];

function splitList(value: string): string[] {
  return value.split(",").map((item) => item.trim());
}

function compare(
  comparator: Comparator,
  value: string,
  allocator: ParamAllocator
): Predicate {
  return { kind: "compare", comparator, param: allocator.bind(value) };
}

function buildPredicate(
  operator: FilterOperator,
  fieldType: FieldType,
  value: string,
  allocator: ParamAllocator
): Predicate {
  switch (operator) {
    case "eq":
      if (fieldType === FieldType.CHECKBOX) {
        return CHECKED_TOKENS.includes(value) ? { kind: "checked" } : { kind: "unchecked" };
      }
      return compare("=", value, allocator);
    case "ne":
      return { kind: "notEqualOrNull", param: allocator.bind(value) };
    case "contains":
      return { kind: "like", param: allocator.bind(`%${value}%`) };
    case "gt":
      return compare(">", value, allocator);
    case "lt":
      return compare("<", value, allocator);
    case "gte":
      return compare(">=", value, allocator);
    case "lte":
      return compare("<=", value, allocator);
    case "in":
      return { kind: "in", params: splitList(value).map((item) => allocator.bind(item)) };
    case "notin":
      return { kind: "notIn", params: splitList(value).map((item) => allocator.bind(item)) };
    // "empty" negates the node, so both test for a non-empty row
    case "empty":
    case "notempty":
      return { kind: "notEmpty" };
  }
}

/**
 * Compiles resolved conditions into predicate nodes. Placeholders are
 * numbered from `startParam` by one counter shared across all nodes, in
 * condition order. Conditions without a field are skipped but still consume
 * their alias position.
 */
export function compileFilterPlan(
  conditions: ResolvedCondition[],
  startParam: number
): FilterPlan {
  const allocator = new ParamAllocator(startParam);
  const nodes: PredicateNode[] = [];

  conditions.forEach(({ condition, field }, index) => {
    if (!field) {
      return;
    }

    const fieldParam = allocator.bind(field.id);
    const operator = isFilterOperator(condition.operator) ? condition.operator : "eq";
    const predicate = buildPredicate(operator, field.fieldType, condition.value, allocator);

    nodes.push({
      alias: `dfv${index}`,
      negated: operator === "empty",
      fieldParam,
      column: valueColumnFor(field.fieldType),
      predicate,
    });
  });

  return { nodes, params: allocator.params };
}
