import { FilterPlan, Predicate, PredicateNode, ValueColumn } from "./filter-plan";

export interface RenderedFilter {
  /** Boolean SQL to AND into a ticket query aliased `t`; empty when there is nothing to filter. */
  sql: string;
  params: Array<string | number>;
}

const placeholder = (param: number): string => `$${param}`;

function renderNotEmpty(column: string, valueColumn: ValueColumn): string {
  // only the text slot can hold an empty string
  return valueColumn === "value_text"
    ? `${column} IS NOT NULL AND ${column} != ''`
    : `${column} IS NOT NULL`;
}

function renderPredicate(column: string, node: PredicateNode): string {
  const predicate: Predicate = node.predicate;
  switch (predicate.kind) {
    case "checked":
      return `${column} = 1`;
    case "unchecked":
      return `(${column} = 0 OR ${column} IS NULL)`;
    case "compare":
      return `${column} ${predicate.comparator} ${placeholder(predicate.param)}`;
    case "notEqualOrNull":
      return `(${column} != ${placeholder(predicate.param)} OR ${column} IS NULL)`;
    case "like":
      return `${column} LIKE ${placeholder(predicate.param)}`;
    case "in":
      return `${column} IN (${predicate.params.map(placeholder).join(",")})`;
    case "notIn":
      return `${column} NOT IN (${predicate.params.map(placeholder).join(",")})`;
    case "notEmpty":
      return renderNotEmpty(column, node.column);
  }
}

export function renderNode(node: PredicateNode): string {
  const { alias } = node;
  const column = `${alias}.${node.column}`;
  const existence = node.negated ? "NOT EXISTS" : "EXISTS";
  return (
    `${existence} (SELECT 1 FROM dynamic_field_value ${alias}` +
    ` WHERE ${alias}.object_id = t.id AND ${alias}.field_id = ${placeholder(node.fieldParam)}` +
    ` AND ${renderPredicate(column, node)})`
  );
}

/**
 * Renders a filter plan for PostgreSQL. Values only ever travel as bound
 * parameters.
 */
export function renderPostgresFilter(plan: FilterPlan): RenderedFilter {
  if (plan.nodes.length === 0) {
    return { sql: "", params: [] };
  }
  return {
    sql: plan.nodes.map(renderNode).join(" AND "),
    params: plan.params,
  };
}
