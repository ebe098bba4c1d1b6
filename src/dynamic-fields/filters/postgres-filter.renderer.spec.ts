import { FieldType } from "../types/field-types";
import { PredicateNode, compileFilterPlan } from "./filter-plan";
import { renderNode, renderPostgresFilter } from "./postgres-filter.renderer";

function node(overrides: Partial<PredicateNode>): PredicateNode {
  return {
    alias: "dfv0",
    negated: false,
    fieldParam: 1,
    column: "value_text",
    predicate: { kind: "notEmpty" },
    ...overrides,
  };
}

const prefix =
  "EXISTS (SELECT 1 FROM dynamic_field_value dfv0 WHERE dfv0.object_id = t.id AND dfv0.field_id = $1 AND ";

describe("renderPostgresFilter", () => {
  it("should render nothing for an empty plan", () => {
    expect(renderPostgresFilter({ nodes: [], params: [] })).toEqual({ sql: "", params: [] });
  });

  it("should render a single equality", () => {
    const plan = compileFilterPlan(
      [
        {
          condition: { fieldName: "Region", operator: "eq", value: "north" },
          field: { id: 3, fieldType: FieldType.TEXT },
        },
      ],
      1
    );

    expect(renderPostgresFilter(plan)).toEqual({
      sql: `${prefix}dfv0.value_text = $2)`,
      params: [3, "north"],
    });
  });

  it("should join nodes with AND and keep the shared numbering", () => {
    const plan = compileFilterPlan(
      [
        {
          condition: { fieldName: "Region", operator: "contains", value: "nor" },
          field: { id: 3, fieldType: FieldType.TEXT },
        },
        { condition: { fieldName: "Missing", value: "x" }, field: null },
        {
          condition: { fieldName: "Urgent", operator: "eq", value: "on" },
          field: { id: 5, fieldType: FieldType.CHECKBOX },
        },
        {
          condition: { fieldName: "Due", operator: "empty", value: "1" },
          field: { id: 6, fieldType: FieldType.DATE },
        },
        {
          condition: { fieldName: "Tags", operator: "in", value: "a, b" },
          field: { id: 7, fieldType: FieldType.MULTISELECT },
        },
      ],
      4
    );

    const rendered = renderPostgresFilter(plan);

    expect(rendered.sql).toBe(
      [
        "EXISTS (SELECT 1 FROM dynamic_field_value dfv0 WHERE dfv0.object_id = t.id AND dfv0.field_id = $4 AND dfv0.value_text LIKE $5)",
        "EXISTS (SELECT 1 FROM dynamic_field_value dfv2 WHERE dfv2.object_id = t.id AND dfv2.field_id = $6 AND dfv2.value_int = 1)",
        "NOT EXISTS (SELECT 1 FROM dynamic_field_value dfv3 WHERE dfv3.object_id = t.id AND dfv3.field_id = $7 AND dfv3.value_date IS NOT NULL)",
        "EXISTS (SELECT 1 FROM dynamic_field_value dfv4 WHERE dfv4.object_id = t.id AND dfv4.field_id = $8 AND dfv4.value_text IN ($9,$10))",
      ].join(" AND ")
    );
    expect(rendered.params).toEqual([3, "%nor%", 5, 6, 7, "a", "b"]);
  });
});

describe("renderNode", () => {
  it.each<[string, PredicateNode, string]>([
    ["unchecked", node({ column: "value_int", predicate: { kind: "unchecked" } }), "(dfv0.value_int = 0 OR dfv0.value_int IS NULL))"],
    ["ne", node({ predicate: { kind: "notEqualOrNull", param: 2 } }), "(dfv0.value_text != $2 OR dfv0.value_text IS NULL))"],
    ["gte", node({ predicate: { kind: "compare", comparator: ">=", param: 2 } }), "dfv0.value_text >= $2)"],
    ["notin", node({ predicate: { kind: "notIn", params: [2, 3] } }), "dfv0.value_text NOT IN ($2,$3))"],
    ["notempty on text", node({}), "dfv0.value_text IS NOT NULL AND dfv0.value_text != '')"],
    ["notempty on int", node({ column: "value_int" }), "dfv0.value_int IS NOT NULL)"],
  ])("should render %s", (_name, predicateNode, tail) => {
    expect(renderNode(predicateNode)).toBe(prefix + tail);
  });

  it("should negate the existence test", () => {
    expect(renderNode(node({ negated: true }))).toBe(
      `NOT ${prefix}dfv0.value_text IS NOT NULL AND dfv0.value_text != '')`
    );
  });
});
