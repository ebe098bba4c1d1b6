import { FieldType } from "../types/field-types";
import { FilterPlan, ResolvedCondition, compileFilterPlan } from "./filter-plan";

const region = { id: 3, fieldType: FieldType.TEXT };
const urgent = { id: 5, fieldType: FieldType.CHECKBOX };
const due = { id: 6, fieldType: FieldType.DATE };
const tags = { id: 7, fieldType: FieldType.MULTISELECT };

interface ValueRow {
  objectId: number;
  fieldId: number;
  valueText: string | null;
}

// Evaluates text predicates of a plan against rows held in memory
function matchingObjects(plan: FilterPlan, startParam: number, rows: ValueRow[]): number[] {
  const param = (index: number) => String(plan.params[index - startParam]);
  const objectIds = [...new Set(rows.map((row) => row.objectId))].sort((a, b) => a - b);

  return objectIds.filter((objectId) =>
    plan.nodes.every((node) => {
      const fieldId = plan.params[node.fieldParam - startParam];
      const exists = rows.some((row) => {
        if (row.objectId !== objectId || row.fieldId !== fieldId || row.valueText === null) {
          return false;
        }
        const predicate = node.predicate;
        switch (predicate.kind) {
          case "compare":
            return predicate.comparator === ">"
              ? row.valueText > param(predicate.param)
              : row.valueText === param(predicate.param);
          case "notEmpty":
            return row.valueText !== "";
          default:
            throw new Error(`unsupported predicate ${predicate.kind}`);
        }
      });
      return node.negated ? !exists : exists;
    })
  );
}

describe("compileFilterPlan", () => {
  it("should bind the field id before the value", () => {
    const plan = compileFilterPlan(
      [{ condition: { fieldName: "Region", operator: "eq", value: "north" }, field: region }],
      1
    );

    expect(plan).toEqual({
      nodes: [
        {
          alias: "dfv0",
          negated: false,
          fieldParam: 1,
          column: "value_text",
          predicate: { kind: "compare", comparator: "=", param: 2 },
        },
      ],
      params: [3, "north"],
    });
  });

  it("should number placeholders with one counter from the start offset", () => {
    const conditions: ResolvedCondition[] = [
      { condition: { fieldName: "Region", operator: "contains", value: "nor" }, field: region },
      { condition: { fieldName: "Missing", value: "x" }, field: null },
      { condition: { fieldName: "Urgent", operator: "eq", value: "on" }, field: urgent },
      { condition: { fieldName: "Due", operator: "empty", value: "1" }, field: due },
      { condition: { fieldName: "Tags", operator: "in", value: "a, b" }, field: tags },
    ];

    const plan = compileFilterPlan(conditions, 4);

    expect(plan.params).toEqual([3, "%nor%", 5, 6, 7, "a", "b"]);
    expect(plan.nodes.map((node) => [node.alias, node.fieldParam, node.negated])).toEqual([
      ["dfv0", 4, false],
      ["dfv2", 6, false],
      ["dfv3", 7, true],
      ["dfv4", 8, false],
    ]);
    expect(plan.nodes.map((node) => node.predicate)).toEqual([
      { kind: "like", param: 5 },
      { kind: "checked" },
      { kind: "notEmpty" },
      { kind: "in", params: [9, 10] },
    ]);
  });

  it("should treat an unchecked checkbox value as unchecked", () => {
    const plan = compileFilterPlan(
      [{ condition: { fieldId: 5, operator: "eq", value: "0" }, field: urgent }],
      1
    );

    expect(plan.nodes[0].predicate).toEqual({ kind: "unchecked" });
    expect(plan.params).toEqual([5]);
  });

  it("should fall back to eq for an unknown operator", () => {
    const plan = compileFilterPlan(
      [{ condition: { fieldId: 3, operator: "between", value: "x" }, field: region }],
      1
    );

    expect(plan.nodes[0].predicate).toEqual({ kind: "compare", comparator: "=", param: 2 });
  });

  it("should return an empty plan when no condition resolves", () => {
    expect(
      compileFilterPlan([{ condition: { fieldName: "Missing", value: "x" }, field: null }], 1)
    ).toEqual({ nodes: [], params: [] });
  });

  it("should match exactly the objects whose value is greater than the bound", () => {
    const rows: ValueRow[] = [
      { objectId: 1, fieldId: 3, valueText: "b" },
      { objectId: 2, fieldId: 3, valueText: "d" },
      { objectId: 3, fieldId: 3, valueText: "a" },
      { objectId: 4, fieldId: 3, valueText: null },
      { objectId: 5, fieldId: 9, valueText: "z" },
    ];

    for (const bound of ["a", "b", "c", "d"]) {
      const plan = compileFilterPlan(
        [{ condition: { fieldId: 3, operator: "gt", value: bound }, field: region }],
        1
      );
      const expected = rows
        .filter((row) => row.fieldId === 3 && row.valueText !== null && row.valueText > bound)
        .map((row) => row.objectId);

      expect(matchingObjects(plan, 1, rows)).toEqual(expected);
    }
  });

  it("should match objects without a non-empty value for empty", () => {
    const rows: ValueRow[] = [
      { objectId: 1, fieldId: 3, valueText: "north" },
      { objectId: 2, fieldId: 3, valueText: "" },
      { objectId: 3, fieldId: 9, valueText: "x" },
    ];
    const plan = compileFilterPlan(
      [{ condition: { fieldId: 3, operator: "empty", value: "1" }, field: region }],
      1
    );

    expect(matchingObjects(plan, 1, rows)).toEqual([2, 3]);
  });
});
