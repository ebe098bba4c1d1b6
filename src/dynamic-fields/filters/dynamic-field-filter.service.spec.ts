import { createDynamicFieldsTestingModule } from "../../../test/utils/dynamic-fields.testing";
import { DynamicFieldsService } from "../services/dynamic-fields.service";
import { DynamicFieldFilterService } from "./dynamic-field-filter.service";

describe("DynamicFieldFilterService", () => {
  let fieldsService: DynamicFieldsService;
  let service: DynamicFieldFilterService;

  beforeEach(async () => {
    const context = await createDynamicFieldsTestingModule();
    fieldsService = context.module.get<DynamicFieldsService>(DynamicFieldsService);
    service = context.module.get<DynamicFieldFilterService>(DynamicFieldFilterService);

    await fieldsService.create({ name: "Region", label: "Region", fieldType: "Text" }, 1);
    await fieldsService.create({ name: "Urgent", label: "Urgent", fieldType: "Checkbox" }, 1);
  });

  it("should resolve fields by id and by name", async () => {
    const compiled = await service.compile([
      { fieldId: 2, operator: "eq", value: "1" },
      { fieldName: "Region", operator: "ne", value: "south" },
    ]);

    expect(compiled.sql).toBe(
      "EXISTS (SELECT 1 FROM dynamic_field_value dfv0 WHERE dfv0.object_id = t.id AND dfv0.field_id = $1 AND dfv0.value_int = 1)" +
        " AND EXISTS (SELECT 1 FROM dynamic_field_value dfv1 WHERE dfv1.object_id = t.id AND dfv1.field_id = $2 AND (dfv1.value_text != $3 OR dfv1.value_text IS NULL))"
    );
    expect(compiled.params).toEqual([2, 1, "south"]);
  });

  it("should drop conditions on unknown fields", async () => {
    const compiled = await service.compile([
      { fieldName: "Nowhere", value: "x" },
      { fieldId: 42, value: "x" },
      { value: "x" },
    ]);

    expect(compiled).toEqual({ sql: "", params: [], plan: { nodes: [], params: [] } });
  });

  it("should compile query parameters with a start offset", async () => {
    const compiled = await service.compileFromQuery(
      { df_Region_contains: "or", page: "1" },
      3
    );

    expect(compiled.sql).toBe(
      "EXISTS (SELECT 1 FROM dynamic_field_value dfv0 WHERE dfv0.object_id = t.id AND dfv0.field_id = $3 AND dfv0.value_text LIKE $4)"
    );
    expect(compiled.params).toEqual([1, "%or%"]);
  });
});
