import { Inject, Injectable } from "@nestjs/common";
import { InjectRepository } from "@nestjs/typeorm";
import { Repository } from "typeorm";
import { LoggerUtil } from "../../common/logger/LoggerUtil";
import {
  DynamicFieldsConfig,
  dynamicFieldsConfig,
} from "../../config/dynamic-fields.config";
import { DynamicFieldValue } from "../entities/dynamic-field-value.entity";
import { FieldDefinition } from "../types/field-definition";
import { ObjectType } from "../types/field-types";
import { FieldValueData, StoredFieldValue } from "../types/field-value";
import { DynamicFieldScreenConfigService } from "./dynamic-field-screen-config.service";
import { DynamicFieldsService } from "./dynamic-fields.service";
import { withStorage } from "./storage.util";
import {
  DisplayValue,
  coerceFormValue,
  formPrefix,
  toDisplayValue,
} from "./value-format";

/** Raw form submission, every key mapped to all of its submitted values. */
export type FormValues = Record<string, string[]>;

function toValueData(row: DynamicFieldValue): FieldValueData | null {
  if (row.valueText !== null && row.valueText !== undefined) {
    return { kind: "text", text: row.valueText };
  }
  if (row.valueInt !== null && row.valueInt !== undefined) {
    return { kind: "int", int: row.valueInt };
  }
  if (row.valueDate !== null && row.valueDate !== undefined) {
    return { kind: "date", date: row.valueDate };
  }
  return null;
}

@Injectable()
export class DynamicFieldValuesService {
  constructor(
    @InjectRepository(DynamicFieldValue)
    private readonly valueRepository: Repository<DynamicFieldValue>,
    private readonly fieldsService: DynamicFieldsService,
    private readonly screenConfigService: DynamicFieldScreenConfigService,
    @Inject(dynamicFieldsConfig.KEY)
    private readonly config: DynamicFieldsConfig
  ) {}

  async getValues(objectId: number): Promise<StoredFieldValue[]> {
    const rows = await withStorage("get dynamic field values", () =>
      this.valueRepository.find({
        where: { objectId },
        order: { fieldId: "ASC" },
      })
    );

    const values: StoredFieldValue[] = [];
    for (const row of rows) {
      const value = toValueData(row);
      if (value) {
        values.push({ id: row.id, fieldId: row.fieldId, objectId: row.objectId, value });
      }
    }
    return values;
  }

  /**
   * Replaces the value of a field on an object. Passing null clears it.
   */
  async setValue(
    fieldId: number,
    objectId: number,
    value: FieldValueData | null
  ): Promise<void> {
    await this.fieldsService.getById(fieldId);
    await this.writeValue(fieldId, objectId, value);
  }

  async getValuesForDisplay(
    objectId: number,
    objectType: ObjectType,
    screenKey?: string
  ): Promise<DisplayValue[]> {
    const fields: FieldDefinition[] = screenKey
      ? (await this.screenConfigService.getFieldsForScreen(screenKey, objectType)).map(
          (entry) => entry.field
        )
      : await this.fieldsService.listActive(objectType);

    const byField = new Map<number, FieldValueData>();
    for (const stored of await this.getValues(objectId)) {
      byField.set(stored.fieldId, stored.value);
    }

    return fields.map((field) => toDisplayValue(field, byField.get(field.id)));
  }

  /**
   * Stores the submitted values of every field enabled on the screen.
   * Fields missing from the submission keep their current value.
   *
   * @returns names of the fields that were written
   */
  async processFormSubmission(
    formValues: FormValues,
    objectId: number,
    objectType: ObjectType,
    screenKey: string
  ): Promise<string[]> {
    const prefix = formPrefix(objectType);
    const fields = await this.screenConfigService.getFieldsForScreen(
      screenKey,
      objectType
    );

    const written: string[] = [];
    for (const { field } of fields) {
      const submitted =
        formValues[prefix + field.name] ?? formValues[`${prefix}${field.name}[]`];
      if (!submitted) {
        continue;
      }

      const value = coerceFormValue(field.fieldType, submitted);
      if (!value) {
        continue;
      }

      await this.writeValue(field.id, objectId, value);
      written.push(field.name);
    }

    LoggerUtil.debug(
      `Form on ${screenKey} wrote ${written.length} dynamic field value(s) for object ${objectId}`,
      "DynamicFieldValuesService"
    );
    return written;
  }

  /** Distinct non-empty text values of a field, ascending. */
  async getDistinctValues(fieldId: number, limit?: number): Promise<string[]> {
    const cap = limit !== undefined && limit > 0 ? limit : this.config.distinctValuesLimit;
    const rows = await withStorage("get distinct dynamic field values", () =>
      this.valueRepository
        .createQueryBuilder("v")
        .select("DISTINCT v.value_text", "value")
        .where("v.field_id = :fieldId", { fieldId })
        .andWhere("v.value_text IS NOT NULL")
        .andWhere("v.value_text <> ''")
        .orderBy("value", "ASC")
        .limit(cap)
        .getRawMany<{ value: string }>()
    );
    return rows.map((row) => row.value);
  }

  private async writeValue(
    fieldId: number,
    objectId: number,
    value: FieldValueData | null
  ): Promise<void> {
    await withStorage("set dynamic field value", async () => {
      await this.valueRepository.delete({ fieldId, objectId });
      if (!value) {
        return;
      }
      await this.valueRepository.save(
        this.valueRepository.create({
          fieldId,
          objectId,
          valueText: value.kind === "text" ? value.text : null,
          valueInt: value.kind === "int" ? value.int : null,
          valueDate: value.kind === "date" ? value.date : null,
        })
      );
    });
  }
}
