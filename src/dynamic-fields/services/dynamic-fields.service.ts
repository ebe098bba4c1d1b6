import { Injectable } from "@nestjs/common";
import { InjectRepository } from "@nestjs/typeorm";
import { DataSource, FindOptionsWhere, Not, Repository } from "typeorm";
import { LoggerUtil } from "../../common/logger/LoggerUtil";
import { buildConfig, serializeConfig } from "../codec/config-codec";
import { DynamicField } from "../entities/dynamic-field.entity";
import { DynamicFieldScreenConfig } from "../entities/dynamic-field-screen-config.entity";
import { DynamicFieldValue } from "../entities/dynamic-field-value.entity";
import {
  ConflictError,
  ForbiddenError,
  NotFoundError,
  ParseError,
  ValidationError,
} from "../errors/dynamic-field.errors";
import {
  TypedFieldConfig,
  defaultConfig,
  parsePossibleValuesText,
  supportsAutoConfig,
} from "../types/field-config";
import {
  FieldDefinition,
  FieldInput,
  isActive,
  toFieldDefinition,
} from "../types/field-definition";
import {
  FieldType,
  ObjectType,
  isFieldType,
  isObjectType,
} from "../types/field-types";
import { withStorage } from "./storage.util";

const FIELD_NAME_PATTERN = /^[A-Za-z0-9]+$/;

export interface FieldListFilter {
  objectType?: ObjectType;
  fieldType?: FieldType;
}

interface NormalizedField {
  name: string;
  label: string;
  fieldOrder: number;
  objectType: ObjectType;
  validId: number;
  internalField: boolean;
  typed: TypedFieldConfig;
}

/**
 * Applies input defaults and the registry's validation rules. Pure; no
 * storage is touched.
 */
export function normalizeFieldInput(input: FieldInput): NormalizedField {
  const name = (input.name ?? "").trim();
  if (name === "") {
    throw new ValidationError("name", "name is required");
  }
  if (!FIELD_NAME_PATTERN.test(name)) {
    throw new ValidationError(
      "name",
      "name must contain only alphanumeric characters"
    );
  }

  const label = (input.label ?? "").trim();
  if (label === "") {
    throw new ValidationError("label", "label is required");
  }

  const fieldType = input.fieldType;
  if (!isFieldType(fieldType)) {
    throw new ValidationError("fieldType", `invalid field type: ${fieldType}`);
  }

  const objectType = input.objectType || ObjectType.TICKET;
  if (!isObjectType(objectType)) {
    throw new ValidationError("objectType", `invalid object type: ${objectType}`);
  }

  const typed = resolveConfig(fieldType, input);
  assertPossibleValues(typed);

  return {
    name,
    label,
    fieldOrder: atLeastOne(input.fieldOrder),
    objectType,
    validId: atLeastOne(input.validId),
    internalField: input.internalField === true,
    typed,
  };
}

function atLeastOne(value: number | undefined): number {
  return value !== undefined && value >= 1 ? value : 1;
}

function resolveConfig(fieldType: FieldType, input: FieldInput): TypedFieldConfig {
  const supplied = input.config ?? {};

  if (input.autoConfig === true && supportsAutoConfig(fieldType)) {
    const typed = defaultConfig(fieldType);
    const defaultValue = supplied.DefaultValue;
    if (typeof defaultValue === "string" && defaultValue !== "") {
      typed.config.DefaultValue = defaultValue;
    }
    return typed;
  }

  let typed: TypedFieldConfig;
  try {
    typed = buildConfig(fieldType, supplied);
  } catch (error) {
    if (error instanceof ParseError) {
      throw new ValidationError("config", error.message);
    }
    throw error;
  }

  if (
    input.possibleValuesText &&
    (typed.fieldType === FieldType.DROPDOWN ||
      typed.fieldType === FieldType.MULTISELECT)
  ) {
    typed.config.PossibleValues = {
      ...typed.config.PossibleValues,
      ...parsePossibleValuesText(input.possibleValuesText),
    };
  }
  return typed;
}

function assertPossibleValues(typed: TypedFieldConfig): void {
  if (
    (typed.fieldType === FieldType.DROPDOWN ||
      typed.fieldType === FieldType.MULTISELECT) &&
    Object.keys(typed.config.PossibleValues).length === 0
  ) {
    throw new ValidationError(
      "config.PossibleValues",
      `${typed.fieldType} field requires at least one possible value`
    );
  }
}

@Injectable()
export class DynamicFieldsService {
  constructor(
    @InjectRepository(DynamicField)
    private readonly fieldRepository: Repository<DynamicField>,
    private readonly dataSource: DataSource
  ) {}

  async list(filter: FieldListFilter = {}): Promise<FieldDefinition[]> {
    const where: FindOptionsWhere<DynamicField> = {};
    if (filter.objectType) {
      where.objectType = filter.objectType;
    }
    if (filter.fieldType) {
      where.fieldType = filter.fieldType;
    }

    const rows = await withStorage("list dynamic fields", () =>
      this.fieldRepository.find({
        where,
        order: { objectType: "ASC", fieldOrder: "ASC", name: "ASC" },
      })
    );
    return rows.map(toFieldDefinition);
  }

  /** Active fields of one object type, ordered by fieldOrder then name. */
  async listActive(objectType: ObjectType): Promise<FieldDefinition[]> {
    const fields = await this.list({ objectType });
    return fields.filter(isActive);
  }

  async listGroupedByObjectType(): Promise<Record<ObjectType, FieldDefinition[]>> {
    const grouped: Record<ObjectType, FieldDefinition[]> = {
      [ObjectType.TICKET]: [],
      [ObjectType.ARTICLE]: [],
      [ObjectType.CUSTOMER_USER]: [],
      [ObjectType.CUSTOMER_COMPANY]: [],
    };
    for (const field of await this.list()) {
      grouped[field.objectType].push(field);
    }
    return grouped;
  }

  async findById(id: number): Promise<FieldDefinition | null> {
    const row = await withStorage("get dynamic field", () =>
      this.fieldRepository.findOne({ where: { id } })
    );
    return row ? toFieldDefinition(row) : null;
  }

  async getById(id: number): Promise<FieldDefinition> {
    const field = await this.findById(id);
    if (!field) {
      throw new NotFoundError(`dynamic field ${id} not found`);
    }
    return field;
  }

  async findByName(name: string): Promise<FieldDefinition | null> {
    const row = await withStorage("get dynamic field by name", () =>
      this.fieldRepository.findOne({ where: { name } })
    );
    return row ? toFieldDefinition(row) : null;
  }

  async getByName(name: string): Promise<FieldDefinition> {
    const field = await this.findByName(name);
    if (!field) {
      throw new NotFoundError(`dynamic field ${name} not found`);
    }
    return field;
  }

  async nameExists(name: string, excludeId?: number): Promise<boolean> {
    const where: FindOptionsWhere<DynamicField> = { name };
    if (excludeId !== undefined && excludeId > 0) {
      where.id = Not(excludeId);
    }
    const count = await withStorage("check dynamic field name", () =>
      this.fieldRepository.count({ where })
    );
    return count > 0;
  }

  async create(input: FieldInput, userId: number): Promise<FieldDefinition> {
    const field = normalizeFieldInput(input);
    if (await this.nameExists(field.name)) {
      throw new ConflictError(`dynamic field ${field.name} already exists`);
    }

    const entity = this.fieldRepository.create({
      name: field.name,
      label: field.label,
      fieldOrder: field.fieldOrder,
      fieldType: field.typed.fieldType,
      objectType: field.objectType,
      validId: field.validId,
      internalField: field.internalField ? 1 : 0,
      config: serializeConfig(field.typed.config),
      createBy: userId,
      changeBy: userId,
    });
    const saved = await withStorage("create dynamic field", () =>
      this.fieldRepository.save(entity)
    );

    LoggerUtil.log(`Dynamic field ${saved.name} created`, "DynamicFieldsService", userId);
    return toFieldDefinition(saved);
  }

  async update(id: number, input: FieldInput, userId: number): Promise<FieldDefinition> {
    const entity = await this.getEntity(id);
    const field = normalizeFieldInput(input);
    if (await this.nameExists(field.name, id)) {
      throw new ConflictError(`dynamic field ${field.name} already exists`);
    }

    // internalField is owned by the stored row
    entity.name = field.name;
    entity.label = field.label;
    entity.fieldOrder = field.fieldOrder;
    entity.fieldType = field.typed.fieldType;
    entity.objectType = field.objectType;
    entity.validId = field.validId;
    entity.config = serializeConfig(field.typed.config);
    entity.changeBy = userId;

    const saved = await withStorage("update dynamic field", () =>
      this.fieldRepository.save(entity)
    );

    LoggerUtil.log(`Dynamic field ${saved.name} updated`, "DynamicFieldsService", userId);
    return toFieldDefinition(saved);
  }

  /**
   * Removes a field together with its values and screen configuration.
   * Values go first; if that fails nothing else is deleted.
   */
  async delete(id: number): Promise<void> {
    const entity = await this.getEntity(id);
    if (entity.internalField === 1) {
      throw new ForbiddenError(`dynamic field ${entity.name} is internal and cannot be deleted`);
    }

    await withStorage("delete dynamic field", () =>
      this.dataSource.transaction(async (manager) => {
        await manager.getRepository(DynamicFieldValue).delete({ fieldId: id });
        await manager.getRepository(DynamicFieldScreenConfig).delete({ fieldId: id });
        await manager.getRepository(DynamicField).delete({ id });
      })
    );

    LoggerUtil.log(`Dynamic field ${entity.name} deleted`, "DynamicFieldsService");
  }

  private async getEntity(id: number): Promise<DynamicField> {
    const entity = await withStorage("get dynamic field", () =>
      this.fieldRepository.findOne({ where: { id } })
    );
    if (!entity) {
      throw new NotFoundError(`dynamic field ${id} not found`);
    }
    return entity;
  }
}
