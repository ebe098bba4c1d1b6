import { parseConfig } from "../codec/config-codec";
import { DynamicField } from "../entities/dynamic-field.entity";
import { TypedFieldConfig } from "./field-config";
import { ObjectType } from "./field-types";

export interface FieldAttributes {
  id: number;
  internalField: boolean;
  name: string;
  label: string;
  fieldOrder: number;
  objectType: ObjectType;
  validId: number;
  createTime: Date;
  createBy: number;
  changeTime: Date;
  changeBy: number;
}

/**
 * A field definition with its decoded configuration. Narrowing on
 * `fieldType` narrows `config` to the matching variant.
 */
export type FieldDefinition = FieldAttributes & TypedFieldConfig;

/**
 * Loose write model accepted by the registry. Everything is checked and
 * normalized before it reaches storage.
 */
export interface FieldInput {
  name: string;
  label?: string;
  fieldOrder?: number;
  fieldType: string;
  objectType?: string;
  validId?: number;
  internalField?: boolean;
  config?: Record<string, unknown>;
  // newline separated `key=label` entries for Dropdown/Multiselect
  possibleValuesText?: string;
  autoConfig?: boolean;
}

/** Form input without a label is labelled with its name. */
export function withDefaultLabel<T extends FieldInput>(input: T): T {
  if ((input.label ?? "").trim() !== "") {
    return input;
  }
  return { ...input, label: input.name };
}

export function toFieldDefinition(entity: DynamicField): FieldDefinition {
  return {
    id: entity.id,
    internalField: entity.internalField === 1,
    name: entity.name,
    label: entity.label,
    fieldOrder: entity.fieldOrder,
    objectType: entity.objectType,
    validId: entity.validId,
    createTime: entity.createTime,
    createBy: entity.createBy,
    changeTime: entity.changeTime,
    changeBy: entity.changeBy,
    ...parseConfig(entity.fieldType, entity.config),
  };
}

export function isActive(field: FieldAttributes): boolean {
  return field.validId === 1;
}
