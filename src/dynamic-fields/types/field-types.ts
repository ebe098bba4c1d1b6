export enum FieldType {
  TEXT = "Text",
  TEXTAREA = "TextArea",
  CHECKBOX = "Checkbox",
  DROPDOWN = "Dropdown",
  MULTISELECT = "Multiselect",
  DATE = "Date",
  DATETIME = "DateTime",
}

export enum ObjectType {
  TICKET = "Ticket",
  ARTICLE = "Article",
  CUSTOMER_USER = "CustomerUser",
  CUSTOMER_COMPANY = "CustomerCompany",
}

// 0=disabled, 1=enabled, 2=required
export enum ScreenLevel {
  DISABLED = 0,
  ENABLED = 1,
  REQUIRED = 2,
}

export const FIELD_TYPES: FieldType[] = Object.values(FieldType);
export const OBJECT_TYPES: ObjectType[] = Object.values(ObjectType);

export function isFieldType(value: unknown): value is FieldType {
  return FIELD_TYPES.some((type) => type === value);
}

export function isObjectType(value: unknown): value is ObjectType {
  return OBJECT_TYPES.some((type) => type === value);
}

export function isScreenLevel(value: unknown): value is ScreenLevel {
  return (
    value === ScreenLevel.DISABLED ||
    value === ScreenLevel.ENABLED ||
    value === ScreenLevel.REQUIRED
  );
}

/**
 * Types whose values are an enumerated key set; they always need
 * PossibleValues and can never be auto-configured.
 */
export function isSelectionType(
  type: FieldType
): type is FieldType.DROPDOWN | FieldType.MULTISELECT {
  return type === FieldType.DROPDOWN || type === FieldType.MULTISELECT;
}

// Separator used to store Multiselect keys in a single text slot
export const MULTISELECT_DELIMITER = "||";
