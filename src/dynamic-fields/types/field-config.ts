import { FieldType } from "./field-types";

export interface RegEx {
  Value: string;
  ErrorMessage: string;
}

export type DateRestriction = "none" | "DisablePastDates" | "DisableFutureDates";

export const DATE_RESTRICTIONS: DateRestriction[] = [
  "none",
  "DisablePastDates",
  "DisableFutureDates",
];

interface BaseConfig {
  DefaultValue?: string;
}

export interface TextConfig extends BaseConfig {
  MaxLength?: number;
  RegExList?: RegEx[];
  Link?: string;
  LinkPreview?: string;
}

export interface TextAreaConfig extends BaseConfig {
  MaxLength?: number;
  RegExList?: RegEx[];
  Rows?: number;
  Cols?: number;
}

export type CheckboxConfig = BaseConfig;

export interface SelectionConfig extends BaseConfig {
  PossibleValues: Record<string, string>;
  PossibleNone?: number;
  TranslatableValues?: number;
  TreeView?: number;
}

export interface DateConfig extends BaseConfig {
  YearsInPast?: number;
  YearsInFuture?: number;
  YearsPeriod?: number;
  DateRestriction?: DateRestriction;
}

export interface FieldConfigMap {
  [FieldType.TEXT]: TextConfig;
  [FieldType.TEXTAREA]: TextAreaConfig;
  [FieldType.CHECKBOX]: CheckboxConfig;
  [FieldType.DROPDOWN]: SelectionConfig;
  [FieldType.MULTISELECT]: SelectionConfig;
  [FieldType.DATE]: DateConfig;
  [FieldType.DATETIME]: DateConfig;
}

export type FieldConfig = FieldConfigMap[FieldType];

/**
 * A field type paired with the configuration shape that belongs to it.
 * Switching on `fieldType` narrows `config`.
 */
export type TypedFieldConfig = {
  [T in FieldType]: { fieldType: T; config: FieldConfigMap[T] };
}[FieldType];

export function supportsAutoConfig(fieldType: FieldType): boolean {
  switch (fieldType) {
    case FieldType.TEXT:
    case FieldType.TEXTAREA:
    case FieldType.CHECKBOX:
    case FieldType.DATE:
    case FieldType.DATETIME:
      return true;
    case FieldType.DROPDOWN:
    case FieldType.MULTISELECT:
      return false;
  }
}

/**
 * Sensible per-type defaults used when a field is created in auto-config mode.
 */
export function defaultConfig(fieldType: FieldType): TypedFieldConfig {
  switch (fieldType) {
    case FieldType.TEXT:
      return { fieldType, config: { MaxLength: 200 } };
    case FieldType.TEXTAREA:
      return { fieldType, config: { Rows: 4, Cols: 60 } };
    case FieldType.CHECKBOX:
      return { fieldType, config: { DefaultValue: "0" } };
    case FieldType.DROPDOWN:
    case FieldType.MULTISELECT:
      return { fieldType, config: { PossibleValues: {} } };
    case FieldType.DATE:
    case FieldType.DATETIME:
      return { fieldType, config: { YearsInPast: 5, YearsInFuture: 5 } };
  }
}

/**
 * Parses the admin form notation for possible values: one entry per line,
 * `key=label`, or a bare key that doubles as its own label.
 */
export function parsePossibleValuesText(text: string): Record<string, string> {
  const values: Record<string, string> = {};
  for (const rawLine of text.split("\n")) {
    const line = rawLine.trim();
    if (line === "") {
      continue;
    }
    const separator = line.indexOf("=");
    if (separator === -1) {
      values[line] = line;
    } else {
      values[line.slice(0, separator).trim()] = line.slice(separator + 1).trim();
    }
  }
  return values;
}
