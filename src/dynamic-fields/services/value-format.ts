import { format, isValid, parse } from "date-fns";
import { FieldDefinition } from "../types/field-definition";
import { FieldType, MULTISELECT_DELIMITER, ObjectType } from "../types/field-types";
import {
  FieldValueData,
  dateValue,
  intValue,
  textValue,
} from "../types/field-value";

export const EMPTY_DISPLAY_VALUE = "-";

const DATE_FORMAT = "yyyy-MM-dd";
const DATETIME_DISPLAY_FORMAT = "yyyy-MM-dd HH:mm";
// datetime-local inputs first, then the long form
const DATETIME_INPUT_FORMATS = ["yyyy-MM-dd'T'HH:mm", "yyyy-MM-dd HH:mm:ss"];
const CHECKED_TOKENS = ["1", "on", "true"];

export interface DisplayValue {
  field: FieldDefinition;
  value: string | number | Date | null;
  displayValue: string;
}

export function formPrefix(objectType: ObjectType): string {
  return objectType === ObjectType.ARTICLE
    ? "ArticleDynamicField_"
    : "DynamicField_";
}

/**
 * Renders a stored value for read-only screens. A missing value, or one in
 * a slot that does not match the field type, renders as "-".
 */
export function toDisplayValue(
  field: FieldDefinition,
  value: FieldValueData | undefined
): DisplayValue {
  const empty: DisplayValue = { field, value: null, displayValue: EMPTY_DISPLAY_VALUE };
  if (!value) {
    return empty;
  }

  switch (field.fieldType) {
    case FieldType.TEXT:
    case FieldType.TEXTAREA:
      return value.kind === "text"
        ? { field, value: value.text, displayValue: value.text }
        : empty;
    case FieldType.DROPDOWN:
      if (value.kind !== "text") {
        return empty;
      }
      return {
        field,
        value: value.text,
        displayValue: field.config.PossibleValues[value.text] ?? value.text,
      };
    case FieldType.MULTISELECT: {
      if (value.kind !== "text") {
        return empty;
      }
      const labels = value.text
        .split(MULTISELECT_DELIMITER)
        .map((key) => field.config.PossibleValues[key] ?? key);
      return { field, value: value.text, displayValue: labels.join(", ") };
    }
    case FieldType.CHECKBOX:
      if (value.kind !== "int") {
        return empty;
      }
      return { field, value: value.int, displayValue: value.int === 1 ? "Yes" : "No" };
    case FieldType.DATE:
      return value.kind === "date"
        ? { field, value: value.date, displayValue: format(value.date, DATE_FORMAT) }
        : empty;
    case FieldType.DATETIME:
      return value.kind === "date"
        ? {
            field,
            value: value.date,
            displayValue: format(value.date, DATETIME_DISPLAY_FORMAT),
          }
        : empty;
  }
}

function parseFirst(value: string, formats: string[]): Date | null {
  for (const pattern of formats) {
    const parsed = parse(value, pattern, new Date());
    // parse accepts unpadded parts; only the exact layout counts
    if (isValid(parsed) && format(parsed, pattern) === value) {
      return parsed;
    }
  }
  return null;
}

/**
 * Converts submitted form values for one field into a typed value. Returns
 * null when nothing usable was submitted. Unparseable dates are kept as
 * text.
 */
export function coerceFormValue(
  fieldType: FieldType,
  submitted: string[]
): FieldValueData | null {
  const first = submitted[0];
  if (first === undefined || first === "") {
    return null;
  }

  switch (fieldType) {
    case FieldType.TEXT:
    case FieldType.TEXTAREA:
    case FieldType.DROPDOWN:
      return textValue(first);
    case FieldType.MULTISELECT:
      return textValue(submitted.join(MULTISELECT_DELIMITER));
    case FieldType.CHECKBOX:
      return intValue(CHECKED_TOKENS.includes(first) ? 1 : 0);
    case FieldType.DATE: {
      const parsed = parseFirst(first, [DATE_FORMAT]);
      return parsed ? dateValue(parsed) : textValue(first);
    }
    case FieldType.DATETIME: {
      const parsed = parseFirst(first, DATETIME_INPUT_FORMATS);
      return parsed ? dateValue(parsed) : textValue(first);
    }
  }
}
